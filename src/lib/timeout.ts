import { AgentError, timeoutError } from "../errors.js";

/**
 * Run one provider call under a deadline. The call receives an AbortSignal that fires
 * when the deadline passes; the returned promise rejects with UPSTREAM_TIMEOUT at that
 * moment even if the provider ignores the signal. Every other failure is classified
 * against the provider name.
 */
export async function callUpstream<T>(
  provider: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(timeoutError(provider, timeoutMs));
    }, timeoutMs);
  });
  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } catch (err) {
    if (controller.signal.aborted) throw timeoutError(provider, timeoutMs);
    throw AgentError.fromUnknown(err, provider);
  } finally {
    clearTimeout(timer);
  }
}
