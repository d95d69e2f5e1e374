/**
 * Text-generation capability shared by every backend, so the orchestrators
 * never branch on a provider name.
 */
export interface LLMMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface CallOptions {
  /** Aborts the outbound request; set by the timeout wrapper. */
  signal?: AbortSignal;
}

export interface CompletionOptions extends CallOptions {
  maxTokens?: number;
  temperature?: number;
}

export interface LLMClient {
  /** Provider name reported in errors and telemetry, e.g. "openai". */
  readonly provider: string;
  readonly model: string;
  complete(messages: LLMMessage[], options?: CompletionOptions): Promise<string>;
}
