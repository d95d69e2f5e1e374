/**
 * Error taxonomy shared by the orchestrators and the HTTP routes.
 * Every failure that leaves a route is an AgentError with one of these categories.
 */
export const ERROR_CATEGORIES = [
  "VALIDATION_ERROR",
  "CONFIGURATION_ERROR",
  "UPSTREAM_UNAVAILABLE",
  "UPSTREAM_ERROR",
  "UPSTREAM_TIMEOUT",
  "PAYLOAD_TOO_LARGE",
  "UNSUPPORTED_MEDIA_TYPE",
  "INTERNAL_ERROR",
] as const;

export type ErrorCategory = (typeof ERROR_CATEGORIES)[number];

export function isErrorCategory(value: unknown): value is ErrorCategory {
  return ERROR_CATEGORIES.some((c) => c === value);
}

const HTTP_STATUS: Record<ErrorCategory, number> = {
  VALIDATION_ERROR: 400,
  CONFIGURATION_ERROR: 500,
  UPSTREAM_UNAVAILABLE: 503,
  UPSTREAM_ERROR: 502,
  UPSTREAM_TIMEOUT: 504,
  PAYLOAD_TOO_LARGE: 413,
  UNSUPPORTED_MEDIA_TYPE: 415,
  INTERNAL_ERROR: 500,
};

/** Network-level failures: the provider was never reached. */
const CONNECTION_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
]);

const CONNECTION_ERROR_NAMES = new Set(["APIConnectionError", "ChromaConnectionError", "FetchError"]);
const TIMEOUT_ERROR_NAMES = new Set(["APIConnectionTimeoutError", "AbortError", "TimeoutError"]);

function errorCode(value: unknown): string | undefined {
  if (typeof value !== "object" || value === null || !("code" in value)) return undefined;
  const code = value.code;
  return typeof code === "string" ? code : undefined;
}

function isConnectionFailure(error: Error): boolean {
  if (CONNECTION_ERROR_NAMES.has(error.name)) return true;
  const code = errorCode(error) ?? errorCode(error.cause);
  if (code && CONNECTION_CODES.has(code)) return true;
  // undici reports refused connections as a bare TypeError("fetch failed")
  return error instanceof TypeError && error.message === "fetch failed";
}

function isTimeout(error: Error): boolean {
  return TIMEOUT_ERROR_NAMES.has(error.name);
}

export interface ErrorBody {
  error: ErrorCategory;
  detail: string;
  provider?: string;
}

export class AgentError extends Error {
  readonly category: ErrorCategory;
  /** Which upstream provider failed, for UPSTREAM_* errors. */
  readonly provider?: string;
  readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, options?: { provider?: string; details?: Record<string, unknown>; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "AgentError";
    this.category = category;
    this.provider = options?.provider;
    this.details = options?.details;
  }

  get status(): number {
    return HTTP_STATUS[this.category];
  }

  /**
   * Classify anything thrown by a provider SDK. AgentErrors pass through untouched,
   * so a timeout raised by callUpstream keeps its category.
   */
  static fromUnknown(error: unknown, provider?: string): AgentError {
    if (error instanceof AgentError) return error;
    if (!(error instanceof Error)) {
      return new AgentError(provider ? "UPSTREAM_ERROR" : "INTERNAL_ERROR", String(error), { provider });
    }
    if (!provider) {
      return new AgentError("INTERNAL_ERROR", error.message, { cause: error });
    }
    if (isTimeout(error)) {
      return new AgentError("UPSTREAM_TIMEOUT", `${provider} did not respond in time`, { provider, cause: error });
    }
    if (isConnectionFailure(error)) {
      return new AgentError("UPSTREAM_UNAVAILABLE", `${provider} is unreachable: ${error.message}`, {
        provider,
        cause: error,
      });
    }
    return new AgentError("UPSTREAM_ERROR", `${provider} error: ${error.message}`, { provider, cause: error });
  }

  /** Response body; internal failures are reported without their message. */
  toBody(): ErrorBody {
    const detail = this.category === "INTERNAL_ERROR" ? "Internal server error" : this.message;
    const body: ErrorBody = { error: this.category, detail };
    if (this.provider) body.provider = this.provider;
    return body;
  }
}

export function validationError(message: string, details?: Record<string, unknown>): AgentError {
  return new AgentError("VALIDATION_ERROR", message, { details });
}

export function configurationError(message: string, details?: Record<string, unknown>): AgentError {
  return new AgentError("CONFIGURATION_ERROR", message, { details });
}

export function timeoutError(provider: string, timeoutMs: number): AgentError {
  return new AgentError("UPSTREAM_TIMEOUT", `${provider} did not respond within ${timeoutMs}ms`, {
    provider,
    details: { timeoutMs },
  });
}
