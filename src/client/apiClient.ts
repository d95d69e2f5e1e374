import { isErrorCategory, type ErrorCategory } from "../errors.js";

export type IngestResponse = { status: "OK"; ingested_count: number } | { status: "SKIP"; reason: string };

export class AgentApiError extends Error {
  constructor(
    readonly status: number,
    readonly category: ErrorCategory | "NOT_FOUND" | "UNKNOWN",
    message: string,
    readonly provider?: string
  ) {
    super(message);
    this.name = "AgentApiError";
  }
}

type FetchFn = typeof fetch;

function field(body: unknown, key: string): unknown {
  return typeof body === "object" && body !== null && key in body ? Reflect.get(body, key) : undefined;
}

/**
 * Typed client for the agent's HTTP surface. The chat CLI talks to the server only
 * through this.
 */
export class AgentApiClient {
  private readonly baseUrl: string;

  constructor(baseUrl: string, private readonly fetchFn: FetchFn = fetch) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  async health(): Promise<{ status: string }> {
    const body = await this.request("GET", "/health");
    return { status: String(field(body, "status")) };
  }

  async telemetry(): Promise<Record<string, unknown>> {
    const body = await this.request("GET", "/telemetry");
    return typeof body === "object" && body !== null ? { ...body } : {};
  }

  async ingest(texts: string[], source?: string): Promise<IngestResponse> {
    const body = await this.request("POST", "/ingest", { texts, source });
    if (field(body, "status") === "SKIP") return { status: "SKIP", reason: String(field(body, "reason")) };
    return { status: "OK", ingested_count: Number(field(body, "ingested_count")) };
  }

  async chat(query: string, provider?: string): Promise<string> {
    const body = await this.request("POST", "/chat", { query, provider });
    const answer = field(body, "answer");
    if (typeof answer !== "string") throw new AgentApiError(502, "UNKNOWN", "Response has no answer");
    return answer;
  }

  private async request(method: "GET" | "POST", path: string, payload?: object): Promise<unknown> {
    const res = await this.fetchFn(`${this.baseUrl}${path}`, {
      method,
      headers: payload ? { "Content-Type": "application/json" } : undefined,
      body: payload ? JSON.stringify(payload) : undefined,
    });
    const text = await res.text();
    let body: unknown = null;
    if (text) {
      try {
        body = JSON.parse(text);
      } catch {
        body = null;
      }
    }
    if (!res.ok) {
      const category = field(body, "error");
      const detail = field(body, "detail");
      const provider = field(body, "provider");
      throw new AgentApiError(
        res.status,
        isErrorCategory(category) || category === "NOT_FOUND" ? category : "UNKNOWN",
        typeof detail === "string" ? detail : `HTTP ${res.status}`,
        typeof provider === "string" ? provider : undefined
      );
    }
    return body;
  }
}
