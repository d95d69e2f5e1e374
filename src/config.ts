import { z } from "zod";
import { configurationError } from "./errors.js";
import { LOG_LEVELS, type LogLevel } from "./lib/log.js";

export type ProviderRole = "primary" | "fallback";
export type VectorStoreKind = "local" | "chroma" | "none";

/**
 * Maps the names callers use for a text-generation backend onto its role.
 * "openai" and "gemini" are the names the service has always accepted.
 */
const PROVIDER_ALIASES: Record<string, ProviderRole> = {
  primary: "primary",
  openai: "primary",
  fallback: "fallback",
  gemini: "fallback",
};

export function parseProviderRole(value: string): ProviderRole | null {
  return PROVIDER_ALIASES[value.trim().toLowerCase()] ?? null;
}

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(9000),
  OPENAI_API_KEY: optionalString,
  DEFAULT_OPENAI_MODEL: z.string().min(1).default("gpt-4o"),
  EMBEDDING_API_KEY: optionalString,
  EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
  GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: z.string().min(1).default("gemini-2.0-flash"),
  DEFAULT_PROVIDER: z
    .string()
    .default("primary")
    .transform((v, ctx) => {
      const role = parseProviderRole(v);
      if (!role) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown provider "${v}"` });
        return z.NEVER;
      }
      return role;
    }),
  VECTOR_STORE: z.enum(["local", "chroma", "none"]).default("local"),
  LOCAL_STORE_PATH: z.string().default("data/vectorStore.json"),
  CHROMA_URL: z.string().url().default("http://localhost:8000"),
  CHROMA_COLLECTION: z.string().min(1).default("my_collection"),
  RAG_TOP_K: z.coerce.number().int().min(1).max(50).default(3),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
  UPLOAD_CHUNK_CHARS: z.coerce.number().int().min(100).default(1000),
  MAX_BODY_BYTES: z.string().min(1).default("20mb"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export interface AgentConfig {
  readonly port: number;
  readonly defaultProvider: ProviderRole;
  readonly openai: { readonly apiKey?: string; readonly model: string };
  readonly embedding: { readonly apiKey?: string; readonly model: string };
  readonly gemini: { readonly apiKey?: string; readonly model: string };
  readonly vectorStore: {
    readonly kind: VectorStoreKind;
    /** Undefined keeps the local store in memory only. */
    readonly localPath?: string;
    readonly chromaUrl: string;
    readonly chromaCollection: string;
  };
  readonly topK: number;
  readonly requestTimeoutMs: number;
  readonly temperature: number;
  readonly maxTokens: number;
  readonly uploadChunkChars: number;
  readonly maxBodyBytes: string;
  readonly logLevel: LogLevel;
}

/**
 * Resolve the process configuration from environment values.
 * Called once at startup; the result is frozen.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw configurationError(`Invalid configuration: ${issues.join("; ")}`, { issues });
  }
  const e = parsed.data;
  const localPath = e.LOCAL_STORE_PATH.trim();
  return Object.freeze({
    port: e.PORT,
    defaultProvider: e.DEFAULT_PROVIDER,
    openai: Object.freeze({ apiKey: e.OPENAI_API_KEY, model: e.DEFAULT_OPENAI_MODEL }),
    embedding: Object.freeze({ apiKey: e.EMBEDDING_API_KEY ?? e.OPENAI_API_KEY, model: e.EMBEDDING_MODEL }),
    gemini: Object.freeze({ apiKey: e.GEMINI_API_KEY, model: e.GEMINI_MODEL }),
    vectorStore: Object.freeze({
      kind: e.VECTOR_STORE,
      localPath: localPath || undefined,
      chromaUrl: e.CHROMA_URL,
      chromaCollection: e.CHROMA_COLLECTION,
    }),
    topK: e.RAG_TOP_K,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    temperature: e.LLM_TEMPERATURE,
    maxTokens: e.LLM_MAX_TOKENS,
    uploadChunkChars: e.UPLOAD_CHUNK_CHARS,
    maxBodyBytes: e.MAX_BODY_BYTES,
    logLevel: e.LOG_LEVEL,
  });
}
