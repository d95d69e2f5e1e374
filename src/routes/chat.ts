import { Router } from "express";
import { parseProviderRole, type ProviderRole } from "../config.js";
import { validationError } from "../errors.js";
import { createLogger } from "../lib/log.js";
import { answerQuery } from "../rag/answer.js";
import type { AgentDeps } from "../rag/deps.js";
import { sendError } from "./respond.js";

const log = createLogger("chat");

function resolveProvider(value: unknown, fallback: ProviderRole): ProviderRole {
  if (value === undefined || value === null || value === "") return fallback;
  const role = typeof value === "string" ? parseProviderRole(value) : null;
  if (!role) throw validationError('provider must be one of "primary", "fallback", "openai", "gemini"');
  return role;
}

export function createChatRouter(deps: AgentDeps): Router {
  const router = Router();

  /** Body: { query: string, provider?: "primary" | "fallback" | "openai" | "gemini" } */
  router.post("/chat", async (req, res) => {
    try {
      const { query, provider } = (req.body ?? {}) as { query?: unknown; provider?: unknown };
      const role = resolveProvider(provider, deps.config.defaultProvider);
      const result = await answerQuery(deps, query, role);
      res.json({ answer: result.answer });
    } catch (err) {
      sendError(res, err, log);
    }
  });

  return router;
}
