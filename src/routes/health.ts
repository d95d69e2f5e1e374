import { Router } from "express";
import type { AgentDeps } from "../rag/deps.js";
import { buildTelemetry } from "../telemetry.js";

export function createHealthRouter(deps: AgentDeps): Router {
  const router = Router();

  router.get("/health", (_req, res) => {
    res.json({ status: "OK" });
  });

  router.get("/telemetry", (_req, res) => {
    res.json(buildTelemetry(deps));
  });

  return router;
}
