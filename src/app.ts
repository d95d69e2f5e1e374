import express, { type Express } from "express";
import cors from "cors";
import { createLogger } from "./lib/log.js";
import type { AgentDeps } from "./rag/deps.js";
import { createChatRouter } from "./routes/chat.js";
import { createHealthRouter } from "./routes/health.js";
import { createIngestRouter } from "./routes/ingest.js";
import { errorHandler } from "./routes/respond.js";

const log = createLogger("http");

export function createApp(deps: AgentDeps): Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(cors());
  app.use(express.json({ limit: deps.config.maxBodyBytes }));

  app.use((req, res, next) => {
    const started = Date.now();
    res.on("finish", () => {
      log.info(`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - started}ms`);
    });
    next();
  });

  app.use(createHealthRouter(deps));
  app.use(createIngestRouter(deps));
  app.use(createChatRouter(deps));

  app.use((_req, res) => {
    res.status(404).json({ error: "NOT_FOUND", detail: "No such route" });
  });
  app.use(errorHandler);

  return app;
}
