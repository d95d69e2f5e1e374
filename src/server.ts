import dotenv from "dotenv";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { AgentError } from "./errors.js";
import { createLogger, setLogLevel } from "./lib/log.js";
import { createDeps } from "./providers.js";

dotenv.config();
const log = createLogger("server");

function main(): void {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const deps = createDeps(config);
  const app = createApp(deps);

  const server = app.listen(config.port, () => {
    log.info(`RAG agent listening at http://localhost:${config.port} (default provider: ${config.defaultProvider})`);
  });

  const shutdown = (signal: string) => {
    log.info(`${signal} received, closing server`);
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

try {
  main();
} catch (err) {
  const error = AgentError.fromUnknown(err);
  log.error(`Startup failed: ${error.message}`);
  process.exit(1);
}
