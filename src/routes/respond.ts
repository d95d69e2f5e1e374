import type { ErrorRequestHandler, Response } from "express";
import { AgentError } from "../errors.js";
import { createLogger, type Logger } from "../lib/log.js";

/** Map any thrown value onto the error taxonomy and write it as the JSON response. */
export function sendError(res: Response, err: unknown, log: Logger): void {
  const error = AgentError.fromUnknown(err);
  const line = `${error.category}: ${error.message}`;
  if (error.status >= 500) log.error(line);
  else log.warn(line);
  res.status(error.status).json(error.toBody());
}

function statusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  return typeof err.status === "number" ? err.status : undefined;
}

function parserType(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("type" in err)) return undefined;
  return typeof err.type === "string" ? err.type : undefined;
}

/** Body-parser rejections (4xx) are the caller's fault and keep a 4xx category. */
function clientError(err: unknown, status: number): AgentError {
  if (status === 413) return new AgentError("PAYLOAD_TOO_LARGE", "Request body is too large");
  const message = err instanceof Error ? err.message : "Bad request";
  if (status === 415) return new AgentError("UNSUPPORTED_MEDIA_TYPE", message);
  if (parserType(err) === "entity.parse.failed") {
    return new AgentError("VALIDATION_ERROR", "Request body is not valid JSON");
  }
  return new AgentError("VALIDATION_ERROR", message);
}

const httpLog = createLogger("http");

/**
 * Last handler in the chain. Body-parser failures (malformed JSON, oversized body, unsupported
 * charset or encoding) arrive here with their own status and are mapped like every other error.
 */
export const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }
  const status = statusOf(err);
  if (status !== undefined && status >= 400 && status < 500) {
    sendError(res, clientError(err, status), httpLog);
  } else {
    sendError(res, err, httpLog);
  }
};
