import express, { Router } from "express";
import { validationError } from "../errors.js";
import { chunkText } from "../extract/chunk.js";
import { extractText, isExtractable } from "../extract/office.js";
import { createLogger } from "../lib/log.js";
import { retrievalBackend, type AgentDeps } from "../rag/deps.js";
import { ingestTexts, NO_STORE_REASON, type IngestResult } from "../rag/ingest.js";
import { sendError } from "./respond.js";

const log = createLogger("ingest");

export const DEFAULT_SOURCE_TAG = "ingest_api";
export const UPLOAD_SOURCE_TAG = "upload";

function skipBody(result: Extract<IngestResult, { status: "skipped" }>) {
  return { status: "SKIP", reason: result.reason };
}

function queryString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

export function createIngestRouter(deps: AgentDeps): Router {
  const router = Router();

  /** Body: { texts: string[], source?: string } */
  router.post("/ingest", async (req, res) => {
    try {
      const { texts, source } = (req.body ?? {}) as { texts?: unknown; source?: unknown };
      const sourceTag = typeof source === "string" && source.trim() ? source.trim() : DEFAULT_SOURCE_TAG;
      const result = await ingestTexts(deps, texts, sourceTag);
      if (result.status === "skipped") {
        res.json(skipBody(result));
        return;
      }
      res.json({ status: "OK", ingested_count: result.storedCount });
    } catch (err) {
      sendError(res, err, log);
    }
  });

  /**
   * Raw PDF/DOCX/PPTX body. Query params: filename, category (default "general").
   * The extracted text is chunked and ingested as one batch. Without a store the
   * document is not parsed at all.
   */
  router.post(
    "/upload",
    express.raw({ type: () => true, limit: deps.config.maxBodyBytes }),
    async (req, res) => {
      try {
        if (!retrievalBackend(deps)) {
          res.json({ status: "SKIP", reason: NO_STORE_REASON });
          return;
        }
        const filename = queryString(req.query.filename) ?? "upload";
        const category = queryString(req.query.category) ?? "general";
        if (!isExtractable(req.headers["content-type"])) {
          throw validationError("Only PDF, DOCX and PPTX uploads are supported", {
            contentType: req.headers["content-type"] ?? null,
          });
        }
        const body: unknown = req.body;
        if (!Buffer.isBuffer(body) || body.length === 0) throw validationError("Upload body is empty");

        const text = await extractText(body);
        if (!text) throw validationError(`No text could be extracted from ${filename}`);
        const chunks = chunkText(text, deps.config.uploadChunkChars);

        const result = await ingestTexts(deps, chunks, UPLOAD_SOURCE_TAG, { filename, category });
        if (result.status === "skipped") {
          res.json(skipBody(result));
          return;
        }
        res.json({ status: "OK", ingested_count: result.storedCount, filename, category });
      } catch (err) {
        sendError(res, err, log);
      }
    }
  );

  return router;
}
