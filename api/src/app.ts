import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import fs from "fs";
import path from "path";
import QRCode from "qrcode";
import type { AppConfig } from "./config";
import { HTTP_STATUS, MESSAGES, type ConfigurationError, type PipelineError } from "./errors";
import type { AnalysisModel } from "./llmClient";
import { replayShare, runAnalysis } from "./pipeline";
import type { Result } from "./result";
import type { RecordStore } from "./store";
import { readSubmission } from "./validator";

export interface AppDeps {
  config: Pick<AppConfig, "publicAppUrl" | "bodyLimit">;
  model: Result<AnalysisModel, ConfigurationError>;
  store: RecordStore | null;
  /** web/dist; omitted in tests */
  publicDir?: string;
}

function sendError(res: Response, error: PipelineError) {
  return res.status(HTTP_STATUS[error.kind]).json({ error: { kind: error.kind, message: error.message } });
}

/** body-parser marks its errors with `type`. */
function bodyErrorType(e: unknown): string | undefined {
  if (typeof e !== "object" || e === null || !("type" in e)) return undefined;
  return typeof e.type === "string" ? e.type : undefined;
}

function sendInternal(res: Response, e: unknown) {
  console.error(e);
  return res.status(500).json({
    error: { kind: "internal", message: e instanceof Error ? e.message : "internal error" },
  });
}

export function createApp(deps: AppDeps) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: deps.config.bodyLimit }));
  const pipelineDeps = { ...deps, publicAppUrl: deps.config.publicAppUrl };

  /* healthz */
  app.get("/healthz", (_req, res) => res.type("text/plain").send("ok"));

  /* analysis */
  app.post("/analyze", async (req, res) => {
    try {
      const outcome = await runAnalysis(readSubmission(req.body), pipelineDeps);
      if (!outcome.ok) return sendError(res, outcome.error);
      return res.json(outcome.value);
    } catch (e) {
      return sendInternal(res, e);
    }
  });

  /* share-link replay */
  app.get("/share/:id", async (req, res) => {
    try {
      const replay = await replayShare(req.params.id, pipelineDeps);
      if (!replay.ok) return sendError(res, replay.error);
      return res.json(replay.value);
    } catch (e) {
      return sendInternal(res, e);
    }
  });

  app.get("/share/:id/qr.png", async (req, res) => {
    try {
      const replay = await replayShare(req.params.id, pipelineDeps);
      if (!replay.ok) return sendError(res, replay.error);
      const png = await QRCode.toBuffer(replay.value.shareUrl, {
        type: "png",
        width: 256,
        margin: 1,
      });
      return res.type("image/png").send(png);
    } catch (e) {
      return sendInternal(res, e);
    }
  });

  /* =========================
     Static files (single-server mode)
     ========================= */
  const { publicDir } = deps;
  if (publicDir && fs.existsSync(publicDir)) {
    app.use(express.static(publicDir));
    // SPA: everything that is not an API route gets index.html
    app.get("*", (req, res, next) => {
      if (["/analyze", "/share", "/healthz"].some((p) => req.path.startsWith(p))) {
        return next();
      }
      res.sendFile(path.join(publicDir, "index.html"));
    });
  } else if (publicDir) {
    console.warn(`[WARN] static directory not found: ${publicDir}`);
  }

  /* body-parser failures get the JSON error body too */
  app.use((e: unknown, _req: Request, res: Response, next: NextFunction) => {
    const type = bodyErrorType(e);
    if (type === "entity.parse.failed") {
      return res.status(400).json({ error: { kind: "validation", message: MESSAGES.badBody } });
    }
    if (type === "entity.too.large") {
      return res.status(413).json({ error: { kind: "validation", message: MESSAGES.bodyTooLarge } });
    }
    if (res.headersSent) return next(e);
    return sendInternal(res, e);
  });

  return app;
}
