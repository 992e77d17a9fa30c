import path from "node:path";
import express, { type NextFunction, type Request, type Response } from "express";
import multer from "multer";
import { z } from "zod";
import type { ClassificationPipeline } from "./lib/classify/pipeline";
import { assertEditsWithinBounds } from "./lib/context";
import { AppError, BadRequestError, errorMessage, NotFoundError } from "./lib/errors";
import { createLogger, type Logger } from "./lib/logger";
import type { ClassifyJobQueue } from "./lib/queue";
import { createRun, editSchema, executeRun, loadRun, type ClassificationRunV1, type RunInput } from "./lib/run";
import { ensureArtifacts, fileExists, isRunId, writeJson } from "./lib/storage";
import { normalizeText } from "./lib/text";

export type AppDeps = {
  /** Resolved on first use so the server starts before the dictionaries load. */
  pipeline: () => Promise<ClassificationPipeline>;
  queue?: ClassifyJobQueue | null;
  artifactsDir?: string;
  maxUploadMb?: number;
  logger?: Logger;
};

const classifyBodySchema = z.object({
  original: z.string(),
  modified: z.string(),
  mode: z.enum(["sync", "async"]).optional(),
  edits: z.array(editSchema).optional()
});

const modeSchema = z.enum(["sync", "async"]).optional();

type Handler = (req: Request, res: Response) => Promise<void>;

function decodeUpload(file: Express.Multer.File): string {
  return normalizeText(file.buffer.toString("utf8").replace(/^\uFEFF/, ""));
}

function pickFile(req: Request, field: string): Express.Multer.File | undefined {
  const files = req.files;
  if (!files || Array.isArray(files)) return undefined;
  return files[field]?.[0];
}

function isTerminal(status: ClassificationRunV1["status"]): boolean {
  return status === "done" || status === "failed";
}

export function createApp(deps: AppDeps): express.Express {
  const log = deps.logger ?? createLogger("http");
  const queue = deps.queue ?? null;
  const base = deps.artifactsDir;
  const maxUploadMb = deps.maxUploadMb ?? 5;

  const app = express();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadMb * 1024 * 1024 }
  });

  const route =
    (fn: Handler) =>
    (req: Request, res: Response, next: NextFunction): void => {
      fn(req, res).catch(next);
    };

  // CORS
  app.use((req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Headers", "*");
    res.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (req.method === "OPTIONS") {
      res.sendStatus(204);
      return;
    }
    next();
  });

  app.use(express.json({ limit: `${maxUploadMb}mb` }));

  app.get("/healthz", (_req, res) => {
    res.json({ ok: true, queue: queue !== null });
  });

  app.post(
    "/api/classify",
    upload.fields([
      { name: "originalFile", maxCount: 1 },
      { name: "modifiedFile", maxCount: 1 }
    ]),
    route(async (req, res) => {
      const originalFile = pickFile(req, "originalFile");
      const modifiedFile = pickFile(req, "modifiedFile");

      let input: RunInput;
      if (originalFile || modifiedFile) {
        if (!originalFile || !modifiedFile) throw new BadRequestError("missing files");
        const mode = modeSchema.safeParse(req.body?.mode);
        if (!mode.success) throw new BadRequestError("mode must be sync or async");
        input = {
          original: decodeUpload(originalFile),
          modified: decodeUpload(modifiedFile),
          originalFileName: originalFile.originalname,
          modifiedFileName: modifiedFile.originalname,
          mode: mode.data ?? (queue ? "async" : "sync")
        };
      } else {
        const parsed = classifyBodySchema.safeParse(req.body);
        if (!parsed.success) throw new BadRequestError("invalid body", { issues: parsed.error.issues });
        const { original, modified, edits } = parsed.data;
        if (edits) assertEditsWithinBounds(edits, { original, modified });
        input = { original, modified, edits: edits ?? null, mode: parsed.data.mode ?? (queue ? "async" : "sync") };
      }

      if (input.mode === "async" && !queue) throw new BadRequestError("async mode needs a job queue");

      const run = await createRun(input, base);
      log.info({ runId: run.runId, mode: run.mode }, "run created");

      if (input.mode === "async" && queue && run.jobId) {
        await queue.enqueue({ runId: run.runId }, run.jobId);
        res.status(202).json({ ...run, pollUrl: `/api/classify/${run.runId}` });
        return;
      }

      const pipeline = await deps.pipeline();
      const done = await executeRun(run.runId, pipeline, { base });
      res.json(done);
    })
  );

  app.get(
    "/api/classify/:runId",
    route(async (req, res) => {
      const runId = String(req.params.runId ?? "");
      if (!isRunId(runId)) throw new NotFoundError("run", runId);
      const { run, artifacts } = await loadRun(runId, base);

      if (!isTerminal(run.status) && run.jobId && queue) {
        const snap = await queue.snapshot(run.jobId);
        if (!snap) {
          run.status = "failed";
          run.error = "job not found";
          await writeJson(artifacts.jsonPath, run);
        } else if (snap.state === "failed") {
          run.status = "failed";
          run.error = snap.failedReason ?? "failed";
          await writeJson(artifacts.jsonPath, run);
        }
      }
      res.json(run);
    })
  );

  app.get(
    "/api/classify/:runId/artifact/html",
    route(async (req, res) => {
      const runId = String(req.params.runId ?? "");
      if (!isRunId(runId)) throw new NotFoundError("run", runId);
      const artifacts = await ensureArtifacts(runId, base);
      if (!(await fileExists(artifacts.htmlPath))) throw new NotFoundError("report", runId);
      res.type("text/html").sendFile(path.resolve(artifacts.htmlPath));
    })
  );

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) log.error({ code: err.code, err: err.message }, "request failed");
      res.status(err.statusCode).json({ error: err.code, message: err.message, context: err.context ?? null });
      return;
    }
    if (err instanceof multer.MulterError) {
      res.status(err.code === "LIMIT_FILE_SIZE" ? 413 : 400).send(err.message);
      return;
    }
    log.error({ err: errorMessage(err) }, "request failed");
    res.status(500).send(errorMessage(err));
  });

  return app;
}
