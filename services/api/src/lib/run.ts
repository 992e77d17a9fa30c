import crypto from "node:crypto";
import { z } from "zod";
import type { ClassificationPipeline, ClassifyProgress } from "./classify/pipeline";
import { summarizeRecords } from "./classify/pipeline";
import { errorMessage, NotFoundError } from "./errors";
import { sha256 } from "./hash";
import { createLogger } from "./logger";
import { renderClassificationHtml } from "./render";
import { ensureArtifacts, fileExists, readJson, readText, writeJson, writeText, type RunArtifacts } from "./storage";
import { CATEGORIES, STAGE_ORDER, type Edit } from "./types";

const log = createLogger("run");

export const editSchema = z.object({
  beforeText: z.string(),
  afterText: z.string(),
  pos1: z.number().int(),
  pos2: z.number().int()
});

const recordSchema = z.object({
  index: z.number().int(),
  edit: editSchema,
  category: z.enum(CATEGORIES),
  decidedBy: z.enum(STAGE_ORDER).nullable()
});

const documentMetaSchema = z.object({
  fileName: z.string().nullable(),
  sha256: z.string(),
  length: z.number().int()
});

const summarySchema = z.object({
  citation: z.number(),
  formatting: z.number(),
  spelling: z.number(),
  substitution: z.number(),
  rephrasing: z.number(),
  grammar: z.number(),
  topic_shift: z.number(),
  undefined: z.number()
});

export const runSchema = z.object({
  schemaVersion: z.literal("1"),
  runId: z.string(),
  mode: z.enum(["sync", "async"]),
  status: z.enum(["pending", "running", "done", "failed"]),
  createdAt: z.string(),
  updatedAt: z.string(),
  jobId: z.string().nullable(),
  document: z.object({ original: documentMetaSchema, modified: documentMetaSchema }),
  /** Edits supplied by the caller; null means the diff engine derives them. */
  edits: z.array(editSchema).nullable(),
  progress: z.object({ completed: z.number(), total: z.number() }),
  summary: summarySchema.nullable(),
  records: z.array(recordSchema),
  artifacts: z.object({ reportHtmlUrl: z.string().nullable() }),
  error: z.string().nullable()
});

export type ClassificationRunV1 = z.infer<typeof runSchema>;
export type RunMode = ClassificationRunV1["mode"];

export function newRunId(): string {
  return `run_${crypto.randomUUID().replace(/-/g, "")}`;
}

export type RunInput = {
  original: string;
  modified: string;
  originalFileName?: string | null;
  modifiedFileName?: string | null;
  edits?: readonly Edit[] | null;
  mode: RunMode;
};

/** Stores the two texts and a pending run record. */
export async function createRun(input: RunInput, base?: string): Promise<ClassificationRunV1> {
  const runId = newRunId();
  const artifacts = await ensureArtifacts(runId, base);
  const now = new Date().toISOString();
  const run: ClassificationRunV1 = {
    schemaVersion: "1",
    runId,
    mode: input.mode,
    status: "pending",
    createdAt: now,
    updatedAt: now,
    jobId: input.mode === "async" ? `${runId}__classify` : null,
    document: {
      original: { fileName: input.originalFileName ?? null, sha256: sha256(input.original), length: input.original.length },
      modified: { fileName: input.modifiedFileName ?? null, sha256: sha256(input.modified), length: input.modified.length }
    },
    edits: input.edits ? input.edits.map((e) => ({ ...e })) : null,
    progress: { completed: 0, total: 0 },
    summary: null,
    records: [],
    artifacts: { reportHtmlUrl: null },
    error: null
  };
  await Promise.all([
    writeText(artifacts.originalPath, input.original),
    writeText(artifacts.modifiedPath, input.modified),
    writeJson(artifacts.jsonPath, run)
  ]);
  return run;
}

export async function loadRun(runId: string, base?: string): Promise<{ run: ClassificationRunV1; artifacts: RunArtifacts }> {
  const artifacts = await ensureArtifacts(runId, base);
  if (!(await fileExists(artifacts.jsonPath))) throw new NotFoundError("run", runId);
  const parsed = runSchema.safeParse(await readJson(artifacts.jsonPath));
  if (!parsed.success) throw new Error(`run ${runId} has an unreadable record: ${parsed.error.message}`);
  return { run: parsed.data, artifacts };
}

async function saveRun(artifacts: RunArtifacts, run: ClassificationRunV1): Promise<void> {
  run.updatedAt = new Date().toISOString();
  await writeJson(artifacts.jsonPath, run);
}

export async function markRunFailed(runId: string, error: unknown, options?: { willRetry?: boolean; base?: string }): Promise<void> {
  const { run, artifacts } = await loadRun(runId, options?.base);
  run.status = options?.willRetry ? "pending" : "failed";
  run.error = errorMessage(error);
  await saveRun(artifacts, run);
}

/**
 * Classifies a stored run and writes its records, summary and HTML report.
 * Malformed edits fail the run and rethrow.
 */
export async function executeRun(
  runId: string,
  pipeline: ClassificationPipeline,
  options?: { base?: string; onProgress?: (info: ClassifyProgress) => void | Promise<void> }
): Promise<ClassificationRunV1> {
  const { run, artifacts } = await loadRun(runId, options?.base);
  const [original, modified] = await Promise.all([readText(artifacts.originalPath), readText(artifacts.modifiedPath)]);

  run.status = "running";
  run.error = null;
  await saveRun(artifacts, run);

  try {
    const classifyOptions = {
      onProgress: async (info: ClassifyProgress) => {
        run.progress = info;
        await options?.onProgress?.(info);
      }
    };
    const records = run.edits
      ? await pipeline.classify(run.edits, { original, modified }, classifyOptions)
      : await pipeline.classifyDocuments(original, modified, classifyOptions);

    run.records = records.map((r) => ({ ...r, edit: { ...r.edit } }));
    run.summary = summarizeRecords(records);
    run.progress = { completed: records.length, total: records.length };
    run.status = "done";
    run.artifacts.reportHtmlUrl = `/api/classify/${runId}/artifact/html`;
    await writeText(artifacts.htmlPath, renderClassificationHtml({ records, original, modified }));
    await saveRun(artifacts, run);
    log.info({ runId, edits: records.length }, "run done");
    return run;
  } catch (e) {
    run.status = "failed";
    run.error = errorMessage(e);
    await saveRun(artifacts, run);
    log.error({ runId, err: run.error }, "run failed");
    throw e;
  }
}
