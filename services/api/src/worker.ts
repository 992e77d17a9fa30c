import { Worker } from "bullmq";
import { getDefaultPipeline } from "./lib/classifier";
import { errorMessage } from "./lib/errors";
import { createLogger } from "./lib/logger";
import { classifyQueueName, redisConnection, type ClassifyJobData } from "./lib/queue";
import { executeRun, markRunFailed } from "./lib/run";
import { artifactsBase } from "./lib/storage";

const log = createLogger("worker");
const base = artifactsBase();

const worker = new Worker<ClassifyJobData>(
  classifyQueueName,
  async (job) => {
    if (job.name !== "classify") {
      log.warn({ jobId: job.id, name: job.name }, "unknown job");
      return;
    }
    const { runId } = job.data;
    const pipeline = await getDefaultPipeline();
    await job.updateProgress(1);
    await executeRun(runId, pipeline, {
      base,
      onProgress: async (info) => {
        const pct = Math.max(1, Math.min(99, Math.floor((info.completed / Math.max(1, info.total)) * 100)));
        await job.updateProgress(pct);
      }
    });
    await job.updateProgress(100);
  },
  { connection: redisConnection(), concurrency: 1 }
);

worker.on("failed", (job, err) => {
  if (!job) return;
  const attempts = job.opts.attempts ?? 1;
  const willRetry = job.attemptsMade < attempts;
  log.warn({ jobId: job.id, runId: job.data.runId, willRetry, err: err.message }, "classify job failed");
  markRunFailed(job.data.runId, err, { willRetry, base }).catch((e: unknown) =>
    log.error({ runId: job.data.runId, err: errorMessage(e) }, "could not mark run failed")
  );
});

log.info({ queue: classifyQueueName }, "worker started");
