import { Queue, type ConnectionOptions } from "bullmq";
import { env } from "./env";

export const redisUrl = (): string => env("REDIS_URL", "redis://localhost:6379");

export function redisConnection(url: string = redisUrl()): ConnectionOptions {
  const u = new URL(url);
  const db = Number.parseInt(u.pathname.replace(/^\//, ""), 10);
  return {
    host: u.hostname || "localhost",
    port: u.port ? Number(u.port) : 6379,
    username: u.username ? decodeURIComponent(u.username) : undefined,
    password: u.password ? decodeURIComponent(u.password) : undefined,
    db: Number.isFinite(db) ? db : undefined,
    tls: u.protocol === "rediss:" ? {} : undefined,
    // required by bullmq workers
    maxRetriesPerRequest: null
  };
}

export const classifyQueueName = "classify";

export type ClassifyJobData = { runId: string };

export type JobSnapshot = {
  state: string;
  failedReason: string | null;
};

/** What the HTTP layer needs from the job queue. */
export interface ClassifyJobQueue {
  enqueue(data: ClassifyJobData, jobId: string): Promise<void>;
  snapshot(jobId: string): Promise<JobSnapshot | null>;
  close(): Promise<void>;
}

export class BullClassifyQueue implements ClassifyJobQueue {
  private readonly queue: Queue<ClassifyJobData>;

  constructor(url: string = redisUrl()) {
    this.queue = new Queue<ClassifyJobData>(classifyQueueName, { connection: redisConnection(url) });
  }

  async enqueue(data: ClassifyJobData, jobId: string): Promise<void> {
    await this.queue.add("classify", data, { jobId, attempts: 2, backoff: { type: "exponential", delay: 1000 } });
  }

  async snapshot(jobId: string): Promise<JobSnapshot | null> {
    const job = await this.queue.getJob(jobId);
    if (!job) return null;
    const state = await job.getState();
    return { state, failedReason: job.failedReason ?? null };
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}
