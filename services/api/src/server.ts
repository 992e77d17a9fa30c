import { createApp } from "./app";
import { getDefaultPipeline } from "./lib/classifier";
import { env, envFlag } from "./lib/env";
import { createLogger } from "./lib/logger";
import { BullClassifyQueue } from "./lib/queue";
import { artifactsBase } from "./lib/storage";

const log = createLogger("server");

const port = Number(env("PORT", "8787"));
const maxUploadMb = (() => {
  const n = Number.parseInt(env("MAX_UPLOAD_MB", "5"), 10);
  if (!Number.isFinite(n) || n <= 0) return 5;
  return Math.max(1, Math.min(100, n));
})();

const queue = envFlag("CLASSIFY_QUEUE_DISABLED") ? null : new BullClassifyQueue();

const app = createApp({
  pipeline: getDefaultPipeline,
  queue,
  artifactsDir: artifactsBase(),
  maxUploadMb
});

const server = app.listen(port, () => {
  log.info({ port, queue: queue !== null }, "api listening");
});

const shutdown = (signal: string) => {
  log.info({ signal }, "shutting down");
  server.close();
  (queue ? queue.close() : Promise.resolve())
    .catch((e: unknown) => log.error({ err: String(e) }, "queue close failed"))
    .finally(() => process.exit(0));
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
