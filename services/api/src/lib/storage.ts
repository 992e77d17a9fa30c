import fs from "node:fs/promises";
import path from "node:path";
import { envOptional } from "./env";

export type RunArtifacts = {
  runId: string;
  dir: string;
  jsonPath: string;
  htmlPath: string;
  originalPath: string;
  modifiedPath: string;
};

export function artifactsBase(): string {
  return envOptional("ARTIFACTS_DIR") ?? "./artifacts";
}

const RUN_ID_RE = /^run_[a-f0-9]{32}$/;

export function isRunId(value: string): boolean {
  return RUN_ID_RE.test(value);
}

export async function ensureArtifacts(runId: string, base: string = artifactsBase()): Promise<RunArtifacts> {
  if (!isRunId(runId)) throw new Error(`invalid runId: ${runId}`);
  const dir = path.join(base, runId);
  await fs.mkdir(dir, { recursive: true });
  return {
    runId,
    dir,
    jsonPath: path.join(dir, "run.json"),
    htmlPath: path.join(dir, "report.html"),
    originalPath: path.join(dir, "original.txt"),
    modifiedPath: path.join(dir, "modified.txt")
  };
}

export async function writeJson(filePath: string, data: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  const base = path.basename(filePath);
  const tmpPath = path.join(dir, `.${base}.${process.pid}.${Date.now()}.${Math.random().toString(16).slice(2)}.tmp`);
  await fs.writeFile(tmpPath, JSON.stringify(data, null, 2), "utf8");
  await fs.rename(tmpPath, filePath);
}

/** Reads JSON, retrying briefly while a concurrent writer renames the file into place. */
export async function readJson(filePath: string): Promise<unknown> {
  let lastErr: unknown = null;
  for (let attempt = 0; attempt < 4; attempt++) {
    try {
      const raw = await fs.readFile(filePath, "utf8");
      return JSON.parse(raw);
    } catch (e) {
      lastErr = e;
      if (attempt >= 3) throw e;
      await new Promise((r) => setTimeout(r, 30 * (attempt + 1)));
    }
  }
  throw lastErr;
}

export async function writeText(filePath: string, text: string): Promise<void> {
  await fs.writeFile(filePath, text, "utf8");
}

export async function readText(filePath: string): Promise<string> {
  return fs.readFile(filePath, "utf8");
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
