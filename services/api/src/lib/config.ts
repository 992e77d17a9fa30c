import { envFlag, envOptional } from "./env";

export type RelatednessOptions = {
  /** Score only the first (most frequent) sense of each word instead of all senses. */
  mostFrequentSense: boolean;
};

export type ClassifierConfig = {
  spellingMaxDistance: number;
  substitutionMinRelatedness: number;
  rephrasingMinSimilarity: number;
  rephrasingMinSentences: number;
  rephrasingMaxSentences: number;
  topicMaxDivergence: number;
  topicMaxFeatures: number;
  relatedness: RelatednessOptions;
  concurrency: number;
};

export const DEFAULT_CLASSIFIER_CONFIG: ClassifierConfig = {
  spellingMaxDistance: 2,
  substitutionMinRelatedness: 5,
  rephrasingMinSimilarity: 0.3,
  rephrasingMinSentences: 1,
  rephrasingMaxSentences: 2,
  topicMaxDivergence: 0.5,
  topicMaxFeatures: 100,
  relatedness: { mostFrequentSense: false },
  concurrency: 4
};

function readInt(name: string, fallback: number, min: number, max: number): number {
  const raw = envOptional(name);
  if (!raw) return fallback;
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n)) return fallback;
  return Math.max(min, Math.min(max, n));
}

function readFloat(name: string, fallback: number, min: number, max: number): number {
  const raw = envOptional(name);
  if (!raw) return fallback;
  const n = Number.parseFloat(raw);
  if (!Number.isFinite(n)) return fallback;
  return Math.max(min, Math.min(max, n));
}

export function getClassifierConfig(): ClassifierConfig {
  const d = DEFAULT_CLASSIFIER_CONFIG;
  return {
    ...d,
    spellingMaxDistance: readInt("SPELLING_MAX_DISTANCE", d.spellingMaxDistance, 0, 10),
    substitutionMinRelatedness: readFloat("SUBSTITUTION_MIN_RELATEDNESS", d.substitutionMinRelatedness, 0, 16),
    rephrasingMinSimilarity: readFloat("REPHRASING_MIN_SIMILARITY", d.rephrasingMinSimilarity, 0, 1),
    topicMaxDivergence: readFloat("TOPIC_MAX_DIVERGENCE", d.topicMaxDivergence, 0, 1),
    topicMaxFeatures: readInt("TOPIC_MAX_FEATURES", d.topicMaxFeatures, 1, 10_000),
    relatedness: { mostFrequentSense: envFlag("RELATEDNESS_MOST_FREQUENT_SENSE", d.relatedness.mostFrequentSense) },
    concurrency: readInt("CLASSIFY_CONCURRENCY", d.concurrency, 1, 64)
  };
}

export type LanguageToolConfig = {
  baseUrl: string;
  language: string;
  timeoutMs: number;
};

export function getLanguageToolConfig(): LanguageToolConfig {
  const baseUrl = (envOptional("LANGUAGETOOL_URL") ?? "http://localhost:8081").trim().replace(/\/+$/, "");
  return {
    baseUrl,
    language: envOptional("LANGUAGETOOL_LANGUAGE") ?? "en-US",
    timeoutMs: readInt("LANGUAGETOOL_TIMEOUT_MS", 8000, 200, 120_000)
  };
}
