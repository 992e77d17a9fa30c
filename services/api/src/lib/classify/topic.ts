import { MalformedEditError } from "../errors";
import type { Distribution, TopicPrimitives } from "../nlp/services";
import type { Edit, TopicVerdict } from "../types";

/**
 * Applies a single edit to the original document. The same splice covers
 * insertions, deletions and replacements.
 */
export function applyEdit(original: string, edit: Edit): string {
  const end = edit.pos1 + edit.beforeText.length;
  if (edit.pos1 < 0 || end > original.length || original.slice(edit.pos1, end) !== edit.beforeText) {
    throw new MalformedEditError(-1, "beforeText does not match the original document at pos1");
  }
  return original.slice(0, edit.pos1) + edit.afterText + original.slice(end);
}

function hasMass(d: Distribution): boolean {
  for (const v of d.values()) if (v !== 0) return true;
  return false;
}

export function relatedTopics(
  edit: Edit,
  original: string,
  deps: { topics: TopicPrimitives; maxDivergence: number }
): TopicVerdict {
  const before = original;
  const after = applyEdit(original, edit);

  const features = deps.topics.extractFeatures(before, after);
  if (features.length === 0) return "indeterminate";

  const dist1 = deps.topics.distribution(features, before);
  const dist2 = deps.topics.distribution(features, after);
  if (!hasMass(dist1) || !hasMass(dist2)) return "indeterminate";

  return deps.topics.divergence(dist1, dist2) > deps.maxDivergence ? "diverged" : "preserved";
}
