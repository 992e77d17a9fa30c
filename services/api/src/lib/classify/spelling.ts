import type { DiffEngine, LexicalPrimitives } from "../nlp/services";
import type { Edit, SpellingVerdict } from "../types";

export type SpellingDeps = {
  lexicon: LexicalPrimitives;
  diff: DiffEngine;
  maxDistance: number;
};

/** Both sides as single raw tokens, or null when either side is not exactly one word. */
export function singleWords(edit: Edit, lexicon: LexicalPrimitives): { before: string; after: string } | null {
  const w1 = lexicon.tokenizeStopStem(edit.beforeText, false, false);
  const w2 = lexicon.tokenizeStopStem(edit.afterText, false, false);
  const before = w1[0];
  const after = w2[0];
  if (w1.length !== 1 || w2.length !== 1 || before === undefined || after === undefined) return null;
  return { before, after };
}

/**
 * | before known | after known | condition            | verdict       |
 * |--------------|-------------|----------------------|---------------|
 * | no           | no          |                      | indeterminate |
 * | no           | yes         | distance <= max      | match         |
 * | yes          | yes         | equal ignoring case  | match         |
 * | anything else                                     | no_match      |
 */
export function checkSpelling(edit: Edit, deps: SpellingDeps): SpellingVerdict {
  const words = singleWords(edit, deps.lexicon);
  if (!words) return "no_match";

  const misspelled = !deps.lexicon.inDictionary(words.before);
  const correct = deps.lexicon.inDictionary(words.after);

  if (misspelled && !correct) return "indeterminate";
  if (misspelled && correct) {
    return deps.diff.editDistance(words.before, words.after) <= deps.maxDistance ? "match" : "no_match";
  }
  if (correct && words.before.toLowerCase() === words.after.toLowerCase()) return "match";
  return "no_match";
}
