import type { RelatednessOptions } from "../config";
import { expandEditToWords } from "../context";
import type { DiffEngine, LexicalPrimitives, PosTagger, RelatednessService } from "../nlp/services";
import { wordKey } from "../nlp/services";
import { isNumber, isSymbol } from "../text";
import type { Edit, EditContext } from "../types";
import { isCitation } from "./citation";
import { isFormatting } from "./formatting";
import { fernandoSim, presenceVectors } from "./similarity";
import { checkSpelling } from "./spelling";

export type RephrasingDeps = {
  lexicon: LexicalPrimitives;
  tagger: PosTagger;
  relatedness: RelatednessService;
  diff: DiffEngine;
  spellingMaxDistance: number;
  minSimilarity: number;
  minSentences: number;
  maxSentences: number;
  relatednessOptions: RelatednessOptions;
};

function isNumberOrSymbol(text: string): boolean {
  return isNumber(text) || isSymbol(text);
}

/**
 * A local sub-edit with a cheaper explanation (quote, punctuation, typo,
 * number swap) rules out rephrasing for the whole sentence. Punctuation is
 * judged on the raw fragment, everything else on the words around it.
 */
export function hasOtherExplanation(sub: Edit, sentenceBefore: string, sentenceAfter: string, deps: RephrasingDeps): boolean {
  if (isFormatting(sub, sentenceBefore, sentenceAfter)) return true;
  const word = expandEditToWords(sub, { original: sentenceBefore, modified: sentenceAfter });
  if (isCitation(word)) return true;
  if (checkSpelling(word, { lexicon: deps.lexicon, diff: deps.diff, maxDistance: deps.spellingMaxDistance }) !== "no_match") {
    return true;
  }
  return isNumberOrSymbol(word.beforeText) && isNumberOrSymbol(word.afterText);
}

function senseKeys(text: string, deps: RephrasingDeps): string[] {
  const words = deps.lexicon.tokenizeStopStem(text, true, false);
  const tags = deps.tagger.tag(words);
  return words.map((w, i) => {
    const s = deps.lexicon.stem(w, tags[i] ?? "NN");
    return wordKey(s.lemma, s.sense);
  });
}

/** Weighted bag-of-senses similarity of two sentences, or null when either has no content words. */
export async function sentenceSimilarity(before: string, after: string, deps: RephrasingDeps): Promise<number | null> {
  const keys1 = senseKeys(before, deps);
  const keys2 = senseKeys(after, deps);
  if (keys1.length === 0 || keys2.length === 0) return null;

  const { vocabulary, a, b } = presenceVectors(keys1, keys2);
  const w = await deps.relatedness.relatednessMatrix(vocabulary, deps.relatednessOptions);
  return fernandoSim(a, b, w);
}

export async function isRephrasing(context: EditContext, deps: RephrasingDeps): Promise<boolean> {
  const { beforeText, afterText } = context.sentence;

  const local = deps.diff.diff(beforeText, afterText);
  if (local.length === 0) return false;
  if (local.some((sub) => hasOtherExplanation(sub, beforeText, afterText, deps))) return false;

  const inRange = (n: number) => n >= deps.minSentences && n <= deps.maxSentences;
  if (!inRange(deps.lexicon.sentences(beforeText).length) || !inRange(deps.lexicon.sentences(afterText).length)) {
    return false;
  }

  const sim = await sentenceSimilarity(beforeText, afterText, deps);
  if (sim === null) return false;
  return sim >= deps.minSimilarity;
}
