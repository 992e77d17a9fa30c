import type { RelatednessOptions } from "../config";
import type { Edit } from "../types";

/** WordNet part of speech: noun, verb, adjective, adverb. */
export type Sense = "n" | "v" | "a" | "r";

export type StemmedWord = {
  lemma: string;
  sense: Sense | null;
};

export interface LexicalPrimitives {
  tokenizeStopStem(text: string, removeStopwords: boolean, stem: boolean): string[];
  inDictionary(word: string): boolean;
  stem(word: string, posTag: string): StemmedWord;
  sentences(text: string): string[];
}

export interface PosTagger {
  /** One Penn Treebank tag per token, same length as the input. */
  tag(tokens: string[]): string[];
}

export interface RelatednessService {
  synonyms(word: string, sense: Sense, options: RelatednessOptions): Promise<Set<string>>;
  /** Hirst–St-Onge style score between two `lemma#sense` keys, 0..16. */
  relatedness(a: string, b: string, options: RelatednessOptions): Promise<number>;
  /** Symmetric matrix over `lemma#sense` keys, entries in [0, 1], diagonal 1. */
  relatednessMatrix(vocabulary: string[], options: RelatednessOptions): Promise<number[][]>;
}

export type GrammarViolation = {
  ruleId: string;
  message: string;
  offset: number;
  length: number;
  spelling: boolean;
};

export interface GrammarChecker {
  check(sentence: string): Promise<GrammarViolation[]>;
}

export interface DiffEngine {
  diff(text1: string, text2: string): Edit[];
  editDistance(a: string, b: string): number;
}

export type Distribution = Map<string, number>;

export interface TopicPrimitives {
  extractFeatures(textA: string, textB: string): string[];
  distribution(features: string[], text: string): Distribution;
  divergence(a: Distribution, b: Distribution): number;
}

export type LinguisticServices = {
  lexicon: LexicalPrimitives;
  tagger: PosTagger;
  relatedness: RelatednessService;
  grammar: GrammarChecker;
  diff: DiffEngine;
  topics: TopicPrimitives;
};

export function wordKey(lemma: string, sense: Sense | null): string {
  return sense ? `${lemma}#${sense}` : lemma;
}

export function parseWordKey(key: string): StemmedWord {
  const i = key.lastIndexOf("#");
  if (i <= 0) return { lemma: key, sense: null };
  const sense = key.slice(i + 1);
  if (sense === "n" || sense === "v" || sense === "a" || sense === "r") return { lemma: key.slice(0, i), sense };
  return { lemma: key, sense: null };
}

/** Maps a Penn tag onto a WordNet sense. Cardinal numbers are looked up as nouns. */
export function senseForTag(tag: string): Sense | null {
  if (tag.startsWith("NN") || tag === "CD") return "n";
  if (tag.startsWith("VB") || tag === "MD") return "v";
  if (tag.startsWith("JJ")) return "a";
  if (tag.startsWith("RB")) return "r";
  return null;
}
