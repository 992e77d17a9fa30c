import nlp from "compromise";
import natural from "natural";
import type nspell from "nspell";
import { eng } from "stopword";
import { z } from "zod";
import { senseForTag, type LexicalPrimitives, type StemmedWord } from "./services";

export type Speller = ReturnType<typeof nspell>;

const sentencesJsonSchema = z.array(z.object({ text: z.string() }));

const STOPWORDS = new Set(eng.map((w) => w.toLowerCase()));

/**
 * English lexical primitives: `natural` for tokens and Porter stems, a
 * Hunspell dictionary through `nspell` for membership, `compromise` for
 * sentence boundaries and lemmas.
 */
export class EnglishLexicon implements LexicalPrimitives {
  private readonly tokenizer = new natural.WordTokenizer();

  constructor(private readonly speller: Speller) {}

  tokenizeStopStem(text: string, removeStopwords: boolean, stem: boolean): string[] {
    let tokens = this.tokenizer.tokenize(text) ?? [];
    if (removeStopwords) tokens = tokens.filter((t) => !STOPWORDS.has(t.toLowerCase()));
    if (stem) tokens = tokens.map((t) => natural.PorterStemmer.stem(t));
    return tokens;
  }

  inDictionary(word: string): boolean {
    return this.speller.correct(word);
  }

  stem(word: string, posTag: string): StemmedWord {
    const sense = senseForTag(posTag);
    const lower = word.toLowerCase();
    let lemma = "";
    if (sense === "n") lemma = nlp(lower).nouns().toSingular().text();
    else if (sense === "v") lemma = nlp(lower).verbs().toInfinitive().text();
    lemma = lemma.trim().toLowerCase();
    return { lemma: lemma && !/\s/.test(lemma) ? lemma : lower, sense };
  }

  sentences(text: string): string[] {
    if (!text.trim()) return [];
    const parsed = sentencesJsonSchema.safeParse(nlp(text).sentences().json());
    if (!parsed.success) return [text];
    return parsed.data.map((s) => s.text).filter((s) => s.trim().length > 0);
  }
}
