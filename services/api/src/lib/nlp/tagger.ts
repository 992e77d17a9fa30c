import nlp from "compromise";
import { z } from "zod";
import type { PosTagger } from "./services";

const docJsonSchema = z.array(
  z.object({
    terms: z.array(z.object({ text: z.string(), tags: z.array(z.string()) }))
  })
);

type TaggedTerm = { text: string; tags: string[] };

function tagTerms(text: string): TaggedTerm[] {
  const parsed = docJsonSchema.safeParse(nlp(text).json());
  if (!parsed.success) return [];
  return parsed.data.flatMap((s) => s.terms);
}

/** Collapses compromise's tag set for one term into a Penn Treebank tag. */
export function toPennTag(tags: readonly string[]): string {
  const has = (t: string) => tags.includes(t);
  if (has("Modal")) return "MD";
  if (has("Ordinal")) return "JJ";
  if (has("Cardinal") || has("NumericValue") || has("TextValue") || has("Value")) return "CD";
  if (has("Determiner")) return "DT";
  if (has("Preposition")) return "IN";
  if (has("Conjunction")) return "CC";
  if (has("Pronoun")) return has("Possessive") ? "PRP$" : "PRP";
  if (has("Verb")) {
    if (has("PastTense")) return "VBD";
    if (has("Gerund")) return "VBG";
    if (has("Participle")) return "VBN";
    if (has("Infinitive")) return "VB";
    if (has("PresentTense")) return "VBZ";
    return "VB";
  }
  if (has("Adjective")) {
    if (has("Comparative")) return "JJR";
    if (has("Superlative")) return "JJS";
    return "JJ";
  }
  if (has("Adverb")) return "RB";
  if (has("Noun")) {
    const proper = has("ProperNoun");
    const plural = has("Plural");
    if (proper) return plural ? "NNPS" : "NNP";
    return plural ? "NNS" : "NN";
  }
  if (has("Expression")) return "UH";
  return "NN";
}

export class CompromiseTagger implements PosTagger {
  tag(tokens: string[]): string[] {
    if (tokens.length === 0) return [];
    const terms = tagTerms(tokens.join(" "));
    if (terms.length === tokens.length) return terms.map((t) => toPennTag(t.tags));
    // compromise split or merged something (contractions, hyphens); tag word by word
    return tokens.map((tok) => toPennTag(tagTerms(tok)[0]?.tags ?? []));
  }
}
