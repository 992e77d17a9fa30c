import type { RelatednessOptions } from "../config";
import type { LexicalPrimitives, PosTagger, RelatednessService } from "../nlp/services";
import { wordKey } from "../nlp/services";
import type { Edit, SubstitutionVerdict } from "../types";
import { singleWords } from "./spelling";

export type SubstitutionDeps = {
  lexicon: LexicalPrimitives;
  tagger: PosTagger;
  relatedness: RelatednessService;
  minRelatedness: number;
  relatednessOptions: RelatednessOptions;
};

/** Same coarse tag, a modal against a verb, or a cardinal against a noun. */
export function posCompatible(tag1: string, tag2: string): boolean {
  if (tag1.slice(0, 2) === tag2.slice(0, 2)) return true;
  if ((tag1 === "MD" && tag2.startsWith("VB")) || (tag1.startsWith("VB") && tag2 === "MD")) return true;
  if ((tag1 === "CD" && tag2.startsWith("NN")) || (tag1.startsWith("NN") && tag2 === "CD")) return true;
  return false;
}

export async function checkSubstitution(edit: Edit, deps: SubstitutionDeps): Promise<SubstitutionVerdict> {
  const words = singleWords(edit, deps.lexicon);
  if (!words) return "not_applicable";
  if (!deps.lexicon.inDictionary(words.before) || !deps.lexicon.inDictionary(words.after)) return "indeterminate";

  const tag1 = deps.tagger.tag([words.before])[0];
  const tag2 = deps.tagger.tag([words.after])[0];
  if (tag1 === undefined || tag2 === undefined) return "indeterminate";
  if (!posCompatible(tag1, tag2)) return "not_applicable";

  const before = deps.lexicon.stem(words.before, tag1);
  const after = deps.lexicon.stem(words.after, tag2);
  if (!before.sense || !after.sense) return "indeterminate";

  const synonyms = await deps.relatedness.synonyms(before.lemma, before.sense, deps.relatednessOptions);
  if (synonyms.has(after.lemma)) return "synonym";

  const score = await deps.relatedness.relatedness(
    wordKey(before.lemma, before.sense),
    wordKey(after.lemma, after.sense),
    deps.relatednessOptions
  );
  return score >= deps.minRelatedness ? "related" : "unrelated";
}
