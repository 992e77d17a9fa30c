import dictionaryEn from "dictionary-en";
import nspell from "nspell";
import { getClassifierConfig, getLanguageToolConfig } from "../config";
import { DiffMatchPatchEngine } from "../diff";
import { envOptional } from "../env";
import { createLogger } from "../logger";
import { StemFrequencyTopics } from "./features";
import { LanguageToolChecker } from "./grammar";
import { EnglishLexicon } from "./lexicon";
import type { LinguisticServices } from "./services";
import { CompromiseTagger } from "./tagger";
import { NaturalWordNetSource, WordNetRelatedness } from "./wordnet";

const log = createLogger("nlp");

let servicesPromise: Promise<LinguisticServices> | null = null;

async function buildServices(): Promise<LinguisticServices> {
  const startedAt = Date.now();
  const speller = nspell(Buffer.from(dictionaryEn.aff), Buffer.from(dictionaryEn.dic));
  const lexicon = new EnglishLexicon(speller);
  const config = getClassifierConfig();
  const languageTool = getLanguageToolConfig();
  const services: LinguisticServices = {
    lexicon,
    tagger: new CompromiseTagger(),
    relatedness: new WordNetRelatedness(new NaturalWordNetSource(envOptional("WORDNET_DATA_DIR"))),
    grammar: new LanguageToolChecker(languageTool),
    diff: new DiffMatchPatchEngine(),
    topics: new StemFrequencyTopics(lexicon, config.topicMaxFeatures)
  };
  log.info({ ms: Date.now() - startedAt, languageTool: languageTool.baseUrl }, "linguistic services ready");
  return services;
}

/** Loads the dictionary, WordNet handle and clients once per process. */
export function getLinguisticServices(): Promise<LinguisticServices> {
  if (!servicesPromise) {
    servicesPromise = buildServices().catch((e: unknown) => {
      servicesPromise = null;
      throw e;
    });
  }
  return servicesPromise;
}

export * from "./services";
