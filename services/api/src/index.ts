export { createApp, type AppDeps } from "./app";
export { ClassificationPipeline, summarizeRecords, type ClassifyOptions, type ClassifyProgress } from "./lib/classify/pipeline";
export { isCitation } from "./lib/classify/citation";
export { isFormatting } from "./lib/classify/formatting";
export { checkSpelling } from "./lib/classify/spelling";
export { checkSubstitution } from "./lib/classify/substitution";
export { isRephrasing, sentenceSimilarity } from "./lib/classify/rephrasing";
export { fernandoSim } from "./lib/classify/similarity";
export { isGrammar } from "./lib/classify/grammar";
export { relatedTopics, applyEdit } from "./lib/classify/topic";
export { getDefaultPipeline } from "./lib/classifier";
export { DEFAULT_CLASSIFIER_CONFIG, getClassifierConfig, type ClassifierConfig, type RelatednessOptions } from "./lib/config";
export { DiffMatchPatchEngine } from "./lib/diff";
export { AppError, BadRequestError, MalformedEditError, NotFoundError } from "./lib/errors";
export { getLinguisticServices } from "./lib/nlp";
export type * from "./lib/nlp/services";
export { renderClassificationHtml } from "./lib/render";
export type * from "./lib/types";
export { CATEGORIES, STAGE_ORDER } from "./lib/types";
