import pLimit from "p-limit";
import { DEFAULT_CLASSIFIER_CONFIG, type ClassifierConfig } from "../config";
import { assertEditsWithinBounds, buildEditContext, sentenceSpans, type Span } from "../context";
import { errorMessage } from "../errors";
import { createLogger, type Logger } from "../logger";
import type { LinguisticServices } from "../nlp/services";
import type {
  Category,
  CategorySummary,
  ClassificationRecord,
  DocumentPair,
  Edit,
  EditContext,
  Stage
} from "../types";
import { isCitation } from "./citation";
import { isFormatting } from "./formatting";
import { isGrammar } from "./grammar";
import { isRephrasing } from "./rephrasing";
import { checkSpelling } from "./spelling";
import { checkSubstitution } from "./substitution";
import { relatedTopics } from "./topic";

/**
 * `match` assigns the stage's category, `settled` ends the chain with
 * `undefined`, `pass` hands the edit to the next stage.
 */
type StageOutcome = "match" | "settled" | "pass";

type StageInput = {
  edit: Edit;
  context: EditContext;
  doc: DocumentPair;
};

type StageRule = {
  stage: Stage;
  category: Category;
  run: (input: StageInput) => StageOutcome | Promise<StageOutcome>;
};

export type ClassifyProgress = { completed: number; total: number };

export type ClassifyOptions = {
  onProgress?: (info: ClassifyProgress) => void | Promise<void>;
};

export class ClassificationPipeline {
  private readonly rules: StageRule[];

  constructor(
    private readonly services: LinguisticServices,
    private readonly config: ClassifierConfig = DEFAULT_CLASSIFIER_CONFIG,
    private readonly logger: Logger = createLogger("classify/pipeline")
  ) {
    this.rules = this.buildRules();
  }

  private buildRules(): StageRule[] {
    const s = this.services;
    const c = this.config;
    return [
      {
        stage: "citation",
        category: "citation",
        run: ({ context }) => (isCitation(context.word) ? "match" : "pass")
      },
      {
        stage: "formatting",
        category: "formatting",
        run: ({ edit, doc }) => (isFormatting(edit, doc.original, doc.modified) ? "match" : "pass")
      },
      {
        stage: "spelling",
        category: "spelling",
        run: ({ context }) => {
          const v = checkSpelling(context.word, { lexicon: s.lexicon, diff: s.diff, maxDistance: c.spellingMaxDistance });
          if (v === "match") return "match";
          return v === "indeterminate" ? "settled" : "pass";
        }
      },
      {
        stage: "substitution",
        category: "substitution",
        run: async ({ context }) => {
          const v = await checkSubstitution(context.word, {
            lexicon: s.lexicon,
            tagger: s.tagger,
            relatedness: s.relatedness,
            minRelatedness: c.substitutionMinRelatedness,
            relatednessOptions: c.relatedness
          });
          return v === "related" || v === "synonym" ? "match" : "pass";
        }
      },
      {
        stage: "rephrasing",
        category: "rephrasing",
        run: async ({ context }) => {
          const ok = await isRephrasing(context, {
            lexicon: s.lexicon,
            tagger: s.tagger,
            relatedness: s.relatedness,
            diff: s.diff,
            spellingMaxDistance: c.spellingMaxDistance,
            minSimilarity: c.rephrasingMinSimilarity,
            minSentences: c.rephrasingMinSentences,
            maxSentences: c.rephrasingMaxSentences,
            relatednessOptions: c.relatedness
          });
          return ok ? "match" : "pass";
        }
      },
      {
        stage: "grammar",
        category: "grammar",
        run: async ({ edit }) => ((await isGrammar(edit, { grammar: s.grammar, logger: this.logger })) ? "match" : "pass")
      },
      {
        stage: "topic_shift",
        category: "topic_shift",
        run: ({ edit, doc }) =>
          relatedTopics(edit, doc.original, { topics: s.topics, maxDivergence: c.topicMaxDivergence }) === "diverged"
            ? "match"
            : "pass"
      }
    ];
  }

  private async classifyOne(index: number, input: StageInput): Promise<ClassificationRecord> {
    for (const rule of this.rules) {
      let outcome: StageOutcome;
      try {
        outcome = await rule.run(input);
      } catch (e) {
        this.logger.warn({ stage: rule.stage, index, err: errorMessage(e) }, "classifier stage failed; skipping");
        outcome = "pass";
      }
      if (outcome === "match") return { index, edit: input.edit, category: rule.category, decidedBy: rule.stage };
      if (outcome === "settled") return { index, edit: input.edit, category: "undefined", decidedBy: rule.stage };
    }
    return { index, edit: input.edit, category: "undefined", decidedBy: null };
  }

  /**
   * Classifies every edit of a document pair. Edits run concurrently; the
   * records come back in input order. Throws `MalformedEditError` before any
   * work when an edit does not fit the documents.
   */
  async classify(edits: readonly Edit[], doc: DocumentPair, options?: ClassifyOptions): Promise<ClassificationRecord[]> {
    assertEditsWithinBounds(edits, doc);
    const startedAt = Date.now();
    this.logger.info({ edits: edits.length }, "classification started");

    const sentences: { original: Span[]; modified: Span[] } = {
      original: sentenceSpans(doc.original, this.services.lexicon.sentences(doc.original)),
      modified: sentenceSpans(doc.modified, this.services.lexicon.sentences(doc.modified))
    };

    const limit = pLimit(Math.max(1, this.config.concurrency));
    let completed = 0;
    const records = await Promise.all(
      edits.map((edit, index) =>
        limit(async () => {
          const context = buildEditContext(edit, doc, sentences);
          const record = await this.classifyOne(index, { edit, context, doc });
          completed++;
          await options?.onProgress?.({ completed, total: edits.length });
          return record;
        })
      )
    );

    this.logger.info({ edits: edits.length, ms: Date.now() - startedAt, summary: summarizeRecords(records) }, "classification finished");
    return records;
  }

  async classifyDocuments(original: string, modified: string, options?: ClassifyOptions): Promise<ClassificationRecord[]> {
    const edits = this.services.diff.diff(original, modified);
    return this.classify(edits, { original, modified }, options);
  }
}

export function summarizeRecords(records: readonly ClassificationRecord[]): CategorySummary {
  const summary: CategorySummary = {
    citation: 0,
    formatting: 0,
    spelling: 0,
    substitution: 0,
    rephrasing: 0,
    grammar: 0,
    topic_shift: 0,
    undefined: 0
  };
  for (const r of records) summary[r.category] += 1;
  return summary;
}
