export type Edit = Readonly<{
  beforeText: string;
  afterText: string;
  pos1: number;
  pos2: number;
}>;

export type Category =
  | "citation"
  | "formatting"
  | "spelling"
  | "substitution"
  | "rephrasing"
  | "grammar"
  | "topic_shift"
  | "undefined";

export type Stage = "citation" | "formatting" | "spelling" | "substitution" | "rephrasing" | "grammar" | "topic_shift";

export const STAGE_ORDER = [
  "citation",
  "formatting",
  "spelling",
  "substitution",
  "rephrasing",
  "grammar",
  "topic_shift"
] as const satisfies readonly Stage[];

export const CATEGORIES = [...STAGE_ORDER, "undefined"] as const satisfies readonly Category[];

export type ClassificationRecord = {
  index: number;
  edit: Edit;
  category: Category;
  decidedBy: Stage | null;
};

/**
 * Character-level edit plus the smallest enclosing word and sentence spans
 * in both documents.
 */
export type EditContext = {
  chars: Edit;
  word: Edit;
  sentence: Edit;
};

export type DocumentPair = {
  original: string;
  modified: string;
};

export type SpellingVerdict = "indeterminate" | "no_match" | "match";

export type SubstitutionVerdict = "not_applicable" | "indeterminate" | "unrelated" | "related" | "synonym";

export type TopicVerdict = "indeterminate" | "diverged" | "preserved";

export type CategorySummary = Record<Category, number>;
