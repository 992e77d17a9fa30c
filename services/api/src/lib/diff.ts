import DiffMatchPatch from "diff-match-patch";
import type { DiffEngine } from "./nlp/services";
import type { Edit } from "./types";

export type DiffOp = "equal" | "insert" | "delete";

export type DiffSegment = {
  op: DiffOp;
  text: string;
};

function toOp(code: number): DiffOp {
  if (code === DiffMatchPatch.DIFF_INSERT) return "insert";
  if (code === DiffMatchPatch.DIFF_DELETE) return "delete";
  return "equal";
}

export function diffSegments(text1: string, text2: string, options?: { semanticCleanup?: boolean }): DiffSegment[] {
  const dmp = new DiffMatchPatch();
  const diffs = dmp.diff_main(text1, text2);
  if (options?.semanticCleanup !== false) dmp.diff_cleanupSemantic(diffs);
  return diffs.map((d) => ({ op: toOp(d[0]), text: d[1] })).filter((s) => s.text.length > 0);
}

/**
 * Folds diff segments into edits. A delete run directly followed by an insert
 * run (or the reverse) becomes one replacement edit.
 */
export function segmentsToEdits(segments: DiffSegment[]): Edit[] {
  const edits: Edit[] = [];
  let pos1 = 0;
  let pos2 = 0;
  let pending: { beforeText: string; afterText: string; pos1: number; pos2: number } | null = null;

  const flush = () => {
    if (pending) edits.push(Object.freeze({ ...pending }));
    pending = null;
  };

  for (const seg of segments) {
    if (seg.op === "equal") {
      flush();
      pos1 += seg.text.length;
      pos2 += seg.text.length;
      continue;
    }
    if (!pending) pending = { beforeText: "", afterText: "", pos1, pos2 };
    if (seg.op === "delete") {
      pending.beforeText += seg.text;
      pos1 += seg.text.length;
    } else {
      pending.afterText += seg.text;
      pos2 += seg.text.length;
    }
  }
  flush();
  return edits;
}

export class DiffMatchPatchEngine implements DiffEngine {
  constructor(private readonly options: { semanticCleanup?: boolean } = {}) {}

  diff(text1: string, text2: string): Edit[] {
    return segmentsToEdits(diffSegments(text1, text2, this.options));
  }

  editDistance(a: string, b: string): number {
    const dmp = new DiffMatchPatch();
    return dmp.diff_levenshtein(dmp.diff_main(a, b));
  }
}
