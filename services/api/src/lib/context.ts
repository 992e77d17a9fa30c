import { MalformedEditError } from "./errors";
import type { DocumentPair, Edit, EditContext } from "./types";

export type Span = { start: number; end: number };

const WORD_CHAR = /[\p{L}\p{N}_'’-]/u;

function isWordChar(ch: string | undefined): boolean {
  return ch !== undefined && WORD_CHAR.test(ch);
}

/** Grows [start, end) outward to the nearest word boundaries of `text`. */
export function expandToWord(text: string, start: number, end: number): Span {
  let s = start;
  let e = end;
  while (s > 0 && isWordChar(text[s - 1])) s--;
  while (e < text.length && isWordChar(text[e])) e++;
  return { start: s, end: e };
}

/**
 * Locates each segmented sentence in `text`, in order. Sentences the
 * segmenter rewrote and that cannot be found verbatim are skipped.
 */
export function sentenceSpans(text: string, sentences: string[]): Span[] {
  const spans: Span[] = [];
  let cursor = 0;
  for (const raw of sentences) {
    const s = raw.trim();
    if (!s) continue;
    const at = text.indexOf(s, cursor);
    if (at < 0) continue;
    spans.push({ start: at, end: at + s.length });
    cursor = at + s.length;
  }
  return spans;
}

/**
 * Union of the sentences touching [start, end). A zero-width range picks the
 * sentence it falls in, or the one ending right before it.
 */
export function expandToSentences(text: string, spans: Span[], start: number, end: number): Span {
  if (spans.length === 0) return { start: 0, end: text.length };
  const touching = spans.filter((sp) =>
    start === end ? sp.start <= start && start <= sp.end : sp.start < end && start < sp.end
  );
  if (touching.length > 0) {
    return {
      start: Math.min(start, ...touching.map((sp) => sp.start)),
      end: Math.max(end, ...touching.map((sp) => sp.end))
    };
  }
  const before = spans.filter((sp) => sp.end <= start);
  const prev = before[before.length - 1];
  if (prev) return { start: prev.start, end: Math.max(end, prev.end) };
  const next = spans.find((sp) => sp.start >= end);
  if (next) return { start: Math.min(start, next.start), end: next.end };
  return { start, end };
}

function sliceEdit(doc: DocumentPair, left: Span, right: Span): Edit {
  return Object.freeze({
    beforeText: doc.original.slice(left.start, left.end),
    afterText: doc.modified.slice(right.start, right.end),
    pos1: left.start,
    pos2: right.start
  });
}

/**
 * The edit grown to whole words on both sides, so a diff fragment such as
 * `"e" -> ""` inside `teh` reads as `teh -> the`.
 */
export function expandEditToWords(edit: Edit, doc: DocumentPair): Edit {
  const end1 = edit.pos1 + edit.beforeText.length;
  const end2 = edit.pos2 + edit.afterText.length;
  return sliceEdit(doc, expandToWord(doc.original, edit.pos1, end1), expandToWord(doc.modified, edit.pos2, end2));
}

export function buildEditContext(
  edit: Edit,
  doc: DocumentPair,
  sentences: { original: Span[]; modified: Span[] }
): EditContext {
  const end1 = edit.pos1 + edit.beforeText.length;
  const end2 = edit.pos2 + edit.afterText.length;

  const word = expandEditToWords(edit, doc);
  const sentence = sliceEdit(
    doc,
    expandToSentences(doc.original, sentences.original, edit.pos1, end1),
    expandToSentences(doc.modified, sentences.modified, edit.pos2, end2)
  );
  return { chars: edit, word, sentence };
}

/** Rejects the whole pair when any edit disagrees with the documents. */
export function assertEditsWithinBounds(edits: readonly Edit[], doc: DocumentPair): void {
  edits.forEach((e, i) => {
    if (!Number.isInteger(e.pos1) || !Number.isInteger(e.pos2) || e.pos1 < 0 || e.pos2 < 0) {
      throw new MalformedEditError(i, "positions must be non-negative integers");
    }
    if (e.pos1 + e.beforeText.length > doc.original.length) {
      throw new MalformedEditError(i, "beforeText runs past the end of the original document");
    }
    if (e.pos2 + e.afterText.length > doc.modified.length) {
      throw new MalformedEditError(i, "afterText runs past the end of the modified document");
    }
    if (doc.original.slice(e.pos1, e.pos1 + e.beforeText.length) !== e.beforeText) {
      throw new MalformedEditError(i, "beforeText does not match the original document at pos1");
    }
    if (doc.modified.slice(e.pos2, e.pos2 + e.afterText.length) !== e.afterText) {
      throw new MalformedEditError(i, "afterText does not match the modified document at pos2");
    }
  });
}
