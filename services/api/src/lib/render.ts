import { summarizeRecords } from "./classify/pipeline";
import { escapeHtml } from "./text";
import { CATEGORIES, type Category, type ClassificationRecord } from "./types";

const CATEGORY_LABELS: Record<Category, string> = {
  citation: "Citation",
  formatting: "Formatting",
  spelling: "Spelling",
  substitution: "Substitution",
  rephrasing: "Rephrasing",
  grammar: "Grammar",
  topic_shift: "Topic shift",
  undefined: "Undefined"
};

function renderBody(records: readonly ClassificationRecord[], original: string): string {
  const ordered = [...records].sort((a, b) => a.edit.pos1 - b.edit.pos1 || a.index - b.index);
  let cursor = 0;
  let out = "";
  for (const r of ordered) {
    const { pos1, beforeText, afterText } = r.edit;
    // overlapping edits only get their marker
    if (pos1 >= cursor) {
      out += escapeHtml(original.slice(cursor, pos1));
      if (beforeText) out += `<del>${escapeHtml(beforeText)}</del>`;
      cursor = pos1 + beforeText.length;
    }
    if (afterText) out += `<ins>${escapeHtml(afterText)}</ins>`;
    out += `<sup class="cat-${r.category}" data-edit-index="${r.index}"><a href="#edit-${r.index}">[${r.index + 1}]</a></sup>`;
  }
  out += escapeHtml(original.slice(cursor));
  return out;
}

function renderFootnotes(records: readonly ClassificationRecord[]): string {
  return records
    .map((r) => {
      const stage = r.decidedBy ? ` <span class="stage">(${escapeHtml(r.decidedBy)})</span>` : "";
      const change = `<del>${escapeHtml(r.edit.beforeText)}</del> → <ins>${escapeHtml(r.edit.afterText)}</ins>`;
      return `<li id="edit-${r.index}" value="${r.index + 1}"><strong>${CATEGORY_LABELS[r.category]}</strong>${stage}: ${change}</li>`;
    })
    .join("");
}

function renderSummary(records: readonly ClassificationRecord[]): string {
  const summary = summarizeRecords(records);
  return CATEGORIES
    .filter((c) => summary[c] > 0)
    .map((c) => `<li class="cat-${c}">${CATEGORY_LABELS[c]}: ${summary[c]}</li>`)
    .join("");
}

/**
 * Report page: the original text with each edit marked inline and numbered,
 * the revised text, one footnote per edit naming its category, and
 * per-category counts.
 */
export function renderClassificationHtml(params: {
  records: readonly ClassificationRecord[];
  original: string;
  modified: string;
  title?: string;
}): string {
  const { records, original, modified } = params;
  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${escapeHtml(params.title ?? "Edit classification")}</title>
    <style>
      body{margin:0;background:#fff;color:#000;}
      .report{font-family:ui-sans-serif,system-ui,-apple-system,Segoe UI,Roboto,Helvetica,Arial;line-height:1.5;max-width:60rem;margin:0 auto;padding:16px;}
      .doc{white-space:pre-wrap;overflow-wrap:anywhere;border:1px solid #eee;border-radius:8px;padding:10px 12px;}
      ins{background:#c6f6d5;text-decoration:none;font-weight:700;}
      del{background:#fed7d7;text-decoration:line-through;font-weight:700;}
      sup a{text-decoration:none;color:#2563eb;}
      .stage{color:#666;}
      @media print {
        .doc{border:0;}
        ins{background:#b7f7c9 !important;}
        del{background:#ffc9c9 !important;}
      }
    </style>
  </head>
  <body>
    <article class="report" data-original-length="${original.length}" data-modified-length="${modified.length}">
      <h2>Changes</h2>
      <section class="doc">${renderBody(records, original)}</section>
      <h2>Revised text</h2>
      <section class="doc revised">${escapeHtml(modified)}</section>
      <h2>Categories</h2>
      <ul class="summary">${renderSummary(records)}</ul>
      <h2>Edits</h2>
      <ol class="footnotes">${renderFootnotes(records)}</ol>
    </article>
  </body>
</html>`;
}
