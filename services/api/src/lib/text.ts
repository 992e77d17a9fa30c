export function normalizeText(input: string): string {
  return input
    .replace(/\r\n/g, "\n")
    .replace(/[ \t]+/g, " ")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export function escapeHtml(input: string): string {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

const QUOTE_PAIRS: ReadonlyArray<readonly [string, string]> = [
  ['"', '"'],
  ["“", "”"],
  ["„", "“"],
  ["'", "'"],
  ["‘", "’"],
  ["«", "»"],
  ["‹", "›"],
  ["「", "」"]
];

/** A span wrapped in one matching pair of quotation marks. */
export function isQuote(text: string): boolean {
  const s = text.trim();
  if (s.length < 2) return false;
  const first = s[0];
  const last = s[s.length - 1];
  return QUOTE_PAIRS.some(([open, close]) => first === open && last === close);
}

export function isLetter(ch: string | undefined): boolean {
  return ch !== undefined && /^\p{L}$/u.test(ch);
}

/** Punctuation, symbols or whitespace only; at least one character, no letters or digits. */
export function isFormattingSymbol(text: string): boolean {
  if (!text) return false;
  return !/[\p{L}\p{N}]/u.test(text);
}

export function isNumber(text: string): boolean {
  return /^[+-]?\d+(?:[.,]\d+)*%?$/.test(text.trim());
}

/** Non-blank text made only of symbol and punctuation characters. */
export function isSymbol(text: string): boolean {
  const s = text.trim();
  if (!s) return false;
  return /^[\p{P}\p{S}]+$/u.test(s);
}
