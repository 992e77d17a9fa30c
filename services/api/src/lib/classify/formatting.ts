import { isFormattingSymbol, isLetter } from "../text";
import type { Edit } from "../types";

function flankedByNonLetter(text: string, at: number): boolean {
  const left = at - 1 >= 0 ? text[at - 1] : undefined;
  const right = at < text.length ? text[at] : undefined;
  return !isLetter(left) || !isLetter(right);
}

/**
 * Symbol-for-symbol replacements are formatting. A bare insertion or deletion
 * of a symbol only counts when it does not sit inside a word (a hyphen joining
 * two halves of a word changes the word). Document edges count as non-letters.
 */
export function isFormatting(edit: Edit, text1: string, text2: string): boolean {
  const { beforeText, afterText } = edit;
  if (isFormattingSymbol(beforeText) && isFormattingSymbol(afterText)) return true;
  if (beforeText === "" && isFormattingSymbol(afterText)) {
    return flankedByNonLetter(text1, edit.pos1);
  }
  if (afterText === "" && isFormattingSymbol(beforeText)) {
    return flankedByNonLetter(text2, edit.pos2);
  }
  return false;
}
