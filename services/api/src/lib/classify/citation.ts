import { isQuote } from "../text";
import type { Edit } from "../types";

/** Quote replaced by a different quote: the cited material changed, not the prose. */
export function isCitation(edit: Edit): boolean {
  return isQuote(edit.beforeText) && isQuote(edit.afterText) && edit.beforeText !== edit.afterText;
}
