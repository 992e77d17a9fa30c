import { errorMessage } from "../errors";
import type { Logger } from "../logger";
import type { GrammarChecker } from "../nlp/services";
import type { Edit } from "../types";

async function grammarIssues(checker: GrammarChecker, text: string): Promise<number> {
  const violations = await checker.check(text);
  return violations.filter((v) => !v.spelling).length;
}

/**
 * The edit removed every grammar problem the before text had. A checker
 * failure reads as "not grammar".
 */
export async function isGrammar(edit: Edit, deps: { grammar: GrammarChecker; logger?: Logger }): Promise<boolean> {
  try {
    const before = await grammarIssues(deps.grammar, edit.beforeText);
    if (before === 0) return false;
    const after = await grammarIssues(deps.grammar, edit.afterText);
    return after === 0;
  } catch (e) {
    deps.logger?.warn({ err: errorMessage(e) }, "grammar checker failed; treating edit as not grammar");
    return false;
  }
}
