import { z } from "zod";
import type { LanguageToolConfig } from "../config";
import { errorMessage } from "../errors";
import type { GrammarChecker, GrammarViolation } from "./services";

const checkResponseSchema = z.object({
  matches: z.array(
    z.object({
      message: z.string().default(""),
      offset: z.number(),
      length: z.number(),
      rule: z
        .object({
          id: z.string(),
          issueType: z.string().optional(),
          category: z.object({ id: z.string() }).partial().optional()
        })
        .optional()
    })
  )
});

export type CheckResponse = z.infer<typeof checkResponseSchema>;

export function toViolations(resp: CheckResponse): GrammarViolation[] {
  return resp.matches.map((m) => {
    const issueType = m.rule?.issueType ?? "";
    const categoryId = m.rule?.category?.id ?? "";
    return {
      ruleId: m.rule?.id ?? "UNKNOWN",
      message: m.message,
      offset: m.offset,
      length: m.length,
      spelling: issueType === "misspelling" || categoryId === "TYPOS"
    };
  });
}

/** Client for a LanguageTool server's `/v2/check` endpoint. */
export class LanguageToolChecker implements GrammarChecker {
  constructor(private readonly cfg: LanguageToolConfig) {}

  async check(sentence: string): Promise<GrammarViolation[]> {
    if (!sentence.trim()) return [];
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.cfg.timeoutMs);
    try {
      const body = new URLSearchParams({ text: sentence, language: this.cfg.language });
      const res = await fetch(`${this.cfg.baseUrl}/v2/check`, {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded", Accept: "application/json" },
        body,
        signal: controller.signal
      });
      if (!res.ok) {
        const t = await res.text().catch(() => "");
        throw new Error(`languagetool failed: ${res.status} ${t.slice(0, 400)}`.trim());
      }
      const parsed = checkResponseSchema.safeParse(await res.json());
      if (!parsed.success) throw new Error(`languagetool returned an unexpected payload: ${parsed.error.message}`);
      return toViolations(parsed.data);
    } catch (e) {
      if (e instanceof Error && e.name === "AbortError") throw new Error("languagetool timeout");
      throw new Error(errorMessage(e));
    } finally {
      clearTimeout(timer);
    }
  }
}
