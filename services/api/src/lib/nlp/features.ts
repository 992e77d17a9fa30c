import type { Distribution, LexicalPrimitives, TopicPrimitives } from "./services";

function counts(tokens: string[]): Map<string, number> {
  const m = new Map<string, number>();
  for (const t of tokens) m.set(t, (m.get(t) ?? 0) + 1);
  return m;
}

/**
 * Jensen–Shannon divergence with base-2 logarithms, so the result lies in
 * [0, 1]. Keys missing from one side count as probability 0.
 */
export function jensenShannon(p: Distribution, q: Distribution): number {
  const keys = new Set([...p.keys(), ...q.keys()]);
  let sum = 0;
  for (const k of keys) {
    const pk = p.get(k) ?? 0;
    const qk = q.get(k) ?? 0;
    const mk = (pk + qk) / 2;
    if (pk > 0) sum += 0.5 * pk * Math.log2(pk / mk);
    if (qk > 0) sum += 0.5 * qk * Math.log2(qk / mk);
  }
  return Math.max(0, Math.min(1, sum));
}

/**
 * Bag-of-stems topic model: the features of a document pair are the most
 * frequent content stems across both texts, and a document's distribution is
 * the relative frequency of each feature in it.
 */
export class StemFrequencyTopics implements TopicPrimitives {
  constructor(
    private readonly lexicon: LexicalPrimitives,
    private readonly maxFeatures: number
  ) {}

  private stems(text: string): string[] {
    return this.lexicon.tokenizeStopStem(text, true, true).map((t) => t.toLowerCase());
  }

  extractFeatures(textA: string, textB: string): string[] {
    const total = counts([...this.stems(textA), ...this.stems(textB)]);
    return Array.from(total.entries())
      .sort((x, y) => y[1] - x[1] || (x[0] < y[0] ? -1 : x[0] > y[0] ? 1 : 0))
      .slice(0, this.maxFeatures)
      .map(([stem]) => stem);
  }

  distribution(features: string[], text: string): Distribution {
    const c = counts(this.stems(text));
    const mass = features.reduce((sum, f) => sum + (c.get(f) ?? 0), 0);
    const out: Distribution = new Map();
    for (const f of features) out.set(f, mass > 0 ? (c.get(f) ?? 0) / mass : 0);
    return out;
  }

  divergence(a: Distribution, b: Distribution): number {
    return jensenShannon(a, b);
  }
}
