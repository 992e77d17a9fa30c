/** xᵀ W y */
function bilinear(x: number[], w: number[][], y: number[]): number {
  let sum = 0;
  for (let i = 0; i < x.length; i++) {
    const xi = x[i] ?? 0;
    if (xi === 0) continue;
    const row = w[i] ?? [];
    for (let j = 0; j < y.length; j++) {
      const yj = y[j] ?? 0;
      if (yj === 0) continue;
      sum += xi * (row[j] ?? 0) * yj;
    }
  }
  return sum;
}

/**
 * Fernando–Stevenson similarity: cosine of two bag-of-words vectors where
 * overlap is softened by the word-relatedness matrix `w`.
 * Returns 0 when either vector has no self-similarity.
 */
export function fernandoSim(a: number[], b: number[], w: number[][]): number {
  const self = bilinear(a, w, a) * bilinear(b, w, b);
  if (!(self > 0)) return 0;
  return bilinear(a, w, b) / Math.sqrt(self);
}

/** Sorted union of both key sets with a 0/1 presence vector per side. */
export function presenceVectors(keys1: Iterable<string>, keys2: Iterable<string>): {
  vocabulary: string[];
  a: number[];
  b: number[];
} {
  const s1 = new Set(keys1);
  const s2 = new Set(keys2);
  const vocabulary = Array.from(new Set([...s1, ...s2])).sort((x, y) => (x < y ? -1 : x > y ? 1 : 0));
  return {
    vocabulary,
    a: vocabulary.map((k) => (s1.has(k) ? 1 : 0)),
    b: vocabulary.map((k) => (s2.has(k) ? 1 : 0))
  };
}
