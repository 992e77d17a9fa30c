import natural from "natural";
import { z } from "zod";
import type { RelatednessOptions } from "../config";
import { parseWordKey, type RelatednessService, type Sense } from "./services";

export type SynsetRef = { offset: number; pos: Sense };

export type Synset = SynsetRef & {
  words: string[];
  /** Is-a parents (hypernyms and instance hypernyms). */
  parents: SynsetRef[];
};

export interface SynsetSource {
  /** Synsets of a lemma in WordNet order, most frequent sense first. */
  lookup(lemma: string): Promise<Synset[]>;
  get(ref: SynsetRef): Promise<Synset | null>;
}

const ptrSchema = z.object({
  pointerSymbol: z.string(),
  synsetOffset: z.coerce.number(),
  pos: z.string()
});

const recordSchema = z.object({
  synsetOffset: z.coerce.number(),
  pos: z.string(),
  synonyms: z.array(z.string()).default([]),
  ptrs: z.array(ptrSchema).default([])
});

/** Satellite adjectives ("s") are stored with, and looked up as, adjectives. */
function toSense(pos: string): Sense | null {
  if (pos === "n" || pos === "v" || pos === "r") return pos;
  if (pos === "a" || pos === "s") return "a";
  return null;
}

/** Drops adjective position markers such as `(p)` and `(a)`; underscores become spaces. */
export function normalizeSynsetWord(raw: string): string {
  return raw.replace(/\([a-z]+\)$/, "").toLowerCase().replace(/_/g, " ");
}

const PARENT_POINTERS = new Set(["@", "@i"]);

function toSynset(raw: unknown): Synset | null {
  const parsed = recordSchema.safeParse(raw);
  if (!parsed.success) return null;
  const pos = toSense(parsed.data.pos);
  if (!pos) return null;
  const parents: SynsetRef[] = [];
  for (const p of parsed.data.ptrs) {
    const ppos = toSense(p.pos);
    if (PARENT_POINTERS.has(p.pointerSymbol) && ppos) parents.push({ offset: p.synsetOffset, pos: ppos });
  }
  return {
    offset: parsed.data.synsetOffset,
    pos,
    words: parsed.data.synonyms.map(normalizeSynsetWord),
    parents
  };
}

/** WordNet 3.x through `natural`, reading the `wordnet-db` files unless a data directory is given. */
export class NaturalWordNetSource implements SynsetSource {
  private readonly wordnet: InstanceType<typeof natural.WordNet>;
  private readonly cache = new Map<string, Promise<Synset | null>>();

  constructor(dataDir?: string) {
    this.wordnet = dataDir ? new natural.WordNet(dataDir) : new natural.WordNet();
  }

  lookup(lemma: string): Promise<Synset[]> {
    return new Promise((resolve) => {
      this.wordnet.lookup(lemma, (results: unknown) => {
        const list = Array.isArray(results) ? results : [];
        resolve(list.map(toSynset).filter((s): s is Synset => s !== null));
      });
    });
  }

  get(ref: SynsetRef): Promise<Synset | null> {
    const key = `${ref.pos}:${ref.offset}`;
    const hit = this.cache.get(key);
    if (hit) return hit;
    const p = new Promise<Synset | null>((resolve) => {
      this.wordnet.get(ref.offset, ref.pos, (result: unknown) => resolve(toSynset(result)));
    });
    this.cache.set(key, p);
    return p;
  }
}

const synsetId = (s: SynsetRef) => `${s.pos}:${s.offset}`;

/** Hirst–St-Onge constants: C - path length - K * direction changes. */
const HSO_C = 8;
const HSO_K = 1;
const HSO_MAX = 16;
const HSO_MAX_PATH = 5;
const MATRIX_MAX_DEPTH = 10;

/**
 * Relatedness over the WordNet is-a graph.
 *
 * `relatedness` follows Hirst–St-Onge on a 0..16 scale: a shared synset is a
 * strong relation (16); otherwise the best up-then-down path through a common
 * ancestor scores `8 - length - turns`, for paths of at most 5 links.
 * `relatednessMatrix` uses inverse path length, `1 / (1 + length)`.
 */
export class WordNetRelatedness implements RelatednessService {
  private readonly ancestorCache = new Map<string, Promise<Map<string, number>>>();

  constructor(private readonly source: SynsetSource) {}

  private async senses(lemma: string, sense: Sense, options: RelatednessOptions): Promise<Synset[]> {
    const all = (await this.source.lookup(lemma)).filter((s) => s.pos === sense);
    return options.mostFrequentSense ? all.slice(0, 1) : all;
  }

  async synonyms(word: string, sense: Sense, options: RelatednessOptions): Promise<Set<string>> {
    const lemma = word.toLowerCase();
    const out = new Set<string>();
    for (const s of await this.senses(lemma, sense, options)) {
      for (const w of s.words) if (w !== lemma) out.add(w);
    }
    return out;
  }

  /** Shortest upward distance from any root to every ancestor within `maxDepth` links. */
  private ancestors(key: string, roots: Synset[], maxDepth: number): Promise<Map<string, number>> {
    const cacheKey = `${key}|${maxDepth}`;
    const hit = this.ancestorCache.get(cacheKey);
    if (hit) return hit;
    const p = (async () => {
      const dist = new Map<string, number>();
      for (const r of roots) dist.set(synsetId(r), 0);
      let frontier = roots;
      for (let d = 1; d <= maxDepth && frontier.length > 0; d++) {
        const next: Synset[] = [];
        for (const s of frontier) {
          for (const ref of s.parents) {
            const id = synsetId(ref);
            if (dist.has(id)) continue;
            const parent = await this.source.get(ref);
            if (!parent) continue;
            dist.set(id, d);
            next.push(parent);
          }
        }
        frontier = next;
      }
      return dist;
    })();
    this.ancestorCache.set(cacheKey, p);
    return p;
  }

  private async paths(a: string, b: string, options: RelatednessOptions, maxDepth: number): Promise<Array<{ up: number; down: number }>> {
    const ka = parseWordKey(a);
    const kb = parseWordKey(b);
    if (!ka.sense || !kb.sense || ka.sense !== kb.sense) return [];
    const sa = await this.senses(ka.lemma.toLowerCase(), ka.sense, options);
    const sb = await this.senses(kb.lemma.toLowerCase(), kb.sense, options);
    if (sa.length === 0 || sb.length === 0) return [];

    const mode = options.mostFrequentSense ? "mfs" : "all";
    const da = await this.ancestors(`${a}|${mode}`, sa, maxDepth);
    const db = await this.ancestors(`${b}|${mode}`, sb, maxDepth);
    const out: Array<{ up: number; down: number }> = [];
    for (const [id, up] of da) {
      const down = db.get(id);
      if (down !== undefined) out.push({ up, down });
    }
    return out;
  }

  async relatedness(a: string, b: string, options: RelatednessOptions): Promise<number> {
    const ka = parseWordKey(a);
    const kb = parseWordKey(b);
    if (ka.lemma.toLowerCase() === kb.lemma.toLowerCase() && ka.sense === kb.sense) return HSO_MAX;

    let best = 0;
    for (const { up, down } of await this.paths(a, b, options, HSO_MAX_PATH)) {
      const length = up + down;
      if (length === 0) return HSO_MAX;
      if (length > HSO_MAX_PATH) continue;
      const turns = up > 0 && down > 0 ? 1 : 0;
      best = Math.max(best, HSO_C - length - HSO_K * turns);
    }
    return best;
  }

  async relatednessMatrix(vocabulary: string[], options: RelatednessOptions): Promise<number[][]> {
    const n = vocabulary.length;
    const w: number[][] = Array.from({ length: n }, (_, i) => Array.from({ length: n }, (_, j) => (i === j ? 1 : 0)));
    for (let i = 0; i < n; i++) {
      for (let j = i + 1; j < n; j++) {
        const a = vocabulary[i];
        const b = vocabulary[j];
        if (a === undefined || b === undefined) continue;
        const lengths = (await this.paths(a, b, options, MATRIX_MAX_DEPTH)).map((p) => p.up + p.down);
        const sim = lengths.length > 0 ? 1 / (1 + Math.min(...lengths)) : 0;
        const rowI = w[i];
        const rowJ = w[j];
        if (rowI) rowI[j] = sim;
        if (rowJ) rowJ[i] = sim;
      }
    }
    return w;
  }
}
