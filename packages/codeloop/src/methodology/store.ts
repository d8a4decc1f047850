import { DEFAULT_METHODOLOGY_LIMIT } from "../core/constants.js";

/**
 * A write-up of how a previously solved problem was approached.
 */
export interface Methodology {
  problem: string;
  methodology: string;
}

export interface MethodologyMatch extends Methodology {
  /** Similarity to the query in [0, 1]. */
  score: number;
}

/**
 * Source of reusable methodologies, ranked by similarity to a new problem.
 */
export interface MethodologyStore {
  find(problem: string, limit?: number): Promise<MethodologyMatch[]>;
  /** Stores a write-up. A write-up for the same problem text is replaced. */
  add(problem: string, methodology: string): Promise<void>;
}

/**
 * Lowercased word tokens of at least two characters.
 */
export function tokenize(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/[^\p{L}\p{N}_]+/u)
      .filter((token) => token.length >= 2),
  );
}

/**
 * Jaccard overlap of the token sets of two texts.
 */
export function similarity(a: string, b: string): number {
  const left = tokenize(a);
  const right = tokenize(b);
  if (left.size === 0 || right.size === 0) {
    return 0;
  }
  let shared = 0;
  for (const token of left) {
    if (right.has(token)) shared++;
  }
  return shared / (left.size + right.size - shared);
}

/**
 * Best matches first; entries sharing no token with the problem are dropped.
 */
export function rankMethodologies(
  problem: string,
  entries: readonly Methodology[],
  limit = DEFAULT_METHODOLOGY_LIMIT,
): MethodologyMatch[] {
  return entries
    .map((entry) => ({ ...entry, score: similarity(problem, entry.problem) }))
    .filter((match) => match.score > 0)
    .sort((a, b) => b.score - a.score)
    .slice(0, limit);
}

export class InMemoryMethodologyStore implements MethodologyStore {
  private readonly entries = new Map<string, Methodology>();

  constructor(initial: readonly Methodology[] = []) {
    for (const entry of initial) {
      this.entries.set(entry.problem, entry);
    }
  }

  async find(problem: string, limit?: number): Promise<MethodologyMatch[]> {
    return rankMethodologies(problem, [...this.entries.values()], limit);
  }

  async add(problem: string, methodology: string): Promise<void> {
    this.entries.set(problem, { problem, methodology });
  }
}
