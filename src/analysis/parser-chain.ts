import type { CandidateObject } from '../shared/types';

/**
 * A pure parsing strategy. Returns null when it cannot produce an object;
 * strategies never throw.
 */
export interface ParseStrategy {
  name: string;
  parse: (raw: string) => CandidateObject | null;
}

export interface ChainResult {
  strategy: string;
  candidate: CandidateObject;
}

/**
 * Apply strategies in order and return the first object produced.
 */
export function runParserChain(strategies: readonly ParseStrategy[], raw: string): ChainResult | null {
  for (const strategy of strategies) {
    const candidate = strategy.parse(raw);
    if (candidate) {
      return { strategy: strategy.name, candidate };
    }
  }
  return null;
}
