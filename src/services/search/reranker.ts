/**
 * Reranking capability
 *
 * A reranker receives the question string (not its vector) and the retrieved
 * candidates, and returns every candidate ordered best-first by its own
 * relevance score. Equal scores keep retrieval order.
 *
 * @module services/search/reranker
 */

import { z } from 'zod';
import { joinUrl, postJson, type FetchLike } from '../embedding/embedder.js';

export const DEFAULT_RERANKER_MODEL = 'answerdotai/answerai-colbert-small-v1';

export interface RerankCandidate {
  text: string;
}

export type RankedCandidate<T extends RerankCandidate> = T & { rerank_score: number };

export interface Reranker {
  rerank<T extends RerankCandidate>(query: string, candidates: T[]): Promise<RankedCandidate<T>[]>;
}

/**
 * Order candidates by descending score; ties keep their input position.
 */
export function orderByScore<T extends RerankCandidate>(
  candidates: T[],
  scores: number[]
): RankedCandidate<T>[] {
  return candidates
    .map((candidate, index) => ({ candidate, index, score: scores[index] }))
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .map(({ candidate, score }) => ({ ...candidate, rerank_score: score }));
}

// ═══════════════════════════════════════════════════════════════════════════════
// HTTP CROSS-ENCODER BACKEND
// ═══════════════════════════════════════════════════════════════════════════════

export interface HttpRerankerOptions {
  endpoint: string;
  model: string;
  fetch?: FetchLike;
}

const RerankResponseSchema = z.array(
  z.object({
    index: z.number().int().nonnegative(),
    score: z.number(),
  })
);

export class HttpReranker implements Reranker {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: HttpRerankerOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async rerank<T extends RerankCandidate>(query: string, candidates: T[]): Promise<RankedCandidate<T>[]> {
    if (candidates.length === 0) return [];

    const body = await postJson(this.fetchImpl, joinUrl(this.options.endpoint, 'rerank'), {
      query,
      texts: candidates.map((c) => c.text),
      model: this.options.model,
    });

    const parsed = RerankResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error(`Rerank endpoint returned an unexpected payload: ${parsed.error.message}`);
    }

    const scores = new Map<number, number>();
    for (const { index, score } of parsed.data) {
      if (index >= candidates.length) {
        throw new Error(`Rerank endpoint returned index ${index} for ${candidates.length} candidates`);
      }
      scores.set(index, score);
    }

    return orderByScore(
      candidates,
      candidates.map((_, index) => {
        const score = scores.get(index);
        if (score === undefined) {
          throw new Error(`Rerank endpoint returned no score for candidate ${index}`);
        }
        return score;
      })
    );
  }
}
