/**
 * Semantic Search Executor
 *
 * Two-stage retrieval over school website chunks:
 *   1. Embed the question and run a KNN lookup, prefiltered by school name
 *   2. Rerank the retrieved candidates against the question text
 * The reranked list is cut to MAX_SEARCH_RESULTS and projected to
 * attributable snippets.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/search/semantic-search
 */

import { retrievalError, type RetrievalStage } from '../../server/errors.js';
import { toTitleCase } from '../../utils/text.js';
import { ValidationError } from '../../utils/validation.js';
import type { Embedder } from '../embedding/embedder.js';
import type { VectorIndex } from '../storage/vector/index.js';
import type { Reranker } from './reranker.js';

export const MAX_SEARCH_RESULTS = 10;
export const DEFAULT_CANDIDATE_LIMIT = 10;

export interface SearchRequest {
  question: string;
  school_name?: string | null;
}

export interface SearchResult {
  readonly school_name: string;
  readonly page_url: string;
  readonly content: string;
}

export interface SemanticSearchDependencies {
  embedder: Embedder;
  vectorIndex: VectorIndex;
  reranker: Reranker;
  /** KNN depth before reranking */
  candidateLimit?: number;
}

/**
 * Normalize the optional school filter. Blank input means no filter.
 */
export function resolveSchoolFilter(schoolName: string | null | undefined): string | undefined {
  if (schoolName === undefined || schoolName === null || schoolName.trim() === '') {
    return undefined;
  }
  return toTitleCase(schoolName);
}

export class SemanticSearchExecutor {
  private readonly embedder: Embedder;
  private readonly vectorIndex: VectorIndex;
  private readonly reranker: Reranker;
  private readonly candidateLimit: number;

  constructor(deps: SemanticSearchDependencies) {
    this.embedder = deps.embedder;
    this.vectorIndex = deps.vectorIndex;
    this.reranker = deps.reranker;
    this.candidateLimit = deps.candidateLimit ?? DEFAULT_CANDIDATE_LIMIT;
  }

  /**
   * @throws ValidationError for a blank question
   * @throws MCPError RETRIEVAL_ERROR when embedding, lookup or reranking fails
   */
  async search(request: SearchRequest): Promise<SearchResult[]> {
    if (request.question.trim() === '') {
      throw new ValidationError('question must not be empty');
    }
    const schoolName = resolveSchoolFilter(request.school_name);

    const questionVector = await runStage('embedding', () => this.embedder.encode(request.question));

    const candidates = await runStage('vector_search', () =>
      this.vectorIndex.search(questionVector, { limit: this.candidateLimit, schoolName })
    );
    if (candidates.length === 0) {
      console.error(
        `[Search] No candidates for question${schoolName ? ` (school_name=${schoolName})` : ''}`
      );
      return [];
    }

    const ranked = await runStage('rerank', () =>
      this.reranker.rerank(request.question, candidates)
    );

    const results = ranked.slice(0, MAX_SEARCH_RESULTS).map(
      (candidate): SearchResult =>
        Object.freeze({
          school_name: candidate.metadata.school_name,
          page_url: candidate.metadata.page_url,
          content: candidate.text,
        })
    );
    console.error(
      `[Search] ${candidates.length} candidates reranked, returning ${results.length}` +
        (schoolName ? ` (school_name=${schoolName})` : '')
    );
    return results;
  }
}

async function runStage<T>(stage: RetrievalStage, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    console.error(
      `[Search] ${stage} failed: ${error instanceof Error ? error.message : String(error)}`
    );
    throw retrievalError(stage, error);
  }
}
