/**
 * Embedding capability
 *
 * SemanticSearchExecutor only depends on the Embedder interface, so model
 * backends can be swapped without touching search logic. The shipped backend
 * calls an HTTP inference endpoint that speaks the text-embeddings-inference
 * `/embed` contract.
 *
 * @module services/embedding/embedder
 */

import { z } from 'zod';

export const DEFAULT_EMBEDDING_MODEL = 'nomic-ai/nomic-embed-text-v1.5';
export const DEFAULT_EMBEDDING_DIMENSIONS = 768;

export interface Embedder {
  /** Map text to a fixed-length dense vector. Deterministic per model and input. */
  encode(text: string): Promise<Float32Array>;
}

/** Injected for tests; defaults to the global fetch */
export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpEmbedderOptions {
  endpoint: string;
  model: string;
  dimensions: number;
  fetch?: FetchLike;
}

const EmbedResponseSchema = z.array(z.array(z.number())).min(1);

export class HttpEmbedder implements Embedder {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: HttpEmbedderOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async encode(text: string): Promise<Float32Array> {
    const body = await postJson(this.fetchImpl, joinUrl(this.options.endpoint, 'embed'), {
      inputs: [text],
      model: this.options.model,
    });

    const parsed = EmbedResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error(`Embedding endpoint returned an unexpected payload: ${parsed.error.message}`);
    }

    const vector = parsed.data[0];
    if (vector.length !== this.options.dimensions) {
      throw new Error(
        `Embedding model ${this.options.model} returned ${vector.length} dimensions, expected ${this.options.dimensions}`
      );
    }
    return Float32Array.from(vector);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HTTP HELPERS (shared with the reranker)
// ═══════════════════════════════════════════════════════════════════════════════

export function joinUrl(endpoint: string, route: string): string {
  return `${endpoint.replace(/\/+$/, '')}/${route}`;
}

/**
 * POST a JSON body and return the decoded JSON response.
 *
 * @throws Error with status and body excerpt on a non-2xx response
 */
export async function postJson(fetchImpl: FetchLike, url: string, payload: unknown): Promise<unknown> {
  const response = await fetchImpl(url, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(payload),
  });

  if (!response.ok) {
    const detail = await response.text();
    throw new Error(`${url} responded ${response.status}: ${detail.slice(0, 500)}`);
  }
  return response.json();
}
