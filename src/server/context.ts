/**
 * Server Context
 *
 * Process-wide resources are created once here and handed to the tools:
 * the read-only vector store connection and the embedding/reranking clients.
 * The relational store is not held open; its executor opens a connection per
 * call. Tests pass fakes through `overrides` instead of touching globals.
 *
 * @module server/context
 */

import { HttpEmbedder, type Embedder } from '../services/embedding/embedder.js';
import { HttpReranker, type Reranker } from '../services/search/reranker.js';
import { SemanticSearchExecutor } from '../services/search/semantic-search.js';
import { RelationalExecutor } from '../services/storage/relational/executor.js';
import { SqliteVecIndex, type VectorIndex } from '../services/storage/vector/index.js';
import type { ServerConfig } from './config.js';

export interface ServerContext {
  config: ServerConfig;
  relational: RelationalExecutor;
  search: SemanticSearchExecutor;
  /** Release the resources opened at startup */
  close(): void;
}

export interface ContextOverrides {
  embedder?: Embedder;
  reranker?: Reranker;
  vectorIndex?: VectorIndex;
  relational?: RelationalExecutor;
}

export function initializeServerContext(
  config: ServerConfig,
  overrides: ContextOverrides = {}
): ServerContext {
  const vectorIndex =
    overrides.vectorIndex ?? SqliteVecIndex.open(config.websitesDbPath, config.websitesTable);

  const embedder =
    overrides.embedder ??
    new HttpEmbedder({
      endpoint: config.embedding.endpoint,
      model: config.embedding.model,
      dimensions: config.embedding.dimensions,
    });

  const reranker =
    overrides.reranker ??
    new HttpReranker({
      endpoint: config.reranker.endpoint,
      model: config.reranker.model,
    });

  const search = new SemanticSearchExecutor({
    embedder,
    vectorIndex,
    reranker,
    candidateLimit: config.searchCandidateLimit,
  });

  let closed = false;
  return {
    config,
    relational: overrides.relational ?? new RelationalExecutor(config.schoolsDbPath),
    search,
    close() {
      if (closed) return;
      closed = true;
      vectorIndex.close();
    },
  };
}
