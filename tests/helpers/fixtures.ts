/**
 * Shared test fixtures: temp SQLite stores and in-process stand-ins for the
 * embedding, vector index and reranking capabilities.
 *
 * @module tests/helpers/fixtures
 */

import Database from 'better-sqlite3';
import { mkdtempSync, rmSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

import type { Embedder } from '../../src/services/embedding/embedder.js';
import {
  orderByScore,
  type RankedCandidate,
  type RerankCandidate,
  type Reranker,
} from '../../src/services/search/reranker.js';
import type {
  ChunkCandidate,
  ChunkMetadata,
  VectorIndex,
  VectorSearchOptions,
} from '../../src/services/storage/vector/index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TEMP DIRECTORIES
// ═══════════════════════════════════════════════════════════════════════════════

export function createTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function cleanupTempDir(dir: string): void {
  try {
    if (existsSync(dir)) {
      rmSync(dir, { recursive: true, force: true });
    }
  } catch {
    // Ignore cleanup errors
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SCHOOLS DATABASE
// ═══════════════════════════════════════════════════════════════════════════════

export interface SchoolRow {
  id: number;
  created_at: string;
  school_id: number;
  school_name: string;
  neighborhood: string;
}

export const SCHOOL_ROWS: SchoolRow[] = [
  {
    id: 1,
    created_at: '2020-01-01',
    school_id: 5,
    school_name: 'ABC HIGH SCHOOL',
    neighborhood: 'Logan Square',
  },
  {
    id: 2,
    created_at: '2020-01-02',
    school_id: 7,
    school_name: 'XYZ ACADEMY',
    neighborhood: 'Hyde Park',
  },
];

/**
 * Create schooltoneighborhood in a new SQLite file and return its path.
 */
export function createSchoolsDatabase(dir: string, rows: SchoolRow[] = SCHOOL_ROWS): string {
  const dbPath = join(dir, 'schools.sqlite');
  const conn = new Database(dbPath);
  try {
    conn.exec(`
      CREATE TABLE schooltoneighborhood (
        id INTEGER NOT NULL,
        created_at DATETIME NOT NULL,
        school_id INTEGER NOT NULL,
        school_name VARCHAR NOT NULL,
        neighborhood VARCHAR NOT NULL,
        PRIMARY KEY (id)
      )
    `);
    const insert = conn.prepare(
      `INSERT INTO schooltoneighborhood (id, created_at, school_id, school_name, neighborhood)
       VALUES (@id, @created_at, @school_id, @school_name, @neighborhood)`
    );
    for (const row of rows) {
      insert.run(row);
    }
  } finally {
    conn.close();
  }
  return dbPath;
}

export function countSchoolRows(dbPath: string): number {
  const conn = new Database(dbPath, { readonly: true });
  try {
    const row = conn.prepare('SELECT COUNT(*) AS cnt FROM schooltoneighborhood').get() as {
      cnt: number;
    };
    return row.cnt;
  } finally {
    conn.close();
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RETRIEVAL STAND-INS
// ═══════════════════════════════════════════════════════════════════════════════

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((t) => t.length > 0);
}

export function bagOfWords(vocabulary: string[], text: string): Float32Array {
  const tokens = tokenize(text);
  return Float32Array.from(vocabulary.map((word) => tokens.filter((t) => t === word).length));
}

/**
 * Bag-of-words embedder over a fixed vocabulary
 */
export class KeywordEmbedder implements Embedder {
  readonly calls: string[] = [];

  constructor(private readonly vocabulary: string[]) {}

  async encode(text: string): Promise<Float32Array> {
    this.calls.push(text);
    return bagOfWords(this.vocabulary, text);
  }
}

export interface IndexedChunk {
  id: number;
  text: string;
  metadata: ChunkMetadata;
  vector: Float32Array;
}

function cosineDistance(a: Float32Array, b: Float32Array): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 1;
  return 1 - dot / Math.sqrt(normA * normB);
}

/**
 * Exact KNN over an array, with the school filter applied before the limit
 */
export class InMemoryVectorIndex implements VectorIndex {
  readonly searches: VectorSearchOptions[] = [];
  closed = false;

  constructor(private readonly chunks: IndexedChunk[]) {}

  async search(vector: Float32Array, options: VectorSearchOptions): Promise<ChunkCandidate[]> {
    this.searches.push(options);
    return this.chunks
      .filter((c) => options.schoolName === undefined || c.metadata.school_name === options.schoolName)
      .map((c) => ({ id: c.id, text: c.text, metadata: c.metadata, distance: cosineDistance(vector, c.vector) }))
      .sort((a, b) => a.distance - b.distance || a.id - b.id)
      .slice(0, options.limit);
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * Scores a candidate by how many distinct question words its text contains
 */
export class OverlapReranker implements Reranker {
  readonly queries: string[] = [];
  lastRanked: Array<RerankCandidate & { rerank_score: number }> = [];

  async rerank<T extends RerankCandidate>(query: string, candidates: T[]): Promise<RankedCandidate<T>[]> {
    this.queries.push(query);
    const questionWords = new Set(tokenize(query));
    const scores = candidates
      .map((c) => new Set(tokenize(c.text)))
      .map((words) => [...questionWords].filter((w) => words.has(w)).length);
    const ranked = orderByScore(candidates, scores);
    this.lastRanked = ranked;
    return ranked;
  }
}

export const VOCABULARY = ['school', 'start', 'time', 'lunch', 'uniform', 'what', 'does', 'bus'];

export function chunk(id: number, schoolName: string, text: string): IndexedChunk {
  return {
    id,
    text,
    metadata: { school_name: schoolName, page_url: `https://schools.example.org/${id}` },
    vector: bagOfWords(VOCABULARY, text),
  };
}
