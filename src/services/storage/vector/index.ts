/**
 * Vector Index - nearest-neighbour lookup over website chunks
 *
 * The sqlite-vec implementation keeps chunk text and metadata in a regular
 * table and vectors in a vec0 virtual table carrying school_name as a metadata
 * column, so the school filter runs inside the KNN query before `k` applies.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/storage/vector
 */

import Database from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export const ChunkMetadataSchema = z
  .object({
    school_name: z.string(),
    page_url: z.string(),
  })
  .passthrough();

export type ChunkMetadata = z.infer<typeof ChunkMetadataSchema>;

/** A retrieved chunk, before reranking */
export interface ChunkCandidate {
  id: number;
  text: string;
  metadata: ChunkMetadata;
  /** Cosine distance to the query vector (0 = identical) */
  distance: number;
}

export interface VectorSearchOptions {
  limit: number;
  /** Exact-match prefilter on metadata.school_name */
  schoolName?: string;
}

export interface VectorIndex {
  search(vector: Float32Array, options: VectorSearchOptions): Promise<ChunkCandidate[]>;
  close(): void;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SQLITE-VEC IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════════

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function vectorTableName(table: string): string {
  return `vec_${table}`;
}

/**
 * Open a SQLite connection with sqlite-vec loaded.
 */
export function openVectorDatabase(
  dbPath: string,
  options: { readonly?: boolean } = {}
): Database.Database {
  const readonly = options.readonly ?? true;
  const conn = new Database(dbPath, readonly ? { readonly: true, fileMustExist: true } : {});
  try {
    sqliteVec.load(conn);
  } catch (error) {
    conn.close();
    throw error;
  }
  return conn;
}

export class SqliteVecIndex implements VectorIndex {
  private readonly chunkTable: string;
  private readonly vecTable: string;

  constructor(private readonly conn: Database.Database, table: string) {
    if (!TABLE_NAME_PATTERN.test(table)) {
      throw new Error(`Invalid vector table name: "${table}"`);
    }
    this.chunkTable = table;
    this.vecTable = vectorTableName(table);
    this.assertTablesExist();
  }

  static open(dbPath: string, table: string): SqliteVecIndex {
    const conn = openVectorDatabase(dbPath);
    try {
      return new SqliteVecIndex(conn, table);
    } catch (error) {
      conn.close();
      throw error;
    }
  }

  async search(vector: Float32Array, options: VectorSearchOptions): Promise<ChunkCandidate[]> {
    const params: unknown[] = [
      Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength),
      // vec0 wants an INTEGER for k; plain JS numbers bind as REAL
      BigInt(options.limit),
    ];
    let knnFilter = '';
    if (options.schoolName !== undefined) {
      knnFilter = ' AND school_name = ?';
      params.push(options.schoolName);
    }

    const rows = this.conn
      .prepare(
        `WITH knn AS (
           SELECT chunk_id, distance
           FROM ${this.vecTable}
           WHERE embedding MATCH ?
             AND k = ?${knnFilter}
         )
         SELECT c.id, c.text, c.metadata, knn.distance
         FROM knn
         JOIN ${this.chunkTable} c ON c.id = knn.chunk_id
         ORDER BY knn.distance, c.id`
      )
      .all(...params) as Array<{ id: number; text: string; metadata: string; distance: number }>;

    return rows.map((row) => ({
      id: row.id,
      text: row.text,
      metadata: parseMetadata(row.id, row.metadata),
      distance: row.distance,
    }));
  }

  getVectorCount(): number {
    const row = this.conn.prepare(`SELECT COUNT(*) AS cnt FROM ${this.vecTable}`).get() as {
      cnt: number;
    };
    return row.cnt;
  }

  close(): void {
    this.conn.close();
  }

  private assertTablesExist(): void {
    const found = this.conn
      .prepare(`SELECT name FROM sqlite_master WHERE name IN (?, ?)`)
      .all(this.chunkTable, this.vecTable) as Array<{ name: string }>;
    const names = new Set(found.map((r) => r.name));
    for (const required of [this.chunkTable, this.vecTable]) {
      if (!names.has(required)) {
        throw new Error(`Vector store is missing table "${required}"`);
      }
    }
  }
}

function parseMetadata(chunkId: number, raw: string): ChunkMetadata {
  const parsed = ChunkMetadataSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Chunk ${chunkId} has invalid metadata: ${parsed.error.message}`);
  }
  return parsed.data;
}
