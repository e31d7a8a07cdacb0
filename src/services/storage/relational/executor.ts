/**
 * Relational Executor - runs guarded read queries against the schools SQLite store
 *
 * Each call opens its own read-only connection and closes it in a finally
 * block, so no connection outlives the invocation that opened it.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/storage/relational/executor
 */

import Database from 'better-sqlite3';
import { MCPError, storeError } from '../../../server/errors.js';
import { ValidationError } from '../../../utils/validation.js';
import { assertReadOnlyQuery, READ_ONLY_MESSAGE } from './query-guard.js';

/** Scalar values better-sqlite3 hands back for a column */
export type SqlScalar = string | number | bigint | Buffer | null;

/** One result row, keyed by column name in the order the statement reports them */
export type RelationalRecord = Readonly<Record<string, SqlScalar>>;

/** Opens a fresh connection for one invocation */
export type ConnectionFactory = () => Database.Database;

export class RelationalExecutor {
  private readonly openConnection: ConnectionFactory;

  constructor(private readonly databasePath: string, openConnection?: ConnectionFactory) {
    this.openConnection =
      openConnection ?? (() => new Database(databasePath, { readonly: true, fileMustExist: true }));
  }

  /**
   * Execute a read query and return every row.
   *
   * @throws ValidationError if the query is not a read
   * @throws MCPError STORE_ERROR for any failure inside the store
   */
  execute(query: string): RelationalRecord[] {
    assertReadOnlyQuery(query);

    let conn: Database.Database;
    try {
      conn = this.openConnection();
    } catch (error) {
      console.error(`[Schools] Failed to open ${this.databasePath}: ${describe(error)}`);
      throw storeError(error, { path: this.databasePath });
    }

    try {
      const stmt = conn.prepare(query);
      if (!stmt.reader) {
        throw new ValidationError(READ_ONLY_MESSAGE);
      }

      const columns = stmt.columns().map((column) => column.name);
      // INTEGER columns come back as bigint so values past 2^53 stay exact
      const rows = stmt.safeIntegers(true).raw(true).all() as SqlScalar[][];
      const records = rows.map((row) => toRecord(columns, row));
      console.error(`[Schools] Read query returned ${records.length} rows`);
      return records;
    } catch (error) {
      if (error instanceof ValidationError || error instanceof MCPError) {
        throw error;
      }
      console.error(`[Schools] Database error executing query: ${describe(error)}`);
      throw storeError(error);
    } finally {
      conn.close();
    }
  }
}

function toRecord(columns: string[], row: SqlScalar[]): RelationalRecord {
  // fromEntries defines own properties, so a column named __proto__ survives
  return Object.freeze(
    Object.fromEntries(columns.map((name, index) => [name, narrowInteger(row[index] ?? null)]))
  );
}

function narrowInteger(value: SqlScalar): SqlScalar {
  if (typeof value === 'bigint' && Number.isSafeInteger(Number(value))) {
    return Number(value);
  }
  return value;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
