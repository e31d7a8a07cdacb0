/**
 * Server Configuration
 *
 * Sources, lowest to highest precedence: schema defaults, environment
 * variables (optionally loaded from .env by the entry point), CLI flags.
 *
 * @module server/config
 */

import { homedir } from 'os';
import { parseArgs } from 'util';
import { z } from 'zod';
import { DEFAULT_EMBEDDING_DIMENSIONS, DEFAULT_EMBEDDING_MODEL } from '../services/embedding/embedder.js';
import { DEFAULT_RERANKER_MODEL } from '../services/search/reranker.js';
import { DEFAULT_CANDIDATE_LIMIT } from '../services/search/semantic-search.js';
import { expandHomePath } from '../utils/text.js';
import { validateInput } from '../utils/validation.js';

export const SERVER_NAME = 'school-data-mcp';
export const SERVER_VERSION = '0.1.0';

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

export const ServerConfigSchema = z.object({
  schoolsDbPath: z.string().min(1, 'SCHOOLS_DB_PATH (or --sqlite-path) is required'),
  websitesDbPath: z.string().min(1, 'WEBSITES_DB_PATH (or --vector-db-path) is required'),
  websitesTable: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'WEBSITES_TABLE must be a plain SQL identifier')
    .default('webpagechunk'),

  embedding: z
    .object({
      endpoint: z.string().url().default('http://127.0.0.1:8080'),
      model: z.string().min(1).default(DEFAULT_EMBEDDING_MODEL),
      dimensions: z.number().int().positive().default(DEFAULT_EMBEDDING_DIMENSIONS),
    })
    .default({}),

  reranker: z
    .object({
      endpoint: z.string().url().default('http://127.0.0.1:8081'),
      model: z.string().min(1).default(DEFAULT_RERANKER_MODEL),
    })
    .default({}),

  searchCandidateLimit: z.number().int().min(1).max(100).default(DEFAULT_CANDIDATE_LIMIT),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Parse the CLI flags the server accepts. Unknown flags are an error.
 */
export function parseCliArgs(argv: string[]): { sqlitePath?: string; vectorDbPath?: string } {
  const { values } = parseArgs({
    args: argv,
    options: {
      'sqlite-path': { type: 'string' },
      'vector-db-path': { type: 'string' },
    },
    strict: true,
  });
  return { sqlitePath: values['sqlite-path'], vectorDbPath: values['vector-db-path'] };
}

function optionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Build the validated server configuration.
 *
 * @throws ValidationError naming every invalid setting
 */
export function loadServerConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = [],
  home: string = homedir()
): ServerConfig {
  const cli = parseCliArgs(argv);
  const schoolsDbPath = cli.sqlitePath ?? nonEmpty(env.SCHOOLS_DB_PATH) ?? '';
  const websitesDbPath = cli.vectorDbPath ?? nonEmpty(env.WEBSITES_DB_PATH) ?? '';

  return validateInput(ServerConfigSchema, {
    schoolsDbPath: expandHomePath(schoolsDbPath, home),
    websitesDbPath: expandHomePath(websitesDbPath, home),
    websitesTable: nonEmpty(env.WEBSITES_TABLE),
    embedding: {
      endpoint: nonEmpty(env.EMBEDDING_ENDPOINT),
      model: nonEmpty(env.EMBEDDING_MODEL),
      dimensions: optionalInt(env.EMBEDDING_DIMENSIONS),
    },
    reranker: {
      endpoint: nonEmpty(env.RERANKER_ENDPOINT),
      model: nonEmpty(env.RERANKER_MODEL),
    },
    searchCandidateLimit: optionalInt(env.SEARCH_CANDIDATE_LIMIT),
  });
}
