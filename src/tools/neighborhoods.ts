/**
 * School/Neighborhood SQL Tool
 *
 * Tools: query_schools_and_neighborhoods
 *
 * Runs a guarded, read-only SELECT against the schooltoneighborhood table.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/neighborhoods
 */

import { z } from 'zod';
import { successResult } from '../server/types.js';
import type { RelationalExecutor } from '../services/storage/relational/executor.js';
import { validateInput, NeighborhoodQueryInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolHandler } from './shared.js';

export const NEIGHBORHOOD_TOOL_NAME = 'query_schools_and_neighborhoods';

const NEIGHBORHOOD_TOOL_DESCRIPTION = `Execute a SELECT query on a table of Chicago public schools and their neighborhoods called "schooltoneighborhood" with the following schema:
    id INTEGER NOT NULL,
    created_at DATETIME NOT NULL,
    school_id INTEGER NOT NULL,
    school_name VARCHAR NOT NULL,
    neighborhood VARCHAR NOT NULL,
    PRIMARY KEY (id)

"school_name" is always all-caps but "neighborhood" is not.`;

/**
 * Build the handler for query_schools_and_neighborhoods
 */
export function createNeighborhoodQueryHandler(
  executor: RelationalExecutor
): ToolHandler {
  return async (params) => {
    try {
      const input = validateInput(NeighborhoodQueryInput, params);
      const rows = executor.execute(input.query);

      return formatResponse(
        successResult({
          rows,
          row_count: rows.length,
        })
      );
    } catch (error) {
      return handleError(error);
    }
  };
}

/**
 * Neighborhood tools collection for MCP server registration
 */
export function createNeighborhoodTools(executor: RelationalExecutor): Record<string, ToolDefinition> {
  return {
    [NEIGHBORHOOD_TOOL_NAME]: {
      description: NEIGHBORHOOD_TOOL_DESCRIPTION,
      inputSchema: {
        query: z.string().min(1).describe('SELECT SQL query to execute'),
      },
      handler: createNeighborhoodQueryHandler(executor),
    },
  };
}
