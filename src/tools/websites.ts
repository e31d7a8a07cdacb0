/**
 * School Website Search Tool
 *
 * Tools: query_school_websites
 *
 * Semantic search over school website chunks: embed, KNN with optional
 * school prefilter, rerank, top 10.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/websites
 */

import { z } from 'zod';
import { successResult } from '../server/types.js';
import {
  resolveSchoolFilter,
  type SemanticSearchExecutor,
} from '../services/search/semantic-search.js';
import { validateInput, WebsiteSearchInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolHandler } from './shared.js';

export const WEBSITE_TOOL_NAME = 'query_school_websites';

/**
 * Build the handler for query_school_websites
 */
export function createWebsiteSearchHandler(
  executor: SemanticSearchExecutor
): ToolHandler {
  return async (params) => {
    try {
      const input = validateInput(WebsiteSearchInput, params);
      const results = await executor.search({
        question: input.question,
        school_name: input.school_name,
      });

      return formatResponse(
        successResult({
          results,
          result_count: results.length,
          school_name_filter: resolveSchoolFilter(input.school_name) ?? null,
        })
      );
    } catch (error) {
      return handleError(error);
    }
  };
}

/**
 * Website search tools collection for MCP server registration
 */
export function createWebsiteTools(executor: SemanticSearchExecutor): Record<string, ToolDefinition> {
  return {
    [WEBSITE_TOOL_NAME]: {
      description:
        'Query a database of Chicago public school websites for context relevant to answering a given question. ' +
        'Returns up to 10 passages ranked by relevance, each with its school name and page URL.',
      inputSchema: {
        question: z
          .string()
          .min(1)
          .describe('Question to answer using relevant context from the school websites.'),
        school_name: z
          .string()
          .nullish()
          .describe("Optional filter to only search within a specific school's website."),
      },
      handler: createWebsiteSearchHandler(executor),
    },
  };
}
