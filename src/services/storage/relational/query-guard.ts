/**
 * Read-only query guard for the relational store.
 *
 * Classification is a keyword prefix check on the trimmed, case-folded text.
 * It does not parse SQL: a mutation hidden behind a comment or inside a CTE is
 * not caught here. The executor closes that gap by opening the store read-only
 * and refusing statements that return no rows.
 *
 * @module services/storage/relational/query-guard
 */

import { ValidationError } from '../../../utils/validation.js';

export type QueryClassification = 'READ' | 'REJECTED';

/** Statement kinds that are always rejected */
export const DENIED_STATEMENT_PREFIXES = [
  'insert',
  'update',
  'delete',
  'create',
  'drop',
  'alter',
] as const;

export const READ_ONLY_MESSAGE = 'Only read queries are allowed';

export function classifyQuery(query: string): QueryClassification {
  const normalized = query.trim().toLowerCase();
  return DENIED_STATEMENT_PREFIXES.some((prefix) => normalized.startsWith(prefix))
    ? 'REJECTED'
    : 'READ';
}

/**
 * @throws ValidationError when the query is not classified READ
 */
export function assertReadOnlyQuery(query: string): void {
  if (classifyQuery(query) === 'REJECTED') {
    throw new ValidationError(READ_ONLY_MESSAGE);
  }
}
