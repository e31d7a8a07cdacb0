/**
 * MCP Server Type Definitions
 *
 * @module server/types
 */

export interface SuccessResult<T> {
  success: true;
  data: T;
}

/**
 * Wrap tool output in the success envelope
 */
export function successResult<T>(data: T): SuccessResult<T> {
  return { success: true, data };
}
