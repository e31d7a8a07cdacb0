/**
 * MCP Server Error Handling
 *
 * FAIL FAST: All errors throw immediately with descriptive context.
 * NO retries anywhere - failures need corrected input or operator intervention.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 * The category is the only distinction the caller sees between failure kinds.
 */
export type ErrorCategory =
  // Rejected query kind, missing argument, blank question
  | 'VALIDATION_ERROR'

  // Structured store failed to open or execute
  | 'STORE_ERROR'

  // Embedding, vector lookup or reranking failed
  | 'RETRIEVAL_ERROR'

  // Dispatch received a name not in the registry
  | 'UNKNOWN_TOOL'

  // Internal errors
  | 'INTERNAL_ERROR';

/** Pipeline stages that can raise a RETRIEVAL_ERROR */
export type RetrievalStage = 'embedding' | 'vector_search' | 'rerank';

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for all MCP tool failures
 *
 * Provides category, message, and optional details for debugging.
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    // Preserve stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   * Always produces a typed error
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof Error) {
      return new MCPError(categoryForErrorName(error.name, defaultCategory), error.message, {
        originalName: error.name,
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }
}

function categoryForErrorName(name: string, fallback: ErrorCategory): ErrorCategory {
  switch (name) {
    case 'ValidationError':
      return 'VALIDATION_ERROR';
    case 'SqliteError':
      return 'STORE_ERROR';
    default:
      return fallback;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response
 * ALWAYS includes category, message, and details
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create validation error
 */
export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

/**
 * Create structured store error, keeping the driver's message verbatim
 */
export function storeError(cause: unknown, details?: Record<string, unknown>): MCPError {
  const message = cause instanceof Error ? cause.message : String(cause);
  const code = typeof cause === 'object' && cause !== null && 'code' in cause ? cause.code : undefined;
  return new MCPError('STORE_ERROR', message, {
    ...details,
    ...(typeof code === 'string' ? { code } : {}),
  });
}

/**
 * Create retrieval error for a failed pipeline stage
 */
export function retrievalError(stage: RetrievalStage, cause: unknown): MCPError {
  const message = cause instanceof Error ? cause.message : String(cause);
  return new MCPError('RETRIEVAL_ERROR', `Retrieval failed during ${stage}: ${message}`, {
    stage,
  });
}

/**
 * Create unknown tool error
 */
export function unknownToolError(name: string, available: string[]): MCPError {
  return new MCPError('UNKNOWN_TOOL', `Unknown tool: ${name}`, {
    toolName: name,
    availableTools: available,
  });
}
