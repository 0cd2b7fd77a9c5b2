/**
 * Error handling type definitions
 *
 * Core types and enums shared by the error classification used on the
 * provider boundary and by the CLI when reporting failed turns.
 */

/**
 * Categories for classifying different types of errors
 */
export enum ErrorCategory {
  /** Network connectivity and communication errors */
  NETWORK = 'NETWORK',

  /** External service failures (LLM APIs, rate limits, 5xx) */
  EXTERNAL_SERVICE = 'EXTERNAL_SERVICE',

  /** System-level errors (memory, disk, permissions) */
  SYSTEM = 'SYSTEM',

  /** User input validation and formatting errors */
  USER_INPUT = 'USER_INPUT',

  /** Configuration, credential and setup errors */
  CONFIGURATION = 'CONFIGURATION',

  /** Unclassified or unexpected errors */
  UNKNOWN = 'UNKNOWN'
}

/**
 * Context information associated with an error
 */
export interface ErrorContext {
  /** Component that raised the error, e.g. `llm:openai` */
  component?: string;

  /** Timestamp when the error context was created */
  timestamp: number;

  /** Additional metadata relevant to the error */
  metadata?: Record<string, unknown>;
}

/**
 * A classified error with category and recovery information
 */
export interface ClassifiedError {
  /** Unique identifier for this error instance */
  id: string;

  category: ErrorCategory;

  /** User-facing message */
  message: string;

  /** Message of the underlying error */
  originalMessage: string;

  /** HTTP status reported by the failing service, when there is one */
  status?: number;

  /** Whether a retry may succeed */
  recoverable: boolean;

  context: ErrorContext;
}

/**
 * Generates a unique, readable error ID
 * Format: err-{8-char-hash}-{4-char-suffix}
 */
export function generateErrorId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 6);
  const hash = (timestamp + random).substring(0, 8);
  const suffix = Math.random().toString(36).substring(2, 6);

  return `err-${hash}-${suffix}`;
}
