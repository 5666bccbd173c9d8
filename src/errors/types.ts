export type ErrorCategory = 'validation' | 'io' | 'config' | 'internal';

/**
 * `<CATEGORY>_<IDENTIFIER>`; the prefix always matches the category.
 */
export type ErrorCode =
  | 'VALIDATION_INVALID_INPUT'
  | 'VALIDATION_SCHEMA_MISMATCH'
  | 'IO_NOT_FOUND'
  | 'IO_PERMISSION_DENIED'
  | 'IO_READ_FAILED'
  | 'CONFIG_INVALID'
  | 'INTERNAL_UNEXPECTED';

export interface ErrorContext {
  operation?: string;
  module?: string;
  correlationId?: string;
  /** Shown to clients in place of the internal message. */
  userMessage?: string;
  data?: Record<string, JsonValue>;
  [key: string]: unknown;
}

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };
