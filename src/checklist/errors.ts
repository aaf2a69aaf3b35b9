// ============================================================================
// Checklist Loader Error Types
// ============================================================================

/**
 * Failure reasons for loading a checklist source.
 *
 * - NOT_FOUND: the source path does not exist or cannot be read
 * - FORMAT_ERROR: not well-formed XML, unexpected structure, or a column
 *   count that is not a positive integer
 * - EMPTY_RESULT: parsed, but no category survived filtering
 */
export type ChecklistLoadErrorCode = 'NOT_FOUND' | 'FORMAT_ERROR' | 'EMPTY_RESULT';

/** Typed error for checklist load failures. The message names the source path. */
export class ChecklistLoadError extends Error {
  readonly code: ChecklistLoadErrorCode;
  readonly sourcePath: string;

  constructor(code: ChecklistLoadErrorCode, sourcePath: string, message: string) {
    super(message);
    this.name = 'ChecklistLoadError';
    this.code = code;
    this.sourcePath = sourcePath;
  }
}
