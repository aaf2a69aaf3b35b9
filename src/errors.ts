// ============================================================================
// Shared Error Types
// ============================================================================

/** Error codes for invalid configuration values */
export type ConfigErrorCode = 'INVALID_ENV' | 'INVALID_LAYOUT';

/**
 * Thrown at startup when an environment variable or a layout override
 * cannot be used. The message names the offending key.
 */
export class ConfigError extends Error {
  readonly code: ConfigErrorCode;

  constructor(code: ConfigErrorCode, message: string) {
    super(message);
    this.name = 'ConfigError';
    this.code = code;
  }
}

/** Extracts a printable message from anything thrown */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
