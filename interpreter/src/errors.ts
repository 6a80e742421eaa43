/**
 * Error types for the Sentience interpreter.
 *
 * Lexing, parsing and evaluation never throw. These errors belong to the
 * boundary around the core: snapshot I/O and configuration.
 */

export class SentienceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SentienceError';
  }
}

export class SnapshotError extends SentienceError {
  public readonly path: string;

  constructor(action: 'save' | 'load', path: string, reason: string) {
    super(`SnapshotError: cannot ${action} '${path}': ${reason}`);
    this.name = 'SnapshotError';
    this.path = path;
  }
}

export class ConfigError extends SentienceError {
  public readonly field: string;

  constructor(field: string, reason: string) {
    super(`ConfigError: invalid ${field}: ${reason}`);
    this.name = 'ConfigError';
    this.field = field;
  }
}

/**
 * Message text of any thrown value.
 */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
