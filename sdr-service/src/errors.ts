export type SupervisorErrorCode = 'ENOENT_EXECUTABLE' | 'SPAWN_FAILED' | 'RESTART_BUDGET_EXHAUSTED';

/** Unrecoverable failure of the decoder process. */
export class SupervisorError extends Error {
  readonly code: SupervisorErrorCode;

  constructor(code: SupervisorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SupervisorError';
    this.code = code;
  }
}

/** The sensor map file could not be read or contains an invalid entry. */
export class SensorMapError extends Error {
  readonly entry?: string;

  constructor(message: string, entry?: string, options?: { cause?: unknown }) {
    super(entry ? `${message} (entry: ${entry})` : message, options);
    this.name = 'SensorMapError';
    this.entry = entry;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
