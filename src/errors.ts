/** Bad arguments, environment or rc file. Reported with usage; no work is done. */
export class ConfigurationError extends Error {
  name = 'ConfigurationError';
}

/** The tracked-file query could not run. Fatal for the whole batch. */
export class EnumerationError extends Error {
  name = 'EnumerationError';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
