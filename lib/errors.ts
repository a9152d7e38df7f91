/** Raised at startup when a required setting is missing. Fatal: no work is done. */
export class ConfigError extends Error {
  constructor(public readonly setting: string, message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
