export type Env = Record<string, string | undefined>;

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function readString(env: Env, key: string, fallback: string): string {
  const value = env[key];
  return value === undefined || value.trim() === '' ? fallback : value.trim();
}

export function readOptionalString(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Reads a non-negative integer. Blank values fall back to the default,
 * anything else that is not a whole number is rejected.
 */
export function readInt(env: Env, key: string, fallback: number): number {
  const raw = readOptionalString(env, key);
  if (raw === undefined) {
    return fallback;
  }

  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(`${key} must be a non-negative integer, got "${raw}"`);
  }

  return parseInt(raw, 10);
}

export function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = readOptionalString(env, key);
  if (raw === undefined) {
    return fallback;
  }
  return ['true', '1', 'yes'].includes(raw.toLowerCase());
}
