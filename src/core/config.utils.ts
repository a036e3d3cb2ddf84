// Utility functions for configuration parsing

export type Env = Record<string, string | undefined>;

/**
 * Parse environment variable with type conversion
 */
export function parseEnvVar<T>(
  env: Env,
  key: string,
  defaultValue: T,
  parser: (value: string) => T
): T {
  const value = env[key];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  try {
    return parser(value.trim());
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`Invalid value for ${key}: ${value} (${reason}), using default: ${String(defaultValue)}`);
    return defaultValue;
  }
}

/**
 * Parse integer with validation
 */
export function parseIntWithValidation(
  value: string,
  min?: number,
  max?: number
): number {
  if (!/^-?\d+$/.test(value)) {
    throw new Error(`Invalid integer: ${value}`);
  }
  const parsed = parseInt(value, 10);

  if (min !== undefined && parsed < min) {
    throw new Error(`Value ${parsed} is below minimum ${min}`);
  }

  if (max !== undefined && parsed > max) {
    throw new Error(`Value ${parsed} is above maximum ${max}`);
  }

  return parsed;
}

/**
 * Parse float with validation
 */
export function parseFloatWithValidation(
  value: string,
  min?: number,
  max?: number
): number {
  const parsed = Number(value);

  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid number: ${value}`);
  }

  if (min !== undefined && parsed < min) {
    throw new Error(`Value ${parsed} is below minimum ${min}`);
  }

  if (max !== undefined && parsed > max) {
    throw new Error(`Value ${parsed} is above maximum ${max}`);
  }

  return parsed;
}

export function parsePositiveInt(env: Env, key: string, defaultValue: number): number {
  return parseEnvVar(env, key, defaultValue, (value) =>
    parseIntWithValidation(value, 1)
  );
}

export function parseNonNegativeInt(env: Env, key: string, defaultValue: number): number {
  return parseEnvVar(env, key, defaultValue, (value) =>
    parseIntWithValidation(value, 0)
  );
}

export function parseNonNegativeFloat(
  env: Env,
  key: string,
  defaultValue: number,
  max?: number
): number {
  return parseEnvVar(env, key, defaultValue, (value) =>
    parseFloatWithValidation(value, 0, max)
  );
}

/**
 * Parse one of a fixed set of string values
 */
export function parseEnum<T extends string>(
  env: Env,
  key: string,
  defaultValue: T,
  allowed: readonly T[]
): T {
  return parseEnvVar(env, key, defaultValue, (value) => {
    const match = allowed.find(candidate => candidate === value.toLowerCase());
    if (match === undefined) {
      throw new Error(`Expected one of ${allowed.join(', ')}`);
    }
    return match;
  });
}

export function parseString(env: Env, key: string, defaultValue: string): string {
  return parseEnvVar(env, key, defaultValue, (value) => value);
}
