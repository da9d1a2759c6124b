/**
 * Environment variable parsing utilities with robust boolean/string/enum handling
 * Addresses truthy coercion pitfalls where "false" string evaluates to true
 */

/**
 * Parse boolean environment variable
 * @param value - Environment variable value
 * @param defaultValue - Default value if undefined/empty
 * @returns Parsed boolean
 */
export function parseBoolEnv(value: string | undefined, defaultValue: boolean): boolean;
export function parseBoolEnv(value: string | undefined, defaultValue?: undefined): boolean | undefined;
export function parseBoolEnv(value: string | undefined, defaultValue?: boolean): boolean | undefined {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const normalized = value.toLowerCase().trim();

  if (normalized === 'true' || normalized === '1' || normalized === 'yes') {
    return true;
  }

  if (normalized === 'false' || normalized === '0' || normalized === 'no') {
    return false;
  }

  // Invalid value - return default
  return defaultValue;
}

/**
 * Get string environment variable with optional default
 * @param value - Environment variable value
 * @param defaultValue - Default value if undefined/empty
 * @returns String value or default
 */
export function getEnvString(
  value: string | undefined,
  defaultValue?: string
): string | undefined {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  return value.trim();
}

function isAllowed<T extends string>(value: string, allowedValues: readonly T[]): value is T {
  return allowedValues.some(allowed => allowed === value);
}

/**
 * Parse enum environment variable
 * @param value - Environment variable value
 * @param allowedValues - Array of allowed values
 * @param defaultValue - Default value if undefined/empty/invalid
 * @returns Parsed enum value
 */
export function parseEnumEnv<T extends string>(
  value: string | undefined,
  allowedValues: readonly T[],
  defaultValue: T
): T;
export function parseEnumEnv<T extends string>(
  value: string | undefined,
  allowedValues: readonly T[],
  defaultValue?: undefined
): T | undefined;
export function parseEnumEnv<T extends string>(
  value: string | undefined,
  allowedValues: readonly T[],
  defaultValue?: T
): T | undefined {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const normalized = value.toLowerCase().trim();

  if (isAllowed(normalized, allowedValues)) {
    return normalized;
  }

  return defaultValue;
}
