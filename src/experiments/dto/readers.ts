// src/experiments/dto/readers.ts

/**
 * Field readers shared by the experiment DTO parsers.
 *
 * Each reader records a human-readable issue instead of throwing, so a parser
 * can report every problem of a payload at once.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readNonEmptyString(
  obj: Record<string, unknown>,
  key: string,
  issues: string[],
  label: string = key,
): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.trim().length === 0) {
    issues.push(`"${label}" must be a non-empty string.`);
    return '';
  }
  return value;
}

export function readOptionalString(
  obj: Record<string, unknown>,
  key: string,
  issues: string[],
  label: string = key,
): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    issues.push(`"${label}" must be a string when provided.`);
    return undefined;
  }
  return value;
}

export function readOptionalNumber(
  obj: Record<string, unknown>,
  key: string,
  issues: string[],
): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    issues.push(`"${key}" must be a finite number when provided.`);
    return undefined;
  }
  return value;
}

export function readOptionalBoolean(
  obj: Record<string, unknown>,
  key: string,
  issues: string[],
): boolean | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    issues.push(`"${key}" must be a boolean when provided.`);
    return undefined;
  }
  return value;
}

export function readNonNegativeInteger(
  obj: Record<string, unknown>,
  key: string,
  issues: string[],
  label: string = key,
): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    issues.push(`"${label}" must be a non-negative integer.`);
    return 0;
  }
  return value;
}

export function readEnum<T extends string>(
  obj: Record<string, unknown>,
  key: string,
  guard: (value: unknown) => value is T,
  allowed: readonly T[],
  issues: string[],
  label: string = key,
): T | undefined {
  const value = obj[key];
  if (!guard(value)) {
    issues.push(`"${label}" must be one of: ${allowed.join(', ')}.`);
    return undefined;
  }
  return value;
}
