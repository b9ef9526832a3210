/**
 * Raised for malformed search records and tool arguments
 */
export class ValidationError extends Error {
  /** Property that failed validation, when one can be named */
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ValidationError);
    }
  }
}

export type UnknownRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function requireString(source: UnknownRecord, key: string, label = key): string {
  const value = source[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`${label} must be a non-empty string`, key);
  }
  return value;
}

export function optionalString(source: UnknownRecord, key: string, label = key): string | undefined {
  const value = source[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${label} must be a string when provided`, key);
  }
  return value;
}

export function oneOf<T extends string>(
  value: string,
  allowed: readonly T[],
  key: string
): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ValidationError(`Invalid ${key}: "${value}". Must be one of: ${allowed.join(', ')}`, key);
  }
  return match;
}
