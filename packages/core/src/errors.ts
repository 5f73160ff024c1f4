/**
 * Type hashing errors
 */

/**
 * Base error class for type hashing errors
 */
export class TypeHashError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TypeHashError';
    // Maintain proper stack trace in V8
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Thrown when an input is outside the documented domain of a hash function.
 * Hash functions never clamp or coerce such values.
 */
export class InvalidArgumentError extends TypeHashError {
  public readonly argumentName: string;
  public readonly value: unknown;

  constructor(argumentName: string, value: unknown, reason: string) {
    super(`Invalid argument '${argumentName}': ${reason} (got ${describeValue(value)})`);
    this.name = 'InvalidArgumentError';
    this.argumentName = argumentName;
    this.value = value;
  }
}

/**
 * Thrown when environment configuration fails validation
 */
export class TypeHashConfigError extends TypeHashError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Environment validation failed:\n${issues.join('\n')}`);
    this.name = 'TypeHashConfigError';
    this.issues = issues;
  }
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (Array.isArray(value)) return `array(${value.length})`;
  return typeof value;
}
