/**
 * Central error classes and validation utilities for sortkit
 * @module utils/errors
 */

/**
 * Base error class for all sortkit errors
 */
export class SortkitError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'SortkitError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    Error.captureStackTrace?.(this, this.constructor)
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends SortkitError {
  public readonly parameterName: string
  public readonly value: unknown
  public readonly reason: string

  constructor(
    parameterName: string,
    value: unknown,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid parameter '${parameterName}': ${reason}`,
      'INVALID_PARAMETER',
      { parameterName, value, reason, ...context }
    )
    this.name = 'InvalidParameterError'
    this.parameterName = parameterName
    this.value = value
    this.reason = reason
  }
}

/**
 * Error thrown when a builder method is called in invalid sequence
 */
export class BuilderSequenceError extends SortkitError {
  public readonly method: string

  constructor(method: string, message: string, context?: Record<string, unknown>) {
    super(
      `Builder sequence error in ${method}: ${message}`,
      'BUILDER_SEQUENCE_ERROR',
      { method, ...context }
    )
    this.name = 'BuilderSequenceError'
    this.method = method
  }
}

/**
 * Which comparator law a checked comparator observed being broken
 */
export type ComparatorViolation = 'non-numeric' | 'antisymmetry' | 'consistency'

/**
 * Error thrown by a checked comparator when it observes a broken contract
 */
export class ComparatorContractError extends SortkitError {
  public readonly violation: ComparatorViolation
  public readonly left: unknown
  public readonly right: unknown

  constructor(
    violation: ComparatorViolation,
    left: unknown,
    right: unknown,
    detail: string
  ) {
    super(
      `Comparator violates ${violation}: ${detail}`,
      'COMPARATOR_CONTRACT_VIOLATION',
      { violation, left, right }
    )
    this.name = 'ComparatorContractError'
    this.violation = violation
    this.left = left
    this.right = right
  }
}

/**
 * Error thrown when a comparator name is not registered
 */
export class UnknownComparatorError extends SortkitError {
  public readonly comparatorName: string

  constructor(comparatorName: string, available: string[]) {
    super(
      `Unknown comparator '${comparatorName}'. Available comparators: ${available.join(', ')}`,
      'UNKNOWN_COMPARATOR',
      { comparatorName, available }
    )
    this.name = 'UnknownComparatorError'
    this.comparatorName = comparatorName
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a value is an array
 */
export function requireArray<T>(
  value: ReadonlyArray<T>,
  parameterName: string
): ReadonlyArray<T> {
  if (!Array.isArray(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be an array'
    )
  }
  return value
}

/**
 * Validates that a function is provided
 */
export function requireFunction<F extends (...args: never[]) => unknown>(
  value: F,
  parameterName: string
): F {
  if (typeof value !== 'function') {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a function'
    )
  }
  return value
}

/**
 * Validates that a string is non-empty
 */
export function requireNonEmptyString(value: string, parameterName: string): string {
  if (typeof value !== 'string') {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a string'
    )
  }
  if (value.trim().length === 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must not be empty'
    )
  }
  return value
}

/**
 * Validates that a value is one of the allowed options
 */
export function requireOneOf<T>(
  value: T,
  allowedValues: readonly T[],
  parameterName: string
): T {
  if (!allowedValues.includes(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be one of: ${allowedValues.join(', ')}`
    )
  }
  return value
}

/**
 * Check if an error is a sortkit error
 */
export function isSortkitError(error: unknown): error is SortkitError {
  return error instanceof SortkitError
}
