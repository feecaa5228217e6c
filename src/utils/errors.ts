/**
 * Central error classes and validation utilities for donor-reconcile
 * @module utils/errors
 */

/**
 * Base error class for all donor-reconcile errors
 */
export class ReconcileError extends Error {
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
    this.name = 'ReconcileError'
    this.code = code
    this.context = context
    Error.captureStackTrace?.(this, this.constructor)
  }
}

/**
 * Error thrown when a source row has no identifier.
 *
 * Identity is the join key for every stage, so a row without one cannot be
 * reconciled and the run is aborted.
 */
export class MissingIdentifierError extends ReconcileError {
  public readonly table: string
  public readonly rowIndex: number
  public readonly column: string

  constructor(table: string, rowIndex: number, column: string) {
    super(
      `Row ${rowIndex} of table '${table}' has no value in identifier column '${column}'`,
      'MISSING_IDENTIFIER',
      { table, rowIndex, column }
    )
    this.name = 'MissingIdentifierError'
    this.table = table
    this.rowIndex = rowIndex
    this.column = column
  }
}

/**
 * Error thrown when a source table cannot be loaded
 */
export class SourceTableError extends ReconcileError {
  public readonly table: string

  constructor(table: string, message: string, context?: Record<string, unknown>) {
    super(`Source table '${table}': ${message}`, 'SOURCE_TABLE_ERROR', {
      table,
      ...context,
    })
    this.name = 'SourceTableError'
    this.table = table
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends ReconcileError {
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
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends ReconcileError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a number is positive (> 0)
 */
export function requirePositive(value: number, parameterName: string): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new InvalidParameterError(parameterName, value, 'must be a number')
  }
  if (value <= 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be positive (> 0)'
    )
  }
  return value
}

/**
 * Validates that a string is non-empty
 */
export function requireNonEmptyString(value: string, parameterName: string): string {
  if (typeof value !== 'string') {
    throw new InvalidParameterError(parameterName, value, 'must be a string')
  }
  if (value.trim().length === 0) {
    throw new InvalidParameterError(parameterName, value, 'must not be empty')
  }
  return value
}

/**
 * Check if an error is a donor-reconcile error
 */
export function isReconcileError(error: unknown): error is ReconcileError {
  return error instanceof ReconcileError
}
