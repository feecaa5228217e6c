/**
 * Service-specific error classes for external services
 * @module services/service-error
 */

import type { ServiceErrorInfo, ServiceErrorType } from './types'

/**
 * Base error class for all service-related errors
 */
export class ServiceError extends Error {
  /** Error code for programmatic handling */
  public readonly code: string

  /** Error type for categorization */
  public readonly type: ServiceErrorType

  /** Whether a later attempt could succeed */
  public readonly retryable: boolean

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    type: ServiceErrorType,
    retryable: boolean,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'ServiceError'
    this.code = code
    this.type = type
    this.retryable = retryable
    this.context = context
    Error.captureStackTrace?.(this, this.constructor)
  }
}

/**
 * Error thrown when a service call times out
 */
export class ServiceTimeoutError extends ServiceError {
  /** Timeout duration in milliseconds */
  public readonly timeoutMs: number

  /** Service name that timed out */
  public readonly serviceName: string

  constructor(
    serviceName: string,
    timeoutMs: number,
    context?: Record<string, unknown>
  ) {
    super(
      `Service '${serviceName}' timed out after ${timeoutMs}ms`,
      'SERVICE_TIMEOUT',
      'timeout',
      true,
      { serviceName, timeoutMs, ...context }
    )
    this.name = 'ServiceTimeoutError'
    this.serviceName = serviceName
    this.timeoutMs = timeoutMs
  }
}

/**
 * Error thrown when a network error occurs during service call
 */
export class ServiceNetworkError extends ServiceError {
  /** Service name that experienced network error */
  public readonly serviceName: string

  /** Original network error */
  public readonly cause?: Error

  constructor(
    serviceName: string,
    message: string,
    cause?: Error,
    context?: Record<string, unknown>
  ) {
    super(
      `Network error in service '${serviceName}': ${message}`,
      'SERVICE_NETWORK_ERROR',
      'network',
      true,
      { serviceName, originalMessage: message, ...context }
    )
    this.name = 'ServiceNetworkError'
    this.serviceName = serviceName
    this.cause = cause
  }
}

/**
 * Error thrown when a service answers with a client error (4xx response)
 */
export class ServiceRejectedError extends ServiceError {
  /** Service name */
  public readonly serviceName: string

  /** HTTP status code if applicable */
  public readonly statusCode?: number

  constructor(
    serviceName: string,
    reason: string,
    statusCode?: number,
    context?: Record<string, unknown>
  ) {
    super(
      `Request rejected by service '${serviceName}': ${reason}`,
      'SERVICE_REJECTED',
      'rejected',
      false,
      { serviceName, reason, statusCode, ...context }
    )
    this.name = 'ServiceRejectedError'
    this.serviceName = serviceName
    this.statusCode = statusCode
  }
}

/**
 * Error thrown when a server error occurs (5xx response)
 */
export class ServiceServerError extends ServiceError {
  /** Service name */
  public readonly serviceName: string

  /** HTTP status code if applicable */
  public readonly statusCode?: number

  constructor(
    serviceName: string,
    message: string,
    statusCode?: number,
    context?: Record<string, unknown>
  ) {
    const statusInfo = statusCode ? ` (HTTP ${statusCode})` : ''
    super(
      `Server error in service '${serviceName}'${statusInfo}: ${message}`,
      'SERVICE_SERVER_ERROR',
      'unavailable',
      true,
      { serviceName, statusCode, originalMessage: message, ...context }
    )
    this.name = 'ServiceServerError'
    this.serviceName = serviceName
    this.statusCode = statusCode
  }
}

/**
 * Error thrown when a service responds with a payload of the wrong shape
 */
export class ServiceMalformedResponseError extends ServiceError {
  /** Service name */
  public readonly serviceName: string

  /** What was wrong with the payload */
  public readonly reason: string

  constructor(
    serviceName: string,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Malformed response from service '${serviceName}': ${reason}`,
      'SERVICE_MALFORMED_RESPONSE',
      'malformed',
      false,
      { serviceName, reason, ...context }
    )
    this.name = 'ServiceMalformedResponseError'
    this.serviceName = serviceName
    this.reason = reason
  }
}

/**
 * Error thrown when service configuration is invalid
 */
export class ServiceConfigurationError extends ServiceError {
  /** Field path that has invalid configuration */
  public readonly field: string

  /** Reason for invalid configuration */
  public readonly reason: string

  constructor(
    field: string,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid service configuration for '${field}': ${reason}`,
      'SERVICE_CONFIGURATION_ERROR',
      'unknown',
      false,
      { field, reason, ...context }
    )
    this.name = 'ServiceConfigurationError'
    this.field = field
    this.reason = reason
  }
}

/**
 * Check if an error is a service error
 */
export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError
}

/**
 * Converts any thrown value into the serializable error shape carried by
 * service results.
 */
export function toServiceErrorInfo(error: unknown, serviceName: string): ServiceErrorInfo {
  if (isServiceError(error)) {
    return {
      code: error.code,
      message: error.message,
      type: error.type,
      retryable: error.retryable,
      context: error.context,
    }
  }

  const message = error instanceof Error ? error.message : String(error)
  return {
    code: 'SERVICE_UNKNOWN_ERROR',
    message: `Service '${serviceName}' failed: ${message}`,
    type: 'unknown',
    retryable: false,
    context: { serviceName },
  }
}
