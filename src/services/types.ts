/**
 * External service type definitions
 * @module services/types
 */

/**
 * Error types that can occur during service execution.
 */
export type ServiceErrorType =
  | 'timeout'
  | 'network'
  | 'rejected'
  | 'malformed'
  | 'unavailable'
  | 'unknown'

/**
 * Logger interface used by the pipeline and services
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

/**
 * Log levels in increasing order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

/**
 * Timing information for a service call
 */
export interface ServiceTiming {
  /** When the call started */
  startedAt: Date

  /** When the call completed */
  completedAt: Date

  /** Duration in milliseconds */
  durationMs: number
}

/**
 * Error information from a service call
 */
export interface ServiceErrorInfo {
  /** Error code */
  code: string

  /** Error message */
  message: string

  /** Error type for categorization */
  type: ServiceErrorType

  /** Whether a later attempt could succeed */
  retryable: boolean

  /** Additional error context */
  context?: Record<string, unknown>
}

/**
 * Result from a service call
 */
export interface ServiceResult<T = unknown> {
  /** Whether the call succeeded */
  success: boolean

  /** Result data (if success) */
  data?: T

  /** Error information (if failure) */
  error?: ServiceErrorInfo

  /** Timing information */
  timing: ServiceTiming
}

/**
 * One entry of the external tag-name mapping
 */
export interface TagMappingPair {
  /** Tag name as it appears in the source data */
  name: string

  /** Name the tag should be reported under */
  mappedName: string
}

/**
 * Service that supplies the tag-name mapping.
 *
 * Implementations may throw any error; callers absorb failures and fall back
 * to the identity mapping.
 */
export interface TagMappingService {
  /** Unique identifier for the service, used in logs and errors */
  name: string

  /** Human-readable description */
  description?: string

  /** Fetch every known mapping pair */
  fetchMappings(signal?: AbortSignal): Promise<TagMappingPair[]>
}
