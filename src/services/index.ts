export type {
  ServiceErrorType,
  Logger,
  LogLevel,
  ServiceTiming,
  ServiceErrorInfo,
  ServiceResult,
  TagMappingPair,
  TagMappingService,
} from './types'

export {
  ServiceError,
  ServiceTimeoutError,
  ServiceNetworkError,
  ServiceRejectedError,
  ServiceServerError,
  ServiceMalformedResponseError,
  ServiceConfigurationError,
  isServiceError,
  toServiceErrorInfo,
} from './service-error'

export {
  createConsoleLogger,
  createSilentLogger,
  createPrefixedLogger,
  defaultLogger,
} from './logger'

export { withTimeout, withAbortableTimeout, type TimeoutOptions } from './resilience/timeout'

export {
  createHttpTagMappingService,
  createStaticTagMappingService,
  parseTagMappingPayload,
  type FetchFunction,
  type HttpTagMappingConfig,
} from './lookups/tag-mapping-lookup'
