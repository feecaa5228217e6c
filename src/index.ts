// Main entry point
export { DonorReconcile, ReconciliationBuilder, type TagMappingOptions } from './builder/reconciliation-builder'

// Pipeline
export {
  ReconciliationPipeline,
  assembleConstituent,
  type RunOptions,
  type AssemblyContext,
  type AssembledConstituent,
} from './pipeline/reconciliation-pipeline'
export {
  createReconciliationConfig,
  validateReconciliationConfig,
  type ReconciliationOptions,
} from './pipeline/config'

// Types
export * from './types'

// Core stages and normalizers
export * from './core'

// External services, logging
export * from './services'

// Workbook input and CSV output
export * from './io'

// Errors
export {
  ReconcileError,
  MissingIdentifierError,
  SourceTableError,
  InvalidParameterError,
  ConfigurationError,
  requirePositive,
  requireNonEmptyString,
  isReconcileError,
} from './utils/errors'
