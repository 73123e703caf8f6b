/**
 * @mypy-sentinel/core
 *
 * Scan orchestration for running mypy over editor buffers
 */

// Types
export type {
  FileHandle,
  FileEntry,
  DocumentModel,
  Diagnostic,
  DiagnosticSeverity,
  ScanResult,
  ScanOutcome,
  ScanState,
  ScanListener,
  ScanNotifier,
} from './types/index.js';

// Errors
export {
  ScanError,
  ScanValidationError,
  ToolInvocationError,
  ScanCancelledError,
} from './errors.js';

// Configuration
export type { CheckerConfig, ResolvedCheckerConfig } from './config/index.js';
export {
  CheckerConfigDefaults,
  loadCheckerConfig,
  toCheckerConfig,
  withDefaults,
} from './config/index.js';

// Scanner
export type {
  PathFilter,
  PathFilterOptions,
  SnapshotOptions,
  ScanRequest,
  ScanOrchestratorOptions,
} from './scanner/index.js';
export {
  discoverFiles,
  createPathFilter,
  isWithin,
  ScannableFile,
  ScanOrchestrator,
} from './scanner/index.js';

// Checker
export type { CheckerRunner, CheckerRequest } from './checker/index.js';
export { MypyRunner, buildMypyArguments, locateConfigFile } from './checker/index.js';

// Parser
export type { ParseOptions, RawDiagnostic } from './parser/index.js';
export {
  parseDiagnostics,
  parseDiagnosticLine,
  toCharacterColumn,
} from './parser/index.js';

// Host support
export { NodeDocumentModel } from './host/index.js';
export type { NodeDocumentModelOptions } from './host/index.js';
export type { ScanLogger } from './utils/logger.js';
export { createLogger, pinoScanLogger } from './utils/logger.js';
