export type { FileHandle, FileEntry, DocumentModel } from './DocumentModel.js';
export type { Diagnostic, DiagnosticSeverity, ScanResult } from './Diagnostic.js';
export type {
  ScanOutcome,
  ScanState,
  ScanListener,
  ScanNotifier,
} from './ScanOutcome.js';
