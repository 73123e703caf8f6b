import type { FileHandle } from './DocumentModel.js';

export type DiagnosticSeverity = 'error' | 'warning' | 'note';

/**
 * One issue reported by the checker
 */
export interface Diagnostic {
  readonly file: FileHandle;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  /** 1-indexed */
  readonly line: number;
  /** 1-indexed character offset */
  readonly column: number;
  /** Checker error code such as `arg-type`, when reported */
  readonly code: string | null;
}

/**
 * Diagnostics per scanned file, in the order the checker emitted them.
 * An empty list means the file was checked and is clean.
 */
export type ScanResult = ReadonlyMap<FileHandle, readonly Diagnostic[]>;
