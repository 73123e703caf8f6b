import type { ScanError } from '../errors.js';
import type { FileHandle } from './DocumentModel.js';
import type { ScanResult } from './Diagnostic.js';

export type ScanOutcome =
  | { kind: 'success'; result: ScanResult }
  | { kind: 'cancelled'; result: ScanResult }
  | { kind: 'failed'; error: ScanError };

export type ScanState =
  | 'idle'
  | 'discovering'
  | 'snapshotting'
  | 'invoking'
  | 'parsing'
  | 'notifyingSuccess'
  | 'notifyingFailure'
  | 'notifyingCancelled';

/**
 * Observer of scan lifecycle events. Overlapping scans may interleave
 * notifications, so consumers should key on the result they receive.
 */
export interface ScanListener {
  scanStarting?(files: readonly FileHandle[]): void;
  scanCompletedSuccessfully?(result: ScanResult): void;
  scanFailedWithError?(error: ScanError): void;
}

/**
 * Surfaces failures to the user (banner, toast, output)
 */
export interface ScanNotifier {
  showError(error: ScanError): void;
}
