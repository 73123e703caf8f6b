import type { DocumentModel, FileHandle } from '../types/DocumentModel.js';
import type { ScanResult } from '../types/Diagnostic.js';
import type {
  ScanListener,
  ScanNotifier,
  ScanOutcome,
  ScanState,
} from '../types/ScanOutcome.js';
import type { CheckerRunner } from '../checker/CheckerRunner.js';
import { ScanCancelledError, ScanError, throwIfCancelled, toError } from '../errors.js';
import { parseDiagnostics } from '../parser/DiagnosticParser.js';
import { getDefaultLogger, type ScanLogger } from '../utils/logger.js';
import { discoverFiles } from './FileDiscovery.js';
import type { PathFilter } from './PathFilter.js';
import { ScannableFile } from './ScannableFile.js';

export type ScanRequest =
  | { roots: readonly string[] }
  | { files: readonly FileHandle[] };

export interface ScanOrchestratorOptions {
  model: DocumentModel;
  runner: CheckerRunner;
  filter: PathFilter;
  /** Working directory of the checker; relative output paths resolve here */
  projectRoot: string;
  tabWidth: number;
  tempDir?: string;
  notifier?: ScanNotifier;
  logger?: ScanLogger;
}

/**
 * Sequences discovery, snapshotting, one checker run, parsing, cleanup and
 * notification. Each call to scan() is independent, so overlapping scans
 * are allowed; only the latest started scan updates lastResult.
 */
export class ScanOrchestrator {
  private readonly listeners = new Set<ScanListener>();
  private readonly logger: ScanLogger;
  private generation = 0;
  private currentState: ScanState = 'idle';
  private latest: ScanResult | null = null;

  constructor(private readonly options: ScanOrchestratorOptions) {
    this.logger = options.logger ?? getDefaultLogger();
  }

  /**
   * Register a listener; the returned function removes it
   */
  addListener(listener: ScanListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Phase of the most recently started scan
   */
  get state(): ScanState {
    return this.currentState;
  }

  /**
   * Result of the most recently started scan, once it has completed
   */
  get lastResult(): ScanResult | null {
    return this.latest;
  }

  async scan(request: ScanRequest, signal?: AbortSignal): Promise<ScanOutcome> {
    const generation = ++this.generation;
    const setState = (state: ScanState): void => {
      if (generation === this.generation) this.currentState = state;
    };

    try {
      const outcome = await this.execute(request, setState, signal);
      switch (outcome.kind) {
        case 'success':
          setState('notifyingSuccess');
          this.fireCompleted(outcome.result, generation);
          break;
        case 'cancelled':
          setState('notifyingCancelled');
          this.fireCompleted(outcome.result, generation);
          break;
        case 'failed':
          setState('notifyingFailure');
          this.fireFailed(outcome.error);
          break;
      }
      return outcome;
    } finally {
      setState('idle');
    }
  }

  private async execute(
    request: ScanRequest,
    setState: (state: ScanState) => void,
    signal?: AbortSignal
  ): Promise<ScanOutcome> {
    try {
      setState('discovering');
      const files = await this.resolveFiles(request, signal);
      this.fireScanStarting(files);
      return { kind: 'success', result: await this.checkFiles(files, setState, signal) };
    } catch (error) {
      if (error instanceof ScanCancelledError || signal?.aborted) {
        this.logger.debug('Scan cancelled');
        return { kind: 'cancelled', result: new Map() };
      }
      const scanError =
        error instanceof ScanError
          ? error
          : new ScanError('An error occurred while scanning a file.', toError(error));
      this.logger.warn('An error occurred while scanning a file.', scanError);
      return { kind: 'failed', error: scanError };
    }
  }

  private async resolveFiles(
    request: ScanRequest,
    signal?: AbortSignal
  ): Promise<FileHandle[]> {
    const candidates =
      'roots' in request
        ? await discoverFiles(this.options.model, request.roots, signal)
        : [...new Set(request.files)];
    return candidates.filter(this.options.filter);
  }

  private async checkFiles(
    files: readonly FileHandle[],
    setState: (state: ScanState) => void,
    signal?: AbortSignal
  ): Promise<ScanResult> {
    if (files.length === 0) return new Map();

    const { model, runner, projectRoot, tabWidth, tempDir } = this.options;
    setState('snapshotting');
    const scannable = await ScannableFile.createAndValidate(files, model, {
      tempDir,
      projectRoot,
      logger: this.logger,
    });

    try {
      const filesByPath = new Map<string, FileHandle>();
      for (const file of scannable) {
        filesByPath.set(file.path, file.handle);
      }

      throwIfCancelled(signal);
      setState('invoking');
      this.logger.info(`Checking ${scannable.length} file(s)`);
      const lines = await runner.run({
        projectRoot,
        paths: [...filesByPath.keys()],
        signal,
      });

      throwIfCancelled(signal);
      setState('parsing');
      return await parseDiagnostics(lines, {
        tabWidth,
        baseDir: projectRoot,
        filesByPath,
        model,
      });
    } finally {
      await ScannableFile.releaseAll(scannable);
    }
  }

  private fireCompleted(result: ScanResult, generation: number): void {
    if (generation === this.generation) this.latest = result;
    this.notifyListeners('scanCompletedSuccessfully', (listener) =>
      listener.scanCompletedSuccessfully?.(result)
    );
  }

  private fireFailed(error: ScanError): void {
    this.options.notifier?.showError(error);
    this.notifyListeners('scanFailedWithError', (listener) =>
      listener.scanFailedWithError?.(error)
    );
  }

  private fireScanStarting(files: readonly FileHandle[]): void {
    this.notifyListeners('scanStarting', (listener) => listener.scanStarting?.(files));
  }

  /**
   * A listener that throws is logged and skipped
   */
  private notifyListeners(
    event: keyof ScanListener,
    call: (listener: ScanListener) => void
  ): void {
    for (const listener of this.listeners) {
      try {
        call(listener);
      } catch (error) {
        this.logger.warn(`A scan listener failed in ${event}`, toError(error));
      }
    }
  }
}
