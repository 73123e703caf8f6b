import * as vscode from 'vscode';
import {
  MypyRunner,
  ScanOrchestrator,
  createPathFilter,
  type FileHandle,
  type ScanError,
  type ScanOutcome,
  type ScanRequest,
  type ScanResult,
} from '@mypy-sentinel/core';
import type { ConfigService } from './ConfigService';
import type { DiagnosticsService } from './DiagnosticsService';
import { VscodeDocumentModel } from '../host/VscodeDocumentModel';
import { Logger } from '../utils/logger';

type ScanStartingHandler = (files: readonly FileHandle[]) => void;
type ScanCompleteHandler = (result: ScanResult) => void;
type ScanErrorHandler = (error: ScanError) => void;

/**
 * Service for running mypy scans
 */
export class ScannerService {
  private readonly documentModel = new VscodeDocumentModel();
  private inFlight: AbortController | undefined;
  private scanStartingHandlers: ScanStartingHandler[] = [];
  private scanCompleteHandlers: ScanCompleteHandler[] = [];
  private scanErrorHandlers: ScanErrorHandler[] = [];

  constructor(
    private readonly configService: ConfigService,
    private readonly diagnosticsService: DiagnosticsService
  ) {}

  /**
   * Register handler for scan start
   */
  onScanStarting(handler: ScanStartingHandler): void {
    this.scanStartingHandlers.push(handler);
  }

  /**
   * Register handler for scan completion, including cancelled scans
   */
  onScanComplete(handler: ScanCompleteHandler): void {
    this.scanCompleteHandlers.push(handler);
  }

  /**
   * Register handler for scan errors
   */
  onScanError(handler: ScanErrorHandler): void {
    this.scanErrorHandlers.push(handler);
  }

  /**
   * Check if a scan is currently running
   */
  get scanning(): boolean {
    return this.inFlight !== undefined;
  }

  /**
   * Scan every source root of the workspace
   */
  async scanProject(): Promise<ScanOutcome | undefined> {
    const roots = this.configService.getConfig().checkAllFiles
      ? this.configService.getProjectRoots()
      : this.configService.getSourceRoots();
    if (roots.length === 0) {
      void vscode.window.showErrorMessage('No workspace folder open');
      return undefined;
    }
    return this.runScan({ roots });
  }

  /**
   * Scan specific files or folders
   */
  async scanPaths(paths: string[]): Promise<ScanOutcome | undefined> {
    return this.runScan({ roots: paths });
  }

  /**
   * Scan the Python documents that have unsaved edits
   */
  async scanModifiedFiles(): Promise<ScanOutcome | undefined> {
    const files = vscode.workspace.textDocuments
      .filter((document) => document.isDirty && document.uri.scheme === 'file')
      .map((document) => this.documentModel.findFile(document.uri.fsPath))
      .filter((handle): handle is FileHandle => handle !== null);
    if (files.length === 0) {
      void vscode.window.showInformationMessage('No modified files to check');
      return undefined;
    }
    return this.runScan({ files });
  }

  /**
   * Cancel the scan in flight, if any
   */
  cancel(): void {
    this.inFlight?.abort();
  }

  /**
   * Run a scan; a newer scan cancels the one in flight
   */
  private async runScan(request: ScanRequest): Promise<ScanOutcome | undefined> {
    const projectRoot = this.configService.getProjectRoots()[0];
    if (!projectRoot) {
      void vscode.window.showErrorMessage('No workspace folder open');
      return undefined;
    }

    this.inFlight?.abort();
    const controller = new AbortController();
    this.inFlight = controller;

    const config = this.configService.getConfig();
    const orchestrator = new ScanOrchestrator({
      model: this.documentModel,
      runner: new MypyRunner(config, Logger),
      filter: createPathFilter({
        sourceExtensions: config.sourceExtensions,
        sourceRoots: this.configService.getSourceRoots(),
        projectRoots: this.configService.getProjectRoots(),
        checkAllFiles: config.checkAllFiles,
      }),
      projectRoot,
      tabWidth: config.tabWidth,
      tempDir: config.tempDir,
      logger: Logger,
      notifier: {
        showError: (error) => {
          void vscode.window.showErrorMessage(`mypy failed: ${error.message}`);
        },
      },
    });

    orchestrator.addListener(this.diagnosticsService);
    orchestrator.addListener({
      scanStarting: (files) => {
        for (const handler of this.scanStartingHandlers) {
          handler(files);
        }
      },
      scanCompletedSuccessfully: (result) => {
        for (const handler of this.scanCompleteHandlers) {
          handler(result);
        }
      },
      scanFailedWithError: (error) => {
        for (const handler of this.scanErrorHandlers) {
          handler(error);
        }
      },
    });

    try {
      const outcome = await orchestrator.scan(request, controller.signal);
      Logger.info(`Scan finished: ${outcome.kind}`);
      return outcome;
    } finally {
      if (this.inFlight === controller) {
        this.inFlight = undefined;
      }
    }
  }
}
