import * as vscode from 'vscode';
import { ScannerService } from './services/ScannerService';
import { ConfigService } from './services/ConfigService';
import { StatusBarService } from './services/StatusBarService';
import { DiagnosticsService, countIssues } from './services/DiagnosticsService';
import { registerCommands } from './commands';
import { Logger } from './utils/logger';

let statusBarService: StatusBarService | undefined;

export function activate(context: vscode.ExtensionContext): void {
  Logger.info('Mypy Sentinel extension activating...');

  // Initialize services
  const configService = new ConfigService();
  const diagnosticsService = new DiagnosticsService();
  statusBarService = new StatusBarService();
  const statusBar = statusBarService;
  const scannerService = new ScannerService(configService, diagnosticsService);

  registerCommands(context, scannerService, configService, diagnosticsService);

  // Subscribe to scan events
  scannerService.onScanStarting((files) => {
    statusBar.showScanning(files.length);
  });

  // Cancelled and empty scans report an empty result
  scannerService.onScanComplete((result) => {
    if (result.size === 0) {
      statusBar.showReady();
      return;
    }
    statusBar.showScanComplete(countIssues(result));
  });

  scannerService.onScanError((error) => {
    Logger.error('Scan failed', error);
    statusBar.showError(error.message);
  });

  context.subscriptions.push(
    vscode.workspace.onDidSaveTextDocument((document) => {
      if (document.languageId !== 'python' || !configService.scanOnSave()) return;
      scannerService.scanPaths([document.uri.fsPath]).catch((error: unknown) => {
        Logger.error(
          'Scan on save failed',
          error instanceof Error ? error : new Error(String(error))
        );
      });
    }),
    diagnosticsService,
    statusBarService
  );

  Logger.info('Mypy Sentinel extension activated');
}

export function deactivate(): void {
  Logger.info('Mypy Sentinel extension deactivating...');
  statusBarService?.dispose();
}
