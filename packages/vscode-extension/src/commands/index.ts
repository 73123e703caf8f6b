import * as vscode from 'vscode';
import type { ScannerService } from '../services/ScannerService';
import type { ConfigService } from '../services/ConfigService';
import type { DiagnosticsService } from '../services/DiagnosticsService';
import { Logger } from '../utils/logger';

/**
 * Register all extension commands
 */
export function registerCommands(
  context: vscode.ExtensionContext,
  scannerService: ScannerService,
  configService: ConfigService,
  diagnosticsService: DiagnosticsService
): void {
  context.subscriptions.push(
    vscode.commands.registerCommand('mypySentinel.scanProject', async () => {
      Logger.info('Command: scanProject');
      await scannerService.scanProject();
    })
  );

  // Explorer context menus pass the clicked item and the whole selection
  context.subscriptions.push(
    vscode.commands.registerCommand(
      'mypySentinel.scanFile',
      async (uri?: vscode.Uri, selected?: vscode.Uri[]) => {
        Logger.info('Command: scanFile');

        let paths: string[];
        if (selected && selected.length > 0) {
          paths = selected.map((item) => item.fsPath);
        } else if (uri) {
          paths = [uri.fsPath];
        } else if (vscode.window.activeTextEditor) {
          paths = [vscode.window.activeTextEditor.document.uri.fsPath];
        } else {
          void vscode.window.showErrorMessage('No file selected');
          return;
        }

        await scannerService.scanPaths(paths);
      }
    )
  );

  context.subscriptions.push(
    vscode.commands.registerCommand('mypySentinel.scanModifiedFiles', async () => {
      Logger.info('Command: scanModifiedFiles');
      await scannerService.scanModifiedFiles();
    })
  );

  context.subscriptions.push(
    vscode.commands.registerCommand('mypySentinel.cancelScan', () => {
      Logger.info('Command: cancelScan');
      scannerService.cancel();
    })
  );

  context.subscriptions.push(
    vscode.commands.registerCommand('mypySentinel.clearDiagnostics', () => {
      Logger.info('Command: clearDiagnostics');
      diagnosticsService.clear();
    })
  );

  context.subscriptions.push(
    vscode.commands.registerCommand('mypySentinel.configure', () => {
      Logger.info('Command: configure');
      configService.openSettings();
    })
  );

  context.subscriptions.push(
    vscode.commands.registerCommand('mypySentinel.showOutput', () => {
      Logger.show();
    })
  );
}
