import * as vscode from 'vscode';

/**
 * Service for managing the status bar
 */
export class StatusBarService implements vscode.Disposable {
  private readonly statusBarItem: vscode.StatusBarItem;
  private resetTimer: ReturnType<typeof setTimeout> | undefined;

  constructor() {
    this.statusBarItem = vscode.window.createStatusBarItem(
      vscode.StatusBarAlignment.Left,
      100
    );
    this.statusBarItem.command = 'mypySentinel.scanProject';
    this.showReady();
    this.statusBarItem.show();
  }

  /**
   * Show ready state
   */
  showReady(): void {
    this.statusBarItem.text = '$(check-all) mypy';
    this.statusBarItem.tooltip = 'Click to check the project with mypy';
    this.statusBarItem.backgroundColor = undefined;
  }

  /**
   * Show a scan in flight
   */
  showScanning(fileCount: number): void {
    this.clearResetTimer();
    this.statusBarItem.text = `$(sync~spin) mypy: checking ${fileCount} file${fileCount === 1 ? '' : 's'}`;
    this.statusBarItem.tooltip = 'Type checking in progress';
    this.statusBarItem.backgroundColor = undefined;
  }

  /**
   * Show scan complete
   */
  showScanComplete(issueCount: number): void {
    if (issueCount === 0) {
      this.statusBarItem.text = '$(pass) mypy: no issues';
      this.statusBarItem.backgroundColor = undefined;
    } else {
      this.statusBarItem.text = `$(warning) mypy: ${issueCount} issue${issueCount === 1 ? '' : 's'}`;
      this.statusBarItem.backgroundColor = new vscode.ThemeColor(
        'statusBarItem.warningBackground'
      );
    }
    this.statusBarItem.tooltip = 'Click to check again';
    this.scheduleReset();
  }

  /**
   * Show error state
   */
  showError(message: string): void {
    this.statusBarItem.text = '$(error) mypy failed';
    this.statusBarItem.tooltip = message;
    this.statusBarItem.backgroundColor = new vscode.ThemeColor(
      'statusBarItem.errorBackground'
    );
    this.scheduleReset();
  }

  dispose(): void {
    this.clearResetTimer();
    this.statusBarItem.dispose();
  }

  // Reset to ready state after 5 seconds
  private scheduleReset(): void {
    this.clearResetTimer();
    this.resetTimer = setTimeout(() => this.showReady(), 5000);
  }

  private clearResetTimer(): void {
    if (this.resetTimer) {
      clearTimeout(this.resetTimer);
      this.resetTimer = undefined;
    }
  }
}
