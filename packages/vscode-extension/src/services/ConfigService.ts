import * as vscode from 'vscode';
import * as path from 'node:path';
import {
  CheckerConfigDefaults,
  loadCheckerConfig,
  withDefaults,
  type ResolvedCheckerConfig,
} from '@mypy-sentinel/core';
import { Logger } from '../utils/logger';

const CONFIG_SECTION = 'mypySentinel';

/**
 * Service for reading extension configuration
 */
export class ConfigService {
  /**
   * Get the checker configuration for the current workspace. A
   * `.mypy-sentinel.yml` in the first workspace folder supplies the base;
   * settings the user has set explicitly take precedence over it.
   */
  getConfig(): ResolvedCheckerConfig {
    const config = vscode.workspace.getConfiguration(CONFIG_SECTION);
    const base = this.loadWorkspaceFile();
    const explicit = <T>(key: string): T | undefined => {
      const inspected = config.inspect<T>(key);
      return (
        inspected?.workspaceFolderValue ??
        inspected?.workspaceValue ??
        inspected?.globalValue
      );
    };

    return withDefaults({
      executable: explicit<string>('executable') ?? base.executable,
      arguments: explicit<string[]>('arguments') ?? base.arguments,
      configFile: explicit<string>('configFile') || base.configFile,
      sourceExtensions: explicit<string[]>('sourceExtensions') ?? base.sourceExtensions,
      checkAllFiles: explicit<boolean>('checkAllFiles') ?? base.checkAllFiles,
      tabWidth: explicit<number>('tabWidth') ?? base.tabWidth,
      tempDir: explicit<string>('tempDir') || base.tempDir,
    });
  }

  private loadWorkspaceFile(): ResolvedCheckerConfig {
    const root = this.getProjectRoots()[0];
    if (!root) return withDefaults({});
    const file = path.join(root, CheckerConfigDefaults.DEFAULT_CONFIG_FILE);
    try {
      return loadCheckerConfig(file);
    } catch (error) {
      Logger.warn(
        `Ignoring unreadable ${file}`,
        error instanceof Error ? error : new Error(String(error))
      );
      return withDefaults({});
    }
  }

  /**
   * Workspace folder paths; the first one is the checker's working directory
   */
  getProjectRoots(): string[] {
    return (vscode.workspace.workspaceFolders ?? []).map((folder) => folder.uri.fsPath);
  }

  /**
   * Source roots resolved against every workspace folder
   */
  getSourceRoots(): string[] {
    const relativeRoots = vscode.workspace
      .getConfiguration(CONFIG_SECTION)
      .get<string[]>('sourceRoots', ['.']);
    return this.getProjectRoots().flatMap((root) =>
      relativeRoots.map((relativeRoot) => path.resolve(root, relativeRoot))
    );
  }

  /**
   * Whether saving a Python file triggers a scan of that file
   */
  scanOnSave(): boolean {
    return vscode.workspace
      .getConfiguration(CONFIG_SECTION)
      .get('scanOnSave', true);
  }

  /**
   * Open settings UI
   */
  openSettings(): void {
    void vscode.commands.executeCommand(
      'workbench.action.openSettings',
      `@ext:mypy-sentinel.mypy-sentinel-vscode`
    );
  }
}
