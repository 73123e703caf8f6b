import * as vscode from 'vscode';
import type { ScanLogger } from '@mypy-sentinel/core';

const outputChannel = vscode.window.createOutputChannel('Mypy Sentinel');

function append(level: string, message: string, error?: Error): void {
  const timestamp = new Date().toISOString();
  outputChannel.appendLine(`[${timestamp}] ${level}: ${message}`);
  if (error?.stack) {
    outputChannel.appendLine(error.stack);
  }
}

/**
 * Logger utility for the extension; also handed to the scan core
 */
export const Logger = {
  debug(message: string): void {
    if (vscode.workspace.getConfiguration('mypySentinel').get('debugLogging', false)) {
      append('DEBUG', message);
    }
  },

  info(message: string): void {
    append('INFO', message);
  },

  warn(message: string, error?: Error): void {
    append('WARN', message, error);
  },

  error(message: string, error?: Error): void {
    append('ERROR', message, error);
  },

  show(): void {
    outputChannel.show();
  },
} satisfies ScanLogger & { show(): void };
