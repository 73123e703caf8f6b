import * as vscode from 'vscode';
import type {
  Diagnostic,
  DiagnosticSeverity,
  ScanListener,
  ScanResult,
} from '@mypy-sentinel/core';

/**
 * Publishes scan results into the editor's Problems view
 */
export class DiagnosticsService implements ScanListener, vscode.Disposable {
  private readonly collection =
    vscode.languages.createDiagnosticCollection('mypy-sentinel');

  scanCompletedSuccessfully(result: ScanResult): void {
    for (const [file, diagnostics] of result) {
      this.collection.set(
        vscode.Uri.file(file.path),
        diagnostics.map((diagnostic) => toVscodeDiagnostic(diagnostic))
      );
    }
  }

  clear(): void {
    this.collection.clear();
  }

  dispose(): void {
    this.collection.dispose();
  }
}

export function countIssues(result: ScanResult): number {
  let count = 0;
  for (const diagnostics of result.values()) {
    count += diagnostics.filter((diagnostic) => diagnostic.severity !== 'note').length;
  }
  return count;
}

function toVscodeDiagnostic(diagnostic: Diagnostic): vscode.Diagnostic {
  const line = Math.max(diagnostic.line - 1, 0);
  const column = Math.max(diagnostic.column - 1, 0);
  const result = new vscode.Diagnostic(
    new vscode.Range(line, column, line, column),
    diagnostic.message,
    toSeverity(diagnostic.severity)
  );
  result.source = 'mypy';
  if (diagnostic.code) {
    result.code = diagnostic.code;
  }
  return result;
}

function toSeverity(severity: DiagnosticSeverity): vscode.DiagnosticSeverity {
  switch (severity) {
    case 'error':
      return vscode.DiagnosticSeverity.Error;
    case 'warning':
      return vscode.DiagnosticSeverity.Warning;
    case 'note':
      return vscode.DiagnosticSeverity.Information;
  }
}
