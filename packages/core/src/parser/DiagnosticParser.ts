import { isAbsolute, normalize, resolve } from 'node:path';
import type { DocumentModel, FileHandle } from '../types/DocumentModel.js';
import type { Diagnostic, DiagnosticSeverity, ScanResult } from '../types/Diagnostic.js';

export interface ParseOptions {
  /** Width the checker assumes for a tab when reporting columns */
  tabWidth: number;
  /** Directory relative paths in the output are resolved against */
  baseDir: string;
  /** Materialized path -> handle; every entry appears in the result */
  filesByPath: ReadonlyMap<string, FileHandle>;
  model: DocumentModel;
}

export interface RawDiagnostic {
  path: string;
  line: number;
  column: number | null;
  severity: DiagnosticSeverity;
  message: string;
  code: string | null;
}

// path:line[:col]: severity: message
const LINE_PATTERN = /^(.+?):(\d+)(?::(\d+))?:\s*(\w+):\s?(.*)$/;
const ERROR_CODE_PATTERN = /\s+\[([a-z0-9_-]+)\]$/i;
const SEVERITIES: readonly DiagnosticSeverity[] = ['error', 'warning', 'note'];

/**
 * Parse one line of checker output; null for anything that is not a
 * diagnostic (banners, summaries, blank lines)
 */
export function parseDiagnosticLine(raw: string): RawDiagnostic | null {
  const match = LINE_PATTERN.exec(raw.trimEnd());
  if (!match) return null;
  const [, path, lineText, columnText, severityText, messageText] = match;
  if (!path || !lineText || severityText === undefined) return null;

  const line = Number.parseInt(lineText, 10);
  const column = columnText ? Number.parseInt(columnText, 10) : null;
  if (Number.isNaN(line)) return null;

  let message = messageText ?? '';
  let code: string | null = null;
  const codeMatch = ERROR_CODE_PATTERN.exec(message);
  if (codeMatch?.[1]) {
    code = codeMatch[1];
    message = message.slice(0, codeMatch.index);
  }

  return {
    path,
    line,
    column,
    severity: toSeverity(severityText),
    message,
    code,
  };
}

function toSeverity(value: string): DiagnosticSeverity {
  const lower = value.toLowerCase();
  return SEVERITIES.find((severity) => severity === lower) ?? 'error';
}

/**
 * Turn raw checker output into diagnostics per file. Lines for paths
 * outside the scanned set are dropped; order within a file is kept.
 */
export async function parseDiagnostics(
  lines: readonly string[],
  options: ParseOptions
): Promise<ScanResult> {
  const { model, filesByPath } = options;
  const problems = new Map<FileHandle, Diagnostic[]>();
  for (const handle of filesByPath.values()) {
    problems.set(handle, []);
  }

  await model.read(async () => {
    const sourceLines = new Map<FileHandle, string[] | null>();

    for (const raw of lines) {
      const parsed = parseDiagnosticLine(raw);
      if (!parsed) continue;

      const path = normalize(
        isAbsolute(parsed.path) ? parsed.path : resolve(options.baseDir, parsed.path)
      );
      const handle = filesByPath.get(path);
      if (!handle) continue;

      let source = sourceLines.get(handle);
      if (source === undefined) {
        source = await readLines(model, handle);
        sourceLines.set(handle, source);
      }

      const column =
        parsed.column === null
          ? 1
          : toCharacterColumn(source?.[parsed.line - 1], parsed.column, options.tabWidth);

      problems.get(handle)?.push({
        file: handle,
        severity: parsed.severity,
        message: parsed.message,
        line: parsed.line,
        column,
        code: parsed.code,
      });
    }
  });

  return problems;
}

/**
 * Translate a 1-indexed visual column into a 1-indexed character offset
 * for lines indented with tabs. Other lines are returned unchanged.
 */
export function toCharacterColumn(
  sourceLine: string | undefined,
  column: number,
  tabWidth: number
): number {
  if (!sourceLine?.startsWith('\t') || tabWidth <= 1) return column;
  const target = column - 1;
  let visual = 0;
  let offset = 0;
  while (offset < sourceLine.length && visual < target) {
    const ch = sourceLine[offset];
    if (ch !== '\t' && ch !== ' ') {
      return offset + (target - visual) + 1;
    }
    visual = ch === '\t' ? visual + tabWidth - (visual % tabWidth) : visual + 1;
    offset += 1;
  }
  return offset + 1;
}

async function readLines(
  model: DocumentModel,
  handle: FileHandle
): Promise<string[] | null> {
  try {
    return (await model.currentText(handle)).split(/\r?\n/);
  } catch {
    return null;
  }
}
