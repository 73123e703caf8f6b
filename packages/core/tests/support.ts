import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { CheckerRequest, CheckerRunner } from '../src/checker/CheckerRunner.js';
import type { ScanLogger } from '../src/utils/logger.js';

export function createTempDir(): string {
  return realpathSync(mkdtempSync(join(tmpdir(), 'mypy-sentinel-test-')));
}

export function createTempProject(files: Record<string, string>): string {
  const root = createTempDir();
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = join(root, relativePath);
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, content, 'utf8');
  }
  return root;
}

export function removeTempDir(path: string): void {
  rmSync(path, { recursive: true, force: true });
}

export const silentLogger: ScanLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Runner stand-in that records requests and answers from a callback
 */
export class FakeRunner implements CheckerRunner {
  readonly calls: CheckerRequest[] = [];

  constructor(
    private readonly respond: (request: CheckerRequest) => Promise<string[]> | string[] = () => []
  ) {}

  async run(request: CheckerRequest): Promise<string[]> {
    this.calls.push(request);
    return this.respond(request);
  }
}
