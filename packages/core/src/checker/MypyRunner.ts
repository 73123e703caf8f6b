import { spawn } from 'node:child_process';
import { existsSync } from 'node:fs';
import { isAbsolute, join } from 'node:path';
import type { CheckerRequest, CheckerRunner } from './CheckerRunner.js';
import type { ResolvedCheckerConfig } from '../config/CheckerConfig.js';
import { ScanCancelledError, ToolInvocationError, throwIfCancelled } from '../errors.js';
import { getDefaultLogger, type ScanLogger } from '../utils/logger.js';

const BASE_ARGUMENTS = [
  '--show-column-numbers',
  '--show-error-codes',
  '--no-color-output',
  '--no-error-summary',
  '--no-pretty',
  '--follow-imports',
  'silent',
] as const;

/** mypy exits 1 when it found issues; that is a normal run */
const SUCCESS_EXIT_CODES = new Set([0, 1]);

/** Blocking errors such as a syntax error; reported on stdout like any other */
const BLOCKING_EXIT_CODE = 2;

const CONFIG_FILE_NAMES = ['mypy.ini', '.mypy.ini', 'pyproject.toml', 'setup.cfg'];

/**
 * Find the mypy configuration for a project. Only its location matters;
 * mypy reads it.
 */
export function locateConfigFile(
  projectRoot: string,
  explicit?: string
): string | null {
  if (explicit) {
    const path = isAbsolute(explicit) ? explicit : join(projectRoot, explicit);
    if (existsSync(path)) return path;
  }
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = join(projectRoot, name);
    if (existsSync(candidate)) return candidate;
  }
  return null;
}

export function buildMypyArguments(
  config: ResolvedCheckerConfig,
  configFile: string | null,
  paths: readonly string[]
): string[] {
  const args: string[] = [...BASE_ARGUMENTS];
  if (configFile) {
    args.push('--config-file', configFile);
  }
  args.push(...config.arguments.filter(Boolean), ...paths);
  return args;
}

/**
 * Exit 2 with nothing on stderr is mypy reporting a blocking error in a
 * checked file; exit 2 with stderr is a usage or configuration failure
 */
function isNormalExit(exitCode: number | null, stderr: string): boolean {
  if (exitCode === null) return false;
  if (SUCCESS_EXIT_CODES.has(exitCode)) return true;
  return exitCode === BLOCKING_EXIT_CODE && stderr.trim() === '';
}

/**
 * Spawns mypy over the materialized paths
 */
export class MypyRunner implements CheckerRunner {
  private readonly logger: ScanLogger;

  constructor(
    private readonly config: ResolvedCheckerConfig,
    logger?: ScanLogger
  ) {
    this.logger = logger ?? getDefaultLogger();
  }

  async run(request: CheckerRequest): Promise<string[]> {
    throwIfCancelled(request.signal);
    const configFile = locateConfigFile(request.projectRoot, this.config.configFile);
    const args = buildMypyArguments(this.config, configFile, request.paths);
    this.logger.debug(`Running ${this.config.executable} ${args.join(' ')}`);

    const { exitCode, stdout, stderr } = await this.spawnChecker(
      args,
      request.projectRoot,
      request.signal
    );

    if (!isNormalExit(exitCode, stderr)) {
      throw new ToolInvocationError(
        `${this.config.executable} exited with code ${exitCode ?? 'unknown'}: ${
          stderr.trim() || stdout.trim()
        }`.slice(0, 1000),
        exitCode,
        stderr
      );
    }

    return stdout.split(/\r?\n/).filter((line) => line.length > 0);
  }

  private spawnChecker(
    args: string[],
    cwd: string,
    signal?: AbortSignal
  ): Promise<{ exitCode: number | null; stdout: string; stderr: string }> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.config.executable, args, {
        cwd,
        signal,
        windowsHide: true,
      });
      let stdout = '';
      let stderr = '';
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        if (signal?.aborted || error.name === 'AbortError') {
          reject(new ScanCancelledError());
          return;
        }
        reject(
          new ToolInvocationError(
            error.code === 'ENOENT'
              ? `${this.config.executable} was not found; check the executable setting`
              : `Unable to start ${this.config.executable}: ${error.message}`,
            null,
            stderr,
            error
          )
        );
      });

      child.on('close', (exitCode) => {
        if (signal?.aborted) {
          reject(new ScanCancelledError());
          return;
        }
        resolve({ exitCode, stdout, stderr });
      });
    });
  }
}
