import { readFileSync, existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';

/**
 * Checker configuration options
 */
export interface CheckerConfig {
  /** mypy executable name or path */
  executable?: string;
  /** Extra arguments appended after the built-in ones */
  arguments?: string[];
  /** Explicit mypy config file; otherwise located in the project root */
  configFile?: string;
  /** Extensions (without dot) of files handed to the checker */
  sourceExtensions?: string[];
  /** Check every project file instead of source roots only */
  checkAllFiles?: boolean;
  /** Tab width used to translate reported columns */
  tabWidth?: number;
  /** Directory for snapshots of unsaved files */
  tempDir?: string;
}

/**
 * Configuration with every default filled in
 */
export type ResolvedCheckerConfig = Required<
  Omit<CheckerConfig, 'configFile' | 'tempDir'>
> &
  Pick<CheckerConfig, 'configFile' | 'tempDir'>;

/**
 * Default configuration values
 */
export const CheckerConfigDefaults = {
  DEFAULT_CONFIG_FILE: '.mypy-sentinel.yml',
  DEFAULT_EXECUTABLE: 'mypy',
  DEFAULT_TAB_WIDTH: 4,
  DEFAULT_SOURCE_EXTENSIONS: ['py', 'pyi'],
} as const;

/**
 * Load checker configuration from a YAML or JSON file, then apply
 * environment overrides and defaults
 */
export function loadCheckerConfig(
  path: string = CheckerConfigDefaults.DEFAULT_CONFIG_FILE
): ResolvedCheckerConfig {
  let base: CheckerConfig = {};

  if (existsSync(path)) {
    const content = readFileSync(path, 'utf-8');
    const parsed: unknown = path.endsWith('.json')
      ? JSON.parse(content)
      : parseYaml(content);
    base = toCheckerConfig(parsed);
  }

  return applyEnvOverrides(base);
}

/**
 * Keep only the recognised, well-typed keys of a parsed config document
 */
export function toCheckerConfig(value: unknown): CheckerConfig {
  const cfg: CheckerConfig = {};
  if (!isRecord(value)) return cfg;

  if (typeof value.executable === 'string') cfg.executable = value.executable;
  if (isStringArray(value.arguments)) cfg.arguments = value.arguments;
  if (typeof value.configFile === 'string') cfg.configFile = value.configFile;
  if (isStringArray(value.sourceExtensions)) {
    cfg.sourceExtensions = value.sourceExtensions;
  }
  if (typeof value.checkAllFiles === 'boolean') {
    cfg.checkAllFiles = value.checkAllFiles;
  }
  if (typeof value.tabWidth === 'number' && value.tabWidth > 0) {
    cfg.tabWidth = value.tabWidth;
  }
  if (typeof value.tempDir === 'string') cfg.tempDir = value.tempDir;

  return cfg;
}

/**
 * Apply environment variable overrides to configuration
 */
function applyEnvOverrides(config: CheckerConfig): ResolvedCheckerConfig {
  const cfg = { ...config };

  const executable = envString('MYPY_EXECUTABLE');
  if (executable) cfg.executable = executable;

  const args = envString('MYPY_ARGUMENTS');
  if (args) cfg.arguments = args.split(/\s+/);

  const configFile = envString('MYPY_CONFIG_FILE');
  if (configFile) cfg.configFile = configFile;

  const extensions = envList('SOURCE_EXTENSIONS');
  if (extensions) cfg.sourceExtensions = extensions;

  if ('CHECK_ALL_FILES' in process.env) {
    cfg.checkAllFiles = envBool('CHECK_ALL_FILES', false);
  }

  const tabWidth = envInt('TAB_WIDTH');
  if (tabWidth !== undefined && tabWidth > 0) cfg.tabWidth = tabWidth;

  const tempDir = envString('SCAN_TEMP_DIR');
  if (tempDir) cfg.tempDir = tempDir;

  return withDefaults(cfg);
}

export function withDefaults(config: CheckerConfig): ResolvedCheckerConfig {
  return {
    ...config,
    executable: config.executable ?? CheckerConfigDefaults.DEFAULT_EXECUTABLE,
    arguments: config.arguments ?? [],
    sourceExtensions: config.sourceExtensions ?? [
      ...CheckerConfigDefaults.DEFAULT_SOURCE_EXTENSIONS,
    ],
    checkAllFiles: config.checkAllFiles ?? false,
    tabWidth: config.tabWidth ?? CheckerConfigDefaults.DEFAULT_TAB_WIDTH,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function envString(key: string): string | undefined {
  const value = process.env[key];
  return value && value.trim() ? value.trim() : undefined;
}

function envList(key: string): string[] | undefined {
  const raw = envString(key);
  if (!raw) return undefined;
  const list = raw
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s);
  return list.length > 0 ? list : undefined;
}

function envBool(key: string, defaultValue: boolean): boolean {
  const value = process.env[key]?.trim().toLowerCase();
  if (value === '1' || value === 'true' || value === 'yes') return true;
  if (value === '0' || value === 'false' || value === 'no') return false;
  return defaultValue;
}

function envInt(key: string): number | undefined {
  const value = process.env[key];
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}
