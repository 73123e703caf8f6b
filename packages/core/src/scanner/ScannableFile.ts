import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, dirname, join, relative } from 'node:path';
import type { DocumentModel, FileHandle } from '../types/DocumentModel.js';
import { ScanValidationError, toError } from '../errors.js';
import { getDefaultLogger, type ScanLogger } from '../utils/logger.js';
import { isWithin } from './PathFilter.js';

const TEMP_PREFIX = 'mypy-sentinel-';

export interface SnapshotOptions {
  /** Parent directory for snapshots; defaults to the OS temp directory */
  tempDir?: string;
  /**
   * Files under this directory keep their relative path inside the
   * snapshot directory, so package-qualified module names survive
   */
  projectRoot?: string;
  logger?: ScanLogger;
}

/**
 * A file handle paired with the path the checker will read. Unsaved
 * content is written to a private scratch directory under its
 * project-relative path (or base name); saved files are read in place.
 */
export class ScannableFile {
  private deleted = false;

  private constructor(
    readonly handle: FileHandle,
    readonly path: string,
    readonly isTemporary: boolean,
    private readonly scratchDir: string | null,
    private readonly logger: ScanLogger
  ) {}

  /**
   * Snapshot every handle. On failure, snapshots created so far are
   * released before the error is thrown.
   */
  static async createAndValidate(
    handles: Iterable<FileHandle>,
    model: DocumentModel,
    options: SnapshotOptions = {}
  ): Promise<ScannableFile[]> {
    const logger = options.logger ?? getDefaultLogger();
    const created: ScannableFile[] = [];
    const byPath = new Map<string, FileHandle>();

    try {
      await model.read(async () => {
        for (const handle of handles) {
          const file = await ScannableFile.create(handle, model, options, logger);
          created.push(file);
          const other = byPath.get(file.path);
          if (other && other !== handle) {
            throw new ScanValidationError(
              `${handle.path} and ${other.path} resolve to the same path`,
              handle.path
            );
          }
          byPath.set(file.path, handle);
        }
      });
    } catch (error) {
      await ScannableFile.releaseAll(created);
      throw error;
    }

    return created;
  }

  /**
   * Delete every temporary snapshot; one failure does not stop the rest
   */
  static async releaseAll(files: readonly ScannableFile[]): Promise<void> {
    await Promise.all(files.map((file) => file.deleteIfRequired()));
  }

  private static async create(
    handle: FileHandle,
    model: DocumentModel,
    options: SnapshotOptions,
    logger: ScanLogger
  ): Promise<ScannableFile> {
    let current: string;
    let onDisk: string | null;
    try {
      current = await model.currentText(handle);
      onDisk = await model.onDiskText(handle);
    } catch (error) {
      throw new ScanValidationError(
        `Cannot read ${handle.path}`,
        handle.path,
        toError(error)
      );
    }

    if (onDisk !== null && current === onDisk) {
      return new ScannableFile(handle, handle.path, false, null, logger);
    }

    let scratchDir: string | null = null;
    try {
      scratchDir = await mkdtemp(join(options.tempDir ?? tmpdir(), TEMP_PREFIX));
      const target = join(scratchDir, snapshotName(handle.path, options.projectRoot));
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, current, { encoding: model.encoding(handle) });
      logger.debug(`Snapshot of ${handle.path} written to ${target}`);
      return new ScannableFile(handle, target, true, scratchDir, logger);
    } catch (error) {
      if (scratchDir) {
        await rm(scratchDir, { recursive: true, force: true }).catch(
          (cleanupError: unknown) =>
            logger.warn(`Unable to remove ${scratchDir}`, toError(cleanupError))
        );
      }
      throw new ScanValidationError(
        `Cannot write a snapshot of ${handle.path}`,
        handle.path,
        toError(error)
      );
    }
  }

  /**
   * Remove the temporary copy, if any. Safe to call more than once;
   * failures are logged, never thrown.
   */
  async deleteIfRequired(): Promise<void> {
    if (!this.isTemporary || !this.scratchDir || this.deleted) return;
    this.deleted = true;
    try {
      await rm(this.scratchDir, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn(
        `Unable to delete temporary file ${this.path}`,
        toError(error)
      );
    }
  }
}

function snapshotName(path: string, projectRoot?: string): string {
  if (projectRoot && isWithin(projectRoot, path)) {
    return relative(projectRoot, path);
  }
  return basename(path);
}
