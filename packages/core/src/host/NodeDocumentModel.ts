import { existsSync } from 'node:fs';
import { readdir, readFile, stat } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import type { DocumentModel, FileEntry, FileHandle } from '../types/DocumentModel.js';

export interface NodeDocumentModelOptions {
  encoding?: BufferEncoding;
}

/**
 * File-system backed document model with an overlay of unsaved buffers.
 * Reads share a gate; overlay writes wait until no read is running.
 */
export class NodeDocumentModel implements DocumentModel {
  private readonly handles = new Map<string, FileHandle>();
  private readonly unsaved = new Map<string, string>();
  private readonly encodingName: BufferEncoding;
  private activeReaders = 0;
  private waitingWriters: Array<() => void> = [];

  constructor(options: NodeDocumentModelOptions = {}) {
    this.encodingName = options.encoding ?? 'utf8';
  }

  async listChildren(dirPath: string): Promise<FileEntry[]> {
    const dir = resolve(dirPath);
    const entries = await readdir(dir, { withFileTypes: true });
    const children: FileEntry[] = entries.map((entry) => ({
      path: join(dir, entry.name),
      isDirectory: entry.isDirectory(),
    }));
    const known = new Set(children.map((child) => child.path));
    for (const path of this.unsaved.keys()) {
      if (dirname(path) === dir && !known.has(path)) {
        children.push({ path, isDirectory: false });
      }
    }
    return children;
  }

  async stat(path: string): Promise<FileEntry | null> {
    const absolute = resolve(path);
    try {
      const info = await stat(absolute);
      return { path: absolute, isDirectory: info.isDirectory() };
    } catch {
      return this.unsaved.has(absolute)
        ? { path: absolute, isDirectory: false }
        : null;
    }
  }

  findFile(path: string): FileHandle | null {
    const absolute = resolve(path);
    const cached = this.handles.get(absolute);
    if (cached) return cached;
    if (!this.unsaved.has(absolute) && !existsSync(absolute)) return null;
    const handle: FileHandle = { path: absolute };
    this.handles.set(absolute, handle);
    return handle;
  }

  async currentText(handle: FileHandle): Promise<string> {
    const buffer = this.unsaved.get(handle.path);
    if (buffer !== undefined) return buffer;
    return readFile(handle.path, this.encodingName);
  }

  async onDiskText(handle: FileHandle): Promise<string | null> {
    try {
      return await readFile(handle.path, this.encodingName);
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  encoding(): BufferEncoding {
    return this.encodingName;
  }

  async read<T>(action: () => Promise<T>): Promise<T> {
    this.activeReaders += 1;
    try {
      return await action();
    } finally {
      this.activeReaders -= 1;
      if (this.activeReaders === 0) {
        const writers = this.waitingWriters;
        this.waitingWriters = [];
        writers.forEach((wake) => wake());
      }
    }
  }

  /**
   * Record an unsaved edit, as an editor buffer would hold it
   */
  async setUnsavedText(path: string, text: string): Promise<void> {
    await this.whenNoReaders();
    this.unsaved.set(resolve(path), text);
  }

  async discardUnsavedText(path: string): Promise<void> {
    await this.whenNoReaders();
    this.unsaved.delete(resolve(path));
  }

  private whenNoReaders(): Promise<void> {
    if (this.activeReaders === 0) return Promise.resolve();
    return new Promise((wake) => this.waitingWriters.push(wake));
  }
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
