import * as vscode from 'vscode';
import * as path from 'node:path';
import type { DocumentModel, FileEntry, FileHandle } from '@mypy-sentinel/core';

const ENCODINGS: Record<string, BufferEncoding> = {
  utf8: 'utf8',
  utf8bom: 'utf8',
  utf16le: 'utf16le',
  iso88591: 'latin1',
  windows1252: 'latin1',
};

/**
 * Document model over the workspace file system and open editor buffers
 */
export class VscodeDocumentModel implements DocumentModel {
  private readonly handles = new Map<string, FileHandle>();

  async listChildren(dirPath: string): Promise<FileEntry[]> {
    const entries = await vscode.workspace.fs.readDirectory(vscode.Uri.file(dirPath));
    return entries.map(([name, type]) => ({
      path: path.join(dirPath, name),
      isDirectory: (type & vscode.FileType.Directory) !== 0,
    }));
  }

  async stat(filePath: string): Promise<FileEntry | null> {
    const absolute = path.resolve(filePath);
    try {
      const info = await vscode.workspace.fs.stat(vscode.Uri.file(absolute));
      return {
        path: absolute,
        isDirectory: (info.type & vscode.FileType.Directory) !== 0,
      };
    } catch {
      return this.openDocument(absolute)
        ? { path: absolute, isDirectory: false }
        : null;
    }
  }

  findFile(filePath: string): FileHandle | null {
    const absolute = path.resolve(filePath);
    let handle = this.handles.get(absolute);
    if (!handle) {
      handle = { path: absolute };
      this.handles.set(absolute, handle);
    }
    return handle;
  }

  async currentText(handle: FileHandle): Promise<string> {
    const document = this.openDocument(handle.path);
    if (document) return document.getText();
    const text = await this.onDiskText(handle);
    if (text === null) {
      throw new Error(`${handle.path} is neither open nor on disk`);
    }
    return text;
  }

  async onDiskText(handle: FileHandle): Promise<string | null> {
    const uri = vscode.Uri.file(handle.path);
    try {
      const bytes = await vscode.workspace.fs.readFile(uri);
      return Buffer.from(bytes).toString(this.encoding(handle));
    } catch (error) {
      if (error instanceof vscode.FileSystemError && error.code === 'FileNotFound') {
        return null;
      }
      throw error;
    }
  }

  encoding(handle: FileHandle): BufferEncoding {
    const setting = vscode.workspace
      .getConfiguration('files', vscode.Uri.file(handle.path))
      .get('encoding', 'utf8');
    return ENCODINGS[setting] ?? 'utf8';
  }

  /**
   * The extension host runs on one thread and TextDocument.getText()
   * returns a consistent snapshot, so no lock is taken.
   */
  read<T>(action: () => Promise<T>): Promise<T> {
    return action();
  }

  private openDocument(filePath: string): vscode.TextDocument | undefined {
    return vscode.workspace.textDocuments.find(
      (document) =>
        document.uri.scheme === 'file' && path.resolve(document.uri.fsPath) === filePath
    );
  }
}
