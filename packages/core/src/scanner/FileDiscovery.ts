import type { DocumentModel, FileEntry, FileHandle } from '../types/DocumentModel.js';
import { throwIfCancelled } from '../errors.js';

/**
 * Recursively expand roots into the files beneath them. A root that is a
 * file is returned as is. Unreadable roots and subtrees are skipped.
 */
export async function discoverFiles(
  model: DocumentModel,
  roots: readonly string[],
  signal?: AbortSignal
): Promise<FileHandle[]> {
  const found = new Map<string, FileHandle>();
  const collect = (path: string): void => {
    const handle = model.findFile(path);
    if (handle) found.set(handle.path, handle);
  };

  for (const root of roots) {
    throwIfCancelled(signal);
    const entry = await model.stat(root);
    if (!entry) continue;
    if (entry.isDirectory) {
      await walk(model, entry.path, collect, signal);
    } else {
      collect(entry.path);
    }
  }

  return [...found.values()];
}

async function walk(
  model: DocumentModel,
  dir: string,
  onFile: (path: string) => void,
  signal?: AbortSignal
): Promise<void> {
  throwIfCancelled(signal);
  let entries: FileEntry[];
  try {
    entries = await model.listChildren(dir);
  } catch {
    return;
  }
  for (const entry of entries) {
    if (entry.isDirectory) {
      await walk(model, entry.path, onFile, signal);
    } else {
      onFile(entry.path);
    }
  }
}
