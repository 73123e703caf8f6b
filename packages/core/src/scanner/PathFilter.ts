import { isAbsolute, relative, resolve, sep } from 'node:path';
import type { FileHandle } from '../types/DocumentModel.js';

export interface PathFilterOptions {
  /** Extensions without the leading dot, e.g. `py` */
  sourceExtensions: readonly string[];
  /** Directories the project marks as source roots */
  sourceRoots: readonly string[];
  /** Every directory the project owns; used in checkAllFiles mode */
  projectRoots: readonly string[];
  checkAllFiles: boolean;
}

export type PathFilter = (handle: FileHandle) => boolean;

/**
 * Eligibility is extension plus containment, nothing else
 */
export function createPathFilter(options: PathFilterOptions): PathFilter {
  const extensions = new Set(
    options.sourceExtensions.map((ext) => ext.replace(/^\./, '').toLowerCase())
  );
  const roots = (options.checkAllFiles ? options.projectRoots : options.sourceRoots).map(
    (root) => resolve(root)
  );

  return (handle) =>
    extensions.has(extension(handle.path)) &&
    roots.some((root) => isWithin(root, handle.path));
}

export function isWithin(root: string, path: string): boolean {
  const rel = relative(root, resolve(path));
  return (
    rel !== '' && rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel)
  );
}

function extension(path: string): string {
  const name = path.replace(/\\/g, '/').split('/').pop() ?? '';
  const idx = name.lastIndexOf('.');
  return idx > 0 ? name.slice(idx + 1).toLowerCase() : '';
}
