/**
 * Reference to a file owned by the host's document model. The core only
 * reads through it; identity is stable per path so handles can key maps.
 */
export interface FileHandle {
  /** Absolute, normalized path */
  readonly path: string;
}

export interface FileEntry {
  path: string;
  isDirectory: boolean;
}

/**
 * Capabilities the scan core needs from the host editor
 */
export interface DocumentModel {
  /** Lists the direct children of a directory; rejects if it cannot be read */
  listChildren(dirPath: string): Promise<FileEntry[]>;

  /** Returns null when nothing exists at the path */
  stat(path: string): Promise<FileEntry | null>;

  /** Maps a path to its handle, or null if the host has no such file */
  findFile(path: string): FileHandle | null;

  /** Current, possibly unsaved, content */
  currentText(handle: FileHandle): Promise<string>;

  /** Last saved content, or null when the file has never been written */
  onDiskText(handle: FileHandle): Promise<string | null>;

  encoding(handle: FileHandle): BufferEncoding;

  /**
   * Runs an action under the model's shared read lock. Content reads
   * happen inside it; it is never held across the checker invocation.
   */
  read<T>(action: () => Promise<T>): Promise<T>;
}
