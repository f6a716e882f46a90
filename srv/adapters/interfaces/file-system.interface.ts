import type { Readable, Writable } from "node:stream";

export interface IStorageFile {
  /** Path relative to the file system root. */
  readonly path: string;
  readonly name: string;
  readonly size: number;
  readonly lastModified: Date;
  /** Extension including the dot, "" when the name has none. */
  readonly fileType: string;

  openRead(): Promise<Readable>;
  openWrite(): Promise<Writable>;
  read(): Promise<Buffer>;
  write(content: Buffer | string): Promise<void>;
}

export interface IStorageFolder {
  readonly path: string;
  readonly name: string;
  /** Object stores keep no folder timestamps. */
  readonly lastModified: undefined;

  getSize(): Promise<number>;
  /** Throws NotFoundError on the root folder. */
  getParent(): IStorageFolder;
}

/**
 * File/folder API over a flat object store.
 * Every path is relative to the configured root.
 */
export interface IStorageFileSystem {
  initialize(): Promise<void>;

  fileExists(path: string): Promise<boolean>;
  getFile(path: string): Promise<IStorageFile>;
  createFile(path: string): Promise<IStorageFile>;
  deleteFile(path: string): Promise<void>;
  renameFile(path: string, newPath: string): Promise<void>;
  listFiles(path?: string): AsyncIterable<IStorageFile>;

  /** May create `path` when nothing exists under it yet. */
  listFolders(path?: string): Promise<IStorageFolder[]>;
  getFolder(path: string): Promise<IStorageFolder>;
  createFolder(path: string): Promise<void>;
  deleteFolder(path: string): Promise<void>;
  renameFolder(path: string, newPath: string): Promise<void>;
  getFolderSize(path: string): Promise<number>;

  getPublicUrl(path: string): Promise<string>;
  getSignedUrl(path: string, expiryMinutes?: number): Promise<string>;
  getPathFromUrl(url: string): string;
}
