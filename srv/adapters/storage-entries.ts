import { posix } from "path";
import type { Readable, Writable } from "node:stream";
import type { BlobProperties, IBlobStore } from "./interfaces/blob-storage.interface";
import type { IStorageFile, IStorageFolder } from "./interfaces/file-system.interface";
import { NotFoundError } from "../lib/storage-errors";
import { baseName, parentPath } from "../lib/storage-path";
import { readAll, writeAll } from "../lib/stream-utils";

/**
 * Handle over a live blob. Size and last-modified are captured when the
 * handle is created; reads and writes always go to the store.
 */
export class BlobStorageFile implements IStorageFile {
  readonly name: string;
  readonly size: number;
  readonly lastModified: Date;
  readonly fileType: string;

  constructor(
    private readonly store: IBlobStore,
    private readonly key: string,
    readonly path: string,
    properties: BlobProperties,
  ) {
    this.name = baseName(path);
    this.size = properties.size;
    this.lastModified = properties.lastModified;
    this.fileType = posix.extname(this.name);
  }

  openRead(): Promise<Readable> {
    return this.store.openRead(this.key);
  }

  openWrite(): Promise<Writable> {
    return this.store.openWrite(this.key);
  }

  async read(): Promise<Buffer> {
    return readAll(await this.openRead());
  }

  async write(content: Buffer | string): Promise<void> {
    await writeAll(await this.openWrite(), content);
  }
}

export class BlobStorageFolder implements IStorageFolder {
  readonly name: string;
  readonly lastModified = undefined;

  constructor(
    private readonly sizeOf: (path: string) => Promise<number>,
    readonly path: string,
  ) {
    this.name = baseName(path);
  }

  getSize(): Promise<number> {
    return this.sizeOf(this.path);
  }

  getParent(): IStorageFolder {
    if (this.path === "") {
      throw new NotFoundError("The root directory does not have a parent directory");
    }
    return new BlobStorageFolder(this.sizeOf, parentPath(this.path));
  }
}
