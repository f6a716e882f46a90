import cds from "@sap/cds";
import type { BlobEntry, IBlobStore } from "./interfaces/blob-storage.interface";
import type {
  IStorageFile,
  IStorageFileSystem,
  IStorageFolder,
} from "./interfaces/file-system.interface";
import { BlobStorageFile, BlobStorageFolder } from "./storage-entries";
import { isFolderMarker, markerKey } from "../lib/folder-marker";
import {
  AlreadyExistsError,
  InvalidPathError,
  NotFoundError,
  StoreFailureError,
} from "../lib/storage-errors";
import {
  normalizePath,
  relativePathFromUrl,
  toFolderPrefix,
  toRelativePath,
  toRootPrefix,
  trimTrailingSlashes,
} from "../lib/storage-path";
import { writeAll } from "../lib/stream-utils";

const LOG = cds.log("blob-fs");

export interface BlobFileSystemOptions {
  /** Prefix inside the container; empty means the whole container. */
  root?: string;
  /** Defaults to true. A public file system allows anonymous read of the container. */
  isPrivate?: boolean;
}

/**
 * Hierarchical file system over a flat blob container.
 *
 * Folders do not exist in the store: they are common key prefixes, made
 * durable by a hidden marker object. Renames are copy-then-delete and
 * recursive operations run sequentially without rollback, so a failure
 * part-way leaves a partially applied result (both copies of a file, or a
 * half-moved tree) and the error is rethrown to the caller.
 */
export class BlobFileSystem implements IStorageFileSystem {
  readonly rootPrefix: string;
  private readonly isPrivate: boolean;
  private binding: Promise<void> | null = null;

  constructor(
    private readonly store: IBlobStore,
    options: BlobFileSystemOptions = {},
  ) {
    this.rootPrefix = toRootPrefix(options.root);
    this.isPrivate = options.isPrivate ?? true;
  }

  get containerName(): string {
    return this.store.containerName;
  }

  /**
   * Bind to the container: create it when absent and apply the access policy.
   * Runs once; a failed attempt is retried on the next call.
   */
  initialize(): Promise<void> {
    if (!this.binding) {
      const access = this.isPrivate ? "private" : "container";
      this.binding = this.store.ensureContainer(access).then(
        () => {
          LOG.info(`Bound to container '${this.containerName}' (${access})`);
        },
        (err: unknown) => {
          this.binding = null;
          throw err;
        },
      );
    }
    return this.binding;
  }

  // ─── Files ──────────────────────────────────────────────────────────────

  async fileExists(path: string): Promise<boolean> {
    const key = this.fileKey(path);
    await this.initialize();
    return this.store.exists(key);
  }

  async getFile(path: string): Promise<IStorageFile> {
    const key = this.fileKey(path);
    await this.initialize();
    const properties = await this.store.getProperties(key);
    if (!properties) {
      throw new NotFoundError(`File ${path} does not exist`);
    }
    return new BlobStorageFile(this.store, key, path, properties);
  }

  async createFile(path: string): Promise<IStorageFile> {
    const key = this.fileKey(path);
    await this.initialize();
    if (await this.store.exists(key)) {
      throw new AlreadyExistsError(`File ${path} already exists`);
    }
    await this.touch(key);
    LOG.debug(`Created file ${key}`);
    return this.getFile(path);
  }

  async deleteFile(path: string): Promise<void> {
    const key = this.fileKey(path);
    await this.initialize();
    if (!(await this.store.exists(key))) {
      throw new NotFoundError(`File ${path} does not exist`);
    }
    await this.store.delete(key);
    LOG.debug(`Deleted file ${key}`);
  }

  /**
   * Copy then delete. A failure after the copy leaves both objects in place.
   */
  async renameFile(path: string, newPath: string): Promise<void> {
    const key = this.fileKey(path);
    const newKey = this.fileKey(newPath);
    await this.initialize();

    if (!(await this.store.exists(key))) {
      throw new NotFoundError(`File ${path} does not exist`);
    }
    if (await this.store.exists(newKey)) {
      throw new AlreadyExistsError(`File ${newPath} already exists`);
    }

    await this.store.copy(key, newKey);
    await this.store.delete(key);
    LOG.debug(`Renamed file ${key} to ${newKey}`);
  }

  /** Files directly under `path`, fetched page by page as the caller iterates. */
  async *listFiles(path = ""): AsyncGenerator<IStorageFile> {
    const prefix = toFolderPrefix(this.rootPrefix, path);
    await this.initialize();

    for await (const entry of this.entries(prefix)) {
      if (entry.kind !== "file" || isFolderMarker(entry.key)) continue;
      yield new BlobStorageFile(this.store, entry.key, this.relative(entry.key), entry);
    }
  }

  async getPublicUrl(path: string): Promise<string> {
    const key = this.fileKey(path);
    await this.initialize();
    if (!(await this.store.exists(key))) {
      throw new NotFoundError(`File ${path} does not exist`);
    }
    return this.store.getUrl(key);
  }

  /** Time-limited read URL, for files in private containers. */
  async getSignedUrl(path: string, expiryMinutes = 60): Promise<string> {
    const key = this.fileKey(path);
    await this.initialize();
    if (!(await this.store.exists(key))) {
      throw new NotFoundError(`File ${path} does not exist`);
    }
    return this.store.generateSignedUrl(key, expiryMinutes);
  }

  /** Inverse of getPublicUrl. */
  getPathFromUrl(url: string): string {
    return relativePathFromUrl(`${this.store.baseUrl}/${this.rootPrefix}`, url);
  }

  // ─── Folders ────────────────────────────────────────────────────────────

  /**
   * Immediate sub-folders of `path`. When nothing exists under `path` yet,
   * the folder is created first.
   */
  async listFolders(path = ""): Promise<IStorageFolder[]> {
    const prefix = toFolderPrefix(this.rootPrefix, path);
    await this.initialize();

    if (!(await this.prefixExists(prefix))) {
      try {
        await this.createFolder(path);
        LOG.info(`Created missing folder '${path}' while listing`);
      } catch (err) {
        // created concurrently by another caller
        if (!(err instanceof AlreadyExistsError)) {
          throw new StoreFailureError(`The folder could not be created at path: ${path}`, {
            cause: err,
          });
        }
      }
    }

    const folders: IStorageFolder[] = [];
    for await (const entry of this.entries(prefix)) {
      if (entry.kind === "directory") {
        folders.push(this.folder(this.relative(entry.prefix)));
      }
    }
    return folders;
  }

  async getFolder(path: string): Promise<IStorageFolder> {
    const prefix = toFolderPrefix(this.rootPrefix, path);
    const folderPath = trimTrailingSlashes(path);
    await this.initialize();
    if (folderPath !== "" && !(await this.prefixExists(prefix))) {
      throw new NotFoundError(`Directory ${path} does not exist`);
    }
    return this.folder(folderPath);
  }

  async createFolder(path: string): Promise<void> {
    const prefix = toFolderPrefix(this.rootPrefix, path);
    await this.initialize();
    if (await this.prefixExists(prefix)) {
      throw new AlreadyExistsError(`Directory ${path} already exists`);
    }
    await this.touch(markerKey(prefix));
    LOG.debug(`Created folder ${prefix}`);
  }

  /** Depth-first delete of every object under `path`, markers included. */
  async deleteFolder(path: string): Promise<void> {
    const prefix = toFolderPrefix(this.rootPrefix, path);
    await this.initialize();
    if (!(await this.prefixExists(prefix))) {
      throw new NotFoundError(`Directory ${path} does not exist`);
    }
    await this.deletePrefix(prefix);
    LOG.debug(`Deleted folder ${prefix}`);
  }

  /**
   * Move every object (markers included) and sub-folder of `path` under `newPath`,
   * one renameFile at a time.
   */
  async renameFolder(path: string, newPath: string): Promise<void> {
    const prefix = toFolderPrefix(this.rootPrefix, path);
    const newPrefix = toFolderPrefix(this.rootPrefix, newPath);

    if (prefix === this.rootPrefix || newPrefix === this.rootPrefix) {
      throw new InvalidPathError("The root directory cannot be renamed");
    }
    if (prefix === newPrefix) return;
    if (newPrefix.startsWith(prefix)) {
      throw new InvalidPathError(`Cannot move directory ${path} into itself (${newPath})`);
    }

    await this.initialize();
    if (!(await this.prefixExists(prefix))) {
      throw new NotFoundError(`Directory ${path} does not exist`);
    }
    await this.renamePrefix(prefix, newPrefix);
    LOG.debug(`Renamed folder ${prefix} to ${newPrefix}`);
  }

  /**
   * Sum of every object size under `path`, recursively. Marker objects are
   * counted (they are empty). Recomputed on every call.
   */
  async getFolderSize(path: string): Promise<number> {
    const prefix = toFolderPrefix(this.rootPrefix, path);
    await this.initialize();
    return this.sizeOfPrefix(prefix);
  }

  // ─── Internals ──────────────────────────────────────────────────────────

  private fileKey(path: string): string {
    if (!path) {
      throw new InvalidPathError("File path must not be empty");
    }
    return normalizePath(this.rootPrefix, path);
  }

  private relative(key: string): string {
    return trimTrailingSlashes(toRelativePath(this.rootPrefix, key));
  }

  private folder(path: string): IStorageFolder {
    return new BlobStorageFolder((p) => this.getFolderSize(p), path);
  }

  /** Materialize an empty object by opening a write stream and closing it. */
  private async touch(key: string): Promise<void> {
    await writeAll(await this.store.openWrite(key), Buffer.alloc(0));
  }

  private async *entries(prefix: string): AsyncGenerator<BlobEntry> {
    let continuationToken: string | undefined;
    do {
      const page = await this.store.listPage(prefix, continuationToken);
      yield* page.entries;
      continuationToken = page.continuationToken;
    } while (continuationToken);
  }

  private async collect(prefix: string): Promise<BlobEntry[]> {
    const entries: BlobEntry[] = [];
    for await (const entry of this.entries(prefix)) {
      entries.push(entry);
    }
    return entries;
  }

  /** A page can be empty and still carry a continuation token. */
  private async prefixExists(prefix: string): Promise<boolean> {
    const entries = this.entries(prefix);
    const first = await entries.next();
    await entries.return(undefined);
    return !first.done;
  }

  private async deletePrefix(prefix: string): Promise<void> {
    // snapshot first: deleting while paging would shift the continuation
    for (const entry of await this.collect(prefix)) {
      if (entry.kind === "file") {
        await this.store.delete(entry.key);
      } else {
        await this.deletePrefix(entry.prefix);
      }
    }
  }

  private async renamePrefix(prefix: string, newPrefix: string): Promise<void> {
    for (const entry of await this.collect(prefix)) {
      if (entry.kind === "file") {
        const name = entry.key.slice(prefix.length);
        await this.renameFile(this.relative(entry.key), this.relative(newPrefix + name));
      } else {
        const name = entry.prefix.slice(prefix.length);
        await this.renamePrefix(entry.prefix, newPrefix + name);
      }
    }
  }

  private async sizeOfPrefix(prefix: string): Promise<number> {
    let size = 0;
    for await (const entry of this.entries(prefix)) {
      size += entry.kind === "file" ? entry.size : await this.sizeOfPrefix(entry.prefix);
    }
    return size;
  }
}
