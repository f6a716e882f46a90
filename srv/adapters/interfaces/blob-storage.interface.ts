import type { Readable, Writable } from "node:stream";

/** Container visibility: no anonymous access, or public read of blobs and listings. */
export type ContainerAccess = "private" | "container";

/** One entry of a delimiter ("/") listing: a blob, or a common key prefix. */
export type BlobEntry =
  | { kind: "file"; key: string; size: number; lastModified: Date }
  | { kind: "directory"; prefix: string };

export interface BlobProperties {
  size: number;
  lastModified: Date;
}

export interface BlobPage {
  entries: BlobEntry[];
  /** Absent on the last page. */
  continuationToken?: string;
}

/**
 * Flat, prefix-addressed object store bound to one container.
 * Missing keys make `openRead`, `copy` and `delete` reject with NotFoundError.
 */
export interface IBlobStore {
  readonly containerName: string;
  /** Container URL; object URLs are `${baseUrl}/${key}`. */
  readonly baseUrl: string;

  /** Create the container if absent and apply the access policy. Idempotent. */
  ensureContainer(access: ContainerAccess): Promise<void>;
  exists(key: string): Promise<boolean>;
  getProperties(key: string): Promise<BlobProperties | undefined>;
  openRead(key: string): Promise<Readable>;
  /** The object is committed once the returned stream emits "finish". */
  openWrite(key: string): Promise<Writable>;
  copy(sourceKey: string, targetKey: string): Promise<void>;
  delete(key: string): Promise<void>;
  /** Entries directly under `prefix`, in key order. */
  listPage(prefix: string, continuationToken?: string): Promise<BlobPage>;
  getUrl(key: string): string;
  generateSignedUrl(key: string, expiryMinutes: number): Promise<string>;
}
