import { Readable, Writable } from "node:stream";
import type {
  BlobEntry,
  BlobPage,
  BlobProperties,
  ContainerAccess,
  IBlobStore,
} from "../interfaces/blob-storage.interface";
import { NotFoundError, StoreFailureError } from "../../lib/storage-errors";

interface StoredObject {
  content: Buffer;
  lastModified: Date;
}

export type BlobOperation =
  | "ensureContainer"
  | "exists"
  | "getProperties"
  | "openRead"
  | "openWrite"
  | "copy"
  | "delete"
  | "listPage"
  | "generateSignedUrl";

export interface MockBlobStorageOptions {
  baseUrl?: string;
  pageSize?: number;
}

/**
 * In-memory blob container used for development and tests.
 * Mirrors the listing, copy and not-found behavior of the Azure adapter.
 */
export class MockBlobStorageAdapter implements IBlobStore {
  readonly baseUrl: string;
  /** Access policy applied by the last ensureContainer call; null until bound. */
  access: ContainerAccess | null = null;
  ensureContainerCalls = 0;

  private objects = new Map<string, StoredObject>();
  private failures = new Map<BlobOperation, number>();
  private pageSize: number;

  constructor(
    readonly containerName: string,
    options: MockBlobStorageOptions = {},
  ) {
    this.baseUrl = `${options.baseUrl || "https://storage.blob.core.windows.net"}/${containerName}`;
    this.pageSize = options.pageSize || 5000;
  }

  /**
   * Make `operation` reject with StoreFailureError after `calls` more successful calls.
   */
  failAfter(operation: BlobOperation, calls = 0): void {
    this.failures.set(operation, calls);
  }

  /** Keys currently stored, sorted. */
  keys(): string[] {
    return [...this.objects.keys()].sort();
  }

  async ensureContainer(access: ContainerAccess): Promise<void> {
    this.checkFailure("ensureContainer");
    this.ensureContainerCalls++;
    this.access = access;
  }

  async exists(key: string): Promise<boolean> {
    this.checkFailure("exists");
    return this.objects.has(key);
  }

  async getProperties(key: string): Promise<BlobProperties | undefined> {
    this.checkFailure("getProperties");
    const obj = this.objects.get(key);
    if (!obj) return undefined;
    return { size: obj.content.length, lastModified: obj.lastModified };
  }

  async openRead(key: string): Promise<Readable> {
    this.checkFailure("openRead");
    const obj = this.require(key);
    return Readable.from([Buffer.from(obj.content)]);
  }

  async openWrite(key: string): Promise<Writable> {
    this.checkFailure("openWrite");
    const chunks: Buffer[] = [];
    return new Writable({
      write: (chunk: Buffer, _encoding, callback) => {
        chunks.push(chunk);
        callback();
      },
      final: (callback) => {
        this.objects.set(key, { content: Buffer.concat(chunks), lastModified: new Date() });
        callback();
      },
    });
  }

  async copy(sourceKey: string, targetKey: string): Promise<void> {
    this.checkFailure("copy");
    const source = this.require(sourceKey);
    this.objects.set(targetKey, {
      content: Buffer.from(source.content),
      lastModified: new Date(),
    });
  }

  async delete(key: string): Promise<void> {
    this.checkFailure("delete");
    this.require(key);
    this.objects.delete(key);
  }

  async listPage(prefix: string, continuationToken?: string): Promise<BlobPage> {
    this.checkFailure("listPage");
    const entries = this.listAll(prefix);
    const offset = continuationToken ? Number(continuationToken) : 0;
    const end = offset + this.pageSize;
    return {
      entries: entries.slice(offset, end),
      continuationToken: end < entries.length ? String(end) : undefined,
    };
  }

  getUrl(key: string): string {
    return `${this.baseUrl}/${key.split("/").map(encodeURIComponent).join("/")}`;
  }

  async generateSignedUrl(key: string, expiryMinutes: number): Promise<string> {
    this.checkFailure("generateSignedUrl");
    this.require(key);
    const expiry = new Date(Date.now() + expiryMinutes * 60 * 1000).toISOString();
    return `${this.getUrl(key)}?se=${encodeURIComponent(expiry)}&sp=r&sig=stub-signature`;
  }

  /** Blobs and distinct sub-prefixes directly under `prefix`, in key order. */
  private listAll(prefix: string): BlobEntry[] {
    const entries: BlobEntry[] = [];
    const seenPrefixes = new Set<string>();

    for (const key of this.keys()) {
      if (!key.startsWith(prefix)) continue;
      const rest = key.slice(prefix.length);
      const slash = rest.indexOf("/");
      if (slash === -1) {
        const obj = this.require(key);
        entries.push({
          kind: "file",
          key,
          size: obj.content.length,
          lastModified: obj.lastModified,
        });
      } else {
        const subPrefix = prefix + rest.slice(0, slash + 1);
        if (!seenPrefixes.has(subPrefix)) {
          seenPrefixes.add(subPrefix);
          entries.push({ kind: "directory", prefix: subPrefix });
        }
      }
    }

    return entries;
  }

  private require(key: string): StoredObject {
    const obj = this.objects.get(key);
    if (!obj) {
      throw new NotFoundError(`Blob not found: ${this.containerName}/${key}`);
    }
    return obj;
  }

  private checkFailure(operation: BlobOperation): void {
    const remaining = this.failures.get(operation);
    if (remaining === undefined) return;
    if (remaining > 0) {
      this.failures.set(operation, remaining - 1);
      return;
    }
    this.failures.delete(operation);
    throw new StoreFailureError(`${operation} unavailable (simulated failure)`);
  }
}
