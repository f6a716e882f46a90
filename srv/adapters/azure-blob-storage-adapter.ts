import { PassThrough, Readable, Writable } from "node:stream";
import {
  BlobSASPermissions,
  BlobServiceClient,
  RestError,
  type ContainerClient,
} from "@azure/storage-blob";
import { DefaultAzureCredential } from "@azure/identity";
import cds from "@sap/cds";
import type {
  BlobEntry,
  BlobPage,
  BlobProperties,
  ContainerAccess,
  IBlobStore,
} from "./interfaces/blob-storage.interface";
import { NotFoundError, StorageConfigError, StoreFailureError } from "../lib/storage-errors";

const LOG = cds.log("azure-blob");

export interface AzureBlobStorageOptions {
  connectionString?: string;
  /** Account URL authenticated with DefaultAzureCredential. */
  accountUrl?: string;
  pageSize?: number;
}

/**
 * Azure Blob Storage adapter bound to a single container.
 * Uses @azure/storage-blob; the container client can be injected for tests.
 */
export class AzureBlobStorageAdapter implements IBlobStore {
  private container: ContainerClient;
  private pageSize: number;

  constructor(
    readonly containerName: string,
    options: AzureBlobStorageOptions = {},
    container?: ContainerClient,
  ) {
    this.pageSize = options.pageSize || 5000;

    if (container) {
      this.container = container;
    } else if (options.connectionString) {
      this.container = BlobServiceClient.fromConnectionString(
        options.connectionString,
      ).getContainerClient(containerName);
    } else if (options.accountUrl) {
      this.container = new BlobServiceClient(
        options.accountUrl,
        new DefaultAzureCredential(),
      ).getContainerClient(containerName);
    } else {
      throw new StorageConfigError(
        "Azure blob storage needs a connection string, an account URL or a container client",
      );
    }
  }

  /** Container URL without the SAS query a connection string may add. */
  get baseUrl(): string {
    return withoutQuery(this.container.url);
  }

  async ensureContainer(access: ContainerAccess): Promise<void> {
    await this.call(this.containerName, async () => {
      const result = await this.container.createIfNotExists();
      if (result.succeeded) {
        LOG.info(`Created container '${this.containerName}'`);
      }
      // undefined public access = private container
      await this.container.setAccessPolicy(access === "container" ? "container" : undefined);
    });
  }

  async exists(key: string): Promise<boolean> {
    return this.call(key, () => this.container.getBlockBlobClient(key).exists());
  }

  async getProperties(key: string): Promise<BlobProperties | undefined> {
    try {
      const props = await this.container.getBlockBlobClient(key).getProperties();
      return {
        size: props.contentLength ?? 0,
        lastModified: props.lastModified ?? new Date(0),
      };
    } catch (err) {
      if (err instanceof RestError && err.statusCode === 404) return undefined;
      throw this.translate(err, key);
    }
  }

  async openRead(key: string): Promise<Readable> {
    const response = await this.call(key, () => this.container.getBlockBlobClient(key).download());
    const body = response.readableStreamBody;
    if (!body) {
      throw new StoreFailureError(`Download of ${key} returned no body`);
    }
    return Readable.from(body);
  }

  async openWrite(key: string): Promise<Writable> {
    const blob = this.container.getBlockBlobClient(key);
    const body = new PassThrough();

    // "finish" on the returned stream waits for the upload to settle.
    // A failed upload also fails any write still waiting on the pipe.
    let failure: Error | undefined;
    const uploaded = blob.uploadStream(body).then(
      () => undefined,
      (err: unknown) => {
        failure = this.translate(err, key);
        body.destroy();
      },
    );

    return new Writable({
      write(chunk: Buffer, _encoding, callback) {
        if (failure) {
          callback(failure);
          return;
        }
        body.write(chunk, (err) => callback(err ? (failure ?? err) : null));
      },
      final(callback) {
        body.end();
        void uploaded.then(() => callback(failure));
      },
      destroy(err, callback) {
        body.destroy();
        callback(err);
      },
    });
  }

  async copy(sourceKey: string, targetKey: string): Promise<void> {
    const source = this.container.getBlockBlobClient(sourceKey);
    const target = this.container.getBlockBlobClient(targetKey);
    await this.call(sourceKey, async () => {
      const poller = await target.beginCopyFromURL(source.url);
      await poller.pollUntilDone();
    });
  }

  async delete(key: string): Promise<void> {
    await this.call(key, () => this.container.getBlockBlobClient(key).delete());
  }

  async listPage(prefix: string, continuationToken?: string): Promise<BlobPage> {
    return this.call(prefix, async () => {
      const pages = this.container
        .listBlobsByHierarchy("/", { prefix })
        .byPage({ continuationToken, maxPageSize: this.pageSize });
      const page = await pages.next();
      if (page.done) return { entries: [] };

      const { segment } = page.value;
      // prefixes and items arrive separately; merge them in key order
      const entries: BlobEntry[] = [
        ...(segment.blobPrefixes ?? []).map(
          (p): BlobEntry => ({ kind: "directory", prefix: p.name }),
        ),
        ...segment.blobItems.map(
          (b): BlobEntry => ({
            kind: "file",
            key: b.name,
            size: b.properties.contentLength ?? 0,
            lastModified: b.properties.lastModified,
          }),
        ),
      ].sort((a, b) => compareNames(entryName(a), entryName(b)));

      return {
        entries,
        continuationToken: page.value.continuationToken || undefined,
      };
    });
  }

  getUrl(key: string): string {
    return withoutQuery(this.container.getBlockBlobClient(key).url);
  }

  /**
   * Read-only SAS URL. Needs a shared-key credential (connection string with AccountKey).
   */
  async generateSignedUrl(key: string, expiryMinutes: number): Promise<string> {
    const expiresOn = new Date(Date.now() + expiryMinutes * 60 * 1000);
    return this.call(key, () =>
      this.container.getBlockBlobClient(key).generateSasUrl({
        permissions: BlobSASPermissions.parse("r"),
        expiresOn,
      }),
    );
  }

  private async call<T>(key: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw this.translate(err, key);
    }
  }

  /** Map SDK errors onto the storage error taxonomy. */
  private translate(err: unknown, key: string): Error {
    if (err instanceof RestError) {
      if (err.statusCode === 404) {
        return new NotFoundError(`Blob not found: ${this.containerName}/${key}`, { cause: err });
      }
      return new StoreFailureError(
        `Azure blob storage request failed for ${this.containerName}/${key}: ${err.message}`,
        { cause: err },
      );
    }
    if (err instanceof Error) return err;
    return new StoreFailureError(String(err));
  }
}

function withoutQuery(url: string): string {
  const parsed = new URL(url);
  parsed.search = "";
  return parsed.toString();
}

function entryName(entry: BlobEntry): string {
  return entry.kind === "file" ? entry.key : entry.prefix;
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}
