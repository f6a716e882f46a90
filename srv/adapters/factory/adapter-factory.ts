import type { IBlobStore } from "../interfaces/blob-storage.interface";
import type { IStorageFileSystem } from "../interfaces/file-system.interface";
import { AzureBlobStorageAdapter } from "../azure-blob-storage-adapter";
import { MockBlobStorageAdapter } from "../mock/mock-blob-storage.adapter";
import { BlobFileSystem } from "../blob-file-system";
import { resolveStorageConfig, type StorageConfig } from "../../lib/storage-config";
import { withStorageLogging } from "../../lib/storage-logger";
import cds from "@sap/cds";

const LOG = cds.log("adapter-factory");

/** Registry of blob store constructors by provider key. */
const STORE_REGISTRY: Record<string, (config: StorageConfig) => IBlobStore> = {
  "azure.blob": (config) =>
    new AzureBlobStorageAdapter(config.containerName, {
      connectionString: config.connectionString,
      accountUrl: config.accountUrl,
      pageSize: config.pageSize,
    }),
  "mock.blob": (config) =>
    new MockBlobStorageAdapter(config.containerName, { pageSize: config.pageSize }),
};

const MOCK_FALLBACK_KEY = "mock.blob";

/** Cached file system built from the environment. */
let fileSystem: IStorageFileSystem | null = null;

/**
 * Wrap every asynchronous store method with call logging.
 */
export function wrapWithLogging(store: IBlobStore, providerKey: string): IBlobStore {
  const logged = <TArgs extends unknown[], TResult>(
    operation: string,
    fn: (...args: TArgs) => Promise<TResult>,
  ) => withStorageLogging(providerKey, operation, fn);

  return {
    containerName: store.containerName,
    baseUrl: store.baseUrl,
    ensureContainer: logged("ensureContainer", store.ensureContainer.bind(store)),
    exists: logged("exists", store.exists.bind(store)),
    getProperties: logged("getProperties", store.getProperties.bind(store)),
    openRead: logged("openRead", store.openRead.bind(store)),
    openWrite: logged("openWrite", store.openWrite.bind(store)),
    copy: logged("copy", store.copy.bind(store)),
    delete: logged("delete", store.delete.bind(store)),
    listPage: logged("listPage", store.listPage.bind(store)),
    getUrl: store.getUrl.bind(store),
    generateSignedUrl: logged("generateSignedUrl", store.generateSignedUrl.bind(store)),
  };
}

/**
 * Build the blob store for the configured provider.
 * Unregistered provider keys fall back to the in-memory store.
 */
export function getBlobStore(config: StorageConfig = resolveStorageConfig()): IBlobStore {
  let providerKey = config.provider;
  let factory = STORE_REGISTRY[providerKey];

  if (!factory) {
    LOG.warn(
      `No implementation registered for storage provider '${providerKey}' → using '${MOCK_FALLBACK_KEY}'`,
    );
    providerKey = MOCK_FALLBACK_KEY;
    factory = STORE_REGISTRY[MOCK_FALLBACK_KEY];
  }

  LOG.info(`Resolved blob store: provider=${providerKey}, container=${config.containerName}`);
  return wrapWithLogging(factory(config), providerKey);
}

/**
 * Get or create the file system for the configured provider.
 * Configuration is resolved on first use and fails fast when incomplete.
 */
export function getFileSystem(): IStorageFileSystem {
  if (fileSystem) return fileSystem;

  const config = resolveStorageConfig();
  fileSystem = new BlobFileSystem(getBlobStore(config), {
    root: config.root,
    isPrivate: config.isPrivate,
  });
  return fileSystem;
}

export function setFileSystem(instance: IStorageFileSystem): void {
  fileSystem = instance;
}

export function resetFileSystem(): void {
  fileSystem = null;
}
