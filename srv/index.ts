export { BlobFileSystem, type BlobFileSystemOptions } from "./adapters/blob-file-system";
export { BlobStorageFile, BlobStorageFolder } from "./adapters/storage-entries";
export {
  AzureBlobStorageAdapter,
  type AzureBlobStorageOptions,
} from "./adapters/azure-blob-storage-adapter";
export {
  MockBlobStorageAdapter,
  type BlobOperation,
  type MockBlobStorageOptions,
} from "./adapters/mock/mock-blob-storage.adapter";
export {
  getBlobStore,
  getFileSystem,
  resetFileSystem,
  setFileSystem,
  wrapWithLogging,
} from "./adapters/factory/adapter-factory";
export type * from "./adapters/interfaces/blob-storage.interface";
export type * from "./adapters/interfaces/file-system.interface";
export * from "./lib/storage-errors";
export { resolveStorageConfig, type StorageConfig } from "./lib/storage-config";
export { FOLDER_MARKER } from "./lib/folder-marker";
export {
  ensureRelative,
  normalizePath,
  toFolderPrefix,
  toRootPrefix,
} from "./lib/storage-path";
