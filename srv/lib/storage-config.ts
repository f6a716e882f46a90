import { StorageConfigError } from "./storage-errors";

export interface StorageConfig {
  /** Provider key in the adapter registry ("azure.blob", "mock.blob"). */
  provider: string;
  containerName: string;
  root: string;
  isPrivate: boolean;
  pageSize: number;
  connectionString?: string;
  accountUrl?: string;
}

export const DEFAULT_CONTAINER = "media";
export const MAX_PAGE_SIZE = 5000;

// 3-63 chars, lowercase letters, digits and single dashes, alphanumeric at both ends
const CONTAINER_NAME_PATTERN = /^(?!.*--)[a-z0-9][a-z0-9-]{1,61}[a-z0-9]$/;

/**
 * Parse a `Key=Value;Key=Value` connection string.
 * Values may themselves contain "=" (base64 account keys).
 */
export function parseConnectionString(connectionString: string): Record<string, string> {
  return connectionString.split(";").reduce(
    (acc, part) => {
      const [key, ...vals] = part.split("=");
      if (key && vals.length) acc[key.trim()] = vals.join("=");
      return acc;
    },
    {} as Record<string, string>,
  );
}

function parseBoolean(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === "") return fallback;
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  throw new StorageConfigError(`${name} must be "true" or "false", got "${value}"`);
}

function parsePageSize(value: string | undefined): number {
  if (value === undefined || value === "") return MAX_PAGE_SIZE;
  const size = Number(value);
  if (!Number.isInteger(size) || size < 1 || size > MAX_PAGE_SIZE) {
    throw new StorageConfigError(
      `STORAGE_PAGE_SIZE must be an integer between 1 and ${MAX_PAGE_SIZE}, got "${value}"`,
    );
  }
  return size;
}

/**
 * Resolve storage configuration from environment variables.
 * Resolved once when the file system is built; throws StorageConfigError
 * instead of starting with credentials that cannot work.
 *
 * Reads:
 *   STORAGE_PROVIDER - adapter provider key (defaults to "azure.blob")
 *   STORAGE_CONTAINER - container name (defaults to "media")
 *   STORAGE_ROOT - root prefix inside the container
 *   STORAGE_PUBLIC_READ - "true" for anonymous read access
 *   STORAGE_PAGE_SIZE - listing page size
 *   AZURE_STORAGE_CONNECTION_STRING / AZURE_STORAGE_ACCOUNT_URL - credentials
 */
export function resolveStorageConfig(env: NodeJS.ProcessEnv = process.env): StorageConfig {
  const provider = env.STORAGE_PROVIDER || "azure.blob";
  const containerName = env.STORAGE_CONTAINER || DEFAULT_CONTAINER;

  if (!CONTAINER_NAME_PATTERN.test(containerName)) {
    throw new StorageConfigError(
      `Invalid container name "${containerName}": use 3-63 lowercase letters, digits or single dashes`,
    );
  }

  const config: StorageConfig = {
    provider,
    containerName,
    root: env.STORAGE_ROOT || "",
    isPrivate: !parseBoolean("STORAGE_PUBLIC_READ", env.STORAGE_PUBLIC_READ, false),
    pageSize: parsePageSize(env.STORAGE_PAGE_SIZE),
  };

  const connectionString = env.AZURE_STORAGE_CONNECTION_STRING || "";
  const accountUrl = env.AZURE_STORAGE_ACCOUNT_URL || "";

  if (connectionString) {
    const parts = parseConnectionString(connectionString);
    if (!parts["AccountName"] && !parts["BlobEndpoint"] && !parts["UseDevelopmentStorage"]) {
      throw new StorageConfigError(
        "Invalid AZURE_STORAGE_CONNECTION_STRING format: expected AccountName, BlobEndpoint or UseDevelopmentStorage",
      );
    }
    config.connectionString = connectionString;
  }
  if (accountUrl) {
    config.accountUrl = accountUrl;
  }

  if (provider === "azure.blob" && !config.connectionString && !config.accountUrl) {
    throw new StorageConfigError(
      "AZURE_STORAGE_CONNECTION_STRING or AZURE_STORAGE_ACCOUNT_URL must be set for provider 'azure.blob'",
    );
  }

  return config;
}
