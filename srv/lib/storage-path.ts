import { InvalidPathError } from "./storage-errors";

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Turn a configured root into the key prefix every path is composed onto.
 * An empty root (or "/") means the whole container is the namespace.
 */
export function toRootPrefix(root?: string): string {
  const trimmed = (root ?? "").replace(/^\/+|\/+$/g, "");
  return trimmed ? `${trimmed}/` : "";
}

/**
 * Throw InvalidPathError unless `path` is relative: no leading slash, no scheme.
 */
export function ensureRelative(path: string): void {
  if (path.startsWith("/") || SCHEME_PATTERN.test(path)) {
    throw new InvalidPathError(`Path must be relative: ${path}`);
  }
}

/** Compose a store key from the root prefix and a relative path. */
export function normalizePath(rootPrefix: string, path: string): string {
  ensureRelative(path);
  return `${rootPrefix}${path}`;
}

/**
 * Key prefix of a folder. Trailing slashes are ignored;
 * the empty path is the root prefix itself.
 */
export function toFolderPrefix(rootPrefix: string, path: string): string {
  ensureRelative(path);
  const folder = trimTrailingSlashes(path);
  return folder ? `${rootPrefix}${folder}/` : rootPrefix;
}

export function toRelativePath(rootPrefix: string, key: string): string {
  return key.startsWith(rootPrefix) ? key.slice(rootPrefix.length) : key;
}

/**
 * Translate an absolute object URL back into a path relative to the root.
 * `absoluteRoot` is the container URL followed by the root prefix.
 */
export function relativePathFromUrl(absoluteRoot: string, url: string): string {
  if (!url.startsWith(absoluteRoot)) {
    throw new InvalidPathError(`URL ${url} is not under ${absoluteRoot}`);
  }
  const encoded = url.slice(absoluteRoot.length).split(/[?#]/)[0] ?? "";
  return encoded
    .split("/")
    .map((segment) => decodeSegment(segment, url))
    .join("/");
}

function decodeSegment(segment: string, url: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (err) {
    throw new InvalidPathError(`URL ${url} is not a valid object URL`, { cause: err });
  }
}

export function trimTrailingSlashes(path: string): string {
  return path.replace(/\/+$/, "");
}

/** Last segment of a relative path. */
export function baseName(path: string): string {
  const trimmed = trimTrailingSlashes(path);
  return trimmed.slice(trimmed.lastIndexOf("/") + 1);
}

/** Relative path with its last segment removed ("" for top-level entries). */
export function parentPath(path: string): string {
  const trimmed = trimTrailingSlashes(path);
  const idx = trimmed.lastIndexOf("/");
  return idx === -1 ? "" : trimmed.slice(0, idx);
}
