import { Readable } from "node:stream";
import { RestError } from "@azure/storage-blob";

jest.mock("@sap/cds", () => {
  const mockLog = { warn: jest.fn(), info: jest.fn(), error: jest.fn(), debug: jest.fn() };
  return {
    __esModule: true,
    default: {
      log: jest.fn(() => mockLog),
    },
  };
});

import { AzureBlobStorageAdapter } from "../../../srv/adapters/azure-blob-storage-adapter";
import { BlobFileSystem } from "../../../srv/adapters/blob-file-system";
import {
  NotFoundError,
  StorageConfigError,
  StoreFailureError,
} from "../../../srv/lib/storage-errors";
import { readAll, writeAll } from "../../../srv/lib/stream-utils";

const CONTAINER_URL = "https://testaccount.blob.core.windows.net/media";

// Mock block blob clients, one per key
const blobs = new Map<string, Record<string, any>>();
function blobFor(key: string): Record<string, any> {
  let blob = blobs.get(key);
  if (!blob) {
    blob = {
      url: `${CONTAINER_URL}/${key}`,
      exists: jest.fn(),
      getProperties: jest.fn(),
      download: jest.fn(),
      uploadStream: jest.fn(),
      beginCopyFromURL: jest.fn(),
      delete: jest.fn(),
      generateSasUrl: jest.fn(),
    };
    blobs.set(key, blob);
  }
  return blob;
}

const mockByPage = jest.fn();
const mockContainer = {
  url: CONTAINER_URL,
  createIfNotExists: jest.fn(),
  setAccessPolicy: jest.fn(),
  getBlockBlobClient: jest.fn((key: string) => blobFor(key)),
  listBlobsByHierarchy: jest.fn(() => ({ byPage: mockByPage })),
} as any;

function notFound(): RestError {
  return new RestError("The specified blob does not exist.", { statusCode: 404 });
}

describe("AzureBlobStorageAdapter", () => {
  let adapter: AzureBlobStorageAdapter;

  beforeEach(() => {
    jest.clearAllMocks();
    blobs.clear();
    adapter = new AzureBlobStorageAdapter("media", { pageSize: 2 }, mockContainer);
  });

  describe("construction", () => {
    it("should fail fast without any way to reach the account", () => {
      expect(() => new AzureBlobStorageAdapter("media")).toThrow(StorageConfigError);
    });

    it("should build a container client from a development connection string", () => {
      const local = new AzureBlobStorageAdapter("media", {
        connectionString: "UseDevelopmentStorage=true",
      });
      expect(local.baseUrl).toBe("http://127.0.0.1:10000/devstoreaccount1/media");
    });

    it("should keep SAS credentials out of container and blob URLs", () => {
      const sas = new AzureBlobStorageAdapter("media", {
        connectionString:
          "BlobEndpoint=https://acct.blob.core.windows.net/;SharedAccessSignature=sv=2022-11-02&sig=test-signature",
      });
      const url = sas.getUrl("docs/a.txt");

      expect(sas.baseUrl).toBe("https://acct.blob.core.windows.net/media");
      expect(url).toBe("https://acct.blob.core.windows.net/media/docs/a.txt");
      expect(new BlobFileSystem(sas).getPathFromUrl(url)).toBe("docs/a.txt");
    });

    it("should expose container and blob URLs", () => {
      expect(adapter.baseUrl).toBe(CONTAINER_URL);
      expect(adapter.getUrl("docs/a.txt")).toBe(`${CONTAINER_URL}/docs/a.txt`);
    });
  });

  describe("ensureContainer", () => {
    it("should create the container and make it private", async () => {
      mockContainer.createIfNotExists.mockResolvedValueOnce({ succeeded: true });

      await adapter.ensureContainer("private");

      expect(mockContainer.createIfNotExists).toHaveBeenCalledTimes(1);
      expect(mockContainer.setAccessPolicy).toHaveBeenCalledWith(undefined);
    });

    it("should grant container-level public access", async () => {
      mockContainer.createIfNotExists.mockResolvedValueOnce({ succeeded: false });

      await adapter.ensureContainer("container");

      expect(mockContainer.setAccessPolicy).toHaveBeenCalledWith("container");
    });

    it("should translate REST failures", async () => {
      mockContainer.createIfNotExists.mockRejectedValueOnce(
        new RestError("Server busy", { statusCode: 503 }),
      );

      await expect(adapter.ensureContainer("private")).rejects.toThrow(StoreFailureError);
    });
  });

  describe("blob operations", () => {
    it("should check existence", async () => {
      blobFor("a.txt").exists.mockResolvedValueOnce(true);
      await expect(adapter.exists("a.txt")).resolves.toBe(true);
    });

    it("should map blob properties", async () => {
      const lastModified = new Date("2026-01-02T03:04:05Z");
      blobFor("a.txt").getProperties.mockResolvedValueOnce({ contentLength: 42, lastModified });

      await expect(adapter.getProperties("a.txt")).resolves.toEqual({ size: 42, lastModified });
    });

    it("should return undefined properties for a 404", async () => {
      blobFor("a.txt").getProperties.mockRejectedValueOnce(notFound());
      await expect(adapter.getProperties("a.txt")).resolves.toBeUndefined();
    });

    it("should stream downloads", async () => {
      blobFor("a.txt").download.mockResolvedValueOnce({
        readableStreamBody: Readable.from([Buffer.from("hello")]),
      });

      const content = await readAll(await adapter.openRead("a.txt"));

      expect(content.toString()).toBe("hello");
    });

    it("should reject downloads without a body", async () => {
      blobFor("a.txt").download.mockResolvedValueOnce({});
      await expect(adapter.openRead("a.txt")).rejects.toThrow("Download of a.txt returned no body");
    });

    it("should finish writing only after the upload completes", async () => {
      let uploaded = "";
      blobFor("a.txt").uploadStream.mockImplementationOnce(async (stream: Readable) => {
        uploaded = (await readAll(stream)).toString();
      });

      await writeAll(await adapter.openWrite("a.txt"), "payload");

      expect(uploaded).toBe("payload");
    });

    it("should fail the write stream when the upload fails", async () => {
      blobFor("a.txt").uploadStream.mockRejectedValueOnce(
        new RestError("Forbidden", { statusCode: 403 }),
      );

      await expect(writeAll(await adapter.openWrite("a.txt"), "payload")).rejects.toThrow(
        StoreFailureError,
      );
    });

    it("should copy through the source URL and wait for completion", async () => {
      const pollUntilDone = jest.fn().mockResolvedValue({});
      blobFor("b.txt").beginCopyFromURL.mockResolvedValueOnce({ pollUntilDone });

      await adapter.copy("a.txt", "b.txt");

      expect(blobFor("b.txt").beginCopyFromURL).toHaveBeenCalledWith(`${CONTAINER_URL}/a.txt`);
      expect(pollUntilDone).toHaveBeenCalledTimes(1);
    });

    it("should map a 404 on delete to NotFoundError", async () => {
      blobFor("a.txt").delete.mockRejectedValueOnce(notFound());

      const deletion = adapter.delete("a.txt");

      await expect(deletion).rejects.toThrow(NotFoundError);
      await expect(deletion).rejects.toThrow("Blob not found: media/a.txt");
    });

    it("should generate read-only SAS URLs", async () => {
      blobFor("a.txt").generateSasUrl.mockResolvedValueOnce(`${CONTAINER_URL}/a.txt?sig=test`);

      await expect(adapter.generateSignedUrl("a.txt", 30)).resolves.toBe(
        `${CONTAINER_URL}/a.txt?sig=test`,
      );
      const options = blobFor("a.txt").generateSasUrl.mock.calls[0][0];
      expect(options.permissions.toString()).toBe("r");
      expect(options.expiresOn).toBeInstanceOf(Date);
    });
  });

  describe("listPage", () => {
    it("should list one hierarchical page as tagged entries", async () => {
      const lastModified = new Date("2026-01-02T03:04:05Z");
      mockByPage.mockReturnValueOnce({
        next: jest.fn().mockResolvedValue({
          done: false,
          value: {
            segment: {
              blobPrefixes: [{ name: "docs/sub/" }],
              blobItems: [{ name: "docs/a.txt", properties: { contentLength: 3, lastModified } }],
            },
            continuationToken: "",
          },
        }),
      });

      const page = await adapter.listPage("docs/", "token-1");

      expect(mockContainer.listBlobsByHierarchy).toHaveBeenCalledWith("/", { prefix: "docs/" });
      expect(mockByPage).toHaveBeenCalledWith({ continuationToken: "token-1", maxPageSize: 2 });
      expect(page).toEqual({
        entries: [
          { kind: "file", key: "docs/a.txt", size: 3, lastModified },
          { kind: "directory", prefix: "docs/sub/" },
        ],
        continuationToken: undefined,
      });
    });

    it("should merge prefixes and blobs in key order", async () => {
      const lastModified = new Date("2026-01-02T03:04:05Z");
      mockByPage.mockReturnValueOnce({
        next: jest.fn().mockResolvedValue({
          done: false,
          value: {
            segment: {
              blobPrefixes: [{ name: "b/" }, { name: "d/" }],
              blobItems: [
                { name: "a.txt", properties: { contentLength: 1, lastModified } },
                { name: "c.txt", properties: { contentLength: 2, lastModified } },
              ],
            },
          },
        }),
      });

      const page = await adapter.listPage("");

      expect(page.entries.map((e) => (e.kind === "file" ? e.key : e.prefix))).toEqual([
        "a.txt",
        "b/",
        "c.txt",
        "d/",
      ]);
    });

    it("should pass continuation tokens through", async () => {
      mockByPage.mockReturnValueOnce({
        next: jest.fn().mockResolvedValue({
          done: false,
          value: { segment: { blobItems: [] }, continuationToken: "next-page" },
        }),
      });

      const page = await adapter.listPage("");

      expect(page).toEqual({ entries: [], continuationToken: "next-page" });
    });

    it("should return an empty page when the iterator is exhausted", async () => {
      mockByPage.mockReturnValueOnce({
        next: jest.fn().mockResolvedValue({ done: true, value: undefined }),
      });

      await expect(adapter.listPage("docs/")).resolves.toEqual({ entries: [] });
    });
  });

  describe("file system over paged listings", () => {
    afterEach(() => {
      mockByPage.mockReset();
      mockContainer.createIfNotExists.mockReset();
    });

    function pageOf(segment: Record<string, any>, continuationToken?: string) {
      return {
        next: jest.fn().mockResolvedValue({ done: false, value: { segment, continuationToken } }),
      };
    }

    it("should find folder content behind an empty first page", async () => {
      const lastModified = new Date("2026-01-02T03:04:05Z");
      mockContainer.createIfNotExists.mockResolvedValue({ succeeded: false });
      mockByPage.mockImplementation(({ continuationToken }: { continuationToken?: string }) =>
        continuationToken === "t1"
          ? pageOf({
              blobItems: [{ name: "docs/a.txt", properties: { contentLength: 3, lastModified } }],
            })
          : pageOf({ blobPrefixes: [], blobItems: [] }, "t1"),
      );
      blobFor("docs/a.txt").delete.mockResolvedValue({});
      const fs = new BlobFileSystem(adapter);

      await expect(fs.getFolder("docs")).resolves.toMatchObject({ path: "docs" });
      await fs.deleteFolder("docs");

      expect(blobFor("docs/a.txt").delete).toHaveBeenCalledTimes(1);
    });
  });
});
