import { Readable, type Writable } from "node:stream";
import { pipeline } from "node:stream/promises";

/**
 * Drain a readable into a Buffer. The stream is destroyed on every exit path.
 */
export async function readAll(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  try {
    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
  } finally {
    stream.destroy();
  }
  return Buffer.concat(chunks);
}

/**
 * Write `content` and close the stream, resolving once it has finished.
 * Empty content still ends the stream, which materializes an empty object.
 */
export async function writeAll(stream: Writable, content: Buffer | string): Promise<void> {
  const buffer = typeof content === "string" ? Buffer.from(content) : content;
  await pipeline(Readable.from(buffer.length ? [buffer] : []), stream);
}
