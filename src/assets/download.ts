import { createReadStream, createWriteStream } from "node:fs";
import { mkdir, rename, rm } from "node:fs/promises";
import path from "node:path";
import { createHash } from "node:crypto";
import { pipeline } from "node:stream/promises";

import type { TempFileRegistry } from "../runtime/cleanup.js";

export const PARTIAL_SUFFIX = ".part";

/**
 * Streams into `<target>.part` and renames on success, so an interrupted
 * download never leaves a file that looks complete.
 */
export async function writeStreamAtomically(
  source: AsyncIterable<Uint8Array>,
  target: string,
  registry?: TempFileRegistry
): Promise<void> {
  const partial = `${target}${PARTIAL_SUFFIX}`;
  await mkdir(path.dirname(target), { recursive: true });
  registry?.track(partial);
  try {
    await pipeline(source, createWriteStream(partial));
    await rename(partial, target);
  } catch (error) {
    await rm(partial, { force: true });
    throw error;
  } finally {
    registry?.release(partial);
  }
}

export async function sha256File(filePath: string): Promise<string> {
  const hash = createHash("sha256");
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

export async function verifyChecksum(filePath: string, expected: string): Promise<void> {
  const actual = await sha256File(filePath);
  if (actual !== expected.toLowerCase()) {
    await rm(filePath, { force: true });
    throw new Error(`checksum mismatch (expected ${expected.toLowerCase()}, got ${actual})`);
  }
}
