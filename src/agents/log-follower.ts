import { open, stat, type FileHandle } from "node:fs/promises";
import { setTimeout as sleep } from "node:timers/promises";
import { errnoCode } from "../errors.js";

/** Receives raw bytes, so multi-byte characters split across reads survive. */
export type Write = (chunk: Uint8Array) => void;

const DEFAULT_POLL_INTERVAL_MS = 250;
const READ_CHUNK_BYTES = 64 * 1024;

/** Write the file's current content. A missing file writes nothing. Returns bytes written. */
export async function dumpLog(path: string, write: Write, fromByte = 0): Promise<number> {
  let handle: FileHandle;
  try {
    handle = await open(path, "r");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return 0;
    throw err;
  }

  try {
    const buffer = Buffer.alloc(READ_CHUNK_BYTES);
    let position = fromByte;
    let total = 0;
    for (;;) {
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, position);
      if (bytesRead === 0) break;
      write(Buffer.from(buffer.subarray(0, bytesRead)));
      position += bytesRead;
      total += bytesRead;
    }
    return total;
  } finally {
    await handle.close();
  }
}

export interface FollowOptions {
  readonly write: Write;
  readonly signal: AbortSignal;
  readonly pollIntervalMs?: number;
}

/**
 * Dump the log, then keep writing whatever is appended until `signal`
 * aborts. Aborting only ends the viewing; it resolves normally.
 */
export async function followLog(path: string, options: FollowOptions): Promise<void> {
  const interval = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  let offset = 0;

  while (!options.signal.aborted) {
    const size = await fileSize(path);
    if (size < offset) {
      // truncated or replaced: start over
      offset = 0;
    }
    if (size > offset) {
      offset += await dumpLog(path, options.write, offset);
    }

    try {
      await sleep(interval, undefined, { signal: options.signal });
    } catch (err) {
      if (options.signal.aborted) return;
      throw err;
    }
  }
}

async function fileSize(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return 0;
    throw err;
  }
}
