import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { appendFile, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { dumpLog, followLog } from "./log-follower.js";

function collector(): { write: (chunk: Uint8Array) => void; text: () => string } {
  const chunks: Buffer[] = [];
  return {
    write: (chunk) => {
      chunks.push(Buffer.from(chunk));
    },
    text: () => Buffer.concat(chunks).toString("utf-8"),
  };
}

async function waitFor(check: () => boolean, timeoutMs = 3000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await sleep(10);
  }
}

describe("dumpLog", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "drover-logs-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes the file byte for byte", async () => {
    const path = join(dir, "a.log");
    await writeFile(path, "héllo ✓\n$(not run)\n");
    const out = collector();

    const bytes = await dumpLog(path, out.write);

    expect(out.text()).toBe("héllo ✓\n$(not run)\n");
    expect(bytes).toBe(Buffer.byteLength("héllo ✓\n$(not run)\n"));
  });

  it("starts from the given offset", async () => {
    const path = join(dir, "a.log");
    await writeFile(path, "one\ntwo\n");
    const out = collector();

    await dumpLog(path, out.write, 4);

    expect(out.text()).toBe("two\n");
  });

  it("writes nothing for a missing file", async () => {
    const out = collector();
    expect(await dumpLog(join(dir, "missing.log"), out.write)).toBe(0);
    expect(out.text()).toBe("");
  });
});

describe("followLog", () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "drover-follow-"));
    path = join(dir, "agent.log");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes existing content, then appended content, until aborted", async () => {
    await writeFile(path, "one\n");
    const out = collector();
    const controller = new AbortController();

    const following = followLog(path, { write: out.write, signal: controller.signal, pollIntervalMs: 10 });
    await waitFor(() => out.text() === "one\n");
    await appendFile(path, "two\n");
    await waitFor(() => out.text() === "one\ntwo\n");
    controller.abort();

    await expect(following).resolves.toBeUndefined();
    expect(out.text()).toBe("one\ntwo\n");
  });

  it("waits for a log file that does not exist yet", async () => {
    const out = collector();
    const controller = new AbortController();

    const following = followLog(path, { write: out.write, signal: controller.signal, pollIntervalMs: 10 });
    await sleep(30);
    await writeFile(path, "late\n");
    await waitFor(() => out.text() === "late\n");
    controller.abort();

    await following;
    expect(out.text()).toBe("late\n");
  });

  it("starts over when the file is truncated", async () => {
    await writeFile(path, "a long first line\n");
    const out = collector();
    const controller = new AbortController();

    const following = followLog(path, { write: out.write, signal: controller.signal, pollIntervalMs: 10 });
    await waitFor(() => out.text() === "a long first line\n");
    await writeFile(path, "new\n");
    await waitFor(() => out.text() === "a long first line\nnew\n");
    controller.abort();

    await following;
  });

  it("returns at once when already aborted", async () => {
    await writeFile(path, "content\n");
    const out = collector();

    await followLog(path, { write: out.write, signal: AbortSignal.abort() });

    expect(out.text()).toBe("");
  });
});
