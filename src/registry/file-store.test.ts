import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, readdir, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FileRegistryStore } from "./file-store.js";
import type { AgentRecord } from "./types.js";
import { CorruptRegistryError } from "../errors.js";
import { createSilentLogger } from "../logger.js";

const record: AgentRecord = {
  name: "alpha",
  pid: 1234,
  logPath: "/base/logs/alpha.log",
  promptPath: "/base/alpha.prompt.md",
  status: "running",
  startedAt: "2026-01-02T03:04:05.000Z",
  type: "claude",
};

describe("FileRegistryStore", () => {
  let dir: string;
  let path: string;
  let store: FileRegistryStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "drover-registry-"));
    path = join(dir, "agents.json");
    store = new FileRegistryStore(path, createSilentLogger());
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads an empty registry when the document does not exist", async () => {
    expect(await store.load()).toEqual({ agents: [] });
  });

  it("writes the document with the on-disk field names", async () => {
    await store.save({ agents: [record] });

    const document: unknown = JSON.parse(await readFile(path, "utf-8"));
    expect(document).toEqual({
      agents: [
        {
          name: "alpha",
          pid: 1234,
          log: "/base/logs/alpha.log",
          prompt: "/base/alpha.prompt.md",
          status: "running",
          started: "2026-01-02T03:04:05.000Z",
          type: "claude",
        },
      ],
    });
    expect(await store.load()).toEqual({ agents: [record] });
  });

  it("loads documents written without an agent type", async () => {
    await writeFile(
      path,
      JSON.stringify({
        agents: [{ name: "old", pid: 7, log: "/l", prompt: "/p", status: "stopped", started: "2025-02-14T00:00:00Z" }],
      }),
    );

    expect(await store.load()).toEqual({
      agents: [{ name: "old", pid: 7, logPath: "/l", promptPath: "/p", status: "stopped", startedAt: "2025-02-14T00:00:00Z" }],
    });
  });

  it("leaves no temporary files behind", async () => {
    await store.save({ agents: [record] });
    await store.save({ agents: [] });

    expect(await readdir(dir)).toEqual(["agents.json"]);
  });

  it.skipIf(process.platform === "win32")("restricts the document to its owner", async () => {
    await store.save({ agents: [record] });
    expect((await stat(path)).mode & 0o777).toBe(0o600);
  });

  it("replaces the whole document on save", async () => {
    await store.save({ agents: [record, { ...record, name: "beta", pid: 99 }] });
    await store.save({ agents: [{ ...record, name: "beta", pid: 99 }] });

    const loaded = await store.load();
    expect(loaded.agents.map((a) => a.name)).toEqual(["beta"]);
  });

  it.each([
    ["unparseable JSON", "{not json"],
    ["a missing agents array", "{}"],
    ["a record with missing fields", JSON.stringify({ agents: [{ name: "a" }] })],
    ["an unknown status", JSON.stringify({ agents: [{ ...onDisk("a"), status: "zombie" }] })],
    ["an invalid name", JSON.stringify({ agents: [onDisk("a b")] })],
    ["duplicate names", JSON.stringify({ agents: [onDisk("a"), onDisk("a")] })],
  ])("refuses %s without modifying the file", async (_label, content) => {
    await writeFile(path, content);

    await expect(store.load()).rejects.toBeInstanceOf(CorruptRegistryError);
    expect(await readFile(path, "utf-8")).toBe(content);
  });
});

function onDisk(name: string): Record<string, unknown> {
  return { name, pid: 1, log: `/l/${name}.log`, prompt: `/p/${name}.prompt.md`, status: "running", started: "2026-01-01T00:00:00Z" };
}
