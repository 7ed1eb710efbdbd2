import { describe, it, expect } from "vitest";
import { MemoryRegistryStore } from "./memory-store.js";
import { findAgent, updateRegistry, type AgentRecord } from "./types.js";

const record: AgentRecord = {
  name: "alpha",
  pid: 1,
  logPath: "/l/alpha.log",
  promptPath: "/p/alpha.prompt.md",
  status: "running",
  startedAt: "2026-01-01T00:00:00.000Z",
};

describe("MemoryRegistryStore", () => {
  it("does not share records between loads", async () => {
    const store = new MemoryRegistryStore({ agents: [record] });

    const first = await store.load();
    const agent = first.agents[0];
    if (agent) agent.status = "stopped";

    expect((await store.load()).agents[0]?.status).toBe("running");
  });

  it("fails the next save once when asked to", async () => {
    const store = new MemoryRegistryStore();
    store.failNextSave = new Error("disk full");

    await expect(store.save({ agents: [record] })).rejects.toThrow("disk full");
    await store.save({ agents: [record] });

    expect(store.saveCount).toBe(1);
    expect(store.snapshot().agents).toEqual([record]);
  });
});

describe("updateRegistry", () => {
  it("loads, mutates, saves and returns the mutation result", async () => {
    const store = new MemoryRegistryStore({ agents: [record] });

    const count = await updateRegistry(store, (registry) => {
      registry.agents.push({ ...record, name: "beta", pid: 2 });
      return registry.agents.length;
    });

    expect(count).toBe(2);
    expect(store.saveCount).toBe(1);
    expect(findAgent(store.snapshot(), "beta")?.pid).toBe(2);
    expect(findAgent(store.snapshot(), "bet")).toBeUndefined();
  });
});
