export const AGENT_STATUSES = ["running", "stopped"] as const;
export type AgentStatus = (typeof AGENT_STATUSES)[number];

export interface AgentRecord {
  readonly name: string;
  readonly pid: number;
  readonly logPath: string;
  readonly promptPath: string;
  /** A hint only: liveness is re-checked against the OS on every read. */
  status: AgentStatus;
  readonly startedAt: string;
  readonly type?: string;
}

/** Records in insertion order; names are unique. */
export interface Registry {
  agents: AgentRecord[];
}

/**
 * Whole-document persistence for the registry. Every logical operation is a
 * fresh load, a mutation and a save; nothing is cached between calls.
 */
export interface RegistryStore {
  load(): Promise<Registry>;
  save(registry: Registry): Promise<void>;
}

export function emptyRegistry(): Registry {
  return { agents: [] };
}

export function findAgent(registry: Registry, name: string): AgentRecord | undefined {
  return registry.agents.find((agent) => agent.name === name);
}

/** Load, apply `mutate`, save, and return whatever `mutate` returned. */
export async function updateRegistry<T>(store: RegistryStore, mutate: (registry: Registry) => T): Promise<T> {
  const registry = await store.load();
  const result = mutate(registry);
  await store.save(registry);
  return result;
}
