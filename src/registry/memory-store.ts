import { emptyRegistry, type Registry, type RegistryStore } from "./types.js";

/**
 * In-process document provider with the same contract as the file store.
 * Loads and saves copy the records, so callers never alias stored state.
 */
export class MemoryRegistryStore implements RegistryStore {
  private document: Registry;
  saveCount = 0;
  /** When set, the next save rejects with this error. */
  failNextSave: Error | null = null;

  constructor(initial: Registry = emptyRegistry()) {
    this.document = clone(initial);
  }

  async load(): Promise<Registry> {
    return clone(this.document);
  }

  async save(registry: Registry): Promise<void> {
    if (this.failNextSave) {
      const error = this.failNextSave;
      this.failNextSave = null;
      throw error;
    }
    this.document = clone(registry);
    this.saveCount++;
  }

  snapshot(): Registry {
    return clone(this.document);
  }
}

function clone(registry: Registry): Registry {
  return { agents: registry.agents.map((agent) => ({ ...agent })) };
}
