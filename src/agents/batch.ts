import { InvalidCountError, errorToString } from "../errors.js";
import type { Logger } from "../logger.js";
import type { AgentLifecycleManager } from "./lifecycle.js";
import { DEFAULT_TASK } from "./prompt.js";
import type { BatchItem, BatchSummary, SpawnOptions } from "./types.js";

const INDEX_PLACEHOLDER = /\{n\}|\{N\}/g;

/** Accepts a positive decimal integer, as a number or as the raw CLI argument. */
export function parseCount(input: string | number): number {
  const text = String(input).trim();
  if (!/^\d+$/.test(text)) {
    throw new InvalidCountError(text);
  }
  const count = Number(text);
  if (!Number.isSafeInteger(count) || count < 1) {
    throw new InvalidCountError(text);
  }
  return count;
}

/**
 * Replace `{n}` and `{N}` with the 1-based index in a single pass. Text that
 * the replacement produces is never scanned again.
 */
export function expandTaskTemplate(template: string, index: number): string {
  return template.replace(INDEX_PLACEHOLDER, () => String(index));
}

export function batchAgentName(prefix: string, index: number): string {
  return `${prefix}-${index}`;
}

export class BatchSpawner {
  private readonly logger: Logger;

  constructor(
    private readonly manager: AgentLifecycleManager,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "batch" });
  }

  /**
   * Spawns `prefix-1` … `prefix-count` one after another. A failed item is
   * recorded and the batch carries on.
   */
  async spawnMany(
    count: string | number,
    prefix: string,
    taskTemplate: string = DEFAULT_TASK,
    options: SpawnOptions = {},
  ): Promise<BatchSummary> {
    const total = parseCount(count);
    const items: BatchItem[] = [];

    for (let i = 1; i <= total; i++) {
      const name = batchAgentName(prefix, i);
      const task = expandTaskTemplate(taskTemplate, i);
      try {
        const record = await this.manager.spawn(name, task, options);
        items.push({ name, ok: true, record });
      } catch (err) {
        const error = err instanceof Error ? err : new Error(errorToString(err));
        this.logger.warn({ name, error: error.message }, "Batch item failed");
        items.push({ name, ok: false, error });
      }
    }

    const succeeded = items.filter((item) => item.ok).length;
    this.logger.info({ prefix, succeeded, failed: total - succeeded }, "Batch spawn finished");
    return { items, succeeded, failed: total - succeeded };
  }
}
