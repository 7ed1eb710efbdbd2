import { rm, writeFile } from "node:fs/promises";
import type { AgentType } from "../config.js";
import {
  AgentNotFoundError,
  DependencyMissingError,
  DroverError,
  DuplicateAgentError,
  InvalidNameError,
  LaunchError,
  OrphanedProcessError,
  SignalFailureError,
  UnknownAgentTypeError,
  errorToString,
} from "../errors.js";
import type { Logger } from "../logger.js";
import type { ProcessBackend } from "../process/types.js";
import { findAgent, updateRegistry, type AgentRecord, type RegistryStore } from "../registry/types.js";
import type { AgentPaths } from "./paths.js";
import { DEFAULT_TASK, renderPrompt } from "./prompt.js";
import type {
  AgentStatusView,
  CleanSummary,
  ResolvedAgent,
  SpawnOptions,
  StopAllSummary,
  StopResult,
} from "./types.js";

export const AGENT_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

const PROMPT_FILE_MODE = 0o600;

export function assertValidAgentName(name: string): void {
  if (!AGENT_NAME_PATTERN.test(name)) {
    throw new InvalidNameError(name);
  }
}

export interface AgentLifecycleDeps {
  readonly store: RegistryStore;
  readonly backend: ProcessBackend;
  readonly paths: AgentPaths;
  readonly agentTypes: Readonly<Record<string, AgentType>>;
  readonly defaultType: string;
  /** Working directory handed to spawned agents. */
  readonly cwd: string;
  readonly logger: Logger;
  readonly now?: () => Date;
}

/**
 * Spawns, stops and reaps agents. Every operation loads the registry fresh
 * and saves the whole document back; nothing is held between calls.
 *
 * There is no lock across invocations. Two concurrent spawns of the same
 * name can both pass the duplicate check; the later save wins.
 */
export class AgentLifecycleManager {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: AgentLifecycleDeps) {
    this.logger = deps.logger.child({ component: "lifecycle" });
    this.now = deps.now ?? (() => new Date());
  }

  async spawn(name: string, task: string = DEFAULT_TASK, options: SpawnOptions = {}): Promise<AgentRecord> {
    const { store, backend, paths } = this.deps;

    assertValidAgentName(name);
    const typeName = options.type ?? this.deps.defaultType;
    const agentType = this.agentType(typeName);

    const executable = backend.resolveExecutable(agentType.command);
    if (!executable) {
      throw new DependencyMissingError(agentType.command);
    }

    if (findAgent(await store.load(), name)) {
      throw new DuplicateAgentError(name);
    }

    await paths.ensure();
    const promptPath = paths.promptFile(name);
    const logPath = paths.logFile(name);
    const prompt = renderPrompt({ name, task, label: agentType.label, cwd: this.deps.cwd });
    await writeFile(promptPath, prompt, { mode: PROMPT_FILE_MODE });

    this.logger.info({ name, type: typeName, executable }, "Spawning agent");
    options.onLaunching?.(name);

    let pid: number;
    try {
      pid = backend.launch({
        command: executable,
        args: agentType.args,
        cwd: this.deps.cwd,
        stdinPath: promptPath,
        outputPath: logPath,
      });
    } catch (err) {
      await rm(promptPath, { force: true });
      if (err instanceof DroverError) throw err;
      throw new LaunchError(agentType.command, errorToString(err), { cause: err });
    }

    const record: AgentRecord = {
      name,
      pid,
      logPath,
      promptPath,
      status: "running",
      startedAt: this.now().toISOString(),
      type: typeName,
    };

    try {
      await updateRegistry(store, (registry) => {
        const index = registry.agents.findIndex((agent) => agent.name === name);
        if (index === -1) {
          registry.agents.push(record);
          return;
        }
        const previous = registry.agents[index];
        this.logger.warn({ name, previousPid: previous?.pid, pid }, "Agent registered concurrently; overwriting record");
        registry.agents[index] = record;
      });
    } catch (err) {
      // No rollback: killing the process could throw away useful work.
      this.logger.error({ name, pid, error: errorToString(err) }, "Agent launched but not recorded; process is orphaned");
      throw new OrphanedProcessError(name, pid, { cause: err });
    }

    this.logger.info({ name, pid }, "Agent spawned");
    return record;
  }

  /** Stopping an agent that already exited is not an error. */
  async stop(name: string): Promise<StopResult> {
    const registry = await this.deps.store.load();
    const record = findAgent(registry, name);
    if (!record) {
      throw new AgentNotFoundError(name);
    }

    const result = this.stopRecord(record);
    if (result.outcome !== "failed" && record.status !== "stopped") {
      record.status = "stopped";
      await this.deps.store.save(registry);
    }
    return result;
  }

  /** Stops every agent recorded as running; one failure never blocks the rest. */
  async stopAll(): Promise<StopAllSummary> {
    const registry = await this.deps.store.load();
    const results: StopResult[] = [];

    for (const record of registry.agents) {
      if (record.status !== "running") continue;
      const result = this.stopRecord(record);
      if (result.outcome !== "failed") {
        record.status = "stopped";
      }
      results.push(result);
    }

    if (results.some((r) => r.outcome !== "failed")) {
      await this.deps.store.save(registry);
    }

    return {
      results,
      stopped: results.filter((r) => r.outcome === "stopped").length,
      failed: results.filter((r) => r.outcome === "failed").length,
    };
  }

  /**
   * Every record with its true liveness. Records still marked running whose
   * process has gone are corrected and saved before returning.
   */
  async list(): Promise<AgentStatusView[]> {
    const registry = await this.deps.store.load();
    const views: AgentStatusView[] = [];
    let corrected = 0;

    for (const record of registry.agents) {
      const alive = this.deps.backend.isAlive(record.pid);
      if (!alive && record.status === "running") {
        record.status = "stopped";
        corrected++;
      }
      views.push({ record, alive });
    }

    if (corrected > 0) {
      this.logger.info({ corrected }, "Marked exited agents as stopped");
      await this.deps.store.save(registry);
    }
    return views;
  }

  /**
   * Removes agents already marked stopped or whose process is confirmed gone,
   * and deletes their prompt files. Log files are kept.
   */
  async clean(): Promise<CleanSummary> {
    const registry = await this.deps.store.load();
    const kept: AgentRecord[] = [];
    const removed: AgentRecord[] = [];

    for (const record of registry.agents) {
      // a stopped record's pid may since have been reused by another process
      if (record.status === "running" && this.deps.backend.isAlive(record.pid)) {
        kept.push(record);
      } else {
        record.status = "stopped";
        removed.push(record);
      }
    }

    if (removed.length === 0) {
      return { removed: [] };
    }

    registry.agents = kept;
    await this.deps.store.save(registry);

    for (const record of removed) {
      const promptPath = this.deps.paths.promptFile(record.name);
      try {
        await rm(promptPath, { force: true });
      } catch (err) {
        this.logger.warn({ name: record.name, promptPath, error: errorToString(err) }, "Failed to delete prompt file");
      }
    }

    this.logger.info({ removed: removed.length }, "Cleaned stopped agents");
    return { removed: removed.map((r) => r.name) };
  }

  /** Exact-name lookup for attach and logs. */
  async resolve(name: string): Promise<ResolvedAgent> {
    const record = findAgent(await this.deps.store.load(), name);
    if (!record) {
      throw new AgentNotFoundError(name);
    }
    return {
      record,
      alive: this.deps.backend.isAlive(record.pid),
      logPath: this.deps.paths.logFile(record.name),
    };
  }

  agentTypeNames(): string[] {
    return Object.keys(this.deps.agentTypes);
  }

  private agentType(typeName: string): AgentType {
    const agentType = Object.hasOwn(this.deps.agentTypes, typeName) ? this.deps.agentTypes[typeName] : undefined;
    if (!agentType) {
      throw new UnknownAgentTypeError(typeName, this.agentTypeNames());
    }
    return agentType;
  }

  private stopRecord(record: AgentRecord): StopResult {
    const base = { name: record.name, pid: record.pid };
    if (!this.deps.backend.isAlive(record.pid)) {
      return { ...base, outcome: "already-stopped" };
    }

    try {
      this.deps.backend.terminate(record.pid);
      this.logger.info(base, "Agent stopped");
      return { ...base, outcome: "stopped" };
    } catch (err) {
      const error = err instanceof SignalFailureError ? err : new SignalFailureError(record.pid, errorToString(err), { cause: err });
      this.logger.warn({ ...base, error: error.message }, "Could not stop agent");
      return { ...base, outcome: "failed", error };
    }
  }
}
