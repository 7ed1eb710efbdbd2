import { BatchSpawner } from "./agents/batch.js";
import { AgentLifecycleManager } from "./agents/lifecycle.js";
import { AgentPaths } from "./agents/paths.js";
import type { DroverConfig } from "./config.js";
import type { Logger } from "./logger.js";
import { createProcessBackend } from "./process/backend.js";
import type { ProcessBackend } from "./process/types.js";
import { FileRegistryStore } from "./registry/file-store.js";
import type { RegistryStore } from "./registry/types.js";

export interface Drover {
  readonly paths: AgentPaths;
  readonly manager: AgentLifecycleManager;
  readonly batch: BatchSpawner;
}

export interface DroverOverrides {
  readonly store?: RegistryStore;
  readonly backend?: ProcessBackend;
  readonly cwd?: string;
}

/** Wire the registry, process backend and managers for one base directory. */
export function createDrover(config: DroverConfig, logger: Logger, overrides: DroverOverrides = {}): Drover {
  const paths = new AgentPaths(config.baseDir);
  const store = overrides.store ?? new FileRegistryStore(paths.registryFile, logger);
  const backend = overrides.backend ?? createProcessBackend(logger);

  const manager = new AgentLifecycleManager({
    store,
    backend,
    paths,
    agentTypes: config.agentTypes,
    defaultType: config.defaultType,
    cwd: overrides.cwd ?? process.cwd(),
    logger,
  });

  return { paths, manager, batch: new BatchSpawner(manager, logger) };
}

export { AgentLifecycleManager, AGENT_NAME_PATTERN, assertValidAgentName } from "./agents/lifecycle.js";
export type { AgentLifecycleDeps } from "./agents/lifecycle.js";
export { BatchSpawner, expandTaskTemplate, parseCount } from "./agents/batch.js";
export { AgentPaths } from "./agents/paths.js";
export { renderPrompt, DEFAULT_TASK } from "./agents/prompt.js";
export { dumpLog, followLog } from "./agents/log-follower.js";
export type * from "./agents/types.js";
export { loadConfig, defaultBaseDir } from "./config.js";
export type { DroverConfig, AgentType, LogLevel } from "./config.js";
export { createLogger, createSilentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export * from "./errors.js";
export { createProcessBackend, PosixProcessBackend, WindowsProcessBackend } from "./process/backend.js";
export type { LaunchConfig, ProcessBackend } from "./process/types.js";
export { FileRegistryStore } from "./registry/file-store.js";
export { MemoryRegistryStore } from "./registry/memory-store.js";
export type { AgentRecord, AgentStatus, Registry, RegistryStore } from "./registry/types.js";
