/**
 * Error hierarchy for drover.
 *
 * DroverError (base)
 * ├── ConfigError
 * ├── UsageError
 * ├── InvalidNameError
 * ├── InvalidCountError
 * ├── UnknownAgentTypeError
 * ├── DuplicateAgentError
 * ├── AgentNotFoundError
 * ├── CorruptRegistryError
 * ├── DependencyMissingError
 * ├── LaunchError
 * ├── SignalFailureError
 * └── OrphanedProcessError
 */

export type DroverErrorCode =
  | "CONFIG"
  | "USAGE"
  | "INVALID_NAME"
  | "INVALID_COUNT"
  | "UNKNOWN_AGENT_TYPE"
  | "DUPLICATE_AGENT"
  | "AGENT_NOT_FOUND"
  | "CORRUPT_REGISTRY"
  | "DEPENDENCY_MISSING"
  | "LAUNCH_FAILED"
  | "SIGNAL_FAILURE"
  | "ORPHANED_PROCESS";

export class DroverError extends Error {
  readonly code: DroverErrorCode;

  constructor(code: DroverErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DroverError";
    this.code = code;
  }
}

export class ConfigError extends DroverError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG", message, options);
    this.name = "ConfigError";
  }
}

/** Missing or malformed command-line arguments. Carries the usage line to print. */
export class UsageError extends DroverError {
  constructor(readonly usage: string) {
    super("USAGE", `Usage: ${usage}`);
    this.name = "UsageError";
  }
}

// ── Validation ───────────────────────────────────

export class InvalidNameError extends DroverError {
  constructor(readonly agentName: string) {
    super("INVALID_NAME", `Invalid agent name '${agentName}'. Use alphanumeric, dash, or underscore only.`);
    this.name = "InvalidNameError";
  }
}

export class InvalidCountError extends DroverError {
  constructor(readonly input: string) {
    super("INVALID_COUNT", `Invalid count '${input}'. Expected a positive integer.`);
    this.name = "InvalidCountError";
  }
}

export class UnknownAgentTypeError extends DroverError {
  constructor(readonly agentType: string, known: readonly string[]) {
    super("UNKNOWN_AGENT_TYPE", `Unknown agent type '${agentType}'. Known types: ${known.join(", ")}`);
    this.name = "UnknownAgentTypeError";
  }
}

// ── Registry ─────────────────────────────────────

export class DuplicateAgentError extends DroverError {
  constructor(readonly agentName: string) {
    super("DUPLICATE_AGENT", `Agent '${agentName}' already exists`);
    this.name = "DuplicateAgentError";
  }
}

export class AgentNotFoundError extends DroverError {
  constructor(readonly agentName: string) {
    super("AGENT_NOT_FOUND", `Agent not found: ${agentName}`);
    this.name = "AgentNotFoundError";
  }
}

export class CorruptRegistryError extends DroverError {
  constructor(readonly path: string, detail: string, options?: { cause?: unknown }) {
    super("CORRUPT_REGISTRY", `Registry at ${path} is corrupt: ${detail}`, options);
    this.name = "CorruptRegistryError";
  }
}

// ── Processes ────────────────────────────────────

export class DependencyMissingError extends DroverError {
  constructor(readonly command: string) {
    super("DEPENDENCY_MISSING", `'${command}' is required but was not found in PATH.`);
    this.name = "DependencyMissingError";
  }
}

export class LaunchError extends DroverError {
  constructor(readonly command: string, detail: string, options?: { cause?: unknown }) {
    super("LAUNCH_FAILED", `Failed to launch '${command}': ${detail}`, options);
    this.name = "LaunchError";
  }
}

export class SignalFailureError extends DroverError {
  constructor(readonly pid: number, detail: string, options?: { cause?: unknown }) {
    super("SIGNAL_FAILURE", `Could not signal process ${pid}: ${detail}`, options);
    this.name = "SignalFailureError";
  }
}

/**
 * The agent process was started but its registry record could not be saved.
 * The process keeps running untracked; the operator must stop it by pid.
 */
export class OrphanedProcessError extends DroverError {
  constructor(readonly agentName: string, readonly pid: number, options?: { cause?: unknown }) {
    super(
      "ORPHANED_PROCESS",
      `Agent '${agentName}' started as pid ${pid} but could not be recorded; it is running untracked (kill ${pid} to stop it)`,
      options,
    );
    this.name = "OrphanedProcessError";
  }
}

// ── Utilities ───────────────────────────────────

/**
 * Extract a loggable string from an unknown caught value.
 *
 * pino serializes log fields as JSON, and Error's message is not enumerable,
 * so pass `{ error: errorToString(err) }` rather than the raw error.
 */
export function errorToString(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Node system errors expose a string `code` such as ENOENT or ESRCH. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
