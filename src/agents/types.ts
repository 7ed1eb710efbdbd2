import type { SignalFailureError } from "../errors.js";
import type { AgentRecord } from "../registry/types.js";

export interface SpawnOptions {
  /** Agent type (executable profile); defaults to the configured default. */
  readonly type?: string;
  /** Called once the request has been validated, just before the process starts. */
  readonly onLaunching?: (name: string) => void;
}

export interface AgentStatusView {
  readonly record: AgentRecord;
  readonly alive: boolean;
}

export interface ResolvedAgent extends AgentStatusView {
  readonly logPath: string;
}

export type StopOutcome = "stopped" | "already-stopped" | "failed";

export interface StopResult {
  readonly name: string;
  readonly pid: number;
  readonly outcome: StopOutcome;
  readonly error?: SignalFailureError;
}

export interface StopAllSummary {
  readonly results: readonly StopResult[];
  /** Agents signalled by this call. */
  readonly stopped: number;
  readonly failed: number;
}

export interface CleanSummary {
  readonly removed: readonly string[];
}

export type BatchItem =
  | { readonly name: string; readonly ok: true; readonly record: AgentRecord }
  | { readonly name: string; readonly ok: false; readonly error: Error };

export interface BatchSummary {
  readonly items: readonly BatchItem[];
  readonly succeeded: number;
  readonly failed: number;
}
