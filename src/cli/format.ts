import type { AgentStatusView, BatchSummary, StopAllSummary, StopResult } from "../agents/types.js";
import type { AgentRecord } from "../registry/types.js";

export const info = (message: string): string => `ℹ ${message}`;
export const ok = (message: string): string => `✓ ${message}`;
export const warn = (message: string): string => `⚠ ${message}`;
export const fail = (message: string): string => `✗ ${message}`;

const RULE = "─".repeat(49);

export function formatAgentTable(views: readonly AgentStatusView[]): string {
  const lines = ["", "  NAME           PID      STATUS    LOG", `  ${RULE}`];
  if (views.length === 0) {
    lines.push("  (no agents)");
  }
  for (const { record, alive } of views) {
    const status = alive ? "running" : "stopped";
    lines.push(`  ${record.name.padEnd(14)} ${String(record.pid).padEnd(8)} ${status.padEnd(9)} ${record.logPath}`);
  }
  lines.push("");
  return lines.join("\n");
}

export function formatSpawned(record: AgentRecord, bin: string): string {
  return [
    ok("Agent spawned"),
    "",
    `  Name:    ${record.name}`,
    `  PID:     ${record.pid}`,
    ...(record.type ? [`  Type:    ${record.type}`] : []),
    `  Log:     ${record.logPath}`,
    `  Prompt:  ${record.promptPath}`,
    "",
    `  Monitor: ${bin} attach ${record.name}`,
    `  Stop:    ${bin} stop ${record.name}`,
    "",
  ].join("\n");
}

export function formatBatch(summary: BatchSummary): string {
  const lines = summary.items.map((item) =>
    item.ok ? ok(`${item.name} (pid ${item.record.pid})`) : fail(`${item.name}: ${item.error.message}`),
  );
  const total = summary.succeeded + summary.failed;
  const tail = summary.failed > 0 ? ` (${summary.failed} failed)` : "";
  lines.push(`Spawned ${summary.succeeded}/${total} agent(s)${tail}`);
  return lines.join("\n");
}

export function formatStopResult(result: StopResult): string {
  switch (result.outcome) {
    case "stopped":
      return ok(`Stopped ${result.name}`);
    case "already-stopped":
      return warn(`Agent ${result.name} already stopped`);
    case "failed":
      return fail(`Failed to stop ${result.name}: ${result.error?.message ?? "unknown error"}`);
  }
}

export function formatStopAll(summary: StopAllSummary): string {
  const lines = summary.results.map(formatStopResult);
  const tail = summary.failed > 0 ? `, ${summary.failed} could not be stopped` : "";
  lines.push(`Stopped ${summary.stopped} agent(s)${tail}`);
  return lines.join("\n");
}

export function helpText(bin: string): string {
  return `${bin} - spawn and manage independent coding agents

USAGE:
    ${bin} <command> [arguments]

COMMANDS:
    spawn <name> [task] [--type T]                 Spawn a new independent agent
    spawn-multi <count> <prefix> [task] [--type T]  Spawn <prefix>-1 … <prefix>-<count>;
                                                    {n} / {N} in the task become the index
    list                                           List all agents (running and stopped)
    attach <name>                                  Follow an agent's output (Ctrl+C to detach)
    stop <name>                                    Stop a running agent
    stop --all                                     Stop all agents
    clean                                          Remove stopped agents from the registry
    logs <name>                                    View the full log file
    help                                           Show this help

EXAMPLES:
    ${bin} spawn frontend "Build React dashboard"
    ${bin} spawn-multi 3 worker "Process module {n}"
    ${bin} list
    ${bin} attach frontend
    ${bin} stop frontend
    ${bin} clean

ENVIRONMENT:
    DROVER_HOME        Base directory (default: ~/.drover)
    DROVER_LOG_LEVEL   debug | info | warn | error (default: warn)
    DROVER_AGENT_TYPE  Default agent type (default: claude)
`;
}
