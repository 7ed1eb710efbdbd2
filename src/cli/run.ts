import type { BatchSpawner } from "../agents/batch.js";
import type { AgentLifecycleManager } from "../agents/lifecycle.js";
import { dumpLog, followLog } from "../agents/log-follower.js";
import { DroverError, UsageError, errorToString } from "../errors.js";
import { parseArgs, stringFlag, type ParsedArgs } from "./args.js";
import {
  fail,
  formatAgentTable,
  formatBatch,
  formatSpawned,
  formatStopAll,
  formatStopResult,
  helpText,
  info,
  ok,
  warn,
} from "./format.js";

export interface Output {
  write(chunk: string | Uint8Array): unknown;
  readonly isTTY?: boolean;
}

export interface CliContext {
  readonly manager: AgentLifecycleManager;
  readonly batch: BatchSpawner;
  readonly stdout: Output;
  readonly stderr: Output;
  readonly env: NodeJS.ProcessEnv;
  /** Aborted on operator interrupt; ends `attach`. Only viewing commands are given a live signal. */
  readonly interrupt: AbortSignal;
  /** Shows a file in the operator's pager and resolves when it closes. */
  readonly openPager?: (pager: string, path: string) => Promise<void>;
  readonly bin?: string;
}

type Command = (args: ParsedArgs, ctx: CliContext) => Promise<number>;

const DEFAULT_BIN = "drover";

const COMMANDS: Record<string, Command> = {
  spawn: spawnCommand,
  run: spawnCommand,
  new: spawnCommand,
  "spawn-multi": spawnMultiCommand,
  multi: spawnMultiCommand,
  list: listCommand,
  ls: listCommand,
  ps: listCommand,
  attach: attachCommand,
  watch: attachCommand,
  stop: stopCommand,
  kill: stopCommand,
  clean: cleanCommand,
  cleanup: cleanCommand,
  logs: logsCommand,
  log: logsCommand,
};

// Commands that keep the terminal; Ctrl+C ends the view instead of the process.
const VIEWING_COMMANDS: ReadonlySet<Command> = new Set([attachCommand, logsCommand]);

/** Whether the command in `argv` takes over Ctrl+C through `CliContext.interrupt`. */
export function handlesInterrupt(argv: readonly string[]): boolean {
  const [commandName] = argv;
  if (commandName === undefined || !Object.hasOwn(COMMANDS, commandName)) return false;
  const command = COMMANDS[commandName];
  return command !== undefined && VIEWING_COMMANDS.has(command);
}

/** Runs one command and returns the process exit code. */
export async function runCli(argv: readonly string[], ctx: CliContext): Promise<number> {
  const bin = ctx.bin ?? DEFAULT_BIN;
  const [commandName = "help", ...rest] = argv;

  if (commandName === "help" || commandName === "--help" || commandName === "-h") {
    ctx.stdout.write(helpText(bin));
    return 0;
  }

  const command = Object.hasOwn(COMMANDS, commandName) ? COMMANDS[commandName] : undefined;
  if (!command) {
    ctx.stderr.write(`${fail(`Unknown command: ${commandName}`)}\n`);
    ctx.stderr.write(helpText(bin));
    return 1;
  }

  try {
    return await command(parseArgs(rest), ctx);
  } catch (err) {
    if (err instanceof UsageError) {
      ctx.stderr.write(`${fail(`Usage: ${bin} ${err.usage}`)}\n`);
    } else if (err instanceof DroverError) {
      ctx.stderr.write(`${fail(err.message)}\n`);
    } else {
      ctx.stderr.write(`${fail(`Unexpected error: ${errorToString(err)}`)}\n`);
    }
    return 1;
  }
}

function println(out: Output, text: string): void {
  out.write(`${text}\n`);
}

function agentTypeFlag(args: ParsedArgs, usage: string): string | undefined {
  if (args.flags.type === true) throw new UsageError(usage);
  return stringFlag(args, "type");
}

async function spawnCommand(args: ParsedArgs, ctx: CliContext): Promise<number> {
  const usage = "spawn <name> [task] [--type T]";
  const [name, ...taskWords] = args.positional;
  if (!name) throw new UsageError(usage);

  const type = agentTypeFlag(args, usage);
  const task = taskWords.length > 0 ? taskWords.join(" ") : undefined;

  const record = await ctx.manager.spawn(name, task, {
    type,
    onLaunching: (agent) => println(ctx.stdout, info(`Spawning agent: ${agent}`)),
  });
  ctx.stdout.write(formatSpawned(record, ctx.bin ?? DEFAULT_BIN));
  return 0;
}

/** Exits 0 even when some items fail; the summary reports them. */
async function spawnMultiCommand(args: ParsedArgs, ctx: CliContext): Promise<number> {
  const usage = "spawn-multi <count> <prefix> [task] [--type T]";
  const [count, prefix, ...taskWords] = args.positional;
  if (!count || !prefix) throw new UsageError(usage);

  const type = agentTypeFlag(args, usage);
  const template = taskWords.length > 0 ? taskWords.join(" ") : undefined;

  const summary = await ctx.batch.spawnMany(count, prefix, template, { type });
  println(ctx.stdout, formatBatch(summary));
  return 0;
}

async function listCommand(_args: ParsedArgs, ctx: CliContext): Promise<number> {
  println(ctx.stdout, formatAgentTable(await ctx.manager.list()));
  return 0;
}

async function stopCommand(args: ParsedArgs, ctx: CliContext): Promise<number> {
  if (args.flags.all === true) {
    println(ctx.stdout, info("Stopping all agents..."));
    println(ctx.stdout, formatStopAll(await ctx.manager.stopAll()));
    return 0;
  }

  const [name] = args.positional;
  if (!name) throw new UsageError("stop <name> | stop --all");

  const result = await ctx.manager.stop(name);
  const line = formatStopResult(result);
  println(result.outcome === "failed" ? ctx.stderr : ctx.stdout, line);
  return result.outcome === "failed" ? 1 : 0;
}

async function cleanCommand(_args: ParsedArgs, ctx: CliContext): Promise<number> {
  println(ctx.stdout, info("Cleaning up stopped agents..."));
  const { removed } = await ctx.manager.clean();
  println(ctx.stdout, ok(`Removed ${removed.length} stopped agent(s)`));
  return 0;
}

async function attachCommand(args: ParsedArgs, ctx: CliContext): Promise<number> {
  const [name] = args.positional;
  if (!name) throw new UsageError("attach <name>");

  const agent = await ctx.manager.resolve(name);
  const write = (chunk: Uint8Array): void => {
    ctx.stdout.write(chunk);
  };

  if (!agent.alive) {
    println(ctx.stdout, warn("Agent is not running. Showing last log output:"));
    await dumpLog(agent.logPath, write);
    return 0;
  }

  println(ctx.stdout, info(`Attached to ${agent.record.name} (Ctrl+C to detach)`));
  await followLog(agent.logPath, { write, signal: ctx.interrupt });
  return 0;
}

async function logsCommand(args: ParsedArgs, ctx: CliContext): Promise<number> {
  const [name] = args.positional;
  if (!name) throw new UsageError("logs <name>");

  const agent = await ctx.manager.resolve(name);
  const pager = ctx.env.PAGER?.trim();
  if (pager && ctx.stdout.isTTY && ctx.openPager) {
    await ctx.openPager(pager, agent.logPath);
    return 0;
  }

  await dumpLog(agent.logPath, (chunk) => {
    ctx.stdout.write(chunk);
  });
  return 0;
}
