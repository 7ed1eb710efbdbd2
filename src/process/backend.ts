import { spawn, spawnSync } from "node:child_process";
import { accessSync, closeSync, constants, openSync, statSync } from "node:fs";
import { delimiter, extname, isAbsolute, join, resolve } from "node:path";
import { LaunchError, SignalFailureError, errnoCode, errorToString } from "../errors.js";
import type { Logger } from "../logger.js";
import type { LaunchConfig, ProcessBackend } from "./types.js";

const LOG_FILE_MODE = 0o600;

/**
 * Launch, probe and lookup behaviour common to every platform. Subclasses
 * decide how a process is terminated and how PATH entries are matched.
 */
abstract class DetachedProcessBackend implements ProcessBackend {
  protected readonly logger: Logger;

  constructor(
    logger: Logger,
    protected readonly env: NodeJS.ProcessEnv = process.env,
  ) {
    this.logger = logger.child({ component: "process" });
  }

  abstract terminate(pid: number): void;

  protected abstract executableCandidates(command: string): string[];

  /** Whether the command has to be started through the platform shell. */
  protected needsShell(_command: string): boolean {
    return false;
  }

  launch(config: LaunchConfig): number {
    const stdin = openSync(config.stdinPath, "r");
    let output: number;
    try {
      output = openSync(config.outputPath, "a", LOG_FILE_MODE);
    } catch (err) {
      closeSync(stdin);
      throw err;
    }

    const shell = this.needsShell(config.command);
    try {
      const child = spawn(shell ? `"${config.command}"` : config.command, [...config.args], {
        cwd: config.cwd,
        env: { ...this.env, ...config.env },
        stdio: [stdin, output, output],
        detached: true,
        windowsHide: true,
        shell,
      });

      // spawn failures arrive asynchronously; without a listener they would crash the CLI
      child.on("error", (err) => {
        this.logger.error({ command: config.command, error: errorToString(err) }, "Agent process error");
      });

      if (child.pid === undefined) {
        throw new LaunchError(config.command, "no process id was assigned");
      }

      child.unref();
      this.logger.info({ pid: child.pid, command: config.command, args: config.args, cwd: config.cwd }, "Launched detached process");
      return child.pid;
    } finally {
      // the child holds its own copies of the descriptors
      closeSync(stdin);
      closeSync(output);
    }
  }

  isAlive(pid: number): boolean {
    if (!Number.isInteger(pid) || pid <= 0) return false;
    try {
      process.kill(pid, 0);
      return true;
    } catch (err) {
      // EPERM: the process exists but belongs to another user
      return errnoCode(err) === "EPERM";
    }
  }

  resolveExecutable(command: string): string | null {
    if (command.includes("/") || command.includes("\\")) {
      const path = isAbsolute(command) ? command : resolve(command);
      return this.executableCandidates(path).find(isExecutableFile) ?? null;
    }

    const dirs = (this.env.PATH ?? this.env.Path ?? "").split(delimiter).filter(Boolean);
    for (const dir of dirs) {
      const match = this.executableCandidates(join(dir, command)).find(isExecutableFile);
      if (match) return match;
    }
    return null;
  }
}

export class PosixProcessBackend extends DetachedProcessBackend {
  /**
   * Detached children lead their own process group; signal the group so
   * helpers the agent started go too, falling back to the pid alone.
   */
  terminate(pid: number): void {
    if (!Number.isInteger(pid) || pid <= 0) {
      throw new SignalFailureError(pid, "not a valid process id");
    }
    try {
      process.kill(-pid, "SIGTERM");
    } catch (groupErr) {
      if (errnoCode(groupErr) !== "ESRCH") {
        throw new SignalFailureError(pid, errorToString(groupErr), { cause: groupErr });
      }
      try {
        process.kill(pid, "SIGTERM");
      } catch (err) {
        throw new SignalFailureError(pid, errorToString(err), { cause: err });
      }
    }
    this.logger.info({ pid }, "Sent SIGTERM");
  }

  protected executableCandidates(path: string): string[] {
    return [path];
  }
}

export class WindowsProcessBackend extends DetachedProcessBackend {
  terminate(pid: number): void {
    if (!Number.isInteger(pid) || pid <= 0) {
      throw new SignalFailureError(pid, "not a valid process id");
    }
    const result = spawnSync("taskkill", ["/PID", String(pid), "/T", "/F"], {
      windowsHide: true,
      encoding: "utf-8",
    });
    if (result.error) {
      throw new SignalFailureError(pid, errorToString(result.error), { cause: result.error });
    }
    if (result.status !== 0) {
      throw new SignalFailureError(pid, result.stderr.trim() || `taskkill exited with ${result.status}`);
    }
    this.logger.info({ pid }, "Terminated with taskkill");
  }

  protected executableCandidates(path: string): string[] {
    const extensions = (this.env.PATHEXT ?? ".COM;.EXE;.BAT;.CMD").split(";").filter(Boolean);
    const withExt = extensions.map((ext) => path + ext.toLowerCase());
    return extname(path) ? [path, ...withExt] : withExt;
  }

  // .cmd and .bat shims (how npm installs CLIs) cannot be spawned without a shell
  protected needsShell(command: string): boolean {
    return /\.(cmd|bat)$/i.test(command);
  }
}

export function createProcessBackend(
  logger: Logger,
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): ProcessBackend {
  return platform === "win32" ? new WindowsProcessBackend(logger, env) : new PosixProcessBackend(logger, env);
}

function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
