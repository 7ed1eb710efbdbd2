export interface LaunchConfig {
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd: string;
  readonly env?: Record<string, string>;
  /** File fed to the child's standard input. */
  readonly stdinPath: string;
  /** File that receives stdout and stderr, appended. */
  readonly outputPath: string;
}

/**
 * Platform process capability. The lifecycle manager only talks to this, so
 * the POSIX and Windows variants share everything above it.
 */
export interface ProcessBackend {
  /** Start a detached child that outlives this process; returns its pid. */
  launch(config: LaunchConfig): number;
  /** Existence probe only. Never alters the target's state. */
  isAlive(pid: number): boolean;
  /** Ask the process to exit. Throws SignalFailureError if it could not be signalled. */
  terminate(pid: number): void;
  /** Absolute path of `command` on PATH, or null. */
  resolveExecutable(command: string): string | null;
}
