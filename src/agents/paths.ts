import { chmod, mkdir } from "node:fs/promises";
import { join } from "node:path";

const PRIVATE_DIR_MODE = 0o700;

/** Files for an agent are derived from its name alone, never read back from the registry. */
export class AgentPaths {
  readonly registryFile: string;
  readonly logsDir: string;

  constructor(readonly baseDir: string) {
    this.registryFile = join(baseDir, "agents.json");
    this.logsDir = join(baseDir, "logs");
  }

  logFile(name: string): string {
    return join(this.logsDir, `${name}.log`);
  }

  promptFile(name: string): string {
    return join(this.baseDir, `${name}.prompt.md`);
  }

  /** Create the base and logs directories, owner-only. */
  async ensure(): Promise<void> {
    for (const dir of [this.baseDir, this.logsDir]) {
      await mkdir(dir, { recursive: true, mode: PRIVATE_DIR_MODE });
      // mkdir leaves the mode of an existing directory alone
      await chmod(dir, PRIVATE_DIR_MODE);
    }
  }
}
