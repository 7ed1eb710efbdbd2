import { spawn } from "node:child_process";

/**
 * Open `path` in the pager named by $PAGER, which may carry its own
 * arguments (`less -R`). Resolves when the pager exits.
 */
export function openPager(pager: string, path: string): Promise<void> {
  const [command = "less", ...args] = pager.split(/\s+/).filter(Boolean);
  return new Promise((resolve, reject) => {
    const child = spawn(command, [...args, path], { stdio: "inherit" });
    child.on("error", (err) => {
      reject(new Error(`Failed to run pager '${command}': ${err.message}`));
    });
    child.on("exit", () => {
      resolve();
    });
  });
}
