export const DEFAULT_TASK = "No task specified";

export interface PromptInput {
  readonly name: string;
  readonly task: string;
  /** Human-readable agent kind, e.g. "Claude Code". */
  readonly label: string;
  readonly cwd: string;
}

/**
 * The task is copied in as-is. The prompt file is fed to the agent on stdin
 * and never passes through a shell, so `$(…)`, backticks and braces stay inert.
 */
export function renderPrompt(input: PromptInput): string {
  return [
    `# Task: ${input.task}`,
    "",
    `You are an independent ${input.label} agent named '${input.name}'.`,
    `Work directory: ${input.cwd}`,
    "",
    "Complete the task above. When done, summarize what you accomplished.",
    "",
  ].join("\n");
}
