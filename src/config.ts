import { readFileSync, existsSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { z } from "zod";
import { ConfigError, errorToString } from "./errors.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const AgentTypeSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  label: z.string().min(1).optional(),
});

export interface AgentType {
  readonly command: string;
  readonly args: readonly string[];
  readonly label: string;
}

const ConfigFileSchema = z
  .object({
    logLevel: z.enum(LOG_LEVELS).optional(),
    defaultType: z.string().min(1).optional(),
    agentTypes: z.record(z.string(), AgentTypeSchema).optional(),
  })
  .strict();

export interface DroverConfig {
  readonly baseDir: string;
  readonly logLevel: LogLevel;
  readonly defaultType: string;
  readonly agentTypes: Readonly<Record<string, AgentType>>;
}

const DEFAULT_AGENT_TYPES: Record<string, AgentType> = {
  claude: {
    command: "claude",
    args: ["-p", "--dangerously-skip-permissions"],
    label: "Claude Code",
  },
};

const DEFAULTS = {
  logLevel: "warn",
  defaultType: "claude",
} satisfies Pick<DroverConfig, "logLevel" | "defaultType">;

export const CONFIG_FILE_NAME = "config.json";

export interface LoadConfigOptions {
  readonly env?: NodeJS.ProcessEnv;
  /** Overrides `<baseDir>/config.json`. */
  readonly configPath?: string;
}

export function defaultBaseDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.DROVER_HOME?.trim();
  return override ? resolve(override) : join(homedir(), ".drover");
}

/**
 * Layers defaults, the optional config file in the base directory, then
 * DROVER_* environment variables.
 */
export function loadConfig(options: LoadConfigOptions = {}): DroverConfig {
  const env = options.env ?? process.env;
  const baseDir = defaultBaseDir(env);
  const filePath = options.configPath ?? join(baseDir, CONFIG_FILE_NAME);
  const fileConfig = readConfigFile(filePath);

  const agentTypes: Record<string, AgentType> = { ...DEFAULT_AGENT_TYPES };
  for (const [name, input] of Object.entries(fileConfig.agentTypes ?? {})) {
    agentTypes[name] = {
      command: input.command,
      args: input.args,
      label: input.label ?? name,
    };
  }

  const logLevel = parseLogLevel(env.DROVER_LOG_LEVEL) ?? fileConfig.logLevel ?? DEFAULTS.logLevel;
  const defaultType = env.DROVER_AGENT_TYPE?.trim() || fileConfig.defaultType || DEFAULTS.defaultType;

  if (!(defaultType in agentTypes)) {
    throw new ConfigError(`Default agent type '${defaultType}' is not defined in agentTypes`);
  }

  return { baseDir, logLevel, defaultType, agentTypes };
}

function readConfigFile(filePath: string): z.infer<typeof ConfigFileSchema> {
  if (!existsSync(filePath)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Failed to load config from ${filePath}: ${errorToString(err)}`, { cause: err });
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid config in ${filePath}: ${detail}`);
  }
  return parsed.data;
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
}
