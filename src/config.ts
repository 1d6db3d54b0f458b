import fs from "fs";
import os from "os";
import path from "path";
import { z } from "zod";
import type { LogLevel } from "./ports/sys/LoggerPort";

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

const AgentSettingsSchema = z.object({
  path: z.string().min(1),
  python: z.string().min(1),
  description: z.string(),
  /** Seconds. */
  timeout: z.number().positive(),
  defaults: z.record(z.string(), z.unknown()),
  /** Field name -> command-line flag. */
  cliArgs: z.record(z.string(), z.string().min(1)),
  env: z.record(z.string(), z.string()),
});

const ConfigFileSchema = z.object({
  workspace: z
    .object({
      path: z.string().min(1),
      globalPython: z.string().min(1),
      envVar: z.string().min(1),
    })
    .partial()
    .optional(),
  logging: z
    .object({
      file: z.string().min(1),
      level: z.enum(LOG_LEVELS),
    })
    .partial()
    .optional(),
  agents: z.record(z.string(), AgentSettingsSchema.partial()).optional(),
  security: z
    .object({
      validateInputs: z.boolean(),
      sanitizeInputs: z.boolean(),
      maxParamLength: z.number().int().positive(),
      maxPayloadBytes: z.number().int().positive(),
    })
    .partial()
    .optional(),
  performance: z
    .object({
      collectMetrics: z.boolean(),
      killGraceMs: z.number().int().nonnegative(),
    })
    .partial()
    .optional(),
  credentials: z.record(z.string(), z.string()).optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface AgentSettings {
  path: string;
  python?: string;
  description: string;
  timeout: number;
  defaults: Record<string, unknown>;
  cliArgs?: Record<string, string>;
  env: Record<string, string>;
}

export interface BridgeConfig {
  workspace: {
    path: string;
    globalPython: string;
    /** Environment variable pointed at the workspace for every agent. */
    envVar: string;
  };
  logging: {
    file?: string;
    level: LogLevel;
  };
  agents: Record<string, AgentSettings>;
  security: {
    validateInputs: boolean;
    sanitizeInputs: boolean;
    maxParamLength: number;
    maxPayloadBytes: number;
  };
  performance: {
    collectMetrics: boolean;
    killGraceMs: number;
  };
  /** Overlaid on the inherited environment of every agent process. */
  credentials: Record<string, string>;
}

export interface LoadedConfig {
  config: BridgeConfig;
  path?: string;
}

const DEFAULT_CONFIG_FILENAMES = ["bridge.config.json", "config.json"];

export function defaultConfig(): BridgeConfig {
  return {
    workspace: {
      path: "~/adk-workspace",
      globalPython: "adk-env/bin/python",
      envVar: "PYTHONPATH",
    },
    logging: {
      level: "info",
    },
    agents: {
      label_github_issue: {
        path: "github_labeler/main.py",
        description: "GitHub Issue Labeler Agent",
        timeout: 300,
        defaults: { dry_run: true },
        env: {},
      },
      watch_collect: {
        path: "veille_agent/main.py",
        python: "veille_agent/.venv/bin/python",
        description: "Watch Agent collecting tech updates from package registries and forums",
        timeout: 600,
        defaults: { sources: ["github", "pypi", "npm"], output_format: "markdown" },
        env: {},
      },
      analyse_watch_report: {
        path: "gemini_analysis/main.py",
        description: "Analysis Agent summarising a watch report",
        timeout: 300,
        defaults: { format: "json" },
        env: {},
      },
      curate_digest: {
        path: "curateur_agent/main.py",
        description: "Curator Agent producing a content digest",
        timeout: 180,
        defaults: { format: "newsletter", output: "markdown" },
        env: {},
      },
    },
    security: {
      validateInputs: true,
      sanitizeInputs: true,
      maxParamLength: 10_000,
      maxPayloadBytes: 10_000,
    },
    performance: {
      collectMetrics: true,
      killGraceMs: 5_000,
    },
    credentials: {},
  };
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  warn?: (message: string) => void;
}

export function loadConfig(configPath?: string, options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env;
  const warn = options.warn ?? ((message: string) => console.warn(message));
  const searchPaths = configPath
    ? [configPath]
    : DEFAULT_CONFIG_FILENAMES.map((name) => path.resolve(process.cwd(), name));

  let config = defaultConfig();
  let loadedFrom: string | undefined;

  for (const candidate of searchPaths) {
    const resolved = path.resolve(candidate);
    if (!fs.existsSync(resolved)) continue;
    try {
      const raw: unknown = JSON.parse(fs.readFileSync(resolved, "utf8"));
      const parsed = ConfigFileSchema.safeParse(raw);
      if (!parsed.success) {
        warn(`Ignoring invalid config ${resolved}: ${formatIssues(parsed.error)}`);
        continue;
      }
      config = applyConfigFile(config, parsed.data, warn);
      loadedFrom = resolved;
      break;
    } catch (err) {
      warn(`Failed to load config from ${resolved}: ${(err as Error).message}`);
    }
  }

  config = applyEnvOverrides(config, env);
  return { config: expandPaths(config), path: loadedFrom };
}

export function applyConfigFile(
  base: BridgeConfig,
  file: ConfigFile,
  warn: (message: string) => void = () => undefined
): BridgeConfig {
  const agents: Record<string, AgentSettings> = { ...base.agents };
  for (const [name, override] of Object.entries(file.agents ?? {})) {
    const existing = agents[name];
    if (existing) {
      agents[name] = {
        ...existing,
        ...override,
        defaults: override.defaults ?? existing.defaults,
        env: { ...existing.env, ...override.env },
      };
      continue;
    }
    if (!override.path) {
      warn(`Agent "${name}" has no path configured; skipping.`);
      continue;
    }
    agents[name] = {
      path: override.path,
      python: override.python,
      description: override.description ?? name,
      timeout: override.timeout ?? 300,
      defaults: override.defaults ?? {},
      cliArgs: override.cliArgs,
      env: override.env ?? {},
    };
  }

  return {
    workspace: { ...base.workspace, ...file.workspace },
    logging: { ...base.logging, ...file.logging },
    agents,
    security: { ...base.security, ...file.security },
    performance: { ...base.performance, ...file.performance },
    credentials: { ...base.credentials, ...file.credentials },
  };
}

export function applyEnvOverrides(config: BridgeConfig, env: NodeJS.ProcessEnv): BridgeConfig {
  const next: BridgeConfig = {
    ...config,
    workspace: { ...config.workspace },
    logging: { ...config.logging },
  };

  if (env.ADK_WORKSPACE) {
    next.workspace.path = env.ADK_WORKSPACE;
  }
  const level = env.BRIDGE_LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    next.logging.level = level;
  }
  if (env.BRIDGE_LOG_FILE) {
    next.logging.file = env.BRIDGE_LOG_FILE;
  }
  return next;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function expandHome(value: string, home: string = os.homedir()): string {
  if (value === "~") return home;
  if (value.startsWith("~/")) return path.join(home, value.slice(2));
  return value;
}

function expandPaths(config: BridgeConfig): BridgeConfig {
  return {
    ...config,
    workspace: { ...config.workspace, path: expandHome(config.workspace.path) },
    logging: {
      ...config.logging,
      file: config.logging.file ? expandHome(config.logging.file) : undefined,
    },
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}
