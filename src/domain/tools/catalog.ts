import path from "path";
import type { AgentSettings, BridgeConfig } from "../../config";
import { Rules, type ValidationRule } from "../validation/ValidationRule";
import {
  buildInputSchema,
  DEFAULT_AGENT_TIMEOUT_MS,
  type CliArgProjection,
  type ToolDescriptor,
} from "./ToolDescriptor";

interface ToolShape {
  rules: ValidationRule[];
  required?: string[];
  requireOneOf?: string[][];
  cliArgs?: CliArgProjection[];
}

/** Argument rules for the agents the bridge ships with. */
export const TOOL_SHAPES: Record<string, ToolShape> = {
  label_github_issue: {
    rules: [
      Rules.repoName(),
      Rules.issueNumber(),
      Rules.flag("dry_run", "Preview labels without applying them."),
    ],
    required: ["repo_name", "issue_number"],
    cliArgs: [
      { field: "issue_number", flag: "--issue" },
      { field: "repo_name", flag: "--repo" },
      { field: "dry_run", flag: "--dry-run" },
    ],
  },
  watch_collect: {
    rules: [
      Rules.sources(),
      Rules.text("output_format", { maxLength: 32, description: "Report format (markdown or json)." }),
    ],
  },
  analyse_watch_report: {
    rules: [
      Rules.text("report", { description: "Inline report content to analyse." }),
      Rules.text("report_path", { maxLength: 1024, description: "Path to a report file inside the workspace." }),
      Rules.text("format", { maxLength: 32, description: "Output format." }),
    ],
    requireOneOf: [["report", "report_path"]],
  },
  curate_digest: {
    rules: [
      Rules.text("format", { maxLength: 32, description: "Digest layout, e.g. newsletter." }),
      Rules.text("output", { maxLength: 32, description: "Output encoding, e.g. markdown." }),
    ],
  },
};

export function buildToolDescriptors(config: BridgeConfig): ToolDescriptor[] {
  return Object.entries(config.agents).map(([name, settings]) =>
    buildToolDescriptor(name, settings, config)
  );
}

export function buildToolDescriptor(
  name: string,
  settings: AgentSettings,
  config: BridgeConfig
): ToolDescriptor {
  const shape: ToolShape = TOOL_SHAPES[name] ?? { rules: [] };
  const workspace = config.workspace.path;
  const required = shape.required ?? [];
  const cliArgs = settings.cliArgs
    ? Object.entries(settings.cliArgs).map(([field, flag]) => ({ field, flag }))
    : shape.cliArgs ?? [];

  return {
    name,
    description: settings.description,
    inputSchema: buildInputSchema(shape.rules, required),
    rules: shape.rules,
    required,
    requireOneOf: shape.requireOneOf ?? [],
    agent: {
      interpreter: path.resolve(workspace, settings.python ?? config.workspace.globalPython),
      script: path.resolve(workspace, settings.path),
      workingDirectory: workspace,
      timeoutMs:
        settings.timeout > 0 ? Math.round(settings.timeout * 1000) : DEFAULT_AGENT_TIMEOUT_MS,
      cliArgs,
      defaults: settings.defaults,
      env: settings.env,
    },
  };
}
