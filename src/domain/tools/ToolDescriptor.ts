import type { ValidationRule } from "../validation/ValidationRule";

export const DEFAULT_AGENT_TIMEOUT_MS = 300_000;

export type JSONSchema = {
  type: "object";
  properties: Record<string, JSONSchemaProperty>;
  required?: string[];
  additionalProperties?: boolean;
};

export type JSONSchemaProperty =
  | { type: "string"; description?: string; pattern?: string; maxLength?: number }
  | { type: "integer"; description?: string; minimum: number; maximum: number }
  | { type: "boolean"; description?: string }
  | {
      type: "array";
      description?: string;
      items: { type: "string"; enum: string[] };
    };

/** Maps a validated field onto a command-line flag of the agent. */
export interface CliArgProjection {
  field: string;
  flag: string;
}

export interface AgentExecutionConfig {
  interpreter: string;
  script: string;
  workingDirectory: string;
  timeoutMs: number;
  cliArgs: readonly CliArgProjection[];
  defaults: Readonly<Record<string, unknown>>;
  env: Readonly<Record<string, string>>;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: JSONSchema;
  rules: readonly ValidationRule[];
  required: readonly string[];
  /** Each group needs at least one of its fields present. */
  requireOneOf: readonly (readonly string[])[];
  agent: AgentExecutionConfig;
}

export interface ToolListing {
  name: string;
  description: string;
  inputSchema: JSONSchema;
}

export function buildInputSchema(
  rules: readonly ValidationRule[],
  required: readonly string[]
): JSONSchema {
  const properties: Record<string, JSONSchemaProperty> = {};
  for (const rule of rules) {
    const described = rule.description ? { description: rule.description } : {};
    switch (rule.kind) {
      case "string":
        properties[rule.field] = {
          type: "string",
          ...described,
          ...(rule.pattern ? { pattern: rule.pattern.source } : {}),
          ...(rule.maxLength !== undefined ? { maxLength: rule.maxLength } : {}),
        };
        break;
      case "integer":
        properties[rule.field] = {
          type: "integer",
          ...described,
          minimum: rule.min,
          maximum: rule.max,
        };
        break;
      case "enum-array":
        properties[rule.field] = {
          type: "array",
          ...described,
          items: { type: "string", enum: [...rule.allowed] },
        };
        break;
      case "boolean":
        properties[rule.field] = { type: "boolean", ...described };
        break;
    }
  }

  return {
    type: "object",
    properties,
    required: [...required],
  };
}
