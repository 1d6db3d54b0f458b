export const REPO_NAME_PATTERN = /^[A-Za-z0-9_-]+\/[A-Za-z0-9_.-]+$/;
export const MAX_ISSUE_NUMBER = 999_999_999;
export const ALLOWED_SOURCES = ["github", "pypi", "npm", "reddit", "hackernews"] as const;

export type ValidationRuleName =
  | "shape"
  | "payloadSize"
  | "required"
  | "type"
  | "pattern"
  | "maxLength"
  | "range"
  | "allowedValues";

interface RuleBase {
  field: string;
  description?: string;
}

export interface StringRule extends RuleBase {
  kind: "string";
  pattern?: RegExp;
  formatHint?: string;
  /** Falls back to the validator's configured limit when omitted. */
  maxLength?: number;
  sanitize?: boolean;
}

export interface IntegerRule extends RuleBase {
  kind: "integer";
  min: number;
  max: number;
}

export interface EnumArrayRule extends RuleBase {
  kind: "enum-array";
  allowed: readonly string[];
  /** An empty array is replaced by the tool's default value for the field. */
  emptyUsesDefault?: boolean;
}

export interface BooleanRule extends RuleBase {
  kind: "boolean";
}

export type ValidationRule = StringRule | IntegerRule | EnumArrayRule | BooleanRule;

export interface ValidationFailure {
  field: string;
  rule: ValidationRuleName;
  message: string;
}

export const Rules = {
  repoName(field = "repo_name"): StringRule {
    return {
      field,
      kind: "string",
      pattern: REPO_NAME_PATTERN,
      formatHint: "owner/repo",
      maxLength: 200,
      sanitize: false,
      description: "GitHub repository in owner/repo form.",
    };
  },

  issueNumber(field = "issue_number"): IntegerRule {
    return {
      field,
      kind: "integer",
      min: 1,
      max: MAX_ISSUE_NUMBER,
      description: "Issue number to process.",
    };
  },

  sources(field = "sources"): EnumArrayRule {
    return {
      field,
      kind: "enum-array",
      allowed: ALLOWED_SOURCES,
      emptyUsesDefault: true,
      description: "Sources to collect from.",
    };
  },

  text(field: string, options: { maxLength?: number; description?: string } = {}): StringRule {
    return { field, kind: "string", sanitize: true, ...options };
  },

  flag(field: string, description?: string): BooleanRule {
    return { field, kind: "boolean", description };
  },
};
