import type { ToolDescriptor } from "../tools/ToolDescriptor";
import type {
  BooleanRule,
  EnumArrayRule,
  IntegerRule,
  StringRule,
  ValidationFailure,
  ValidationRule,
} from "./ValidationRule";

export const SHELL_METACHARACTERS = /[;|&$`<>()\r\n]/g;

export interface ValidatorOptions {
  /** Gates the overall payload size check. */
  validateInputs: boolean;
  /** Gates metacharacter stripping of free-form strings. */
  sanitizeInputs: boolean;
  maxParamLength: number;
  maxPayloadBytes: number;
}

export const DEFAULT_VALIDATOR_OPTIONS: ValidatorOptions = {
  validateInputs: true,
  sanitizeInputs: true,
  maxParamLength: 10_000,
  maxPayloadBytes: 10_000,
};

export type ArgumentMap = Record<string, unknown>;

export type ValidationResult =
  | { ok: true; value: ArgumentMap }
  | { ok: false; failure: ValidationFailure };

type FieldResult = { ok: true; value: unknown } | { ok: false; failure: ValidationFailure };

export function sanitizeString(value: string): string {
  return value.replace(SHELL_METACHARACTERS, "");
}

export function isPlainObject(value: unknown): value is ArgumentMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Checks a request's arguments against the tool's declared rules and returns
 * the sanitized mapping with the tool's defaults merged underneath.
 *
 * Pure: no I/O, no shared state.
 */
export class ParameterValidator {
  private readonly options: ValidatorOptions;

  constructor(options: Partial<ValidatorOptions> = {}) {
    this.options = { ...DEFAULT_VALIDATOR_OPTIONS, ...options };
  }

  validate(descriptor: ToolDescriptor, rawArguments: unknown): ValidationResult {
    const raw = rawArguments === undefined || rawArguments === null ? {} : rawArguments;
    if (!isPlainObject(raw)) {
      return fail("arguments", "shape", "arguments must be an object");
    }

    if (this.options.validateInputs) {
      const size = Buffer.byteLength(JSON.stringify(raw), "utf8");
      if (size > this.options.maxPayloadBytes) {
        return fail(
          "arguments",
          "payloadSize",
          `params payload is too large (max ${this.options.maxPayloadBytes} bytes)`
        );
      }
    }

    const defaults = descriptor.agent.defaults;
    const validated: ArgumentMap = {};
    const declared = new Set<string>();

    for (const rule of descriptor.rules) {
      declared.add(rule.field);
      const value = raw[rule.field];
      if (value === undefined) {
        if (descriptor.required.includes(rule.field)) {
          return fail(rule.field, "required", `Missing required parameter: ${rule.field}`);
        }
        continue;
      }

      const checked = this.checkField(rule, value, defaults[rule.field]);
      if (!checked.ok) return checked;
      validated[rule.field] = checked.value;
    }

    for (const field of descriptor.required) {
      if (!declared.has(field) && raw[field] === undefined) {
        return fail(field, "required", `Missing required parameter: ${field}`);
      }
    }

    for (const group of descriptor.requireOneOf) {
      if (!group.some((field) => raw[field] !== undefined)) {
        return fail(
          group.join("|"),
          "required",
          `Missing ${group.map((field) => `'${field}'`).join(" or ")} parameter`
        );
      }
    }

    for (const [field, value] of Object.entries(raw)) {
      if (declared.has(field)) continue;
      validated[field] = this.options.sanitizeInputs ? deepSanitize(value) : value;
    }

    return { ok: true, value: { ...defaults, ...validated } };
  }

  private checkField(rule: ValidationRule, value: unknown, fallback: unknown): FieldResult {
    switch (rule.kind) {
      case "string":
        return this.checkString(rule, value);
      case "integer":
        return checkInteger(rule, value);
      case "enum-array":
        return checkEnumArray(rule, value, fallback);
      case "boolean":
        return checkBoolean(rule, value);
    }
  }

  private checkString(rule: StringRule, value: unknown): FieldResult {
    if (typeof value !== "string") {
      return fail(rule.field, "type", `${rule.field} must be a string, got ${describeType(value)}`);
    }

    const maxLength = rule.maxLength ?? this.options.maxParamLength;
    if (value.length > maxLength) {
      return fail(rule.field, "maxLength", `${rule.field} is too long (max ${maxLength} characters)`);
    }

    if (rule.pattern && !rule.pattern.test(value)) {
      return fail(
        rule.field,
        "pattern",
        `Invalid ${rule.field} format: '${value}'. Expected format: '${rule.formatHint ?? rule.pattern.source}'`
      );
    }

    const shouldSanitize = rule.sanitize !== false && this.options.sanitizeInputs;
    return { ok: true, value: shouldSanitize ? sanitizeString(value) : value };
  }
}

function checkInteger(rule: IntegerRule, value: unknown): FieldResult {
  let num: number;
  if (typeof value === "number" && Number.isInteger(value)) {
    num = value;
  } else if (typeof value === "string" && /^-?\d+$/.test(value.trim())) {
    num = Number.parseInt(value.trim(), 10);
  } else {
    return fail(rule.field, "type", `Invalid ${rule.field}: expected an integer, got ${describeType(value)}`);
  }

  if (num < rule.min) {
    return fail(rule.field, "range", `${rule.field} must be at least ${rule.min}`);
  }
  if (num > rule.max) {
    return fail(rule.field, "range", `${rule.field} is too large (max ${rule.max})`);
  }
  return { ok: true, value: num };
}

function checkEnumArray(rule: EnumArrayRule, value: unknown, fallback: unknown): FieldResult {
  if (!Array.isArray(value)) {
    return fail(rule.field, "type", `${rule.field} must be a list, got ${describeType(value)}`);
  }

  for (const member of value) {
    if (typeof member !== "string") {
      return fail(rule.field, "type", `${rule.field} members must be strings, got ${describeType(member)}`);
    }
    if (!rule.allowed.includes(member)) {
      return fail(
        rule.field,
        "allowedValues",
        `Invalid ${rule.field} member '${member}'. Allowed: ${rule.allowed.join(", ")}`
      );
    }
  }

  if (value.length === 0 && rule.emptyUsesDefault && Array.isArray(fallback)) {
    return { ok: true, value: [...fallback] };
  }
  return { ok: true, value: [...value] };
}

function checkBoolean(rule: BooleanRule, value: unknown): FieldResult {
  if (typeof value !== "boolean") {
    return fail(rule.field, "type", `${rule.field} must be a boolean, got ${describeType(value)}`);
  }
  return { ok: true, value };
}

function deepSanitize(value: unknown): unknown {
  if (typeof value === "string") return sanitizeString(value);
  if (Array.isArray(value)) return value.map(deepSanitize);
  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, inner]) => [key, deepSanitize(inner)])
    );
  }
  return value;
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function fail(field: string, rule: ValidationFailure["rule"], message: string): { ok: false; failure: ValidationFailure } {
  return { ok: false, failure: { field, rule, message } };
}
