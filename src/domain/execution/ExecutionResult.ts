import type { ValidationFailure } from "../validation/ValidationRule";

export type ExecutionOutcome =
  | "success"
  | "validation-error"
  | "timeout"
  | "agent-failure"
  | "malformed-output";

interface ResultBase {
  durationMs: number;
  exitCode: number | null;
}

export interface SuccessResult extends ResultBase {
  outcome: "success";
  payload: unknown;
}

export interface ValidationErrorResult extends ResultBase {
  outcome: "validation-error";
  failure: ValidationFailure;
}

export interface TimeoutResult extends ResultBase {
  outcome: "timeout";
  message: string;
  /** Whether the grace window ran out and SIGKILL was sent. */
  killed: boolean;
}

export interface AgentFailureResult extends ResultBase {
  outcome: "agent-failure";
  message: string;
  stdout: string;
}

export interface MalformedOutputResult extends ResultBase {
  outcome: "malformed-output";
  message: string;
  stdout: string;
}

export type FailedResult =
  | ValidationErrorResult
  | TimeoutResult
  | AgentFailureResult
  | MalformedOutputResult;

export type ExecutionResult = SuccessResult | FailedResult;

export interface ExecutionRequest {
  toolName: string;
  rawArguments: unknown;
  validatedArguments: Record<string, unknown>;
}

export function isSuccess(result: ExecutionResult): result is SuccessResult {
  return result.outcome === "success";
}

export function describeFailure(result: FailedResult): string {
  switch (result.outcome) {
    case "validation-error":
      return `Validation error: ${result.failure.message}`;
    case "timeout":
    case "agent-failure":
    case "malformed-output":
      return result.message;
  }
}

export function validationError(failure: ValidationFailure): ValidationErrorResult {
  return { outcome: "validation-error", failure, durationMs: 0, exitCode: null };
}
