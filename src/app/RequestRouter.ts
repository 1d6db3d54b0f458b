import readline from "readline";
import type { Readable } from "stream";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { ToolRegistry } from "../domain/tools/ToolRegistry";
import type { ParameterValidator } from "../domain/validation/ParameterValidator";
import { isPlainObject } from "../domain/validation/ParameterValidator";
import {
  describeFailure,
  isSuccess,
  validationError,
  type ExecutionResult,
  type FailedResult,
} from "../domain/execution/ExecutionResult";
import type { AgentExecutor } from "./AgentExecutor";
import type { MetricsRegistry } from "./MetricsRegistry";
import type { ResponseEncoder } from "./ResponseEncoder";
import {
  EnvelopeRequestSchema,
  envelopeError,
  envelopeResult,
  ErrorCodes,
  isMethodName,
  LegacyRequestSchema,
  legacyError,
  PROTOCOL_VERSION,
  protocolError,
  ToolCallParamsSchema,
  type BridgeResponse,
  type EnvelopeRequest,
  type InitializeResult,
  type LegacyResponse,
  type MethodName,
  type ProtocolError,
  type RequestId,
  type ServerInfo,
  type ToolCallResult,
  type ToolsListResult,
} from "../shared/contracts";

export const HEALTH_CHECK = "health_check";

export interface RequestRouterDeps {
  registry: ToolRegistry;
  validator: ParameterValidator;
  executor: AgentExecutor;
  metrics: MetricsRegistry;
  logger: LoggerPort;
  serverInfo: ServerInfo;
}

export type ToolDispatch =
  | { kind: "unknown-tool"; message: string }
  | { kind: "executed"; result: ExecutionResult };

type MethodOutcome = { result: unknown } | { error: ProtocolError };
type MethodHandler = (params: unknown) => Promise<MethodOutcome>;

/**
 * Reads one request record at a time and answers it. Requests carrying a
 * `method` field use the enveloped framing; anything else is treated as the
 * legacy `{tool, params}` form. `method` wins when both are present.
 */
export class RequestRouter {
  private readonly handlers: Readonly<Record<MethodName, MethodHandler>>;

  constructor(private readonly deps: RequestRouterDeps) {
    this.handlers = {
      initialize: async () => ({ result: this.initialize() }),
      "tools/list": async () => ({ result: this.listTools() }),
      "tools/call": (params) => this.callTool(params),
      health_check: async () => ({ result: this.deps.metrics.health() }),
    };
  }

  /** Answers records from `input` until it ends. */
  async serve(input: Readable, encoder: ResponseEncoder): Promise<void> {
    const rl = readline.createInterface({ input, crlfDelay: Infinity, terminal: false });
    let lineNumber = 0;
    try {
      for await (const line of rl) {
        lineNumber += 1;
        const response = await this.handleLine(line, lineNumber);
        if (response) encoder.write(response);
        if (encoder.closed) break;
      }
    } finally {
      rl.close();
    }
    this.deps.logger.info("Input closed; request loop finished", { lines: lineNumber });
  }

  /** Returns null for blank lines and notifications. */
  async handleLine(line: string, lineNumber = 0): Promise<BridgeResponse | null> {
    const trimmed = line.trim();
    if (!trimmed) return null;

    let record: unknown;
    try {
      record = JSON.parse(trimmed);
    } catch (err) {
      const message = `Invalid JSON on line ${lineNumber}: ${(err as Error).message}`;
      this.deps.logger.error(message);
      return looksEnveloped(trimmed)
        ? envelopeError(null, protocolError(ErrorCodes.ParseError, message))
        : legacyError(message);
    }

    return this.handleRecord(record);
  }

  async handleRecord(record: unknown): Promise<BridgeResponse | null> {
    const envelope = isPlainObject(record) && "method" in record ? record : null;
    try {
      if (envelope) return await this.handleEnvelope(envelope);
      return await this.handleLegacy(record);
    } catch (err) {
      const message = `Internal error: ${(err as Error).message}`;
      this.deps.logger.error("Unhandled error while routing request", {
        error: (err as Error).stack ?? String(err),
      });
      if (envelope) {
        return envelopeError(readId(envelope), protocolError(ErrorCodes.InternalError, message));
      }
      return legacyError(message);
    }
  }

  async handleEnvelope(record: Record<string, unknown>): Promise<BridgeResponse | null> {
    const parsed = EnvelopeRequestSchema.safeParse(record);
    if (!parsed.success) {
      return envelopeError(
        readId(record),
        protocolError(ErrorCodes.InvalidRequest, "Invalid request envelope", {
          issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
        })
      );
    }

    const request: EnvelopeRequest = parsed.data;
    const id = request.id ?? null;
    if (request.method.startsWith("notifications/")) {
      this.deps.logger.debug(`Notification received: ${request.method}`);
      return null;
    }

    if (!isMethodName(request.method)) {
      this.deps.logger.warn(`Method not found: ${request.method}`);
      return envelopeError(
        id,
        protocolError(ErrorCodes.MethodNotFound, `Method not found: ${request.method}`)
      );
    }

    const outcome = await this.handlers[request.method](request.params);
    return "error" in outcome ? envelopeError(id, outcome.error) : envelopeResult(id, outcome.result);
  }

  async handleLegacy(record: unknown): Promise<LegacyResponse> {
    const parsed = LegacyRequestSchema.safeParse(record);
    if (!parsed.success) {
      return legacyError("Missing 'tool' in payload");
    }

    const { tool, params } = parsed.data;
    if (tool === HEALTH_CHECK) {
      return { status: "success", result: this.deps.metrics.health() };
    }

    const dispatch = await this.dispatchTool(tool, params);
    if (dispatch.kind === "unknown-tool") {
      return legacyError(dispatch.message);
    }

    const { result } = dispatch;
    if (isSuccess(result)) {
      return { status: "success", result: result.payload };
    }
    const stdout = "stdout" in result && result.stdout ? { stdout: result.stdout } : {};
    return legacyError(describeFailure(result), { outcome: result.outcome, ...stdout });
  }

  /** Validate, execute and record one tool invocation. */
  async dispatchTool(name: string, rawArguments: unknown): Promise<ToolDispatch> {
    const { registry, validator, executor, metrics, logger } = this.deps;
    const descriptor = registry.get(name);
    if (!descriptor) {
      const message = `Unknown tool '${name}'. Available tools: ${[...registry.names(), HEALTH_CHECK].join(", ")}`;
      logger.error(message);
      return { kind: "unknown-tool", message };
    }

    logger.info(`Dispatching tool: ${name}`);
    const validation = validator.validate(descriptor, rawArguments);
    let result: ExecutionResult;
    if (!validation.ok) {
      logger.warn(`Parameter validation failed for ${name}`, { ...validation.failure });
      result = validationError(validation.failure);
    } else {
      try {
        result = await executor.run(
          { toolName: name, rawArguments, validatedArguments: validation.value },
          descriptor
        );
      } catch (err) {
        logger.error(`Executor failed for ${name}`, { error: (err as Error).message });
        result = {
          outcome: "agent-failure",
          message: (err as Error).message,
          stdout: "",
          durationMs: 0,
          exitCode: null,
        };
      }
    }

    metrics.record(name, result);
    logger.info(`Tool ${name} completed with status: ${result.outcome}`);
    return { kind: "executed", result };
  }

  private initialize(): InitializeResult {
    return {
      protocolVersion: PROTOCOL_VERSION,
      serverInfo: { ...this.deps.serverInfo },
      capabilities: { tools: {} },
    };
  }

  private listTools(): ToolsListResult {
    return { tools: this.deps.registry.list() };
  }

  private async callTool(params: unknown): Promise<MethodOutcome> {
    const parsed = ToolCallParamsSchema.safeParse(params);
    if (!parsed.success) {
      return {
        error: protocolError(
          ErrorCodes.InvalidParams,
          "tools/call requires params {name, arguments}"
        ),
      };
    }

    const dispatch = await this.dispatchTool(parsed.data.name, parsed.data.arguments);
    if (dispatch.kind === "unknown-tool") {
      return { error: protocolError(ErrorCodes.InvalidParams, dispatch.message) };
    }

    const { result } = dispatch;
    if (isSuccess(result)) {
      return { result: toToolCallResult(result.payload) };
    }
    return { error: toProtocolError(result) };
  }
}

export function toToolCallResult(payload: unknown): ToolCallResult {
  return {
    content: [{ type: "text", text: JSON.stringify(payload) }],
    ...(isPlainObject(payload) ? { structuredContent: payload } : {}),
    isError: false,
  };
}

export function toProtocolError(result: FailedResult): ProtocolError {
  const message = describeFailure(result);
  const base = { outcome: result.outcome, durationMs: result.durationMs, exitCode: result.exitCode };
  switch (result.outcome) {
    case "validation-error":
      return protocolError(ErrorCodes.InvalidParams, message, { ...base, ...result.failure });
    case "timeout":
      return protocolError(ErrorCodes.AgentTimeout, message, { ...base, killed: result.killed });
    case "agent-failure":
      return protocolError(ErrorCodes.AgentFailure, message, { ...base, stdout: result.stdout });
    case "malformed-output":
      return protocolError(ErrorCodes.MalformedOutput, message, { ...base, stdout: result.stdout });
  }
}

function readId(record: unknown): RequestId {
  if (!isPlainObject(record)) return null;
  const id = record.id;
  return typeof id === "string" || typeof id === "number" ? id : null;
}

function looksEnveloped(line: string): boolean {
  return line.includes('"jsonrpc"') || line.includes('"method"');
}
