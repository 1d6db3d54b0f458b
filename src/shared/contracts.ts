import { z } from "zod";
import type { ToolListing } from "../domain/tools/ToolDescriptor";

export const PROTOCOL_VERSION = "2024-11-05";
export const JSONRPC_VERSION = "2.0";

export const ErrorCodes = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
  AgentTimeout: -32001,
  AgentFailure: -32002,
  MalformedOutput: -32003,
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export const METHODS = ["initialize", "tools/list", "tools/call", "health_check"] as const;
export type MethodName = (typeof METHODS)[number];

export function isMethodName(value: string): value is MethodName {
  return METHODS.some((method) => method === value);
}

export const RequestIdSchema = z.union([z.string(), z.number(), z.null()]);
export type RequestId = z.infer<typeof RequestIdSchema>;

export const EnvelopeRequestSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION).optional(),
  id: RequestIdSchema.optional(),
  method: z.string().min(1),
  params: z.unknown().optional(),
});
export type EnvelopeRequest = z.infer<typeof EnvelopeRequestSchema>;

export const ToolCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.unknown().optional(),
});

export const LegacyRequestSchema = z.object({
  tool: z.string().min(1),
  params: z.unknown().optional(),
});

export interface ProtocolError {
  code: ErrorCode;
  message: string;
  data?: Record<string, unknown>;
}

export interface EnvelopeSuccess {
  jsonrpc: typeof JSONRPC_VERSION;
  id: RequestId;
  result: unknown;
}

export interface EnvelopeFailure {
  jsonrpc: typeof JSONRPC_VERSION;
  id: RequestId;
  error: ProtocolError;
}

export type EnvelopeResponse = EnvelopeSuccess | EnvelopeFailure;

export type LegacyResponse =
  | { status: "success"; result: unknown }
  | { status: "error"; error: string; outcome?: string; stdout?: string };

export type BridgeResponse = EnvelopeResponse | LegacyResponse;

export interface ServerInfo {
  name: string;
  version: string;
  description: string;
}

export interface InitializeResult {
  protocolVersion: string;
  serverInfo: ServerInfo;
  capabilities: { tools: Record<string, never> };
}

export interface ToolsListResult {
  tools: ToolListing[];
}

export interface ToolCallResult {
  content: Array<{ type: "text"; text: string }>;
  structuredContent?: Record<string, unknown>;
  isError: false;
}

export function protocolError(
  code: ErrorCode,
  message: string,
  data?: Record<string, unknown>
): ProtocolError {
  return data ? { code, message, data } : { code, message };
}

export function envelopeResult(id: RequestId, result: unknown): EnvelopeSuccess {
  return { jsonrpc: JSONRPC_VERSION, id, result };
}

export function envelopeError(id: RequestId, error: ProtocolError): EnvelopeFailure {
  return { jsonrpc: JSONRPC_VERSION, id, error };
}

export function legacyError(error: string, extra: { outcome?: string; stdout?: string } = {}): LegacyResponse {
  return { status: "error", error, ...extra };
}
