import {
  EnvelopeRequestSchema,
  envelopeError,
  envelopeResult,
  ErrorCodes,
  isMethodName,
  LegacyRequestSchema,
  legacyError,
  protocolError,
  ToolCallParamsSchema,
} from '../../src/shared/contracts';

describe('shared/contracts', () => {
  test('error codes', () => {
    expect(ErrorCodes).toEqual({
      ParseError: -32700,
      InvalidRequest: -32600,
      MethodNotFound: -32601,
      InvalidParams: -32602,
      InternalError: -32603,
      AgentTimeout: -32001,
      AgentFailure: -32002,
      MalformedOutput: -32003,
    });
  });

  test('isMethodName', () => {
    expect(isMethodName('tools/call')).toBe(true);
    expect(isMethodName('health_check')).toBe(true);
    expect(isMethodName('tools/delete')).toBe(false);
  });

  test('envelope request schema', () => {
    expect(EnvelopeRequestSchema.safeParse({ jsonrpc: '2.0', id: 1, method: 'initialize' }).success).toBe(true);
    expect(EnvelopeRequestSchema.safeParse({ method: 'tools/list' }).success).toBe(true);
    expect(EnvelopeRequestSchema.safeParse({ jsonrpc: '1.0', method: 'x' }).success).toBe(false);
    expect(EnvelopeRequestSchema.safeParse({ id: {}, method: 'x' }).success).toBe(false);
    expect(EnvelopeRequestSchema.safeParse({ method: '' }).success).toBe(false);
  });

  test('tool call and legacy schemas require a name', () => {
    expect(ToolCallParamsSchema.safeParse({ arguments: {} }).success).toBe(false);
    expect(ToolCallParamsSchema.safeParse({ name: 'watch_collect' }).success).toBe(true);
    expect(LegacyRequestSchema.safeParse({ params: {} }).success).toBe(false);
    expect(LegacyRequestSchema.safeParse({ tool: 'watch_collect' }).success).toBe(true);
  });

  test('response builders', () => {
    expect(envelopeResult('a', { ok: true })).toEqual({ jsonrpc: '2.0', id: 'a', result: { ok: true } });
    expect(envelopeError(null, protocolError(ErrorCodes.ParseError, 'bad'))).toEqual({
      jsonrpc: '2.0',
      id: null,
      error: { code: -32700, message: 'bad' },
    });
    expect(protocolError(ErrorCodes.AgentFailure, 'x', { stdout: '' })).toEqual({
      code: -32002,
      message: 'x',
      data: { stdout: '' },
    });
    expect(legacyError('nope')).toEqual({ status: 'error', error: 'nope' });
  });
});
