import path from 'path';
import { AgentExecutor, buildAgentArgv, truncate } from '../../src/app/AgentExecutor';
import type { ToolDescriptor } from '../../src/domain/tools/ToolDescriptor';
import { isPlainObject } from '../../src/domain/validation/ParameterValidator';
import type { LoggerPort } from '../../src/ports/sys/LoggerPort';
import { FIXTURES, makeLogger } from '../helpers/fixtureBridge';

const KILL_GRACE_MS = 200;
// Process start-up and scheduling on a loaded machine.
const SLACK_MS = 500;

function fixtureTool(script: string, agent: Partial<ToolDescriptor['agent']> = {}): ToolDescriptor {
  return {
    name: 'fixture',
    description: 'Fixture agent',
    inputSchema: { type: 'object', properties: {} },
    rules: [],
    required: [],
    requireOneOf: [],
    agent: {
      interpreter: process.execPath,
      script: path.join(FIXTURES, script),
      workingDirectory: FIXTURES,
      timeoutMs: 10_000,
      cliArgs: [],
      defaults: {},
      env: {},
      ...agent,
    },
  };
}

function startedPid(logger: jest.Mocked<LoggerPort>): number {
  const call = logger.debug.mock.calls.find(([message]) => message === 'Agent fixture started');
  const pid = call?.[1]?.pid;
  if (typeof pid !== 'number') throw new Error('agent pid was not logged');
  return pid;
}

function isRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return (err as NodeJS.ErrnoException).code !== 'ESRCH';
  }
}

function request(validatedArguments: Record<string, unknown> = {}) {
  return { toolName: 'fixture', rawArguments: validatedArguments, validatedArguments };
}

describe('buildAgentArgv', () => {
  test('projects values onto flags in declaration order', () => {
    const tool = fixtureTool('echo.js', {
      cliArgs: [
        { field: 'issue_number', flag: '--issue' },
        { field: 'repo_name', flag: '--repo' },
        { field: 'dry_run', flag: '--dry-run' },
        { field: 'verbose', flag: '--verbose' },
        { field: 'missing', flag: '--missing' },
      ],
    });
    expect(
      buildAgentArgv(tool, { repo_name: 'o/r', issue_number: 42, dry_run: true, verbose: false, missing: null }),
    ).toEqual([process.execPath, path.join(FIXTURES, 'echo.js'), '--issue', '42', '--repo', 'o/r', '--dry-run']);
  });

  test('ignores values that are not scalars', () => {
    const tool = fixtureTool('echo.js', { cliArgs: [{ field: 'sources', flag: '--sources' }] });
    expect(buildAgentArgv(tool, { sources: ['github'] })).toEqual([process.execPath, path.join(FIXTURES, 'echo.js')]);
  });
});

describe('truncate', () => {
  test('marks cut text', () => {
    expect(truncate('abcdef', 3)).toBe('abc…[truncated]');
    expect(truncate('abc', 3)).toBe('abc');
  });
});

describe('AgentExecutor with real processes', () => {
  const executor = (
    options: Partial<ConstructorParameters<typeof AgentExecutor>[0]> = {},
    logger: LoggerPort = makeLogger(),
  ) => new AgentExecutor({ killGraceMs: KILL_GRACE_MS, baseEnv: { BASE: '1' }, ...options }, logger);

  test('passes arguments on stdin and returns the parsed reply', async () => {
    const tool = fixtureTool('echo.js', {
      cliArgs: [{ field: 'issue_number', flag: '--issue' }],
      env: { AGENT_MODE: 'test' },
    });
    const result = await executor({
      credentials: { TOKEN: 'test-secret' },
      workspaceEnvVar: 'PYTHONPATH',
    }).run(request({ issue_number: 42, note: 'hi' }), tool);

    expect(result.outcome).toBe('success');
    expect(result.exitCode).toBe(0);
    if (result.outcome !== 'success') return;
    expect(result.payload).toEqual({
      received: { issue_number: 42, note: 'hi' },
      argv: ['--issue', '42'],
      cwd: FIXTURES,
      env: { BASE: '1', TOKEN: 'test-secret', AGENT_MODE: 'test', PYTHONPATH: FIXTURES },
    });
  });

  test('descriptor env wins over credentials and credentials over the base env', async () => {
    const tool = fixtureTool('echo.js', { env: { TOKEN: 'agent-token' } });
    const result = await executor({ baseEnv: { BASE: '1', TOKEN: 'base' }, credentials: { BASE: '2', TOKEN: 'cred' } }).run(
      request(),
      tool,
    );
    expect(result.outcome === 'success' && result.payload).toMatchObject({
      env: { BASE: '2', TOKEN: 'agent-token', AGENT_MODE: null, PYTHONPATH: null },
    });
  });

  test('handles replies larger than a pipe buffer', async () => {
    const pad = 'x'.repeat(300_000);
    const result = await executor().run(request({ pad }), fixtureTool('echo.js'));
    expect(result.outcome === 'success' && result.payload).toMatchObject({ received: { pad } });
  });

  test('non-JSON stdout is malformed output', async () => {
    const result = await executor().run(request(), fixtureTool('not-json.js'));
    expect(result).toMatchObject({ outcome: 'malformed-output', stdout: 'hello world\n', exitCode: 0 });
    expect(result.outcome === 'malformed-output' && result.message).toMatch(/^Agent returned invalid JSON: /);
  });

  test('empty stdout is malformed output', async () => {
    const result = await executor().run(request(), fixtureTool('silent.js'));
    expect(result).toMatchObject({
      outcome: 'malformed-output',
      message: 'Agent produced no output',
      stdout: '',
      exitCode: 0,
    });
  });

  test('non-zero exit reports stderr', async () => {
    const result = await executor().run(request(), fixtureTool('fail.js'));
    expect(result).toMatchObject({ outcome: 'agent-failure', message: 'boom: bad things', exitCode: 3 });
  });

  test('non-zero exit without stderr reports the code', async () => {
    const result = await executor().run(request(), fixtureTool('fail-silent.js'));
    expect(result).toMatchObject({ outcome: 'agent-failure', message: 'Process failed with code 4', exitCode: 4 });
  });

  test('an agent that exits without reading stdin still answers', async () => {
    const result = await executor().run(request({ a: 1 }), fixtureTool('early-exit.js'));
    expect(result).toMatchObject({ outcome: 'success', payload: { ok: true } });
  });

  test('a slow agent is stopped with SIGTERM and leaves no process behind', async () => {
    const logger = makeLogger();
    const result = await executor({}, logger).run(request(), fixtureTool('slow.js', { timeoutMs: 500 }));
    expect(result).toMatchObject({
      outcome: 'timeout',
      message: 'Agent execution timed out after 0.5s',
      killed: false,
    });
    expect(result.durationMs).toBeGreaterThanOrEqual(450);
    expect(result.durationMs).toBeLessThan(500 + KILL_GRACE_MS + SLACK_MS);
    expect(isRunning(startedPid(logger))).toBe(false);
  });

  test('an agent ignoring SIGTERM is killed after the grace period', async () => {
    const logger = makeLogger();
    const result = await executor({}, logger).run(request(), fixtureTool('ignore-sigterm.js', { timeoutMs: 1000 }));
    expect(result).toMatchObject({
      outcome: 'timeout',
      message: 'Agent execution timed out after 1s',
      killed: true,
    });
    expect(result.durationMs).toBeGreaterThanOrEqual(1150);
    expect(result.durationMs).toBeLessThan(1000 + KILL_GRACE_MS + SLACK_MS);
    expect(isRunning(startedPid(logger))).toBe(false);
  });

  test('an agent whose child keeps the pipes open still answers within the grace period', async () => {
    const logger = makeLogger();
    const startedAt = Date.now();
    const result = await executor({}, logger).run(request(), fixtureTool('leaves-grandchild.js', { timeoutMs: 500 }));
    const elapsed = Date.now() - startedAt;

    expect(result).toMatchObject({ outcome: 'success', exitCode: 0, payload: { ok: true } });
    expect(elapsed).toBeLessThan(500 + KILL_GRACE_MS + SLACK_MS);
    expect(logger.warn).toHaveBeenCalledWith('Agent fixture exited but its output stayed open; closing pipes', {
      drainMs: KILL_GRACE_MS,
    });

    const payload = result.outcome === 'success' ? result.payload : null;
    const grandchild = isPlainObject(payload) ? payload.grandchild : undefined;
    if (typeof grandchild !== 'number') throw new Error('fixture did not report its child');
    // The child outlives the run; the bridge only stops listening to it.
    expect(isRunning(grandchild)).toBe(true);
    process.kill(grandchild, 'SIGKILL');
  });

  test('a missing interpreter fails before spawning', async () => {
    const result = await executor().run(
      request(),
      fixtureTool('echo.js', { interpreter: path.join(FIXTURES, 'no-such-python') }),
    );
    expect(result).toEqual({
      outcome: 'agent-failure',
      message: `Interpreter not found: ${path.join(FIXTURES, 'no-such-python')}`,
      stdout: '',
      durationMs: expect.any(Number),
      exitCode: null,
    });
  });

  test('a missing script fails before spawning', async () => {
    const result = await executor().run(request(), fixtureTool('no-such-agent.js'));
    expect(result).toMatchObject({
      outcome: 'agent-failure',
      message: `Agent script not found: ${path.join(FIXTURES, 'no-such-agent.js')}`,
    });
  });
});
