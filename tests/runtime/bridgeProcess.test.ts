import { PassThrough, Writable } from 'stream';
import { buildBridge } from '../../src/composition/container';
import { parseCliArgs } from '../../src/env';
import { runBridge } from '../../src/runtime/bridgeProcess';
import { fixtureConfig, makeLogger } from '../helpers/fixtureBridge';

function collect(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString('utf8'));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

function brokenPipe(): Writable {
  return new Writable({
    write(_chunk, _encoding, callback) {
      callback(Object.assign(new Error('write EPIPE'), { code: 'EPIPE' }));
    },
  });
}

describe('runBridge', () => {
  const bridge = () => buildBridge(fixtureConfig(), makeLogger(), { baseEnv: {} });

  test('answers until the input ends, then exits 0', async () => {
    const stdin = new PassThrough();
    const { stream, text } = collect();
    const exit = jest.fn<void, [number]>();
    const logger = makeLogger();

    const running = runBridge(bridge(), parseCliArgs([]), { stdin, stdout: stream, exit }, logger);
    stdin.write('{"jsonrpc":"2.0","id":1,"method":"tools/list"}\n');
    stdin.end();

    await expect(running).resolves.toBe(0);
    expect(exit).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledWith('Serving requests on stdin');
    const [line] = text().split('\n');
    expect(JSON.parse(line)).toMatchObject({ jsonrpc: '2.0', id: 1, result: { tools: expect.any(Array) } });
  });

  test('exits 0 as soon as the reader of stdout goes away', async () => {
    const stdin = new PassThrough();
    const exit = jest.fn<void, [number]>();
    const exited = new Promise<void>((resolve) => exit.mockImplementation(() => resolve()));
    const logger = makeLogger();

    const running = runBridge(bridge(), parseCliArgs([]), { stdin, stdout: brokenPipe(), exit }, logger);
    stdin.write('{"jsonrpc":"2.0","id":1,"method":"tools/list"}\n');
    await exited;

    expect(exit).toHaveBeenCalledWith(0);
    expect(logger.info).toHaveBeenCalledWith('Output closed by peer; shutting down');
    expect(logger.error).not.toHaveBeenCalled();

    // Later requests are read but not answered, and the loop stops.
    stdin.write('{"jsonrpc":"2.0","id":2,"method":"tools/list"}\n');
    await expect(running).resolves.toBe(0);
    expect(exit).toHaveBeenCalledTimes(1);
  });

  test('a tool named on the command line runs once and reports its status', async () => {
    const { stream, text } = collect();
    const exit = jest.fn<void, [number]>();

    const status = await runBridge(
      bridge(),
      parseCliArgs(['curate_digest']),
      { stdin: new PassThrough(), stdout: stream, exit },
      makeLogger(),
    );

    expect(status).toBe(1);
    expect(exit).not.toHaveBeenCalled();
    expect(JSON.parse(text())).toEqual({ status: 'error', error: 'boom: bad things', outcome: 'agent-failure' });
  });
});
