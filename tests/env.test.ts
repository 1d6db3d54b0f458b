/**
 * @jest-environment node
 */

// Keep importing the module from reading a real .env
jest.mock('dotenv', () => ({ config: jest.fn() }));

import { config as loadDotenv } from 'dotenv';
import { isDirectInvocation, parseCliArgs } from '../src/env';

describe('env', () => {
  test('loads .env on import', () => {
    expect(loadDotenv).toHaveBeenCalledTimes(1);
  });

  test('no arguments means stdio mode', () => {
    const options = parseCliArgs([]);
    expect(options).toEqual({ positionals: [] });
    expect(isDirectInvocation(options)).toBe(false);
  });

  test('parses flags and keeps positionals in order', () => {
    const options = parseCliArgs([
      '--config',
      '/etc/bridge.json',
      'label_github_issue',
      '--log-file',
      'bridge.log',
      '{"repo_name":"o/r","issue_number":1}',
      '--log-level',
      'WARN',
    ]);
    expect(options).toEqual({
      configPath: '/etc/bridge.json',
      logFile: 'bridge.log',
      logLevel: 'warn',
      positionals: ['label_github_issue', '{"repo_name":"o/r","issue_number":1}'],
    });
    expect(isDirectInvocation(options)).toBe(true);
  });

  test('--debug sets the debug level', () => {
    expect(parseCliArgs(['--debug']).logLevel).toBe('debug');
  });

  test('an unknown level is left as a positional', () => {
    expect(parseCliArgs(['--log-level', 'loud'])).toEqual({ positionals: ['loud'] });
  });

  test('a flag missing its value is dropped', () => {
    expect(parseCliArgs(['--config'])).toEqual({ positionals: [] });
  });

  test('a dash selects stdio mode', () => {
    expect(isDirectInvocation(parseCliArgs(['-']))).toBe(false);
  });
});
