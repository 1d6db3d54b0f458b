import { config } from 'dotenv';
import type { LogLevel } from './ports/sys/LoggerPort';
import { isLogLevel } from './config';

config();

export interface CliOptions {
  configPath?: string;
  logFile?: string;
  logLevel?: LogLevel;
  /** `<tool> [json-params]` for a one-shot call; empty or `-` means serve stdin. */
  positionals: string[];
}

export function parseCliArgs(argv: string[]): CliOptions {
  const options: CliOptions = { positionals: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
        if (argv[i + 1]) {
          options.configPath = argv[++i];
        }
        break;
      case '--log-file':
        if (argv[i + 1]) {
          options.logFile = argv[++i];
        }
        break;
      case '--log-level': {
        const level = argv[i + 1]?.toLowerCase();
        if (level && isLogLevel(level)) {
          options.logLevel = level;
          i++;
        }
        break;
      }
      case '--debug':
        options.logLevel = 'debug';
        break;
      default:
        options.positionals.push(arg);
        break;
    }
  }

  return options;
}

export function isDirectInvocation(options: CliOptions): boolean {
  const [first] = options.positionals;
  return first !== undefined && first !== '-';
}
