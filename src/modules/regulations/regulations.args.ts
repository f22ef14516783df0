/**
 * Command-line argument parsing for the regcrawl binary
 */

import { ICliCommand } from './regulations.types';

export const USAGE = `Usage:
  regcrawl crawl <JURISDICTION> [--resume|-c] [--threads|-t N] [--max-retries N] [--output-dir DIR]
  regcrawl verify <JURISDICTION> [--samples N] [--output-dir DIR]
  regcrawl help`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function parseCount(flag: string, raw: string | undefined, min: number): number {
  if (raw === undefined) {
    throw new UsageError(`${flag} needs a value`);
  }
  if (!/^\d+$/.test(raw)) {
    throw new UsageError(`${flag} expects a whole number, got '${raw}'`);
  }
  const value = parseInt(raw, 10);
  if (value < min) {
    throw new UsageError(`${flag} must be at least ${min}`);
  }
  return value;
}

function requireValue(flag: string, raw: string | undefined): string {
  if (raw === undefined || raw.startsWith('-')) {
    throw new UsageError(`${flag} needs a value`);
  }
  return raw;
}

/**
 * Parse argv without the node and script entries
 */
export function parseArgs(argv: string[]): ICliCommand {
  const [command, ...rest] = argv;

  if (command === undefined || command === 'help' || command === '--help' || command === '-h') {
    return { command: 'help' };
  }

  if (command !== 'crawl' && command !== 'verify') {
    throw new UsageError(`Unknown command '${command}'`);
  }

  const positional: string[] = [];
  let resume = false;
  let threads: number | undefined;
  let maxRetries: number | undefined;
  let samples: number | undefined;
  let outputDir: string | undefined;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];

    if (command === 'crawl' && (arg === '--resume' || arg === '-c')) {
      resume = true;
    } else if (command === 'crawl' && (arg === '--threads' || arg === '-t')) {
      threads = parseCount(arg, rest[++i], 1);
    } else if (command === 'crawl' && arg === '--max-retries') {
      maxRetries = parseCount(arg, rest[++i], 0);
    } else if (command === 'verify' && arg === '--samples') {
      samples = parseCount(arg, rest[++i], 0);
    } else if (arg === '--output-dir') {
      outputDir = requireValue(arg, rest[++i]);
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option '${arg}' for ${command}`);
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 1) {
    throw new UsageError(`${command} takes exactly one jurisdiction code`);
  }

  const jurisdiction = positional[0];
  if (command === 'crawl') {
    return { command, jurisdiction, resume, threads, maxRetries, outputDir };
  }
  return { command, jurisdiction, samples, outputDir };
}
