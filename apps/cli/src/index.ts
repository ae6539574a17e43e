import { basename } from 'node:path';
import { scaleFrequencies, type Scale } from '@tunekit/core';
import { serializeScale, type CorpusReport } from '@tunekit/scl';
import { BASE_HZ_ENV, DEFAULT_BASE_HZ, resolveBaseFrequency } from './config.js';

export const USAGE = `Usage:
  tunekit freqs <file.scl> [--base <hz>]
  tunekit check <directory>
  tunekit normalize <file.scl>
`;

export interface CliIo {
  loadScale: (path: string) => Promise<Scale>;
  checkCorpus: (directory: string) => Promise<CorpusReport>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: Record<string, string | undefined>;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

interface ParsedArgs {
  positionals: string[];
  base?: string;
}

const parseArgs = (args: string[], allowBase: boolean): ParsedArgs => {
  const parsed: ParsedArgs = { positionals: [] };
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (allowBase && arg === '--base') {
      const value = args[i + 1];
      if (value === undefined) throw new UsageError('Option --base requires a value.');
      parsed.base = value;
      i += 1;
    } else if (allowBase && arg.startsWith('--base=')) {
      parsed.base = arg.slice('--base='.length);
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Unknown option ${arg}.`);
    } else {
      parsed.positionals.push(arg);
    }
  }
  return parsed;
};

const singlePositional = (parsed: ParsedArgs, label: string): string => {
  const [value, ...extra] = parsed.positionals;
  if (value === undefined) throw new UsageError(`Missing ${label}.`);
  if (extra.length > 0) throw new UsageError(`Unexpected argument ${extra[0]}.`);
  return value;
};

export const runFreqs = async (args: string[], io: CliIo): Promise<number> => {
  const parsed = parseArgs(args, true);
  const path = singlePositional(parsed, 'scale file');
  const base =
    parsed.base === undefined ? resolveBaseFrequency(io.env[BASE_HZ_ENV]) : resolveBaseFrequency(parsed.base, DEFAULT_BASE_HZ, '--base');

  const scale = await io.loadScale(path);
  const lines = scaleFrequencies(scale, base).map((freq, degree) => `${degree}\t${freq.toFixed(6)}\n`);
  io.stdout(lines.join(''));
  return 0;
};

export const formatCorpusReport = (report: CorpusReport): string => {
  const lines: string[] = [];
  for (const entry of report.entries) {
    if (entry.ok) {
      lines.push(`ok   ${entry.name}`);
      for (const warning of entry.warnings) lines.push(`  warning: ${warning.message}`);
    } else {
      lines.push(`FAIL ${entry.name}: ${entry.error.message}`);
    }
  }
  lines.push(`${report.checked} checked, ${report.failed} failed`);
  return `${lines.join('\n')}\n`;
};

export const runCheck = async (args: string[], io: CliIo): Promise<number> => {
  const directory = singlePositional(parseArgs(args, false), 'corpus directory');
  const report = await io.checkCorpus(directory);
  io.stdout(formatCorpusReport(report));
  return report.failed > 0 ? 1 : 0;
};

export const runNormalize = async (args: string[], io: CliIo): Promise<number> => {
  const path = singlePositional(parseArgs(args, false), 'scale file');
  const scale = await io.loadScale(path);
  io.stdout(serializeScale(scale, basename(path)));
  return 0;
};

const COMMANDS = new Map<string, (args: string[], io: CliIo) => Promise<number>>([
  ['freqs', runFreqs],
  ['check', runCheck],
  ['normalize', runNormalize],
]);

/** Runs one command and resolves to the process exit code. */
export const runCli = async (argv: string[], io: CliIo): Promise<number> => {
  const [command, ...args] = argv;
  const handler = command === undefined ? undefined : COMMANDS.get(command);
  if (!handler) {
    io.stderr(USAGE);
    return 2;
  }

  try {
    return await handler(args, io);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr(`error: ${message}\n`);
    if (error instanceof UsageError) {
      io.stderr(USAGE);
      return 2;
    }
    return 1;
  }
};
