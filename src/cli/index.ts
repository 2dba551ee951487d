/**
 * transcript-digest CLI router.
 *
 * Usage:
 *   transcript-digest [run]     Watch the queue until interrupted
 *   transcript-digest drain     Process everything queued, then exit
 *   transcript-digest status    Pending / claimed counts
 */

import { resolveWorkerConfig, type ConfigOverrides, type ResolvedConfig } from '../config';
import { createLogger, setLogLevel } from '../shared/logger';
import type { LLMClient } from '../llm/llm-client';
import { runWorker } from './commands/run';
import { runStatus } from './commands/status';
import { getGlobalHelp, getCommandHelp } from './help';

export interface CliArgs {
  command: string;
  args: string[];
  flags: Record<string, boolean>;
  options: Record<string, string>;
}

const BOOLEAN_FLAGS = ['help', 'json'];

export function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  const flags: Record<string, boolean> = {};
  const options: Record<string, string> = {};

  // Skip node and script path
  const args = argv.slice(2);

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const eqIdx = arg.indexOf('=');
      if (eqIdx !== -1) {
        options[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else if (i + 1 < args.length && !args[i + 1].startsWith('-')) {
        const key = arg.slice(2);
        if (BOOLEAN_FLAGS.includes(key)) {
          flags[key] = true;
        } else {
          options[key] = args[++i];
        }
      } else {
        flags[arg.slice(2)] = true;
      }
    } else if (arg.startsWith('-')) {
      flags[arg.slice(1)] = true;
    } else {
      positional.push(arg);
    }
  }

  return {
    command: positional[0] ?? '',
    args: positional.slice(1),
    flags,
    options,
  };
}

export interface RunContext {
  env?: Record<string, string | undefined>;
  cwd?: string;
  /** Replaces the generation client built from the environment. */
  llm?: LLMClient | null;
  signal?: AbortSignal;
}

export async function run(
  argv: string[] = process.argv,
  write: (msg: string) => void = console.log,
  context: RunContext = {},
): Promise<number> {
  const { command, flags, options } = parseArgs(argv);

  if (flags.help || flags.h) {
    const cmdHelp = command ? getCommandHelp(command) : null;
    write(cmdHelp ?? getGlobalHelp());
    return 0;
  }

  if (command === 'help') {
    write(getGlobalHelp());
    return 0;
  }

  if (!['', 'run', 'drain', 'status'].includes(command)) {
    write(`Unknown command: ${command}. Run \`transcript-digest help\` for usage.`);
    return 2;
  }

  let overrides: ConfigOverrides;
  let maxJobs: number | undefined;
  try {
    overrides = toConfigOverrides(options);
    maxJobs = options.max !== undefined ? parsePositiveInt('max', options.max) : undefined;
  } catch (err) {
    write(err instanceof Error ? err.message : String(err));
    return 2;
  }

  let resolved: ResolvedConfig;
  try {
    resolved = resolveWorkerConfig(overrides, context.env, context.cwd);
  } catch (err) {
    write(err instanceof Error ? err.message : String(err));
    return 2;
  }
  const { config, warnings } = resolved;
  setLogLevel(config.logLevel);

  const log = createLogger({ module: 'config' });
  for (const warning of warnings) {
    log.warn({ field: warning.field }, warning.message);
  }

  if (command === 'status') {
    return runStatus(config, { json: !!flags.json }, write);
  }

  return runWorker(
    config,
    { drain: command === 'drain', maxJobs, llm: context.llm, signal: context.signal },
    write,
  );
}

function toConfigOverrides(options: Record<string, string>): ConfigOverrides {
  return {
    configPath: options.config,
    inputDir: options.input,
    outputDir: options.output,
    ledgerPath: options.ledger,
    pollIntervalMs: options['poll-interval'] !== undefined
      ? parsePositiveInt('poll-interval', options['poll-interval'])
      : undefined,
    serviceTimeoutMs: options.timeout !== undefined ? parsePositiveInt('timeout', options.timeout) : undefined,
  };
}

function parsePositiveInt(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid --${name}: expected a positive integer, got "${value}"`);
  }
  return parsed;
}
