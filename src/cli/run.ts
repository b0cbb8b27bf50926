/**
 * @fileoverview Argument parsing and command dispatch.
 *
 * `runCli` never throws for command failures: it prints the error envelope on
 * stderr and resolves with the exit code, so tests can drive it in process.
 */

import * as fs from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { getLogLevel, setLogLevel } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { configCommand } from './commands/config.js';
import { initCommand } from './commands/init.js';
import {
  BOARD_NAMES,
  DEFAULT_REPORT_DEPENDENCIES,
  reportCommand,
  type BoardName,
  type ReportDependencies,
} from './commands/report.js';
import { classifyError, createError, formatError, formatErrorJson, getExitCode } from './errors.js';
import { getCommandHelp } from './help.js';

type Command = 'report' | 'init' | 'config' | 'help';

const COMMANDS: Record<Command, { description: string; usage: string }> = {
  report: {
    description: 'Build the requested leaderboards',
    usage: 'lintboard [report] [DIRECTORY] [--authors] [--files] ... [--all] [--top N] [--json]',
  },
  init: {
    description: 'Write a sample .lintboard.yml',
    usage: 'lintboard init [DIRECTORY] [--force]',
  },
  config: {
    description: 'Print the effective configuration',
    usage: 'lintboard config [DIRECTORY] [--config FILE] [--json]',
  },
  help: {
    description: 'Show help information',
    usage: 'lintboard help [command]',
  },
};

function isCommand(value: string | undefined): value is Command {
  return value !== undefined && Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

const OPTIONS = {
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'v' },
  authors: { type: 'boolean' },
  files: { type: 'boolean' },
  rules: { type: 'boolean' },
  summary: { type: 'boolean' },
  ruff: { type: 'boolean' },
  loc: { type: 'boolean' },
  commits: { type: 'boolean' },
  recent: { type: 'boolean' },
  coverage: { type: 'boolean' },
  churn: { type: 'boolean' },
  bugs: { type: 'boolean' },
  debt: { type: 'boolean' },
  spellcheck: { type: 'boolean' },
  all: { type: 'boolean' },
  top: { type: 'string' },
  ignore: { type: 'string' },
  'coverage-file': { type: 'string' },
  config: { type: 'string' },
  json: { type: 'boolean' },
  verbose: { type: 'boolean' },
  quiet: { type: 'boolean' },
  force: { type: 'boolean' },
} as const;

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
}

const PROCESS_IO: CliIo = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

const PackageJsonSchema = z.object({ version: z.string() });

async function readVersion(): Promise<string> {
  const raw = await fs.readFile(new URL('../../package.json', import.meta.url), 'utf8');
  return PackageJsonSchema.parse(JSON.parse(raw)).version;
}

function parseCliArgs(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw createError('INVALID_ARGUMENT', getErrorMessage(error));
  }
}

/** Rows per board when `--top` is absent. */
export const DEFAULT_TOP_N = 15;
/** Rules left out when `--ignore` is absent. */
export const DEFAULT_IGNORED_RULES: readonly string[] = ['sort-imports', 'import/order'];

function parseTopN(value: string | undefined): number {
  if (value === undefined) return DEFAULT_TOP_N;
  const parsed = /^\d+$/.test(value) ? Number.parseInt(value, 10) : 0;
  if (parsed <= 0) {
    throw createError('INVALID_ARGUMENT', `--top expects a positive integer, got "${value}"`);
  }
  return parsed;
}

function parseRuleList(value: string | undefined): string[] {
  if (value === undefined) return [...DEFAULT_IGNORED_RULES];
  return value.split(',').map((rule) => rule.trim()).filter((rule) => rule.length > 0);
}

async function dispatch(argv: readonly string[], io: CliIo, deps: ReportDependencies): Promise<void> {
  if (argv.length === 0) {
    io.stdout(getCommandHelp());
    return;
  }

  const { values, positionals } = parseCliArgs(argv);

  if (values.version) {
    io.stdout(`lintboard ${await readVersion()}\n`);
    return;
  }

  const first = positionals[0];
  const command: Command = isCommand(first) ? first : 'report';
  const rest = isCommand(first) ? positionals.slice(1) : positionals;

  if (command === 'help') {
    io.stdout(getCommandHelp(rest[0]));
    return;
  }
  if (values.help) {
    io.stdout(getCommandHelp(isCommand(first) ? command : undefined));
    return;
  }
  if (rest.length > 1) {
    throw createError('INVALID_ARGUMENT', `Unexpected argument: ${rest[1]}`, { usage: COMMANDS[command].usage });
  }

  if (values.verbose) {
    setLogLevel('debug');
  } else if (values.quiet) {
    setLogLevel('error');
  }

  const workspace = rest[0] ?? process.cwd();
  const write = (text: string): void => io.stdout(text);

  switch (command) {
    case 'init':
      await initCommand({ workspace, force: values.force }, write);
      return;
    case 'config':
      await configCommand({ workspace, configPath: values.config, json: values.json }, write);
      return;
    case 'report': {
      const boards = new Set<BoardName>(BOARD_NAMES.filter((board) => values.all || values[board]));
      if (boards.size === 0) {
        throw createError(
          'INVALID_ARGUMENT',
          'No leaderboard selected: pass at least one board flag such as --authors, or --all',
          { usage: COMMANDS.report.usage },
        );
      }
      await reportCommand(
        {
          workspace,
          boards,
          topN: parseTopN(values.top),
          ignoreRules: parseRuleList(values.ignore),
          coverageFile: values['coverage-file'],
          configPath: values.config,
          json: values.json,
          quiet: values.quiet,
        },
        write,
        deps,
      );
      return;
    }
  }
}

/** Run one CLI invocation. Resolves with the process exit code. */
export async function runCli(
  argv: readonly string[],
  io: CliIo = PROCESS_IO,
  deps: ReportDependencies = DEFAULT_REPORT_DEPENDENCIES,
): Promise<number> {
  const jsonMode = argv.includes('--json');
  const previousLevel = getLogLevel();
  try {
    await dispatch(argv, io, deps);
    return 0;
  } catch (error) {
    const envelope = classifyError(error);
    io.stderr(`${jsonMode ? formatErrorJson(envelope) : formatError(envelope)}\n`);
    return getExitCode(envelope);
  } finally {
    setLogLevel(previousLevel);
  }
}
