/**
 * @fileoverview In-process stand-in for `GitRunner`.
 *
 * Responses are matched on the joined argument list; every call is recorded
 * so tests can assert how often a command ran.
 */

import { GitCommandError } from '../../core/errors.js';
import type { GitRunOptions, GitRunner } from '../../utils/git.js';

export type FakeResponse =
  | { stdout: string }
  | { exitCode: number; stderr?: string }
  | { timeout: true };

export interface FakeCall {
  args: string[];
  options: GitRunOptions;
}

type Handler = (args: readonly string[], options: GitRunOptions) => Promise<FakeResponse> | FakeResponse;

export class FakeGitRunner implements GitRunner {
  readonly calls: FakeCall[] = [];
  private readonly handlers: Array<{ matches: (args: readonly string[]) => boolean; handler: Handler }> = [];

  constructor(readonly cwd = '/repo') {}

  /** Register a response for commands whose joined args start with `prefix`. */
  on(prefix: string, response: FakeResponse | Handler): this {
    const handler: Handler = typeof response === 'function' ? response : () => response;
    this.handlers.unshift({ matches: (args) => args.join(' ').startsWith(prefix), handler });
    return this;
  }

  /** Blame output for `path`; matched on the trailing path argument. */
  onBlame(path: string, response: FakeResponse | Handler): this {
    const handler: Handler = typeof response === 'function' ? response : () => response;
    this.handlers.unshift({
      matches: (args) => args[0] === 'blame' && args[args.length - 1] === path,
      handler,
    });
    return this;
  }

  callsFor(prefix: string): FakeCall[] {
    return this.calls.filter((call) => call.args.join(' ').startsWith(prefix));
  }

  async run(args: readonly string[], options: GitRunOptions = {}): Promise<string> {
    this.calls.push({ args: [...args], options });
    const entry = this.handlers.find((candidate) => candidate.matches(args));
    if (!entry) {
      throw new GitCommandError(args, 128, `fatal: no fake response for "${args.join(' ')}"`, false);
    }
    const response = await entry.handler(args, options);
    if ('stdout' in response) {
      return response.stdout;
    }
    if ('timeout' in response) {
      throw new GitCommandError(args, null, '', true);
    }
    throw new GitCommandError(args, response.exitCode, response.stderr ?? '', false);
  }
}

const HASH_A = 'abc123def456789012345678901234567890abcd';
const HASH_B = 'fedcba9876543210fedcba9876543210fedcba98';

export interface PorcelainLine {
  line: number;
  name: string;
  email: string;
  content?: string;
  hash?: string;
}

/** Render `git blame --line-porcelain` output for the given lines. */
export function porcelain(lines: PorcelainLine[]): string {
  return lines
    .map((entry, index) => [
      `${entry.hash ?? (index % 2 === 0 ? HASH_A : HASH_B)} ${entry.line} ${entry.line} 1`,
      `author ${entry.name}`,
      `author-mail <${entry.email}>`,
      'author-time 1609459200',
      'author-tz +0000',
      `committer ${entry.name}`,
      `committer-mail <${entry.email}>`,
      'committer-time 1609459200',
      'committer-tz +0000',
      'summary Initial commit',
      'filename a.js',
      `\t${entry.content ?? `line ${entry.line}`}`,
    ].join('\n'))
    .join('\n') + '\n';
}
