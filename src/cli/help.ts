/**
 * @fileoverview Detailed help text for lintboard CLI commands
 */

const HELP_TEXT = {
  main: `
lintboard - Lint leaderboards attributed through git blame

USAGE:
    lintboard [report] [DIRECTORY] [boards] [options]
    lintboard <command> [options]

COMMANDS:
    report [DIRECTORY]  Build the requested leaderboards (default command)
    init [DIRECTORY]    Write a sample .lintboard.yml
    config [DIRECTORY]  Print the effective configuration
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    --config <file>     Use this configuration file
    --json              Print JSON on stdout (errors as a JSON envelope on stderr)
    --verbose           Enable debug logging on stderr
    --quiet             Only log errors; leave warnings out of the text report

EXIT CODES:
    0  success              4  invalid configuration
    1  internal error       5  linter failed
    2  invalid argument     6  git command failed
    3  not a repository     7  coverage report unreadable

For more information on a specific command, run:
    lintboard help <command>
`,

  report: `
lintboard report - Build leaderboards for a repository

USAGE:
    lintboard [report] [DIRECTORY] [boards] [options]

BOARDS:
    --authors           Issues per author (git blame on the offending line)
    --files             Issues per file
    --rules             Issues per lint rule
    --summary           Totals and averages
    --ruff              Ruff rules by violations (Python files)
    --loc               Lines of code per file
    --commits           Commits per author
    --recent            Contributors active in the last recentDays days
    --coverage          Line coverage per file from lcov or istanbul JSON
    --churn             Lines added and removed per file
    --bugs              Share of bug-fix commits per file
    --debt              TODO, FIXME and HACK markers per file
    --spellcheck        Misspellings in comments, per file and per author
    --all               Every board above

OPTIONS:
    --top <n>           Keep the first n rows of each board (default: 15)
    --ignore <rules>    Comma-separated rule ids to leave out
                        (default: sort-imports,import/order; pass "" for none)
    --coverage-file <f> Coverage report, relative to DIRECTORY

DESCRIPTION:
    Lint issues come from ESLint (npx eslint . --format json) and, for
    --ruff, from ruff. Each issue is attributed to the author of its line,
    or of the nearest attributed line. Files whose blame fails are reported
    once under Warnings and their issues are left out.

EXAMPLES:
    lintboard --authors --summary
    lintboard report ../service --all --top 10
    lintboard --rules --ignore no-console,semi --json
`,

  init: `
lintboard init - Write a sample configuration file

USAGE:
    lintboard init [DIRECTORY] [--force]

OPTIONS:
    --force             Overwrite an existing .lintboard.yml
`,

  config: `
lintboard config - Print the effective configuration

USAGE:
    lintboard config [DIRECTORY] [--config <file>] [--json]

DESCRIPTION:
    Shows which file was loaded (or that defaults apply) and every value
    after defaults are filled in.
`,
};

export type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(value: string): value is HelpTopic {
  return Object.prototype.hasOwnProperty.call(HELP_TEXT, value);
}

export function getCommandHelp(command?: string): string {
  if (!command) {
    return HELP_TEXT.main;
  }
  if (isHelpTopic(command)) {
    return HELP_TEXT[command];
  }
  return `Unknown command: ${command}\n${HELP_TEXT.main}`;
}
