/**
 * CLI help text for global and per-command --help output.
 */

const SHARED_FLAGS = [
  '--config=PATH           Config file (default .transcript-digest.yml, or DIGEST_CONFIG_PATH)',
  '--input=DIR             Queue directory to claim transcripts from',
  '--output=DIR            Directory for analysis artifacts',
  '--ledger=PATH           Metrics ledger CSV file',
  '--timeout=MS            Generation service timeout in milliseconds',
].join('\n  ');

const COMMAND_HELP: Record<string, string> = {
  run: `
SYNOPSIS
  transcript-digest run [--poll-interval=MS] [--max=N] [FLAGS]

DESCRIPTION
  Watch the queue directory and analyze transcripts as they arrive.
  Any number of workers may share one directory; each transcript is
  claimed by exactly one of them. Ctrl+C stops claiming new work and
  exits once the in-flight transcript is done.

FLAGS
  --poll-interval=MS      Wait between empty polls (default 2000)
  --max=N                 Exit after N transcripts
  ${SHARED_FLAGS}

EXAMPLES
  transcript-digest run
  transcript-digest run --input=/srv/inbox --poll-interval=500
`.trim(),

  drain: `
SYNOPSIS
  transcript-digest drain [--max=N] [FLAGS]

DESCRIPTION
  Analyze every transcript currently queued, then exit. Exits 1 when
  any transcript fell back to offline analysis or could not be saved.

FLAGS
  --max=N                 Exit after N transcripts
  ${SHARED_FLAGS}

EXAMPLES
  transcript-digest drain
  transcript-digest drain --input=./fixtures --output=./out
`.trim(),

  status: `
SYNOPSIS
  transcript-digest status [--json] [--config=PATH] [--input=DIR]

DESCRIPTION
  Show how many transcripts are waiting and how many are claimed.
  Counts are a snapshot and may change while workers run.

FLAGS
  --json                  Output counts as JSON

EXAMPLES
  transcript-digest status
  transcript-digest status --json
`.trim(),
};

export function getGlobalHelp(): string {
  return `
transcript-digest: analyze meeting transcripts from a shared queue directory

USAGE
  transcript-digest <command> [flags]

COMMANDS
  run        Watch the queue and analyze transcripts (default)
  drain      Analyze everything queued, then exit
  status     Show pending and claimed counts
  help       Show this help

Run \`transcript-digest <command> --help\` for command details.

ENVIRONMENT
  ANTHROPIC_API_KEY       Enables LLM analysis; without it transcripts are analyzed offline
  LOG_LEVEL               trace | debug | info | warn | error | fatal | silent (default info)
  DIGEST_CONFIG_PATH      Config file path
`.trim();
}

export function getCommandHelp(command: string): string | null {
  return COMMAND_HELP[command] ?? null;
}
