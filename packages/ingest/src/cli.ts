#!/usr/bin/env node
import 'dotenv/config';
import { z } from 'zod';
import { resetArgsSchema, runResetAction } from './actions/reset.js';
import { runArgsSchema, runIngestAction } from './actions/run.js';
import { runStatusAction, statusArgsSchema } from './actions/status.js';

type ParsedArgs = {
  command: string;
  options: Record<string, string>;
};

const cliInputSchema = z.discriminatedUnion('command', [
  z.object({
    command: z.literal('help'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('run'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('status'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('reset'),
    options: z.record(z.string(), z.string()),
  }),
]);

function parseArgs(argv: string[]): ParsedArgs {
  const [rawCommand, ...rest] = argv;
  const command = normalizeCommand(rawCommand);
  const options: Record<string, string> = {};

  for (let index = 0; index < rest.length; index += 1) {
    const arg = rest[index];
    if (!arg?.startsWith('--')) {
      continue;
    }

    const [key, maybeValue] = arg.slice(2).split('=', 2);
    if (!key) {
      continue;
    }

    if (maybeValue !== undefined) {
      options[key] = maybeValue;
      continue;
    }

    const next = rest[index + 1];
    if (next && !next.startsWith('--')) {
      options[key] = next;
      index += 1;
      continue;
    }

    options[key] = 'true';
  }

  return { command, options };
}

function normalizeCommand(command?: string): string {
  if (
    !command ||
    command === 'help' ||
    command === '--help' ||
    command === '-h'
  ) {
    return 'help';
  }

  return command;
}

function printHelp(): void {
  console.log(`channel-ingest CLI

Usage:
  cli help
  cli run
  cli run --input="./channels.csv" --column=channel_user
  cli run --workers=2 --flushEvery=5
  cli run --maxRetries=5 --onRetriesExhausted=halt
  cli run --fresh
  cli run --dryRun --pretty
  cli status
  cli status --input="./channels.csv" --checkpoint="./checkpoint.json"
  cli reset
  cli reset --checkpoint="./checkpoint.json"

Commands:
  help    Show this help message
  run     Ingest every channel in the input file into PostgreSQL
  status  Print checkpoint progress against the input file
  reset   Delete the checkpoint so the next run starts from the first row

Run options:
  --input       Optional. Input CSV path (default: INPUT_FILE or channels.csv).
  --column      Optional. Column holding the handles (default: channel_user,
                else the first column containing @handles).
  --checkpoint  Optional. Checkpoint path (default: CHECKPOINT_FILE or checkpoint.json).
  --workers     Optional. Worker cap; never more than the number of API keys (default: 4).
  --flushEvery  Optional. Finished tasks per database write (default: 3).
  --maxRetries  Optional. Retries for transient failures per task (default: 3).
  --onRetriesExhausted Optional. skip or halt (default: skip).
  --fresh       Optional. Delete the checkpoint before starting.
  --dryRun      Optional. Keep records in memory instead of writing to PostgreSQL.
  --pretty      Optional. Pretty-print the JSON summary.

Status options:
  --input       Optional. Input CSV path.
  --column      Optional. Column holding the handles.
  --checkpoint  Optional. Checkpoint path.
  --pretty      Optional. Pretty-print JSON output.

Reset options:
  --checkpoint  Optional. Checkpoint path.

Environment:
  YOUTUBE_API_KEYS (comma-separated) or YOUTUBE_API_KEY_1..10, DATABASE_URL or
  DB_HOST/DB_PORT/DB_NAME/DB_USER/DB_PASSWORD, DB_SCHEMA, DB_TABLE, LOG_LEVEL.
  A .env file in the working directory is loaded first.

Exit codes:
  0 completed, 1 invalid configuration or input, 2 API keys exhausted,
  3 database write failed, 4 halted after retries, 130 interrupted.
`);
}

async function main(): Promise<number> {
  const { command, options } = parseArgs(process.argv.slice(2));
  const parsedCliInput = cliInputSchema.safeParse({ command, options });

  if (!parsedCliInput.success) {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  if (parsedCliInput.data.command === 'help') {
    printHelp();
    return 0;
  }

  if (parsedCliInput.data.command === 'run') {
    const parsedRunArgs = runArgsSchema.safeParse(parsedCliInput.data.options);
    if (!parsedRunArgs.success) {
      console.error(
        parsedRunArgs.error.issues[0]?.message ?? 'Invalid arguments',
      );
      printHelp();
      return 1;
    }

    return runIngestAction(parsedRunArgs.data);
  }

  if (parsedCliInput.data.command === 'status') {
    const parsedStatusArgs = statusArgsSchema.safeParse(
      parsedCliInput.data.options,
    );
    if (!parsedStatusArgs.success) {
      console.error(
        parsedStatusArgs.error.issues[0]?.message ?? 'Invalid arguments',
      );
      printHelp();
      return 1;
    }

    return runStatusAction(parsedStatusArgs.data);
  }

  if (parsedCliInput.data.command === 'reset') {
    const parsedResetArgs = resetArgsSchema.safeParse(
      parsedCliInput.data.options,
    );
    if (!parsedResetArgs.success) {
      console.error(
        parsedResetArgs.error.issues[0]?.message ?? 'Invalid arguments',
      );
      printHelp();
      return 1;
    }

    return runResetAction(parsedResetArgs.data);
  }

  printHelp();
  return 0;
}

const exitCode = await main();
process.exitCode = exitCode;
