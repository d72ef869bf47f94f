#!/usr/bin/env node
/**
 * conclave - run a council of local agent processes through synchronized rounds
 *
 *   conclave run      start (or --resume) a run; ink view on a TTY, plain lines otherwise
 *   conclave stop     raise or clear a stop flag for a running controller
 *   conclave status   print the persisted state of a run directory
 */
import { USAGE, parseArgs, UsageError } from './cli.args.js';
import { runCommand } from './commands/run.command.js';
import { statusCommand } from './commands/status.command.js';
import { stopCommand } from './commands/stop.command.js';

async function main(): Promise<number> {
  const args = parseArgs(process.argv, process.cwd(), process.stdout.isTTY === true);

  switch (args.command) {
    case 'help':
      process.stdout.write(USAGE);
      return 0;
    case 'run':
      return runCommand(args);
    case 'stop':
      return stopCommand(args);
    case 'status':
      return statusCommand(args);
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write((err instanceof Error ? err.message : String(err)) + '\n');
    if (err instanceof UsageError) process.stderr.write(USAGE);
    process.exit(1);
  },
);
