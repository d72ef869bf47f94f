import path from 'node:path';
import { GLOBAL_STOP_FILE, RunPaths, clearStopFlag, writeStopFlag } from '@conclave/core';
import type { StopArgs } from '../cli.args.js';
import { stdout, type Write } from './output.js';

function flagFor(args: StopArgs): string {
  if (args.all || !args.runDir) return path.join(args.projectRoot, GLOBAL_STOP_FILE);
  return new RunPaths(args.runDir).stopFlag;
}

/**
 * Raise (or with `--clear` lower) a stop flag. A running controller picks it
 * up before its next launch; agents already running finish.
 */
export function stopCommand(args: StopArgs, write: Write = stdout): number {
  const flag = flagFor(args);
  if (args.clear) {
    write(clearStopFlag(flag) ? `Removed stop flag ${flag}\n` : `No stop flag at ${flag}\n`);
    return 0;
  }
  writeStopFlag(flag);
  write(`Stop requested: ${flag}\n`);
  return 0;
}
