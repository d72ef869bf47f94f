import path from 'node:path';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunArgs {
  command: 'run';
  projectRoot: string;
  configPath?: string;
  /** Defaults to a fresh directory under `.conclave/runs/`. */
  runDir?: string;
  resume: boolean;
  mission?: string;
  missionFile?: string;
  /** Render the ink view. Off with `--no-ui` or when stdout is not a TTY. */
  ui: boolean;
}

export interface StopArgs {
  command: 'stop';
  projectRoot: string;
  runDir?: string;
  /** Remove the run flag instead of writing it. */
  clear: boolean;
  /** Use the project-wide flag (STOP_ALL_AGENTS.flag). */
  all: boolean;
}

export interface StatusArgs {
  command: 'status';
  projectRoot: string;
  runDir?: string;
  json: boolean;
}

export type CliArgs = RunArgs | StopArgs | StatusArgs | { command: 'help' };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `Usage:
  conclave run [--config <file>] [--project-root <dir>] [--run-dir <dir>] [--resume]
               [--mission <text> | --mission-file <file>] [--no-ui]
  conclave stop --run-dir <dir> [--clear]
  conclave stop --all [--clear] [--project-root <dir>]
  conclave status --run-dir <dir> [--json]
`;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const VALUE_FLAGS = new Set(['--config', '--project-root', '--run-dir', '--mission', '--mission-file']);
const SWITCHES = new Set(['--resume', '--no-ui', '--clear', '--all', '--json']);

const ALLOWED: Record<string, string[]> = {
  run: ['--config', '--project-root', '--run-dir', '--resume', '--mission', '--mission-file', '--no-ui'],
  stop: ['--project-root', '--run-dir', '--clear', '--all'],
  status: ['--project-root', '--run-dir', '--json'],
};

/**
 * Parse `process.argv`. Paths are resolved against `cwd`.
 */
export function parseArgs(argv: string[], cwd: string = process.cwd(), isTTY = true): CliArgs {
  const args = argv.slice(2);
  const command = args[0];

  if (command === undefined || command === 'help' || command === '--help' || command === '-h') {
    return { command: 'help' };
  }
  const allowed = ALLOWED[command];
  if (!allowed) {
    throw new UsageError(`Unknown command: ${command}`);
  }

  const values = new Map<string, string>();
  const switches = new Set<string>();

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (!allowed.includes(arg)) {
      throw new UsageError(`Unknown option for ${command}: ${arg}`);
    }
    if (SWITCHES.has(arg)) {
      switches.add(arg);
    } else if (VALUE_FLAGS.has(arg)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new UsageError(`${arg} needs a value`);
      }
      values.set(arg, value);
      i++;
    }
  }

  const resolve = (flag: string): string | undefined => {
    const value = values.get(flag);
    return value === undefined ? undefined : path.resolve(cwd, value);
  };
  const projectRoot = resolve('--project-root') ?? cwd;
  const runDir = resolve('--run-dir');

  switch (command) {
    case 'run': {
      if (values.has('--mission') && values.has('--mission-file')) {
        throw new UsageError('--mission and --mission-file are mutually exclusive');
      }
      const resume = switches.has('--resume');
      if (resume && !runDir) {
        throw new UsageError('--resume needs --run-dir');
      }
      return {
        command: 'run',
        projectRoot,
        configPath: resolve('--config'),
        runDir,
        resume,
        mission: values.get('--mission'),
        missionFile: resolve('--mission-file'),
        ui: isTTY && !switches.has('--no-ui'),
      };
    }
    case 'stop': {
      const all = switches.has('--all');
      if (!all && !runDir) {
        throw new UsageError('stop needs --run-dir or --all');
      }
      return { command: 'stop', projectRoot, runDir, clear: switches.has('--clear'), all };
    }
    default: {
      if (!runDir) {
        throw new UsageError('status needs --run-dir');
      }
      return { command: 'status', projectRoot, runDir, json: switches.has('--json') };
    }
  }
}

/** Directory for a fresh run, named after its start time. */
export function defaultRunDir(projectRoot: string, now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, '').replace(/\.\d+Z$/, 'Z').replace('T', '-');
  return path.join(projectRoot, '.conclave', 'runs', `run-${stamp}`);
}
