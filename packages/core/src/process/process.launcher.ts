import { spawn, type ChildProcess } from 'node:child_process';
import { silentLogger, type Logger } from '../logging/logger.js';

const KILL_GRACE_MS = 2_000;
const STDERR_TAIL_CHARS = 4_000;

export interface LaunchSpec {
  command: string;
  args: string[];
  cwd: string;
  env?: Record<string, string>;
  /** Written to the child's stdin, which is then closed. */
  stdin?: string;
  timeoutMs: number;
}

export interface LaunchResult {
  /** Null when the process was killed or never started. */
  exitCode: number | null;
  timedOut: boolean;
  stdout: string;
  /** Tail of stderr. */
  stderr: string;
  durationMs: number;
  /** Spawn failure message, if the process never ran. */
  error: string | null;
}

/**
 * Capability the scheduler launches agents through. Implementations must
 * enforce `timeoutMs` by killing the whole process tree.
 */
export interface ProcessLauncher {
  launch(spec: LaunchSpec): Promise<LaunchResult>;
}

function tail(text: string, max: number): string {
  return text.length <= max ? text : text.slice(-max);
}

/** Kill `child` and everything it spawned. */
export function killProcessTree(child: ChildProcess): void {
  const pid = child.pid;
  if (pid === undefined) return;

  if (process.platform === 'win32') {
    spawn('taskkill', ['/pid', String(pid), '/T', '/F'], { stdio: 'ignore' }).on('error', () => {
      child.kill('SIGKILL');
    });
    return;
  }

  try {
    // Children run in their own process group (detached), so -pid hits the tree.
    process.kill(-pid, 'SIGKILL');
  } catch {
    child.kill('SIGKILL');
  }
}

export interface ChildProcessLauncherOptions {
  logger?: Logger;
}

export class ChildProcessLauncher implements ProcessLauncher {
  private readonly logger: Logger;

  constructor(options: ChildProcessLauncherOptions = {}) {
    this.logger = (options.logger ?? silentLogger()).child({ component: 'launcher' });
  }

  launch(spec: LaunchSpec): Promise<LaunchResult> {
    const startedAt = Date.now();

    return new Promise<LaunchResult>((resolve) => {
      const child = spawn(spec.command, spec.args, {
        cwd: spec.cwd,
        env: { ...process.env, ...spec.env },
        stdio: ['pipe', 'pipe', 'pipe'],
        detached: process.platform !== 'win32',
        windowsHide: true,
      });

      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let finished = false;
      let graceTimer: ReturnType<typeof setTimeout> | null = null;

      const finish = (exitCode: number | null, error: string | null) => {
        if (finished) return;
        finished = true;
        clearTimeout(timer);
        if (graceTimer) clearTimeout(graceTimer);
        resolve({
          exitCode: timedOut ? null : exitCode,
          timedOut,
          stdout,
          stderr: tail(stderr, STDERR_TAIL_CHARS),
          durationMs: Date.now() - startedAt,
          error,
        });
      };

      const timer = setTimeout(() => {
        timedOut = true;
        this.logger.warn({ pid: child.pid, timeoutMs: spec.timeoutMs }, 'Process timed out, killing tree');
        killProcessTree(child);
        // 'close' waits for every pipe holder; don't hang on a stubborn grandchild.
        graceTimer = setTimeout(() => finish(null, null), KILL_GRACE_MS);
      }, spec.timeoutMs);

      // Decode across chunk boundaries so split multi-byte characters survive.
      child.stdout?.setEncoding('utf8');
      child.stderr?.setEncoding('utf8');
      child.stdout?.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr?.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.stdin?.on('error', (err) => {
        // Agents that never read stdin close it early (EPIPE).
        this.logger.debug({ pid: child.pid, err: err.message }, 'stdin closed by child');
      });
      child.stdin?.end(spec.stdin ?? '');

      child.on('close', (code) => finish(code, null));
      child.on('error', (err) => {
        this.logger.error({ command: spec.command, err: err.message }, 'Process failed to start');
        finish(null, err.message);
      });
    });
  }
}
