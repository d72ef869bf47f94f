import { EventEmitter } from 'node:events';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { AgentResult, AgentTask, ConclaveConfig, ResourceClass } from '@conclave/shared';
import { validateContract } from '../contract/contract.validator.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { ProcessLauncher } from '../process/process.launcher.js';
import type { QuotaTracker } from '../quota/quota.tracker.js';
import type { StopSignal } from '../signal/stop.signal.js';
import type { RunStore } from '../store/run.store.js';

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

export interface SlotSchedulerOptions {
  config: ConclaveConfig;
  projectRoot: string;
  store: RunStore;
  quota: QuotaTracker;
  launcher: ProcessLauncher;
  stopSignal: StopSignal;
  logger?: Logger;
}

/** Details of a launch, for live views. */
export interface TaskLaunch {
  task: AgentTask;
  /** Class actually used, after any downgrade. */
  resourceClass: ResourceClass;
  /** Console group index, or null when grouping is off. */
  group: number | null;
}

// ---------------------------------------------------------------------------
// Event type augmentation
// ---------------------------------------------------------------------------

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export interface SlotScheduler {
  /** Emitted right before an agent process is spawned. */
  on(event: 'task:launch', listener: (launch: TaskLaunch) => void): this;
  /** Emitted once a result has been persisted. */
  on(event: 'task:result', listener: (result: AgentResult) => void): this;
  /** Emitted for a task that was not launched because a stop was requested. */
  on(event: 'task:skipped', listener: (task: AgentTask) => void): this;

  emit(event: 'task:launch', launch: TaskLaunch): boolean;
  emit(event: 'task:result', result: AgentResult): boolean;
  emit(event: 'task:skipped', task: AgentTask): boolean;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Replace `{name}` placeholders; unknown names are left as written. */
export function expandArgs(args: string[], values: Record<string, string>): string[] {
  return args.map((arg) =>
    arg.replace(/\{(\w+)\}/g, (match, name: string) => values[name] ?? match),
  );
}

type AgentOutputFile =
  | { state: 'missing' }
  | { state: 'unreadable'; error: string }
  | { state: 'text'; text: string };

/** Whatever the agent left at its output path. Never throws: the path is agent-controlled. */
async function readAgentOutput(file: string): Promise<AgentOutputFile> {
  try {
    const text = await fs.readFile(file, 'utf-8');
    return text.trim() ? { state: 'text', text } : { state: 'missing' };
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return { state: 'missing' };
    return { state: 'unreadable', error: err instanceof Error ? err.message : String(err) };
  }
}

// ---------------------------------------------------------------------------
// SlotScheduler
// ---------------------------------------------------------------------------

/**
 * Runs one round's tasks as child processes under the `max_parallel` cap.
 *
 * Launches happen in list order on the control thread; stop check, quota
 * admission and commit for a task run back to back before anything awaits.
 * Every result is persisted before it is returned or emitted.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class SlotScheduler extends EventEmitter {
  private readonly config: ConclaveConfig;
  private readonly projectRoot: string;
  private readonly store: RunStore;
  private readonly quota: QuotaTracker;
  private readonly launcher: ProcessLauncher;
  private readonly stopSignal: StopSignal;
  private readonly logger: Logger;

  constructor(options: SlotSchedulerOptions) {
    super();
    this.config = options.config;
    this.projectRoot = options.projectRoot;
    this.store = options.store;
    this.quota = options.quota;
    this.launcher = options.launcher;
    this.stopSignal = options.stopSignal;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'scheduler' });
  }

  /**
   * Resolves once every launched task has a persisted terminal result.
   * Results come back in completion order. Rejects with the first
   * persistence error after in-flight tasks have settled.
   */
  async runRound(tasks: AgentTask[]): Promise<AgentResult[]> {
    const maxParallel = this.config.concurrency.max_parallel;
    const requested = this.config.concurrency.console_group_size;
    const groupSize = requested > 1 ? Math.min(requested, maxParallel) : 1;

    const results: AgentResult[] = [];
    const errors: unknown[] = [];
    const inFlight = new Set<Promise<void>>();

    const track = (work: Promise<AgentResult>) => {
      const settled: Promise<void> = work
        .then(
          (result) => {
            results.push(result);
          },
          (err: unknown) => {
            errors.push(err);
          },
        )
        .finally(() => inFlight.delete(settled));
      inFlight.add(settled);
    };

    for (let start = 0; start < tasks.length; start += groupSize) {
      const group = tasks.slice(start, start + groupSize);
      const groupIndex = groupSize > 1 ? start / groupSize : null;

      if (!this.stopSignal.isRequested()) {
        while (errors.length === 0 && inFlight.size + group.length > maxParallel) {
          await Promise.race(inFlight);
        }
      }
      if (errors.length > 0) break;

      for (const task of group) {
        if (this.stopSignal.isRequested()) {
          this.logger.info({ agentId: task.agentId, round: task.round }, 'Stop requested, not launching');
          this.emit('task:skipped', task);
          continue;
        }
        track(this.start(task, groupIndex));
      }
    }

    await Promise.all(inFlight);

    if (errors.length > 0) {
      this.logger.error({ err: errors[0] }, 'Round aborted');
      throw errors[0];
    }
    return results;
  }

  /** Admission and commit run before the first await. */
  private async start(task: AgentTask, group: number | null): Promise<AgentResult> {
    let resourceClass = task.resourceClass;
    let reason: string | null = null;

    if (!this.quota.tryAdmit(task.agentId, resourceClass)) {
      if (!this.config.quota.downgrade_on_deny) {
        this.logger.warn({ agentId: task.agentId, round: task.round }, 'Expensive quota denied');
        return this.persist({
          agentId: task.agentId,
          round: task.round,
          attempt: task.attempt,
          resourceClass,
          exitStatus: 'processError',
          exitCode: null,
          reason: 'quota_denied',
          rawOutput: '',
          decision: null,
          durationMs: 0,
          finishedAt: Date.now(),
        });
      }
      this.logger.info({ agentId: task.agentId, round: task.round }, 'Expensive quota denied, downgrading');
      resourceClass = 'cheap';
      reason = 'downgraded';
      this.quota.tryAdmit(task.agentId, resourceClass);
    }
    this.quota.commit(task.agentId, resourceClass);

    return this.execute(task, resourceClass, reason, group);
  }

  private async execute(
    task: AgentTask,
    resourceClass: ResourceClass,
    reason: string | null,
    group: number | null,
  ): Promise<AgentResult> {
    const { paths } = this.store;
    const promptFile = paths.promptFile(task.round, task.agentId, task.attempt);
    const outputFile = paths.outputFile(task.round, task.agentId, task.attempt);

    await this.store.writeArtifact(promptFile, task.promptPayload);
    await this.store.removeArtifact(outputFile);

    const values: Record<string, string> = {
      agentId: task.agentId,
      role: task.role,
      round: String(task.round),
      attempt: String(task.attempt),
      resourceClass,
      promptFile,
      outputFile,
      runDir: paths.runDir,
    };
    const env: Record<string, string> = {
      CONCLAVE_AGENT_ID: values.agentId,
      CONCLAVE_ROLE: values.role,
      CONCLAVE_ROUND: values.round,
      CONCLAVE_ATTEMPT: values.attempt,
      CONCLAVE_RESOURCE_CLASS: resourceClass,
      CONCLAVE_PROMPT_FILE: promptFile,
      CONCLAVE_OUTPUT_FILE: outputFile,
      CONCLAVE_RUN_DIR: paths.runDir,
    };
    if (group !== null) env.CONCLAVE_CONSOLE_GROUP = String(group);

    const { agent } = this.config;
    this.emit('task:launch', { task, resourceClass, group });
    this.logger.info(
      { agentId: task.agentId, round: task.round, attempt: task.attempt, resourceClass, group },
      'Launching agent',
    );

    const launched = await this.launcher.launch({
      command: agent.command,
      args: expandArgs(agent.args, values),
      cwd: agent.cwd ? path.resolve(this.projectRoot, agent.cwd) : this.projectRoot,
      env,
      stdin: task.promptPayload,
      timeoutMs: task.timeoutSeconds * 1000,
    });

    const written = await readAgentOutput(outputFile);
    if (written.state === 'unreadable') {
      this.logger.warn(
        { agentId: task.agentId, round: task.round, attempt: task.attempt, outputFile, error: written.error },
        'Agent output file unreadable, using stdout',
      );
    }
    const rawOutput = written.state === 'text' ? written.text : launched.stdout;
    if (written.state === 'missing' && rawOutput) {
      await this.store.writeArtifact(outputFile, rawOutput);
    }

    const exitStatus = launched.timedOut ? 'timeout' : launched.exitCode === 0 ? 'ok' : 'processError';
    // A decision only counts from a clean exit.
    const validation =
      exitStatus === 'ok'
        ? validateContract(rawOutput, {
            round: task.round,
            strictPaths: this.config.contract.strict_paths,
            minCommandsFromRound: this.config.contract.min_commands_from_round,
          })
        : null;

    if (exitStatus !== 'ok') {
      this.logger.warn(
        {
          agentId: task.agentId,
          round: task.round,
          attempt: task.attempt,
          exitStatus,
          exitCode: launched.exitCode,
          stderr: launched.stderr.slice(-500),
        },
        'Agent did not exit cleanly',
      );
    }

    return this.persist({
      agentId: task.agentId,
      round: task.round,
      attempt: task.attempt,
      resourceClass,
      exitStatus,
      exitCode: launched.exitCode,
      reason: launched.error ? `spawn_error: ${launched.error}` : reason,
      rawOutput,
      decision: validation?.decision ?? null,
      durationMs: launched.durationMs,
      finishedAt: Date.now(),
    });
  }

  private async persist(result: AgentResult): Promise<AgentResult> {
    await this.store.appendResult(result);
    this.emit('task:result', result);
    return result;
  }
}
