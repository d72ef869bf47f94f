import { EventEmitter } from 'node:events';
import * as path from 'node:path';
import type {
  AgentOutcome,
  AgentResult,
  AgentTask,
  ConclaveConfig,
  RoundSummary,
  RunPhase,
  RunReport,
  StopReason,
} from '@conclave/shared';
import { isPersistenceError } from '../errors/conclave.errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { ChildProcessLauncher, type ProcessLauncher } from '../process/process.launcher.js';
import {
  TemplatePromptProvider,
  type PeerDecision,
  type PromptProvider,
} from '../prompts/prompt.provider.js';
import { QuotaTracker } from '../quota/quota.tracker.js';
import { buildRunReport, formatRunReport } from '../report/run.report.js';
import { SlotScheduler, type TaskLaunch } from '../scheduler/slot.scheduler.js';
import { scoreRound } from '../scoring/round.scorer.js';
import { StopSignal } from '../signal/stop.signal.js';
import { RunPaths } from '../store/run.paths.js';
import { RunStore } from '../store/run.store.js';
import { buildTeam, type AgentSeat } from '../team/team.builder.js';
import { RepairLoop, judgeResult, type JudgeOptions, type RepairCandidate } from './repair.loop.js';

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

export interface RoundControllerOptions {
  config: ConclaveConfig;
  projectRoot: string;
  runDir: string;
  /** Continue the run already in `runDir`. */
  resume?: boolean;
  runId?: string;
  /** Mission text for the default prompt provider. */
  mission?: string;
  promptProvider?: PromptProvider;
  launcher?: ProcessLauncher;
  stopSignal?: StopSignal;
  logger?: Logger;
}

export interface RoundStart {
  round: number;
  agents: string[];
}

// ---------------------------------------------------------------------------
// Event type augmentation
// ---------------------------------------------------------------------------

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export interface RoundController {
  on(event: 'run:phase', listener: (phase: RunPhase) => void): this;
  on(event: 'round:start', listener: (start: RoundStart) => void): this;
  on(event: 'round:evaluated', listener: (summary: RoundSummary) => void): this;
  on(event: 'agent:outcome', listener: (outcome: AgentOutcome) => void): this;
  on(event: 'run:stopped', listener: (report: RunReport) => void): this;
  /** Forwarded from the scheduler. */
  on(event: 'task:launch', listener: (launch: TaskLaunch) => void): this;
  on(event: 'task:result', listener: (result: AgentResult) => void): this;
  on(event: 'task:skipped', listener: (task: AgentTask) => void): this;

  emit(event: 'run:phase', phase: RunPhase): boolean;
  emit(event: 'round:start', start: RoundStart): boolean;
  emit(event: 'round:evaluated', summary: RoundSummary): boolean;
  emit(event: 'agent:outcome', outcome: AgentOutcome): boolean;
  emit(event: 'run:stopped', report: RunReport): boolean;
  emit(event: 'task:launch', launch: TaskLaunch): boolean;
  emit(event: 'task:result', result: AgentResult): boolean;
  emit(event: 'task:skipped', task: AgentTask): boolean;
}

/** Stop reasons a `--resume` may continue from. */
export function isResumable(reason: StopReason): boolean {
  return reason === 'killed' || reason === 'persistenceFailure';
}

/** Everything a round needs, bound once the store is open. */
interface RunContext {
  store: RunStore;
  seats: AgentSeat[];
  quota: QuotaTracker;
  scheduler: SlotScheduler;
  repairLoop: RepairLoop;
  judge: JudgeOptions;
}

// ---------------------------------------------------------------------------
// RoundController
// ---------------------------------------------------------------------------

/**
 * Drives a run through its rounds:
 *
 *   pending → running(n) → evaluating(n) → running(n + 1) | stopped(reason)
 *
 * Each round runs the seat set through the SlotScheduler, validates every
 * result, hands failures to the RepairLoop, then scores the round and checks
 * the stop conditions in order: external stop, contract failure, max rounds,
 * score threshold.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class RoundController extends EventEmitter {
  private readonly options: RoundControllerOptions;
  private readonly config: ConclaveConfig;
  private readonly stopSignal: StopSignal;
  private readonly launcher: ProcessLauncher;
  private readonly promptProvider: PromptProvider;
  private readonly logger: Logger;

  constructor(options: RoundControllerOptions) {
    super();
    this.options = options;
    this.config = options.config;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'controller' });
    this.stopSignal =
      options.stopSignal ??
      new StopSignal({
        runFlag: new RunPaths(path.resolve(options.runDir)).stopFlag,
        projectRoot: options.projectRoot,
      });
    this.launcher = options.launcher ?? new ChildProcessLauncher({ logger: options.logger });
    this.promptProvider =
      options.promptProvider ??
      new TemplatePromptProvider({ projectRoot: options.projectRoot, mission: options.mission ?? '' });
  }

  /** Request a stop; running agents finish, nothing new is launched. */
  stop(): void {
    this.stopSignal.request();
  }

  /**
   * Run (or resume) to completion. Resolves with the terminal report.
   * Rejects only when the run directory cannot be opened.
   */
  async run(): Promise<RunReport> {
    const { config } = this;
    const store = await RunStore.open({
      runDir: this.options.runDir,
      maxRounds: config.rounds.max_rounds,
      resume: this.options.resume,
      runId: this.options.runId,
      logger: this.options.logger,
    });
    const ctx = this.createContext(store);

    let reason: StopReason;
    let error: string | null = null;
    try {
      reason = await this.loop(ctx);
    } catch (err) {
      if (!isPersistenceError(err)) throw err;
      this.logger.error({ err, path: err.path }, 'Persistence failed, stopping run');
      reason = 'persistenceFailure';
      error = err.message;
    }

    return this.finish(ctx, reason, error);
  }

  // ── Setup ──────────────────────────────────────────────────────────────────

  private createContext(store: RunStore): RunContext {
    const { config } = this;
    const seats = buildTeam(config);
    const quota = QuotaTracker.fromResults(
      { globalBudget: config.quota.global_budget, perAgentBudget: config.quota.per_agent_budget },
      store.allResults(),
    );

    const scheduler = new SlotScheduler({
      config,
      projectRoot: this.options.projectRoot,
      store,
      quota,
      launcher: this.launcher,
      stopSignal: this.stopSignal,
      logger: this.options.logger,
    });
    scheduler.on('task:launch', (launch) => this.emit('task:launch', launch));
    scheduler.on('task:result', (result) => this.emit('task:result', result));
    scheduler.on('task:skipped', (task) => this.emit('task:skipped', task));

    const judge: JudgeOptions = {
      requireDecision: config.contract.require_decision_json,
      contract: {
        strictPaths: config.contract.strict_paths,
        minCommandsFromRound: config.contract.min_commands_from_round,
      },
    };
    const repairLoop = new RepairLoop({
      scheduler,
      store,
      repairAttempts: config.contract.repair_attempts,
      priorTailChars: config.contract.prior_tail_chars,
      judge,
      logger: this.options.logger,
    });

    return { store, seats, quota, scheduler, repairLoop, judge };
  }

  // ── Main loop ──────────────────────────────────────────────────────────────

  private async loop(ctx: RunContext): Promise<StopReason> {
    const { store } = ctx;
    const { max_rounds: maxRounds } = this.config.rounds;
    const { fail_closed: failClosed, threshold, require_decision_json: requireDecision } =
      this.config.contract;

    // Only an interrupted run picks up where it left off; a decided one stays decided.
    const previous = store.snapshot().stopReason;
    if (previous !== null && !isResumable(previous)) {
      this.logger.info({ reason: previous }, 'Run already stopped, nothing to resume');
      return previous;
    }

    await this.setPhase(store, { state: 'pending' });
    let round = store.snapshot().lastCompletedRound + 1;
    if (round > maxRounds) return 'complete';

    for (;;) {
      if (this.stopSignal.isRequested()) {
        await store.markStopRequested();
        return 'killed';
      }

      await store.beginRound(round);
      this.emit('run:phase', { state: 'running', round });
      const { summary, interrupted } = await this.runRound(ctx, round);

      await this.setPhase(store, { state: 'evaluating', round });

      // (a) external stop. An interrupted round is left uncommitted so a
      // resume picks up its remaining agents.
      if (interrupted) {
        await store.markStopRequested();
        return 'killed';
      }
      await store.commitRound(summary, ctx.quota.snapshot());
      this.emit('round:evaluated', summary);
      this.logger.info(
        { round, score: summary.score, valid: summary.validAgents, failed: summary.failedAgents },
        'Round evaluated',
      );
      if (this.stopSignal.isRequested()) {
        await store.markStopRequested();
        return 'killed';
      }

      // (b) contract failures
      const contractFailures = store
        .outcomesFor(round)
        .filter((o) => o.status === 'failed' && o.failure !== 'QuotaDenied');
      if (requireDecision && contractFailures.length > 0) {
        if (failClosed) return 'contractFailure';
        this.logger.warn(
          { round, agents: contractFailures.map((o) => o.agentId) },
          'Agents failed the decision contract; continuing (fail_closed is off)',
        );
      }

      // (c) max rounds
      if (round >= maxRounds) return 'complete';

      // (d) quality gate
      if (failClosed && threshold > 0 && summary.score < threshold) {
        this.logger.warn({ round, score: summary.score, threshold }, 'Round score below threshold');
        return 'belowThreshold';
      }

      round++;
    }
  }

  private async runRound(
    ctx: RunContext,
    round: number,
  ): Promise<{ summary: RoundSummary; interrupted: boolean }> {
    const { store, seats, scheduler, repairLoop } = ctx;
    const peers = this.peerDecisions(ctx, round);
    const rerunAll = round === 1 || this.config.rounds.rerun === 'full';
    const active = rerunAll ? seats : seats.filter((s) => !this.holdsValid(ctx, s.agentId, round - 1));

    this.emit('round:start', { round, agents: active.map((s) => s.agentId) });

    const fresh: AgentTask[] = [];
    const payloads = new Map<string, string>();
    const candidates: RepairCandidate[] = [];

    for (const seat of active) {
      if (store.isCompleted(seat.agentId, round)) continue;

      const payload = this.promptProvider.payloadFor({
        seat,
        round,
        maxRounds: this.config.rounds.max_rounds,
        peerDecisions: peers,
        strictPaths: this.config.contract.strict_paths,
        requireCommands:
          this.config.contract.min_commands_from_round > 0 &&
          round >= this.config.contract.min_commands_from_round,
      });
      payloads.set(seat.agentId, payload);
      const task = this.taskFor(seat, round, 0, payload);

      // Resume: re-validate the last persisted attempt instead of relaunching it.
      const results = store.progressFor(seat.agentId, round)?.results ?? [];
      const last = results[results.length - 1];
      if (!last) {
        fresh.push(task);
        continue;
      }
      this.logger.info({ agentId: seat.agentId, round, attempt: last.attempt }, 'Resuming agent');
      const settled = await this.settle(ctx, { ...task, attempt: last.attempt }, payload, last);
      if (settled) candidates.push(settled);
    }

    const results = await scheduler.runRound(fresh);
    const skipped: string[] = [];
    for (const task of fresh) {
      const result = results.find((r) => r.agentId === task.agentId);
      if (!result) {
        skipped.push(task.agentId);
        continue;
      }
      const settled = await this.settle(ctx, task, payloads.get(task.agentId) ?? task.promptPayload, result);
      if (settled) candidates.push(settled);
    }

    const repaired = await repairLoop.repair(candidates);
    for (const outcome of repaired.outcomes) this.emit('agent:outcome', outcome);
    skipped.push(...repaired.pending.map((t) => t.agentId));

    const validAgents = seats.filter((s) => this.holdsValid(ctx, s.agentId, round)).map((s) => s.agentId);
    const failedAgents = store
      .outcomesFor(round)
      .filter((o) => o.status === 'failed')
      .map((o) => o.agentId);

    return {
      summary: {
        round,
        score: scoreRound(seats, new Set(validAgents), this.config.scoring.weights),
        validAgents,
        failedAgents,
        skippedAgents: skipped,
        completedAt: Date.now(),
      },
      interrupted: skipped.length > 0,
    };
  }

  /**
   * Judge one result. A valid result is recorded as the agent's outcome;
   * otherwise the agent becomes a repair candidate.
   */
  private async settle(
    ctx: RunContext,
    task: AgentTask,
    originalPayload: string,
    result: AgentResult,
  ): Promise<RepairCandidate | null> {
    const { verdict, decision } = judgeResult(result, ctx.judge);
    await ctx.store.appendVerdict(verdict);
    if (!verdict.valid) return { task, originalPayload, result, verdict };

    const outcome = await ctx.repairLoop.succeed(result, decision);
    this.emit('agent:outcome', outcome);
    return null;
  }

  // ── Helpers ────────────────────────────────────────────────────────────────

  private taskFor(seat: AgentSeat, round: number, attempt: number, payload: string): AgentTask {
    return {
      agentId: seat.agentId,
      role: seat.role,
      round,
      attempt,
      resourceClass: seat.resourceClass,
      timeoutSeconds: seat.timeoutSeconds,
      promptPayload: payload,
    };
  }

  /**
   * Whether an agent holds a valid record for `round`. Under `invalid_only`
   * an agent that was not re-run carries its last outcome forward.
   */
  private holdsValid(ctx: RunContext, agentId: string, round: number): boolean {
    for (let r = round; r >= 1; r--) {
      const outcome = ctx.store.progressFor(agentId, r)?.outcome;
      if (outcome) return outcome.status === 'valid';
      if (this.config.rounds.rerun === 'full') return false;
    }
    return false;
  }

  /** Decisions from the previous round (carried forward under `invalid_only`). */
  private peerDecisions(ctx: RunContext, round: number): PeerDecision[] {
    if (round <= 1) return [];
    const carry = this.config.rounds.rerun === 'invalid_only';
    return ctx.seats.flatMap((seat) => {
      const latest = ctx.store.latestDecision(seat.agentId, round - 1);
      if (!latest || (!carry && latest.round !== round - 1)) return [];
      return [{ agentId: seat.agentId, decision: latest.decision }];
    });
  }

  private async setPhase(store: RunStore, phase: RunPhase): Promise<void> {
    await store.setPhase(phase);
    this.emit('run:phase', phase);
  }

  private async finish(ctx: RunContext, reason: StopReason, error: string | null): Promise<RunReport> {
    const report = buildRunReport({
      store: ctx.store,
      seats: ctx.seats,
      config: this.config,
      quota: ctx.quota.snapshot(),
      reason,
      error,
    });

    try {
      await ctx.store.writeLedger(report.quota);
      await ctx.store.finish(reason, report, formatRunReport(report));
    } catch (err) {
      if (!isPersistenceError(err)) throw err;
      this.logger.error({ err, path: err.path }, 'Could not persist the run report');
      report.stopReason = 'persistenceFailure';
      report.error = err.message;
    }

    this.logger.info({ reason: report.stopReason, lastCompletedRound: report.lastCompletedRound }, 'Run stopped');
    this.emit('run:phase', { state: 'stopped', reason: report.stopReason });
    this.emit('run:stopped', report);
    return report;
  }
}
