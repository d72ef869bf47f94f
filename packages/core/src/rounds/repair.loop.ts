import type {
  AgentOutcome,
  AgentResult,
  AgentTask,
  DecisionRecord,
  FailureKind,
} from '@conclave/shared';
import { validateContract, type ContractOptions } from '../contract/contract.validator.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { buildRepairPrompt } from '../prompts/prompt.provider.js';
import type { SlotScheduler } from '../scheduler/slot.scheduler.js';
import type { RunStore, Verdict } from '../store/run.store.js';

// ---------------------------------------------------------------------------
// Judging results
// ---------------------------------------------------------------------------

export interface JudgeOptions {
  /** When false any clean exit counts as valid. */
  requireDecision: boolean;
  contract: ContractOptions;
}

export interface Judgement {
  verdict: Verdict;
  decision: DecisionRecord | null;
}

/** Decide whether an attempt produced a usable result. Never throws. */
export function judgeResult(result: AgentResult, options: JudgeOptions): Judgement {
  const validation = validateContract(result.rawOutput, { ...options.contract, round: result.round });
  const base = { agentId: result.agentId, round: result.round, attempt: result.attempt };

  if (result.exitStatus !== 'ok') {
    return { verdict: { ...base, valid: false, violations: validation.violations }, decision: null };
  }
  if (!options.requireDecision) {
    return { verdict: { ...base, valid: true, violations: [] }, decision: validation.decision };
  }
  return {
    verdict: { ...base, valid: validation.valid, violations: validation.violations },
    decision: validation.decision,
  };
}

export function failureFor(result: AgentResult): FailureKind {
  if (result.reason === 'quota_denied') return 'QuotaDenied';
  switch (result.exitStatus) {
    case 'timeout':
      return 'ProcessTimeout';
    case 'processError':
      return 'ProcessError';
    default:
      return 'ContractInvalid';
  }
}

// ---------------------------------------------------------------------------
// RepairLoop
// ---------------------------------------------------------------------------

/** An agent whose latest attempt in a round did not produce a valid result. */
export interface RepairCandidate {
  /** The task of the latest attempt. */
  task: AgentTask;
  /** Payload of attempt 0, reused as the base of every repair prompt. */
  originalPayload: string;
  result: AgentResult;
  verdict: Verdict;
}

export interface RepairOutcome {
  /** Final outcomes, already persisted. */
  outcomes: AgentOutcome[];
  /** Repairs that were not launched because a stop was requested. */
  pending: AgentTask[];
}

export interface RepairLoopOptions {
  scheduler: SlotScheduler;
  store: RunStore;
  repairAttempts: number;
  priorTailChars: number;
  judge: JudgeOptions;
  logger?: Logger;
}

/**
 * Re-runs only the failing agents of a round, with a prompt naming what was
 * wrong, for up to `repairAttempts` extra attempts each. Agents that are
 * still invalid afterwards are recorded as permanently failed.
 */
export class RepairLoop {
  private readonly scheduler: SlotScheduler;
  private readonly store: RunStore;
  private readonly repairAttempts: number;
  private readonly priorTailChars: number;
  private readonly judge: JudgeOptions;
  private readonly logger: Logger;

  constructor(options: RepairLoopOptions) {
    this.scheduler = options.scheduler;
    this.store = options.store;
    this.repairAttempts = options.repairAttempts;
    this.priorTailChars = options.priorTailChars;
    this.judge = options.judge;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'repair' });
  }

  async repair(candidates: RepairCandidate[]): Promise<RepairOutcome> {
    const outcomes: AgentOutcome[] = [];
    const pending: AgentTask[] = [];
    let current = candidates;

    while (current.length > 0) {
      const payloads = new Map<string, string>();
      const tasks: AgentTask[] = [];

      for (const candidate of current) {
        // A denied admission is not a contract problem; retrying would be denied again.
        if (candidate.result.reason === 'quota_denied' || candidate.task.attempt >= this.repairAttempts) {
          outcomes.push(await this.fail(candidate));
          continue;
        }
        const attempt = candidate.task.attempt + 1;
        payloads.set(candidate.task.agentId, candidate.originalPayload);
        tasks.push({
          ...candidate.task,
          attempt,
          promptPayload: buildRepairPrompt({
            originalPayload: candidate.originalPayload,
            agentId: candidate.task.agentId,
            round: candidate.task.round,
            attempt,
            exitStatus: candidate.result.exitStatus,
            exitCode: candidate.result.exitCode,
            violations: candidate.verdict.violations,
            priorOutput: candidate.result.rawOutput,
            priorTailChars: this.priorTailChars,
            strictPaths: this.judge.contract.strictPaths ?? false,
            requireCommands: this.requiresCommands(candidate.task.round),
          }),
        });
      }
      if (tasks.length === 0) break;

      this.logger.info(
        { round: tasks[0].round, agents: tasks.map((t) => t.agentId) },
        'Repairing contract failures',
      );
      const results = await this.scheduler.runRound(tasks);

      const next: RepairCandidate[] = [];
      for (const task of tasks) {
        const result = results.find((r) => r.agentId === task.agentId);
        if (!result) {
          pending.push(task);
          continue;
        }
        const { verdict, decision } = judgeResult(result, this.judge);
        await this.store.appendVerdict(verdict);
        if (verdict.valid) {
          outcomes.push(await this.succeed(result, decision));
        } else {
          next.push({ task, originalPayload: payloads.get(task.agentId) ?? task.promptPayload, result, verdict });
        }
      }
      current = next;
    }

    return { outcomes, pending };
  }

  async succeed(result: AgentResult, decision: DecisionRecord | null): Promise<AgentOutcome> {
    const outcome: AgentOutcome = {
      agentId: result.agentId,
      round: result.round,
      status: 'valid',
      attempts: result.attempt + 1,
      failure: null,
      decision,
    };
    await this.store.appendOutcome(outcome);
    return outcome;
  }

  private async fail(candidate: RepairCandidate): Promise<AgentOutcome> {
    const { result } = candidate;
    const outcome: AgentOutcome = {
      agentId: result.agentId,
      round: result.round,
      status: 'failed',
      attempts: result.attempt + 1,
      failure: failureFor(result),
      decision: null,
    };
    this.logger.warn(
      { agentId: outcome.agentId, round: outcome.round, failure: outcome.failure, attempts: outcome.attempts },
      'Agent permanently failed for round',
    );
    await this.store.appendOutcome(outcome);
    return outcome;
  }

  private requiresCommands(round: number): boolean {
    const from = this.judge.contract.minCommandsFromRound ?? 0;
    return from > 0 && round >= from;
  }
}
