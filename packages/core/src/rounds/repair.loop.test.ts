import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import type { AgentResult, AgentTask, ConclaveConfig } from '@conclave/shared';
import { QuotaTracker } from '../quota/quota.tracker.js';
import { SlotScheduler } from '../scheduler/slot.scheduler.js';
import { StopSignal } from '../signal/stop.signal.js';
import { RunStore } from '../store/run.store.js';
import { RepairLoop, failureFor, judgeResult, type JudgeOptions, type RepairCandidate } from './repair.loop.js';
import { ScriptedLauncher, decisionOutput, testConfig, type Script } from './rounds.test-helpers.js';

let tmpDir: string;
let store: RunStore;
let config: ConclaveConfig;

const JUDGE: JudgeOptions = { requireDecision: true, contract: {} };

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'conclave-repair-'));
  store = await RunStore.open({ runDir: path.join(tmpDir, 'run'), maxRounds: 2 });
  config = testConfig();
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

function result(overrides: Partial<AgentResult> = {}): AgentResult {
  return {
    agentId: 'engineer-1',
    round: 1,
    attempt: 0,
    resourceClass: 'cheap',
    exitStatus: 'ok',
    exitCode: 0,
    reason: null,
    rawOutput: 'no block here',
    decision: null,
    durationMs: 5,
    finishedAt: 0,
    ...overrides,
  };
}

const TASK: AgentTask = {
  agentId: 'engineer-1',
  role: 'engineer',
  round: 1,
  attempt: 0,
  resourceClass: 'cheap',
  timeoutSeconds: 30,
  promptPayload: 'ORIGINAL PROMPT',
};

function candidate(overrides: Partial<AgentResult> = {}): RepairCandidate {
  const r = result(overrides);
  return { task: { ...TASK, attempt: r.attempt }, originalPayload: 'ORIGINAL PROMPT', result: r, verdict: judgeResult(r, JUDGE).verdict };
}

function loop(script?: Script, options: { repairAttempts?: number; stopSignal?: StopSignal } = {}) {
  const launcher = new ScriptedLauncher(script);
  const scheduler = new SlotScheduler({
    config,
    projectRoot: tmpDir,
    store,
    quota: new QuotaTracker({ globalBudget: 0, perAgentBudget: 0 }),
    launcher,
    stopSignal: options.stopSignal ?? new StopSignal(),
  });
  const repairLoop = new RepairLoop({
    scheduler,
    store,
    repairAttempts: options.repairAttempts ?? 1,
    priorTailChars: 6000,
    judge: JUDGE,
  });
  return { launcher, repairLoop };
}

// ─── judgeResult ────────────────────────────────────────────────

describe('judgeResult', () => {
  it('accepts a clean exit with a valid block', () => {
    const { verdict, decision } = judgeResult(result({ rawOutput: decisionOutput('ok') }), JUDGE);
    expect(verdict).toEqual({ agentId: 'engineer-1', round: 1, attempt: 0, valid: true, violations: [] });
    expect(decision?.summary).toBe('ok');
  });

  it('rejects a clean exit without a block', () => {
    const { verdict, decision } = judgeResult(result(), JUDGE);
    expect(verdict.valid).toBe(false);
    expect(verdict.violations.map((v) => v.code)).toEqual(['missing_block']);
    expect(decision).toBeNull();
  });

  it('rejects a timed-out attempt even with a valid block', () => {
    const { verdict, decision } = judgeResult(
      result({ exitStatus: 'timeout', exitCode: null, rawOutput: decisionOutput() }),
      JUDGE,
    );
    expect(verdict.valid).toBe(false);
    expect(verdict.violations).toEqual([]);
    expect(decision).toBeNull();
  });

  it('accepts any clean exit when no decision is required', () => {
    const { verdict, decision } = judgeResult(result(), { requireDecision: false, contract: {} });
    expect(verdict.valid).toBe(true);
    expect(decision).toBeNull();
  });
});

describe('failureFor', () => {
  it('maps results to failure kinds', () => {
    expect(failureFor(result({ exitStatus: 'timeout' }))).toBe('ProcessTimeout');
    expect(failureFor(result({ exitStatus: 'processError' }))).toBe('ProcessError');
    expect(failureFor(result({ exitStatus: 'processError', reason: 'quota_denied' }))).toBe('QuotaDenied');
    expect(failureFor(result())).toBe('ContractInvalid');
  });
});

// ─── repair ─────────────────────────────────────────────────────

describe('RepairLoop.repair', () => {
  it('re-runs a failing agent with the violations and records success', async () => {
    const { launcher, repairLoop } = loop(() => ({ stdout: decisionOutput('fixed') }));

    const { outcomes, pending } = await repairLoop.repair([candidate()]);

    expect(launcher.calls).toHaveLength(1);
    expect(launcher.calls[0].attempt).toBe(1);
    expect(launcher.calls[0].stdin.startsWith('ORIGINAL PROMPT\n\n## Repair')).toBe(true);
    expect(launcher.calls[0].stdin).toContain('- [missing_block] ');
    expect(launcher.calls[0].stdin).toContain('no block here');
    expect(outcomes).toEqual([
      {
        agentId: 'engineer-1',
        round: 1,
        status: 'valid',
        attempts: 2,
        failure: null,
        decision: expect.objectContaining({ summary: 'fixed' }),
      },
    ]);
    expect(pending).toEqual([]);
    expect(store.isCompleted('engineer-1', 1)).toBe(true);
  });

  it('tells a timed-out agent that it timed out', async () => {
    const { launcher, repairLoop } = loop(() => ({ stdout: decisionOutput('faster') }));

    const { outcomes } = await repairLoop.repair([candidate({ exitStatus: 'timeout', exitCode: null })]);

    expect(launcher.calls[0].stdin).toContain('(engineer-1, round 1, attempt 0) timed out before it finished.');
    expect(launcher.calls[0].stdin).not.toContain('[missing_block]');
    expect(outcomes[0]).toMatchObject({ status: 'valid', attempts: 2 });
  });

  it('gives up after repair_attempts', async () => {
    const { launcher, repairLoop } = loop(() => ({ stdout: 'still no block' }));

    const { outcomes } = await repairLoop.repair([candidate()]);

    expect(launcher.calls.map((c) => c.attempt)).toEqual([1]);
    expect(outcomes[0]).toMatchObject({ status: 'failed', failure: 'ContractInvalid', attempts: 2 });
  });

  it('keeps repairing up to the configured number of attempts', async () => {
    const { launcher, repairLoop } = loop(
      (info) => ({ stdout: info.attempt === 2 ? decisionOutput() : 'nope' }),
      { repairAttempts: 3 },
    );

    const { outcomes } = await repairLoop.repair([candidate()]);

    expect(launcher.calls.map((c) => c.attempt)).toEqual([1, 2]);
    expect(outcomes[0]).toMatchObject({ status: 'valid', attempts: 3 });
  });

  it('fails immediately when repairs are disabled', async () => {
    const { launcher, repairLoop } = loop(undefined, { repairAttempts: 0 });

    const { outcomes } = await repairLoop.repair([candidate({ exitStatus: 'timeout', exitCode: null })]);

    expect(launcher.calls).toHaveLength(0);
    expect(outcomes[0]).toMatchObject({ status: 'failed', failure: 'ProcessTimeout', attempts: 1 });
  });

  it('does not retry a quota denial', async () => {
    const { launcher, repairLoop } = loop();

    const { outcomes } = await repairLoop.repair([
      candidate({ exitStatus: 'processError', exitCode: null, reason: 'quota_denied', resourceClass: 'expensive' }),
    ]);

    expect(launcher.calls).toHaveLength(0);
    expect(outcomes[0]).toMatchObject({ status: 'failed', failure: 'QuotaDenied' });
  });

  it('leaves repairs pending when a stop is requested', async () => {
    const stopSignal = new StopSignal();
    stopSignal.request();
    const { launcher, repairLoop } = loop(undefined, { stopSignal });

    const { outcomes, pending } = await repairLoop.repair([candidate()]);

    expect(launcher.calls).toHaveLength(0);
    expect(outcomes).toEqual([]);
    expect(pending.map((t) => [t.agentId, t.attempt])).toEqual([['engineer-1', 1]]);
    expect(store.isCompleted('engineer-1', 1)).toBe(false);
  });
});
