import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { RunState } from '@conclave/shared';
import { phaseLabel } from '../format.js';
import { formatStatus, readStatus, statusCommand } from './status.command.js';
import { stopCommand } from './stop.command.js';

let tmpDir: string;
let runDir: string;

function runState(overrides: Partial<RunState> = {}): RunState {
  return {
    runId: 'run-test',
    currentRound: 2,
    maxRounds: 3,
    lastCompletedRound: 1,
    completedAgents: [],
    failedAgents: [],
    stopRequested: false,
    decisions: {},
    rounds: [
      {
        round: 1,
        score: 66.67,
        validAgents: ['architect-1', 'engineer-1'],
        failedAgents: ['critic-1'],
        skippedAgents: [],
        completedAt: 1,
      },
    ],
    phase: { state: 'running', round: 2 },
    stopReason: null,
    startedAt: 0,
    updatedAt: 1,
    ...overrides,
  };
}

function writeRun(state: RunState): void {
  fs.mkdirSync(path.join(runDir, 'state'), { recursive: true });
  fs.writeFileSync(path.join(runDir, 'state', 'run.json'), JSON.stringify(state));
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'conclave-cli-'));
  runDir = path.join(tmpDir, 'run');
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('phaseLabel', () => {
  it('labels each phase', () => {
    expect(phaseLabel({ state: 'pending' })).toBe('pending');
    expect(phaseLabel({ state: 'evaluating', round: 3 })).toBe('evaluating (round 3)');
    expect(phaseLabel({ state: 'stopped', reason: 'belowThreshold' })).toBe('stopped (belowThreshold)');
  });
});

describe('formatStatus', () => {
  it('summarizes round, phase, stop flag, quota and scores', () => {
    const text = formatStatus({
      state: runState(),
      stopFlag: true,
      quota: { globalBudget: 4, perAgentBudget: 0, globalConsumed: 3, consumedByAgent: { 'architect-1': 3 } },
    });
    expect(text).toBe(
      [
        'Run run-test',
        'Phase:      running (round 2)',
        'Round:      2 of 3 (last completed: 1)',
        'Stop flag:  set',
        'Quota:      3/4 expensive launches, per-agent limit none',
        'Scores:',
        '  round 1: 66.67% (2 valid, 1 failed)',
        '',
      ].join('\n'),
    );
  });

  it('handles a run without rounds or ledger', () => {
    const text = formatStatus({ state: runState({ rounds: [], phase: { state: 'pending' } }), stopFlag: false, quota: null });
    expect(text).toContain('Stop flag:  not set\n');
    expect(text).toContain('Quota:      no ledger yet\n');
    expect(text.endsWith('Scores:\n  (no completed rounds)\n')).toBe(true);
  });

  it('counts skipped agents', () => {
    const state = runState({
      rounds: [{ round: 1, score: 0, validAgents: [], failedAgents: [], skippedAgents: ['a-1'], completedAt: 1 }],
    });
    expect(formatStatus({ state, stopFlag: false, quota: null })).toContain('  round 1: 0% (0 valid, 0 failed, 1 skipped)\n');
  });
});

describe('readStatus', () => {
  it('reads the snapshot, stop flag and ledger', async () => {
    writeRun(runState());
    fs.writeFileSync(
      path.join(runDir, 'state', 'quota.json'),
      JSON.stringify({ globalBudget: 2, perAgentBudget: 1, globalConsumed: 1, consumedByAgent: { 'critic-1': 1 } }),
    );

    const info = await readStatus(runDir);

    expect(info.state.runId).toBe('run-test');
    expect(info.stopFlag).toBe(false);
    expect(info.quota?.globalConsumed).toBe(1);
  });

  it('fails when the directory holds no run', async () => {
    await expect(readStatus(runDir)).rejects.toThrow(`No run found in ${runDir}`);
  });

  it('prints JSON with --json', async () => {
    writeRun(runState());
    let out = '';
    const code = await statusCommand({ command: 'status', projectRoot: tmpDir, runDir, json: true }, (t) => {
      out += t;
    });
    expect(code).toBe(0);
    const parsed: unknown = JSON.parse(out);
    expect(parsed).toMatchObject({ state: { runId: 'run-test' }, stopFlag: false, quota: null });
  });
});

describe('stopCommand', () => {
  it('writes and clears the run flag', () => {
    const lines: string[] = [];
    const write = (t: string) => {
      lines.push(t);
    };
    const flag = path.join(runDir, 'state', 'STOP');

    stopCommand({ command: 'stop', projectRoot: tmpDir, runDir, clear: false, all: false }, write);
    expect(fs.existsSync(flag)).toBe(true);

    stopCommand({ command: 'stop', projectRoot: tmpDir, runDir, clear: true, all: false }, write);
    expect(fs.existsSync(flag)).toBe(false);

    stopCommand({ command: 'stop', projectRoot: tmpDir, runDir, clear: true, all: false }, write);
    expect(lines).toEqual([`Stop requested: ${flag}\n`, `Removed stop flag ${flag}\n`, `No stop flag at ${flag}\n`]);
  });

  it('uses the project-wide flag with --all', () => {
    stopCommand({ command: 'stop', projectRoot: tmpDir, clear: false, all: true }, () => undefined);
    expect(fs.existsSync(path.join(tmpDir, 'STOP_ALL_AGENTS.flag'))).toBe(true);
  });

  it('shows up in the status summary', async () => {
    writeRun(runState());
    stopCommand({ command: 'stop', projectRoot: tmpDir, runDir, clear: false, all: false }, () => undefined);
    const info = await readStatus(runDir);
    expect(info.stopFlag).toBe(true);
  });
});
