import fs from 'node:fs';
import { RunPaths, readRunSnapshot } from '@conclave/core';
import type { QuotaLedger, RunState } from '@conclave/shared';
import type { StatusArgs } from '../cli.args.js';
import { phaseLabel } from '../format.js';
import { stdout, type Write } from './output.js';

export interface StatusInfo {
  state: RunState;
  stopFlag: boolean;
  quota: QuotaLedger | null;
}

function isLedger(value: unknown): value is QuotaLedger {
  return (
    value !== null &&
    typeof value === 'object' &&
    'globalConsumed' in value &&
    typeof value.globalConsumed === 'number' &&
    'globalBudget' in value &&
    typeof value.globalBudget === 'number' &&
    'perAgentBudget' in value &&
    typeof value.perAgentBudget === 'number'
  );
}

function readLedger(file: string): QuotaLedger | null {
  if (!fs.existsSync(file)) return null;
  const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  return isLedger(parsed) ? parsed : null;
}

export async function readStatus(runDir: string): Promise<StatusInfo> {
  const paths = new RunPaths(runDir);
  const state = await readRunSnapshot(paths.runStateFile);
  if (!state) {
    throw new Error(`No run found in ${runDir}`);
  }
  return {
    state,
    stopFlag: fs.existsSync(paths.stopFlag),
    quota: readLedger(paths.quotaFile),
  };
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

function quotaLabel(quota: QuotaLedger | null): string {
  if (!quota) return 'no ledger yet';
  const budget = quota.globalBudget === 0 ? 'unlimited' : String(quota.globalBudget);
  const perAgent = quota.perAgentBudget === 0 ? 'none' : String(quota.perAgentBudget);
  return `${quota.globalConsumed}/${budget} expensive launches, per-agent limit ${perAgent}`;
}

export function formatStatus({ state, stopFlag, quota }: StatusInfo): string {
  const lines = [
    `Run ${state.runId}`,
    `Phase:      ${phaseLabel(state.phase)}`,
    `Round:      ${state.currentRound} of ${state.maxRounds} (last completed: ${state.lastCompletedRound})`,
    `Stop flag:  ${stopFlag ? 'set' : 'not set'}`,
    `Quota:      ${quotaLabel(quota)}`,
    'Scores:',
  ];

  const rounds = [...state.rounds].sort((a, b) => a.round - b.round);
  if (rounds.length === 0) {
    lines.push('  (no completed rounds)');
  }
  for (const r of rounds) {
    const skipped = r.skippedAgents.length > 0 ? `, ${r.skippedAgents.length} skipped` : '';
    lines.push(`  round ${r.round}: ${r.score}% (${r.validAgents.length} valid, ${r.failedAgents.length} failed${skipped})`);
  }
  return lines.join('\n') + '\n';
}

export async function statusCommand(args: StatusArgs, write: Write = stdout): Promise<number> {
  const info = await readStatus(args.runDir ?? args.projectRoot);
  write(args.json ? JSON.stringify(info, null, 2) + '\n' : formatStatus(info));
  return 0;
}
