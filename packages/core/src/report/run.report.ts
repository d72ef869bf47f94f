import type {
  AgentReportLine,
  ConclaveConfig,
  QuotaLedger,
  RunReport,
  RunState,
  StopReason,
} from '@conclave/shared';
import type { RunStore } from '../store/run.store.js';
import type { AgentSeat } from '../team/team.builder.js';

export interface BuildReportInput {
  store: RunStore;
  seats: AgentSeat[];
  config: ConclaveConfig;
  quota: QuotaLedger;
  reason: StopReason;
  error: string | null;
}

/** Final status per seat: the latest round it has an outcome for. */
function agentLines(store: RunStore, seats: AgentSeat[], state: RunState): AgentReportLine[] {
  const upto = Math.max(state.currentRound, state.lastCompletedRound);
  return seats.map((seat) => {
    for (let round = upto; round >= 1; round--) {
      const outcome = store.progressFor(seat.agentId, round)?.outcome;
      if (!outcome) continue;
      return {
        agentId: seat.agentId,
        role: seat.role,
        status: outcome.status,
        lastRound: round,
        failure: outcome.failure,
        confidence: outcome.decision?.confidence ?? null,
      };
    }
    return {
      agentId: seat.agentId,
      role: seat.role,
      status: 'not_run',
      lastRound: null,
      failure: null,
      confidence: null,
    };
  });
}

export function buildRunReport(input: BuildReportInput): RunReport {
  const { store, config, reason } = input;
  const state = store.snapshot();
  const rounds = [...state.rounds].sort((a, b) => a.round - b.round);
  const { fail_closed: failClosed, threshold } = config.contract;
  const lastScore = rounds.length > 0 ? rounds[rounds.length - 1].score : null;

  return {
    runId: state.runId,
    runDir: store.paths.runDir,
    stopReason: reason,
    lastCompletedRound: state.lastCompletedRound,
    maxRounds: state.maxRounds,
    agents: agentLines(store, input.seats, state),
    rounds,
    failClosed,
    threshold,
    thresholdMet: failClosed && threshold > 0 ? lastScore !== null && lastScore >= threshold : null,
    quota: input.quota,
    error: input.error,
    startedAt: state.startedAt,
    finishedAt: Date.now(),
  };
}

/** Process exit code for a finished run. */
export function exitCodeFor(reason: StopReason): number {
  switch (reason) {
    case 'complete':
      return 0;
    case 'killed':
      return 130;
    default:
      return 2;
  }
}

export function formatRunReport(report: RunReport): string {
  const lines = [
    `# Run ${report.runId}`,
    '',
    `- Stop reason: **${report.stopReason}**`,
    `- Rounds completed: ${report.lastCompletedRound} of ${report.maxRounds}`,
  ];
  if (report.thresholdMet !== null) {
    lines.push(`- Threshold ${report.threshold}: ${report.thresholdMet ? 'met' : 'not met'}`);
  }
  const { quota } = report;
  lines.push(
    `- Expensive calls: ${quota.globalConsumed}${quota.globalBudget > 0 ? ` of ${quota.globalBudget}` : ''}`,
  );
  if (report.error) lines.push(`- Error: ${report.error}`);

  lines.push('', '## Agents', '', '| Agent | Role | Status | Last round | Failure | Confidence |', '| --- | --- | --- | --- | --- | --- |');
  for (const a of report.agents) {
    lines.push(
      `| ${a.agentId} | ${a.role} | ${a.status} | ${a.lastRound ?? '-'} | ${a.failure ?? '-'} | ${a.confidence ?? '-'} |`,
    );
  }

  lines.push('', '## Rounds', '', '| Round | Score | Valid | Failed | Skipped |', '| --- | --- | --- | --- | --- |');
  for (const r of report.rounds) {
    lines.push(
      `| ${r.round} | ${r.score} | ${r.validAgents.length} | ${r.failedAgents.length} | ${r.skippedAgents.length} |`,
    );
  }

  return lines.join('\n') + '\n';
}
