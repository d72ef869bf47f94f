import type { AgentOutcome } from './agent.types.js';
import type { DecisionRecord } from './decision.types.js';
import type { QuotaLedger } from './quota.types.js';

export type StopReason =
  | 'killed'
  | 'contractFailure'
  | 'complete'
  | 'belowThreshold'
  | 'persistenceFailure';

export type RunPhase =
  | { state: 'pending' }
  | { state: 'running'; round: number }
  | { state: 'evaluating'; round: number }
  | { state: 'stopped'; reason: StopReason };

/** (agentId, round) pair, the unit of completion. */
export interface AgentRoundKey {
  agentId: string;
  round: number;
}

export interface RoundSummary {
  round: number;
  /** 0..100, share of the team (scorecard-weighted) holding a valid decision. */
  score: number;
  validAgents: string[];
  failedAgents: string[];
  /** Agents that were not launched because a stop was requested. */
  skippedAgents: string[];
  completedAt: number;
}

/** Durable snapshot written to state/run.json. */
export interface RunState {
  runId: string;
  currentRound: number;
  maxRounds: number;
  lastCompletedRound: number;
  completedAgents: AgentRoundKey[];
  failedAgents: AgentRoundKey[];
  stopRequested: boolean;
  /** Keyed by `${agentId}@${round}`. */
  decisions: Record<string, DecisionRecord>;
  rounds: RoundSummary[];
  phase: RunPhase;
  stopReason: StopReason | null;
  startedAt: number;
  updatedAt: number;
}

export interface AgentReportLine {
  agentId: string;
  role: string;
  status: 'valid' | 'failed' | 'not_run';
  lastRound: number | null;
  failure: AgentOutcome['failure'];
  confidence: number | null;
}

/** Terminal report written to report.json and rendered by the CLI. */
export interface RunReport {
  runId: string;
  runDir: string;
  stopReason: StopReason;
  lastCompletedRound: number;
  maxRounds: number;
  agents: AgentReportLine[];
  rounds: RoundSummary[];
  failClosed: boolean;
  threshold: number;
  /** Null unless the run is fail-closed with a positive threshold. */
  thresholdMet: boolean | null;
  quota: QuotaLedger;
  error: string | null;
  startedAt: number;
  finishedAt: number;
}
