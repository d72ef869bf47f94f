import type { AgentOutcome, AgentResult, AgentTask, RoundSummary, RunPhase, RunReport } from '@conclave/shared';
import type { RoundStart, TaskLaunch } from '@conclave/core';

// ---------------------------------------------------------------------------
// Action Types
// ---------------------------------------------------------------------------

export type RunAction =
  | { type: 'PHASE'; phase: RunPhase }
  | { type: 'ROUND_START'; start: RoundStart }
  | { type: 'TASK_LAUNCH'; launch: TaskLaunch }
  | { type: 'TASK_RESULT'; result: AgentResult }
  | { type: 'TASK_SKIPPED'; task: AgentTask }
  | { type: 'AGENT_OUTCOME'; outcome: AgentOutcome }
  | { type: 'ROUND_EVALUATED'; summary: RoundSummary }
  | { type: 'RUN_STOPPED'; report: RunReport }
  | { type: 'ADD_MESSAGE'; message: string };
