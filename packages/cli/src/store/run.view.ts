import { useReducer, type Dispatch } from 'react';
import type { AgentResult, ResourceClass, RoundSummary, RunPhase, RunReport } from '@conclave/shared';
import type { RunAction } from './run.actions.js';

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

export type AgentViewStatus =
  | 'waiting' // Not launched yet this round
  | 'running' // First attempt in flight
  | 'repairing' // Repair attempt in flight
  | 'judging' // Exited, verdict pending
  | 'valid'
  | 'failed'
  | 'skipped'; // Not launched because a stop was requested

export interface AgentView {
  agentId: string;
  status: AgentViewStatus;
  round: number | null;
  attempt: number;
  resourceClass: ResourceClass | null;
  /** Console group of the current launch, when grouping is on. */
  group: number | null;
  /** Short detail: exit status, failure kind or decision summary. */
  note: string | null;
  confidence: number | null;
}

export interface RunViewState {
  phase: RunPhase;
  round: number;
  maxRounds: number;
  /** Seat order as configured. */
  order: string[];
  agents: Record<string, AgentView>;
  rounds: RoundSummary[];
  messages: string[];
  report: RunReport | null;
}

const MAX_MESSAGES = 10;

function blankAgent(agentId: string): AgentView {
  return {
    agentId,
    status: 'waiting',
    round: null,
    attempt: 0,
    resourceClass: null,
    group: null,
    note: null,
    confidence: null,
  };
}

export function initialRunView(agentIds: string[], maxRounds: number): RunViewState {
  return {
    phase: { state: 'pending' },
    round: 0,
    maxRounds,
    order: [...agentIds],
    agents: Object.fromEntries(agentIds.map((id) => [id, blankAgent(id)])),
    rounds: [],
    messages: [],
    report: null,
  };
}

/** One-line description of a finished attempt. */
export function describeResult(result: AgentResult): string | null {
  if (result.reason === 'quota_denied') return 'quota denied';
  switch (result.exitStatus) {
    case 'timeout':
      return 'timed out';
    case 'processError':
      return result.reason ?? `exit ${result.exitCode ?? '?'}`;
    default:
      return result.reason === 'downgraded' ? 'downgraded to cheap' : null;
  }
}

// ---------------------------------------------------------------------------
// Reducer
// ---------------------------------------------------------------------------

function patchAgent(state: RunViewState, agentId: string, patch: Partial<AgentView>): RunViewState {
  const current = state.agents[agentId] ?? blankAgent(agentId);
  return {
    ...state,
    order: state.order.includes(agentId) ? state.order : [...state.order, agentId],
    agents: { ...state.agents, [agentId]: { ...current, ...patch } },
  };
}

function addMessage(state: RunViewState, message: string): RunViewState {
  return { ...state, messages: [...state.messages.slice(-(MAX_MESSAGES - 1)), message] };
}

export function runViewReducer(state: RunViewState, action: RunAction): RunViewState {
  switch (action.type) {
    case 'PHASE':
      return { ...state, phase: action.phase };

    case 'ROUND_START': {
      const { round, agents } = action.start;
      let next: RunViewState = { ...state, round };
      for (const agentId of agents) {
        next = patchAgent(next, agentId, { ...blankAgent(agentId), round });
      }
      return addMessage(next, `Round ${round}: ${agents.length} agent(s) scheduled`);
    }

    case 'TASK_LAUNCH': {
      const { task, resourceClass, group } = action.launch;
      return patchAgent(state, task.agentId, {
        status: task.attempt > 0 ? 'repairing' : 'running',
        round: task.round,
        attempt: task.attempt,
        resourceClass,
        group,
        note: resourceClass !== task.resourceClass ? 'downgraded to cheap' : null,
      });
    }

    case 'TASK_RESULT': {
      const { result } = action;
      return patchAgent(state, result.agentId, {
        status: 'judging',
        round: result.round,
        attempt: result.attempt,
        resourceClass: result.resourceClass,
        note: describeResult(result),
      });
    }

    case 'TASK_SKIPPED':
      return patchAgent(state, action.task.agentId, { status: 'skipped', note: 'stop requested' });

    case 'AGENT_OUTCOME': {
      const { outcome } = action;
      return patchAgent(state, outcome.agentId, {
        status: outcome.status,
        round: outcome.round,
        note: outcome.failure ?? outcome.decision?.summary ?? null,
        confidence: outcome.decision?.confidence ?? null,
      });
    }

    case 'ROUND_EVALUATED': {
      const { summary } = action;
      const next = { ...state, rounds: [...state.rounds.filter((r) => r.round !== summary.round), summary] };
      return addMessage(next, `Round ${summary.round} scored ${summary.score}%`);
    }

    case 'RUN_STOPPED':
      return addMessage(
        { ...state, report: action.report, phase: { state: 'stopped', reason: action.report.stopReason } },
        `Run stopped: ${action.report.stopReason}`,
      );

    case 'ADD_MESSAGE':
      return addMessage(state, action.message);

    default:
      return state;
  }
}

// ---------------------------------------------------------------------------
// Hook
// ---------------------------------------------------------------------------

export function useRunView(agentIds: string[], maxRounds: number): [RunViewState, Dispatch<RunAction>] {
  return useReducer(runViewReducer, agentIds, (ids) => initialRunView(ids, maxRounds));
}
