import type { DecisionRecord } from './decision.types.js';

/** Which backend class an agent seat runs on. Only `expensive` is budgeted. */
export type ResourceClass = 'cheap' | 'expensive';

export type ExitStatus = 'ok' | 'timeout' | 'processError';

/** One unit of work assigned to a seat in a round. */
export interface AgentTask {
  agentId: string; // e.g. "critic-2"
  role: string;
  round: number;
  /** 0 for the first attempt, +1 for every repair. */
  attempt: number;
  resourceClass: ResourceClass;
  timeoutSeconds: number;
  /** Opaque prompt text, owned by the PromptProvider. */
  promptPayload: string;
}

export interface AgentResult {
  agentId: string;
  round: number;
  attempt: number;
  /** Class the task actually ran on (after any downgrade). */
  resourceClass: ResourceClass;
  exitStatus: ExitStatus;
  exitCode: number | null;
  /** Machine-readable note: `quota_denied`, `downgraded`, `spawn_error: …`. */
  reason: string | null;
  rawOutput: string;
  decision: DecisionRecord | null;
  durationMs: number;
  finishedAt: number;
}

export type FailureKind =
  | 'ProcessTimeout'
  | 'ProcessError'
  | 'QuotaDenied'
  | 'ContractInvalid'
  | 'PersistenceFailure'
  | 'ExternalStop';

/** Final per-agent status for one round. */
export interface AgentOutcome {
  agentId: string;
  round: number;
  status: 'valid' | 'failed';
  attempts: number;
  failure: FailureKind | null;
  decision: DecisionRecord | null;
}
