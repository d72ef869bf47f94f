// @conclave/shared - barrel export
export type {
  ResourceClass,
  ExitStatus,
  AgentTask,
  AgentResult,
  FailureKind,
  AgentOutcome,
} from './agent.types.js';
export type {
  DecisionRecord,
  ContractViolation,
  ContractViolationCode,
  ContractValidation,
} from './decision.types.js';
export type { QuotaLedger } from './quota.types.js';
export type {
  StopReason,
  RunPhase,
  AgentRoundKey,
  RoundSummary,
  RunState,
  AgentReportLine,
  RunReport,
} from './run.types.js';
export type { ConclaveConfig, TeamSeatConfig, RerunPolicy } from './config.types.js';
