// @conclave/core - entry point
export * from './config/config.defaults.js';
export * from './config/config.loader.js';
export * from './errors/conclave.errors.js';
export { createLogger, silentLogger } from './logging/logger.js';
export type { Logger, LoggerOptions } from './logging/logger.js';
// Contract
export {
  DECISION_TAG,
  validateContract,
  formatDecisionBlock,
  describeViolations,
  isUnsafePath,
} from './contract/contract.validator.js';
export type { ContractOptions } from './contract/contract.validator.js';
// Scheduling
export { QuotaTracker } from './quota/quota.tracker.js';
export type { QuotaBudgets } from './quota/quota.tracker.js';
export { ChildProcessLauncher, killProcessTree } from './process/process.launcher.js';
export type { LaunchSpec, LaunchResult, ProcessLauncher } from './process/process.launcher.js';
export { SlotScheduler, expandArgs } from './scheduler/slot.scheduler.js';
export type { SlotSchedulerOptions, TaskLaunch } from './scheduler/slot.scheduler.js';
export { StopSignal, GLOBAL_STOP_FILE, writeStopFlag, clearStopFlag } from './signal/stop.signal.js';
export { buildTeam } from './team/team.builder.js';
export type { AgentSeat } from './team/team.builder.js';
export { scoreRound, weightFor } from './scoring/round.scorer.js';
// Prompts
export {
  TemplatePromptProvider,
  buildRepairPrompt,
  contractInstructions,
} from './prompts/prompt.provider.js';
export type { PromptProvider, PromptContext, PeerDecision } from './prompts/prompt.provider.js';
// Rounds
export { RoundController, isResumable } from './rounds/round.controller.js';
export type { RoundControllerOptions, RoundStart } from './rounds/round.controller.js';
export { RepairLoop, judgeResult, failureFor } from './rounds/repair.loop.js';
export type { RepairCandidate, RepairOutcome, JudgeOptions } from './rounds/repair.loop.js';
// Persistence
export { RunStore, readRunSnapshot } from './store/run.store.js';
export type { Verdict, LogEntry, AgentProgress, OpenRunOptions } from './store/run.store.js';
export { RunPaths } from './store/run.paths.js';
export { buildRunReport, formatRunReport, exitCodeFor } from './report/run.report.js';
