import type { ResourceClass } from './agent.types.js';

export interface TeamSeatConfig {
  role: string;
  count: number;
  resource_class: ResourceClass;
  /** Overrides agent.timeout_seconds for this role. */
  timeout_seconds?: number;
}

export type RerunPolicy = 'full' | 'invalid_only';

export interface ConclaveConfig {
  agent: {
    command: string;
    args: string[];
    cwd: string | null;
    timeout_seconds: number;
  };
  team: TeamSeatConfig[];
  concurrency: {
    max_parallel: number;
    /** 0 or 1 disables grouping. */
    console_group_size: number;
  };
  quota: {
    global_budget: number;
    per_agent_budget: number;
    downgrade_on_deny: boolean;
    /** Seats allowed to use the expensive class. Empty = every seat. */
    expensive_seats: string[];
  };
  rounds: {
    max_rounds: number;
    rerun: RerunPolicy;
  };
  contract: {
    require_decision_json: boolean;
    repair_attempts: number;
    fail_closed: boolean;
    /** 0..100, 0 disables the quality gate. */
    threshold: number;
    strict_paths: boolean;
    /** 0 disables; otherwise commands are required from this round on. */
    min_commands_from_round: number;
    prior_tail_chars: number;
  };
  scoring: {
    /** agentId or role → weight. Unlisted seats weigh 1. */
    weights: Record<string, number>;
  };
  logs: {
    level: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
  };
}
