import type { ConclaveConfig } from '@conclave/shared';

export const DEFAULT_CONFIG: ConclaveConfig = {
  agent: {
    command: 'node',
    args: ['agent.js', '{promptFile}'],
    cwd: null,
    timeout_seconds: 900,
  },
  team: [
    { role: 'architect', count: 1, resource_class: 'expensive' },
    { role: 'engineer', count: 2, resource_class: 'cheap' },
  ],
  concurrency: {
    max_parallel: 3,
    console_group_size: 0,
  },
  quota: {
    global_budget: 0,
    per_agent_budget: 0,
    downgrade_on_deny: false,
    expensive_seats: [],
  },
  rounds: {
    max_rounds: 2,
    rerun: 'full',
  },
  contract: {
    require_decision_json: true,
    repair_attempts: 1,
    fail_closed: false,
    threshold: 0,
    strict_paths: false,
    min_commands_from_round: 0,
    prior_tail_chars: 6_000,
  },
  scoring: {
    weights: {},
  },
  logs: {
    level: 'info',
  },
};
