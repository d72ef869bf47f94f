import type { ConclaveConfig, ResourceClass } from '@conclave/shared';

/** One fixed position in the team. Stable for the whole run. */
export interface AgentSeat {
  agentId: string;
  role: string;
  resourceClass: ResourceClass;
  timeoutSeconds: number;
}

/**
 * Expand `team` into concrete seats, in config order: `architect-1`,
 * `engineer-1`, `engineer-2`, …
 *
 * When `quota.expensive_seats` is non-empty only the listed seats keep the
 * expensive class; everyone else is routed to cheap.
 */
export function buildTeam(config: ConclaveConfig): AgentSeat[] {
  const allowed = new Set(config.quota.expensive_seats);
  const seats: AgentSeat[] = [];

  for (const entry of config.team) {
    for (let i = 1; i <= entry.count; i++) {
      const agentId = `${entry.role}-${i}`;
      const routedCheap =
        entry.resource_class === 'expensive' && allowed.size > 0 && !allowed.has(agentId);
      seats.push({
        agentId,
        role: entry.role,
        resourceClass: routedCheap ? 'cheap' : entry.resource_class,
        timeoutSeconds: entry.timeout_seconds ?? config.agent.timeout_seconds,
      });
    }
  }

  return seats;
}
