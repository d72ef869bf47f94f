import type { AgentSeat } from '../team/team.builder.js';

/** Scorecard weight for a seat: agentId first, then role, then 1. */
export function weightFor(seat: AgentSeat, weights: Record<string, number>): number {
  return weights[seat.agentId] ?? weights[seat.role] ?? 1;
}

/**
 * Weighted share (0–100, two decimals) of the team holding a valid record.
 * A team whose weights sum to zero scores 0.
 */
export function scoreRound(
  seats: AgentSeat[],
  validAgents: ReadonlySet<string>,
  weights: Record<string, number>,
): number {
  let total = 0;
  let valid = 0;
  for (const seat of seats) {
    const w = weightFor(seat, weights);
    total += w;
    if (validAgents.has(seat.agentId)) valid += w;
  }
  if (total <= 0) return 0;
  return Math.round((valid / total) * 10_000) / 100;
}
