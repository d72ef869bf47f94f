import { describe, it, expect } from 'vitest';
import type { AgentSeat } from '../team/team.builder.js';
import { scoreRound, weightFor } from './round.scorer.js';

function seat(agentId: string, role: string): AgentSeat {
  return { agentId, role, resourceClass: 'cheap', timeoutSeconds: 60 };
}

const TEAM = [seat('architect-1', 'architect'), seat('engineer-1', 'engineer'), seat('engineer-2', 'engineer')];

describe('weightFor', () => {
  it('prefers agent id over role and defaults to 1', () => {
    const weights = { engineer: 2, 'engineer-2': 5 };
    expect(weightFor(TEAM[0], weights)).toBe(1);
    expect(weightFor(TEAM[1], weights)).toBe(2);
    expect(weightFor(TEAM[2], weights)).toBe(5);
  });
});

describe('scoreRound', () => {
  it('is 100 when every seat is valid', () => {
    expect(scoreRound(TEAM, new Set(['architect-1', 'engineer-1', 'engineer-2']), {})).toBe(100);
  });

  it('rounds the unweighted share to two decimals', () => {
    expect(scoreRound(TEAM, new Set(['architect-1', 'engineer-1']), {})).toBe(66.67);
  });

  it('weights seats by the scorecard', () => {
    const weights = { architect: 69, engineer: 15.5 };
    expect(scoreRound(TEAM, new Set(['architect-1']), weights)).toBe(69);
  });

  it('scores 0 when all weights are zero', () => {
    expect(scoreRound(TEAM, new Set(['architect-1']), { architect: 0, engineer: 0 })).toBe(0);
  });
});
