import { describe, it, expect } from 'vitest';
import type { ConclaveConfig } from '@conclave/shared';
import { DEFAULT_CONFIG } from '../config/config.defaults.js';
import { buildTeam } from './team.builder.js';

function config(overrides: Partial<ConclaveConfig> = {}): ConclaveConfig {
  return structuredClone({ ...DEFAULT_CONFIG, ...overrides });
}

describe('buildTeam', () => {
  it('expands seats in config order with 1-based indices', () => {
    const seats = buildTeam(config());
    expect(seats).toEqual([
      { agentId: 'architect-1', role: 'architect', resourceClass: 'expensive', timeoutSeconds: 900 },
      { agentId: 'engineer-1', role: 'engineer', resourceClass: 'cheap', timeoutSeconds: 900 },
      { agentId: 'engineer-2', role: 'engineer', resourceClass: 'cheap', timeoutSeconds: 900 },
    ]);
  });

  it('applies per-role timeouts', () => {
    const seats = buildTeam(
      config({
        team: [
          { role: 'critic', count: 1, resource_class: 'cheap', timeout_seconds: 60 },
          { role: 'builder', count: 1, resource_class: 'cheap' },
        ],
      }),
    );
    expect(seats.map((s) => s.timeoutSeconds)).toEqual([60, 900]);
  });

  it('routes expensive seats not listed in expensive_seats to cheap', () => {
    const base = config({
      team: [{ role: 'architect', count: 3, resource_class: 'expensive' }],
    });
    base.quota.expensive_seats = ['architect-2'];

    const seats = buildTeam(base);
    expect(seats.map((s) => s.resourceClass)).toEqual(['cheap', 'expensive', 'cheap']);
  });

  it('never promotes a cheap seat listed in expensive_seats', () => {
    const base = config();
    base.quota.expensive_seats = ['engineer-1'];

    const seats = buildTeam(base);
    expect(seats.find((s) => s.agentId === 'engineer-1')?.resourceClass).toBe('cheap');
    expect(seats.find((s) => s.agentId === 'architect-1')?.resourceClass).toBe('cheap');
  });
});
