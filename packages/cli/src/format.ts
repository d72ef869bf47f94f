import type { RunPhase, StopReason } from '@conclave/shared';

export function phaseLabel(phase: RunPhase): string {
  switch (phase.state) {
    case 'pending':
      return 'pending';
    case 'running':
    case 'evaluating':
      return `${phase.state} (round ${phase.round})`;
    case 'stopped':
      return `stopped (${phase.reason})`;
  }
}

/** `critic-2` → `CRITIC 2` */
export function seatLabel(agentId: string): string {
  return agentId.replace(/-(\d+)$/, ' $1').toUpperCase();
}

export function truncate(str: string, max: number): string {
  const single = str.replace(/\n/g, ' ').trim();
  return single.length > max ? single.slice(0, max - 1) + '…' : single;
}

export function isFailureReason(reason: StopReason): boolean {
  return reason === 'contractFailure' || reason === 'belowThreshold' || reason === 'persistenceFailure';
}
