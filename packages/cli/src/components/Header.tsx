import React from 'react';
import { Box, Text } from 'ink';
import type { RunPhase } from '@conclave/shared';
import { THEME } from '../theme.js';
import { isFailureReason, phaseLabel } from '../format.js';

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

interface HeaderProps {
  runDir: string;
  phase: RunPhase;
  round: number;
  maxRounds: number;
  spinnerFrame: number;
}

export const Header: React.FC<HeaderProps> = ({ runDir, phase, round, maxRounds, spinnerFrame }) => {
  const busy = phase.state === 'running' || phase.state === 'evaluating';

  return (
    <Box borderStyle="single" borderColor={THEME.accent} paddingX={1} justifyContent="space-between">
      <Box gap={1}>
        {busy && <Text color={THEME.primary}>{SPINNER_FRAMES[spinnerFrame % SPINNER_FRAMES.length]}</Text>}
        <Text bold color={THEME.primary}>
          ◆ CONCLAVE
        </Text>
      </Box>
      <Box gap={2}>
        <Text color={phaseColor(phase)}>{phaseLabel(phase)}</Text>
        <Text color={THEME.accent}>
          round {round}/{maxRounds}
        </Text>
        <Text color={THEME.dim}>{runDir}</Text>
      </Box>
    </Box>
  );
};

function phaseColor(phase: RunPhase): string {
  switch (phase.state) {
    case 'running':
    case 'evaluating':
      return THEME.primary;
    case 'stopped':
      if (phase.reason === 'complete') return THEME.success;
      return isFailureReason(phase.reason) ? THEME.error : THEME.warning;
    default:
      return THEME.dim;
  }
}
