import React from 'react';
import { Box, Text } from 'ink';
import type { RoundSummary } from '@conclave/shared';
import { THEME } from '../theme.js';

interface StatusBarProps {
  rounds: RoundSummary[];
  /** Quality gate, shown only for fail-closed runs with a positive threshold. */
  threshold: number | null;
}

export const StatusBar: React.FC<StatusBarProps> = ({ rounds, threshold }) => {
  if (rounds.length === 0 && threshold === null) return null;

  return (
    <Box borderStyle="single" borderColor={THEME.accent} paddingX={1} gap={2}>
      <Text color={THEME.textDim}>Scores:</Text>
      {rounds.length === 0 && <Text color={THEME.dim}>none yet</Text>}
      {rounds.map((r) => (
        <Text key={r.round} color={threshold !== null && r.score < threshold ? THEME.warning : THEME.success}>
          R{r.round} {r.score}%
        </Text>
      ))}
      {threshold !== null && <Text color={THEME.dim}>gate {threshold}%</Text>}
    </Box>
  );
};
