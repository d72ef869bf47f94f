import React from 'react';
import { Box, Text } from 'ink';
import type { RunReport } from '@conclave/shared';
import { THEME } from '../theme.js';
import { isFailureReason } from '../format.js';

interface RunSummaryProps {
  report: RunReport;
}

export const RunSummary: React.FC<RunSummaryProps> = ({ report }) => {
  const reasonColor =
    report.stopReason === 'complete'
      ? THEME.success
      : isFailureReason(report.stopReason)
        ? THEME.error
        : THEME.warning;

  return (
    <Box borderStyle="single" borderColor={THEME.accentDark} flexDirection="column" paddingX={1}>
      <Box gap={1}>
        <Text color={THEME.textDim}>Stopped:</Text>
        <Text bold color={reasonColor}>
          {report.stopReason}
        </Text>
        <Text color={THEME.dim}>
          after round {report.lastCompletedRound} of {report.maxRounds}
        </Text>
      </Box>

      {report.thresholdMet !== null && (
        <Text color={report.thresholdMet ? THEME.success : THEME.warning}>
          Threshold {report.threshold}%: {report.thresholdMet ? 'met' : 'not met'}
        </Text>
      )}

      {report.error && <Text color={THEME.error}>{report.error}</Text>}

      {report.agents.map((agent) => (
        <Text key={agent.agentId} color={agent.status === 'valid' ? THEME.text : THEME.textDim}>
          {agent.status === 'valid' ? '✓' : agent.status === 'failed' ? '✗' : '○'} {agent.agentId}
          {agent.lastRound !== null ? ` (round ${agent.lastRound})` : ''}
          {agent.failure ? ` ${agent.failure}` : ''}
        </Text>
      ))}

      <Text color={THEME.dim}>Report: {report.runDir}/report.md</Text>
    </Box>
  );
};
