import React from 'react';
import { Box, Text } from 'ink';
import type { AgentView, AgentViewStatus } from '../store/run.view.js';
import { THEME } from '../theme.js';
import { seatLabel, truncate } from '../format.js';

export interface AgentPanelProps {
  view: AgentView;
}

const DOTS: Record<AgentViewStatus, string> = {
  waiting: '○',
  running: '●',
  repairing: '●',
  judging: '◐',
  valid: '✓',
  failed: '✗',
  skipped: '–',
};

function statusColor(status: AgentViewStatus): string {
  switch (status) {
    case 'running':
      return THEME.accent;
    case 'repairing':
      return THEME.warning;
    case 'judging':
      return THEME.primary;
    case 'valid':
      return THEME.success;
    case 'failed':
      return THEME.error;
    default:
      return THEME.dim;
  }
}

export const AgentPanel: React.FC<AgentPanelProps> = ({ view }) => {
  const { status } = view;
  const isActive = status === 'running' || status === 'repairing' || status === 'judging';
  const borderColor = isActive ? THEME.accent : status === 'valid' ? THEME.success : THEME.dimBorder;

  const details = [
    view.resourceClass,
    view.attempt > 0 ? `attempt ${view.attempt}` : null,
    view.group !== null ? `group ${view.group}` : null,
    view.confidence !== null ? `conf ${view.confidence}` : null,
  ].filter((d): d is string => d !== null);

  return (
    <Box borderStyle="single" borderColor={borderColor} flexDirection="column" paddingX={1}>
      <Box justifyContent="space-between">
        <Text bold color={isActive ? THEME.accent : THEME.textDim}>
          {seatLabel(view.agentId)}
        </Text>
        <Text color={statusColor(status)}>
          {DOTS[status]} {status}
        </Text>
      </Box>

      {details.length > 0 && <Text color={THEME.textDim}>{details.join(' · ')}</Text>}

      {view.note ? (
        <Text color={status === 'failed' ? THEME.error : THEME.textDim} dimColor>
          {truncate(view.note, 50)}
        </Text>
      ) : (
        status === 'waiting' && (
          <Text color={THEME.dim} dimColor>
            waiting...
          </Text>
        )
      )}
    </Box>
  );
};
