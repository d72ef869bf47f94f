import React from 'react';
import { Box, useStdout } from 'ink';
import type { AgentView } from '../store/run.view.js';
import { AgentPanel } from './AgentPanel.js';

interface AgentGridProps {
  order: string[];
  agents: Record<string, AgentView>;
}

export const AgentGrid: React.FC<AgentGridProps> = ({ order, agents }) => {
  const { stdout } = useStdout();
  const columns = stdout?.columns ?? 80;

  const views = order.flatMap((id) => {
    const view = agents[id];
    return view ? [view] : [];
  });
  if (views.length === 0) return null;

  // Single-column layout for narrow terminals
  if (columns < 80) {
    return (
      <Box flexDirection="column">
        {views.map((view) => (
          <AgentPanel key={view.agentId} view={view} />
        ))}
      </Box>
    );
  }

  const rows: AgentView[][] = [];
  for (let i = 0; i < views.length; i += 2) {
    rows.push(views.slice(i, i + 2));
  }

  return (
    <Box flexDirection="column">
      {rows.map((row) => (
        <Box key={row[0].agentId} flexDirection="row">
          {row.map((view) => (
            <Box key={view.agentId} flexGrow={1} flexBasis={0}>
              <AgentPanel view={view} />
            </Box>
          ))}
        </Box>
      ))}
    </Box>
  );
};
