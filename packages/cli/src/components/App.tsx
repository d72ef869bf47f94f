import React, { useEffect, useState } from 'react';
import { Box, Text, useApp, useInput } from 'ink';
import type { AgentOutcome, AgentResult, AgentTask, RoundSummary, RunPhase, RunReport } from '@conclave/shared';
import type { RoundController, RoundStart, TaskLaunch } from '@conclave/core';
import { useRunView } from '../store/run.view.js';
import { THEME } from '../theme.js';
import { Header } from './Header.js';
import { AgentGrid } from './AgentGrid.js';
import { StatusBar } from './StatusBar.js';
import { RunSummary } from './RunSummary.js';

interface AppProps {
  controller: RoundController;
  runDir: string;
  agentIds: string[];
  maxRounds: number;
  /** Fail-closed threshold, null when the gate is off. */
  threshold: number | null;
  onFinished: (report: RunReport) => void;
  onFailed: (err: unknown) => void;
}

// ---------------------------------------------------------------------------
// App
// ---------------------------------------------------------------------------

export const App: React.FC<AppProps> = ({
  controller,
  runDir,
  agentIds,
  maxRounds,
  threshold,
  onFinished,
  onFailed,
}) => {
  const { exit } = useApp();
  const [state, dispatch] = useRunView(agentIds, maxRounds);
  const [spinnerFrame, setSpinnerFrame] = useState(0);

  // ── Controller event wiring ────────────────────────────────────────────────
  useEffect(() => {
    const onPhase = (phase: RunPhase) => dispatch({ type: 'PHASE', phase });
    const onRoundStart = (start: RoundStart) => dispatch({ type: 'ROUND_START', start });
    const onLaunch = (launch: TaskLaunch) => dispatch({ type: 'TASK_LAUNCH', launch });
    const onResult = (result: AgentResult) => dispatch({ type: 'TASK_RESULT', result });
    const onSkipped = (task: AgentTask) => dispatch({ type: 'TASK_SKIPPED', task });
    const onOutcome = (outcome: AgentOutcome) => dispatch({ type: 'AGENT_OUTCOME', outcome });
    const onEvaluated = (summary: RoundSummary) => dispatch({ type: 'ROUND_EVALUATED', summary });
    const onStopped = (report: RunReport) => dispatch({ type: 'RUN_STOPPED', report });

    controller.on('run:phase', onPhase);
    controller.on('round:start', onRoundStart);
    controller.on('task:launch', onLaunch);
    controller.on('task:result', onResult);
    controller.on('task:skipped', onSkipped);
    controller.on('agent:outcome', onOutcome);
    controller.on('round:evaluated', onEvaluated);
    controller.on('run:stopped', onStopped);

    controller.run().then(onFinished, (err: unknown) => {
      onFailed(err);
      exit();
    });

    return () => {
      controller.off('run:phase', onPhase);
      controller.off('round:start', onRoundStart);
      controller.off('task:launch', onLaunch);
      controller.off('task:result', onResult);
      controller.off('task:skipped', onSkipped);
      controller.off('agent:outcome', onOutcome);
      controller.off('round:evaluated', onEvaluated);
      controller.off('run:stopped', onStopped);
    };
  }, [controller]); // eslint-disable-line react-hooks/exhaustive-deps

  // ── Spinner ────────────────────────────────────────────────────────────────
  const stopped = state.report !== null;
  useEffect(() => {
    if (stopped) return;
    const timer = setInterval(() => setSpinnerFrame((f) => f + 1), 120);
    return () => clearInterval(timer);
  }, [stopped]);

  // Leave the final frame on screen once the report is in.
  useEffect(() => {
    if (stopped) exit();
  }, [stopped, exit]);

  // ── Keyboard: Ctrl+C ───────────────────────────────────────────────────────
  useInput((input, key) => {
    if (key.ctrl && input === 'c' && !stopped) {
      controller.stop();
      dispatch({ type: 'ADD_MESSAGE', message: 'Stop requested. Waiting for running agents to finish...' });
    }
  });

  return (
    <Box flexDirection="column">
      <Header
        runDir={runDir}
        phase={state.phase}
        round={state.round}
        maxRounds={state.maxRounds}
        spinnerFrame={spinnerFrame}
      />
      <AgentGrid order={state.order} agents={state.agents} />
      <StatusBar rounds={state.rounds} threshold={threshold} />
      {state.messages.length > 0 && (
        <Box flexDirection="column" paddingX={1}>
          {state.messages.map((msg, i) => (
            <Text key={i} color={THEME.textDim}>
              {msg}
            </Text>
          ))}
        </Box>
      )}
      {state.report && <RunSummary report={state.report} />}
    </Box>
  );
};
