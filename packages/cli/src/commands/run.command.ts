import fs from 'node:fs';
import path from 'node:path';
import React from 'react';
import { render } from 'ink';
import {
  RoundController,
  RunPaths,
  buildTeam,
  createLogger,
  exitCodeFor,
  formatRunReport,
  loadConfig,
  type Logger,
} from '@conclave/core';
import type { AgentOutcome, ConclaveConfig, RoundSummary, RunReport } from '@conclave/shared';
import { defaultRunDir, type RunArgs } from '../cli.args.js';
import { App } from '../components/App.js';
import { stdout, type Write } from './output.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** `--mission`, else `--mission-file`, else `.conclave/mission.md`, else empty. */
export function readMission(args: RunArgs): string {
  if (args.mission !== undefined) return args.mission;
  if (args.missionFile) return fs.readFileSync(args.missionFile, 'utf-8');
  const fallback = path.join(args.projectRoot, '.conclave', 'mission.md');
  return fs.existsSync(fallback) ? fs.readFileSync(fallback, 'utf-8') : '';
}

export function formatOutcomeLine(outcome: AgentOutcome): string {
  const mark = outcome.status === 'valid' ? '✓' : '✗';
  const detail = outcome.failure ?? outcome.decision?.summary ?? 'no decision';
  return `  ${mark} ${outcome.agentId} (${outcome.attempts} attempt${outcome.attempts === 1 ? '' : 's'}): ${detail}`;
}

export function formatRoundLine(summary: RoundSummary): string {
  const skipped = summary.skippedAgents.length > 0 ? `, ${summary.skippedAgents.length} skipped` : '';
  return `Round ${summary.round} scored ${summary.score}% (${summary.validAgents.length} valid, ${summary.failedAgents.length} failed${skipped})`;
}

function gateFor(config: ConclaveConfig): number | null {
  const { fail_closed: failClosed, threshold } = config.contract;
  return failClosed && threshold > 0 ? threshold : null;
}

/** SIGINT / SIGTERM request a cooperative stop. Returns the unsubscribe. */
function trapSignals(controller: RoundController, logger: Logger): () => void {
  const handler = (signal: NodeJS.Signals) => {
    logger.warn({ signal }, 'Stop requested by signal');
    controller.stop();
  };
  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
  return () => {
    process.off('SIGINT', handler);
    process.off('SIGTERM', handler);
  };
}

// ---------------------------------------------------------------------------
// Modes
// ---------------------------------------------------------------------------

/** Line-oriented progress for pipes and CI. */
async function runPlain(controller: RoundController, write: Write): Promise<RunReport> {
  controller.on('round:start', ({ round, agents }) => {
    write(`Round ${round}: launching ${agents.join(', ')}\n`);
  });
  controller.on('agent:outcome', (outcome) => write(formatOutcomeLine(outcome) + '\n'));
  controller.on('round:evaluated', (summary) => write(formatRoundLine(summary) + '\n'));

  const report = await controller.run();
  write('\n' + formatRunReport(report));
  return report;
}

async function runWithView(controller: RoundController, config: ConclaveConfig, runDir: string): Promise<RunReport> {
  const settled: { report?: RunReport; error?: unknown } = {};

  const { waitUntilExit } = render(
    React.createElement(App, {
      controller,
      runDir,
      agentIds: buildTeam(config).map((seat) => seat.agentId),
      maxRounds: config.rounds.max_rounds,
      threshold: gateFor(config),
      onFinished: (report: RunReport) => {
        settled.report = report;
      },
      onFailed: (err: unknown) => {
        settled.error = err;
      },
    }),
    { exitOnCtrlC: false },
  );

  await waitUntilExit();

  if (settled.error !== undefined) throw settled.error;
  if (!settled.report) throw new Error('Run view closed before the run finished');
  return settled.report;
}

// ---------------------------------------------------------------------------
// Command
// ---------------------------------------------------------------------------

/** Start or resume a run. Resolves with the process exit code. */
export async function runCommand(args: RunArgs, write: Write = stdout): Promise<number> {
  const runDir = args.runDir ?? defaultRunDir(args.projectRoot);
  const paths = new RunPaths(runDir);

  const config = await loadConfig({ projectRoot: args.projectRoot, configPath: args.configPath });
  const logger = createLogger({ level: config.logs.level, destination: paths.logFile });
  logger.info({ runDir, resume: args.resume, projectRoot: args.projectRoot }, 'Starting conclave run');

  const controller = new RoundController({
    config,
    projectRoot: args.projectRoot,
    runDir,
    resume: args.resume,
    runId: path.basename(runDir),
    mission: readMission(args),
    logger,
  });

  const release = trapSignals(controller, logger);
  try {
    const report = args.ui ? await runWithView(controller, config, runDir) : await runPlain(controller, write);
    return exitCodeFor(report.stopReason);
  } finally {
    release();
    logger.flush();
  }
}
