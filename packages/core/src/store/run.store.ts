import * as crypto from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type {
  AgentOutcome,
  AgentResult,
  AgentRoundKey,
  ContractViolation,
  DecisionRecord,
  QuotaLedger,
  RoundSummary,
  RunPhase,
  RunReport,
  RunState,
  StopReason,
} from '@conclave/shared';
import { ConfigError, PersistenceError } from '../errors/conclave.errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { RunPaths } from './run.paths.js';

// ---------------------------------------------------------------------------
// Log entries
// ---------------------------------------------------------------------------

/** Validation outcome of one attempt, recorded after the raw result. */
export interface Verdict {
  agentId: string;
  round: number;
  attempt: number;
  valid: boolean;
  violations: ContractViolation[];
}

/**
 * One line of state/results.jsonl. Entries are immutable and appended once;
 * the in-memory RunState is a fold over them.
 */
export type LogEntry =
  | { kind: 'result'; result: AgentResult }
  | { kind: 'verdict'; verdict: Verdict }
  | { kind: 'outcome'; outcome: AgentOutcome };

/** Everything recorded for one (agentId, round) pair. */
export interface AgentProgress {
  agentId: string;
  round: number;
  /** Ordered by attempt. */
  results: AgentResult[];
  lastVerdict: Verdict | null;
  outcome: AgentOutcome | null;
}

export interface OpenRunOptions {
  runDir: string;
  maxRounds: number;
  /** Continue an existing run instead of refusing to touch it. */
  resume?: boolean;
  runId?: string;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function roundKey(agentId: string, round: number): string {
  return `${agentId}@${round}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function hasAgentRound(value: unknown): boolean {
  return isRecord(value) && typeof value.agentId === 'string' && typeof value.round === 'number';
}

function isLogEntry(value: unknown): value is LogEntry {
  if (!isRecord(value)) return false;
  switch (value.kind) {
    case 'result':
      return hasAgentRound(value.result);
    case 'verdict':
      return hasAgentRound(value.verdict);
    case 'outcome':
      return hasAgentRound(value.outcome);
    default:
      return false;
  }
}

function isRunSnapshot(value: unknown): value is RunState {
  return (
    isRecord(value) &&
    typeof value.runId === 'string' &&
    typeof value.lastCompletedRound === 'number' &&
    Array.isArray(value.rounds)
  );
}

/** Read a run.json snapshot without opening the run. Null when there is none. */
export async function readRunSnapshot(file: string): Promise<RunState | null> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return null;
    throw new ConfigError(`Cannot read run state ${file}: ${String(err)}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError(`Run state ${file} is not valid JSON`);
  }
  if (!isRunSnapshot(parsed)) {
    throw new ConfigError(`Run state ${file} does not look like a conclave run`);
  }
  return parsed;
}

interface LogContents {
  entries: LogEntry[];
  /** Byte length of the complete lines when the file ends in a torn line, else null. */
  tornAt: number | null;
}

async function readLog(file: string, logger: Logger): Promise<LogContents> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(file);
  } catch (err) {
    if (isNotFound(err)) return { entries: [], tornAt: null };
    throw new ConfigError(`Cannot read result log ${file}: ${String(err)}`);
  }

  const entries: LogEntry[] = [];
  bytes.toString('utf-8').split('\n').forEach((line, i) => {
    if (!line.trim()) return;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      // A crash mid-append leaves a truncated last line.
      logger.warn({ file, line: i + 1 }, 'Skipping unreadable log line');
      return;
    }
    if (isLogEntry(parsed)) entries.push(parsed);
    else logger.warn({ file, line: i + 1 }, 'Skipping unknown log entry');
  });

  const torn = bytes.length > 0 && bytes[bytes.length - 1] !== 0x0a;
  return { entries, tornAt: torn ? bytes.lastIndexOf(0x0a) + 1 : null };
}

/** Cut a torn last line so the next append starts on a line of its own. */
async function truncateLog(file: string, length: number): Promise<void> {
  try {
    await fs.truncate(file, length);
  } catch (err) {
    throw new PersistenceError(file, err);
  }
}

async function writeFileAtomic(file: string, content: string): Promise<void> {
  const tmp = `${file}.${process.pid}.tmp`;
  try {
    await fs.mkdir(path.dirname(file), { recursive: true });
    const handle = await fs.open(tmp, 'w');
    try {
      await handle.writeFile(content, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tmp, file);
  } catch (err) {
    throw new PersistenceError(file, err);
  }
}

async function appendLine(file: string, entry: LogEntry): Promise<void> {
  try {
    const handle = await fs.open(file, 'a');
    try {
      await handle.appendFile(JSON.stringify(entry) + '\n', 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
  } catch (err) {
    throw new PersistenceError(file, err);
  }
}

// ---------------------------------------------------------------------------
// RunStore
// ---------------------------------------------------------------------------

/**
 * Durable, crash-recoverable run state.
 *
 * Every AgentResult is appended (and fsynced) the moment it exists; the
 * RunState snapshot in state/run.json is rewritten atomically at phase and
 * round boundaries. On resume the snapshot supplies round bookkeeping and the
 * log supplies per-agent completion, so replay is idempotent.
 */
export class RunStore {
  readonly paths: RunPaths;
  private readonly state: RunState;
  private readonly progress = new Map<string, AgentProgress>();
  private readonly logger: Logger;

  private constructor(paths: RunPaths, state: RunState, logger: Logger) {
    this.paths = paths;
    this.state = state;
    this.logger = logger;
  }

  static async open(options: OpenRunOptions): Promise<RunStore> {
    const paths = new RunPaths(path.resolve(options.runDir));
    const logger = (options.logger ?? silentLogger()).child({ component: 'store' });

    const snapshot = await readRunSnapshot(paths.runStateFile);
    const { entries, tornAt } = await readLog(paths.resultLog, logger);

    if ((snapshot !== null || entries.length > 0) && !options.resume) {
      throw new ConfigError(
        `Run directory ${paths.runDir} already holds a run; resume it or pick a new directory`,
      );
    }

    const now = Date.now();
    const lastCompletedRound = snapshot?.lastCompletedRound ?? 0;
    const state: RunState = {
      runId: snapshot?.runId ?? options.runId ?? crypto.randomUUID(),
      currentRound: Math.min(lastCompletedRound, options.maxRounds),
      maxRounds: options.maxRounds,
      lastCompletedRound,
      completedAgents: [],
      failedAgents: [],
      stopRequested: false,
      decisions: {},
      rounds: snapshot?.rounds ?? [],
      phase: { state: 'pending' },
      stopReason: snapshot?.stopReason ?? null,
      startedAt: snapshot?.startedAt ?? now,
      updatedAt: now,
    };

    const store = new RunStore(paths, state, logger);
    for (const entry of entries) store.apply(entry);

    if (snapshot) {
      logger.info(
        {
          runId: state.runId,
          lastCompletedRound,
          completed: state.completedAgents.length,
          logEntries: entries.length,
        },
        'Resuming run',
      );
    }

    if (tornAt !== null) {
      logger.warn({ file: paths.resultLog, length: tornAt }, 'Truncating torn last log line');
      await truncateLog(paths.resultLog, tornAt);
    }

    try {
      await fs.mkdir(paths.decisionsDir, { recursive: true });
    } catch (err) {
      throw new PersistenceError(paths.decisionsDir, err);
    }
    await store.saveSnapshot();
    return store;
  }

  // ── Reads ──────────────────────────────────────────────────────────────────

  get runId(): string {
    return this.state.runId;
  }

  /** Immutable copy of the current RunState. */
  snapshot(): RunState {
    return structuredClone(this.state);
  }

  progressFor(agentId: string, round: number): AgentProgress | undefined {
    return this.progress.get(roundKey(agentId, round));
  }

  isCompleted(agentId: string, round: number): boolean {
    return this.progressFor(agentId, round)?.outcome != null;
  }

  outcomesFor(round: number): AgentOutcome[] {
    const outcomes: AgentOutcome[] = [];
    for (const p of this.progress.values()) {
      if (p.round === round && p.outcome) outcomes.push(p.outcome);
    }
    return outcomes;
  }

  allResults(): AgentResult[] {
    return [...this.progress.values()].flatMap((p) => p.results);
  }

  /** Most recent valid decision an agent produced at or before `round`. */
  latestDecision(agentId: string, round: number): { round: number; decision: DecisionRecord } | null {
    for (let r = round; r >= 1; r--) {
      const decision = this.state.decisions[roundKey(agentId, r)];
      if (decision) return { round: r, decision };
    }
    return null;
  }

  decisionsFor(round: number): Array<{ agentId: string; decision: DecisionRecord }> {
    return this.state.completedAgents
      .filter((k) => k.round === round)
      .flatMap((k) => {
        const decision = this.state.decisions[roundKey(k.agentId, k.round)];
        return decision ? [{ agentId: k.agentId, decision }] : [];
      });
  }

  // ── Appends ────────────────────────────────────────────────────────────────

  /** Persist a finished attempt. Must happen before anything consumes it. */
  async appendResult(result: AgentResult): Promise<void> {
    const existing = this.progressFor(result.agentId, result.round);
    if (existing?.results.some((r) => r.attempt === result.attempt)) {
      throw new Error(
        `Duplicate result for ${result.agentId} round ${result.round} attempt ${result.attempt}`,
      );
    }
    await this.append({ kind: 'result', result });
  }

  async appendVerdict(verdict: Verdict): Promise<void> {
    await this.append({ kind: 'verdict', verdict });
  }

  /** Mark an (agentId, round) pair final and write its decision artifact. */
  async appendOutcome(outcome: AgentOutcome): Promise<void> {
    if (this.isCompleted(outcome.agentId, outcome.round)) {
      throw new Error(`Outcome for ${outcome.agentId} round ${outcome.round} already recorded`);
    }
    await this.append({ kind: 'outcome', outcome });

    const progress = this.progressFor(outcome.agentId, outcome.round);
    const last = progress?.results[progress.results.length - 1];
    await writeFileAtomic(
      this.paths.decisionFile(outcome.round, outcome.agentId),
      JSON.stringify(
        {
          agentId: outcome.agentId,
          round: outcome.round,
          attempt: last?.attempt ?? null,
          status: outcome.status,
          failure: outcome.failure,
          decision: outcome.decision,
          validationErrors: progress?.lastVerdict?.violations ?? [],
          sourcePath: last
            ? this.paths.outputFile(outcome.round, outcome.agentId, last.attempt)
            : null,
          extractedAt: Date.now(),
        },
        null,
        2,
      ),
    );
  }

  /** Write a prompt or output artifact. */
  async writeArtifact(file: string, content: string): Promise<void> {
    await writeFileAtomic(file, content);
  }

  /** Drop a stale artifact left behind by an attempt that never finished. */
  async removeArtifact(file: string): Promise<void> {
    try {
      await fs.rm(file, { force: true });
    } catch (err) {
      throw new PersistenceError(file, err);
    }
  }

  // ── Snapshot transitions ───────────────────────────────────────────────────

  async beginRound(round: number): Promise<void> {
    this.state.currentRound = round;
    this.state.phase = { state: 'running', round };
    this.state.stopReason = null;
    await this.saveSnapshot();
  }

  async setPhase(phase: RunPhase): Promise<void> {
    this.state.phase = phase;
    await this.saveSnapshot();
  }

  async markStopRequested(): Promise<void> {
    if (this.state.stopRequested) return;
    this.state.stopRequested = true;
    await this.saveSnapshot();
  }

  /** Record a finished round: summary, decision report and quota ledger. */
  async commitRound(summary: RoundSummary, ledger: QuotaLedger): Promise<void> {
    this.state.rounds = [...this.state.rounds.filter((r) => r.round !== summary.round), summary];
    this.state.lastCompletedRound = Math.max(this.state.lastCompletedRound, summary.round);

    const outcomes = this.outcomesFor(summary.round);
    const failed = outcomes.filter((o) => o.status === 'failed');
    const reasons = (o: AgentOutcome) =>
      this.progressFor(o.agentId, o.round)?.lastVerdict?.violations ?? [];

    await writeFileAtomic(
      this.paths.roundDecisionsReport(summary.round),
      JSON.stringify(
        {
          ok: failed.length === 0,
          round: summary.round,
          agentCount: outcomes.length,
          extracted: outcomes.length - failed.length,
          missing: failed
            .filter((o) => reasons(o).some((v) => v.code === 'missing_block'))
            .map((o) => o.agentId),
          invalid: failed
            .filter((o) => !reasons(o).some((v) => v.code === 'missing_block'))
            .map((o) => o.agentId),
          invalidReasons: Object.fromEntries(
            failed.map((o) => [o.agentId, reasons(o).map((v) => v.message)]),
          ),
          generatedAt: Date.now(),
        },
        null,
        2,
      ),
    );
    await this.writeLedger(ledger);
    await this.saveSnapshot();
  }

  async writeLedger(ledger: QuotaLedger): Promise<void> {
    await writeFileAtomic(this.paths.quotaFile, JSON.stringify(ledger, null, 2));
  }

  /** Terminal transition: persist the reason and the run report. */
  async finish(reason: StopReason, report: RunReport, markdown: string): Promise<void> {
    this.state.phase = { state: 'stopped', reason };
    this.state.stopReason = reason;
    await this.saveSnapshot();
    await writeFileAtomic(this.paths.reportJson, JSON.stringify(report, null, 2));
    await writeFileAtomic(this.paths.reportMarkdown, markdown);
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  private async append(entry: LogEntry): Promise<void> {
    await appendLine(this.paths.resultLog, entry);
    this.apply(entry);
  }

  private progressEntry(agentId: string, round: number): AgentProgress {
    const key = roundKey(agentId, round);
    let p = this.progress.get(key);
    if (!p) {
      p = { agentId, round, results: [], lastVerdict: null, outcome: null };
      this.progress.set(key, p);
    }
    return p;
  }

  private apply(entry: LogEntry): void {
    switch (entry.kind) {
      case 'result': {
        const p = this.progressEntry(entry.result.agentId, entry.result.round);
        if (p.results.some((r) => r.attempt === entry.result.attempt)) return;
        p.results.push(entry.result);
        p.results.sort((a, b) => a.attempt - b.attempt);
        break;
      }
      case 'verdict': {
        const p = this.progressEntry(entry.verdict.agentId, entry.verdict.round);
        p.lastVerdict = entry.verdict;
        break;
      }
      case 'outcome': {
        const { outcome } = entry;
        const p = this.progressEntry(outcome.agentId, outcome.round);
        if (p.outcome) return;
        p.outcome = outcome;

        const key: AgentRoundKey = { agentId: outcome.agentId, round: outcome.round };
        this.state.completedAgents.push(key);
        if (outcome.status === 'failed') {
          this.state.failedAgents.push(key);
        } else if (outcome.decision) {
          this.state.decisions[roundKey(outcome.agentId, outcome.round)] = outcome.decision;
        }
        break;
      }
    }
    this.state.updatedAt = Date.now();
  }

  private async saveSnapshot(): Promise<void> {
    this.state.updatedAt = Date.now();
    await writeFileAtomic(this.paths.runStateFile, JSON.stringify(this.state, null, 2));
  }
}
