import fs from 'node:fs';
import path from 'node:path';
import type { ContractViolation, DecisionRecord, ExitStatus } from '@conclave/shared';
import { describeViolations } from '../contract/contract.validator.js';
import { CONCLAVE_DIR } from '../config/config.loader.js';
import type { AgentSeat } from '../team/team.builder.js';

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

export interface PeerDecision {
  agentId: string;
  decision: DecisionRecord;
}

export interface PromptContext {
  seat: AgentSeat;
  round: number;
  maxRounds: number;
  /** Valid decisions from the previous round, in team order. */
  peerDecisions: PeerDecision[];
  strictPaths: boolean;
  requireCommands: boolean;
}

/** Produces the opaque payload handed to an agent for its first attempt. */
export interface PromptProvider {
  payloadFor(context: PromptContext): string;
}

// ---------------------------------------------------------------------------
// Built-in role templates
// ---------------------------------------------------------------------------

const ROLE_TEMPLATES: Record<string, string> = {
  architect: `\
You are the Architect on a small engineering council.
Decide the overall approach: which modules change, in what order, and why.
Prefer the smallest design that solves the mission. Call out anything the
team has not verified yet.`,

  engineer: `\
You are an Engineer on a small engineering council.
Turn the mission into concrete, file-level changes and the commands that
prove they work. Be specific about paths and keep the change set small.`,

  critic: `\
You are the Critic on a small engineering council.
Look for what can go wrong with the proposals on the table: missing tests,
unsafe edits, unclear ownership. Propose fixes, not just objections.`,
};

function defaultTemplate(role: string): string {
  return `You are the ${role} on a small engineering council.\nContribute your perspective on the mission and commit to a concrete decision.`;
}

/** Instructions describing the DECISION_JSON contract. */
export function contractInstructions(options: { strictPaths: boolean; requireCommands: boolean }): string {
  const lines = [
    'End your answer with EXACTLY ONE fenced block labeled DECISION_JSON:',
    '',
    '```json DECISION_JSON',
    '{"summary": "...", "files": [], "commands": [], "risks": [], "confidence": 0.5}',
    '```',
    '',
    '- summary: non-empty string',
    '- files, commands, risks: arrays of strings (may be empty)',
    '- confidence: number between 0 and 1',
  ];
  if (options.strictPaths) {
    lines.push('- files must be repo-relative paths (no absolute paths, drive letters or "..")');
  }
  if (options.requireCommands) {
    lines.push('- commands must contain at least one command that verifies the work');
  }
  return lines.join('\n');
}

function renderPeer(peer: PeerDecision): string {
  const { decision } = peer;
  const list = (items: string[]) => (items.length > 0 ? items.join(', ') : '(none)');
  return [
    `### ${peer.agentId}`,
    `Summary: ${decision.summary}`,
    `Files: ${list(decision.files)}`,
    `Commands: ${list(decision.commands)}`,
    `Risks: ${list(decision.risks)}`,
    `Confidence: ${decision.confidence}`,
  ].join('\n');
}

// ---------------------------------------------------------------------------
// TemplatePromptProvider
// ---------------------------------------------------------------------------

export interface TemplatePromptProviderOptions {
  projectRoot: string;
  mission: string;
}

/**
 * Role prompt from `.conclave/prompts/<role>.md` (or the built-in template),
 * followed by the mission, round, previous-round peer decisions, skills from
 * `.conclave/skills/<role>.md` and the contract instructions.
 */
export class TemplatePromptProvider implements PromptProvider {
  private readonly projectRoot: string;
  private readonly mission: string;
  private readonly cache = new Map<string, { template: string; skills: string | null }>();

  constructor(options: TemplatePromptProviderOptions) {
    this.projectRoot = options.projectRoot;
    this.mission = options.mission.trim();
  }

  payloadFor(context: PromptContext): string {
    const { seat, round, maxRounds, peerDecisions } = context;
    const { template, skills } = this.roleFiles(seat.role);

    const sections = [
      template,
      `## Mission\n${this.mission || '(no mission given)'}`,
      `## Round\nRound ${round} of ${maxRounds}. You are ${seat.agentId} (${seat.role}).`,
    ];
    if (round > 1 && peerDecisions.length > 0) {
      sections.push(
        `## Decisions from round ${round - 1}\n${peerDecisions.map(renderPeer).join('\n\n')}`,
      );
    }
    if (skills) sections.push(`## Skills\n${skills}`);
    sections.push(`## Output contract\n${contractInstructions(context)}`);

    return sections.join('\n\n') + '\n';
  }

  private roleFiles(role: string): { template: string; skills: string | null } {
    const cached = this.cache.get(role);
    if (cached) return cached;

    const base = path.join(this.projectRoot, CONCLAVE_DIR);
    const template =
      readOptional(path.join(base, 'prompts', `${role}.md`)) ??
      ROLE_TEMPLATES[role] ??
      defaultTemplate(role);
    const skills = readOptional(path.join(base, 'skills', `${role}.md`));

    const entry = { template: template.trim(), skills: skills?.trim() || null };
    this.cache.set(role, entry);
    return entry;
  }
}

function readOptional(file: string): string | null {
  return fs.existsSync(file) ? fs.readFileSync(file, 'utf8') : null;
}

// ---------------------------------------------------------------------------
// Repair prompts
// ---------------------------------------------------------------------------

export interface RepairPromptInput {
  originalPayload: string;
  agentId: string;
  round: number;
  attempt: number;
  /** How the previous attempt ended. */
  exitStatus: ExitStatus;
  exitCode: number | null;
  violations: ContractViolation[];
  priorOutput: string;
  /** 0 keeps the whole prior output. */
  priorTailChars: number;
  strictPaths: boolean;
  requireCommands: boolean;
}

function whatWentWrong(input: RepairPromptInput): string {
  const who = `Your previous answer (${input.agentId}, round ${input.round}, attempt ${input.attempt - 1})`;
  switch (input.exitStatus) {
    case 'timeout':
      return `${who} timed out before it finished. Answer more briefly and write the decision block early.`;
    case 'processError': {
      const ending = input.exitCode === null ? 'failed to run' : `exited with code ${input.exitCode}`;
      return `${who} ${ending}. Exit with code 0 after writing the decision block.`;
    }
    default:
      return `${who} violated the output contract:\n\n${describeViolations(input.violations)}`;
  }
}

/**
 * The original payload plus what was wrong with the last answer. Kept
 * deterministic: the goal is contract compliance, not a new answer.
 */
export function buildRepairPrompt(input: RepairPromptInput): string {
  const { priorOutput, priorTailChars } = input;
  const tail =
    priorTailChars > 0 && priorOutput.length > priorTailChars
      ? priorOutput.slice(-priorTailChars)
      : priorOutput;

  return [
    input.originalPayload.trimEnd(),
    '## Repair',
    whatWentWrong(input),
    contractInstructions(input),
    '## Previous output (tail)',
    tail.trim() || '(empty)',
  ].join('\n\n') + '\n';
}
