import { z } from 'zod';
import type {
  ContractValidation,
  ContractViolation,
  DecisionRecord,
} from '@conclave/shared';

export const DECISION_TAG = 'DECISION_JSON';

const DECISION_FENCE_RE = /```json[ \t]+DECISION_JSON\b[^\n]*\n?([\s\S]*?)```/gi;

const decisionSchema = z.object({
  summary: z.string().refine((s) => s.trim().length > 0, { message: 'must not be empty' }),
  files: z.array(z.string()),
  commands: z.array(z.string()),
  risks: z.array(z.string()),
  confidence: z.number().min(0).max(1),
});

export interface ContractOptions {
  /** Round the output belongs to; only used by `minCommandsFromRound`. */
  round?: number;
  /** Reject absolute, drive-letter and `..` paths in `files`. */
  strictPaths?: boolean;
  /** From this round on, at least one non-blank command is required. 0 disables. */
  minCommandsFromRound?: number;
}

function fieldName(path: Array<string | number>): string | null {
  if (path.length === 0) return null;
  return path.reduce<string>(
    (acc, part) => (typeof part === 'number' ? `${acc}[${part}]` : acc ? `${acc}.${part}` : part),
    '',
  );
}

function toViolation(issue: z.ZodIssue): ContractViolation {
  const field = fieldName(issue.path);
  const label = field ?? 'decision';

  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      if (issue.received === 'undefined' && issue.path.length === 1) {
        return { code: 'missing_field', field, message: `Missing required field "${label}"` };
      }
      return {
        code: 'wrong_type',
        field,
        message: `Field "${label}" must be ${issue.expected}, got ${issue.received}`,
      };
    case z.ZodIssueCode.too_small:
    case z.ZodIssueCode.too_big:
      return { code: 'out_of_range', field, message: `Field "${label}" must be between 0 and 1` };
    case z.ZodIssueCode.custom:
      return { code: 'empty_field', field, message: `Field "${label}" ${issue.message}` };
    default:
      return { code: 'wrong_type', field, message: `Field "${label}": ${issue.message}` };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function isUnsafePath(p: string): boolean {
  const s = p.trim();
  if (!s) return true;
  if (s.startsWith('/') || s.startsWith('\\')) return true;
  if (/^[a-zA-Z]:[\\/]/.test(s)) return true;
  return s.replace(/\\/g, '/').split('/').includes('..');
}

function extraChecks(obj: Record<string, unknown>, options: ContractOptions): ContractViolation[] {
  const violations: ContractViolation[] = [];

  const files = obj['files'];
  if (options.strictPaths && Array.isArray(files)) {
    files.forEach((item: unknown, i) => {
      if (typeof item === 'string' && isUnsafePath(item)) {
        violations.push({
          code: 'unsafe_path',
          field: `files[${i}]`,
          message: `files[${i}] "${item}" must be a repo-relative path`,
        });
      }
    });
  }

  const minRound = options.minCommandsFromRound ?? 0;
  const commands = obj['commands'];
  if (minRound > 0 && (options.round ?? 1) >= minRound && Array.isArray(commands)) {
    const usable = commands.filter((c: unknown) => typeof c === 'string' && c.trim().length > 0);
    if (usable.length === 0) {
      violations.push({
        code: 'missing_commands',
        field: 'commands',
        message: `Round ${options.round ?? 1} requires at least one verification command`,
      });
    }
  }

  return violations;
}

function invalid(violations: ContractViolation[]): ContractValidation {
  return { valid: false, decision: null, violations };
}

/**
 * Extract and validate the single DECISION_JSON block in an agent's output.
 *
 * Never throws: agent output is untrusted free text, so every problem comes
 * back as a violation. Field problems are enumerated in full.
 */
export function validateContract(rawOutput: string, options: ContractOptions = {}): ContractValidation {
  const blocks = [...rawOutput.matchAll(DECISION_FENCE_RE)].map((m) => m[1] ?? '');

  if (blocks.length === 0) {
    return invalid([
      { code: 'missing_block', field: null, message: `No \`\`\`json ${DECISION_TAG} block found` },
    ]);
  }
  if (blocks.length > 1) {
    return invalid([
      {
        code: 'ambiguous_contract',
        field: null,
        message: `Found ${blocks.length} ${DECISION_TAG} blocks; exactly one is required`,
      },
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(blocks[0].trim());
  } catch (err) {
    return invalid([
      {
        code: 'malformed_json',
        field: null,
        message: `${DECISION_TAG} block is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      },
    ]);
  }

  if (!isRecord(parsed)) {
    return invalid([
      { code: 'not_object', field: null, message: `${DECISION_TAG} must be a JSON object` },
    ]);
  }

  const result = decisionSchema.safeParse(parsed);
  const violations = result.success ? [] : result.error.issues.map(toViolation);
  violations.push(...extraChecks(parsed, options));

  if (!result.success || violations.length > 0) {
    return invalid(violations);
  }
  return { valid: true, decision: result.data, violations: [] };
}

/**
 * Serialize a record into the fenced contract format. Backticks are escaped
 * so string content can never close the fence early.
 */
export function formatDecisionBlock(record: DecisionRecord): string {
  const json = JSON.stringify(record, null, 2).replace(/`/g, '\\u0060');
  return `\`\`\`json ${DECISION_TAG}\n${json}\n\`\`\``;
}

/** One line per violation, for repair prompts and reports. */
export function describeViolations(violations: ContractViolation[]): string {
  return violations.map((v) => `- [${v.code}] ${v.message}`).join('\n');
}
