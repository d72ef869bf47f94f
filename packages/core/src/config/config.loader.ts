import fs from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import type { ConclaveConfig } from '@conclave/shared';
import { DEFAULT_CONFIG } from './config.defaults.js';
import { ConfigError } from '../errors/conclave.errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';

export const CONCLAVE_DIR = '.conclave';
export const CONFIG_FILE = 'config.yaml';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];
const ROLE_RE = /^[a-z][a-z0-9_-]*$/i;

export interface LoadConfigOptions {
  projectRoot: string;
  /** Explicit config file. When set, a missing file is an error instead of a default. */
  configPath?: string;
  logger?: Logger;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function deepMerge<T extends Record<string, unknown>>(base: T, override: Partial<T>): T {
  const result = { ...base };
  for (const key of Object.keys(override) as Array<keyof T>) {
    const overrideVal = override[key];
    const baseVal = base[key];
    if (isPlainObject(overrideVal) && isPlainObject(baseVal)) {
      result[key] = deepMerge<Record<string, unknown>>(baseVal, overrideVal) as T[keyof T];
    } else if (overrideVal !== undefined) {
      result[key] = overrideVal as T[keyof T];
    }
  }
  return result;
}

function fail(message: string): never {
  throw new ConfigError(`Config validation failed: ${message}`);
}

function isPositiveInt(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isNonNegativeInt(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

export function validateConfig(config: ConclaveConfig): void {
  const { agent, team, concurrency, quota, rounds, contract, scoring, logs } = config;

  if (!agent.command || typeof agent.command !== 'string') {
    fail('agent.command must be a non-empty string');
  }
  if (!isStringArray(agent.args)) {
    fail('agent.args must be a list of strings');
  }
  if (agent.cwd !== null && typeof agent.cwd !== 'string') {
    fail('agent.cwd must be a string or null');
  }
  if (!isPositiveInt(agent.timeout_seconds)) {
    fail('agent.timeout_seconds must be a positive integer');
  }

  if (!Array.isArray(team) || team.length === 0) {
    fail('team must list at least one seat');
  }
  const roles = new Set<string>();
  team.forEach((seat, i) => {
    if (!isPlainObject(seat)) fail(`team[${i}] must be a mapping`);
    if (typeof seat.role !== 'string' || !ROLE_RE.test(seat.role)) {
      fail(`team[${i}].role must be an identifier (letters, digits, "-" or "_")`);
    }
    if (roles.has(seat.role)) fail(`team[${i}].role "${seat.role}" is listed twice`);
    roles.add(seat.role);
    if (!isPositiveInt(seat.count)) fail(`team[${i}].count must be a positive integer`);
    if (seat.resource_class !== 'cheap' && seat.resource_class !== 'expensive') {
      fail(`team[${i}].resource_class must be "cheap" or "expensive"`);
    }
    if (seat.timeout_seconds !== undefined && !isPositiveInt(seat.timeout_seconds)) {
      fail(`team[${i}].timeout_seconds must be a positive integer`);
    }
  });

  if (!isPositiveInt(concurrency.max_parallel)) {
    fail('concurrency.max_parallel must be >= 1');
  }
  if (!isNonNegativeInt(concurrency.console_group_size)) {
    fail('concurrency.console_group_size must be >= 0');
  }

  if (!isNonNegativeInt(quota.global_budget)) {
    fail('quota.global_budget must be >= 0 (0 = unlimited)');
  }
  if (!isNonNegativeInt(quota.per_agent_budget)) {
    fail('quota.per_agent_budget must be >= 0 (0 = unlimited)');
  }
  if (typeof quota.downgrade_on_deny !== 'boolean') {
    fail('quota.downgrade_on_deny must be true or false');
  }
  if (!isStringArray(quota.expensive_seats)) {
    fail('quota.expensive_seats must be a list of agent ids');
  }

  if (!isPositiveInt(rounds.max_rounds)) {
    fail('rounds.max_rounds must be >= 1');
  }
  if (rounds.rerun !== 'full' && rounds.rerun !== 'invalid_only') {
    fail('rounds.rerun must be "full" or "invalid_only"');
  }

  if (typeof contract.require_decision_json !== 'boolean') {
    fail('contract.require_decision_json must be true or false');
  }
  if (!isNonNegativeInt(contract.repair_attempts)) {
    fail('contract.repair_attempts must be >= 0');
  }
  if (typeof contract.fail_closed !== 'boolean') {
    fail('contract.fail_closed must be true or false');
  }
  if (
    typeof contract.threshold !== 'number' ||
    contract.threshold < 0 ||
    contract.threshold > 100
  ) {
    fail('contract.threshold must be between 0 and 100');
  }
  if (typeof contract.strict_paths !== 'boolean') {
    fail('contract.strict_paths must be true or false');
  }
  if (!isNonNegativeInt(contract.min_commands_from_round)) {
    fail('contract.min_commands_from_round must be >= 0');
  }
  if (!isNonNegativeInt(contract.prior_tail_chars)) {
    fail('contract.prior_tail_chars must be >= 0');
  }

  if (!isPlainObject(scoring.weights)) {
    fail('scoring.weights must be a mapping of agent id or role to weight');
  }
  for (const [key, weight] of Object.entries(scoring.weights)) {
    if (typeof weight !== 'number' || !Number.isFinite(weight) || weight < 0) {
      fail(`scoring.weights.${key} must be a non-negative number`);
    }
  }

  if (!LOG_LEVELS.includes(logs.level)) {
    fail(`logs.level must be one of ${LOG_LEVELS.join(', ')}`);
  }
}

export function defaultConfigPath(projectRoot: string): string {
  return path.join(projectRoot, CONCLAVE_DIR, CONFIG_FILE);
}

export function writeConfig(config: ConclaveConfig, configPath: string): void {
  validateConfig(config);
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, yaml.dump(config), 'utf8');
}

/**
 * Resolve the run configuration: `configPath` if given, otherwise
 * `<projectRoot>/.conclave/config.yaml` (written with defaults on first use).
 * User values are deep-merged over DEFAULT_CONFIG; lists replace wholesale.
 */
export async function loadConfig(options: LoadConfigOptions): Promise<ConclaveConfig> {
  const logger = options.logger ?? silentLogger();
  const configPath = options.configPath ?? defaultConfigPath(options.projectRoot);

  let userConfig: Record<string, unknown> = {};

  if (fs.existsSync(configPath)) {
    const raw = fs.readFileSync(configPath, 'utf8');
    let parsed: unknown;
    try {
      parsed = yaml.load(raw);
    } catch (err) {
      throw new ConfigError(
        `Config file ${configPath} is not valid YAML: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    if (isPlainObject(parsed)) {
      userConfig = parsed;
    } else if (parsed !== null && parsed !== undefined) {
      throw new ConfigError(`Config file ${configPath} must contain a mapping`);
    }
  } else if (options.configPath) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  } else {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, yaml.dump(DEFAULT_CONFIG), 'utf8');
    logger.info({ configPath }, 'Created default config');
  }

  const merged = deepMerge(
    DEFAULT_CONFIG as unknown as Record<string, unknown>,
    userConfig,
  ) as unknown as ConclaveConfig;

  validateConfig(merged);
  return merged;
}
