import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import yaml from 'js-yaml';
import { loadConfig, writeConfig, defaultConfigPath } from './config.loader.js';
import { DEFAULT_CONFIG } from './config.defaults.js';
import { ConfigError } from '../errors/conclave.errors.js';

describe('config.loader', () => {
  let projectRoot: string;
  let configPath: string;

  beforeEach(() => {
    projectRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'conclave-config-'));
    configPath = defaultConfigPath(projectRoot);
  });

  afterEach(() => {
    fs.rmSync(projectRoot, { recursive: true, force: true });
  });

  it('returns defaults when config file is missing', async () => {
    const config = await loadConfig({ projectRoot });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('writes a default config file on first use', async () => {
    expect(fs.existsSync(configPath)).toBe(false);
    await loadConfig({ projectRoot });
    expect(fs.existsSync(configPath)).toBe(true);
    expect(yaml.load(fs.readFileSync(configPath, 'utf8'))).toEqual(DEFAULT_CONFIG);
  });

  it('loads user overrides and merges with defaults', async () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(
      configPath,
      `
concurrency:
  max_parallel: 5
quota:
  global_budget: 2
  downgrade_on_deny: true
`,
    );

    const config = await loadConfig({ projectRoot });
    expect(config.concurrency.max_parallel).toBe(5);
    expect(config.concurrency.console_group_size).toBe(0);
    expect(config.quota.global_budget).toBe(2);
    expect(config.quota.downgrade_on_deny).toBe(true);
    expect(config.quota.per_agent_budget).toBe(0);
    expect(config.rounds).toEqual(DEFAULT_CONFIG.rounds);
  });

  it('replaces the team list instead of merging it', async () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(
      configPath,
      `
team:
  - role: critic
    count: 3
    resource_class: cheap
`,
    );

    const config = await loadConfig({ projectRoot });
    expect(config.team).toEqual([{ role: 'critic', count: 3, resource_class: 'cheap' }]);
  });

  it('treats an empty file as no overrides', async () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, '');
    const config = await loadConfig({ projectRoot });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('throws when an explicit config path does not exist', async () => {
    const missing = path.join(projectRoot, 'nope.yaml');
    await expect(loadConfig({ projectRoot, configPath: missing })).rejects.toThrow(
      `Config file not found: ${missing}`,
    );
  });

  it('throws ConfigError on a non-mapping document', async () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, '- just\n- a list\n');
    await expect(loadConfig({ projectRoot })).rejects.toBeInstanceOf(ConfigError);
  });

  it('throws on max_parallel below 1', async () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, 'concurrency:\n  max_parallel: 0\n');
    await expect(loadConfig({ projectRoot })).rejects.toThrow(
      'Config validation failed: concurrency.max_parallel must be >= 1',
    );
  });

  it('throws on an unknown resource class', async () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, 'team:\n  - role: a\n    count: 1\n    resource_class: gpu\n');
    await expect(loadConfig({ projectRoot })).rejects.toThrow(
      'Config validation failed: team[0].resource_class must be "cheap" or "expensive"',
    );
  });

  it('throws on a duplicated role', async () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(
      configPath,
      'team:\n  - {role: a, count: 1, resource_class: cheap}\n  - {role: a, count: 2, resource_class: cheap}\n',
    );
    await expect(loadConfig({ projectRoot })).rejects.toThrow(
      'Config validation failed: team[1].role "a" is listed twice',
    );
  });

  it('throws on a threshold above 100', async () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, 'contract:\n  threshold: 120\n');
    await expect(loadConfig({ projectRoot })).rejects.toThrow(
      'Config validation failed: contract.threshold must be between 0 and 100',
    );
  });

  it('writeConfig round-trips through loadConfig', async () => {
    const custom = {
      ...DEFAULT_CONFIG,
      rounds: { max_rounds: 4, rerun: 'invalid_only' as const },
    };
    writeConfig(custom, configPath);
    const config = await loadConfig({ projectRoot });
    expect(config.rounds).toEqual({ max_rounds: 4, rerun: 'invalid_only' });
  });

  it('writeConfig refuses an invalid config', () => {
    const bad = { ...DEFAULT_CONFIG, agent: { ...DEFAULT_CONFIG.agent, command: '' } };
    expect(() => writeConfig(bad, configPath)).toThrow(ConfigError);
    expect(fs.existsSync(configPath)).toBe(false);
  });
});
