import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { defaultRunDir, parseArgs, UsageError } from './cli.args.js';

const CWD = path.resolve('/work/project');
const argv = (...args: string[]) => ['node', 'conclave', ...args];

describe('parseArgs', () => {
  it('returns help with no command', () => {
    expect(parseArgs(argv(), CWD)).toEqual({ command: 'help' });
    expect(parseArgs(argv('--help'), CWD)).toEqual({ command: 'help' });
  });

  it('parses a run with defaults', () => {
    expect(parseArgs(argv('run'), CWD)).toEqual({
      command: 'run',
      projectRoot: CWD,
      configPath: undefined,
      runDir: undefined,
      resume: false,
      mission: undefined,
      missionFile: undefined,
      ui: true,
    });
  });

  it('resolves paths against the working directory', () => {
    const args = parseArgs(
      argv('run', '--config', 'conf.yaml', '--run-dir', 'runs/a', '--resume', '--mission', 'ship it', '--no-ui'),
      CWD,
    );
    expect(args).toMatchObject({
      command: 'run',
      configPath: path.join(CWD, 'conf.yaml'),
      runDir: path.join(CWD, 'runs/a'),
      resume: true,
      mission: 'ship it',
      ui: false,
    });
  });

  it('turns the view off when stdout is not a terminal', () => {
    expect(parseArgs(argv('run'), CWD, false)).toMatchObject({ ui: false });
  });

  it('rejects --resume without --run-dir', () => {
    expect(() => parseArgs(argv('run', '--resume'), CWD)).toThrow('--resume needs --run-dir');
  });

  it('rejects both mission sources', () => {
    expect(() => parseArgs(argv('run', '--mission', 'a', '--mission-file', 'b.md'), CWD)).toThrow(
      '--mission and --mission-file are mutually exclusive',
    );
  });

  it('rejects a flag without its value', () => {
    expect(() => parseArgs(argv('run', '--run-dir'), CWD)).toThrow('--run-dir needs a value');
    expect(() => parseArgs(argv('run', '--config', '--resume'), CWD)).toThrow('--config needs a value');
  });

  it('rejects options that belong to another command', () => {
    expect(() => parseArgs(argv('status', '--clear'), CWD)).toThrow(UsageError);
    expect(() => parseArgs(argv('launch'), CWD)).toThrow('Unknown command: launch');
  });

  it('parses stop', () => {
    expect(parseArgs(argv('stop', '--run-dir', '/tmp/r', '--clear'), CWD)).toEqual({
      command: 'stop',
      projectRoot: CWD,
      runDir: path.resolve('/tmp/r'),
      clear: true,
      all: false,
    });
    expect(parseArgs(argv('stop', '--all'), CWD)).toMatchObject({ command: 'stop', all: true, clear: false });
    expect(() => parseArgs(argv('stop'), CWD)).toThrow('stop needs --run-dir or --all');
  });

  it('parses status', () => {
    expect(parseArgs(argv('status', '--run-dir', 'r', '--json'), CWD)).toEqual({
      command: 'status',
      projectRoot: CWD,
      runDir: path.join(CWD, 'r'),
      json: true,
    });
    expect(() => parseArgs(argv('status'), CWD)).toThrow('status needs --run-dir');
  });
});

describe('defaultRunDir', () => {
  it('names the directory after the start time', () => {
    expect(defaultRunDir(CWD, new Date('2026-03-04T05:06:07.890Z'))).toBe(
      path.join(CWD, '.conclave', 'runs', 'run-20260304-050607Z'),
    );
  });
});
