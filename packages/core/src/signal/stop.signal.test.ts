import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { StopSignal, GLOBAL_STOP_FILE, writeStopFlag, clearStopFlag } from './stop.signal.js';

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'conclave-stop-'));
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('StopSignal', () => {
  it('is not raised by default', () => {
    expect(new StopSignal().isRequested()).toBe(false);
  });

  it('stays raised after request()', () => {
    const signal = new StopSignal();
    signal.request();
    expect(signal.isRequested()).toBe(true);
    expect(signal.isRequested()).toBe(true);
  });

  it('picks up the run flag file', () => {
    const runFlag = path.join(tmpDir, 'run', 'state', 'STOP');
    const signal = new StopSignal({ runFlag });
    expect(signal.isRequested()).toBe(false);

    writeStopFlag(runFlag);
    expect(signal.isRequested()).toBe(true);
  });

  it('picks up the project-wide flag file', async () => {
    const signal = new StopSignal({ projectRoot: tmpDir });
    await fs.writeFile(path.join(tmpDir, GLOBAL_STOP_FILE), '', 'utf-8');
    expect(signal.isRequested()).toBe(true);
  });

  it('latches even if the flag file is removed', () => {
    const runFlag = path.join(tmpDir, 'STOP');
    const signal = new StopSignal({ runFlag });
    writeStopFlag(runFlag);
    expect(signal.isRequested()).toBe(true);

    expect(clearStopFlag(runFlag)).toBe(true);
    expect(signal.isRequested()).toBe(true);
  });
});

describe('clearStopFlag', () => {
  it('returns false when no flag exists', () => {
    expect(clearStopFlag(path.join(tmpDir, 'STOP'))).toBe(false);
  });
});
