import fs from 'node:fs';
import path from 'node:path';

export const GLOBAL_STOP_FILE = 'STOP_ALL_AGENTS.flag';

export interface StopSignalOptions {
  /** Run-scoped flag, usually `<runDir>/state/STOP`. */
  runFlag?: string;
  /** Project root holding STOP_ALL_AGENTS.flag. */
  projectRoot?: string;
}

/**
 * Cooperative stop request. Set in-process (SIGINT / SIGTERM) or from
 * outside by dropping a flag file. Once raised it stays raised.
 */
export class StopSignal {
  private requested = false;
  private readonly flagFiles: string[];

  constructor(options: StopSignalOptions = {}) {
    this.flagFiles = [
      ...(options.runFlag ? [options.runFlag] : []),
      ...(options.projectRoot ? [path.join(options.projectRoot, GLOBAL_STOP_FILE)] : []),
    ];
  }

  request(): void {
    this.requested = true;
  }

  isRequested(): boolean {
    if (this.requested) return true;
    if (this.flagFiles.some((file) => fs.existsSync(file))) {
      this.requested = true;
    }
    return this.requested;
  }
}

/** Write the run-scoped stop flag. */
export function writeStopFlag(flagFile: string): void {
  fs.mkdirSync(path.dirname(flagFile), { recursive: true });
  fs.writeFileSync(flagFile, `stop requested at ${new Date().toISOString()}\n`, 'utf-8');
}

/** Remove the run-scoped stop flag. Returns false if it was not there. */
export function clearStopFlag(flagFile: string): boolean {
  if (!fs.existsSync(flagFile)) return false;
  fs.rmSync(flagFile);
  return true;
}
