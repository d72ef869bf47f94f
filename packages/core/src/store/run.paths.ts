import * as path from 'node:path';

/**
 * On-disk layout of a run directory. External tooling (scorecards, eval
 * reports) reads these paths directly, so they are part of the public surface.
 */
export class RunPaths {
  constructor(readonly runDir: string) {}

  get stateDir(): string {
    return path.join(this.runDir, 'state');
  }

  get runStateFile(): string {
    return path.join(this.stateDir, 'run.json');
  }

  get resultLog(): string {
    return path.join(this.stateDir, 'results.jsonl');
  }

  get quotaFile(): string {
    return path.join(this.stateDir, 'quota.json');
  }

  get stopFlag(): string {
    return path.join(this.stateDir, 'STOP');
  }

  get decisionsDir(): string {
    return path.join(this.stateDir, 'decisions');
  }

  get logsDir(): string {
    return path.join(this.runDir, 'logs');
  }

  get logFile(): string {
    return path.join(this.logsDir, 'conclave.log');
  }

  get reportJson(): string {
    return path.join(this.runDir, 'report.json');
  }

  get reportMarkdown(): string {
    return path.join(this.runDir, 'report.md');
  }

  decisionFile(round: number, agentId: string): string {
    return path.join(this.decisionsDir, `round${round}_${agentId}.json`);
  }

  roundDecisionsReport(round: number): string {
    return path.join(this.stateDir, `decisions_round${round}.json`);
  }

  promptFile(round: number, agentId: string, attempt: number): string {
    return path.join(this.runDir, 'prompts', `round${round}_${agentId}_a${attempt}.txt`);
  }

  outputFile(round: number, agentId: string, attempt: number): string {
    return path.join(this.runDir, 'outputs', `round${round}_${agentId}_a${attempt}.md`);
  }
}
