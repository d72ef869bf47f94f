import type { ConclaveConfig } from '@conclave/shared';
import { DEFAULT_CONFIG } from '../config/config.defaults.js';
import { formatDecisionBlock } from '../contract/contract.validator.js';
import type { LaunchResult, LaunchSpec, ProcessLauncher } from '../process/process.launcher.js';

export interface LaunchInfo {
  agentId: string;
  round: number;
  attempt: number;
  resourceClass: string;
  stdin: string;
}

export type Script = (info: LaunchInfo, spec: LaunchSpec) => Partial<LaunchResult>;

export function decisionOutput(summary = 'Looks good', confidence = 0.8): string {
  return `Notes first.\n\n${formatDecisionBlock({
    summary,
    files: ['src/index.ts'],
    commands: ['npm test'],
    risks: [],
    confidence,
  })}\n`;
}

/** In-process stand-in for agent processes, answering from a script. */
export class ScriptedLauncher implements ProcessLauncher {
  readonly calls: LaunchInfo[] = [];

  constructor(private readonly script: Script = () => ({ stdout: decisionOutput() })) {}

  async launch(spec: LaunchSpec): Promise<LaunchResult> {
    const env = spec.env ?? {};
    const info: LaunchInfo = {
      agentId: env.CONCLAVE_AGENT_ID ?? '',
      round: Number(env.CONCLAVE_ROUND),
      attempt: Number(env.CONCLAVE_ATTEMPT),
      resourceClass: env.CONCLAVE_RESOURCE_CLASS ?? '',
      stdin: spec.stdin ?? '',
    };
    this.calls.push(info);
    await new Promise<void>((resolve) => setTimeout(resolve, 5));
    return {
      exitCode: 0,
      timedOut: false,
      stdout: '',
      stderr: '',
      durationMs: 5,
      error: null,
      ...this.script(info, spec),
    };
  }
}

export function testConfig(): ConclaveConfig {
  const config = structuredClone(DEFAULT_CONFIG);
  config.agent = { command: 'agent', args: ['{promptFile}'], cwd: null, timeout_seconds: 30 };
  config.logs.level = 'silent';
  return config;
}
