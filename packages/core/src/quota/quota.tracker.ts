import type { AgentResult, QuotaLedger, ResourceClass } from '@conclave/shared';
import { QuotaError } from '../errors/conclave.errors.js';

export interface QuotaBudgets {
  /** 0 = unlimited */
  globalBudget: number;
  /** 0 = unlimited */
  perAgentBudget: number;
}

/**
 * Admission control for the expensive resource class.
 *
 * `tryAdmit` answers; `commit` consumes. The scheduler calls them back to back
 * on the single control thread, so no locking is needed. Each admission
 * authorizes exactly one commit: a retried attempt must be admitted again.
 */
export class QuotaTracker {
  private readonly globalBudget: number;
  private readonly perAgentBudget: number;
  private globalConsumed = 0;
  private readonly consumedByAgent = new Map<string, number>();
  /** Admissions granted but not yet committed, per agent. */
  private readonly pendingAdmissions = new Map<string, number>();

  constructor(budgets: QuotaBudgets) {
    this.globalBudget = Math.max(0, budgets.globalBudget);
    this.perAgentBudget = Math.max(0, budgets.perAgentBudget);
  }

  /**
   * Rebuild the ledger from persisted results. Only results that actually ran
   * on the expensive class count; a crash can under-report an in-flight
   * commit but never double-count one.
   */
  static fromResults(budgets: QuotaBudgets, results: Iterable<AgentResult>): QuotaTracker {
    const tracker = new QuotaTracker(budgets);
    for (const result of results) {
      if (result.resourceClass !== 'expensive' || result.reason === 'quota_denied') continue;
      tracker.globalConsumed++;
      tracker.consumedByAgent.set(
        result.agentId,
        (tracker.consumedByAgent.get(result.agentId) ?? 0) + 1,
      );
    }
    return tracker;
  }

  tryAdmit(agentId: string, resourceClass: ResourceClass): boolean {
    if (resourceClass === 'cheap') return true;

    const pending = this.pendingAdmissions.get(agentId) ?? 0;
    const pendingTotal = [...this.pendingAdmissions.values()].reduce((a, b) => a + b, 0);

    if (this.globalBudget > 0 && this.globalConsumed + pendingTotal >= this.globalBudget) {
      return false;
    }
    if (
      this.perAgentBudget > 0 &&
      (this.consumedByAgent.get(agentId) ?? 0) + pending >= this.perAgentBudget
    ) {
      return false;
    }

    this.pendingAdmissions.set(agentId, pending + 1);
    return true;
  }

  /** Record consumption for a task that `tryAdmit` let through. */
  commit(agentId: string, resourceClass: ResourceClass): void {
    if (resourceClass === 'cheap') return;

    const pending = this.pendingAdmissions.get(agentId) ?? 0;
    if (pending === 0) {
      throw new QuotaError(`commit for "${agentId}" without a matching admission`);
    }
    if (pending === 1) this.pendingAdmissions.delete(agentId);
    else this.pendingAdmissions.set(agentId, pending - 1);

    this.globalConsumed++;
    this.consumedByAgent.set(agentId, (this.consumedByAgent.get(agentId) ?? 0) + 1);
  }

  snapshot(): QuotaLedger {
    return {
      globalBudget: this.globalBudget,
      perAgentBudget: this.perAgentBudget,
      globalConsumed: this.globalConsumed,
      consumedByAgent: Object.fromEntries(this.consumedByAgent),
    };
  }
}
