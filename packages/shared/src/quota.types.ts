export interface QuotaLedger {
  /** 0 = unlimited */
  globalBudget: number;
  /** 0 = unlimited */
  perAgentBudget: number;
  globalConsumed: number;
  consumedByAgent: Record<string, number>;
}
