/** The structured record every agent must emit in its DECISION_JSON block. */
export interface DecisionRecord {
  summary: string;
  files: string[];
  commands: string[];
  risks: string[];
  /** 0..1 */
  confidence: number;
}

export type ContractViolationCode =
  | 'missing_block'
  | 'ambiguous_contract'
  | 'malformed_json'
  | 'not_object'
  | 'missing_field'
  | 'wrong_type'
  | 'empty_field'
  | 'out_of_range'
  | 'unsafe_path'
  | 'missing_commands';

export interface ContractViolation {
  code: ContractViolationCode;
  /** Offending field, e.g. "confidence" or "files[2]". Null for block-level problems. */
  field: string | null;
  message: string;
}

export type ContractValidation =
  | { valid: true; decision: DecisionRecord; violations: [] }
  | { valid: false; decision: null; violations: ContractViolation[] };
