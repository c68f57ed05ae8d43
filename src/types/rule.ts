export type Operator = '>=' | '<=' | '>' | '<' | '==';

export type Scalar = number | string | boolean;

/** Decisions shipped with the default rule set. Configuration may add others. */
export type KnownDecision = 'AWARD_FULL' | 'AWARD_PARTIAL' | 'REVIEW' | 'REJECT';

export type Decision = KnownDecision | 'NO_MATCH' | (string & {});

export interface Condition {
  readonly field: string;
  readonly operator: Operator;
  readonly target: Scalar;
}

export interface Action {
  readonly decision: Decision;
  readonly reason: string;
}

export interface Rule {
  readonly name: string;
  /** Higher wins. Ties keep configuration order. */
  readonly priority: number;
  readonly conditions: readonly Condition[];
  readonly action: Action;
}

export type RuleSet = readonly Rule[];
