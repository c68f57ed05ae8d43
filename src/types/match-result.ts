import type { Action, Condition, Rule } from './rule.js';

export interface MatchResult {
  selectedAction: Action;
  /** Every satisfied rule, priority descending. */
  matchedRules: Rule[];
}

export type ConditionOutcome = 'met' | 'failed' | 'missing';

export interface ConditionTrace {
  condition: Condition;
  outcome: ConditionOutcome;
  actual?: Condition['target'];
}

export interface RuleTrace {
  rule: Rule;
  matched: boolean;
  conditions: ConditionTrace[];
}
