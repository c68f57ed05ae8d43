import { evaluateCondition } from './condition-evaluator.js';
import type {
  Action,
  Applicant,
  Condition,
  ConditionTrace,
  MatchResult,
  Rule,
  RuleSet,
  RuleTrace,
} from '../types/index.js';

export const NO_MATCH_ACTION: Action = Object.freeze({
  decision: 'NO_MATCH',
  reason: 'No rule matched. Candidate requires manual review or different policy.',
});

function conditionHolds(applicant: Applicant, condition: Condition): boolean {
  if (!Object.hasOwn(applicant, condition.field)) return false;
  return evaluateCondition(applicant[condition.field], condition.operator, condition.target);
}

function ruleMatches(applicant: Applicant, rule: Rule): boolean {
  // every() stops at the first failing condition
  return rule.conditions.every((condition) => conditionHolds(applicant, condition));
}

function byPriorityDesc(a: Rule, b: Rule): number {
  return b.priority - a.priority;
}

/**
 * Match an applicant against every rule and pick the winning action.
 *
 * All rules are checked independently. The matched set is sorted by
 * priority, highest first; Array.prototype.sort is stable, so rules of
 * equal priority keep their configuration order and the earliest one wins.
 * Without a match the selected action is {@link NO_MATCH_ACTION}.
 */
export function evaluateRules(applicant: Applicant, rules: RuleSet): MatchResult {
  const matchedRules = rules
    .filter((rule) => ruleMatches(applicant, rule))
    .sort(byPriorityDesc);

  const selectedAction = matchedRules.length > 0
    ? matchedRules[0].action
    : { ...NO_MATCH_ACTION };

  return { selectedAction, matchedRules };
}

function traceCondition(applicant: Applicant, condition: Condition): ConditionTrace {
  if (!Object.hasOwn(applicant, condition.field)) {
    return { condition, outcome: 'missing' };
  }
  const actual = applicant[condition.field];
  return {
    condition,
    outcome: evaluateCondition(actual, condition.operator, condition.target) ? 'met' : 'failed',
    actual,
  };
}

/**
 * Per-rule, per-condition outcomes in configuration order. Every condition
 * is reported, including those after the first failure.
 */
export function traceRules(applicant: Applicant, rules: RuleSet): RuleTrace[] {
  return rules.map((rule) => {
    const conditions = rule.conditions.map((condition) => traceCondition(applicant, condition));
    return {
      rule,
      matched: conditions.every((c) => c.outcome === 'met'),
      conditions,
    };
  });
}

/** Binds a loaded rule set so callers only pass the applicant. */
export class RuleMatcher {
  constructor(private readonly rules: RuleSet) {}

  evaluate(applicant: Applicant): MatchResult {
    return evaluateRules(applicant, this.rules);
  }

  trace(applicant: Applicant): RuleTrace[] {
    return traceRules(applicant, this.rules);
  }

  getRules(): RuleSet {
    return this.rules;
  }
}
