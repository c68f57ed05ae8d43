import type { Applicant, RuleSet } from '../types/index.js';

/** Distinct condition fields, in the order the rules first reference them. */
export function referencedFields(rules: RuleSet): string[] {
  const seen = new Set<string>();
  for (const rule of rules) {
    for (const condition of rule.conditions) {
      seen.add(condition.field);
    }
  }
  return [...seen];
}

export function findMissingFields(applicant: Applicant, rules: RuleSet): string[] {
  return referencedFields(rules).filter((field) => !Object.hasOwn(applicant, field));
}
