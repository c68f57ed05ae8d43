import { describe, it, expect } from 'vitest';
import { referencedFields, findMissingFields } from '../../src/engines/field-check.js';
import type { RuleSet } from '../../src/types/index.js';

const rules: RuleSet = [
  {
    name: 'merit',
    priority: 10,
    conditions: [
      { field: 'cgpa', operator: '>=', target: 3.5 },
      { field: 'family_income', operator: '<=', target: 8000 },
    ],
    action: { decision: 'AWARD_FULL', reason: 'merit' },
  },
  {
    name: 'discipline',
    priority: 5,
    conditions: [
      { field: 'disciplinary_actions', operator: '>=', target: 2 },
      { field: 'cgpa', operator: '>', target: 0 },
    ],
    action: { decision: 'REJECT', reason: 'discipline' },
  },
];

describe('referencedFields', () => {
  it('lists each field once in first-reference order', () => {
    expect(referencedFields(rules)).toEqual(['cgpa', 'family_income', 'disciplinary_actions']);
  });

  it('returns an empty list for rules without conditions', () => {
    expect(referencedFields([])).toEqual([]);
  });
});

describe('findMissingFields', () => {
  it('returns the referenced fields absent from the applicant', () => {
    expect(findMissingFields({ cgpa: 3.9 }, rules)).toEqual(['family_income', 'disciplinary_actions']);
  });

  it('returns nothing when every referenced field is present', () => {
    const applicant = { cgpa: 3.9, family_income: 100, disciplinary_actions: 0, extra: 'ignored' };
    expect(findMissingFields(applicant, rules)).toEqual([]);
  });
});
