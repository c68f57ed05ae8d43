export type * from './rule.js';
export type * from './applicant.js';
export type * from './match-result.js';
