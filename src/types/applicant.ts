import type { Scalar } from './rule.js';

export type Applicant = Readonly<Record<string, Scalar>>;
