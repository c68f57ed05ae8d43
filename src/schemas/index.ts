export {
  OPERATORS,
  OperatorSchema,
  ScalarSchema,
  ConditionSchema,
  ActionSchema,
  RuleSchema,
  RuleDocumentSchema,
} from './rule.schema.js';
export type { RuleDocument } from './rule.schema.js';
export {
  ApplicantSchema,
  EvaluationOptionsSchema,
  EvaluationInputSchema,
} from './applicant.schema.js';
export type { EvaluationInput, EvaluationOptions } from './applicant.schema.js';
