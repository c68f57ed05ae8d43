export { evaluateCondition } from './engines/condition-evaluator.js';
export { evaluateRules, traceRules, RuleMatcher, NO_MATCH_ACTION } from './engines/rule-matcher.js';
export { referencedFields, findMissingFields } from './engines/field-check.js';
export {
  loadRuleSet,
  parseRuleSet,
  resolveRulesPath,
  RuleSetProvider,
  DEFAULT_RULES_PATH,
  RULES_PATH_ENV,
} from './rules/loader.js';
export { EvaluationLogger } from './logging/evaluation-logger.js';
export type { EvaluationEvent } from './logging/evaluation-logger.js';
export { buildReportMarkdown, buildReportJson, formatRuleSet } from './report/report-writer.js';
export type { ReportOptions, ReportJson } from './report/report-writer.js';
export { RuleSetLoadError, ApplicantParseError } from './exception/errors.js';
export * from './schemas/index.js';
export type * from './types/index.js';
