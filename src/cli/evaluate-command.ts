import { EvaluationInputSchema } from '../schemas/index.js';
import type { EvaluationInput, EvaluationOptions } from '../schemas/index.js';
import { ApplicantParseError, extractMessage } from '../exception/errors.js';
import { formatIssues, type RuleSetProvider } from '../rules/loader.js';
import { RuleMatcher } from '../engines/rule-matcher.js';
import { findMissingFields } from '../engines/field-check.js';
import { EvaluationLogger } from '../logging/evaluation-logger.js';
import { buildReportJson, buildReportMarkdown } from '../report/report-writer.js';

export const DEFAULT_OPTIONS: Required<Pick<EvaluationOptions, 'format'>> = {
  format: 'markdown',
};

export interface EvaluateCommandDeps {
  rules: RuleSetProvider;
  write: (chunk: string) => void;
  createId?: () => string;
}

function defaultId(): string {
  return `eval-${Date.now()}-${Math.random().toString(36).slice(2, 7)}`;
}

export function parseEvaluationInput(raw: string): EvaluationInput {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ApplicantParseError('Invalid JSON on stdin');
  }

  const parsed = EvaluationInputSchema.safeParse(json);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error.issues);
    throw new ApplicantParseError(`Invalid evaluation input: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

/**
 * Evaluate one applicant read from `raw` and write the report.
 * Resolves to the process exit code.
 */
export async function runEvaluateCommand(raw: string, deps: EvaluateCommandDeps): Promise<number> {
  const emit = (event: Record<string, unknown>): void => {
    deps.write(JSON.stringify(event) + '\n');
  };

  let logger: EvaluationLogger | null = null;
  try {
    const input = parseEvaluationInput(raw);
    const format = input.options?.format ?? DEFAULT_OPTIONS.format;
    if (input.options?.logDir) {
      logger = new EvaluationLogger(input.options.logDir);
    }

    const rules = await deps.rules.get();
    await logger?.log({ type: 'rules_loaded', rulesPath: deps.rules.getPath(), ruleCount: rules.length });

    const evaluationId = (deps.createId ?? defaultId)();
    const matcher = new RuleMatcher(rules);
    const result = matcher.evaluate(input.applicant);
    const missingFields = findMissingFields(input.applicant, rules);
    await logger?.logResult(evaluationId, result, missingFields);

    if (format === 'json') {
      emit({ type: 'evaluation_start', evaluationId, ruleCount: rules.length });
      emit({
        type: 'evaluation_complete',
        evaluationId,
        ...buildReportJson({ applicant: input.applicant, result, missingFields }),
      });
    } else {
      deps.write(buildReportMarkdown({
        applicant: input.applicant,
        result,
        missingFields,
        trace: matcher.trace(input.applicant),
      }));
    }
    return 0;
  } catch (err) {
    const error = extractMessage(err);
    emit({ type: 'run_error', error });
    try {
      await logger?.log({ type: 'run_error', error });
    } catch (logErr) {
      // the logger itself may be what failed
      emit({ type: 'log_error', error: extractMessage(logErr) });
    }
    return 1;
  }
}
