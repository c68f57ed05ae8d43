import type { Applicant, ConditionTrace, MatchResult, Rule, RuleSet, RuleTrace } from '../types/index.js';

export interface ReportOptions {
  applicant: Applicant;
  result: MatchResult;
  missingFields?: string[];
  trace?: RuleTrace[];
}

export interface ReportJson {
  decision: string;
  reason: string;
  matchedRules: { name: string; priority: number; decision: string; reason: string }[];
  missingFields: string[];
  applicant: Applicant;
}

function describeRule(rule: Rule): string {
  return `- **${rule.name}** (priority: ${rule.priority}): decision → ${rule.action.decision} — ${rule.action.reason}`;
}

function describeCondition(trace: ConditionTrace): string {
  const { field, operator, target } = trace.condition;
  const actual = trace.outcome === 'missing' ? 'field missing' : `actual ${String(trace.actual)}`;
  return `  - ${field} ${operator} ${String(target)}: ${trace.outcome} (${actual})`;
}

export function buildReportMarkdown(options: ReportOptions): string {
  const { applicant, result, missingFields = [], trace } = options;

  const lines: string[] = [
    '# Scholarship Advisory Result',
    `- Decision: ${result.selectedAction.decision}`,
    `- Reason: ${result.selectedAction.reason}`,
    '',
    '## Matched Rules (priority order)',
  ];

  if (result.matchedRules.length > 0) {
    for (const rule of result.matchedRules) {
      lines.push(describeRule(rule));
    }
  } else {
    lines.push('- No rules matched. Candidate requires manual review.');
  }

  if (missingFields.length > 0) {
    lines.push('');
    lines.push('## Missing Fields');
    for (const field of missingFields) {
      lines.push(`- ${field}`);
    }
  }

  if (trace) {
    lines.push('');
    lines.push('## Rule Checks');
    for (const entry of trace) {
      lines.push(`- ${entry.rule.name}: ${entry.matched ? 'matched' : 'not matched'}`);
      for (const condition of entry.conditions) {
        lines.push(describeCondition(condition));
      }
    }
  }

  lines.push('');
  lines.push('## Evaluation Trace (inputs)');
  for (const [field, value] of Object.entries(applicant)) {
    lines.push(`- ${field}: ${String(value)}`);
  }

  return lines.join('\n') + '\n';
}

export function buildReportJson(options: ReportOptions): ReportJson {
  const { applicant, result, missingFields = [] } = options;
  return {
    decision: result.selectedAction.decision,
    reason: result.selectedAction.reason,
    matchedRules: result.matchedRules.map((rule) => ({
      name: rule.name,
      priority: rule.priority,
      decision: rule.action.decision,
      reason: rule.action.reason,
    })),
    missingFields,
    applicant,
  };
}

/** The rule set as used, in its document form. */
export function formatRuleSet(rules: RuleSet): string {
  const document = rules.map((rule) => ({
    name: rule.name,
    priority: rule.priority,
    conditions: rule.conditions.map((c) => [c.field, c.operator, c.target]),
    action: { decision: rule.action.decision, reason: rule.action.reason },
  }));
  return JSON.stringify(document, null, 2);
}
