import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import type { ZodIssue } from 'zod';
import { RuleDocumentSchema } from '../schemas/index.js';
import { RuleSetLoadError, extractMessage } from '../exception/errors.js';
import type { Rule, RuleSet } from '../types/index.js';

export const DEFAULT_RULES_PATH = fileURLToPath(
  new URL('../../rules/scholarship.json', import.meta.url),
);

export const RULES_PATH_ENV = 'SCHOLARSHIP_RULES';

export function formatIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

function freezeRule(rule: Rule): Rule {
  return Object.freeze({
    name: rule.name,
    priority: rule.priority,
    conditions: Object.freeze(rule.conditions.map((c) => Object.freeze({ ...c }))),
    action: Object.freeze({ ...rule.action }),
  });
}

/**
 * Validate an already-parsed rule document and return it as a frozen
 * rule set. `source` only labels errors.
 */
export function parseRuleSet(document: unknown, source: string): RuleSet {
  const parsed = RuleDocumentSchema.safeParse(document);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error.issues);
    throw new RuleSetLoadError(`Invalid rule document ${source}: ${issues.join('; ')}`, source, issues);
  }
  return Object.freeze(parsed.data.map(freezeRule));
}

export async function loadRuleSet(path: string): Promise<RuleSet> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new RuleSetLoadError(`Cannot read rule file ${path}: ${extractMessage(err)}`, path);
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (err) {
    throw new RuleSetLoadError(`Rule file ${path} is not valid JSON: ${extractMessage(err)}`, path);
  }

  return parseRuleSet(document, path);
}

/** CLI argument, then environment, then the bundled rule file. */
export function resolveRulesPath(
  cliPath: string | undefined,
  env: Record<string, string | undefined> = process.env,
): string {
  return cliPath ?? env[RULES_PATH_ENV] ?? DEFAULT_RULES_PATH;
}

/**
 * Loads a rule file at most once. Concurrent callers share the same
 * pending load; a failed load is not cached.
 */
export class RuleSetProvider {
  private pending: Promise<RuleSet> | null = null;

  constructor(private readonly path: string) {}

  get(): Promise<RuleSet> {
    if (!this.pending) {
      this.pending = loadRuleSet(this.path).catch((err: unknown) => {
        this.pending = null;
        throw err;
      });
    }
    return this.pending;
  }

  getPath(): string {
    return this.path;
  }
}
