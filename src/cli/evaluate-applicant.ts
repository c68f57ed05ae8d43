#!/usr/bin/env node
/**
 * CLI: evaluate one applicant from stdin JSON against a rule file.
 *
 * Usage: echo '{"applicant":{"cgpa":3.8}}' | npx tsx src/cli/evaluate-applicant.ts [rules.json]
 *
 * The rule file is the first argument, else $SCHOLARSHIP_RULES, else the
 * bundled rules/scholarship.json. Markdown goes to stdout by default;
 * `"options": {"format": "json"}` switches to JSONL events.
 */

import { RuleSetProvider, resolveRulesPath } from '../rules/loader.js';
import { runEvaluateCommand } from './evaluate-command.js';
import { formatRuleSet } from '../report/report-writer.js';
import { extractMessage } from '../exception/errors.js';

const HELP = `Usage: evaluate-applicant [--rules-only] [rules.json] < input.json

Input: {"applicant": {"cgpa": 3.8, ...}, "options": {"format": "markdown" | "json", "logDir": "..."}}

Notes:
- All conditions inside a rule must hold (logical AND).
- If several rules match, the one with the highest priority is selected.
  Equal priorities keep rule file order.
- Supported operators: >=, <=, >, <, ==
- If no rule matches, the decision is NO_MATCH and the applicant needs manual review.
`;

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function write(chunk: string): void {
  process.stdout.write(chunk);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  if (args.includes('--help') || args.includes('-h')) {
    write(HELP);
    return;
  }

  const rulesOnly = args.includes('--rules-only');
  const rulesPath = resolveRulesPath(args.find((a) => !a.startsWith('-')));
  const rules = new RuleSetProvider(rulesPath);

  if (rulesOnly) {
    write(formatRuleSet(await rules.get()) + '\n');
    return;
  }

  const raw = await readStdin();
  process.exitCode = await runEvaluateCommand(raw, { rules, write });
}

main().catch((err: unknown) => {
  write(JSON.stringify({ type: 'run_error', error: extractMessage(err) }) + '\n');
  process.exitCode = 1;
});
