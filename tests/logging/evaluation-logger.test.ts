import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { EvaluationLogger } from '../../src/logging/evaluation-logger.js';
import type { MatchResult } from '../../src/types/index.js';

async function readEntries(path: string): Promise<Record<string, unknown>[]> {
  const content = await readFile(path, 'utf-8');
  return content.trim().split('\n').map((line) => JSON.parse(line) as Record<string, unknown>);
}

describe('EvaluationLogger', () => {
  let logDir: string;
  let logger: EvaluationLogger;

  beforeEach(() => {
    logDir = join(tmpdir(), `evaluation-logger-test-${randomUUID()}`);
    logger = new EvaluationLogger(logDir);
  });

  afterEach(async () => {
    await rm(logDir, { recursive: true, force: true });
  });

  it('creates the log directory and evaluations.jsonl', async () => {
    await logger.log({ type: 'rules_loaded', rulesPath: '/rules.json', ruleCount: 5 });

    const entries = await readEntries(join(logDir, 'evaluations.jsonl'));
    expect(entries).toHaveLength(1);
    expect(entries[0].type).toBe('rules_loaded');
    expect(entries[0].ruleCount).toBe(5);
    expect(typeof entries[0].timestamp).toBe('string');
  });

  it('appends events', async () => {
    await logger.log({ type: 'rules_loaded', rulesPath: '/rules.json', ruleCount: 5 });
    await logger.log({ type: 'run_error', error: 'boom' });

    const entries = await readEntries(logger.getLogPath());
    expect(entries.map((e) => e.type)).toEqual(['rules_loaded', 'run_error']);
    expect(entries[1].error).toBe('boom');
  });

  it('logs the decision and matched rule names without applicant data', async () => {
    const result: MatchResult = {
      selectedAction: { decision: 'REVIEW', reason: 'High need' },
      matchedRules: [
        { name: 'Need-based review', priority: 70, conditions: [], action: { decision: 'REVIEW', reason: 'High need' } },
      ],
    };

    await logger.logResult('eval-1', result, ['disciplinary_actions']);

    const [entry] = await readEntries(logger.getLogPath());
    expect(entry).toEqual({
      timestamp: entry.timestamp,
      type: 'evaluation_complete',
      evaluationId: 'eval-1',
      decision: 'REVIEW',
      matchedRules: ['Need-based review'],
      missingFields: ['disciplinary_actions'],
    });
  });

  it('returns the log path inside the log directory', () => {
    expect(logger.getLogPath()).toBe(join(logDir, 'evaluations.jsonl'));
  });
});
