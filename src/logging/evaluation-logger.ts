import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { MatchResult } from '../types/index.js';

export type EvaluationEvent =
  | { type: 'rules_loaded'; rulesPath: string; ruleCount: number }
  | {
      type: 'evaluation_complete';
      evaluationId: string;
      decision: string;
      matchedRules: string[];
      missingFields: string[];
    }
  | { type: 'run_error'; error: string };

export class EvaluationLogger {
  private logPath: string;
  private initialized = false;

  constructor(private logDir: string) {
    this.logPath = join(logDir, 'evaluations.jsonl');
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.logDir, { recursive: true });
    this.initialized = true;
  }

  async log(event: EvaluationEvent): Promise<void> {
    await this.ensureDir();
    const entry = {
      timestamp: new Date().toISOString(),
      ...event,
    };
    await appendFile(this.logPath, JSON.stringify(entry) + '\n', 'utf-8');
  }

  /** Records the outcome only; applicant values are never written. */
  async logResult(evaluationId: string, result: MatchResult, missingFields: string[]): Promise<void> {
    await this.log({
      type: 'evaluation_complete',
      evaluationId,
      decision: result.selectedAction.decision,
      matchedRules: result.matchedRules.map((r) => r.name),
      missingFields,
    });
  }

  getLogPath(): string {
    return this.logPath;
  }
}
