import { z } from 'zod';
import { ScalarSchema } from './rule.schema.js';

export const ApplicantSchema = z.record(ScalarSchema);

export const EvaluationOptionsSchema = z.object({
  format: z.enum(['markdown', 'json']).optional(),
  logDir: z.string().min(1).optional(),
});

export const EvaluationInputSchema = z.object({
  applicant: ApplicantSchema,
  options: EvaluationOptionsSchema.optional(),
});

export type EvaluationInput = z.output<typeof EvaluationInputSchema>;
export type EvaluationOptions = z.output<typeof EvaluationOptionsSchema>;
