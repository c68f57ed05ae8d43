import { z } from 'zod';

export const OPERATORS = ['>=', '<=', '>', '<', '=='] as const;

export const OperatorSchema = z.enum(OPERATORS);

export const ScalarSchema = z.union([z.number(), z.string(), z.boolean()]);

/** `[field, operator, target]` on the wire, an object once parsed. */
export const ConditionSchema = z
  .tuple([z.string().min(1), OperatorSchema, ScalarSchema])
  .transform(([field, operator, target]) => ({ field, operator, target }));

export const ActionSchema = z.object({
  decision: z.string().min(1),
  reason: z.string().default(''),
});

export const RuleSchema = z.object({
  name: z.string().min(1),
  priority: z.number().int().default(0),
  conditions: z.array(ConditionSchema).default([]),
  action: ActionSchema,
});

export const RuleDocumentSchema = z.array(RuleSchema);

export type RuleDocument = z.input<typeof RuleDocumentSchema>;
