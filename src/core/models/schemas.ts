/**
 * Zod schemas for decision log input.
 */

import { z } from 'zod/v4';
import { parseEffectiveness } from './display.js';

const nonBlank = (field: string) =>
  z.string().refine((value) => value.trim().length > 0, { message: `${field} must not be empty` });

export const EffectivenessSchema = z.string().transform((value, ctx) => {
  const parsed = parseEffectiveness(value);
  if (parsed === null) {
    ctx.addIssue({
      code: 'custom',
      message: `invalid effectiveness "${value}" (expected Effective, SomewhatEffective or NotEffective)`,
    });
    return z.NEVER;
  }
  return parsed;
});

export const DecisionRecordSchema = z.object({
  id: nonBlank('id'),
  owner: nonBlank('owner'),
  team: nonBlank('team'),
  decisionDate: z.iso.date(),
  outcomeDate: z.iso.date(),
  goal: z.string(),
  whatWasTried: z.string(),
  inputsUsed: z.string(),
  result: z.string(),
  effectiveness: EffectivenessSchema,
  repeatableWin: z.boolean(),
  starDecision: z.boolean(),
}).refine((record) => record.outcomeDate >= record.decisionDate, {
  message: 'outcomeDate must not be before decisionDate',
  path: ['outcomeDate'],
});

/** Top-level shape of a decision source document */
export const DecisionDocumentSchema = z.union([
  z.array(z.unknown()),
  z.object({ decisions: z.array(z.unknown()) }),
]);

