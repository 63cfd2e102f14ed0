import { z } from 'zod';

import { INTENT_TYPES } from './types';

export const IntentTypeEnum = z.enum(INTENT_TYPES);

export const ClassifierResponseSchema = z.object({
  intent: IntentTypeEnum,
  confidence: z.number().min(0).max(1),
  entities: z.record(z.unknown()).nullable().optional(),
  rationale: z.string().optional(),
});

export const ClassifierRequestSchema = z.object({
  text: z.string().min(1),
  context: z.string().default(''),
  history: z
    .array(
      z.object({
        role: z.enum(['user', 'assistant']),
        content: z.string(),
      }),
    )
    .default([]),
  intents: z.array(IntentTypeEnum).default([]),
});

export type ClassifierRequestBody = z.infer<typeof ClassifierRequestSchema>;
