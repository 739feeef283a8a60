/**
 * Completion request schemas
 */

import { z } from 'zod';
import { NonEmptyString } from './common.js';

export const ContextEntrySchema = z.object({
  content: z.string(),
  role: z.string().optional(),
  source: z.string().optional(),
});

export const CompletionRequestSchema = z.object({
  prompt: z.string().refine((value) => value.trim().length > 0, 'Prompt cannot be empty'),
  context: z.array(ContextEntrySchema).optional(),
  model: NonEmptyString.optional(),
});

export type CompletionRequestInput = z.infer<typeof CompletionRequestSchema>;
