/**
 * Incipit Notes Validation Schemas
 */

import { z } from 'zod';
import { config } from '../../config';
import { AppError } from '../../utils/app-error';
import type { NoteInput, ReferenceSite, RestructureOptions } from './incipit.types';

// ============================================
// INPUT SCHEMAS
// ============================================

// Separator notes carry "-1"
export const noteIdSchema = z.string().regex(/^-?\d+$/, 'Note id must be a digit string');

export const noteInputSchema = z.object({
  id: noteIdSchema,
  rawText: z.string(),
});

export const referenceSiteSchema = z
  .object({
    paragraphText: z.string(),
    referenceId: noteIdSchema,
    characterOffset: z.number().int().min(0),
  })
  .refine(site => site.characterOffset <= site.paragraphText.length, {
    message: 'characterOffset is past the end of the paragraph',
    path: ['characterOffset'],
  });

export const restructureInputSchema = z.object({
  notes: z.array(noteInputSchema),
  references: z.array(referenceSiteSchema),
});

// ============================================
// OPTION SCHEMAS
// ============================================

export const restructureOptionsSchema = z
  .object({
    wordCount: z.number().int().positive().default(config.incipit.wordCount),
    emphasisStyle: z.enum(['bold', 'italic']).default(config.incipit.emphasisStyle),
    applyCitationStyle: z.boolean().default(config.incipit.applyCitationStyle),
    appendToBody: z.boolean().default(true),
  })
  .strict();

// ============================================
// TYPE EXPORTS
// ============================================

export type RestructureInput = z.infer<typeof restructureInputSchema>;
export type RestructureOptionsInput = z.input<typeof restructureOptionsSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export function parseRestructureOptions(options: RestructureOptionsInput = {}): RestructureOptions {
  const result = restructureOptionsSchema.safeParse(options);
  if (!result.success) {
    throw AppError.badRequest(`Invalid options: ${describeIssues(result.error)}`, 'INVALID_OPTIONS');
  }
  return result.data;
}

export function parseRestructureInput(input: {
  notes: NoteInput[];
  references: ReferenceSite[];
}): RestructureInput {
  const result = restructureInputSchema.safeParse(input);
  if (!result.success) {
    throw AppError.structural(`Invalid note input: ${describeIssues(result.error)}`, 'INVALID_NOTE_INPUT');
  }
  return result.data;
}
