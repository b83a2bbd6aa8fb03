import { z } from 'zod';
import { ValidationError, issuesFromZod, summarizeIssues } from '../errors';
import type { ValidationIssue } from '../errors';
import type { CreateItemArgs, UpdateItemArgs } from '../types';

export const ITEM_NAME_MAX = 100;
export const ITEM_DESCRIPTION_MAX = 500;

const nameSchema = z
  .string({ required_error: 'name required' })
  .min(1, 'name required')
  .max(ITEM_NAME_MAX, `name must be at most ${ITEM_NAME_MAX} characters`);

const descriptionSchema = z
  .string()
  .max(ITEM_DESCRIPTION_MAX, `description must be at most ${ITEM_DESCRIPTION_MAX} characters`)
  .nullable();

export const itemCreateSchema = z.object({
  name: nameSchema,
  description: descriptionSchema.optional(),
});

export const itemUpdateSchema = z
  .object({
    name: nameSchema.optional(),
    description: descriptionSchema.optional(),
  })
  .refine((fields) => fields.name !== undefined || fields.description !== undefined, {
    message: 'no fields provided for update',
  });

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; issues: ValidationIssue[] };

export function validateItemCreate(input: unknown): ValidationResult<CreateItemArgs> {
  const parsed = itemCreateSchema.safeParse(input);
  if (!parsed.success) return { success: false, issues: issuesFromZod(parsed.error) };
  return { success: true, data: parsed.data };
}

export function validateItemUpdate(input: unknown): ValidationResult<UpdateItemArgs> {
  const parsed = itemUpdateSchema.safeParse(input);
  if (!parsed.success) return { success: false, issues: issuesFromZod(parsed.error) };
  return { success: true, data: parsed.data };
}

/** Unwraps a validation result, throwing `ValidationError` on failure. */
export function requireValid<T>(result: ValidationResult<T>, what = 'invalid item'): T {
  if (!result.success) {
    throw new ValidationError(`${what}: ${summarizeIssues(result.issues)}`, result.issues);
  }
  return result.data;
}
