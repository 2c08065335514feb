/**
 * Field schemas shared by several modules
 * @module validation
 */

import { z } from 'zod';

export const MAX_NAME_LENGTH = 1000;
export const MAX_TEXT_LENGTH = 5000;
export const MAX_BULK_IDS = 500;

export const PRIORITIES = ['high', 'medium', 'low'] as const;
export type Priority = (typeof PRIORITIES)[number];

/**
 * Trimmed, required short string
 */
export function requiredName(message: string) {
  return z
    .string({ required_error: message, invalid_type_error: message })
    .trim()
    .min(1, message)
    .max(MAX_NAME_LENGTH, `Must be at most ${MAX_NAME_LENGTH} characters`);
}

export const descriptionSchema = z
  .string({ invalid_type_error: 'Description must be a string' })
  .trim()
  .max(MAX_TEXT_LENGTH, `Description must be at most ${MAX_TEXT_LENGTH} characters`);

export const prioritySchema = z.enum(PRIORITIES, {
  errorMap: () => ({ message: 'Priority must be one of high, medium, low' }),
});

/**
 * Calendar date `YYYY-MM-DD` that actually exists
 */
export const dueDateSchema = z
  .string({ invalid_type_error: 'Due date must be a YYYY-MM-DD string' })
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Due date must be a YYYY-MM-DD string')
  .refine((value) => {
    const date = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
  }, 'Due date is not a valid calendar date');

/**
 * A non-empty list of distinct item ids
 */
export const idListSchema = z
  .array(z.number({ invalid_type_error: 'Ids must be integers' }).int('Ids must be integers').positive('Ids must be positive'), {
    required_error: 'ids is required',
    invalid_type_error: 'ids must be an array',
  })
  .min(1, 'At least one id is required')
  .max(MAX_BULK_IDS, `At most ${MAX_BULK_IDS} ids are allowed`)
  .refine((ids) => new Set(ids).size === ids.length, 'Ids must not contain duplicates');
