/**
 * Shared zod schemas for tool parameters
 */

import { z } from 'zod';
import type { ZodError } from 'zod';
import { DATE_PATTERN, TIME_PATTERN, currentTime, today } from './time.js';

export const dateParamSchema = z.string().regex(DATE_PATTERN, 'Date must be YYYY-MM-DD');

// HH:MM, or "now" for the current wall-clock time
export const timeParamSchema = z
  .string()
  .refine((v) => v === 'now' || TIME_PATTERN.test(v), 'Time must be HH:MM or "now"');

export const monthParamSchema = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).trim().padStart(2, '0'))
  .refine((v) => /^(0[1-9]|1[0-2])$/.test(v), 'Month must be 1-12');

export const yearParamSchema = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).trim())
  .refine((v) => /^\d{4}$/.test(v), 'Year must be YYYY');

/**
 * Resolve a time parameter, expanding "now"
 */
export function resolveTimeParam(value: string | undefined, now: Date = new Date()): string | undefined {
  if (value === undefined) return undefined;
  return value === 'now' ? currentTime(now) : value;
}

export function resolveDateParam(value: string | undefined, now: Date = new Date()): string {
  return value ?? today(now);
}

/**
 * Flatten zod issues into one message
 */
export function formatValidationError(error: ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || 'input'}: ${i.message}`).join('; ');
}
