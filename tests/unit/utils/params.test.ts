/**
 * Tool parameter schema tests
 */

import { describe, it, expect } from 'vitest';
import {
  dateParamSchema,
  timeParamSchema,
  monthParamSchema,
  yearParamSchema,
  resolveTimeParam,
  resolveDateParam,
} from '../../../src/utils/params.js';

describe('parameter schemas', () => {
  it('validates dates', () => {
    expect(dateParamSchema.safeParse('2020-02-01').success).toBe(true);
    expect(dateParamSchema.safeParse('2020-2-1').success).toBe(false);
  });

  it('accepts HH:MM and "now" as times', () => {
    expect(timeParamSchema.safeParse('08:30').success).toBe(true);
    expect(timeParamSchema.safeParse('now').success).toBe(true);
    expect(timeParamSchema.safeParse('8.30').success).toBe(false);
  });

  it('normalizes months from numbers and strings', () => {
    expect(monthParamSchema.parse(2)).toBe('02');
    expect(monthParamSchema.parse('12')).toBe('12');
    expect(monthParamSchema.safeParse(13).success).toBe(false);
    expect(monthParamSchema.safeParse('0').success).toBe(false);
  });

  it('normalizes years', () => {
    expect(yearParamSchema.parse(2020)).toBe('2020');
    expect(yearParamSchema.safeParse('20').success).toBe(false);
  });
});

describe('parameter resolution', () => {
  const now = new Date(2021, 8, 9, 17, 45);

  it('expands "now" to the current time', () => {
    expect(resolveTimeParam('now', now)).toBe('17:45');
    expect(resolveTimeParam('08:00', now)).toBe('08:00');
    expect(resolveTimeParam(undefined, now)).toBeUndefined();
  });

  it('defaults the date to today', () => {
    expect(resolveDateParam(undefined, now)).toBe('2021-09-09');
    expect(resolveDateParam('2020-01-01', now)).toBe('2020-01-01');
  });
});
