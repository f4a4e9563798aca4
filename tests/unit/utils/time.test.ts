/**
 * Time helper tests
 */

import { describe, it, expect } from 'vitest';
import {
  toMinutes,
  roundHours,
  today,
  currentTime,
  currentYear,
  currentMonth,
  normalizeMonth,
  TIME_PATTERN,
} from '../../../src/utils/time.js';

describe('time utils', () => {
  it('converts HH:MM to minutes since midnight', () => {
    expect(toMinutes('00:00')).toBe(0);
    expect(toMinutes('07:05')).toBe(425);
    expect(toMinutes('23:59')).toBe(1439);
  });

  it('rounds to two decimals without reporting negative zero', () => {
    expect(roundHours(7.166666)).toBe(7.17);
    expect(roundHours(-0.6333)).toBe(-0.63);
    expect(Object.is(roundHours(-0.001), 0)).toBe(true);
  });

  it('rounds halves away from zero in both directions', () => {
    expect(roundHours(0.125)).toBe(0.13);
    expect(roundHours(-0.125)).toBe(-0.13);
    expect(roundHours(-2.5)).toBe(-2.5);
  });

  it('formats the local date and time of a clock', () => {
    const now = new Date(2020, 1, 3, 7, 5);
    expect(today(now)).toBe('2020-02-03');
    expect(currentTime(now)).toBe('07:05');
    expect(currentYear(now)).toBe('2020');
    expect(currentMonth(now)).toBe('02');
  });

  it('pads months', () => {
    expect(normalizeMonth(3)).toBe('03');
    expect(normalizeMonth('11')).toBe('11');
    expect(normalizeMonth(' 7')).toBe('07');
  });

  it('accepts only valid wall-clock times', () => {
    expect(TIME_PATTERN.test('08:00')).toBe(true);
    expect(TIME_PATTERN.test('23:59')).toBe(true);
    expect(TIME_PATTERN.test('24:00')).toBe(false);
    expect(TIME_PATTERN.test('8:00')).toBe(false);
  });
});
