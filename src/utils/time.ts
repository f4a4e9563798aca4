/**
 * Wall-clock and calendar helpers
 *
 * All values are naive local times; no timezone conversion happens anywhere.
 */

export const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
export const TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

/**
 * Minutes since midnight for an HH:MM string
 */
export function toMinutes(time: string): number {
  const [hours, minutes] = time.split(':');
  return Number(hours) * 60 + Number(minutes);
}

/**
 * Round to 2 decimal places for reporting, halves away from zero
 */
export function roundHours(value: number): number {
  const rounded = (Math.sign(value) * Math.round(Math.abs(value) * 100)) / 100;
  // Avoid reporting -0
  return rounded === 0 ? 0 : rounded;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function formatTime(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function today(now: Date = new Date()): string {
  return formatDate(now);
}

export function currentTime(now: Date = new Date()): string {
  return formatTime(now);
}

export function currentYear(now: Date = new Date()): string {
  return String(now.getFullYear());
}

export function currentMonth(now: Date = new Date()): string {
  return pad(now.getMonth() + 1);
}

/**
 * Zero-pad a month given as "2" or "02"
 */
export function normalizeMonth(month: string | number): string {
  return String(month).trim().padStart(2, '0');
}
