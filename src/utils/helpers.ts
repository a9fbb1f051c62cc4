import { formatInTimeZone } from 'date-fns-tz';
import type { SlotWindow } from '../engine/types.js';

/**
 * Human-readable slot label in the academy's timezone, e.g. "2025-03-03 (Mon) 14:00-14:30"
 */
export function formatSlotWindow(window: SlotWindow, timeZone: string): string {
  const start = formatInTimeZone(window.startsAt, timeZone, 'yyyy-MM-dd (EEE) HH:mm');
  const end = formatInTimeZone(window.endsAt, timeZone, 'HH:mm');
  return `${start}-${end}`;
}

/**
 * True when date-fns-tz can label times in the zone
 */
export function isValidTimeZone(timeZone: string): boolean {
  if (timeZone.length === 0) return false;
  try {
    formatInTimeZone(new Date(), timeZone, 'X');
    return true;
  } catch {
    return false;
  }
}

/**
 * Compare ids by UTF-16 code units, independent of locale
 */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
