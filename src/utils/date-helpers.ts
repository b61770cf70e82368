import { formatInTimeZone } from 'date-fns-tz';
import { addDays, differenceInCalendarDays, format, isValid, parse, parseISO } from 'date-fns';
import { config } from '../config/index.js';
import { DEADLINE_FORMAT, MAX_DEADLINE_DAYS } from '../config/constants.js';
import type { TaskStatus, DueWindow } from '../types/task.js';
import { ValidationError } from './error-handler.js';

const tz = config.TIMEZONE;

// Accepted explicit input formats, first match wins
const INPUT_FORMATS = [DEADLINE_FORMAT, 'dd.MM.yyyy'];

export function formatDateTime(date: Date): string {
  return formatInTimeZone(date, tz, 'MMM d, yyyy h:mm a zzz');
}

export function formatDeadline(deadline: string): string {
  return format(parseISO(deadline), 'EEE, MMM d, yyyy');
}

/** Today's calendar date in the configured timezone, as `yyyy-MM-dd`. */
export function todayInTimezone(now: Date = new Date()): string {
  return formatInTimeZone(now, tz, DEADLINE_FORMAT);
}

function shiftDate(day: string, days: number): string {
  const shifted = addDays(parseISO(day), days);
  if (!isValid(shifted)) {
    throw new ValidationError(`Cannot shift ${day} by ${days} days`, { day, days });
  }
  return format(shifted, DEADLINE_FORMAT);
}

function parseStrict(input: string, pattern: string): string | null {
  const parsed = parse(input, pattern, new Date(2000, 0, 1));
  if (!isValid(parsed) || format(parsed, pattern) !== input) return null;
  return format(parsed, DEADLINE_FORMAT);
}

/**
 * Normalizes user-supplied deadline text to `yyyy-MM-dd`.
 * Accepts ISO dates, `dd.MM.yyyy`, and the shortcuts offered by the bot menus.
 */
export function parseDeadline(input: string, now: Date = new Date()): string {
  const lower = input.toLowerCase().trim();
  const today = todayInTimezone(now);

  if (lower === 'today' || lower === 'eod') return today;
  if (lower === 'tomorrow') return shiftDate(today, 1);
  if (lower === 'week') return shiftDate(today, 7);

  const daysMatch = lower.match(/^(?:in\s+)?(\d+)\s*days?$/);
  if (daysMatch) {
    const days = parseInt(daysMatch[1], 10);
    if (days > MAX_DEADLINE_DAYS) {
      throw new ValidationError(`Deadline is too far away, at most ${MAX_DEADLINE_DAYS} days ahead`, { input });
    }
    return shiftDate(today, days);
  }

  for (const pattern of INPUT_FORMATS) {
    const normalized = parseStrict(lower, pattern);
    if (normalized) return normalized;
  }

  throw new ValidationError(`Invalid deadline "${input}", expected YYYY-MM-DD or DD.MM.YYYY`, { input });
}

export function isOverdue(task: { status: TaskStatus; deadline: string }, now: Date = new Date()): boolean {
  return task.status === 'open' && task.deadline < todayInTimezone(now);
}

/** Inclusive deadline range for a due window. */
export function dueRange(window: DueWindow, now: Date = new Date()): { from: string; to: string } {
  const today = todayInTimezone(now);
  switch (window) {
    case 'today':
      return { from: today, to: today };
    case 'tomorrow': {
      const tomorrow = shiftDate(today, 1);
      return { from: tomorrow, to: tomorrow };
    }
    case 'week':
      return { from: today, to: shiftDate(today, 7) };
    case 'month':
      return { from: today, to: shiftDate(today, 30) };
  }
}

export function timeUntilDeadline(deadline: string, now: Date = new Date()): string {
  const days = differenceInCalendarDays(parseISO(deadline), parseISO(todayInTimezone(now)));

  if (days < 0) return `overdue by ${-days}d`;
  if (days === 0) return 'due today';
  return `${days}d left`;
}
