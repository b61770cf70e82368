import { describe, expect, it } from 'vitest';
import { dueRange, isOverdue, parseDeadline, timeUntilDeadline, todayInTimezone } from './date-helpers.js';
import { ValidationError } from './error-handler.js';

const now = new Date('2025-01-05T12:00:00Z');

describe('parseDeadline', () => {
  it('resolves shortcuts relative to today', () => {
    expect(parseDeadline('today', now)).toBe('2025-01-05');
    expect(parseDeadline('EOD', now)).toBe('2025-01-05');
    expect(parseDeadline('tomorrow', now)).toBe('2025-01-06');
    expect(parseDeadline('week', now)).toBe('2025-01-12');
    expect(parseDeadline('3days', now)).toBe('2025-01-08');
    expect(parseDeadline('in 2 days', now)).toBe('2025-01-07');
  });

  it('accepts ISO and dotted dates', () => {
    expect(parseDeadline('2025-01-10', now)).toBe('2025-01-10');
    expect(parseDeadline(' 10.01.2025 ', now)).toBe('2025-01-10');
  });

  it('rejects impossible and unknown input', () => {
    expect(() => parseDeadline('2025-02-30', now)).toThrow(ValidationError);
    expect(() => parseDeadline('soon', now)).toThrow('Invalid deadline "soon"');
  });

  it('rejects relative deadlines beyond the supported range', () => {
    expect(parseDeadline('3650 days', now)).toBe('2035-01-03');
    expect(() => parseDeadline('3651 days', now)).toThrow('Deadline is too far away, at most 3650 days ahead');
    expect(() => parseDeadline('99999999999 days', now)).toThrow(ValidationError);
  });
});

describe('isOverdue', () => {
  it('is true only for open tasks whose deadline day has passed', () => {
    expect(isOverdue({ status: 'open', deadline: '2025-01-04' }, now)).toBe(true);
    expect(isOverdue({ status: 'open', deadline: '2025-01-05' }, now)).toBe(false);
    expect(isOverdue({ status: 'completed', deadline: '2025-01-01' }, now)).toBe(false);
  });
});

describe('dueRange', () => {
  it('returns inclusive windows', () => {
    expect(dueRange('today', now)).toEqual({ from: '2025-01-05', to: '2025-01-05' });
    expect(dueRange('tomorrow', now)).toEqual({ from: '2025-01-06', to: '2025-01-06' });
    expect(dueRange('week', now)).toEqual({ from: '2025-01-05', to: '2025-01-12' });
    expect(dueRange('month', now)).toEqual({ from: '2025-01-05', to: '2025-02-04' });
  });
});

describe('timeUntilDeadline', () => {
  it('describes the distance in calendar days', () => {
    expect(timeUntilDeadline('2025-01-03', now)).toBe('overdue by 2d');
    expect(timeUntilDeadline('2025-01-05', now)).toBe('due today');
    expect(timeUntilDeadline('2025-01-10', now)).toBe('5d left');
  });
});

describe('todayInTimezone', () => {
  it('formats the configured zone date', () => {
    expect(todayInTimezone(new Date('2025-01-05T23:30:00Z'))).toBe('2025-01-05');
  });
});
