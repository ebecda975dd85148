import type { DayOfWeek, ScheduleSlot } from '@/types';

export interface IntervalSlot {
  afterPeriod: number;
  duration: number;
}

export interface SchoolDayConfig {
  startTime: string; // e.g., "08:00"
  periodDuration: number; // in minutes
  numberOfPeriods: number;
  intervalSlots: IntervalSlot[];
}

export interface DayPeriod {
  number: number;
  startTime: string;
  endTime: string;
}

export interface MinuteInterval {
  start: number;
  end: number;
}

const TIME_PATTERN = /^(\d{1,2}):(\d{2})$/;

/**
 * Parse an HH:MM string into minutes from midnight
 * @returns null when the value is not a valid 24-hour time
 */
export function parseTime(value: string | null | undefined): number | null {
  if (!value) return null;
  const match = TIME_PATTERN.exec(value.trim());
  if (!match) return null;

  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return null;

  return hour * 60 + minute;
}

export function formatTime(totalMinutes: number): string {
  const hour = Math.floor(totalMinutes / 60);
  const minute = totalMinutes % 60;
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
}

/**
 * Half-open [start, end) interval for a start/end pair, or null when either
 * side is missing or the interval is empty
 */
export function toInterval(startTime: string | null | undefined, endTime: string | null | undefined): MinuteInterval | null {
  const start = parseTime(startTime);
  const end = parseTime(endTime);
  if (start === null || end === null || end <= start) return null;
  return { start, end };
}

export function slotInterval(slot: ScheduleSlot): MinuteInterval | null {
  return toInterval(slot.startTime, slot.endTime);
}

export function intervalsOverlap(a: MinuteInterval, b: MinuteInterval): boolean {
  return a.start < b.end && b.start < a.end;
}

/**
 * Two slots overlap iff they share a day and startA < endB AND startB < endA.
 * A slot never overlaps itself.
 */
export function slotsOverlap(a: ScheduleSlot, b: ScheduleSlot): boolean {
  if (a === b || a.id === b.id) return false;
  if (!a.dayOfWeek || a.dayOfWeek !== b.dayOfWeek) return false;

  const first = slotInterval(a);
  const second = slotInterval(b);
  if (!first || !second) return false;

  return intervalsOverlap(first, second);
}

export function overlapsInterval(slot: ScheduleSlot, day: DayOfWeek, interval: MinuteInterval): boolean {
  if (slot.dayOfWeek !== day) return false;
  const own = slotInterval(slot);
  return own !== null && intervalsOverlap(own, interval);
}

/**
 * Get the start time of a specific period
 * @param periodNumber Period number (1-based)
 */
export function getPeriodStartTime(config: SchoolDayConfig, periodNumber: number): string {
  const start = parseTime(config.startTime);
  if (start === null) {
    throw new Error('Invalid start time format. Expected HH:MM');
  }

  let totalMinutes = start + (periodNumber - 1) * config.periodDuration;

  // Add intervals that occur before this period starts
  for (const interval of config.intervalSlots) {
    if (interval.afterPeriod < periodNumber) {
      totalMinutes += interval.duration;
    }
  }

  return formatTime(totalMinutes);
}

export function getPeriodEndTime(config: SchoolDayConfig, periodNumber: number): string {
  const start = parseTime(getPeriodStartTime(config, periodNumber));
  return formatTime((start ?? 0) + config.periodDuration);
}

/**
 * Generate the teaching periods of a school day
 *
 * Example: 08:00 start, 50 minute periods, a 10 minute break after period 2
 * gives 08:00-08:50, 08:50-09:40, 09:50-10:40, ...
 */
export function generateDaySchedule(config: SchoolDayConfig): DayPeriod[] {
  const periods: DayPeriod[] = [];

  for (let i = 1; i <= config.numberOfPeriods; i++) {
    periods.push({
      number: i,
      startTime: getPeriodStartTime(config, i),
      endTime: getPeriodEndTime(config, i),
    });
  }

  return periods;
}
