import type { DayOfWeek } from '@/types';
import { InvalidArgumentError } from '@/lib/errors';
import { parseTime, type SchoolDayConfig } from '@/lib/schoolTime';

export interface ConflictSettings {
  lunchThresholdPeriods: number; // teaching periods that require a lunch gap
  lunchMinimumGapMinutes: number; // shortest gap that counts as lunch
  standardDayPeriods: number; // one lunch and one prep period are expected
  consecutiveGapToleranceMinutes: number; // passing time that keeps classes "consecutive"
  travelBufferMinutes: number;
  autoApplyConfidenceThreshold: number; // 0..1
  maxSuggestionsPerStrategy: number;
  advisorTimeoutMs: number; // an advisor that has not answered by then is skipped
  schoolDay: SchoolDayConfig;
  workingDays: DayOfWeek[];
  scienceSubjects: string[];
}

export const DEFAULT_CONFLICT_SETTINGS: ConflictSettings = {
  lunchThresholdPeriods: 5,
  lunchMinimumGapMinutes: 30,
  standardDayPeriods: 8,
  consecutiveGapToleranceMinutes: 10,
  travelBufferMinutes: 10,
  autoApplyConfidenceThreshold: 0.85,
  maxSuggestionsPerStrategy: 5,
  advisorTimeoutMs: 5000,
  schoolDay: {
    startTime: '08:00',
    periodDuration: 50,
    numberOfPeriods: 8,
    intervalSlots: [
      { afterPeriod: 2, duration: 10 }, // Short break after 2nd period
      { afterPeriod: 4, duration: 30 }, // Lunch after 4th period
    ],
  },
  workingDays: ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday'],
  scienceSubjects: ['Biology', 'Chemistry', 'Physics', 'Science'],
};

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number, max?: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || (max !== undefined && value > max)) {
    throw new InvalidArgumentError(`${key} must be a number between 0 and ${max ?? 'infinity'}, got "${raw}"`);
  }
  return value;
}

// Counts and minutes: the period grid works in whole minutes
function readInteger(env: Env, key: string, fallback: number): number {
  const value = readNumber(env, key, fallback);
  if (!Number.isInteger(value)) {
    throw new InvalidArgumentError(`${key} must be a whole number, got "${env[key]}"`);
  }
  return value;
}

function readTime(env: Env, key: string, fallback: string): string {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  if (parseTime(raw) === null) {
    throw new InvalidArgumentError(`${key} must be an HH:MM time, got "${raw}"`);
  }
  return raw.trim();
}

/**
 * Build engine settings from environment variables, falling back to the
 * defaults for anything not set
 */
export function loadConflictSettings(env: Env = process.env): ConflictSettings {
  const defaults = DEFAULT_CONFLICT_SETTINGS;

  return {
    ...defaults,
    lunchThresholdPeriods: readInteger(env, 'CONFLICT_LUNCH_THRESHOLD_PERIODS', defaults.lunchThresholdPeriods),
    lunchMinimumGapMinutes: readInteger(env, 'CONFLICT_LUNCH_MIN_GAP_MINUTES', defaults.lunchMinimumGapMinutes),
    standardDayPeriods: readInteger(env, 'CONFLICT_STANDARD_DAY_PERIODS', defaults.standardDayPeriods),
    consecutiveGapToleranceMinutes: readInteger(
      env,
      'CONFLICT_CONSECUTIVE_GAP_MINUTES',
      defaults.consecutiveGapToleranceMinutes
    ),
    travelBufferMinutes: readInteger(env, 'CONFLICT_TRAVEL_BUFFER_MINUTES', defaults.travelBufferMinutes),
    autoApplyConfidenceThreshold: readNumber(
      env,
      'CONFLICT_AUTO_APPLY_THRESHOLD',
      defaults.autoApplyConfidenceThreshold,
      1
    ),
    maxSuggestionsPerStrategy: readInteger(env, 'CONFLICT_MAX_SUGGESTIONS', defaults.maxSuggestionsPerStrategy),
    advisorTimeoutMs: readInteger(env, 'CONFLICT_ADVISOR_TIMEOUT_MS', defaults.advisorTimeoutMs),
    schoolDay: {
      ...defaults.schoolDay,
      startTime: readTime(env, 'CONFLICT_DAY_START', defaults.schoolDay.startTime),
      periodDuration: readInteger(env, 'CONFLICT_PERIOD_MINUTES', defaults.schoolDay.periodDuration),
      numberOfPeriods: readInteger(env, 'CONFLICT_STANDARD_DAY_PERIODS', defaults.schoolDay.numberOfPeriods),
    },
  };
}
