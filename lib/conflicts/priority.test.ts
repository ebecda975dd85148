import { describe, expect, it } from 'vitest';
import { createMemoryRepositories } from '@/lib/repositories/memory';
import { makeCourse, makeRoom, makeSlot, makeStudent, makeTeacher, SCHEDULE } from '@/lib/testing/fixtures';
import type { Conflict, ConflictSeverity } from '@/types';
import { createConflict } from './detector';
import {
  ConflictPriorityService,
  estimateCascadeImpact,
  getHistoricalSuccessRate,
  priorityLevelFor,
} from './priority';

const NOW = new Date('2026-03-02T12:00:00Z');
const DAY_MS = 24 * 60 * 60 * 1000;

function daysAgo(days: number): Date {
  return new Date(NOW.getTime() - days * DAY_MS);
}

function conflictOf(severity: ConflictSeverity, overrides: Partial<Conflict> = {}): Conflict {
  return {
    ...createConflict(SCHEDULE.id, { type: 'NO_LUNCH_BREAK', severity, title: severity, description: '' }),
    detectedAt: NOW,
    ...overrides,
  };
}

function service(conflicts: Conflict[] = []) {
  return new ConflictPriorityService(createMemoryRepositories({ conflicts }).conflicts, () => NOW);
}

describe('calculatePriorityScore', () => {
  it('weights severity and the affected entities', () => {
    const conflict = conflictOf('CRITICAL', {
      affectedSlots: [makeSlot('a', 'Monday', '09:00', '09:50'), makeSlot('b', 'Monday', '09:30', '10:20')],
      affectedTeachers: [makeTeacher('t1')],
      affectedRooms: [makeRoom('r1')],
      affectedCourses: [makeCourse('c1'), makeCourse('c2')],
    });

    expect(service().calculatePriorityScore(conflict)).toEqual({
      conflictId: conflict.id,
      hardConstraintScore: 50,
      softConstraintScore: 15,
      totalScore: 65,
      priorityLevel: 'HIGH',
      cascadeImpact: 1,
    });
  });

  it('grows with age up to a cap', () => {
    const scorer = service();

    expect(scorer.calculatePriorityScore(conflictOf('MEDIUM', { detectedAt: daysAgo(4) }))).toMatchObject({
      hardConstraintScore: 30,
      softConstraintScore: 6,
      totalScore: 36,
      priorityLevel: 'MEDIUM',
    });
    expect(scorer.calculatePriorityScore(conflictOf('LOW', { detectedAt: daysAgo(30) })).softConstraintScore).toBe(15);
  });

  it('caps the entity and cascade contributions', () => {
    const students = Array.from({ length: 10 }, (_, index) => makeStudent(`st${index}`));
    const score = service().calculatePriorityScore(conflictOf('HIGH', { affectedStudents: students }));

    expect(score.cascadeImpact).toBe(5);
    expect(score.softConstraintScore).toBe(35);
    expect(score.totalScore).toBe(75);
    expect(score.priorityLevel).toBe('URGENT');
  });
});

describe('estimateCascadeImpact', () => {
  it('counts what has to move along with the fix', () => {
    const conflict = conflictOf('HIGH', {
      affectedSlots: [makeSlot('a', 'Monday', '09:00', '09:50'), null, makeSlot('b', 'Monday', '10:00', '10:50')],
      affectedStudents: [makeStudent('st1')],
      affectedTeachers: [makeTeacher('t1'), makeTeacher('t2')],
    });

    expect(estimateCascadeImpact(conflict)).toBe(3);
    expect(estimateCascadeImpact(null)).toBe(0);
  });
});

describe('rankConflicts', () => {
  it('orders by score, then by most recent detection', () => {
    const older = conflictOf('INFO', { title: 'older', detectedAt: daysAgo(30) });
    const newer = conflictOf('INFO', { title: 'newer', detectedAt: daysAgo(20) });
    const critical = conflictOf('CRITICAL', { title: 'critical' });

    const ranked = service().rankConflicts([older, null, newer, critical]);

    expect(ranked.map((entry) => entry.conflict.title)).toEqual(['critical', 'newer', 'older']);
    expect(ranked[1].score.totalScore).toBe(ranked[2].score.totalScore);
  });

  it('ranks only active conflicts from the store', async () => {
    const active = conflictOf('LOW', { title: 'active' });
    const ignored = conflictOf('CRITICAL', { title: 'ignored', status: 'IGNORED' });
    const resolved = conflictOf('CRITICAL', { title: 'resolved', status: 'RESOLVED' });

    const ranked = await service([ignored, active, resolved]).getConflictsByPriority();

    expect(ranked.map((entry) => entry.conflict.title)).toEqual(['active']);
  });
});

describe('priority levels and success rates', () => {
  it('maps totals to levels at the thresholds', () => {
    expect(priorityLevelFor(70)).toBe('URGENT');
    expect(priorityLevelFor(69.99)).toBe('HIGH');
    expect(priorityLevelFor(50)).toBe('HIGH');
    expect(priorityLevelFor(30)).toBe('MEDIUM');
    expect(priorityLevelFor(29.5)).toBe('LOW');
  });

  it('ranks disruptive resolutions lower', () => {
    expect(getHistoricalSuccessRate('CHANGE_ROOM')).toBe(85);
    expect(getHistoricalSuccessRate('SPLIT_SECTION')).toBeLessThan(getHistoricalSuccessRate('CHANGE_ROOM'));
    expect(getHistoricalSuccessRate('REMOVE_SLOT')).toBe(30);
  });
});
