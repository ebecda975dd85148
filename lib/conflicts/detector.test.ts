import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFLICT_SETTINGS } from '@/lib/config';
import { generateDaySchedule, slotsOverlap } from '@/lib/schoolTime';
import {
  enroll,
  enrollMany,
  makeCourse,
  makeRoom,
  makeSlot,
  makeStudent,
  makeTeacher,
  SCHEDULE,
} from '@/lib/testing/fixtures';
import type { CourseSection, Enrollment, ScheduleSlot } from '@/types';
import {
  CONFLICT_CHECKS,
  detectBackToBackViolations,
  detectDuplicateEnrollments,
  detectEquipmentUnavailability,
  detectExcessiveConsecutiveClasses,
  detectExcessiveTeachingHours,
  detectForSlot,
  detectMissingLunchBreaks,
  detectMissingPreparationPeriods,
  detectRoomCapacityViolations,
  detectRoomDoubleBookings,
  detectRoomTypeMismatches,
  detectSectionOverEnrollment,
  detectSectionUnderEnrollment,
  detectStudentScheduleConflicts,
  detectSubjectMismatches,
  detectTeacherOverloads,
  detectTeacherTravelTimeIssues,
  parseResourceTokens,
  runAllChecks,
  type ScheduleSnapshot,
} from './detector';

const settings = DEFAULT_CONFLICT_SETTINGS;

function snapshot(
  slots: ScheduleSlot[],
  enrollments: Enrollment[] = [],
  sections: CourseSection[] = []
): ScheduleSnapshot {
  return { scheduleId: SCHEDULE.id, slots, enrollments, sections };
}

function slotIds(slots: Array<ScheduleSlot | null>): Array<string | undefined> {
  return slots.map((slot) => slot?.id);
}

describe('room double-booking', () => {
  const r1 = makeRoom('r1');
  const a = makeSlot('a', 'Monday', '09:00', '10:00', { room: r1 });
  const b = makeSlot('b', 'Monday', '09:30', '10:30', { room: r1 });
  const c = makeSlot('c', 'Monday', '10:00', '11:00', { room: r1 });
  const d = makeSlot('d', 'Tuesday', '09:00', '10:00', { room: r1 });

  it('reports each overlapping pair once as CRITICAL', () => {
    const conflicts = detectRoomDoubleBookings(snapshot([a, b, c, d]), settings);

    expect(conflicts.map((conflict) => slotIds(conflict.affectedSlots))).toEqual([
      ['a', 'b'],
      ['b', 'c'],
    ]);
    expect(conflicts.every((conflict) => conflict.severity === 'CRITICAL')).toBe(true);
    expect(conflicts[0].affectedRooms).toEqual([r1]);
    expect(conflicts[0].category).toBe('ROOM');
    expect(conflicts[0].status).toBe('ACTIVE');
  });

  it('references both slots of every overlapping same-room pair', () => {
    const slots = [a, b, c, d];
    const conflicts = detectRoomDoubleBookings(snapshot(slots), settings);

    for (const first of slots) {
      for (const second of slots) {
        if (!slotsOverlap(first, second)) continue;
        const found = conflicts.some((conflict) => {
          const ids = slotIds(conflict.affectedSlots);
          return ids.includes(first.id) && ids.includes(second.id);
        });
        expect(found).toBe(true);
      }
    }
  });

  it('ignores slots without a room or with unparseable times', () => {
    const noRoom = makeSlot('e', 'Monday', '09:00', '10:00');
    const badTime = makeSlot('f', 'Monday', 'soon', '10:00', { room: r1 });
    const noDay = makeSlot('g', 'Monday', '09:00', '10:00', { room: r1, dayOfWeek: null });

    expect(detectRoomDoubleBookings(snapshot([a, noRoom, badTime, noDay]), settings)).toEqual([]);
  });
});

describe('teacher double-booking', () => {
  it('reports a teacher in two rooms at once', () => {
    const t1 = makeTeacher('t1');
    const a = makeSlot('a', 'Wednesday', '11:00', '11:50', { teacher: t1, room: makeRoom('r1') });
    const b = makeSlot('b', 'Wednesday', '11:20', '12:10', { teacher: t1, room: makeRoom('r2') });

    const conflicts = detectTeacherOverloads(snapshot([a, b]), settings);

    expect(conflicts).toHaveLength(1);
    expect(conflicts[0].conflictType).toBe('TEACHER_OVERLOAD');
    expect(conflicts[0].severity).toBe('CRITICAL');
    expect(conflicts[0].affectedTeachers).toEqual([t1]);
    expect(conflicts[0].affectedRooms.map((room) => room.id)).toEqual(['r1', 'r2']);
  });
});

describe('back-to-back classes', () => {
  function teachingPair(preferredBreakMinutes: number | null) {
    const teacher = makeTeacher('t1', { preferredBreakMinutes });
    return [
      makeSlot('a', 'Monday', '09:00', '10:00', { teacher }),
      makeSlot('b', 'Monday', '10:00', '11:00', { teacher }),
    ];
  }

  it('flags a gap shorter than the preferred break', () => {
    const conflicts = detectBackToBackViolations(snapshot(teachingPair(15)), settings);

    expect(conflicts).toHaveLength(1);
    expect(conflicts[0].severity).toBe('LOW');
    expect(conflicts[0].description).toBe(
      'Only 0 minutes between Unassigned (Monday 09:00-10:00) and Unassigned (Monday 10:00-11:00); preferred break is 15 minutes'
    );
  });

  it('does nothing when the teacher has no preferred break', () => {
    expect(detectBackToBackViolations(snapshot(teachingPair(0)), settings)).toEqual([]);
    expect(detectBackToBackViolations(snapshot(teachingPair(null)), settings)).toEqual([]);
  });
});

describe('teacher workload', () => {
  const periods = generateDaySchedule(settings.schoolDay);

  function day(teacherOverrides: Parameters<typeof makeTeacher>[1], count: number) {
    const teacher = makeTeacher('t1', teacherOverrides);
    return periods
      .slice(0, count)
      .map((period) => makeSlot(`p${period.number}`, 'Monday', period.startTime, period.endTime, { teacher }));
  }

  it('flags more periods than the daily maximum', () => {
    const conflicts = detectExcessiveTeachingHours(snapshot(day({ maxPeriodsPerDay: 5 }, 8)), settings);

    expect(conflicts.length).toBeGreaterThanOrEqual(1);
    expect(conflicts[0].conflictType).toBe('EXCESSIVE_TEACHING_HOURS');
    expect(conflicts[0].severity).toBe('HIGH');
    expect(conflicts[0].description).toBe('8 periods assigned, maximum is 5');
  });

  it('accepts a day at the maximum', () => {
    expect(detectExcessiveTeachingHours(snapshot(day({ maxPeriodsPerDay: 5 }, 5)), settings)).toEqual([]);
  });

  it('flags a missing preparation period above standard periods minus two', () => {
    expect(detectMissingPreparationPeriods(snapshot(day({}, 7)), settings)).toHaveLength(1);
    expect(detectMissingPreparationPeriods(snapshot(day({}, 6)), settings)).toEqual([]);
  });

  it('counts the 30 minute break after period 4 as lunch', () => {
    expect(detectMissingLunchBreaks(snapshot(day({}, 8)), settings)).toEqual([]);
  });

  it('flags five periods without a lunch gap', () => {
    const teacher = makeTeacher('t1');
    const slots = [
      makeSlot('s1', 'Monday', '08:00', '08:50', { teacher }),
      makeSlot('s2', 'Monday', '08:50', '09:40', { teacher }),
      makeSlot('s3', 'Monday', '09:40', '10:30', { teacher }),
      makeSlot('s4', 'Monday', '10:30', '11:20', { teacher }),
      makeSlot('s5', 'Monday', '11:20', '12:10', { teacher }),
    ];

    const conflicts = detectMissingLunchBreaks(snapshot(slots), settings);
    expect(conflicts).toHaveLength(1);
    expect(conflicts[0].severity).toBe('MEDIUM');
    expect(conflicts[0].affectedSlots).toHaveLength(5);

    expect(detectMissingLunchBreaks(snapshot(slots.slice(0, 4)), settings)).toEqual([]);

    const lunch = makeSlot('lunch', 'Monday', '12:10', '12:40', { teacher, isLunchPeriod: true });
    expect(detectMissingLunchBreaks(snapshot([...slots, lunch]), settings)).toEqual([]);
  });

  it('flags a run of classes longer than the consecutive limit', () => {
    const teacher = makeTeacher('t1', { maxConsecutiveHours: 2 });
    const first = makeSlot('s1', 'Monday', '08:00', '08:50', { teacher });
    const second = makeSlot('s2', 'Monday', '09:00', '09:50', { teacher });

    const conflicts = detectExcessiveConsecutiveClasses(
      snapshot([first, second, makeSlot('s3', 'Monday', '10:00', '10:50', { teacher })]),
      settings
    );
    expect(conflicts).toHaveLength(1);
    expect(conflicts[0].description).toBe('2.8 consecutive hours exceeds the limit of 2');
    expect(slotIds(conflicts[0].affectedSlots)).toEqual(['s1', 's2', 's3']);

    // A 15 minute gap breaks the run
    const split = snapshot([first, second, makeSlot('s3', 'Monday', '10:05', '10:55', { teacher })]);
    expect(detectExcessiveConsecutiveClasses(split, settings)).toEqual([]);
  });
});

describe('travel between buildings', () => {
  const teacher = makeTeacher('t1');
  const north = makeRoom('n1', { building: 'North' });
  const south = makeRoom('s1', { building: 'South' });

  it('flags a short gap between buildings', () => {
    const conflicts = detectTeacherTravelTimeIssues(
      snapshot([
        makeSlot('a', 'Friday', '09:00', '09:50', { teacher, room: north }),
        makeSlot('b', 'Friday', '09:55', '10:45', { teacher, room: south }),
      ]),
      settings
    );

    expect(conflicts).toHaveLength(1);
    expect(conflicts[0].severity).toBe('LOW');
    expect(conflicts[0].title).toBe('Teacher t1 cannot reach South in time');
  });

  it('accepts the same building or a long enough gap', () => {
    const sameBuilding = snapshot([
      makeSlot('a', 'Friday', '09:00', '09:50', { teacher, room: north }),
      makeSlot('b', 'Friday', '09:55', '10:45', { teacher, room: makeRoom('n2', { building: 'North' }) }),
    ]);
    const enoughTime = snapshot([
      makeSlot('a', 'Friday', '09:00', '09:50', { teacher, room: north }),
      makeSlot('b', 'Friday', '10:00', '10:50', { teacher, room: south }),
    ]);

    expect(detectTeacherTravelTimeIssues(sameBuilding, settings)).toEqual([]);
    expect(detectTeacherTravelTimeIssues(enoughTime, settings)).toEqual([]);
  });
});

describe('subject mismatch', () => {
  const physics = makeCourse('phy', { subject: 'Physics' });

  it('compares department and subject exactly', () => {
    const mismatch = makeSlot('a', 'Monday', '09:00', '09:50', {
      course: physics,
      teacher: makeTeacher('t1', { department: 'Math' }),
    });
    const wrongCase = makeSlot('b', 'Monday', '10:00', '10:50', {
      course: physics,
      teacher: makeTeacher('t2', { department: 'physics' }),
    });
    const match = makeSlot('c', 'Monday', '11:00', '11:50', {
      course: physics,
      teacher: makeTeacher('t3', { department: 'Physics' }),
    });
    const noDepartment = makeSlot('d', 'Monday', '12:00', '12:50', { course: physics, teacher: makeTeacher('t4') });

    const conflicts = detectSubjectMismatches(snapshot([mismatch, wrongCase, match, noDepartment]), settings);
    expect(conflicts.map((conflict) => conflict.affectedTeachers[0].id)).toEqual(['t1', 't2']);
  });
});

describe('room capacity', () => {
  const room = makeRoom('r1', { capacity: 20 });
  const slot = makeSlot('a', 'Monday', '09:00', '09:50', { room, course: makeCourse('c1') });

  it('reports one conflict for 25 active students in a 20-seat room', () => {
    const enrollments = [
      ...enrollMany('x', slot, 25),
      enroll('dropped', makeStudent('d1'), slot, 'DROPPED'),
      enroll('pending', makeStudent('d2'), slot, 'PENDING'),
    ];

    const conflicts = detectRoomCapacityViolations(snapshot([slot], enrollments), settings);

    expect(conflicts).toHaveLength(1);
    expect(conflicts[0].conflictType).toBe('ROOM_CAPACITY_EXCEEDED');
    expect(slotIds(conflicts[0].affectedSlots)).toEqual(['a']);
    expect(conflicts[0].description).toBe('25 students enrolled in C1 (Monday 09:00-09:50), room holds 20');
    expect(conflicts[0].affectedStudents).toHaveLength(25);
  });

  it('accepts a full room', () => {
    expect(detectRoomCapacityViolations(snapshot([slot], enrollMany('x', slot, 20)), settings)).toEqual([]);
  });
});

describe('room type and equipment', () => {
  const classroom = makeRoom('r1', { hasComputers: true });
  const lab = makeRoom('lab', { roomType: 'SCIENCE_LAB' });

  it('rates a lab course in a classroom HIGH and a science course MEDIUM', () => {
    const labCourse = makeSlot('a', 'Monday', '09:00', '09:50', {
      room: classroom,
      course: makeCourse('c1', { requiresLab: true }),
    });
    const chemistry = makeSlot('b', 'Monday', '10:00', '10:50', {
      room: classroom,
      course: makeCourse('c2', { subject: 'Chemistry' }),
    });
    const inLab = makeSlot('c', 'Monday', '11:00', '11:50', {
      room: lab,
      course: makeCourse('c3', { subject: 'Chemistry', requiresLab: true }),
    });

    const conflicts = detectRoomTypeMismatches(snapshot([labCourse, chemistry, inLab]), settings);
    expect(conflicts.map((conflict) => [conflict.affectedSlots[0]?.id, conflict.severity])).toEqual([
      ['a', 'HIGH'],
      ['b', 'MEDIUM'],
    ]);
  });

  it('reports each missing known resource', () => {
    const slot = makeSlot('a', 'Monday', '09:00', '09:50', {
      room: classroom,
      course: makeCourse('c1', { requiredResources: 'Projector, computers,  whiteboard' }),
    });

    const conflicts = detectEquipmentUnavailability(snapshot([slot]), settings);
    expect(conflicts.map((conflict) => conflict.title)).toEqual(['Room R1 has no projector']);
  });

  it('normalizes resource tokens', () => {
    expect(parseResourceTokens(' Smart   Board ,LAB,, ')).toEqual(['smart board', 'lab']);
    expect(parseResourceTokens(null)).toEqual([]);
  });
});

describe('student conflicts', () => {
  const student = makeStudent('st1');
  const c1 = makeCourse('c1');
  const a = makeSlot('a', 'Tuesday', '09:00', '09:50', { course: c1 });
  const b = makeSlot('b', 'Tuesday', '09:30', '10:20', { course: makeCourse('c2') });

  it('flags overlapping active enrollments', () => {
    const conflicts = detectStudentScheduleConflicts(
      snapshot([a, b], [enroll('e1', student, a), enroll('e2', student, b)]),
      settings
    );

    expect(conflicts).toHaveLength(1);
    expect(conflicts[0].severity).toBe('HIGH');
    expect(conflicts[0].affectedStudents).toEqual([student]);
    expect(slotIds(conflicts[0].affectedSlots)).toEqual(['a', 'b']);
  });

  it('ignores enrollments that are not active', () => {
    const conflicts = detectStudentScheduleConflicts(
      snapshot([a, b], [enroll('e1', student, a), enroll('e2', student, b, 'WITHDRAWN')]),
      settings
    );
    expect(conflicts).toEqual([]);
  });

  it('flags duplicate active enrollments in one course', () => {
    const later = makeSlot('c', 'Thursday', '09:00', '09:50', { course: c1 });
    const conflicts = detectDuplicateEnrollments(
      snapshot([a, later], [enroll('e1', student, a), enroll('e2', student, later)]),
      settings
    );

    expect(conflicts).toHaveLength(1);
    expect(conflicts[0].title).toBe('Pupil st1 is enrolled in C1 2 times');
    expect(slotIds(conflicts[0].affectedSlots)).toEqual(['a', 'c']);
  });
});

describe('section enrollment', () => {
  const course = makeCourse('c1');

  it('flags sections above their maximum and below their minimum', () => {
    const sections: CourseSection[] = [
      { id: 's1', course, sectionNumber: '01', currentEnrollment: 35, maxEnrollment: 30 },
      { id: 's2', course, sectionNumber: '02', currentEnrollment: 4, minEnrollment: 10 },
      { id: 's3', course, sectionNumber: '03', currentEnrollment: 12, minEnrollment: null, maxEnrollment: null },
    ];

    const over = detectSectionOverEnrollment(snapshot([], [], sections), settings);
    const under = detectSectionUnderEnrollment(snapshot([], [], sections), settings);

    expect(over.map((conflict) => conflict.title)).toEqual(['Section 01 is over-enrolled']);
    expect(under.map((conflict) => conflict.title)).toEqual(['Section 02 is under-enrolled']);
    expect(under[0].severity).toBe('LOW');
  });

  it('flags a slot above its course limit', () => {
    const limited = makeCourse('c2', { maxStudents: 2 });
    const slot = makeSlot('a', 'Monday', '09:00', '09:50', { course: limited });

    const conflicts = detectSectionOverEnrollment(snapshot([slot], enrollMany('x', slot, 3)), settings);
    expect(conflicts.map((conflict) => conflict.description)).toEqual([
      '3 students enrolled in C2 (Monday 09:00-09:50), course allows 2',
    ]);
  });
});

describe('registry', () => {
  const r1 = makeRoom('r1');
  const busy = snapshot(
    [
      makeSlot('a', 'Monday', '09:00', '10:00', { room: r1, course: makeCourse('c1') }),
      makeSlot('b', 'Monday', '09:30', '10:30', { room: r1, course: makeCourse('c2') }),
    ],
    [],
    [{ id: 's1', course: null, sectionNumber: '01', currentEnrollment: 2, minEnrollment: 5 }]
  );

  it('keeps the academic-record categories empty', () => {
    for (const type of [
      'PREREQUISITE_VIOLATION',
      'CREDIT_HOUR_VIOLATION',
      'GRADUATION_REQUIREMENT',
      'COURSE_SEQUENCE_VIOLATION',
      'CO_REQUISITE_VIOLATION',
    ] as const) {
      expect(CONFLICT_CHECKS[type](busy, settings)).toEqual([]);
    }
  });

  it('produces the same composition on repeated runs', () => {
    const first = runAllChecks(busy, settings).map((conflict) => conflict.conflictType);
    const second = runAllChecks(busy, settings).map((conflict) => conflict.conflictType);

    expect(first).toEqual(['ROOM_DOUBLE_BOOKING', 'SECTION_UNDER_ENROLLED']);
    expect(second).toEqual(first);
  });
});

describe('detectForSlot', () => {
  const r1 = makeRoom('r1');
  const r2 = makeRoom('r2');
  const x = makeSlot('x', 'Monday', '09:00', '09:50', { room: r2 });
  const y = makeSlot('y', 'Monday', '09:10', '10:00', { room: r2 });

  it('keeps only conflicts involving the slot', () => {
    const candidate = makeSlot('new', 'Monday', '09:20', '10:10', { room: r1 });
    expect(detectForSlot(candidate, [x, y], [], settings)).toEqual([]);

    const clash = detectForSlot({ ...candidate, room: r2 }, [x, y], [], settings);
    expect(clash.map((conflict) => conflict.conflictType)).toEqual(['ROOM_DOUBLE_BOOKING', 'ROOM_DOUBLE_BOOKING']);
  });

  it('evaluates unsaved changes instead of the stored slot', () => {
    const moved = { ...x, dayOfWeek: 'Tuesday' as const };
    expect(detectForSlot(moved, [x, y], [], settings)).toEqual([]);
  });
});
