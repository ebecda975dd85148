/**
 * Conflict Detector
 *
 * Pure checks over an in-memory schedule snapshot, one per conflict type.
 * Every check skips entities with missing references (no teacher, no room,
 * unparseable time) instead of failing, and reports violations as data.
 *
 * Checks are registered in CONFLICT_CHECKS keyed by the type they produce.
 */

import { Types } from 'mongoose';
import type { ConflictSettings } from '@/lib/config';
import { slotInterval, slotsOverlap, type MinuteInterval } from '@/lib/schoolTime';
import {
  CONFLICT_CATEGORIES,
  CONFLICT_TYPES,
  LAB_ROOM_TYPES,
  type Conflict,
  type ConflictSeverity,
  type ConflictType,
  type Course,
  type CourseSection,
  type DayOfWeek,
  type Enrollment,
  type Room,
  type ScheduleSlot,
  type Student,
  type Teacher,
} from '@/types';

export interface ScheduleSnapshot {
  scheduleId: string | null;
  slots: ScheduleSlot[];
  enrollments: Enrollment[];
  sections: CourseSection[];
}

export type ConflictCheck = (snapshot: ScheduleSnapshot, settings: ConflictSettings) => Conflict[];

interface ConflictDraft {
  type: ConflictType;
  severity: ConflictSeverity;
  title: string;
  description: string;
  slots?: ScheduleSlot[];
  teachers?: Teacher[];
  students?: Student[];
  rooms?: Room[];
  courses?: Course[];
}

export function createConflict(scheduleId: string | null, draft: ConflictDraft): Conflict {
  return {
    id: new Types.ObjectId().toString(),
    scheduleId,
    conflictType: draft.type,
    category: CONFLICT_CATEGORIES[draft.type],
    severity: draft.severity,
    title: draft.title,
    description: draft.description,
    affectedSlots: draft.slots ?? [],
    affectedTeachers: draft.teachers ?? [],
    affectedStudents: draft.students ?? [],
    affectedRooms: draft.rooms ?? [],
    affectedCourses: draft.courses ?? [],
    detectedAt: new Date(),
    status: 'ACTIVE',
    resolvedAt: null,
    resolvedBy: null,
    resolutionNotes: null,
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface TimedSlot {
  slot: ScheduleSlot;
  day: DayOfWeek;
  interval: MinuteInterval;
}

interface TeacherDay {
  teacher: Teacher;
  day: DayOfWeek;
  teaching: TimedSlot[]; // sorted by start, lunch periods excluded
  hasLunchPeriod: boolean;
}

function timed(slot: ScheduleSlot | null | undefined): TimedSlot | null {
  if (!slot || !slot.dayOfWeek) return null;
  const interval = slotInterval(slot);
  return interval ? { slot, day: slot.dayOfWeek, interval } : null;
}

function timedSlots(slots: ScheduleSlot[]): TimedSlot[] {
  return slots.map(timed).filter((entry): entry is TimedSlot => entry !== null);
}

function compact<T>(values: Array<T | null | undefined>): T[] {
  return values.filter((value): value is T => value !== null && value !== undefined);
}

function uniqueById<T extends { id: string }>(values: Array<T | null | undefined>): T[] {
  const seen = new Map<string, T>();
  for (const value of compact(values)) {
    if (!seen.has(value.id)) seen.set(value.id, value);
  }
  return [...seen.values()];
}

export function slotLabel(slot: ScheduleSlot): string {
  const course = slot.course?.courseCode ?? 'Unassigned';
  return `${course} (${slot.dayOfWeek ?? '?'} ${slot.startTime ?? '?'}-${slot.endTime ?? '?'})`;
}

export function isActiveEnrollment(enrollment: Enrollment | null | undefined): enrollment is Enrollment {
  return !!enrollment && enrollment.status === 'ACTIVE';
}

export function countActiveEnrollments(enrollments: Enrollment[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const enrollment of enrollments) {
    if (!isActiveEnrollment(enrollment) || !enrollment.slot) continue;
    counts.set(enrollment.slot.id, (counts.get(enrollment.slot.id) ?? 0) + 1);
  }
  return counts;
}

/**
 * Unordered pairs of same-day overlapping slots that share a resource.
 * Each pair is reported once.
 */
function overlappingPairs(
  slots: ScheduleSlot[],
  sharesResource: (a: ScheduleSlot, b: ScheduleSlot) => boolean
): Array<[ScheduleSlot, ScheduleSlot]> {
  const byDay = new Map<DayOfWeek, TimedSlot[]>();
  for (const entry of timedSlots(slots)) {
    const list = byDay.get(entry.day) ?? [];
    list.push(entry);
    byDay.set(entry.day, list);
  }

  const pairs: Array<[ScheduleSlot, ScheduleSlot]> = [];
  for (const entries of byDay.values()) {
    entries.sort((a, b) => a.interval.start - b.interval.start);
    for (let i = 0; i < entries.length; i++) {
      for (let j = i + 1; j < entries.length; j++) {
        // Sorted by start: nothing further can overlap entry i
        if (entries[j].interval.start >= entries[i].interval.end) break;
        const a = entries[i].slot;
        const b = entries[j].slot;
        if (slotsOverlap(a, b) && sharesResource(a, b)) {
          pairs.push([a, b]);
        }
      }
    }
  }
  return pairs;
}

function groupTeacherDays(slots: ScheduleSlot[]): TeacherDay[] {
  const groups = new Map<string, TeacherDay>();

  for (const entry of timedSlots(slots)) {
    const teacher = entry.slot.teacher;
    if (!teacher) continue;

    const key = `${teacher.id}|${entry.day}`;
    let group = groups.get(key);
    if (!group) {
      group = { teacher, day: entry.day, teaching: [], hasLunchPeriod: false };
      groups.set(key, group);
    }

    if (entry.slot.isLunchPeriod) {
      group.hasLunchPeriod = true;
    } else {
      group.teaching.push(entry);
    }
  }

  for (const group of groups.values()) {
    group.teaching.sort((a, b) => a.interval.start - b.interval.start);
  }
  return [...groups.values()];
}

function positive(value: number | null | undefined): number | null {
  return typeof value === 'number' && value > 0 ? value : null;
}

// ---------------------------------------------------------------------------
// Room and teacher double-booking
// ---------------------------------------------------------------------------

export const detectRoomDoubleBookings: ConflictCheck = (snapshot) =>
  overlappingPairs(snapshot.slots, (a, b) => !!a.room && !!b.room && a.room.id === b.room.id).flatMap<Conflict>(([a, b]) => {
    const room = a.room;
    if (!room) return [];
    return createConflict(snapshot.scheduleId, {
      type: 'ROOM_DOUBLE_BOOKING',
      severity: 'CRITICAL',
      title: `Room ${room.roomNumber} is double-booked`,
      description: `${slotLabel(a)} overlaps ${slotLabel(b)} in room ${room.roomNumber}`,
      slots: [a, b],
      rooms: [room],
      courses: compact([a.course, b.course]),
      teachers: uniqueById([a.teacher, b.teacher]),
    });
  });

export const detectTeacherOverloads: ConflictCheck = (snapshot) =>
  overlappingPairs(snapshot.slots, (a, b) => !!a.teacher && !!b.teacher && a.teacher.id === b.teacher.id).flatMap<Conflict>(
    ([a, b]) => {
      const teacher = a.teacher;
      if (!teacher) return [];
      return createConflict(snapshot.scheduleId, {
        type: 'TEACHER_OVERLOAD',
        severity: 'CRITICAL',
        title: `${teacher.name} is double-booked`,
        description: `${teacher.name} teaches ${slotLabel(a)} and ${slotLabel(b)} at the same time`,
        slots: [a, b],
        teachers: [teacher],
        rooms: uniqueById([a.room, b.room]),
        courses: compact([a.course, b.course]),
      });
    }
  );

// ---------------------------------------------------------------------------
// Teacher workload
// ---------------------------------------------------------------------------

export const detectBackToBackViolations: ConflictCheck = (snapshot) => {
  const conflicts: Conflict[] = [];

  for (const group of groupTeacherDays(snapshot.slots)) {
    const preferredBreak = positive(group.teacher.preferredBreakMinutes);
    if (preferredBreak === null) continue;

    for (let i = 1; i < group.teaching.length; i++) {
      const previous = group.teaching[i - 1];
      const next = group.teaching[i];
      const gap = next.interval.start - previous.interval.end;

      // Overlaps are reported as double-bookings
      if (gap < 0 || gap >= preferredBreak) continue;

      conflicts.push(
        createConflict(snapshot.scheduleId, {
          type: 'BACK_TO_BACK_VIOLATION',
          severity: 'LOW',
          title: `${group.teacher.name} has back-to-back classes`,
          description: `Only ${gap} minutes between ${slotLabel(previous.slot)} and ${slotLabel(next.slot)}; preferred break is ${preferredBreak} minutes`,
          slots: [previous.slot, next.slot],
          teachers: [group.teacher],
        })
      );
    }
  }
  return conflicts;
};

export const detectMissingLunchBreaks: ConflictCheck = (snapshot, settings) => {
  const conflicts: Conflict[] = [];

  for (const group of groupTeacherDays(snapshot.slots)) {
    if (group.hasLunchPeriod || group.teaching.length < settings.lunchThresholdPeriods) continue;

    let latestEnd = group.teaching[0].interval.end;
    let hasLunchGap = false;
    for (const entry of group.teaching.slice(1)) {
      if (entry.interval.start - latestEnd >= settings.lunchMinimumGapMinutes) {
        hasLunchGap = true;
        break;
      }
      latestEnd = Math.max(latestEnd, entry.interval.end);
    }
    if (hasLunchGap) continue;

    conflicts.push(
      createConflict(snapshot.scheduleId, {
        type: 'NO_LUNCH_BREAK',
        severity: 'MEDIUM',
        title: `${group.teacher.name} has no lunch break on ${group.day}`,
        description: `${group.teaching.length} periods without a gap of at least ${settings.lunchMinimumGapMinutes} minutes`,
        slots: group.teaching.map((entry) => entry.slot),
        teachers: [group.teacher],
      })
    );
  }
  return conflicts;
};

export const detectExcessiveConsecutiveClasses: ConflictCheck = (snapshot, settings) => {
  const conflicts: Conflict[] = [];

  for (const group of groupTeacherDays(snapshot.slots)) {
    const maxHours = positive(group.teacher.maxConsecutiveHours);
    if (maxHours === null || group.teaching.length === 0) continue;

    const runs: TimedSlot[][] = [];
    let run: TimedSlot[] = [group.teaching[0]];
    let runEnd = group.teaching[0].interval.end;

    for (const entry of group.teaching.slice(1)) {
      if (entry.interval.start - runEnd <= settings.consecutiveGapToleranceMinutes) {
        run.push(entry);
        runEnd = Math.max(runEnd, entry.interval.end);
      } else {
        runs.push(run);
        run = [entry];
        runEnd = entry.interval.end;
      }
    }
    runs.push(run);

    for (const current of runs) {
      const start = current[0].interval.start;
      const end = Math.max(...current.map((entry) => entry.interval.end));
      const minutes = end - start;
      if (minutes <= maxHours * 60) continue;

      conflicts.push(
        createConflict(snapshot.scheduleId, {
          type: 'EXCESSIVE_CONSECUTIVE_CLASSES',
          severity: 'MEDIUM',
          title: `${group.teacher.name} teaches too long without a break on ${group.day}`,
          description: `${(minutes / 60).toFixed(1)} consecutive hours exceeds the limit of ${maxHours}`,
          slots: current.map((entry) => entry.slot),
          teachers: [group.teacher],
        })
      );
    }
  }
  return conflicts;
};

export const detectExcessiveTeachingHours: ConflictCheck = (snapshot) => {
  const conflicts: Conflict[] = [];

  for (const group of groupTeacherDays(snapshot.slots)) {
    const maxPeriods = positive(group.teacher.maxPeriodsPerDay);
    if (maxPeriods === null || group.teaching.length <= maxPeriods) continue;

    conflicts.push(
      createConflict(snapshot.scheduleId, {
        type: 'EXCESSIVE_TEACHING_HOURS',
        severity: 'HIGH',
        title: `${group.teacher.name} is over the daily period limit on ${group.day}`,
        description: `${group.teaching.length} periods assigned, maximum is ${maxPeriods}`,
        slots: group.teaching.map((entry) => entry.slot),
        teachers: [group.teacher],
      })
    );
  }
  return conflicts;
};

/**
 * A standard day holds one lunch and one preparation period, so a teacher
 * with more than (standardDayPeriods - 2) teaching periods has no prep time.
 */
export const detectMissingPreparationPeriods: ConflictCheck = (snapshot, settings) => {
  const conflicts: Conflict[] = [];
  const maxTeaching = Math.max(settings.standardDayPeriods - 2, 0);

  for (const group of groupTeacherDays(snapshot.slots)) {
    if (group.teaching.length <= maxTeaching) continue;

    conflicts.push(
      createConflict(snapshot.scheduleId, {
        type: 'NO_PREPARATION_PERIOD',
        severity: 'MEDIUM',
        title: `${group.teacher.name} has no preparation period on ${group.day}`,
        description: `${group.teaching.length} teaching periods in a ${settings.standardDayPeriods}-period day`,
        slots: group.teaching.map((entry) => entry.slot),
        teachers: [group.teacher],
      })
    );
  }
  return conflicts;
};

export const detectTeacherTravelTimeIssues: ConflictCheck = (snapshot, settings) => {
  const conflicts: Conflict[] = [];

  for (const group of groupTeacherDays(snapshot.slots)) {
    for (let i = 1; i < group.teaching.length; i++) {
      const previous = group.teaching[i - 1];
      const next = group.teaching[i];
      const from = previous.slot.room?.building;
      const to = next.slot.room?.building;
      if (!from || !to || from === to) continue;

      const gap = next.interval.start - previous.interval.end;
      if (gap >= settings.travelBufferMinutes) continue;

      conflicts.push(
        createConflict(snapshot.scheduleId, {
          type: 'TEACHER_TRAVEL_TIME',
          severity: 'LOW',
          title: `${group.teacher.name} cannot reach ${to} in time`,
          description: `${Math.max(gap, 0)} minutes to move from ${from} to ${to} between ${slotLabel(previous.slot)} and ${slotLabel(next.slot)}`,
          slots: [previous.slot, next.slot],
          teachers: [group.teacher],
          rooms: compact([previous.slot.room, next.slot.room]),
        })
      );
    }
  }
  return conflicts;
};

export const detectSubjectMismatches: ConflictCheck = (snapshot) => {
  const conflicts: Conflict[] = [];

  for (const slot of compact(snapshot.slots)) {
    const teacher = slot.teacher;
    const course = slot.course;
    if (!teacher?.department || !course?.subject) continue;
    // Exact, case-sensitive comparison
    if (teacher.department === course.subject) continue;

    conflicts.push(
      createConflict(snapshot.scheduleId, {
        type: 'SUBJECT_MISMATCH',
        severity: 'MEDIUM',
        title: `${teacher.name} teaches outside their department`,
        description: `${course.courseName} (${course.subject}) is taught by a ${teacher.department} teacher`,
        slots: [slot],
        teachers: [teacher],
        courses: [course],
      })
    );
  }
  return conflicts;
};

// ---------------------------------------------------------------------------
// Rooms
// ---------------------------------------------------------------------------

export const detectRoomCapacityViolations: ConflictCheck = (snapshot) => {
  const conflicts: Conflict[] = [];
  const counts = countActiveEnrollments(snapshot.enrollments);

  for (const slot of uniqueById(snapshot.slots)) {
    const room = slot.room;
    if (!room) continue;

    const enrolled = counts.get(slot.id) ?? 0;
    if (enrolled <= room.capacity) continue;

    const students = snapshot.enrollments
      .filter((enrollment) => isActiveEnrollment(enrollment) && enrollment.slot?.id === slot.id)
      .map((enrollment) => enrollment.student);

    conflicts.push(
      createConflict(snapshot.scheduleId, {
        type: 'ROOM_CAPACITY_EXCEEDED',
        severity: 'HIGH',
        title: `Room ${room.roomNumber} is over capacity`,
        description: `${enrolled} students enrolled in ${slotLabel(slot)}, room holds ${room.capacity}`,
        slots: [slot],
        rooms: [room],
        students: uniqueById(students),
        courses: compact([slot.course]),
      })
    );
  }
  return conflicts;
};

export function isLabRoom(room: Room): boolean {
  return LAB_ROOM_TYPES.includes(room.roomType);
}

type RoomCapability = (room: Room) => boolean;

const RESOURCE_CAPABILITIES: Record<string, RoomCapability> = {
  projector: (room) => !!room.hasProjector,
  smartboard: (room) => !!room.hasSmartboard,
  'smart board': (room) => !!room.hasSmartboard,
  computer: (room) => !!room.hasComputers,
  computers: (room) => !!room.hasComputers,
  lab: isLabRoom,
  'lab equipment': isLabRoom,
};

export function parseResourceTokens(resources: string | null | undefined): string[] {
  if (!resources) return [];
  return resources
    .split(',')
    .map((token) => token.trim().toLowerCase().replace(/\s+/g, ' '))
    .filter((token) => token.length > 0);
}

/**
 * Required-resource tokens the room cannot provide. Tokens without a known
 * room capability are not checked.
 */
export function missingResources(room: Room, course: Course): string[] {
  return parseResourceTokens(course.requiredResources).filter((token) => {
    const capability = RESOURCE_CAPABILITIES[token];
    return capability !== undefined && !capability(room);
  });
}

export function roomTypeProblem(room: Room, course: Course, settings: ConflictSettings): ConflictSeverity | null {
  if (isLabRoom(room)) return null;
  if (course.requiresLab) return 'HIGH';
  if (course.subject && settings.scienceSubjects.includes(course.subject)) return 'MEDIUM';
  return null;
}

export const detectRoomTypeMismatches: ConflictCheck = (snapshot, settings) => {
  const conflicts: Conflict[] = [];

  for (const slot of compact(snapshot.slots)) {
    const { room, course } = slot;
    if (!room || !course) continue;

    const severity = roomTypeProblem(room, course, settings);
    if (!severity) continue;

    conflicts.push(
      createConflict(snapshot.scheduleId, {
        type: 'ROOM_TYPE_MISMATCH',
        severity,
        title: `${course.courseName} needs a lab`,
        description: `${slotLabel(slot)} is in ${room.roomType} room ${room.roomNumber}`,
        slots: [slot],
        rooms: [room],
        courses: [course],
      })
    );
  }
  return conflicts;
};

export const detectEquipmentUnavailability: ConflictCheck = (snapshot) => {
  const conflicts: Conflict[] = [];

  for (const slot of compact(snapshot.slots)) {
    const { room, course } = slot;
    if (!room || !course) continue;

    for (const token of missingResources(room, course)) {
      conflicts.push(
        createConflict(snapshot.scheduleId, {
          type: 'EQUIPMENT_UNAVAILABLE',
          severity: 'MEDIUM',
          title: `Room ${room.roomNumber} has no ${token}`,
          description: `${course.courseName} requires ${token}`,
          slots: [slot],
          rooms: [room],
          courses: [course],
        })
      );
    }
  }
  return conflicts;
};

// ---------------------------------------------------------------------------
// Students
// ---------------------------------------------------------------------------

function activeByStudent(enrollments: Enrollment[]): Map<string, Enrollment[]> {
  const groups = new Map<string, Enrollment[]>();
  for (const enrollment of enrollments) {
    if (!isActiveEnrollment(enrollment) || !enrollment.student) continue;
    const list = groups.get(enrollment.student.id) ?? [];
    list.push(enrollment);
    groups.set(enrollment.student.id, list);
  }
  return groups;
}

export const detectStudentScheduleConflicts: ConflictCheck = (snapshot) => {
  const conflicts: Conflict[] = [];

  for (const enrollments of activeByStudent(snapshot.enrollments).values()) {
    for (let i = 0; i < enrollments.length; i++) {
      for (let j = i + 1; j < enrollments.length; j++) {
        const a = enrollments[i].slot;
        const b = enrollments[j].slot;
        const student = enrollments[i].student;
        if (!a || !b || !student || !slotsOverlap(a, b)) continue;

        conflicts.push(
          createConflict(snapshot.scheduleId, {
            type: 'STUDENT_SCHEDULE_CONFLICT',
            severity: 'HIGH',
            title: `${student.firstName} ${student.lastName} has overlapping classes`,
            description: `${slotLabel(a)} overlaps ${slotLabel(b)}`,
            slots: [a, b],
            students: [student],
            courses: compact([enrollments[i].course, enrollments[j].course]),
          })
        );
      }
    }
  }
  return conflicts;
};

export const detectDuplicateEnrollments: ConflictCheck = (snapshot) => {
  const conflicts: Conflict[] = [];
  const groups = new Map<string, Enrollment[]>();

  for (const enrollment of snapshot.enrollments) {
    if (!isActiveEnrollment(enrollment) || !enrollment.student || !enrollment.course) continue;
    const key = `${enrollment.student.id}|${enrollment.course.id}`;
    groups.set(key, [...(groups.get(key) ?? []), enrollment]);
  }

  for (const enrollments of groups.values()) {
    if (enrollments.length < 2) continue;
    const { student, course } = enrollments[0];
    if (!student || !course) continue;

    conflicts.push(
      createConflict(snapshot.scheduleId, {
        type: 'DUPLICATE_ENROLLMENT',
        severity: 'HIGH',
        title: `${student.firstName} ${student.lastName} is enrolled in ${course.courseCode} ${enrollments.length} times`,
        description: `Duplicate active enrollments for ${course.courseName}`,
        slots: uniqueById(enrollments.map((enrollment) => enrollment.slot)),
        students: [student],
        courses: [course],
      })
    );
  }
  return conflicts;
};

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

export const detectSectionOverEnrollment: ConflictCheck = (snapshot) => {
  const conflicts: Conflict[] = [];

  for (const section of compact(snapshot.sections)) {
    const max = section.maxEnrollment;
    if (max === null || max === undefined || section.currentEnrollment <= max) continue;

    conflicts.push(
      createConflict(snapshot.scheduleId, {
        type: 'SECTION_OVER_ENROLLED',
        severity: 'HIGH',
        title: `Section ${section.sectionNumber} is over-enrolled`,
        description: `${section.currentEnrollment} students enrolled, maximum is ${max}`,
        courses: compact([section.course]),
      })
    );
  }

  const counts = countActiveEnrollments(snapshot.enrollments);
  for (const slot of uniqueById(snapshot.slots)) {
    const max = slot.course?.maxStudents;
    const enrolled = counts.get(slot.id) ?? 0;
    if (!slot.course || max === null || max === undefined || enrolled <= max) continue;

    conflicts.push(
      createConflict(snapshot.scheduleId, {
        type: 'SECTION_OVER_ENROLLED',
        severity: 'HIGH',
        title: `${slot.course.courseCode} is over its enrollment limit`,
        description: `${enrolled} students enrolled in ${slotLabel(slot)}, course allows ${max}`,
        slots: [slot],
        courses: [slot.course],
      })
    );
  }
  return conflicts;
};

export const detectSectionUnderEnrollment: ConflictCheck = (snapshot) =>
  compact(snapshot.sections)
    .filter((section) => (positive(section.minEnrollment) ?? 0) > section.currentEnrollment)
    .map((section) =>
      createConflict(snapshot.scheduleId, {
        type: 'SECTION_UNDER_ENROLLED',
        severity: 'LOW',
        title: `Section ${section.sectionNumber} is under-enrolled`,
        description: `${section.currentEnrollment} students enrolled, minimum is ${section.minEnrollment}`,
        courses: compact([section.course]),
      })
    );

// Categories reserved for academic-record rules; they report nothing yet.
const noConflicts: ConflictCheck = () => [];

export const CONFLICT_CHECKS: Record<ConflictType, ConflictCheck> = {
  ROOM_DOUBLE_BOOKING: detectRoomDoubleBookings,
  TEACHER_OVERLOAD: detectTeacherOverloads,
  BACK_TO_BACK_VIOLATION: detectBackToBackViolations,
  NO_LUNCH_BREAK: detectMissingLunchBreaks,
  EXCESSIVE_CONSECUTIVE_CLASSES: detectExcessiveConsecutiveClasses,
  EXCESSIVE_TEACHING_HOURS: detectExcessiveTeachingHours,
  NO_PREPARATION_PERIOD: detectMissingPreparationPeriods,
  ROOM_CAPACITY_EXCEEDED: detectRoomCapacityViolations,
  ROOM_TYPE_MISMATCH: detectRoomTypeMismatches,
  EQUIPMENT_UNAVAILABLE: detectEquipmentUnavailability,
  SUBJECT_MISMATCH: detectSubjectMismatches,
  TEACHER_TRAVEL_TIME: detectTeacherTravelTimeIssues,
  STUDENT_SCHEDULE_CONFLICT: detectStudentScheduleConflicts,
  DUPLICATE_ENROLLMENT: detectDuplicateEnrollments,
  SECTION_OVER_ENROLLED: detectSectionOverEnrollment,
  SECTION_UNDER_ENROLLED: detectSectionUnderEnrollment,
  PREREQUISITE_VIOLATION: noConflicts,
  CREDIT_HOUR_VIOLATION: noConflicts,
  GRADUATION_REQUIREMENT: noConflicts,
  COURSE_SEQUENCE_VIOLATION: noConflicts,
  CO_REQUISITE_VIOLATION: noConflicts,
};

/** Checks that can be evaluated for a single slot against its schedule */
export const SLOT_LEVEL_CHECKS: readonly ConflictType[] = [
  'ROOM_DOUBLE_BOOKING',
  'TEACHER_OVERLOAD',
  'ROOM_CAPACITY_EXCEEDED',
  'ROOM_TYPE_MISMATCH',
  'EQUIPMENT_UNAVAILABLE',
  'SUBJECT_MISMATCH',
  'EXCESSIVE_TEACHING_HOURS',
  'EXCESSIVE_CONSECUTIVE_CLASSES',
];

export function runAllChecks(snapshot: ScheduleSnapshot, settings: ConflictSettings): Conflict[] {
  return CONFLICT_TYPES.flatMap((type) => CONFLICT_CHECKS[type](snapshot, settings));
}

/**
 * Slot-level detection: evaluates `slot` (persisted or hypothetical) against
 * the other slots of its schedule and keeps only conflicts involving it.
 */
export function detectForSlot(
  slot: ScheduleSlot,
  otherSlots: ScheduleSlot[],
  slotEnrollments: Enrollment[],
  settings: ConflictSettings
): Conflict[] {
  const snapshot: ScheduleSnapshot = {
    scheduleId: slot.scheduleId,
    slots: [slot, ...compact(otherSlots).filter((other) => other.id !== slot.id)],
    enrollments: slotEnrollments.filter((enrollment) => enrollment.slot?.id === slot.id),
    sections: [],
  };

  return SLOT_LEVEL_CHECKS.flatMap((type) => CONFLICT_CHECKS[type](snapshot, settings)).filter((conflict) =>
    conflict.affectedSlots.some((affected) => affected?.id === slot.id)
  );
}
