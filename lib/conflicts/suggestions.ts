/**
 * Suggestion Generator
 *
 * Heuristic remediation strategies registered per conflict type. Every call
 * recomputes candidates from the current store state; an optional advisory
 * service can add suggestions but never replaces or blocks the heuristics.
 */

import { Types } from 'mongoose';
import type { ConflictSettings } from '@/lib/config';
import type { ConflictRepositories } from '@/lib/repositories/types';
import { generateDaySchedule, slotsOverlap } from '@/lib/schoolTime';
import {
  isConflictType,
  type Conflict,
  type ConflictType,
  type Enrollment,
  type ResolutionAction,
  type ResolutionSuggestion,
  type ResolutionType,
  type Room,
  type ScheduleSlot,
  type SlotSwapSuggestion,
  type Teacher,
  type TimeSlotOption,
} from '@/types';
import { countActiveEnrollments, isActiveEnrollment, missingResources, roomTypeProblem, slotLabel } from './detector';

/** External advisor (e.g. an AI service) that may propose extra suggestions */
export interface SuggestionAdvisor {
  advise(conflict: Conflict): Promise<ResolutionSuggestion[]>;
}

type SuggestionStrategy = (conflict: Conflict, slots: ScheduleSlot[]) => Promise<ResolutionSuggestion[]>;

interface RoomCandidate {
  room: Room;
  needed: number;
}

const SLOT_SWAP_BENEFIT = 0.8;

function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.round(Math.min(1, Math.max(0, value)) * 100) / 100;
}

function buildSuggestion(
  type: ResolutionType,
  title: string,
  description: string,
  confidence: number,
  actions: ResolutionAction[],
  requiresConfirmation: boolean
): ResolutionSuggestion {
  return {
    id: new Types.ObjectId().toString(),
    type,
    title,
    description,
    confidence: clampConfidence(confidence),
    requiresConfirmation,
    actions,
    source: 'heuristic',
  };
}

export function genericSuggestion(conflict: Conflict | null): ResolutionSuggestion {
  return buildSuggestion(
    'MANUAL_REVIEW',
    'Review manually',
    conflict ? `No automatic fix is known for "${conflict.title}"` : 'No automatic fix is known',
    0.2,
    [],
    true
  );
}

function presentSlots(conflict: Conflict): ScheduleSlot[] {
  return (conflict.affectedSlots ?? []).filter((slot): slot is ScheduleSlot => !!slot);
}

/** True when another slot holding the same resource overlaps `slot` */
function isBooked(slot: ScheduleSlot, others: ScheduleSlot[], holdsResource: (other: ScheduleSlot) => boolean): boolean {
  return others.some((other) => other.id !== slot.id && holdsResource(other) && slotsOverlap(other, slot));
}

function requiredSeats(slot: ScheduleSlot, enrollments: Enrollment[]): number {
  const enrolled = countActiveEnrollments(enrollments).get(slot.id) ?? 0;
  return enrolled > 0 ? enrolled : slot.course?.maxStudents ?? 0;
}

function teachesSubject(teacher: Teacher, slot: ScheduleSlot): boolean {
  return !!teacher.department && teacher.department === slot.course?.subject;
}

/**
 * Stable sort by non-increasing confidence
 */
export function sortByConfidence(suggestions: ResolutionSuggestion[]): ResolutionSuggestion[] {
  return [...suggestions].sort((a, b) => b.confidence - a.confidence);
}

export class ConflictSuggestionService {
  private readonly strategies: Partial<Record<ConflictType, SuggestionStrategy>>;

  constructor(
    private readonly repositories: ConflictRepositories,
    private readonly settings: ConflictSettings,
    private readonly advisor: SuggestionAdvisor | null = null
  ) {
    const roomChange: SuggestionStrategy = (_conflict, slots) => this.suggestRoomChanges(slots);
    const timeShift: SuggestionStrategy = (_conflict, slots) => this.suggestTimeShift(slots);

    this.strategies = {
      // Move the later booking first
      ROOM_DOUBLE_BOOKING: (_conflict, slots) => this.suggestRoomChanges([...slots].reverse()),
      ROOM_CAPACITY_EXCEEDED: roomChange,
      ROOM_TYPE_MISMATCH: roomChange,
      EQUIPMENT_UNAVAILABLE: roomChange,
      TEACHER_OVERLOAD: (_conflict, slots) => this.suggestForTeacherOverload(slots),
      STUDENT_SCHEDULE_CONFLICT: (conflict, slots) => this.suggestStudentReassignments(conflict, slots),
      SUBJECT_MISMATCH: (_conflict, slots) => this.suggestDepartmentTeachers(slots),
      EXCESSIVE_TEACHING_HOURS: (_conflict, slots) => this.suggestLoadRedistribution(slots),
      TEACHER_TRAVEL_TIME: (_conflict, slots) => this.suggestNearbyRooms(slots),
      BACK_TO_BACK_VIOLATION: timeShift,
      NO_LUNCH_BREAK: timeShift,
      EXCESSIVE_CONSECUTIVE_CLASSES: timeShift,
      SECTION_OVER_ENROLLED: async (conflict) => [this.splitSection(conflict)],
    };
  }

  async generateSuggestions(conflict: Conflict | null | undefined): Promise<ResolutionSuggestion[]> {
    if (!conflict) return [];

    const type = conflict.conflictType;
    const strategy = isConflictType(type) ? this.strategies[type] : undefined;
    const heuristic = strategy ? await strategy(conflict, presentSlots(conflict)) : [genericSuggestion(conflict)];
    const advisory = await this.adviseSafely(conflict);

    return sortByConfidence([...heuristic, ...advisory]);
  }

  async getBestSuggestion(conflict: Conflict | null | undefined): Promise<ResolutionSuggestion | null> {
    const suggestions = await this.generateSuggestions(conflict);
    return suggestions[0] ?? null;
  }

  /**
   * Exactly one swap suggestion when the conflict names exactly two slots
   */
  suggestSlotSwaps(conflict: Conflict | null | undefined): SlotSwapSuggestion[] {
    if (!conflict?.affectedSlots || conflict.affectedSlots.length !== 2) return [];

    const [slotA, slotB] = conflict.affectedSlots;
    if (!slotA || !slotB) return [];

    return [
      {
        slotA,
        slotB,
        benefit: SLOT_SWAP_BENEFIT,
        description: `Swap ${slotLabel(slotA)} with ${slotLabel(slotB)}`,
      },
    ];
  }

  // -------------------------------------------------------------------------
  // Alternatives
  // -------------------------------------------------------------------------

  private async scheduleSlots(slot: ScheduleSlot): Promise<ScheduleSlot[]> {
    return slot.scheduleId ? this.repositories.slots.findBySchedule(slot.scheduleId) : [];
  }

  private async roomCandidates(slot: ScheduleSlot | null | undefined): Promise<RoomCandidate[]> {
    const course = slot?.course;
    if (!slot || !course) return [];

    const [rooms, others, enrollments] = await Promise.all([
      this.repositories.rooms.findAll(),
      this.scheduleSlots(slot),
      this.repositories.enrollments.findBySlot(slot.id),
    ]);
    const needed = requiredSeats(slot, enrollments);

    return rooms
      .filter((room): room is Room => !!room && room.active !== false && room.id !== slot.room?.id)
      .filter((room) => room.capacity >= needed)
      .filter((room) => roomTypeProblem(room, course, this.settings) === null)
      .filter((room) => missingResources(room, course).length === 0)
      .filter((room) => !isBooked(slot, others, (other) => other.room?.id === room.id))
      .map((room) => ({ room, needed }));
  }

  async findAlternativeRooms(slot: ScheduleSlot | null | undefined): Promise<Room[]> {
    return (await this.roomCandidates(slot)).map((candidate) => candidate.room);
  }

  /**
   * Active teachers free during the slot, same-subject teachers first
   */
  async findAlternativeTeachers(slot: ScheduleSlot | null | undefined): Promise<Teacher[]> {
    if (!slot?.course) return [];

    const [teachers, others] = await Promise.all([
      this.repositories.teachers.findAllActive(),
      this.scheduleSlots(slot),
    ]);

    return teachers
      .filter((teacher): teacher is Teacher => !!teacher && teacher.active && teacher.id !== slot.teacher?.id)
      .filter((teacher) => !isBooked(slot, others, (other) => other.teacher?.id === teacher.id))
      .sort((a, b) => Number(teachesSubject(b, slot)) - Number(teachesSubject(a, slot)));
  }

  /**
   * Standard periods on working days where the slot's teacher, room and
   * enrolled students are all free. Same-day options rank first.
   */
  async findAlternativeTimeSlots(slot: ScheduleSlot | null | undefined): Promise<TimeSlotOption[]> {
    if (!slot?.course || !slot.scheduleId) return [];

    const [others, enrollments] = await Promise.all([
      this.repositories.slots.findBySchedule(slot.scheduleId),
      this.repositories.enrollments.findBySchedule(slot.scheduleId),
    ]);

    const studentIds = new Set(
      enrollments
        .filter((enrollment) => isActiveEnrollment(enrollment) && enrollment.slot?.id === slot.id)
        .map((enrollment) => enrollment.student?.id)
    );
    const studentSlots = enrollments
      .filter((enrollment) => isActiveEnrollment(enrollment) && studentIds.has(enrollment.student?.id))
      .map((enrollment) => enrollment.slot)
      .filter((other): other is ScheduleSlot => !!other && other.id !== slot.id);

    const options: TimeSlotOption[] = [];
    for (const day of this.settings.workingDays) {
      for (const period of generateDaySchedule(this.settings.schoolDay)) {
        if (day === slot.dayOfWeek && period.startTime === slot.startTime) continue;

        const candidate: ScheduleSlot = {
          ...slot,
          dayOfWeek: day,
          startTime: period.startTime,
          endTime: period.endTime,
          periodNumber: period.number,
        };
        const blocked =
          isBooked(
            candidate,
            others,
            (other) =>
              (!!slot.teacher && other.teacher?.id === slot.teacher.id) ||
              (!!slot.room && other.room?.id === slot.room.id)
          ) || studentSlots.some((other) => slotsOverlap(other, candidate));
        if (blocked) continue;

        options.push({
          dayOfWeek: day,
          startTime: period.startTime,
          endTime: period.endTime,
          periodNumber: period.number,
          score: day === slot.dayOfWeek ? 1 : 0.8,
        });
      }
    }

    return options.sort((a, b) => b.score - a.score);
  }

  // -------------------------------------------------------------------------
  // Strategies
  // -------------------------------------------------------------------------

  private roomChangeSuggestion(slot: ScheduleSlot, candidate: RoomCandidate, confidenceBoost = 0): ResolutionSuggestion {
    const { room, needed } = candidate;
    const headroom = needed > 0 ? Math.min(1, (room.capacity - needed) / needed) : 1;
    const amenities = [room.hasProjector, room.hasSmartboard, room.hasComputers].filter(Boolean).length / 3;

    return buildSuggestion(
      'CHANGE_ROOM',
      `Move to room ${room.roomNumber}`,
      `Move ${slotLabel(slot)} to room ${room.roomNumber} (${room.capacity} seats)`,
      0.55 + 0.25 * headroom + 0.15 * amenities + confidenceBoost,
      [{ actionType: 'CHANGE_ROOM', targetSlot: slot, newRoom: room }],
      false
    );
  }

  private async suggestRoomChanges(targets: ScheduleSlot[]): Promise<ResolutionSuggestion[]> {
    const suggestions: ResolutionSuggestion[] = [];
    for (const slot of targets) {
      const candidates = await this.roomCandidates(slot);
      suggestions.push(
        ...candidates.slice(0, this.settings.maxSuggestionsPerStrategy).map((candidate) =>
          this.roomChangeSuggestion(slot, candidate)
        )
      );
    }
    return suggestions;
  }

  private async suggestNearbyRooms(slots: ScheduleSlot[]): Promise<ResolutionSuggestion[]> {
    const [previous, next] = slots;
    const building = previous?.room?.building;
    if (!next || !building) return [];

    const candidates = (await this.roomCandidates(next)).filter((candidate) => candidate.room.building === building);
    return candidates
      .slice(0, this.settings.maxSuggestionsPerStrategy)
      .map((candidate) => this.roomChangeSuggestion(next, candidate, -0.1));
  }

  private async suggestForTeacherOverload(slots: ScheduleSlot[]): Promise<ResolutionSuggestion[]> {
    const target = slots[1] ?? slots[0];
    if (!target) return [];

    const [teachers, times] = await Promise.all([
      this.findAlternativeTeachers(target),
      this.findAlternativeTimeSlots(target),
    ]);
    const limit = this.settings.maxSuggestionsPerStrategy;

    const teacherSuggestions = teachers.slice(0, limit).map((teacher) => {
      const sameSubject = teachesSubject(teacher, target);
      return buildSuggestion(
        'CHANGE_TEACHER',
        `Assign ${teacher.name}`,
        `${teacher.name} takes over ${slotLabel(target)}`,
        sameSubject ? 0.8 : 0.55,
        [{ actionType: 'CHANGE_TEACHER', targetSlot: target, newTeacher: teacher }],
        !sameSubject
      );
    });

    const timeSuggestions = times.slice(0, limit).map((option) =>
      buildSuggestion(
        'CHANGE_TIME_SLOT',
        `Move to ${option.dayOfWeek} ${option.startTime}`,
        `Move ${slotLabel(target)} to ${option.dayOfWeek} ${option.startTime}-${option.endTime}`,
        0.5 + 0.2 * option.score,
        [{ actionType: 'MOVE_SLOT', targetSlot: target, newTime: option }],
        true
      )
    );

    return [...teacherSuggestions, ...timeSuggestions];
  }

  private async suggestStudentReassignments(conflict: Conflict, slots: ScheduleSlot[]): Promise<ResolutionSuggestion[]> {
    const scheduleId = conflict.scheduleId ?? slots[0]?.scheduleId;
    if (!scheduleId || conflict.affectedStudents.length === 0) return [];

    const [scheduleSlots, enrollments] = await Promise.all([
      this.repositories.slots.findBySchedule(scheduleId),
      this.repositories.enrollments.findBySchedule(scheduleId),
    ]);
    const counts = countActiveEnrollments(enrollments);
    const suggestions: ResolutionSuggestion[] = [];

    for (const student of conflict.affectedStudents) {
      const studentSlots = enrollments
        .filter((enrollment) => isActiveEnrollment(enrollment) && enrollment.student?.id === student.id)
        .map((enrollment) => enrollment.slot)
        .filter((slot): slot is ScheduleSlot => !!slot);

      // Try moving out of the later slot first
      for (const from of [...slots].reverse()) {
        const courseId = from.course?.id;
        if (!courseId) continue;

        const keep = studentSlots.filter((slot) => slot.id !== from.id);
        const sections = scheduleSlots.filter(
          (slot) =>
            slot.id !== from.id &&
            slot.course?.id === courseId &&
            !keep.some((other) => other.id === slot.id || slotsOverlap(other, slot)) &&
            (!slot.room || (counts.get(slot.id) ?? 0) < slot.room.capacity)
        );

        for (const section of sections.slice(0, this.settings.maxSuggestionsPerStrategy)) {
          const fill = section.room ? (counts.get(section.id) ?? 0) / section.room.capacity : 0.5;
          suggestions.push(
            buildSuggestion(
              'REASSIGN_STUDENT',
              `Move ${student.firstName} ${student.lastName} to another section`,
              `Reassign from ${slotLabel(from)} to ${slotLabel(section)}`,
              0.8 - 0.3 * fill,
              [{ actionType: 'REASSIGN_STUDENT', targetSlot: from, newSlot: section, student }],
              false
            )
          );
        }
      }
    }
    return suggestions;
  }

  private async suggestDepartmentTeachers(slots: ScheduleSlot[]): Promise<ResolutionSuggestion[]> {
    const slot = slots[0];
    if (!slot) return [];

    const teachers = (await this.findAlternativeTeachers(slot)).filter((teacher) => teachesSubject(teacher, slot));
    return teachers.slice(0, this.settings.maxSuggestionsPerStrategy).map((teacher) =>
      buildSuggestion(
        'CHANGE_TEACHER',
        `Assign ${teacher.name} (${teacher.department})`,
        `${teacher.name} from the ${teacher.department} department takes over ${slotLabel(slot)}`,
        0.85,
        [{ actionType: 'CHANGE_TEACHER', targetSlot: slot, newTeacher: teacher }],
        false
      )
    );
  }

  private async suggestLoadRedistribution(slots: ScheduleSlot[]): Promise<ResolutionSuggestion[]> {
    const ordered = [...slots].sort((a, b) => (a.startTime ?? '').localeCompare(b.startTime ?? ''));
    const last = ordered[ordered.length - 1];
    const suggestions: ResolutionSuggestion[] = [];
    const limit = this.settings.maxSuggestionsPerStrategy;

    if (last) {
      const teachers = await this.findAlternativeTeachers(last);
      suggestions.push(
        ...teachers.slice(0, limit).map((teacher) =>
          buildSuggestion(
            'REDISTRIBUTE_LOAD',
            `Hand ${slotLabel(last)} to ${teacher.name}`,
            `Reduce the daily load by giving the last period of the day to ${teacher.name}`,
            teachesSubject(teacher, last) ? 0.5 : 0.4,
            [{ actionType: 'CHANGE_TEACHER', targetSlot: last, newTeacher: teacher }],
            true
          )
        )
      );

      if (teachers.length === 0) {
        const otherDays = (await this.findAlternativeTimeSlots(last)).filter(
          (option) => option.dayOfWeek !== last.dayOfWeek
        );
        suggestions.push(
          ...otherDays.slice(0, limit).map((option) =>
            buildSuggestion(
              'REDISTRIBUTE_LOAD',
              `Move ${slotLabel(last)} to ${option.dayOfWeek}`,
              `Spread the load by moving the last period to ${option.dayOfWeek} ${option.startTime}`,
              0.4,
              [{ actionType: 'MOVE_SLOT', targetSlot: last, newTime: option }],
              true
            )
          )
        );
      }
    }

    suggestions.push(
      buildSuggestion(
        'ADD_CO_TEACHER',
        'Add a co-teacher',
        'Share the day with a co-teacher to bring the period count under the limit',
        0.3,
        [],
        true
      )
    );
    return suggestions;
  }

  private async suggestTimeShift(slots: ScheduleSlot[]): Promise<ResolutionSuggestion[]> {
    const target = slots[slots.length - 1];
    if (!target) return [];

    const options = await this.findAlternativeTimeSlots(target);
    return options.slice(0, this.settings.maxSuggestionsPerStrategy).map((option) =>
      buildSuggestion(
        'CHANGE_TIME_SLOT',
        `Move to ${option.dayOfWeek} ${option.startTime}`,
        `Move ${slotLabel(target)} to ${option.dayOfWeek} ${option.startTime}-${option.endTime}`,
        0.45 + 0.1 * option.score,
        [{ actionType: 'MOVE_SLOT', targetSlot: target, newTime: option }],
        true
      )
    );
  }

  private splitSection(conflict: Conflict): ResolutionSuggestion {
    const course = conflict.affectedCourses[0];
    return buildSuggestion(
      'SPLIT_SECTION',
      'Split the section',
      course ? `Open an additional section of ${course.courseName}` : 'Open an additional section',
      0.35,
      [],
      true
    );
  }

  /**
   * Advisor suggestions, or none when the advisor fails or has not answered
   * within `advisorTimeoutMs`
   */
  private async adviseSafely(conflict: Conflict): Promise<ResolutionSuggestion[]> {
    if (!this.advisor) return [];

    const timeoutMs = this.settings.advisorTimeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => reject(new Error(`no answer within ${timeoutMs} ms`)), timeoutMs);
    });

    try {
      const advice = await Promise.race([this.advisor.advise(conflict), deadline]);
      return advice.map((suggestion) => ({
        ...suggestion,
        confidence: clampConfidence(suggestion.confidence),
        requiresConfirmation: true,
        source: 'advisor' as const,
      }));
    } catch (error) {
      console.warn(
        '⚠️ Advisory service unavailable, using heuristic suggestions only:',
        error instanceof Error ? error.message : error
      );
      return [];
    } finally {
      clearTimeout(timer);
    }
  }
}
