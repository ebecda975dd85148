import { requireArgument } from '@/lib/errors';
import type { ConflictRepositories } from '@/lib/repositories/types';
import { toInterval } from '@/lib/schoolTime';
import {
  DAYS_OF_WEEK,
  isActionType,
  type ActingUser,
  type ActionType,
  type Conflict,
  type ConflictType,
  type ResolutionAction,
  type ResolutionImpact,
  type ResolutionSuggestion,
  type Room,
  type Schedule,
  type ScheduleSlot,
  type Student,
  type Teacher,
  type TimeChange,
} from '@/types';
import type { ConflictDetectionService } from './aggregator';
import { isActiveEnrollment } from './detector';
import { canAutoApply, type AutoResolutionPolicy } from './policy';
import type { ConflictSuggestionService } from './suggestions';

type ActionHandler = (action: ResolutionAction, user: ActingUser) => Promise<boolean>;

export interface BatchOptions {
  // Checked between conflicts; the conflict in progress always completes
  signal?: AbortSignal;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isValidTime(time: TimeChange): boolean {
  return DAYS_OF_WEEK.includes(time.dayOfWeek) && toInterval(time.startTime, time.endTime) !== null;
}

/**
 * Resolution Applier
 *
 * Turns suggestions into store mutations. Invalid input is reported as
 * `false`, never thrown; the acting user is always passed in by the caller.
 * Callers must serialize mutations of the same schedule.
 */
export class ConflictResolutionService {
  private readonly handlers: Record<ActionType, ActionHandler>;

  constructor(
    private readonly repositories: ConflictRepositories,
    private readonly detection: ConflictDetectionService,
    private readonly suggestions: ConflictSuggestionService,
    private readonly policy: AutoResolutionPolicy
  ) {
    this.handlers = {
      CHANGE_ROOM: async (action) => this.changeRoom(action.targetSlot, action.newRoom),
      CHANGE_TEACHER: async (action) => this.changeTeacher(action.targetSlot, action.newTeacher),
      MOVE_SLOT: async (action) => this.moveSlot(action.targetSlot, action.newTime),
      SWAP_SLOTS: async (action) => this.swapSlots(action.targetSlot, action.swapWith),
      DELETE_SLOT: async (action, user) =>
        this.deleteSlot(action.targetSlot, user, action.reason ?? 'Removed to resolve a conflict'),
      REASSIGN_STUDENT: async (action) => this.reassignStudent(action.student, action.targetSlot, action.newSlot),
    };
  }

  async applyResolution(
    conflict: Conflict | null | undefined,
    suggestion: ResolutionSuggestion | null | undefined,
    user: ActingUser | null | undefined
  ): Promise<boolean> {
    if (!conflict || !suggestion || !user) return false;
    if (!suggestion.actions || suggestion.actions.length === 0) return false;

    // Validate every action before touching the store
    const steps: Array<{ action: ResolutionAction; type: ActionType }> = [];
    for (const action of suggestion.actions) {
      if (!action || !isActionType(action.actionType)) return false;
      steps.push({ action, type: action.actionType });
    }

    for (const { action, type } of steps) {
      if (!(await this.handlers[type](action, user))) {
        console.warn(`⚠️ ${type} failed while applying "${suggestion.title}" to conflict ${conflict.id}`);
        return false;
      }
    }

    await this.markResolved(conflict, user, `Applied: ${suggestion.title}`);
    console.log(`✅ Applied "${suggestion.title}" to conflict ${conflict.id} (by ${user.username})`);

    await this.reportRegressions(steps.map((step) => step.action));
    return true;
  }

  private async reportRegressions(actions: ResolutionAction[]): Promise<void> {
    const slotIds = new Set(actions.map((action) => action.targetSlot?.id).filter((id): id is string => !!id));

    for (const id of slotIds) {
      const slot = await this.repositories.slots.findById(id);
      if (!slot) continue;

      const critical = (await this.detection.detectConflictsForSlot(slot)).filter(
        (conflict) => conflict.severity === 'CRITICAL'
      );
      if (critical.length > 0) {
        console.warn(`⚠️ Slot ${id} has ${critical.length} critical conflict(s) after the change`);
      }
    }
  }

  // -------------------------------------------------------------------------
  // Mutation primitives
  // -------------------------------------------------------------------------

  private async persistSlot(slot: ScheduleSlot, operation: string): Promise<boolean> {
    try {
      await this.repositories.slots.save(slot);
      return true;
    } catch (error) {
      console.error(`❌ Failed to ${operation} slot ${slot.id}:`, errorMessage(error));
      return false;
    }
  }

  /**
   * Stored version of a slot; the copy passed in may predate earlier changes
   */
  private async currentSlot(slot: ScheduleSlot | null | undefined): Promise<ScheduleSlot | null> {
    if (!slot) return null;

    try {
      const stored = await this.repositories.slots.findById(slot.id);
      // Detached copy: the stored object may be updated in place by the save
      return stored ? { ...stored } : null;
    } catch (error) {
      console.error(`❌ Failed to load slot ${slot.id}:`, errorMessage(error));
      return null;
    }
  }

  async moveSlot(slot: ScheduleSlot | null | undefined, time: TimeChange | null | undefined): Promise<boolean> {
    if (!slot || !time || !isValidTime(time)) return false;

    const current = await this.currentSlot(slot);
    if (!current) return false;

    return this.persistSlot(
      {
        ...current,
        dayOfWeek: time.dayOfWeek,
        startTime: time.startTime,
        endTime: time.endTime,
        periodNumber: time.periodNumber ?? current.periodNumber,
      },
      'move'
    );
  }

  async changeRoom(slot: ScheduleSlot | null | undefined, room: Room | null | undefined): Promise<boolean> {
    if (!slot || !room) return false;

    const current = await this.currentSlot(slot);
    return current ? this.persistSlot({ ...current, room }, 'change room of') : false;
  }

  async changeTeacher(slot: ScheduleSlot | null | undefined, teacher: Teacher | null | undefined): Promise<boolean> {
    if (!slot || !teacher) return false;

    const current = await this.currentSlot(slot);
    return current ? this.persistSlot({ ...current, teacher }, 'change teacher of') : false;
  }

  /**
   * Exchange time and room; teacher and course stay with their slot.
   * If the second write fails the first slot is put back.
   */
  async swapSlots(a: ScheduleSlot | null | undefined, b: ScheduleSlot | null | undefined): Promise<boolean> {
    if (!a || !b || a.id === b.id) return false;

    const [first, second] = await Promise.all([this.currentSlot(a), this.currentSlot(b)]);
    if (!first || !second) return false;

    const movedFirst: ScheduleSlot = {
      ...first,
      dayOfWeek: second.dayOfWeek,
      startTime: second.startTime,
      endTime: second.endTime,
      periodNumber: second.periodNumber,
      room: second.room,
    };
    const movedSecond: ScheduleSlot = {
      ...second,
      dayOfWeek: first.dayOfWeek,
      startTime: first.startTime,
      endTime: first.endTime,
      periodNumber: first.periodNumber,
      room: first.room,
    };

    if (!(await this.persistSlot(movedFirst, 'swap'))) return false;
    if (await this.persistSlot(movedSecond, 'swap')) return true;

    if (!(await this.persistSlot(first, 'restore'))) {
      console.error(`❌ Slot ${first.id} was left at the time and room of slot ${second.id}`);
    }
    return false;
  }

  async deleteSlot(slot: ScheduleSlot | null | undefined, user: ActingUser, reason: string): Promise<boolean> {
    if (!slot) return false;

    try {
      await this.repositories.slots.delete(slot.id);
      console.log(`🗑️ Slot ${slot.id} deleted by ${user.username}: ${reason}`);
      return true;
    } catch (error) {
      console.error(`❌ Failed to delete slot ${slot.id}:`, errorMessage(error));
      return false;
    }
  }

  /** Move a student's active enrollment from one slot to another */
  async reassignStudent(
    student: Student | null | undefined,
    from: ScheduleSlot | null | undefined,
    to: ScheduleSlot | null | undefined
  ): Promise<boolean> {
    if (!student || !from || !to || from.id === to.id) return false;

    const target = await this.currentSlot(to);
    if (!target) return false;

    try {
      const enrollment = (await this.repositories.enrollments.findBySlot(from.id)).find(
        (candidate) => isActiveEnrollment(candidate) && candidate.student?.id === student.id
      );
      if (!enrollment) return false;

      await this.repositories.enrollments.save({
        ...enrollment,
        slot: target,
        course: target.course ?? enrollment.course,
      });
      return true;
    } catch (error) {
      console.error(`❌ Failed to reassign student ${student.studentId}:`, errorMessage(error));
      return false;
    }
  }

  // -------------------------------------------------------------------------
  // Auto-resolution
  // -------------------------------------------------------------------------

  canAutoApply(suggestion: ResolutionSuggestion | null | undefined): boolean {
    return canAutoApply(suggestion, this.policy);
  }

  /**
   * Re-run slot-level detection against the state a change would produce.
   * Missing candidates keep the slot's current values.
   */
  async validateResolution(
    slot: ScheduleSlot | null | undefined,
    candidateTime: TimeChange | null,
    candidateRoom: Room | null,
    candidateTeacher: Teacher | null
  ): Promise<Conflict[]> {
    if (!slot) return [];

    return this.detection.detectConflictsForSlot({
      ...slot,
      dayOfWeek: candidateTime?.dayOfWeek ?? slot.dayOfWeek,
      startTime: candidateTime?.startTime ?? slot.startTime,
      endTime: candidateTime?.endTime ?? slot.endTime,
      room: candidateRoom ?? slot.room,
      teacher: candidateTeacher ?? slot.teacher,
    });
  }

  private async leavesCriticalConflicts(suggestion: ResolutionSuggestion): Promise<boolean> {
    for (const action of suggestion.actions) {
      if (!action?.targetSlot) continue;
      if (action.actionType !== 'CHANGE_ROOM' && action.actionType !== 'CHANGE_TEACHER' && action.actionType !== 'MOVE_SLOT') {
        continue;
      }

      const conflicts = await this.validateResolution(
        action.targetSlot,
        action.newTime ?? null,
        action.newRoom ?? null,
        action.newTeacher ?? null
      );
      if (conflicts.some((conflict) => conflict.severity === 'CRITICAL')) return true;
    }
    return false;
  }

  /**
   * Apply the best suggestion the policy accepts whose resulting state has no
   * critical conflict. Suggestions are generated fresh on every call.
   */
  async autoResolve(conflict: Conflict | null | undefined, user: ActingUser | null | undefined): Promise<boolean> {
    if (!conflict || !user || conflict.status !== 'ACTIVE') return false;

    const suggestions = await this.suggestions.generateSuggestions(await this.withCurrentSlots(conflict));
    for (const suggestion of suggestions) {
      if (!this.canAutoApply(suggestion)) continue;
      if (await this.leavesCriticalConflicts(suggestion)) continue;
      return this.applyResolution(conflict, suggestion, user);
    }
    return false;
  }

  /** The conflict as seen now: affected slots re-read from the store, deleted ones as null */
  private async withCurrentSlots(conflict: Conflict): Promise<Conflict> {
    const affectedSlots = await Promise.all(conflict.affectedSlots.map((slot) => this.currentSlot(slot)));
    return { ...conflict, affectedSlots };
  }

  private async autoResolveEach(
    conflicts: Array<Conflict | null | undefined>,
    user: ActingUser,
    signal: AbortSignal | undefined
  ): Promise<number> {
    let resolved = 0;
    for (const conflict of conflicts) {
      if (signal?.aborted) {
        console.log(`⏹️ Auto-resolution stopped after ${resolved} resolution(s)`);
        break;
      }
      if (!conflict || conflict.status !== 'ACTIVE') continue;
      if (await this.autoResolve(conflict, user)) resolved += 1;
    }
    return resolved;
  }

  async autoResolveAll(
    schedule: Schedule | null | undefined,
    user: ActingUser | null | undefined,
    options: BatchOptions = {}
  ): Promise<number> {
    if (!schedule || !user) return 0;

    const conflicts = await this.repositories.conflicts.findActiveBySchedule(schedule.id);
    return this.autoResolveEach(conflicts, user, options.signal);
  }

  async autoResolveByType(
    schedule: Schedule | null | undefined,
    type: ConflictType,
    user: ActingUser | null | undefined,
    options: BatchOptions = {}
  ): Promise<number> {
    if (!schedule || !user) return 0;

    const conflicts = await this.repositories.conflicts.findByType(schedule.id, type);
    return this.autoResolveEach(conflicts, user, options.signal);
  }

  // -------------------------------------------------------------------------
  // Impact and status
  // -------------------------------------------------------------------------

  async analyzeImpact(action: ResolutionAction | null | undefined): Promise<ResolutionImpact> {
    if (!action) {
      return {
        touchedSlotIds: [],
        affectedSlotCount: 0,
        affectedStudentCount: 0,
        affectedTeacherCount: 0,
        summary: 'No changes',
      };
    }

    const touched = new Map<string, ScheduleSlot>();
    for (const slot of [action.targetSlot, action.swapWith, action.newSlot]) {
      if (slot) touched.set(slot.id, slot);
    }

    const students = new Set<string>();
    if (action.student) {
      students.add(action.student.id);
    } else {
      const enrollments = await Promise.all([...touched.keys()].map((id) => this.repositories.enrollments.findBySlot(id)));
      for (const enrollment of enrollments.flat()) {
        if (isActiveEnrollment(enrollment) && enrollment.student) students.add(enrollment.student.id);
      }
    }

    const teachers = new Set<string>();
    for (const slot of touched.values()) {
      if (slot.teacher) teachers.add(slot.teacher.id);
    }
    if (action.newTeacher) teachers.add(action.newTeacher.id);

    return {
      touchedSlotIds: [...touched.keys()],
      affectedSlotCount: touched.size,
      affectedStudentCount: students.size,
      affectedTeacherCount: teachers.size,
      summary: `${action.actionType} touches ${touched.size} slot(s), ${students.size} student(s), ${teachers.size} teacher(s)`,
    };
  }

  async markResolved(conflict: Conflict | null | undefined, user: ActingUser, notes?: string): Promise<Conflict> {
    const target = requireArgument(conflict, 'conflict');
    if (target.status !== 'RESOLVED') {
      target.status = 'RESOLVED';
      target.resolvedAt = new Date();
      target.resolvedBy = user.username;
      target.resolutionNotes = notes ?? null;
    }
    return this.repositories.conflicts.save(target);
  }

  async markIgnored(conflict: Conflict | null | undefined, user: ActingUser, reason?: string): Promise<Conflict> {
    const target = requireArgument(conflict, 'conflict');
    if (target.status === 'ACTIVE') {
      target.status = 'IGNORED';
      target.resolvedBy = user.username;
      target.resolutionNotes = reason ?? null;
    }
    return this.repositories.conflicts.save(target);
  }

  async unignore(conflict: Conflict | null | undefined): Promise<Conflict> {
    const target = requireArgument(conflict, 'conflict');
    if (target.status === 'IGNORED') {
      target.status = 'ACTIVE';
      target.resolvedBy = null;
      target.resolutionNotes = null;
    }
    return this.repositories.conflicts.save(target);
  }
}
