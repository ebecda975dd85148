import type { ConflictSettings } from '@/lib/config';
import { StateConflictError, requireArgument } from '@/lib/errors';
import type { ConflictRepositories } from '@/lib/repositories/types';
import type {
  Conflict,
  ConflictSeverity,
  ConflictType,
  Schedule,
  ScheduleSlot,
  ValidationResult,
} from '@/types';
import { CONFLICT_CHECKS, detectForSlot, runAllChecks, type ScheduleSnapshot } from './detector';

/**
 * Conflict Aggregator
 *
 * Pulls a fresh snapshot of a schedule from the stores on every call, runs the
 * detector checks over it and owns the create/clear/refresh lifecycle of the
 * stored conflict set. Nothing is cached between calls.
 */
export class ConflictDetectionService {
  constructor(
    private readonly repositories: ConflictRepositories,
    private readonly settings: ConflictSettings
  ) {}

  private async loadSnapshot(schedule: Schedule): Promise<ScheduleSnapshot> {
    const [slots, enrollments, sections] = await Promise.all([
      this.repositories.slots.findBySchedule(schedule.id),
      this.repositories.enrollments.findBySchedule(schedule.id),
      this.repositories.sections.findAll(),
    ]);

    return { scheduleId: schedule.id, slots, enrollments, sections };
  }

  async detectAllConflicts(schedule: Schedule | null | undefined): Promise<Conflict[]> {
    const target = requireArgument(schedule, 'schedule');
    const snapshot = await this.loadSnapshot(target);
    return runAllChecks(snapshot, this.settings);
  }

  /** Run a single registered check over the whole schedule */
  async detectByType(schedule: Schedule | null | undefined, type: ConflictType): Promise<Conflict[]> {
    const target = requireArgument(schedule, 'schedule');
    const snapshot = await this.loadSnapshot(target);
    return CONFLICT_CHECKS[type](snapshot, this.settings);
  }

  /**
   * Incremental validation of one slot against the rest of its schedule.
   * The slot may hold unsaved changes; its stored version is ignored.
   */
  async detectConflictsForSlot(slot: ScheduleSlot | null | undefined): Promise<Conflict[]> {
    if (!slot) return [];

    const [others, enrollments] = await Promise.all([
      slot.scheduleId ? this.repositories.slots.findBySchedule(slot.scheduleId) : Promise.resolve([]),
      this.repositories.enrollments.findBySlot(slot.id),
    ]);

    return detectForSlot(slot, others, enrollments, this.settings);
  }

  /** Evaluate a slot that has not been persisted yet against an existing schedule */
  async detectPotentialConflicts(
    schedule: Schedule | null | undefined,
    candidate: ScheduleSlot | null | undefined
  ): Promise<Conflict[]> {
    const target = requireArgument(schedule, 'schedule');
    if (!candidate) return [];

    const [others, enrollments] = await Promise.all([
      this.repositories.slots.findBySchedule(target.id),
      this.repositories.enrollments.findBySlot(candidate.id),
    ]);

    return detectForSlot({ ...candidate, scheduleId: target.id }, others, enrollments, this.settings);
  }

  /**
   * Guard for callers that must not create a double-booking: throws when the
   * candidate slot would produce any CRITICAL conflict.
   */
  async assertSlotPlaceable(schedule: Schedule | null | undefined, candidate: ScheduleSlot): Promise<void> {
    const critical = (await this.detectPotentialConflicts(schedule, candidate)).filter(
      (conflict) => conflict.severity === 'CRITICAL'
    );

    if (critical.length > 0) {
      throw new StateConflictError(
        `Slot ${candidate.id} cannot be placed: ${critical.map((conflict) => conflict.title).join('; ')}`,
        critical.map((conflict) => conflict.id)
      );
    }
  }

  async validateSchedule(schedule: Schedule | null | undefined): Promise<ValidationResult> {
    const conflicts = await this.detectAllConflicts(schedule);
    const counts: Record<ConflictSeverity, number> = { CRITICAL: 0, HIGH: 0, MEDIUM: 0, LOW: 0, INFO: 0 };
    for (const conflict of conflicts) {
      counts[conflict.severity] += 1;
    }

    return {
      valid: counts.CRITICAL === 0 && counts.HIGH === 0,
      conflicts,
      criticalCount: counts.CRITICAL,
      highCount: counts.HIGH,
      mediumCount: counts.MEDIUM,
      lowCount: counts.LOW,
      infoCount: counts.INFO,
    };
  }

  async getConflictCount(schedule: Schedule | null | undefined): Promise<number> {
    const target = requireArgument(schedule, 'schedule');
    return this.repositories.conflicts.countActiveBySchedule(target.id);
  }

  async hasConflicts(schedule: Schedule | null | undefined): Promise<boolean> {
    return (await this.getConflictCount(schedule)) > 0;
  }

  async saveConflicts(conflicts: Array<Conflict | null | undefined>): Promise<Conflict[]> {
    const present = conflicts.filter((conflict): conflict is Conflict => !!conflict);
    if (present.length === 0) return [];
    return this.repositories.conflicts.saveAll(present);
  }

  async clearConflicts(schedule: Schedule | null | undefined): Promise<void> {
    const target = requireArgument(schedule, 'schedule');
    await this.repositories.conflicts.deleteBySchedule(target.id);
  }

  /**
   * Replace the stored conflict set of a schedule with a fresh detection pass.
   * Detection runs before anything is deleted. If saving the new set fails,
   * whatever part of it was written is removed and every previous record,
   * ignored and resolved ones included, is written back.
   */
  async refreshConflicts(schedule: Schedule | null | undefined): Promise<Conflict[]> {
    const target = requireArgument(schedule, 'schedule');

    const detected = await this.detectAllConflicts(target);
    // Copies: the store may hand out the objects it keeps
    const previous = (await this.repositories.conflicts.findBySchedule(target.id)).map((conflict) => ({ ...conflict }));
    const previouslyActive = previous.filter((conflict) => conflict.status === 'ACTIVE').length;

    await this.repositories.conflicts.deleteBySchedule(target.id);
    try {
      const saved = await this.repositories.conflicts.saveAll(detected);
      console.log(`🔍 Conflicts refreshed for ${target.name}: ${saved.length} active (was ${previouslyActive})`);
      return saved;
    } catch (error) {
      console.error(`❌ Failed to save conflicts for ${target.name}, restoring previous set:`, error);
      await this.repositories.conflicts.deleteBySchedule(target.id);
      await this.repositories.conflicts.saveAll(previous);
      throw error;
    }
  }
}
