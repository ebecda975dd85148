import type { ConflictRepository } from '@/lib/repositories/types';
import type {
  Conflict,
  ConflictSeverity,
  PriorityLevel,
  PriorityScore,
  ResolutionType,
} from '@/types';

const HARD_CONSTRAINT_SCORES: Record<ConflictSeverity, number> = {
  CRITICAL: 50,
  HIGH: 40,
  MEDIUM: 30,
  LOW: 15,
  INFO: 5,
};

// Default success rates (percent). More disruptive resolutions rank lower.
const HISTORICAL_SUCCESS_RATES: Record<ResolutionType, number> = {
  CHANGE_ROOM: 85,
  REASSIGN_STUDENT: 80,
  CHANGE_TEACHER: 75,
  CHANGE_TIME_SLOT: 70,
  SWAP_SLOTS: 65,
  REDISTRIBUTE_LOAD: 55,
  ADD_CO_TEACHER: 50,
  MANUAL_REVIEW: 50,
  SPLIT_SECTION: 40,
  REMOVE_SLOT: 30,
};

const MAX_CASCADE_IMPACT = 5;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface RankedConflict {
  conflict: Conflict;
  score: PriorityScore;
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

export function priorityLevelFor(totalScore: number): PriorityLevel {
  if (totalScore >= 70) return 'URGENT';
  if (totalScore >= 50) return 'HIGH';
  if (totalScore >= 30) return 'MEDIUM';
  return 'LOW';
}

export function getHistoricalSuccessRate(type: ResolutionType): number {
  return HISTORICAL_SUCCESS_RATES[type] ?? 50;
}

/**
 * Entities that have to move along with the fix: every affected slot after
 * the first, every affected student, every teacher after the first.
 */
export function estimateCascadeImpact(conflict: Conflict | null | undefined): number {
  if (!conflict) return 0;

  const slots = (conflict.affectedSlots ?? []).filter(Boolean).length;
  const impact =
    Math.max(0, slots - 1) + conflict.affectedStudents.length + Math.max(0, conflict.affectedTeachers.length - 1);

  return Math.min(MAX_CASCADE_IMPACT, impact);
}

/**
 * Priority Scorer
 *
 * hard = severity weight; soft = affected entities (max 20) + age in days
 * (1.5/day, max 15) + cascade impact (3 each, max 15).
 */
export class ConflictPriorityService {
  constructor(
    private readonly conflicts: ConflictRepository,
    private readonly now: () => Date = () => new Date()
  ) {}

  calculatePriorityScore(conflict: Conflict): PriorityScore {
    const hardConstraintScore = HARD_CONSTRAINT_SCORES[conflict.severity] ?? 0;

    const entities =
      (conflict.affectedSlots ?? []).filter(Boolean).length +
      conflict.affectedTeachers.length +
      conflict.affectedStudents.length +
      conflict.affectedRooms.length +
      conflict.affectedCourses.length;
    const ageDays = Math.max(0, (this.now().getTime() - conflict.detectedAt.getTime()) / DAY_MS);
    const cascadeImpact = estimateCascadeImpact(conflict);

    const softConstraintScore = round(Math.min(20, entities * 2) + Math.min(15, ageDays * 1.5) + cascadeImpact * 3);
    const totalScore = round(hardConstraintScore + softConstraintScore);

    return {
      conflictId: conflict.id,
      hardConstraintScore,
      softConstraintScore,
      totalScore,
      priorityLevel: priorityLevelFor(totalScore),
      cascadeImpact,
    };
  }

  /** Highest score first; ties go to the more recently detected conflict */
  rankConflicts(conflicts: Array<Conflict | null | undefined>): RankedConflict[] {
    return conflicts
      .filter((conflict): conflict is Conflict => !!conflict)
      .map((conflict) => ({ conflict, score: this.calculatePriorityScore(conflict) }))
      .sort(
        (a, b) =>
          b.score.totalScore - a.score.totalScore ||
          b.conflict.detectedAt.getTime() - a.conflict.detectedAt.getTime()
      );
  }

  async getConflictsByPriority(): Promise<RankedConflict[]> {
    return this.rankConflicts(await this.conflicts.findAllActive());
  }
}
