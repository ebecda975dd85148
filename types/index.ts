// Domain types shared by the conflict engine, the stores and the models

export type DayOfWeek =
  | 'Monday'
  | 'Tuesday'
  | 'Wednesday'
  | 'Thursday'
  | 'Friday'
  | 'Saturday'
  | 'Sunday';

export const DAYS_OF_WEEK: readonly DayOfWeek[] = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
];

export interface Schedule {
  id: string;
  name: string;
}

/**
 * The user on whose behalf a resolution is applied.
 * Always passed explicitly; the engine never reads a session.
 */
export interface ActingUser {
  id: string;
  username: string;
}

export interface Teacher {
  id: string;
  name: string;
  department?: string | null;
  active: boolean;
  maxPeriodsPerDay?: number | null;
  maxConsecutiveHours?: number | null;
  preferredBreakMinutes?: number | null;
}

export type RoomType =
  | 'CLASSROOM'
  | 'LAB'
  | 'SCIENCE_LAB'
  | 'COMPUTER_LAB'
  | 'GYM'
  | 'AUDITORIUM'
  | 'LIBRARY'
  | 'MUSIC_ROOM'
  | 'ART_ROOM';

export const LAB_ROOM_TYPES: readonly RoomType[] = ['LAB', 'SCIENCE_LAB', 'COMPUTER_LAB'];

export interface Room {
  id: string;
  roomNumber: string;
  capacity: number;
  roomType: RoomType;
  building?: string | null;
  hasProjector?: boolean;
  hasSmartboard?: boolean;
  hasComputers?: boolean;
  active?: boolean;
}

export interface Course {
  id: string;
  courseCode: string;
  courseName: string;
  subject?: string | null;
  maxStudents?: number | null;
  requiresLab?: boolean;
  requiredResources?: string | null; // comma separated, e.g. "computer, projector"
  prerequisites?: string | null;
}

export interface Student {
  id: string;
  studentId: string;
  firstName: string;
  lastName: string;
  gradeLevel?: number | null;
}

export interface ScheduleSlot {
  id: string;
  scheduleId: string | null;
  dayOfWeek: DayOfWeek | null;
  startTime: string | null; // HH:MM, inclusive
  endTime: string | null; // HH:MM, exclusive
  teacher?: Teacher | null;
  room?: Room | null;
  course?: Course | null;
  periodNumber?: number | null;
  isLunchPeriod?: boolean;
  lunchWaveNumber?: number | null;
}

export type EnrollmentStatus = 'ACTIVE' | 'PENDING' | 'DROPPED' | 'WITHDRAWN' | 'COMPLETED';

export interface Enrollment {
  id: string;
  student: Student | null;
  course: Course | null;
  slot: ScheduleSlot | null;
  status: EnrollmentStatus;
}

export interface CourseSection {
  id: string;
  course: Course | null;
  sectionNumber: string;
  currentEnrollment: number;
  minEnrollment?: number | null;
  maxEnrollment?: number | null;
  scheduleYear?: number | null;
}

// ---------------------------------------------------------------------------
// Conflicts
// ---------------------------------------------------------------------------

export const CONFLICT_TYPES = [
  'ROOM_DOUBLE_BOOKING',
  'TEACHER_OVERLOAD',
  'BACK_TO_BACK_VIOLATION',
  'NO_LUNCH_BREAK',
  'EXCESSIVE_CONSECUTIVE_CLASSES',
  'EXCESSIVE_TEACHING_HOURS',
  'NO_PREPARATION_PERIOD',
  'ROOM_CAPACITY_EXCEEDED',
  'ROOM_TYPE_MISMATCH',
  'EQUIPMENT_UNAVAILABLE',
  'SUBJECT_MISMATCH',
  'TEACHER_TRAVEL_TIME',
  'STUDENT_SCHEDULE_CONFLICT',
  'DUPLICATE_ENROLLMENT',
  'SECTION_OVER_ENROLLED',
  'SECTION_UNDER_ENROLLED',
  'PREREQUISITE_VIOLATION',
  'CREDIT_HOUR_VIOLATION',
  'GRADUATION_REQUIREMENT',
  'COURSE_SEQUENCE_VIOLATION',
  'CO_REQUISITE_VIOLATION',
] as const;

export type ConflictType = (typeof CONFLICT_TYPES)[number];

export type ConflictCategory = 'TIME' | 'ROOM' | 'TEACHER' | 'STUDENT' | 'COURSE';

export const CONFLICT_CATEGORIES: Record<ConflictType, ConflictCategory> = {
  ROOM_DOUBLE_BOOKING: 'ROOM',
  TEACHER_OVERLOAD: 'TEACHER',
  BACK_TO_BACK_VIOLATION: 'TIME',
  NO_LUNCH_BREAK: 'TIME',
  EXCESSIVE_CONSECUTIVE_CLASSES: 'TIME',
  EXCESSIVE_TEACHING_HOURS: 'TEACHER',
  NO_PREPARATION_PERIOD: 'TEACHER',
  ROOM_CAPACITY_EXCEEDED: 'ROOM',
  ROOM_TYPE_MISMATCH: 'ROOM',
  EQUIPMENT_UNAVAILABLE: 'ROOM',
  SUBJECT_MISMATCH: 'TEACHER',
  TEACHER_TRAVEL_TIME: 'TEACHER',
  STUDENT_SCHEDULE_CONFLICT: 'STUDENT',
  DUPLICATE_ENROLLMENT: 'STUDENT',
  SECTION_OVER_ENROLLED: 'COURSE',
  SECTION_UNDER_ENROLLED: 'COURSE',
  PREREQUISITE_VIOLATION: 'STUDENT',
  CREDIT_HOUR_VIOLATION: 'STUDENT',
  GRADUATION_REQUIREMENT: 'STUDENT',
  COURSE_SEQUENCE_VIOLATION: 'COURSE',
  CO_REQUISITE_VIOLATION: 'COURSE',
};

export function isConflictType(value: unknown): value is ConflictType {
  return typeof value === 'string' && CONFLICT_TYPES.some((type) => type === value);
}

export type ConflictSeverity = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW' | 'INFO';

export const CONFLICT_SEVERITIES: readonly ConflictSeverity[] = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW', 'INFO'];

export type ConflictStatus = 'ACTIVE' | 'RESOLVED' | 'IGNORED';

export interface Conflict {
  id: string;
  scheduleId: string | null;
  conflictType: ConflictType | null;
  category: ConflictCategory | null;
  severity: ConflictSeverity;
  title: string;
  description: string;
  // Entries can be null when a referenced entity no longer exists
  affectedSlots: Array<ScheduleSlot | null>;
  affectedTeachers: Teacher[];
  affectedStudents: Student[];
  affectedRooms: Room[];
  affectedCourses: Course[];
  detectedAt: Date;
  status: ConflictStatus;
  resolvedAt?: Date | null;
  resolvedBy?: string | null;
  resolutionNotes?: string | null;
}

export interface ValidationResult {
  valid: boolean;
  conflicts: Conflict[];
  criticalCount: number;
  highCount: number;
  mediumCount: number;
  lowCount: number;
  infoCount: number;
}

// ---------------------------------------------------------------------------
// Suggestions and actions
// ---------------------------------------------------------------------------

export type ResolutionType =
  | 'CHANGE_ROOM'
  | 'CHANGE_TIME_SLOT'
  | 'CHANGE_TEACHER'
  | 'REASSIGN_STUDENT'
  | 'SPLIT_SECTION'
  | 'SWAP_SLOTS'
  | 'REDISTRIBUTE_LOAD'
  | 'ADD_CO_TEACHER'
  | 'REMOVE_SLOT'
  | 'MANUAL_REVIEW';

export const ACTION_TYPES = [
  'CHANGE_ROOM',
  'CHANGE_TEACHER',
  'MOVE_SLOT',
  'SWAP_SLOTS',
  'DELETE_SLOT',
  'REASSIGN_STUDENT',
] as const;

export type ActionType = (typeof ACTION_TYPES)[number];

export function isActionType(value: unknown): value is ActionType {
  return typeof value === 'string' && ACTION_TYPES.some((type) => type === value);
}

export interface TimeChange {
  dayOfWeek: DayOfWeek;
  startTime: string;
  endTime: string;
  periodNumber?: number | null;
}

export interface ResolutionAction {
  // One of ACTION_TYPES; kept as a string because actions also arrive from
  // stored or advisory data and unknown tags must be rejected at apply time
  actionType: string;
  targetSlot: ScheduleSlot | null;
  newRoom?: Room | null;
  newTeacher?: Teacher | null;
  newTime?: TimeChange | null;
  swapWith?: ScheduleSlot | null;
  student?: Student | null;
  newSlot?: ScheduleSlot | null;
  reason?: string;
}

export type SuggestionSource = 'heuristic' | 'advisor';

export interface ResolutionSuggestion {
  id: string;
  type: ResolutionType;
  title: string;
  description: string;
  confidence: number; // 0..1
  requiresConfirmation: boolean;
  actions: Array<ResolutionAction | null>;
  source: SuggestionSource;
}

export interface SlotSwapSuggestion {
  slotA: ScheduleSlot;
  slotB: ScheduleSlot;
  benefit: number;
  description: string;
}

export interface TimeSlotOption {
  dayOfWeek: DayOfWeek;
  startTime: string;
  endTime: string;
  periodNumber: number;
  score: number;
}

export interface ResolutionImpact {
  touchedSlotIds: string[];
  affectedSlotCount: number;
  affectedStudentCount: number;
  affectedTeacherCount: number;
  summary: string;
}

// ---------------------------------------------------------------------------
// Priority
// ---------------------------------------------------------------------------

export type PriorityLevel = 'URGENT' | 'HIGH' | 'MEDIUM' | 'LOW';

export interface PriorityScore {
  conflictId: string;
  hardConstraintScore: number;
  softConstraintScore: number;
  totalScore: number;
  priorityLevel: PriorityLevel;
  cascadeImpact: number;
}
