import type {
  Conflict,
  ConflictType,
  Course,
  CourseSection,
  Enrollment,
  Room,
  ScheduleSlot,
  Student,
  Teacher,
} from '@/types';

/**
 * Storage boundary of the conflict engine. The engine only fetches and saves
 * through these interfaces; callers choose the backing store.
 */

export interface SlotRepository {
  findAll(): Promise<ScheduleSlot[]>;
  findBySchedule(scheduleId: string): Promise<ScheduleSlot[]>;
  findById(id: string): Promise<ScheduleSlot | null>;
  save(slot: ScheduleSlot): Promise<ScheduleSlot>;
  delete(id: string): Promise<void>;
}

export interface EnrollmentRepository {
  findBySchedule(scheduleId: string): Promise<Enrollment[]>;
  findBySlot(slotId: string): Promise<Enrollment[]>;
  save(enrollment: Enrollment): Promise<Enrollment>;
}

export interface SectionRepository {
  findAll(): Promise<CourseSection[]>;
}

export interface TeacherRepository {
  findAll(): Promise<Teacher[]>;
  findAllActive(): Promise<Teacher[]>;
  findById(id: string): Promise<Teacher | null>;
}

export interface RoomRepository {
  findAll(): Promise<Room[]>;
  findById(id: string): Promise<Room | null>;
}

export interface CourseRepository {
  findAll(): Promise<Course[]>;
  findById(id: string): Promise<Course | null>;
}

export interface StudentRepository {
  findAll(): Promise<Student[]>;
  findById(id: string): Promise<Student | null>;
}

export interface ConflictRepository {
  // Every stored conflict of the schedule, whatever its status
  findBySchedule(scheduleId: string): Promise<Conflict[]>;
  findActiveBySchedule(scheduleId: string): Promise<Conflict[]>;
  findAllActive(): Promise<Conflict[]>;
  findByType(scheduleId: string, type: ConflictType): Promise<Conflict[]>;
  save(conflict: Conflict): Promise<Conflict>;
  saveAll(conflicts: Conflict[]): Promise<Conflict[]>;
  deleteBySchedule(scheduleId: string): Promise<void>;
  countActiveBySchedule(scheduleId: string): Promise<number>;
}

export interface ConflictRepositories {
  slots: SlotRepository;
  enrollments: EnrollmentRepository;
  sections: SectionRepository;
  teachers: TeacherRepository;
  rooms: RoomRepository;
  courses: CourseRepository;
  students: StudentRepository;
  conflicts: ConflictRepository;
}
