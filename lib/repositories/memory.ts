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
import type {
  ConflictRepositories,
  ConflictRepository,
  CourseRepository,
  EnrollmentRepository,
  RoomRepository,
  SectionRepository,
  SlotRepository,
  StudentRepository,
  TeacherRepository,
} from './types';

export interface MemorySeed {
  slots?: ScheduleSlot[];
  enrollments?: Enrollment[];
  sections?: CourseSection[];
  teachers?: Teacher[];
  rooms?: Room[];
  courses?: Course[];
  students?: Student[];
  conflicts?: Conflict[];
}

/**
 * Upsert by id. An existing entry is updated in place so that other entities
 * holding a reference to it (enrollments -> slot) see the change.
 */
function upsert<T extends { id: string }>(items: T[], item: T): T {
  const existing = items.find((entry) => entry.id === item.id);
  if (!existing) {
    items.push(item);
    return item;
  }
  if (existing !== item) {
    Object.assign(existing, item);
  }
  return existing;
}

class MemorySlotRepository implements SlotRepository {
  constructor(private readonly items: ScheduleSlot[]) {}

  async findAll() {
    return [...this.items];
  }

  async findBySchedule(scheduleId: string) {
    return this.items.filter((slot) => slot.scheduleId === scheduleId);
  }

  async findById(id: string) {
    return this.items.find((slot) => slot.id === id) ?? null;
  }

  async save(slot: ScheduleSlot) {
    return upsert(this.items, slot);
  }

  async delete(id: string) {
    const index = this.items.findIndex((slot) => slot.id === id);
    if (index >= 0) this.items.splice(index, 1);
  }
}

class MemoryEnrollmentRepository implements EnrollmentRepository {
  constructor(private readonly items: Enrollment[]) {}

  async findBySchedule(scheduleId: string) {
    return this.items.filter((enrollment) => enrollment.slot?.scheduleId === scheduleId);
  }

  async findBySlot(slotId: string) {
    return this.items.filter((enrollment) => enrollment.slot?.id === slotId);
  }

  async save(enrollment: Enrollment) {
    return upsert(this.items, enrollment);
  }
}

class MemoryTeacherRepository implements TeacherRepository {
  constructor(private readonly items: Teacher[]) {}

  async findAll() {
    return [...this.items];
  }

  async findAllActive() {
    return this.items.filter((teacher) => teacher.active);
  }

  async findById(id: string) {
    return this.items.find((teacher) => teacher.id === id) ?? null;
  }
}

class MemoryLookupRepository<T extends { id: string }> {
  constructor(private readonly items: T[]) {}

  async findAll() {
    return [...this.items];
  }

  async findById(id: string) {
    return this.items.find((item) => item.id === id) ?? null;
  }
}

class MemoryConflictRepository implements ConflictRepository {
  constructor(private readonly items: Conflict[]) {}

  async findBySchedule(scheduleId: string) {
    return this.items.filter((conflict) => conflict.scheduleId === scheduleId);
  }

  async findActiveBySchedule(scheduleId: string) {
    return this.items.filter((conflict) => conflict.scheduleId === scheduleId && conflict.status === 'ACTIVE');
  }

  async findAllActive() {
    return this.items.filter((conflict) => conflict.status === 'ACTIVE');
  }

  async findByType(scheduleId: string, type: ConflictType) {
    return this.items.filter((conflict) => conflict.scheduleId === scheduleId && conflict.conflictType === type);
  }

  async save(conflict: Conflict) {
    return upsert(this.items, conflict);
  }

  async saveAll(conflicts: Conflict[]) {
    return conflicts.map((conflict) => upsert(this.items, conflict));
  }

  async deleteBySchedule(scheduleId: string) {
    const kept = this.items.filter((conflict) => conflict.scheduleId !== scheduleId);
    this.items.splice(0, this.items.length, ...kept);
  }

  async countActiveBySchedule(scheduleId: string) {
    return (await this.findActiveBySchedule(scheduleId)).length;
  }
}

export type MemoryRepositories = ConflictRepositories & { data: Required<MemorySeed> };

/**
 * In-process stores over plain arrays. The seed arrays are used as-is, so the
 * caller can inspect `data` after a mutation.
 */
export function createMemoryRepositories(seed: MemorySeed = {}): MemoryRepositories {
  const data: Required<MemorySeed> = {
    slots: seed.slots ?? [],
    enrollments: seed.enrollments ?? [],
    sections: seed.sections ?? [],
    teachers: seed.teachers ?? [],
    rooms: seed.rooms ?? [],
    courses: seed.courses ?? [],
    students: seed.students ?? [],
    conflicts: seed.conflicts ?? [],
  };

  const sections: SectionRepository = { findAll: async () => [...data.sections] };
  const rooms: RoomRepository = new MemoryLookupRepository(data.rooms);
  const courses: CourseRepository = new MemoryLookupRepository(data.courses);
  const students: StudentRepository = new MemoryLookupRepository(data.students);

  return {
    data,
    slots: new MemorySlotRepository(data.slots),
    enrollments: new MemoryEnrollmentRepository(data.enrollments),
    sections,
    teachers: new MemoryTeacherRepository(data.teachers),
    rooms,
    courses,
    students,
    conflicts: new MemoryConflictRepository(data.conflicts),
  };
}
