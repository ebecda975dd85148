import { createMemoryRepositories, type MemoryRepositories } from '@/lib/repositories/memory';
import type {
  ActingUser,
  Course,
  DayOfWeek,
  Enrollment,
  EnrollmentStatus,
  Room,
  Schedule,
  ScheduleSlot,
  Student,
  Teacher,
} from '@/types';

// Builders for small in-memory schedules used across the test suites

export const SCHEDULE: Schedule = { id: 'sched-1', name: 'Spring Term' };
export const USER: ActingUser = { id: 'user-1', username: 'registrar' };

export function makeTeacher(id: string, overrides: Partial<Teacher> = {}): Teacher {
  return { id, name: `Teacher ${id}`, department: null, active: true, ...overrides };
}

export function makeRoom(id: string, overrides: Partial<Room> = {}): Room {
  return { id, roomNumber: id.toUpperCase(), capacity: 30, roomType: 'CLASSROOM', building: null, ...overrides };
}

export function makeCourse(id: string, overrides: Partial<Course> = {}): Course {
  return { id, courseCode: id.toUpperCase(), courseName: `Course ${id}`, subject: null, ...overrides };
}

export function makeStudent(id: string): Student {
  return { id, studentId: `S-${id}`, firstName: 'Pupil', lastName: id };
}

export function makeSlot(
  id: string,
  dayOfWeek: DayOfWeek,
  startTime: string,
  endTime: string,
  overrides: Partial<ScheduleSlot> = {}
): ScheduleSlot {
  return { id, scheduleId: SCHEDULE.id, dayOfWeek, startTime, endTime, ...overrides };
}

export function enroll(
  id: string,
  student: Student,
  slot: ScheduleSlot,
  status: EnrollmentStatus = 'ACTIVE'
): Enrollment {
  return { id, student, course: slot.course ?? null, slot, status };
}

export function enrollMany(prefix: string, slot: ScheduleSlot, count: number): Enrollment[] {
  return Array.from({ length: count }, (_, index) => enroll(`${prefix}-${index + 1}`, makeStudent(`${prefix}-st${index + 1}`), slot));
}

/**
 * Two Math classes overlapping in room R1 on Monday:
 * a 09:00-09:50 (t1, no enrollments) and b 09:30-10:20 (t2, 15 students).
 *
 * Rooms: r1 30 seats, r2 40 seats with projector, r3 10 seats,
 * r4 science lab 30 seats, r5 inactive 50 seats.
 * Teachers: t1 t2 t4 Math, t3 Physics, t5 Math inactive.
 */
export function doubleBookedSchedule() {
  const rooms = {
    r1: makeRoom('r1'),
    r2: makeRoom('r2', { capacity: 40, hasProjector: true }),
    r3: makeRoom('r3', { capacity: 10 }),
    r4: makeRoom('r4', { roomType: 'SCIENCE_LAB' }),
    r5: makeRoom('r5', { capacity: 50, active: false }),
  };
  const teachers = {
    t1: makeTeacher('t1', { department: 'Math' }),
    t2: makeTeacher('t2', { department: 'Math' }),
    t3: makeTeacher('t3', { department: 'Physics' }),
    t4: makeTeacher('t4', { department: 'Math' }),
    t5: makeTeacher('t5', { department: 'Math', active: false }),
  };
  const courses = {
    c1: makeCourse('c1', { subject: 'Math' }),
    c2: makeCourse('c2', { subject: 'Math' }),
  };

  const a = makeSlot('a', 'Monday', '09:00', '09:50', { room: rooms.r1, teacher: teachers.t1, course: courses.c1 });
  const b = makeSlot('b', 'Monday', '09:30', '10:20', { room: rooms.r1, teacher: teachers.t2, course: courses.c2 });
  const enrollments = enrollMany('b', b, 15);

  const repositories: MemoryRepositories = createMemoryRepositories({
    slots: [a, b],
    enrollments,
    rooms: Object.values(rooms),
    teachers: Object.values(teachers),
    courses: Object.values(courses),
    students: enrollments.flatMap((enrollment) => (enrollment.student ? [enrollment.student] : [])),
  });

  return { repositories, rooms, teachers, courses, slots: { a, b }, enrollments };
}
