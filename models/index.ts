/**
 * Central export point for all Mongoose models
 * Import models from here to ensure proper initialization order
 */

export { default as Schedule } from './Schedule';
export { default as Teacher } from './Teacher';
export { default as Room } from './Room';
export { default as Course } from './Course';
export { default as Student } from './Student';
export { default as ScheduleSlot } from './ScheduleSlot';
export { default as Enrollment } from './Enrollment';
export { default as CourseSection } from './CourseSection';
export { default as Conflict } from './Conflict';

// Re-export types
export type { ISchedule } from './Schedule';
export type { ITeacher } from './Teacher';
export type { IRoom } from './Room';
export type { ICourse } from './Course';
export type { IStudent } from './Student';
export type { IScheduleSlot } from './ScheduleSlot';
export type { IEnrollment } from './Enrollment';
export type { ICourseSection } from './CourseSection';
export type { IConflict } from './Conflict';
