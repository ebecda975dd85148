import mongoose, { Schema, Types } from 'mongoose';
import type { EnrollmentStatus } from '@/types';

export const ENROLLMENT_STATUSES: readonly EnrollmentStatus[] = ['ACTIVE', 'PENDING', 'DROPPED', 'WITHDRAWN', 'COMPLETED'];

export interface IEnrollment {
  _id: Types.ObjectId;
  studentId: Types.ObjectId;
  courseId?: Types.ObjectId | null;
  slotId?: Types.ObjectId | null;
  scheduleId?: Types.ObjectId | null; // Copied from the slot for schedule-wide queries
  status: EnrollmentStatus;
  createdAt: Date;
  updatedAt: Date;
}

const EnrollmentSchema = new Schema<IEnrollment>(
  {
    studentId: {
      type: Schema.Types.ObjectId,
      ref: 'Student',
      required: [true, 'Student ID is required'],
      index: true,
    },
    courseId: {
      type: Schema.Types.ObjectId,
      ref: 'Course',
      default: null,
    },
    slotId: {
      type: Schema.Types.ObjectId,
      ref: 'ScheduleSlot',
      default: null,
      index: true,
    },
    scheduleId: {
      type: Schema.Types.ObjectId,
      ref: 'Schedule',
      default: null,
      index: true,
    },
    status: {
      type: String,
      enum: ENROLLMENT_STATUSES,
      default: 'ACTIVE',
    },
  },
  {
    timestamps: true,
  }
);

EnrollmentSchema.index({ scheduleId: 1, status: 1 });
EnrollmentSchema.index({ studentId: 1, courseId: 1 });

export default mongoose.models.Enrollment
  ? mongoose.model<IEnrollment>('Enrollment')
  : mongoose.model<IEnrollment>('Enrollment', EnrollmentSchema);
