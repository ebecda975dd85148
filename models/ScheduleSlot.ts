import mongoose, { Schema, Types } from 'mongoose';
import { parseTime } from '@/lib/schoolTime';
import { DAYS_OF_WEEK, type DayOfWeek } from '@/types';

/**
 * SCHEDULE SLOT MODEL
 *
 * One meeting of a course in a schedule: a teacher, a room and a
 * [startTime, endTime) window on a day of the week.
 *
 * Example:
 * - courseId: "CHEM101"
 * - dayOfWeek: "Monday"
 * - startTime: "09:00", endTime: "09:50"
 *
 * References may be missing while a schedule is being built.
 */

export interface IScheduleSlot {
  _id: Types.ObjectId;
  scheduleId: Types.ObjectId;
  dayOfWeek: DayOfWeek;
  startTime: string; // HH:MM
  endTime: string; // HH:MM
  teacherId?: Types.ObjectId | null;
  roomId?: Types.ObjectId | null;
  courseId?: Types.ObjectId | null;
  periodNumber?: number | null;
  isLunchPeriod: boolean;
  lunchWaveNumber?: number | null;
  createdAt: Date;
  updatedAt: Date;
}

const TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

const ScheduleSlotSchema = new Schema<IScheduleSlot>(
  {
    scheduleId: {
      type: Schema.Types.ObjectId,
      ref: 'Schedule',
      required: [true, 'Schedule ID is required'],
      index: true,
    },
    dayOfWeek: {
      type: String,
      required: [true, 'Day is required'],
      enum: DAYS_OF_WEEK,
    },
    startTime: {
      type: String,
      required: [true, 'Start time is required'],
      match: [TIME_PATTERN, 'Start time must be HH:MM'],
    },
    endTime: {
      type: String,
      required: [true, 'End time is required'],
      match: [TIME_PATTERN, 'End time must be HH:MM'],
    },
    teacherId: {
      type: Schema.Types.ObjectId,
      ref: 'Teacher',
      default: null,
    },
    roomId: {
      type: Schema.Types.ObjectId,
      ref: 'Room',
      default: null,
    },
    courseId: {
      type: Schema.Types.ObjectId,
      ref: 'Course',
      default: null,
    },
    periodNumber: {
      type: Number,
      min: [1, 'Period number must be at least 1'],
      default: null,
    },
    isLunchPeriod: {
      type: Boolean,
      default: false,
    },
    lunchWaveNumber: {
      type: Number,
      default: null,
    },
  },
  {
    timestamps: true,
  }
);

// Overlap checks scan one schedule day at a time
ScheduleSlotSchema.index({ scheduleId: 1, dayOfWeek: 1, startTime: 1 });
ScheduleSlotSchema.index({ scheduleId: 1, teacherId: 1 });
ScheduleSlotSchema.index({ scheduleId: 1, roomId: 1 });

/**
 * Message for a start/end pair whose window is empty, or null. Malformed
 * times are left to the field validators.
 */
export function slotWindowError(startTime: unknown, endTime: unknown): string | null {
  if (typeof startTime !== 'string' || typeof endTime !== 'string') return null;

  const start = parseTime(startTime);
  const end = parseTime(endTime);
  if (start === null || end === null || end > start) return null;
  return `End time ${endTime} must be after start time ${startTime}`;
}

// The window must not be empty, on document saves and on the $set of updateOne
ScheduleSlotSchema.pre('save', function (next) {
  const error = slotWindowError(this.startTime, this.endTime);
  next(error ? new Error(error) : undefined);
});

ScheduleSlotSchema.pre('updateOne', { document: false, query: true }, function (next) {
  const update = this.getUpdate();
  const fields = update && !Array.isArray(update) ? update.$set : undefined;
  const error = slotWindowError(fields?.startTime, fields?.endTime);
  next(error ? new Error(error) : undefined);
});

export default mongoose.models.ScheduleSlot
  ? mongoose.model<IScheduleSlot>('ScheduleSlot')
  : mongoose.model<IScheduleSlot>('ScheduleSlot', ScheduleSlotSchema);
