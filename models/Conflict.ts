import mongoose, { Schema, Types } from 'mongoose';
import {
  CONFLICT_SEVERITIES,
  CONFLICT_TYPES,
  type ConflictCategory,
  type ConflictSeverity,
  type ConflictStatus,
  type ConflictType,
} from '@/types';

/**
 * CONFLICT MODEL
 *
 * A detected constraint violation. Affected entities are stored as id lists;
 * the ids of deleted entities stay in place and resolve to null on load.
 */

export interface IConflict {
  _id: Types.ObjectId;
  scheduleId?: Types.ObjectId | null;
  conflictType?: ConflictType | null;
  category?: ConflictCategory | null;
  severity: ConflictSeverity;
  title: string;
  description: string;
  slotIds: Types.ObjectId[];
  teacherIds: Types.ObjectId[];
  studentIds: Types.ObjectId[];
  roomIds: Types.ObjectId[];
  courseIds: Types.ObjectId[];
  detectedAt: Date;
  status: ConflictStatus;
  resolvedAt?: Date | null;
  resolvedBy?: string | null;
  resolutionNotes?: string | null;
  createdAt: Date;
  updatedAt: Date;
}

const ConflictSchema = new Schema<IConflict>(
  {
    scheduleId: {
      type: Schema.Types.ObjectId,
      ref: 'Schedule',
      default: null,
      index: true,
    },
    conflictType: {
      type: String,
      enum: [...CONFLICT_TYPES, null],
      default: null,
    },
    category: {
      type: String,
      enum: ['TIME', 'ROOM', 'TEACHER', 'STUDENT', 'COURSE', null],
      default: null,
    },
    severity: {
      type: String,
      enum: CONFLICT_SEVERITIES,
      required: [true, 'Severity is required'],
    },
    title: {
      type: String,
      required: [true, 'Title is required'],
      trim: true,
    },
    description: {
      type: String,
      default: '',
    },
    slotIds: [{ type: Schema.Types.ObjectId, ref: 'ScheduleSlot' }],
    teacherIds: [{ type: Schema.Types.ObjectId, ref: 'Teacher' }],
    studentIds: [{ type: Schema.Types.ObjectId, ref: 'Student' }],
    roomIds: [{ type: Schema.Types.ObjectId, ref: 'Room' }],
    courseIds: [{ type: Schema.Types.ObjectId, ref: 'Course' }],
    detectedAt: {
      type: Date,
      default: () => new Date(),
    },
    status: {
      type: String,
      enum: ['ACTIVE', 'RESOLVED', 'IGNORED'],
      default: 'ACTIVE',
      index: true,
    },
    resolvedAt: {
      type: Date,
      default: null,
    },
    resolvedBy: {
      type: String,
      default: null,
    },
    resolutionNotes: {
      type: String,
      maxlength: [1000, 'Resolution notes cannot exceed 1000 characters'],
      default: null,
    },
  },
  {
    timestamps: true,
  }
);

ConflictSchema.index({ scheduleId: 1, status: 1 });
ConflictSchema.index({ scheduleId: 1, conflictType: 1 });

export default mongoose.models.Conflict
  ? mongoose.model<IConflict>('Conflict')
  : mongoose.model<IConflict>('Conflict', ConflictSchema);
