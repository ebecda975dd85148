import mongoose, { Schema, Types } from 'mongoose';

export interface ITeacher {
  _id: Types.ObjectId;
  name: string;
  department?: string | null; // Compared to Course.subject
  active: boolean;
  maxPeriodsPerDay?: number | null;
  maxConsecutiveHours?: number | null;
  preferredBreakMinutes?: number | null;
  createdAt: Date;
  updatedAt: Date;
}

const TeacherSchema = new Schema<ITeacher>(
  {
    name: {
      type: String,
      required: [true, 'Teacher name is required'],
      trim: true,
    },
    department: {
      type: String,
      trim: true,
      default: null,
    },
    active: {
      type: Boolean,
      default: true,
      index: true,
    },
    maxPeriodsPerDay: {
      type: Number,
      min: [1, 'Max periods per day must be at least 1'],
      default: null,
    },
    maxConsecutiveHours: {
      type: Number,
      min: [1, 'Max consecutive hours must be at least 1'],
      default: null,
    },
    preferredBreakMinutes: {
      type: Number,
      min: [0, 'Preferred break cannot be negative'],
      default: null,
    },
  },
  {
    timestamps: true,
  }
);

TeacherSchema.index({ department: 1, active: 1 });

export default mongoose.models.Teacher
  ? mongoose.model<ITeacher>('Teacher')
  : mongoose.model<ITeacher>('Teacher', TeacherSchema);
