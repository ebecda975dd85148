import mongoose, { Schema, Types } from 'mongoose';

export interface ISchedule {
  _id: Types.ObjectId;
  name: string;
  academicYear?: string;
  isPublished: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const ScheduleSchema = new Schema<ISchedule>(
  {
    name: {
      type: String,
      required: [true, 'Schedule name is required'],
      trim: true,
      unique: true,
    },
    academicYear: {
      type: String,
      default: () => new Date().getFullYear().toString(),
    },
    isPublished: {
      type: Boolean,
      default: false,
      index: true,
    },
  },
  {
    timestamps: true,
  }
);

export default mongoose.models.Schedule
  ? mongoose.model<ISchedule>('Schedule')
  : mongoose.model<ISchedule>('Schedule', ScheduleSchema);
