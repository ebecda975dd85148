import mongoose, { Schema, Types } from 'mongoose';

export interface ICourse {
  _id: Types.ObjectId;
  courseCode: string; // e.g., "CHEM101"
  courseName: string;
  subject?: string | null; // e.g., "Chemistry"
  maxStudents?: number | null;
  requiresLab: boolean;
  requiredResources?: string | null; // Comma separated, e.g., "projector, computers"
  prerequisites?: string | null;
  createdAt: Date;
  updatedAt: Date;
}

const CourseSchema = new Schema<ICourse>(
  {
    courseCode: {
      type: String,
      required: [true, 'Course code is required'],
      trim: true,
      uppercase: true,
      unique: true,
    },
    courseName: {
      type: String,
      required: [true, 'Course name is required'],
      trim: true,
    },
    subject: {
      type: String,
      trim: true,
      default: null,
    },
    maxStudents: {
      type: Number,
      min: [1, 'Max students must be at least 1'],
      default: null,
    },
    requiresLab: {
      type: Boolean,
      default: false,
    },
    requiredResources: {
      type: String,
      trim: true,
      default: null,
    },
    prerequisites: {
      type: String,
      trim: true,
      default: null,
    },
  },
  {
    timestamps: true,
  }
);

CourseSchema.index({ subject: 1 });

export default mongoose.models.Course
  ? mongoose.model<ICourse>('Course')
  : mongoose.model<ICourse>('Course', CourseSchema);
