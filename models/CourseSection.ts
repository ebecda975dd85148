import mongoose, { Schema, Types } from 'mongoose';

export interface ICourseSection {
  _id: Types.ObjectId;
  courseId?: Types.ObjectId | null;
  sectionNumber: string; // e.g., "01", "02"
  currentEnrollment: number;
  minEnrollment?: number | null;
  maxEnrollment?: number | null;
  scheduleYear?: number | null;
  createdAt: Date;
  updatedAt: Date;
}

const CourseSectionSchema = new Schema<ICourseSection>(
  {
    courseId: {
      type: Schema.Types.ObjectId,
      ref: 'Course',
      default: null,
      index: true,
    },
    sectionNumber: {
      type: String,
      required: [true, 'Section number is required'],
      trim: true,
    },
    currentEnrollment: {
      type: Number,
      default: 0,
      min: [0, 'Enrollment cannot be negative'],
    },
    minEnrollment: {
      type: Number,
      default: null,
    },
    maxEnrollment: {
      type: Number,
      default: null,
    },
    scheduleYear: {
      type: Number,
      default: null,
    },
  },
  {
    timestamps: true,
  }
);

// No duplicate section numbers for a course in the same year
CourseSectionSchema.index({ courseId: 1, sectionNumber: 1, scheduleYear: 1 }, { unique: true });

export default mongoose.models.CourseSection
  ? mongoose.model<ICourseSection>('CourseSection')
  : mongoose.model<ICourseSection>('CourseSection', CourseSectionSchema);
