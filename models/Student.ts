import mongoose, { Schema, Types } from 'mongoose';

export interface IStudent {
  _id: Types.ObjectId;
  studentId: string; // School-issued identifier
  firstName: string;
  lastName: string;
  gradeLevel?: number | null;
  createdAt: Date;
  updatedAt: Date;
}

const StudentSchema = new Schema<IStudent>(
  {
    studentId: {
      type: String,
      required: [true, 'Student ID is required'],
      trim: true,
      unique: true,
    },
    firstName: {
      type: String,
      required: [true, 'First name is required'],
      trim: true,
    },
    lastName: {
      type: String,
      required: [true, 'Last name is required'],
      trim: true,
    },
    gradeLevel: {
      type: Number,
      min: [1, 'Grade level must be at least 1'],
      max: [13, 'Grade level cannot exceed 13'],
      default: null,
    },
  },
  {
    timestamps: true,
  }
);

StudentSchema.index({ lastName: 1, firstName: 1 });

export default mongoose.models.Student
  ? mongoose.model<IStudent>('Student')
  : mongoose.model<IStudent>('Student', StudentSchema);
