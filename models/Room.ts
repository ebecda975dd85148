import mongoose, { Schema, Types } from 'mongoose';
import type { RoomType } from '@/types';

export const ROOM_TYPES: readonly RoomType[] = [
  'CLASSROOM',
  'LAB',
  'SCIENCE_LAB',
  'COMPUTER_LAB',
  'GYM',
  'AUDITORIUM',
  'LIBRARY',
  'MUSIC_ROOM',
  'ART_ROOM',
];

export interface IRoom {
  _id: Types.ObjectId;
  roomNumber: string;
  capacity: number;
  roomType: RoomType;
  building?: string | null;
  hasProjector: boolean;
  hasSmartboard: boolean;
  hasComputers: boolean;
  active: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const RoomSchema = new Schema<IRoom>(
  {
    roomNumber: {
      type: String,
      required: [true, 'Room number is required'],
      trim: true,
      unique: true,
    },
    capacity: {
      type: Number,
      required: [true, 'Room capacity is required'],
      min: [0, 'Capacity cannot be negative'],
    },
    roomType: {
      type: String,
      enum: ROOM_TYPES,
      default: 'CLASSROOM',
    },
    building: {
      type: String,
      trim: true,
      default: null,
    },
    hasProjector: { type: Boolean, default: false },
    hasSmartboard: { type: Boolean, default: false },
    hasComputers: { type: Boolean, default: false },
    active: {
      type: Boolean,
      default: true,
      index: true,
    },
  },
  {
    timestamps: true,
  }
);

export default mongoose.models.Room ? mongoose.model<IRoom>('Room') : mongoose.model<IRoom>('Room', RoomSchema);
