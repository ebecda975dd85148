import { Types, type Model } from 'mongoose';
import {
  Conflict as ConflictModel,
  Course as CourseModel,
  CourseSection as CourseSectionModel,
  Enrollment as EnrollmentModel,
  Room as RoomModel,
  ScheduleSlot as ScheduleSlotModel,
  Student as StudentModel,
  Teacher as TeacherModel,
  type IConflict,
  type ICourse,
  type ICourseSection,
  type IEnrollment,
  type IRoom,
  type IScheduleSlot,
  type IStudent,
  type ITeacher,
} from '@/models';
import type {
  Conflict,
  ConflictType,
  Course,
  CourseSection,
  Enrollment,
  Room,
  ScheduleSlot,
  Student,
  Teacher,
} from '@/types';
import type {
  ConflictRepositories,
  ConflictRepository,
  EnrollmentRepository,
  SlotRepository,
  TeacherRepository,
} from './types';

type ObjectIdRef = Types.ObjectId | null | undefined;

function objectId(id: string | null | undefined): Types.ObjectId | null {
  return id && Types.ObjectId.isValid(id) ? new Types.ObjectId(id) : null;
}

function idOf(ref: ObjectIdRef): string | null {
  return ref ? ref.toString() : null;
}

function present<T>(values: Array<T | null | undefined>): T[] {
  return values.filter((value): value is T => value !== null && value !== undefined);
}

function lookup<T>(map: Map<string, T>, ref: ObjectIdRef): T | null {
  return ref ? map.get(ref.toString()) ?? null : null;
}

/**
 * Load the referenced documents in one query and convert them, keyed by id
 */
async function fetchMap<D extends { _id: Types.ObjectId }, T>(
  model: Model<D>,
  refs: ObjectIdRef[],
  convert: (doc: D) => T
): Promise<Map<string, T>> {
  const ids = [...new Set(refs.flatMap((ref) => (ref ? [ref.toString()] : [])))];
  if (ids.length === 0) return new Map();

  const docs = await model.find().where('_id').in(ids).lean<D[]>();
  return new Map(docs.map((doc) => [doc._id.toString(), convert(doc)]));
}

// ---------------------------------------------------------------------------
// Document -> domain
// ---------------------------------------------------------------------------

function toTeacher(doc: ITeacher): Teacher {
  return {
    id: doc._id.toString(),
    name: doc.name,
    department: doc.department ?? null,
    active: doc.active,
    maxPeriodsPerDay: doc.maxPeriodsPerDay ?? null,
    maxConsecutiveHours: doc.maxConsecutiveHours ?? null,
    preferredBreakMinutes: doc.preferredBreakMinutes ?? null,
  };
}

function toRoom(doc: IRoom): Room {
  return {
    id: doc._id.toString(),
    roomNumber: doc.roomNumber,
    capacity: doc.capacity,
    roomType: doc.roomType,
    building: doc.building ?? null,
    hasProjector: doc.hasProjector,
    hasSmartboard: doc.hasSmartboard,
    hasComputers: doc.hasComputers,
    active: doc.active,
  };
}

function toCourse(doc: ICourse): Course {
  return {
    id: doc._id.toString(),
    courseCode: doc.courseCode,
    courseName: doc.courseName,
    subject: doc.subject ?? null,
    maxStudents: doc.maxStudents ?? null,
    requiresLab: doc.requiresLab,
    requiredResources: doc.requiredResources ?? null,
    prerequisites: doc.prerequisites ?? null,
  };
}

function toStudent(doc: IStudent): Student {
  return {
    id: doc._id.toString(),
    studentId: doc.studentId,
    firstName: doc.firstName,
    lastName: doc.lastName,
    gradeLevel: doc.gradeLevel ?? null,
  };
}

async function hydrateSlots(docs: IScheduleSlot[]): Promise<ScheduleSlot[]> {
  const [teachers, rooms, courses] = await Promise.all([
    fetchMap(TeacherModel, docs.map((doc) => doc.teacherId), toTeacher),
    fetchMap(RoomModel, docs.map((doc) => doc.roomId), toRoom),
    fetchMap(CourseModel, docs.map((doc) => doc.courseId), toCourse),
  ]);

  return docs.map((doc) => ({
    id: doc._id.toString(),
    scheduleId: idOf(doc.scheduleId),
    dayOfWeek: doc.dayOfWeek ?? null,
    startTime: doc.startTime ?? null,
    endTime: doc.endTime ?? null,
    teacher: lookup(teachers, doc.teacherId),
    room: lookup(rooms, doc.roomId),
    course: lookup(courses, doc.courseId),
    periodNumber: doc.periodNumber ?? null,
    isLunchPeriod: doc.isLunchPeriod,
    lunchWaveNumber: doc.lunchWaveNumber ?? null,
  }));
}

async function slotMap(refs: ObjectIdRef[]): Promise<Map<string, ScheduleSlot>> {
  const raw = await fetchMap(ScheduleSlotModel, refs, (doc) => doc);
  const slots = await hydrateSlots([...raw.values()]);
  return new Map(slots.map((slot) => [slot.id, slot]));
}

async function hydrateEnrollments(docs: IEnrollment[]): Promise<Enrollment[]> {
  const [slots, students, courses] = await Promise.all([
    slotMap(docs.map((doc) => doc.slotId)),
    fetchMap(StudentModel, docs.map((doc) => doc.studentId), toStudent),
    fetchMap(CourseModel, docs.map((doc) => doc.courseId), toCourse),
  ]);

  return docs.map((doc) => ({
    id: doc._id.toString(),
    student: lookup(students, doc.studentId),
    course: lookup(courses, doc.courseId),
    slot: lookup(slots, doc.slotId),
    status: doc.status,
  }));
}

async function hydrateConflicts(docs: IConflict[]): Promise<Conflict[]> {
  const [slots, teachers, students, rooms, courses] = await Promise.all([
    slotMap(docs.flatMap((doc) => doc.slotIds)),
    fetchMap(TeacherModel, docs.flatMap((doc) => doc.teacherIds), toTeacher),
    fetchMap(StudentModel, docs.flatMap((doc) => doc.studentIds), toStudent),
    fetchMap(RoomModel, docs.flatMap((doc) => doc.roomIds), toRoom),
    fetchMap(CourseModel, docs.flatMap((doc) => doc.courseIds), toCourse),
  ]);

  return docs.map((doc) => ({
    id: doc._id.toString(),
    scheduleId: idOf(doc.scheduleId),
    conflictType: doc.conflictType ?? null,
    category: doc.category ?? null,
    severity: doc.severity,
    title: doc.title,
    description: doc.description,
    // Deleted slots stay visible as null entries
    affectedSlots: doc.slotIds.map((ref) => lookup(slots, ref)),
    affectedTeachers: present(doc.teacherIds.map((ref) => lookup(teachers, ref))),
    affectedStudents: present(doc.studentIds.map((ref) => lookup(students, ref))),
    affectedRooms: present(doc.roomIds.map((ref) => lookup(rooms, ref))),
    affectedCourses: present(doc.courseIds.map((ref) => lookup(courses, ref))),
    detectedAt: doc.detectedAt,
    status: doc.status,
    resolvedAt: doc.resolvedAt ?? null,
    resolvedBy: doc.resolvedBy ?? null,
    resolutionNotes: doc.resolutionNotes ?? null,
  }));
}

function idList(values: Array<{ id: string } | null | undefined>): Types.ObjectId[] {
  return present(values.map((value) => objectId(value?.id)));
}

function toConflictFields(conflict: Conflict) {
  return {
    scheduleId: objectId(conflict.scheduleId),
    conflictType: conflict.conflictType,
    category: conflict.category,
    severity: conflict.severity,
    title: conflict.title,
    description: conflict.description,
    slotIds: idList(conflict.affectedSlots),
    teacherIds: idList(conflict.affectedTeachers),
    studentIds: idList(conflict.affectedStudents),
    roomIds: idList(conflict.affectedRooms),
    courseIds: idList(conflict.affectedCourses),
    detectedAt: conflict.detectedAt,
    status: conflict.status,
    resolvedAt: conflict.resolvedAt ?? null,
    resolvedBy: conflict.resolvedBy ?? null,
    resolutionNotes: conflict.resolutionNotes ?? null,
  };
}

// ---------------------------------------------------------------------------
// Repositories
// ---------------------------------------------------------------------------

const slots: SlotRepository = {
  async findAll() {
    return hydrateSlots(await ScheduleSlotModel.find().lean<IScheduleSlot[]>());
  },

  async findBySchedule(scheduleId) {
    return hydrateSlots(await ScheduleSlotModel.find({ scheduleId: objectId(scheduleId) }).lean<IScheduleSlot[]>());
  },

  async findById(id) {
    const doc = await ScheduleSlotModel.findById(objectId(id)).lean<IScheduleSlot>();
    if (!doc) return null;
    const [slot] = await hydrateSlots([doc]);
    return slot ?? null;
  },

  async save(slot) {
    await ScheduleSlotModel.updateOne(
      { _id: objectId(slot.id) },
      {
        $set: {
          scheduleId: objectId(slot.scheduleId),
          dayOfWeek: slot.dayOfWeek,
          startTime: slot.startTime,
          endTime: slot.endTime,
          teacherId: objectId(slot.teacher?.id),
          roomId: objectId(slot.room?.id),
          courseId: objectId(slot.course?.id),
          periodNumber: slot.periodNumber ?? null,
          isLunchPeriod: slot.isLunchPeriod ?? false,
          lunchWaveNumber: slot.lunchWaveNumber ?? null,
        },
      },
      { upsert: true, runValidators: true }
    );
    // Enrollments carry the schedule id of their slot
    await EnrollmentModel.updateMany(
      { slotId: objectId(slot.id) },
      { $set: { scheduleId: objectId(slot.scheduleId) } }
    );
    return slot;
  },

  async delete(id) {
    await ScheduleSlotModel.deleteOne({ _id: objectId(id) });
  },
};

const enrollments: EnrollmentRepository = {
  async findBySchedule(scheduleId) {
    return hydrateEnrollments(await EnrollmentModel.find({ scheduleId: objectId(scheduleId) }).lean<IEnrollment[]>());
  },

  async findBySlot(slotId) {
    return hydrateEnrollments(await EnrollmentModel.find({ slotId: objectId(slotId) }).lean<IEnrollment[]>());
  },

  async save(enrollment) {
    await EnrollmentModel.updateOne(
      { _id: objectId(enrollment.id) },
      {
        $set: {
          studentId: objectId(enrollment.student?.id),
          courseId: objectId(enrollment.course?.id),
          slotId: objectId(enrollment.slot?.id),
          scheduleId: objectId(enrollment.slot?.scheduleId),
          status: enrollment.status,
        },
      },
      { upsert: true, runValidators: true }
    );
    return enrollment;
  },
};

const teachers: TeacherRepository = {
  async findAll() {
    return (await TeacherModel.find().lean<ITeacher[]>()).map(toTeacher);
  },

  async findAllActive() {
    return (await TeacherModel.find({ active: true }).lean<ITeacher[]>()).map(toTeacher);
  },

  async findById(id) {
    const doc = await TeacherModel.findById(objectId(id)).lean<ITeacher>();
    return doc ? toTeacher(doc) : null;
  },
};

function lookupRepository<D extends { _id: Types.ObjectId }, T>(model: Model<D>, convert: (doc: D) => T) {
  return {
    async findAll(): Promise<T[]> {
      return (await model.find().lean<D[]>()).map(convert);
    },

    async findById(id: string): Promise<T | null> {
      const doc = await model.findById(objectId(id)).lean<D>();
      return doc ? convert(doc) : null;
    },
  };
}

async function hydrateSections(docs: ICourseSection[]): Promise<CourseSection[]> {
  const courses = await fetchMap(CourseModel, docs.map((doc) => doc.courseId), toCourse);
  return docs.map((doc) => ({
    id: doc._id.toString(),
    course: lookup(courses, doc.courseId),
    sectionNumber: doc.sectionNumber,
    currentEnrollment: doc.currentEnrollment,
    minEnrollment: doc.minEnrollment ?? null,
    maxEnrollment: doc.maxEnrollment ?? null,
    scheduleYear: doc.scheduleYear ?? null,
  }));
}

const conflicts: ConflictRepository = {
  async findBySchedule(scheduleId) {
    return hydrateConflicts(await ConflictModel.find({ scheduleId: objectId(scheduleId) }).lean<IConflict[]>());
  },

  async findActiveBySchedule(scheduleId) {
    return hydrateConflicts(
      await ConflictModel.find({ scheduleId: objectId(scheduleId), status: 'ACTIVE' }).lean<IConflict[]>()
    );
  },

  async findAllActive() {
    return hydrateConflicts(await ConflictModel.find({ status: 'ACTIVE' }).lean<IConflict[]>());
  },

  async findByType(scheduleId: string, type: ConflictType) {
    return hydrateConflicts(
      await ConflictModel.find({ scheduleId: objectId(scheduleId), conflictType: type }).lean<IConflict[]>()
    );
  },

  async save(conflict) {
    await ConflictModel.updateOne({ _id: objectId(conflict.id) }, { $set: toConflictFields(conflict) }, { upsert: true });
    return conflict;
  },

  async saveAll(list) {
    return Promise.all(list.map((conflict) => conflicts.save(conflict)));
  },

  async deleteBySchedule(scheduleId) {
    await ConflictModel.deleteMany({ scheduleId: objectId(scheduleId) });
  },

  async countActiveBySchedule(scheduleId) {
    return ConflictModel.countDocuments({ scheduleId: objectId(scheduleId), status: 'ACTIVE' });
  },
};

/**
 * Stores backed by the mongoose models. Call dbConnect() before use.
 */
export function createMongoRepositories(): ConflictRepositories {
  return {
    slots,
    enrollments,
    sections: {
      async findAll() {
        return hydrateSections(await CourseSectionModel.find().lean<ICourseSection[]>());
      },
    },
    teachers,
    rooms: lookupRepository(RoomModel, toRoom),
    courses: lookupRepository(CourseModel, toCourse),
    students: lookupRepository(StudentModel, toStudent),
    conflicts,
  };
}
