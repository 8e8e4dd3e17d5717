import { z } from 'zod';
import {
  StudentIdSchema,
  InstructorIdSchema,
  CourseCodeKeySchema,
  type StudentId,
  type InstructorId,
  type CourseCodeKey
} from '../../../../shared/types/index';
import { GradeLetterSchema, type GradeLetter } from '../value-objects/grade';

/**
 * 学務記録のドメインイベント
 *
 * 登録・履修・成績・在籍状態の変更が成功するたびに発行される。
 * イベントは変更の事実だけを運び、エンティティ本体は含まない
 */

// === イベントの共通構造 ===
export const RecordsEventBaseSchema = z.object({
  eventType: z.string(),
  occurredAt: z.date()
});

// === 登録イベント ===
export const StudentRegisteredEventSchema = RecordsEventBaseSchema.extend({
  eventType: z.literal('StudentRegistered'),
  studentId: StudentIdSchema,
  registrationNumber: z.string(),
  department: z.string()
});

export const CourseRegisteredEventSchema = RecordsEventBaseSchema.extend({
  eventType: z.literal('CourseRegistered'),
  courseCode: CourseCodeKeySchema,
  credits: z.number().int(),
  maxCapacity: z.number().int()
});

export const InstructorRegisteredEventSchema = RecordsEventBaseSchema.extend({
  eventType: z.literal('InstructorRegistered'),
  instructorId: InstructorIdSchema,
  department: z.string()
});

// === 履修イベント ===
export const StudentEnrolledEventSchema = RecordsEventBaseSchema.extend({
  eventType: z.literal('StudentEnrolled'),
  studentId: StudentIdSchema,
  courseCode: CourseCodeKeySchema,
  totalCredits: z.number().int()
});

export const StudentUnenrolledEventSchema = RecordsEventBaseSchema.extend({
  eventType: z.literal('StudentUnenrolled'),
  studentId: StudentIdSchema,
  courseCode: CourseCodeKeySchema
});

export const GradeRecordedEventSchema = RecordsEventBaseSchema.extend({
  eventType: z.literal('GradeRecorded'),
  studentId: StudentIdSchema,
  courseCode: CourseCodeKeySchema,
  marks: z.number(),
  grade: GradeLetterSchema
});

// === 在籍状態イベント ===
export const StudentActivatedEventSchema = RecordsEventBaseSchema.extend({
  eventType: z.literal('StudentActivated'),
  studentId: StudentIdSchema
});

export const StudentDeactivatedEventSchema = RecordsEventBaseSchema.extend({
  eventType: z.literal('StudentDeactivated'),
  studentId: StudentIdSchema
});

// === 科目イベント ===
export const InstructorAssignedEventSchema = RecordsEventBaseSchema.extend({
  eventType: z.literal('InstructorAssigned'),
  courseCode: CourseCodeKeySchema,
  instructorId: InstructorIdSchema
});

export const CourseRosterChangedEventSchema = RecordsEventBaseSchema.extend({
  eventType: z.literal('CourseRosterChanged'),
  courseCode: CourseCodeKeySchema,
  studentId: StudentIdSchema,
  change: z.enum(['ADDED', 'REMOVED']),
  currentEnrollment: z.number().int()
});

export const RecordsDomainEventSchema = z.discriminatedUnion('eventType', [
  StudentRegisteredEventSchema,
  CourseRegisteredEventSchema,
  InstructorRegisteredEventSchema,
  StudentEnrolledEventSchema,
  StudentUnenrolledEventSchema,
  GradeRecordedEventSchema,
  StudentActivatedEventSchema,
  StudentDeactivatedEventSchema,
  InstructorAssignedEventSchema,
  CourseRosterChangedEventSchema
]);

export type StudentRegisteredEvent = z.infer<typeof StudentRegisteredEventSchema>;
export type CourseRegisteredEvent = z.infer<typeof CourseRegisteredEventSchema>;
export type InstructorRegisteredEvent = z.infer<typeof InstructorRegisteredEventSchema>;
export type StudentEnrolledEvent = z.infer<typeof StudentEnrolledEventSchema>;
export type StudentUnenrolledEvent = z.infer<typeof StudentUnenrolledEventSchema>;
export type GradeRecordedEvent = z.infer<typeof GradeRecordedEventSchema>;
export type StudentActivatedEvent = z.infer<typeof StudentActivatedEventSchema>;
export type StudentDeactivatedEvent = z.infer<typeof StudentDeactivatedEventSchema>;
export type InstructorAssignedEvent = z.infer<typeof InstructorAssignedEventSchema>;
export type CourseRosterChangedEvent = z.infer<typeof CourseRosterChangedEventSchema>;
export type RecordsDomainEvent = z.infer<typeof RecordsDomainEventSchema>;
export type RecordsEventType = RecordsDomainEvent['eventType'];

// === イベントファクトリ関数 ===

export const createStudentRegisteredEvent = (
  studentId: StudentId,
  registrationNumber: string,
  department: string,
  occurredAt: Date = new Date()
): StudentRegisteredEvent => ({
  eventType: 'StudentRegistered',
  occurredAt,
  studentId,
  registrationNumber,
  department
});

export const createCourseRegisteredEvent = (
  courseCode: CourseCodeKey,
  credits: number,
  maxCapacity: number,
  occurredAt: Date = new Date()
): CourseRegisteredEvent => ({
  eventType: 'CourseRegistered',
  occurredAt,
  courseCode,
  credits,
  maxCapacity
});

export const createInstructorRegisteredEvent = (
  instructorId: InstructorId,
  department: string,
  occurredAt: Date = new Date()
): InstructorRegisteredEvent => ({
  eventType: 'InstructorRegistered',
  occurredAt,
  instructorId,
  department
});

export const createStudentEnrolledEvent = (
  studentId: StudentId,
  courseCode: CourseCodeKey,
  totalCredits: number,
  occurredAt: Date = new Date()
): StudentEnrolledEvent => ({
  eventType: 'StudentEnrolled',
  occurredAt,
  studentId,
  courseCode,
  totalCredits
});

export const createStudentUnenrolledEvent = (
  studentId: StudentId,
  courseCode: CourseCodeKey,
  occurredAt: Date = new Date()
): StudentUnenrolledEvent => ({
  eventType: 'StudentUnenrolled',
  occurredAt,
  studentId,
  courseCode
});

export const createGradeRecordedEvent = (
  studentId: StudentId,
  courseCode: CourseCodeKey,
  marks: number,
  grade: GradeLetter,
  occurredAt: Date = new Date()
): GradeRecordedEvent => ({
  eventType: 'GradeRecorded',
  occurredAt,
  studentId,
  courseCode,
  marks,
  grade
});

export const createStudentStatusEvent = (
  studentId: StudentId,
  active: boolean,
  occurredAt: Date = new Date()
): StudentActivatedEvent | StudentDeactivatedEvent =>
  active
    ? { eventType: 'StudentActivated', occurredAt, studentId }
    : { eventType: 'StudentDeactivated', occurredAt, studentId };

export const createInstructorAssignedEvent = (
  courseCode: CourseCodeKey,
  instructorId: InstructorId,
  occurredAt: Date = new Date()
): InstructorAssignedEvent => ({
  eventType: 'InstructorAssigned',
  occurredAt,
  courseCode,
  instructorId
});

export const createCourseRosterChangedEvent = (
  courseCode: CourseCodeKey,
  studentId: StudentId,
  change: 'ADDED' | 'REMOVED',
  currentEnrollment: number,
  occurredAt: Date = new Date()
): CourseRosterChangedEvent => ({
  eventType: 'CourseRosterChanged',
  occurredAt,
  courseCode,
  studentId,
  change,
  currentEnrollment
});

// === イベント分析ヘルパー ===
export const isStudentEvent = (
  event: RecordsDomainEvent
): event is Extract<RecordsDomainEvent, { studentId: StudentId }> => 'studentId' in event;
