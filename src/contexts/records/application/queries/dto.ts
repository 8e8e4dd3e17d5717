import { z } from 'zod';
import { SemesterSchema } from '../../domain/value-objects/semester';
import type { GpaBucket, StudentProgress } from '../../domain/services/student-statistics';
import type { EnrollmentStatusSummary } from '../../domain/services/course-statistics';

/**
 * クエリDTO
 *
 * 引数を取るクエリだけスキーマで検証する。一覧の返却値はコマンド側と同じ
 * StudentResponse / CourseResponse を使う
 */

// === Query DTOs (入力用) ===

export const DepartmentQuerySchema = z.object({
  department: z.string().trim().min(1, 'Department is required')
});

export const GpaRangeQuerySchema = z.object({
  minGpa: z.number().finite(),
  maxGpa: z.number().finite()
});

export const TopStudentsQuerySchema = z.object({
  limit: z.number().int().nonnegative('Limit must not be negative')
});

export const StudentProgressQuerySchema = z.object({
  studentId: z.string().min(1, 'Student ID is required'),
  totalCoursesRequired: z.number().int()
});

export const CreditRangeQuerySchema = z.object({
  minCredits: z.number().int(),
  maxCredits: z.number().int()
});

export const SemesterQuerySchema = z.object({
  semester: z.string().trim().toUpperCase().pipe(SemesterSchema)
});

export const AvailableSpotsQuerySchema = z.object({
  requiredSpots: z.number().int().nonnegative('Required spots must not be negative')
});

export type DepartmentQuery = z.input<typeof DepartmentQuerySchema>;
export type GpaRangeQuery = z.input<typeof GpaRangeQuerySchema>;
export type TopStudentsQuery = z.input<typeof TopStudentsQuerySchema>;
export type StudentProgressQuery = z.input<typeof StudentProgressQuerySchema>;
export type CreditRangeQuery = z.input<typeof CreditRangeQuerySchema>;
export type SemesterQuery = z.input<typeof SemesterQuerySchema>;
export type AvailableSpotsQuery = z.input<typeof AvailableSpotsQuerySchema>;

// === Response DTOs (出力用) ===

export interface CountEntry<K> {
  readonly key: K;
  readonly count: number;
}

export interface TotalsResponse {
  readonly total: number;
  readonly active: number;
  readonly inactive: number;
}

export interface StudentProgressResponse extends StudentProgress {
  readonly studentId: string;
  readonly gpa: number;
}

export interface StudentAggregatesResponse {
  readonly departmentCounts: CountEntry<string>[];
  readonly gpaDistribution: CountEntry<GpaBucket>[];
  readonly averageGpa: number;
}

export interface EnrollmentStatusGroup {
  readonly status: EnrollmentStatusSummary;
  readonly courseCodes: string[];
}

export interface CourseAggregatesResponse {
  readonly departmentCounts: CountEntry<string>[];
  readonly instructorCounts: CountEntry<string>[];
  readonly creditDistribution: CountEntry<number>[];
  readonly enrollmentStatus: EnrollmentStatusGroup[];
  readonly averageEnrollmentPercentage: number;
}

// === DTO Mappers ===

/**
 * 集計Mapを挿入順のまま配列に変換
 */
export const toCountEntries = <K>(counts: ReadonlyMap<K, number>): CountEntry<K>[] =>
  [...counts.entries()].map(([key, count]) => ({ key, count }));
