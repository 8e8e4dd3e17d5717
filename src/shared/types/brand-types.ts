import { z } from 'zod';

/**
 * ブランド型定義
 *
 * ドメインの意味を持つ型安全な識別子
 * 単なる文字列ではなく、ビジネス上の意味を型システムで表現
 */

// === 基本識別子 ===

export const StudentIdSchema = z.string()
  .trim()
  .min(1, 'Student ID is required')
  .brand<'StudentId'>();

export const InstructorIdSchema = z.string()
  .trim()
  .min(1, 'Instructor ID is required')
  .brand<'InstructorId'>();

export const EnrollmentIdSchema = z.string()
  .trim()
  .min(1, 'Enrollment ID is required')
  .brand<'EnrollmentId'>();

/**
 * 科目コードキー（大文字に正規化済みの文字列表現）
 * 学生の履修集合・成績マップのキーとして使う
 */
export const CourseCodeKeySchema = z.string()
  .trim()
  .min(1, 'Course code is required')
  .transform(code => code.toUpperCase())
  .brand<'CourseCodeKey'>();

export type StudentId = z.infer<typeof StudentIdSchema>;
export type InstructorId = z.infer<typeof InstructorIdSchema>;
export type EnrollmentId = z.infer<typeof EnrollmentIdSchema>;
export type CourseCodeKey = z.infer<typeof CourseCodeKeySchema>;
