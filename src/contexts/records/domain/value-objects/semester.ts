import { z } from 'zod';
import type { Result } from '../../../../shared/types/index';
import { Ok } from '../../../../shared/types/index';
import { validationFailure, type RecordsError } from '../errors/errors';

/**
 * 学期区分
 */

export const SemesterSchema = z.enum(['SPRING', 'SUMMER', 'FALL', 'WINTER']);

export type Semester = z.infer<typeof SemesterSchema>;

export interface SemesterInfo {
  readonly semester: Semester;
  readonly displayName: string;
  readonly code: number;
  readonly duration: string;
}

export const SEMESTERS: Readonly<Record<Semester, SemesterInfo>> = {
  SPRING: { semester: 'SPRING', displayName: 'Spring', code: 1, duration: 'January - May' },
  SUMMER: { semester: 'SUMMER', displayName: 'Summer', code: 2, duration: 'June - August' },
  FALL: { semester: 'FALL', displayName: 'Fall', code: 3, duration: 'September - December' },
  WINTER: { semester: 'WINTER', displayName: 'Winter', code: 4, duration: 'December - January' }
};

export const semesterDisplayName = (semester: Semester): string => SEMESTERS[semester].displayName;

/** 例: "Fall (September - December)" */
export const formatSemester = (semester: Semester): string => {
  const info = SEMESTERS[semester];
  return `${info.displayName} (${info.duration})`;
};

export const semesterFromCode = (code: number): Result<Semester, RecordsError> => {
  const found = SemesterSchema.options.find(semester => SEMESTERS[semester].code === code);
  return found
    ? Ok(found)
    : validationFailure(`Invalid semester code: ${code}`, 'INVALID_SEMESTER', 'semester', code);
};

/**
 * 学期名の解析（大文字小文字を区別しない）
 */
export const parseSemester = (raw: string): Result<Semester, RecordsError> => {
  const parsed = SemesterSchema.safeParse(raw.trim().toUpperCase());
  return parsed.success
    ? Ok(parsed.data)
    : validationFailure(`Invalid semester: ${raw}`, 'INVALID_SEMESTER', 'semester', raw);
};
