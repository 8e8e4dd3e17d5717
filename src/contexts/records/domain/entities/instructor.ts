import { z } from 'zod';
import type { Result, CourseCodeKey } from '../../../../shared/types/index';
import { Ok, flatMap, InstructorIdSchema, CourseCodeKeySchema } from '../../../../shared/types/index';
import { NameSchema } from '../value-objects/name';
import {
  personIdentitySchema,
  EmailSchema,
  DepartmentSchema,
  validateDateOfBirth
} from './person';
import { parseWithSchema, validationFailure, type RecordsError } from '../errors/errors';
import { calendarYearsBetween } from '../services/formatting';

/**
 * 教員エンティティ
 */

/** 担当科目数がこれを超えると過負荷 */
export const OVERLOAD_THRESHOLD = 4;
/** 経験年数または勤続年数がこれを超えるとシニア */
export const SENIORITY_YEARS = 5;

export const InstructorSchema = z.object({
  kind: z.literal('INSTRUCTOR'),
  identity: personIdentitySchema(InstructorIdSchema),
  employeeId: z.string().trim().min(1, 'Employee ID is required'),
  department: DepartmentSchema,
  designation: z.string().trim().min(1, 'Designation is required'),
  salary: z.number().nonnegative('Salary cannot be negative'),
  assignedCourses: z.array(CourseCodeKeySchema).readonly(),
  qualifications: z.array(z.string()).readonly(),
  joiningDate: z.date(),
  experienceYears: z.number().int().nonnegative('Experience cannot be negative')
});

export const InstructorDraftSchema = z.object({
  id: InstructorIdSchema,
  employeeId: z.string().trim().min(1, 'Employee ID is required'),
  name: NameSchema,
  email: EmailSchema,
  dateOfBirth: z.date(),
  department: DepartmentSchema,
  designation: z.string().trim().min(1, 'Designation is required'),
  salary: z.number().nonnegative('Salary cannot be negative').default(0),
  experienceYears: z.number().int().nonnegative('Experience cannot be negative').default(0),
  joiningDate: z.date().optional(),
  qualifications: z.array(z.string().trim().min(1)).default([])
});

export const InstructorUpdateSchema = z.object({
  name: NameSchema.optional(),
  email: EmailSchema.optional(),
  department: DepartmentSchema.optional(),
  designation: z.string().trim().min(1, 'Designation cannot be empty').optional(),
  salary: z.number().nonnegative('Salary cannot be negative').optional(),
  experienceYears: z.number().int().nonnegative('Experience cannot be negative').optional(),
  joiningDate: z.date().optional()
});

export type Instructor = z.infer<typeof InstructorSchema>;
export type InstructorDraft = z.input<typeof InstructorDraftSchema>;
export type InstructorUpdate = z.input<typeof InstructorUpdateSchema>;

const validateJoiningDate = (joiningDate: Date, now: Date): Result<Date, RecordsError> =>
  joiningDate.getTime() > now.getTime()
    ? validationFailure('Joining date cannot be in the future', 'INVALID_JOINING_DATE', 'joiningDate', joiningDate)
    : Ok(joiningDate);

const uniqueTrimmed = (values: readonly string[]): string[] =>
  [...new Set(values.map(value => value.trim()))];

export const createInstructor = (
  draft: InstructorDraft,
  now: Date = new Date()
): Result<Instructor, RecordsError> =>
  flatMap(parseWithSchema(InstructorDraftSchema, draft, 'INVALID_INSTRUCTOR'), valid =>
    flatMap(validateDateOfBirth(valid.dateOfBirth, now), dateOfBirth =>
      flatMap(validateJoiningDate(valid.joiningDate ?? now, now), joiningDate => Ok<Instructor>({
        kind: 'INSTRUCTOR',
        identity: {
          id: valid.id,
          name: valid.name,
          email: valid.email,
          dateOfBirth,
          registrationDate: now,
          active: true
        },
        employeeId: valid.employeeId,
        department: valid.department,
        designation: valid.designation,
        salary: valid.salary,
        assignedCourses: [],
        qualifications: uniqueTrimmed(valid.qualifications),
        joiningDate,
        experienceYears: valid.experienceYears
      }))
    )
  );

export const updateInstructorDetails = (
  instructor: Instructor,
  update: InstructorUpdate,
  now: Date = new Date()
): Result<Instructor, RecordsError> =>
  flatMap(parseWithSchema(InstructorUpdateSchema, update, 'INVALID_INSTRUCTOR'), valid =>
    flatMap(validateJoiningDate(valid.joiningDate ?? instructor.joiningDate, now), joiningDate => Ok<Instructor>({
      ...instructor,
      identity: {
        ...instructor.identity,
        name: valid.name ?? instructor.identity.name,
        email: valid.email ?? instructor.identity.email
      },
      department: valid.department ?? instructor.department,
      designation: valid.designation ?? instructor.designation,
      salary: valid.salary ?? instructor.salary,
      experienceYears: valid.experienceYears ?? instructor.experienceYears,
      joiningDate
    }))
  );

// === 担当科目 ===

export const isTeaching = (instructor: Instructor, courseCode: CourseCodeKey): boolean =>
  instructor.assignedCourses.includes(courseCode);

export const assignCourse = (
  instructor: Instructor,
  courseCode: CourseCodeKey
): { instructor: Instructor; added: boolean } =>
  isTeaching(instructor, courseCode)
    ? { instructor, added: false }
    : { instructor: { ...instructor, assignedCourses: [...instructor.assignedCourses, courseCode] }, added: true };

export const unassignCourse = (
  instructor: Instructor,
  courseCode: CourseCodeKey
): { instructor: Instructor; removed: boolean } =>
  isTeaching(instructor, courseCode)
    ? {
        instructor: { ...instructor, assignedCourses: instructor.assignedCourses.filter(code => code !== courseCode) },
        removed: true
      }
    : { instructor, removed: false };

// === 資格 ===

export const addQualification = (instructor: Instructor, qualification: string): Result<Instructor, RecordsError> => {
  const trimmed = qualification.trim();
  if (trimmed === '') {
    return validationFailure('Qualification cannot be empty', 'INVALID_QUALIFICATION', 'qualification', qualification);
  }
  return Ok(instructor.qualifications.includes(trimmed)
    ? instructor
    : { ...instructor, qualifications: [...instructor.qualifications, trimmed] });
};

export const removeQualification = (instructor: Instructor, qualification: string): Instructor => ({
  ...instructor,
  qualifications: instructor.qualifications.filter(existing => existing !== qualification.trim())
});

// === 導出値 ===

export const teachingLoad = (instructor: Instructor): number => instructor.assignedCourses.length;

export const isOverloaded = (instructor: Instructor): boolean => teachingLoad(instructor) > OVERLOAD_THRESHOLD;

export const yearsOfService = (instructor: Instructor, now: Date = new Date()): number =>
  calendarYearsBetween(instructor.joiningDate, now);

export const isSenior = (instructor: Instructor, now: Date = new Date()): boolean =>
  instructor.experienceYears > SENIORITY_YEARS || yearsOfService(instructor, now) > SENIORITY_YEARS;

export const getInstructorDisplayInfo = (instructor: Instructor): string =>
  `Emp ID: ${instructor.employeeId} | Dept: ${instructor.department} | ${instructor.designation} | Courses: ${teachingLoad(instructor)} | Exp: ${instructor.experienceYears} years`;

export const averageTeachingLoad = (instructors: readonly Instructor[]): number =>
  instructors.length === 0
    ? 0
    : instructors.reduce((sum, instructor) => sum + teachingLoad(instructor), 0) / instructors.length;
