import { fullName } from '../value-objects/name';
import { formatGrade, type GradeLetter } from '../value-objects/grade';
import { semesterDisplayName } from '../value-objects/semester';
import { fullCode } from '../value-objects/course-code';
import { type Student, calculateGpa, gradedCourses, isInGoodStanding } from '../entities/student';
import {
  type Instructor,
  teachingLoad,
  isOverloaded,
  isSenior,
  yearsOfService
} from '../entities/instructor';
import {
  type Course,
  currentEnrollment,
  availableSpots,
  hasPrerequisites
} from '../entities/course';
import { type Enrollment, isGraded, isPassed, enrollmentDurationDays } from '../entities/enrollment';
import { formatDisplayDate } from './formatting';
import {
  departmentWiseStudentCount,
  gpaDistribution,
  averageGpa
} from './student-statistics';
import {
  departmentWiseCourseCount,
  creditDistribution,
  coursesByEnrollmentStatus,
  averageEnrollmentPercentage
} from './course-statistics';

/**
 * テキストレポート
 *
 * 各行は改行で終わる。日付は dd-MM-yyyy
 */

const line = (char: string, width: number): string => char.repeat(width);

const compareKeys = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/** 件数の降順（同数は最初に現れた順） */
const byCountDesc = <K>(counts: Map<K, number>): Array<[K, number]> =>
  [...counts.entries()].sort((a, b) => b[1] - a[1]);

export const generateTranscript = (student: Student): string => {
  const grades: Array<[string, GradeLetter]> = gradedCourses(student).sort(([a], [b]) => compareKeys(a, b));
  const rows = [
    line('=', 60),
    'STUDENT TRANSCRIPT',
    line('=', 60),
    `Student ID: ${student.identity.id}`,
    `Registration No: ${student.registrationNumber}`,
    `Name: ${fullName(student.identity.name)}`,
    `Department: ${student.department}`,
    `Current Semester: ${student.currentSemester}`,
    `Enrollment Date: ${formatDisplayDate(student.enrollmentDate)}`,
    line('-', 60),
    'COURSE GRADES:',
    line('-', 60),
    ...(grades.length === 0
      ? ['No grades recorded yet.']
      : grades.map(([code, grade]) => `${code.padEnd(15)} | ${formatGrade(grade)}`)),
    line('-', 60),
    `Current GPA: ${calculateGpa(student).toFixed(2)}`,
    `Academic Standing: ${isInGoodStanding(student) ? 'Good Standing' : 'Academic Warning'}`,
    line('=', 60)
  ];
  return rows.map(row => `${row}\n`).join('');
};

export const generateEnrollmentReport = (enrollment: Enrollment): string => {
  const rows = [
    'Enrollment Report',
    line('-', 30),
    `Enrollment ID: ${enrollment.id}`,
    `Student ID: ${enrollment.studentId}`,
    `Course Code: ${enrollment.courseCode}`,
    `Enrollment Date: ${formatDisplayDate(enrollment.enrollmentDate)}`
  ];
  if (enrollment.completionDate) {
    rows.push(`Completion Date: ${formatDisplayDate(enrollment.completionDate)}`);
    rows.push(`Duration: ${enrollmentDurationDays(enrollment)} days`);
  }
  rows.push(`Status: ${enrollment.status}`);
  if (isGraded(enrollment)) {
    rows.push(`Marks: ${enrollment.marks.toFixed(2)}`);
  }
  if (enrollment.grade !== null) {
    rows.push(`Grade: ${formatGrade(enrollment.grade)}`);
    rows.push(`Passed: ${isPassed(enrollment) ? 'Yes' : 'No'}`);
  }
  rows.push(`Active: ${enrollment.active ? 'Yes' : 'No'}`);
  return rows.map(row => `${row}\n`).join('');
};

export const generateInstructorProfile = (instructor: Instructor, now: Date = new Date()): string => {
  const rows = [
    line('=', 60),
    'INSTRUCTOR PROFILE',
    line('=', 60),
    `Employee ID: ${instructor.employeeId}`,
    `Name: ${fullName(instructor.identity.name)}`,
    `Email: ${instructor.identity.email}`,
    `Department: ${instructor.department}`,
    `Designation: ${instructor.designation}`,
    `Experience: ${instructor.experienceYears} years`,
    `Service: ${yearsOfService(instructor, now)} years`,
    `Salary: $${instructor.salary.toFixed(2)}`,
    line('-', 60),
    'QUALIFICATIONS:',
    ...(instructor.qualifications.length === 0
      ? ['No qualifications recorded.']
      : instructor.qualifications.map(qualification => `• ${qualification}`)),
    line('-', 60),
    'ASSIGNED COURSES:',
    ...(instructor.assignedCourses.length === 0
      ? ['No courses assigned.']
      : instructor.assignedCourses.map(code => `• ${code}`)),
    line('-', 60),
    `Teaching Load: ${teachingLoad(instructor)} courses${isOverloaded(instructor) ? ' (OVERLOADED)' : ''}`,
    `Status: ${isSenior(instructor, now) ? 'Senior Instructor' : 'Junior Instructor'}`,
    line('=', 60)
  ];
  return rows.map(row => `${row}\n`).join('');
};

export const generateStudentStatisticsSummary = (students: readonly Student[]): string => {
  const rows = [
    'Student Statistics Summary',
    line('=', 40),
    `Total Students: ${students.length}`,
    `Active Students: ${students.filter(student => student.identity.active).length}`,
    `Students in Good Standing: ${students.filter(isInGoodStanding).length}`,
    `Average GPA: ${averageGpa(students).toFixed(2)}`,
    '',
    'Department-wise Count:',
    ...byCountDesc(departmentWiseStudentCount(students)).map(([department, count]) => `  ${department}: ${count}`),
    '',
    'GPA Distribution:',
    ...[...gpaDistribution(students).entries()]
      .sort(([a], [b]) => compareKeys(a, b))
      .map(([bucket, count]) => `  ${bucket}: ${count}`)
  ];
  return rows.map(row => `${row}\n`).join('');
};

export const generateCourseStatisticsSummary = (courses: readonly Course[]): string => {
  const rows = [
    'Course Statistics Summary',
    line('=', 40),
    `Total Courses: ${courses.length}`,
    `Active Courses: ${courses.filter(course => course.active).length}`,
    `Courses with Instructors: ${courses.filter(course => course.instructorId !== null).length}`,
    `Average Enrollment: ${averageEnrollmentPercentage(courses).toFixed(1)}%`,
    '',
    'Department-wise Course Count:',
    ...byCountDesc(departmentWiseCourseCount(courses)).map(([department, count]) => `  ${department}: ${count}`),
    '',
    'Credit Distribution:',
    ...[...creditDistribution(courses).entries()]
      .sort(([a], [b]) => a - b)
      .map(([credits, count]) => `  ${credits} credits: ${count} courses`),
    '',
    'Enrollment Status Distribution:',
    ...[...coursesByEnrollmentStatus(courses).entries()]
      .sort(([a], [b]) => compareKeys(a, b))
      .map(([status, grouped]) => `  ${status}: ${grouped.length} courses`)
  ];
  return rows.map(row => `${row}\n`).join('');
};

/**
 * 学科ごと（学科名順）・科目コード順の開講科目一覧
 */
export const generateCatalog = (courses: readonly Course[]): string => {
  const byDepartment = new Map<string, Course[]>();
  for (const course of courses) {
    if (!course.active) continue;
    byDepartment.set(course.department, [...(byDepartment.get(course.department) ?? []), course]);
  }

  const rows = ['COURSE CATALOG', line('=', 80)];
  const departments = [...byDepartment.keys()].sort(compareKeys);
  for (const department of departments) {
    rows.push('', `${department} DEPARTMENT`, line('-', 50));
    const listed = (byDepartment.get(department) ?? [])
      .slice()
      .sort((a, b) => compareKeys(fullCode(a.code), fullCode(b.code)));
    for (const course of listed) {
      rows.push(
        `${fullCode(course.code).padEnd(12)} | ${course.title.padEnd(30)} | ${course.credits} credits | ${semesterDisplayName(course.semester)}`
      );
      if (hasPrerequisites(course)) {
        rows.push(`             Prerequisites: ${course.prerequisites.join(', ')}`);
      }
      rows.push(
        `             Enrollment: ${currentEnrollment(course)}/${course.maxCapacity} (${availableSpots(course)} spots available)`,
        ''
      );
    }
  }
  return rows.map(row => `${row}\n`).join('');
};
