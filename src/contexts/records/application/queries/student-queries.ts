import type { Result } from '../../../../shared/types/index';
import { map, flatMap } from '../../../../shared/types/index';
import type { BusinessRulesConfig } from '../../../../shared/config/index';
import { normalizeCourseCodeKey } from '../../domain/value-objects/course-code';
import { fullName } from '../../domain/value-objects/name';
import type { RecordsError } from '../../domain/errors/errors';
import {
  type Student,
  calculateGpa,
  isEnrolledIn,
  isInGoodStanding
} from '../../domain/entities/student';
import {
  departmentWiseStudentCount,
  gpaDistribution,
  averageGpa,
  topStudentsByGpa,
  studentProgress
} from '../../domain/services/student-statistics';
import type { IStudentRepository } from '../ports/ports';
import { requireStudent } from '../commands/handler-context';
import {
  type StudentResponse,
  mapStudentToResponse,
  parseStudentId,
  validateCommand
} from '../commands/dto';
import {
  DepartmentQuerySchema,
  GpaRangeQuerySchema,
  TopStudentsQuerySchema,
  StudentProgressQuerySchema,
  type DepartmentQuery,
  type GpaRangeQuery,
  type TopStudentsQuery,
  type StudentProgressQuery,
  type StudentProgressResponse,
  type StudentAggregatesResponse,
  type TotalsResponse,
  toCountEntries
} from './dto';

/**
 * 学生の読み取り専用クエリ
 *
 * 状態は変更しない。結果はリポジトリの挿入順
 */
export class StudentQueries {
  constructor(
    private readonly studentRepository: IStudentRepository,
    private readonly academics: BusinessRulesConfig['academics']
  ) {}

  findById(studentId: string): Result<StudentResponse | null, RecordsError> {
    return flatMap(parseStudentId(studentId), id =>
      map(this.studentRepository.findById(id), student => (student ? mapStudentToResponse(student) : null))
    );
  }

  findAll(): Result<StudentResponse[], RecordsError> {
    return this.search(() => true);
  }

  search(predicate: (student: Student) => boolean): Result<StudentResponse[], RecordsError> {
    return map(this.studentRepository.findAll(), students =>
      students.filter(predicate).map(mapStudentToResponse)
    );
  }

  /**
   * 氏名・メール・IDの部分一致（大文字小文字を区別しない）
   */
  searchByKeyword(keyword: string): Result<StudentResponse[], RecordsError> {
    const term = keyword.toLowerCase();
    return this.search(student =>
      fullName(student.identity.name).toLowerCase().includes(term) ||
      student.identity.email.toLowerCase().includes(term) ||
      student.identity.id.toLowerCase().includes(term)
    );
  }

  findByDepartment(query: DepartmentQuery): Result<StudentResponse[], RecordsError> {
    return flatMap(validateCommand(DepartmentQuerySchema, query), ({ department }) =>
      this.search(student => student.department.toLowerCase() === department.toLowerCase())
    );
  }

  /** 学籍番号の部分一致（大文字小文字を区別する） */
  findByRegistrationPattern(pattern: string): Result<StudentResponse[], RecordsError> {
    return this.search(student => student.registrationNumber.includes(pattern));
  }

  findByGpaRange(query: GpaRangeQuery): Result<StudentResponse[], RecordsError> {
    return flatMap(validateCommand(GpaRangeQuerySchema, query), ({ minGpa, maxGpa }) =>
      this.search(student => {
        const gpa = calculateGpa(student);
        return gpa >= minGpa && gpa <= maxGpa;
      })
    );
  }

  findInGoodStanding(): Result<StudentResponse[], RecordsError> {
    return this.search(isInGoodStanding);
  }

  findActive(): Result<StudentResponse[], RecordsError> {
    return this.search(student => student.identity.active);
  }

  findTopByGpa(query: TopStudentsQuery): Result<StudentResponse[], RecordsError> {
    return flatMap(validateCommand(TopStudentsQuerySchema, query), ({ limit }) =>
      map(this.studentRepository.findAll(), students =>
        topStudentsByGpa(students, limit).map(mapStudentToResponse)
      )
    );
  }

  findInCourse(courseCode: string): Result<StudentResponse[], RecordsError> {
    return flatMap(normalizeCourseCodeKey(courseCode), code =>
      this.search(student => isEnrolledIn(student, code))
    );
  }

  totals(): Result<TotalsResponse, RecordsError> {
    return map(this.studentRepository.findAll(), students => {
      const active = students.filter(student => student.identity.active).length;
      return { total: students.length, active, inactive: students.length - active };
    });
  }

  exists(studentId: string): Result<boolean, RecordsError> {
    return flatMap(parseStudentId(studentId), id => this.studentRepository.exists(id));
  }

  /**
   * 卒業要件に対する進捗（最低GPAは設定値）
   */
  progress(query: StudentProgressQuery): Result<StudentProgressResponse, RecordsError> {
    const validated = validateCommand(StudentProgressQuerySchema, query);
    if (!validated.success) {
      return validated;
    }
    const studentId = parseStudentId(validated.data.studentId);
    if (!studentId.success) {
      return studentId;
    }
    return map(requireStudent(this.studentRepository, studentId.data), student => ({
      studentId: student.identity.id,
      gpa: calculateGpa(student),
      ...studentProgress(student, validated.data.totalCoursesRequired, this.academics.minimumGpa)
    }));
  }

  // === 集計（アクティブな学生のみ） ===

  aggregates(): Result<StudentAggregatesResponse, RecordsError> {
    return map(this.studentRepository.findAll(), students => ({
      departmentCounts: toCountEntries(departmentWiseStudentCount(students)),
      gpaDistribution: toCountEntries(gpaDistribution(students)),
      averageGpa: averageGpa(students)
    }));
  }
}
