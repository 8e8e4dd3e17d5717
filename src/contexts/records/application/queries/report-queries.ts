import type { Result } from '../../../../shared/types/index';
import { Ok, map, flatMap, EnrollmentIdSchema } from '../../../../shared/types/index';
import { parseWithSchema, notFoundFailure, type RecordsError } from '../../domain/errors/errors';
import type { Enrollment } from '../../domain/entities/enrollment';
import { courseKeyOf } from '../../domain/entities/course';
import {
  generateTranscript,
  generateEnrollmentReport,
  generateInstructorProfile,
  generateStudentStatisticsSummary,
  generateCourseStatisticsSummary,
  generateCatalog
} from '../../domain/services/reports';
import { calculateCreditWeightedGpa } from '../../domain/services/student-statistics';
import type {
  IStudentRepository,
  ICourseRepository,
  IInstructorRepository,
  IEnrollmentRepository
} from '../ports/ports';
import { requireStudent, requireInstructor } from '../commands/handler-context';
import {
  type EnrollmentResponse,
  mapEnrollmentToResponse,
  parseStudentId,
  parseInstructorId
} from '../commands/dto';

export interface ReportQueriesDependencies {
  readonly studentRepository: IStudentRepository;
  readonly courseRepository: ICourseRepository;
  readonly instructorRepository: IInstructorRepository;
  readonly enrollmentRepository: IEnrollmentRepository;
  /** 単位数が分からない科目の単位数 */
  readonly fallbackCredits: number;
  readonly clock: () => Date;
}

/**
 * テキストレポートと履修履歴のクエリ
 */
export class ReportQueries {
  constructor(private readonly deps: ReportQueriesDependencies) {}

  transcript(studentId: string): Result<string, RecordsError> {
    return flatMap(parseStudentId(studentId), id =>
      map(requireStudent(this.deps.studentRepository, id), generateTranscript)
    );
  }

  instructorProfile(instructorId: string): Result<string, RecordsError> {
    return flatMap(parseInstructorId(instructorId), id =>
      map(requireInstructor(this.deps.instructorRepository, id), instructor =>
        generateInstructorProfile(instructor, this.deps.clock())
      )
    );
  }

  enrollmentReport(enrollmentId: string): Result<string, RecordsError> {
    return flatMap(parseWithSchema(EnrollmentIdSchema, enrollmentId, 'INVALID_ENROLLMENT_ID'), id =>
      flatMap(this.deps.enrollmentRepository.findById(id), (enrollment): Result<string, RecordsError> =>
        enrollment ? Ok(generateEnrollmentReport(enrollment)) : notFoundFailure<string>('Enrollment', id)
      )
    );
  }

  /**
   * 学生の履修記録（取り消し済みを含む、作成順）
   */
  enrollmentHistory(studentId: string): Result<EnrollmentResponse[], RecordsError> {
    return flatMap(parseStudentId(studentId), id =>
      flatMap(requireStudent(this.deps.studentRepository, id), () =>
        map(this.deps.enrollmentRepository.findByStudent(id), (records: Enrollment[]) =>
          records.map(mapEnrollmentToResponse)
        )
      )
    );
  }

  /**
   * 科目の実単位数で重み付けしたGPA
   */
  creditWeightedGpa(studentId: string): Result<number, RecordsError> {
    const id = parseStudentId(studentId);
    if (!id.success) {
      return id;
    }
    const student = requireStudent(this.deps.studentRepository, id.data);
    if (!student.success) {
      return student;
    }
    const courses = this.deps.courseRepository.findAll();
    if (!courses.success) {
      return courses;
    }

    const credits = new Map<string, number>(courses.data.map((course): [string, number] => [courseKeyOf(course), course.credits]));
    return Ok(calculateCreditWeightedGpa(student.data, code => credits.get(code), this.deps.fallbackCredits));
  }

  studentStatisticsSummary(): Result<string, RecordsError> {
    return map(this.deps.studentRepository.findAll(), generateStudentStatisticsSummary);
  }

  courseStatisticsSummary(): Result<string, RecordsError> {
    return map(this.deps.courseRepository.findAll(), generateCourseStatisticsSummary);
  }

  catalog(): Result<string, RecordsError> {
    return map(this.deps.courseRepository.findAll(), generateCatalog);
  }
}
