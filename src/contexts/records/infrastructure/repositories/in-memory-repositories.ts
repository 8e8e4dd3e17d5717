import type {
  Result,
  StudentId,
  InstructorId,
  EnrollmentId,
  CourseCodeKey
} from '../../../../shared/types/index';
import { Ok, EnrollmentIdSchema } from '../../../../shared/types/index';
import type { RecordsError } from '../../domain/errors/errors';
import type { Student } from '../../domain/entities/student';
import { type Course, courseKeyOf } from '../../domain/entities/course';
import type { Instructor } from '../../domain/entities/instructor';
import type { Enrollment } from '../../domain/entities/enrollment';
import type {
  IStudentRepository,
  ICourseRepository,
  IInstructorRepository,
  IEnrollmentRepository
} from '../../application/ports/ports';

/**
 * インメモリリポジトリ実装
 *
 * 記録はプロセス内の Map に保持する。一覧は登録順
 * （Map は挿入順を保ち、上書きしても位置は変わらない）
 */

export class InMemoryStudentRepository implements IStudentRepository {
  private readonly students = new Map<StudentId, Student>();

  findById(studentId: StudentId): Result<Student | null, RecordsError> {
    return Ok(this.students.get(studentId) ?? null);
  }

  findAll(): Result<Student[], RecordsError> {
    return Ok([...this.students.values()]);
  }

  exists(studentId: StudentId): Result<boolean, RecordsError> {
    return Ok(this.students.has(studentId));
  }

  save(student: Student): Result<void, RecordsError> {
    this.students.set(student.identity.id, student);
    return Ok(undefined);
  }

  // === テスト用ヘルパーメソッド ===

  clear(): void {
    this.students.clear();
  }
}

export class InMemoryCourseRepository implements ICourseRepository {
  private readonly courses = new Map<CourseCodeKey, Course>();

  findByCode(courseCode: CourseCodeKey): Result<Course | null, RecordsError> {
    return Ok(this.courses.get(courseCode) ?? null);
  }

  findAll(): Result<Course[], RecordsError> {
    return Ok([...this.courses.values()]);
  }

  exists(courseCode: CourseCodeKey): Result<boolean, RecordsError> {
    return Ok(this.courses.has(courseCode));
  }

  save(course: Course): Result<void, RecordsError> {
    this.courses.set(courseKeyOf(course), course);
    return Ok(undefined);
  }

  clear(): void {
    this.courses.clear();
  }
}

export class InMemoryInstructorRepository implements IInstructorRepository {
  private readonly instructors = new Map<InstructorId, Instructor>();

  findById(instructorId: InstructorId): Result<Instructor | null, RecordsError> {
    return Ok(this.instructors.get(instructorId) ?? null);
  }

  findAll(): Result<Instructor[], RecordsError> {
    return Ok([...this.instructors.values()]);
  }

  exists(instructorId: InstructorId): Result<boolean, RecordsError> {
    return Ok(this.instructors.has(instructorId));
  }

  save(instructor: Instructor): Result<void, RecordsError> {
    this.instructors.set(instructor.identity.id, instructor);
    return Ok(undefined);
  }

  clear(): void {
    this.instructors.clear();
  }
}

/**
 * 履修記録リポジトリ
 *
 * ID は "ENR-0001" から連番で払い出す
 */
export class InMemoryEnrollmentRepository implements IEnrollmentRepository {
  private readonly enrollments = new Map<EnrollmentId, Enrollment>();
  private sequence = 0;

  nextId(): EnrollmentId {
    this.sequence += 1;
    return EnrollmentIdSchema.parse(`ENR-${String(this.sequence).padStart(4, '0')}`);
  }

  findById(enrollmentId: EnrollmentId): Result<Enrollment | null, RecordsError> {
    return Ok(this.enrollments.get(enrollmentId) ?? null);
  }

  findByStudent(studentId: StudentId): Result<Enrollment[], RecordsError> {
    return Ok([...this.enrollments.values()].filter(enrollment => enrollment.studentId === studentId));
  }

  findCurrent(studentId: StudentId, courseCode: CourseCodeKey): Result<Enrollment | null, RecordsError> {
    const candidates = [...this.enrollments.values()].filter(
      enrollment =>
        enrollment.studentId === studentId &&
        enrollment.courseCode === courseCode &&
        enrollment.status !== 'WITHDRAWN'
    );
    return Ok(candidates[candidates.length - 1] ?? null);
  }

  findAll(): Result<Enrollment[], RecordsError> {
    return Ok([...this.enrollments.values()]);
  }

  save(enrollment: Enrollment): Result<void, RecordsError> {
    this.enrollments.set(enrollment.id, enrollment);
    return Ok(undefined);
  }

  clear(): void {
    this.enrollments.clear();
    this.sequence = 0;
  }
}
