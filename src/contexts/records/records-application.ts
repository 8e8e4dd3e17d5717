import type { Result } from '../../shared/types/index';
import { Ok, map, flatMap, match, resultPipe } from '../../shared/types/index';
import type { RecordsConfig } from '../../shared/config/index';
import { type Logger, createLogger } from '../../shared/logging/logger';
import type { RecordsError } from './domain/errors/errors';
import { type Student, type StudentDraft, createStudent } from './domain/entities/student';
import { type Course, type CourseDraft, buildCourse, courseKeyOf } from './domain/entities/course';
import { type InstructorDraft, createInstructor } from './domain/entities/instructor';
import type {
  IStudentRepository,
  ICourseRepository,
  IInstructorRepository,
  IEnrollmentRepository,
  IEventPublisher
} from './application/ports/ports';
import {
  type HandlerContext,
  type StudentResponse,
  type CourseResponse,
  type InstructorResponse,
  RegisterStudentCommandHandler,
  RegisterCourseCommandHandler,
  RegisterInstructorCommandHandler,
  UpdateStudentCommandHandler,
  UpdateCourseCommandHandler,
  UpdateInstructorCommandHandler,
  EnrollStudentCommandHandler,
  EnrollInCourseCommandHandler,
  UnenrollStudentCommandHandler,
  RecordGradeCommandHandler,
  ChangeStudentStatusCommandHandler,
  BulkUpdateStudentStatusCommandHandler,
  AssignInstructorCommandHandler,
  ChangeCourseStatusCommandHandler
} from './application/commands/index';
import { StudentQueries, CourseQueries, ReportQueries } from './application/queries/index';
import {
  InMemoryStudentRepository,
  InMemoryCourseRepository,
  InMemoryInstructorRepository,
  InMemoryEnrollmentRepository
} from './infrastructure/repositories/in-memory-repositories';
import { InMemoryEventPublisher } from './infrastructure/services/in-memory-event-publisher';
import {
  type CsvImportResult,
  type SkippedRow,
  parseStudentsCsv,
  parseCoursesCsv,
  formatStudentsCsv,
  formatCoursesCsv
} from './infrastructure/adapters/csv/records-csv';
import { RecordsFileExchange } from './infrastructure/adapters/csv/records-file-exchange';

/**
 * 差し替え可能な依存（省略時はインメモリ実装）
 */
export interface RecordsApplicationDependencies {
  readonly studentRepository?: IStudentRepository;
  readonly courseRepository?: ICourseRepository;
  readonly instructorRepository?: IInstructorRepository;
  readonly enrollmentRepository?: IEnrollmentRepository;
  readonly eventPublisher?: IEventPublisher;
  readonly logger?: Logger;
  readonly clock?: () => Date;
}

export interface RejectedRecord {
  readonly id: string;
  readonly reason: string;
}

export interface ImportSummary {
  readonly imported: number;
  /** 解析できなかった行 */
  readonly skipped: SkippedRow[];
  /** 解析できたが登録できなかった記録（ID重複など） */
  readonly rejected: RejectedRecord[];
}

/**
 * 学務記録アプリケーション（コンポジションルート）
 *
 * 設定値を1つ受け取り、各ハンドラーへ注入する。プロセス全体で共有する設定は持たない
 */
export class RecordsApplication {
  readonly logger: Logger;
  readonly fileExchange: RecordsFileExchange;

  readonly commands: {
    readonly registerStudent: RegisterStudentCommandHandler;
    readonly registerCourse: RegisterCourseCommandHandler;
    readonly registerInstructor: RegisterInstructorCommandHandler;
    readonly updateStudent: UpdateStudentCommandHandler;
    readonly updateCourse: UpdateCourseCommandHandler;
    readonly updateInstructor: UpdateInstructorCommandHandler;
    readonly enrollStudent: EnrollStudentCommandHandler;
    readonly enrollInCourse: EnrollInCourseCommandHandler;
    readonly unenrollStudent: UnenrollStudentCommandHandler;
    readonly recordGrade: RecordGradeCommandHandler;
    readonly changeStudentStatus: ChangeStudentStatusCommandHandler;
    readonly bulkUpdateStudentStatus: BulkUpdateStudentStatusCommandHandler;
    readonly assignInstructor: AssignInstructorCommandHandler;
    readonly changeCourseStatus: ChangeCourseStatusCommandHandler;
  };

  readonly queries: {
    readonly students: StudentQueries;
    readonly courses: CourseQueries;
    readonly reports: ReportQueries;
  };

  private readonly clock: () => Date;

  constructor(
    readonly config: RecordsConfig,
    private readonly studentRepository: IStudentRepository,
    private readonly courseRepository: ICourseRepository,
    instructorRepository: IInstructorRepository,
    enrollmentRepository: IEnrollmentRepository,
    eventPublisher: IEventPublisher,
    logger: Logger,
    clock: () => Date
  ) {
    this.logger = logger;
    this.clock = clock;

    const context: HandlerContext = {
      rules: config.businessRules,
      logger,
      eventPublisher,
      auditLog: config.observability.logging.enableAuditLog,
      clock
    };

    this.commands = {
      registerStudent: new RegisterStudentCommandHandler(studentRepository, context),
      registerCourse: new RegisterCourseCommandHandler(courseRepository, instructorRepository, context),
      registerInstructor: new RegisterInstructorCommandHandler(instructorRepository, context),
      updateStudent: new UpdateStudentCommandHandler(studentRepository, context),
      updateCourse: new UpdateCourseCommandHandler(courseRepository, context),
      updateInstructor: new UpdateInstructorCommandHandler(instructorRepository, context),
      enrollStudent: new EnrollStudentCommandHandler(studentRepository, enrollmentRepository, context),
      enrollInCourse: new EnrollInCourseCommandHandler(studentRepository, courseRepository, enrollmentRepository, context),
      unenrollStudent: new UnenrollStudentCommandHandler(studentRepository, courseRepository, enrollmentRepository, context),
      recordGrade: new RecordGradeCommandHandler(studentRepository, enrollmentRepository, context),
      changeStudentStatus: new ChangeStudentStatusCommandHandler(studentRepository, context),
      bulkUpdateStudentStatus: new BulkUpdateStudentStatusCommandHandler(studentRepository, context),
      assignInstructor: new AssignInstructorCommandHandler(courseRepository, instructorRepository, context),
      changeCourseStatus: new ChangeCourseStatusCommandHandler(courseRepository, context)
    };

    this.queries = {
      students: new StudentQueries(studentRepository, config.businessRules.academics),
      courses: new CourseQueries(courseRepository, config.businessRules.academics),
      reports: new ReportQueries({
        studentRepository,
        courseRepository,
        instructorRepository,
        enrollmentRepository,
        fallbackCredits: config.businessRules.enrollment.creditsPerCourse,
        clock
      })
    };

    this.fileExchange = new RecordsFileExchange({
      directories: config.directories,
      logger,
      clock,
      defaultCapacity: config.businessRules.enrollment.defaultCourseCapacity
    });
  }

  // === 下書きからの登録 ===

  registerStudent(draft: StudentDraft): Result<StudentResponse, RecordsError> {
    return flatMap(createStudent(draft, this.clock()), student =>
      this.commands.registerStudent.handle({ student })
    );
  }

  /** 定員を省略した科目は設定の既定定員になる */
  registerCourse(draft: CourseDraft): Result<CourseResponse, RecordsError> {
    const built = buildCourse(draft, {
      now: this.clock(),
      defaultCapacity: this.config.businessRules.enrollment.defaultCourseCapacity
    });
    return flatMap(built, course => this.commands.registerCourse.handle({ course }));
  }

  registerInstructor(draft: InstructorDraft): Result<InstructorResponse, RecordsError> {
    return flatMap(createInstructor(draft, this.clock()), instructor =>
      this.commands.registerInstructor.handle({ instructor })
    );
  }

  // === CSV 取り込み・書き出し ===

  importStudentsCsv(csv: string): ImportSummary {
    const parsed = parseStudentsCsv(csv, { now: this.clock(), logger: this.logger });
    return this.registerImported(parsed, student => ({
      id: student.identity.id,
      result: this.commands.registerStudent.handle({ student })
    }));
  }

  importCoursesCsv(csv: string): ImportSummary {
    const parsed = parseCoursesCsv(csv, {
      now: this.clock(),
      logger: this.logger,
      defaultCapacity: this.config.businessRules.enrollment.defaultCourseCapacity
    });
    return this.registerImported(parsed, course => ({
      id: courseKeyOf(course),
      result: this.commands.registerCourse.handle({ course })
    }));
  }

  async importStudentsFromFile(fileName: string): Promise<Result<ImportSummary, RecordsError>> {
    const parsed = await this.fileExchange.importStudents(this.fileExchange.resolveImportPath(fileName));
    if (!parsed.success) {
      return parsed;
    }
    return Ok(this.registerImported(parsed.data, student => ({
      id: student.identity.id,
      result: this.commands.registerStudent.handle({ student })
    })));
  }

  async importCoursesFromFile(fileName: string): Promise<Result<ImportSummary, RecordsError>> {
    const parsed = await this.fileExchange.importCourses(this.fileExchange.resolveImportPath(fileName));
    if (!parsed.success) {
      return parsed;
    }
    return Ok(this.registerImported(parsed.data, course => ({
      id: courseKeyOf(course),
      result: this.commands.registerCourse.handle({ course })
    })));
  }

  exportStudentsCsv(): Result<string, RecordsError> {
    return resultPipe(this.snapshot())
      .map(({ students }) => formatStudentsCsv(students))
      .value();
  }

  exportCoursesCsv(): Result<string, RecordsError> {
    return resultPipe(this.snapshot())
      .map(({ courses }) => formatCoursesCsv(courses))
      .value();
  }

  /**
   * 現時点の学生・科目を設定の書き出しディレクトリへ書き出す
   */
  async exportSnapshot(): Promise<Result<string, RecordsError>> {
    const snapshot = this.snapshot();
    if (!snapshot.success) {
      return snapshot;
    }
    return this.fileExchange.exportSnapshot(snapshot.data.students, snapshot.data.courses);
  }

  /**
   * 読み取り専用のスナップショット。以後の変更は反映されない
   */
  snapshot(): Result<{ students: Student[]; courses: Course[] }, RecordsError> {
    return flatMap(this.studentRepository.findAll(), students =>
      map(this.courseRepository.findAll(), courses => ({ students, courses }))
    );
  }

  private registerImported<T>(
    parsed: CsvImportResult<T>,
    register: (record: T) => { id: string; result: Result<unknown, RecordsError> }
  ): ImportSummary {
    const rejected: RejectedRecord[] = [];
    let imported = 0;
    for (const record of parsed.records) {
      const { id, result } = register(record);
      match(result, {
        success: () => {
          imported += 1;
        },
        error: error => {
          rejected.push({ id, reason: error.message });
        }
      });
    }
    return { imported, skipped: parsed.skipped, rejected };
  }
}

/**
 * 設定と（任意の）依存からアプリケーションを組み立てる
 */
export const createRecordsApplication = (
  config: RecordsConfig,
  deps: RecordsApplicationDependencies = {}
): RecordsApplication => {
  const clock = deps.clock ?? (() => new Date());
  return new RecordsApplication(
    config,
    deps.studentRepository ?? new InMemoryStudentRepository(),
    deps.courseRepository ?? new InMemoryCourseRepository(),
    deps.instructorRepository ?? new InMemoryInstructorRepository(),
    deps.enrollmentRepository ?? new InMemoryEnrollmentRepository(),
    deps.eventPublisher ?? new InMemoryEventPublisher(clock),
    deps.logger ?? createLogger(config.observability.logging.level),
    clock
  );
};
