/**
 * Commands Index - 状態変更側のエクスポート
 */

// === Command Handlers ===
export {
  RegisterStudentCommandHandler,
  RegisterCourseCommandHandler,
  RegisterInstructorCommandHandler
} from './register-commands';

export {
  UpdateStudentCommandHandler,
  UpdateCourseCommandHandler,
  UpdateInstructorCommandHandler
} from './update-commands';

export {
  EnrollStudentCommandHandler,
  EnrollInCourseCommandHandler
} from './enroll-student-command';

export { UnenrollStudentCommandHandler } from './unenroll-student-command';
export { RecordGradeCommandHandler } from './record-grade-command';

export {
  ChangeStudentStatusCommandHandler,
  BulkUpdateStudentStatusCommandHandler
} from './student-status-commands';

export {
  AssignInstructorCommandHandler,
  ChangeCourseStatusCommandHandler
} from './course-admin-commands';

export {
  type HandlerContext,
  publishAndAudit,
  requireStudent,
  requireCourse,
  requireInstructor
} from './handler-context';

// === Command DTOs ===
export type {
  EnrollStudentCommand,
  EnrollInCourseCommand,
  UnenrollStudentCommand,
  RecordGradeCommand,
  ChangeStudentStatusCommand,
  BulkUpdateStudentStatusCommand,
  AssignInstructorCommand,
  ChangeCourseStatusCommand,
  UpdateStudentCommand,
  UpdateCourseCommand,
  UpdateInstructorCommand,
  RegisterStudentCommand,
  RegisterCourseCommand,
  RegisterInstructorCommand,
  StudentResponse,
  CourseResponse,
  InstructorResponse,
  EnrollmentResponse,
  EnrollStudentResponse,
  EnrollInCourseResponse,
  UnenrollStudentResponse,
  RecordGradeResponse
} from './dto';

export {
  EnrollStudentCommandSchema,
  EnrollInCourseCommandSchema,
  UnenrollStudentCommandSchema,
  RecordGradeCommandSchema,
  ChangeStudentStatusCommandSchema,
  BulkUpdateStudentStatusCommandSchema,
  AssignInstructorCommandSchema,
  ChangeCourseStatusCommandSchema,
  UpdateStudentCommandSchema,
  UpdateCourseCommandSchema,
  UpdateInstructorCommandSchema,
  mapStudentToResponse,
  mapCourseToResponse,
  mapInstructorToResponse,
  mapEnrollmentToResponse,
  parseStudentCourse,
  parseStudentId,
  parseInstructorId,
  validateCommand
} from './dto';
