/**
 * Queries Index - 読み取り側のエクスポート
 */

// === Query Services ===
export { StudentQueries } from './student-queries';
export { CourseQueries } from './course-queries';
export { ReportQueries, type ReportQueriesDependencies } from './report-queries';

// === Query DTOs ===
export type {
  DepartmentQuery,
  GpaRangeQuery,
  TopStudentsQuery,
  StudentProgressQuery,
  CreditRangeQuery,
  SemesterQuery,
  AvailableSpotsQuery,
  CountEntry,
  TotalsResponse,
  StudentProgressResponse,
  StudentAggregatesResponse,
  EnrollmentStatusGroup,
  CourseAggregatesResponse
} from './dto';

export {
  DepartmentQuerySchema,
  GpaRangeQuerySchema,
  TopStudentsQuerySchema,
  StudentProgressQuerySchema,
  CreditRangeQuerySchema,
  SemesterQuerySchema,
  AvailableSpotsQuerySchema,
  toCountEntries
} from './dto';
