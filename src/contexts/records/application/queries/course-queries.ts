import type { Result } from '../../../../shared/types/index';
import { map, flatMap } from '../../../../shared/types/index';
import type { BusinessRulesConfig } from '../../../../shared/config/index';
import { normalizeCourseCodeKey, fullCode } from '../../domain/value-objects/course-code';
import type { RecordsError } from '../../domain/errors/errors';
import {
  type Course,
  availableSpots,
  hasPrerequisites,
  isFull
} from '../../domain/entities/course';
import {
  type CourseThresholds,
  isPopular,
  isUnderenrolled,
  departmentWiseCourseCount,
  instructorWiseCourseCount,
  creditDistribution,
  coursesByEnrollmentStatus,
  averageEnrollmentPercentage,
  sortByEnrollmentDesc,
  sortByAvailabilityAsc
} from '../../domain/services/course-statistics';
import type { ICourseRepository } from '../ports/ports';
import { type CourseResponse, mapCourseToResponse, validateCommand } from '../commands/dto';
import {
  DepartmentQuerySchema,
  CreditRangeQuerySchema,
  SemesterQuerySchema,
  AvailableSpotsQuerySchema,
  type DepartmentQuery,
  type CreditRangeQuery,
  type SemesterQuery,
  type AvailableSpotsQuery,
  type CourseAggregatesResponse,
  type TotalsResponse,
  toCountEntries
} from './dto';

/**
 * 科目の読み取り専用クエリ
 *
 * 人気・定員割れの閾値は設定値を使う
 */
export class CourseQueries {
  private readonly thresholds: CourseThresholds;

  constructor(
    private readonly courseRepository: ICourseRepository,
    academics: BusinessRulesConfig['academics']
  ) {
    this.thresholds = {
      popularThreshold: academics.popularThreshold,
      underenrolledThreshold: academics.underenrolledThreshold
    };
  }

  /** 科目コードは大文字小文字を区別しない */
  findByCode(courseCode: string): Result<CourseResponse | null, RecordsError> {
    return flatMap(normalizeCourseCodeKey(courseCode), code =>
      map(this.courseRepository.findByCode(code), course => (course ? mapCourseToResponse(course) : null))
    );
  }

  findAll(): Result<CourseResponse[], RecordsError> {
    return this.search(() => true);
  }

  search(predicate: (course: Course) => boolean): Result<CourseResponse[], RecordsError> {
    return map(this.courseRepository.findAll(), courses =>
      courses.filter(predicate).map(mapCourseToResponse)
    );
  }

  /**
   * 科目コード・科目名・学科の部分一致（大文字小文字を区別しない）
   */
  searchByKeyword(keyword: string): Result<CourseResponse[], RecordsError> {
    const term = keyword.toLowerCase();
    return this.search(course =>
      fullCode(course.code).toLowerCase().includes(term) ||
      course.title.toLowerCase().includes(term) ||
      course.department.toLowerCase().includes(term)
    );
  }

  findByInstructor(instructorId: string): Result<CourseResponse[], RecordsError> {
    return this.search(course => course.instructorId === instructorId);
  }

  findByDepartment(query: DepartmentQuery): Result<CourseResponse[], RecordsError> {
    return flatMap(validateCommand(DepartmentQuerySchema, query), ({ department }) =>
      this.search(course => course.department.toLowerCase() === department.toLowerCase())
    );
  }

  findBySemester(query: SemesterQuery): Result<CourseResponse[], RecordsError> {
    return flatMap(validateCommand(SemesterQuerySchema, query), ({ semester }) =>
      this.search(course => course.semester === semester)
    );
  }

  /** 単位数の範囲（両端を含む） */
  findByCreditRange(query: CreditRangeQuery): Result<CourseResponse[], RecordsError> {
    return flatMap(validateCommand(CreditRangeQuerySchema, query), ({ minCredits, maxCredits }) =>
      this.search(course => course.credits >= minCredits && course.credits <= maxCredits)
    );
  }

  /** 開講中で満員でない科目 */
  findAvailable(): Result<CourseResponse[], RecordsError> {
    return this.search(course => course.active && !isFull(course));
  }

  findWithPrerequisites(): Result<CourseResponse[], RecordsError> {
    return this.search(hasPrerequisites);
  }

  findPopular(): Result<CourseResponse[], RecordsError> {
    return this.search(course => isPopular(course, this.thresholds));
  }

  findUnderenrolled(): Result<CourseResponse[], RecordsError> {
    return this.search(course => isUnderenrolled(course, this.thresholds));
  }

  searchByTitle(titlePattern: string): Result<CourseResponse[], RecordsError> {
    const term = titlePattern.toLowerCase();
    return this.search(course => course.title.toLowerCase().includes(term));
  }

  findWithAvailableSpots(query: AvailableSpotsQuery): Result<CourseResponse[], RecordsError> {
    return flatMap(validateCommand(AvailableSpotsQuerySchema, query), ({ requiredSpots }) =>
      this.search(course => course.active && availableSpots(course) >= requiredSpots)
    );
  }

  // === 並び替え（開講中の科目のみ） ===

  sortedByEnrollment(): Result<CourseResponse[], RecordsError> {
    return map(this.courseRepository.findAll(), courses => sortByEnrollmentDesc(courses).map(mapCourseToResponse));
  }

  sortedByAvailability(): Result<CourseResponse[], RecordsError> {
    return map(this.courseRepository.findAll(), courses => sortByAvailabilityAsc(courses).map(mapCourseToResponse));
  }

  totals(): Result<TotalsResponse, RecordsError> {
    return map(this.courseRepository.findAll(), courses => {
      const active = courses.filter(course => course.active).length;
      return { total: courses.length, active, inactive: courses.length - active };
    });
  }

  exists(courseCode: string): Result<boolean, RecordsError> {
    return flatMap(normalizeCourseCodeKey(courseCode), code => this.courseRepository.exists(code));
  }

  // === 集計（開講中の科目のみ） ===

  aggregates(): Result<CourseAggregatesResponse, RecordsError> {
    return map(this.courseRepository.findAll(), courses => ({
      departmentCounts: toCountEntries(departmentWiseCourseCount(courses)),
      instructorCounts: toCountEntries(instructorWiseCourseCount(courses)),
      creditDistribution: toCountEntries(creditDistribution(courses)),
      enrollmentStatus: [...coursesByEnrollmentStatus(courses).entries()].map(([status, grouped]) => ({
        status,
        courseCodes: grouped.map(course => fullCode(course.code))
      })),
      averageEnrollmentPercentage: averageEnrollmentPercentage(courses)
    }));
  }
}
