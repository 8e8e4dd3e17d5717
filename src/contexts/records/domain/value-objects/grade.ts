import { z } from 'zod';

/**
 * 成績評価（S〜F）
 *
 * 評語・GP・説明の固定表と、素点から評語への全域関数
 */

export const GradeLetterSchema = z.enum(['S', 'A', 'B', 'C', 'D', 'E', 'F']);

export type GradeLetter = z.infer<typeof GradeLetterSchema>;

export interface GradeInfo {
  readonly letter: GradeLetter;
  readonly gradePoint: number;
  readonly description: string;
}

export const GRADES: Readonly<Record<GradeLetter, GradeInfo>> = {
  S: { letter: 'S', gradePoint: 10.0, description: 'Outstanding' },
  A: { letter: 'A', gradePoint: 9.0, description: 'Excellent' },
  B: { letter: 'B', gradePoint: 8.0, description: 'Very Good' },
  C: { letter: 'C', gradePoint: 7.0, description: 'Good' },
  D: { letter: 'D', gradePoint: 6.0, description: 'Satisfactory' },
  E: { letter: 'E', gradePoint: 5.0, description: 'Pass' },
  F: { letter: 'F', gradePoint: 0.0, description: 'Fail' }
};

/**
 * 下限（以上）と評語の対応。上から順に評価する
 */
const THRESHOLDS: ReadonlyArray<readonly [number, GradeLetter]> = [
  [90, 'S'],
  [80, 'A'],
  [70, 'B'],
  [60, 'C'],
  [50, 'D'],
  [40, 'E']
];

/**
 * 素点から評語を求める
 *
 * どの値でも必ず一つの評語を返す（40未満やNaNはF）
 */
export const gradeFromMarks = (marks: number): GradeLetter => {
  for (const [lowerBound, letter] of THRESHOLDS) {
    if (marks >= lowerBound) {
      return letter;
    }
  }
  return 'F';
};

export const gradePointOf = (letter: GradeLetter): number => GRADES[letter].gradePoint;

export const isPassingGrade = (letter: GradeLetter): boolean => letter !== 'F';

export const calculateGradePoints = (letter: GradeLetter, credits: number): number =>
  GRADES[letter].gradePoint * credits;

/** 例: "A (9.0) - Excellent" */
export const formatGrade = (letter: GradeLetter): string => {
  const info = GRADES[letter];
  return `${info.letter} (${info.gradePoint.toFixed(1)}) - ${info.description}`;
};
