import { fullName, compareNames } from '../value-objects/name';
import type { PersonIdentity, PersonType } from './person';
import { getAge } from './person';
import { type Student, getStudentDisplayInfo } from './student';
import { type Instructor, getInstructorDisplayInfo } from './instructor';

/**
 * 人物（学生・教員のタグ付き共用体）
 *
 * 種別ごとの振る舞いは継承ではなく記述子（PersonCapabilities）で与える
 */

export type Person = Student | Instructor;

export interface PersonCapabilities<P extends Person> {
  getPersonType(person: P): PersonType;
  getDisplayInfo(person: P): string;
}

export const studentCapabilities: PersonCapabilities<Student> = {
  getPersonType: () => 'STUDENT',
  getDisplayInfo: getStudentDisplayInfo
};

export const instructorCapabilities: PersonCapabilities<Instructor> = {
  getPersonType: () => 'INSTRUCTOR',
  getDisplayInfo: getInstructorDisplayInfo
};

export const getPersonType = (person: Person): PersonType =>
  person.kind === 'STUDENT'
    ? studentCapabilities.getPersonType(person)
    : instructorCapabilities.getPersonType(person);

export const getDisplayInfo = (person: Person): string =>
  person.kind === 'STUDENT'
    ? studentCapabilities.getDisplayInfo(person)
    : instructorCapabilities.getDisplayInfo(person);

/** 例: "[STUDENT] Jane Doe (jane@example.edu) - Active" */
export const getPersonSummary = (person: Person): string => {
  const identity: PersonIdentity = person.identity;
  return `[${getPersonType(person)}] ${fullName(identity.name)} (${identity.email}) - ${identity.active ? 'Active' : 'Inactive'}`;
};

// === 並び替え用の比較関数 ===

export const compareByName = (a: Person, b: Person): number =>
  compareNames(a.identity.name, b.identity.name);

export const compareByRegistrationDate = (a: Person, b: Person): number =>
  a.identity.registrationDate.getTime() - b.identity.registrationDate.getTime();

export const compareByAge = (now: Date = new Date()) => (a: Person, b: Person): number =>
  getAge(a.identity, now) - getAge(b.identity, now);
