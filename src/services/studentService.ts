import Database from 'better-sqlite3';
import {
  createStudent,
  deleteStudent,
  emailTakenByOther,
  getStudentById,
  listStudents,
  searchStudents,
  studentIdTakenByOther,
  StudentFields,
  updateStudent,
} from '../repositories/studentRepository';
import { StudentRecord } from '../db/types';
import { StudentInput } from '../validation/studentValidator';

type UniqueStudentField = 'studentId' | 'email';

const conflictMessages: Record<UniqueStudentField, string> = {
  studentId: 'Student ID already exists.',
  email: 'Email already exists.',
};

export class StudentConflictError extends Error {
  constructor(readonly field: UniqueStudentField) {
    super(conflictMessages[field]);
    this.name = 'StudentConflictError';
  }
}

const conflictColumns: Record<string, UniqueStudentField> = {
  'students.student_id': 'studentId',
  'students.email': 'email',
};

/** Maps a UNIQUE violation on the students table to the field it concerns. */
const toConflict = (error: unknown): StudentConflictError | undefined => {
  if (!(error instanceof Database.SqliteError) || error.code !== 'SQLITE_CONSTRAINT_UNIQUE') {
    return undefined;
  }
  const column = error.message.replace(/^UNIQUE constraint failed:\s*/, '').trim().toLowerCase();
  const field = conflictColumns[column];
  return field ? new StudentConflictError(field) : undefined;
};

const toFields = (input: StudentInput): StudentFields => ({
  studentId: input.studentId,
  name: input.name,
  department: input.department,
  email: input.email || null,
  phone: input.phone || null,
});

export const findStudents = (query: string): StudentRecord[] => (query ? searchStudents(query) : listStudents());

export const getStudent = (id: number) => getStudentById(id);

export const addStudent = (input: StudentInput): StudentRecord => {
  try {
    return createStudent(toFields(input));
  } catch (error) {
    throw toConflict(error) ?? error;
  }
};

/**
 * Updates a student in place. Uniqueness is checked against the other rows first
 * so that saving a record with its own student ID or email is not a conflict.
 */
export const reviseStudent = (id: number, input: StudentInput): StudentRecord | undefined => {
  if (!getStudentById(id)) {
    return undefined;
  }
  if (studentIdTakenByOther(input.studentId, id)) {
    throw new StudentConflictError('studentId');
  }
  if (input.email && emailTakenByOther(input.email, id)) {
    throw new StudentConflictError('email');
  }
  try {
    return updateStudent(id, toFields(input));
  } catch (error) {
    throw toConflict(error) ?? error;
  }
};

export const removeStudent = (id: number) => {
  deleteStudent(id);
};
