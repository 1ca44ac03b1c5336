import { beforeEach, describe, it, expect } from 'vitest';
import {
  addStudent,
  findStudents,
  getStudent,
  removeStudent,
  reviseStudent,
  StudentConflictError,
} from '../src/services/studentService';
import { readStudentForm, StudentInput } from '../src/validation/studentValidator';
import { countRows, resetDatabase } from './helpers';

const input = (overrides: Partial<StudentInput> = {}): StudentInput => ({
  name: 'Jane Doe',
  studentId: 'S100',
  department: 'CS',
  email: 'jane@example.com',
  phone: '',
  ...overrides,
});

const conflictOf = (action: () => unknown) => {
  try {
    action();
  } catch (error) {
    if (error instanceof StudentConflictError) return error;
    throw error;
  }
  throw new Error('Expected a StudentConflictError');
};

beforeEach(() => {
  resetDatabase();
});

describe('addStudent', () => {
  it('stores the trimmed submitted values', () => {
    const created = addStudent(
      readStudentForm({ name: ' Jane Doe ', student_id: ' S100 ', department: ' CS', email: 'jane@example.com ', phone: '' })
    );
    const stored = getStudent(created.id);
    expect(stored).toMatchObject({
      studentId: 'S100',
      name: 'Jane Doe',
      department: 'CS',
      email: 'jane@example.com',
      phone: null,
    });
    expect(Number.isNaN(Date.parse(stored?.createdAt ?? ''))).toBe(false);
  });

  it('rejects a duplicate student ID and keeps one row', () => {
    addStudent(input());
    const conflict = conflictOf(() => addStudent(input({ email: 'other@example.com' })));
    expect(conflict.field).toBe('studentId');
    expect(conflict.message).toBe('Student ID already exists.');
    expect(countRows('students')).toBe(1);
  });

  it('rejects a duplicate email', () => {
    addStudent(input());
    const conflict = conflictOf(() => addStudent(input({ studentId: 'S200' })));
    expect(conflict.field).toBe('email');
    expect(conflict.message).toBe('Email already exists.');
    expect(countRows('students')).toBe(1);
  });

  it('allows several students without an email', () => {
    addStudent(input({ email: '' }));
    addStudent(input({ studentId: 'S200', email: '' }));
    expect(countRows('students')).toBe(2);
  });
});

describe('reviseStudent', () => {
  it('saves a record with its own unchanged student ID and email', () => {
    const created = addStudent(input());
    const updated = reviseStudent(created.id, input({ name: 'Jane Q. Doe' }));
    expect(updated).toMatchObject({ id: created.id, studentId: 'S100', email: 'jane@example.com', name: 'Jane Q. Doe' });
  });

  it('refuses to take another student ID', () => {
    addStudent(input());
    const other = addStudent(input({ studentId: 'S200', email: 'sam@example.com', name: 'Sam' }));
    const conflict = conflictOf(() => reviseStudent(other.id, input({ studentId: 'S100', email: 'sam@example.com' })));
    expect(conflict.field).toBe('studentId');
    expect(getStudent(other.id)?.studentId).toBe('S200');
  });

  it("refuses to take another student's email", () => {
    addStudent(input());
    const other = addStudent(input({ studentId: 'S200', email: 'sam@example.com', name: 'Sam' }));
    const conflict = conflictOf(() => reviseStudent(other.id, input({ studentId: 'S200' })));
    expect(conflict.field).toBe('email');
  });

  it('clears optional fields to null', () => {
    const created = addStudent(input({ phone: '555 0100' }));
    const updated = reviseStudent(created.id, input({ email: '', phone: '' }));
    expect(updated?.email).toBeNull();
    expect(updated?.phone).toBeNull();
  });

  it('returns undefined for a missing student', () => {
    expect(reviseStudent(9999, input())).toBeUndefined();
  });
});

describe('findStudents', () => {
  beforeEach(() => {
    addStudent(input({ studentId: 'C-100', name: 'Ada Lovelace', department: 'Computer Science', email: 'ada@example.com' }));
    addStudent(input({ studentId: 'M-200', name: 'Emmy Noether', department: 'Mathematics', email: 'emmy@example.org' }));
    addStudent(input({ studentId: 'P-300', name: 'Lise Meitner', department: 'Physics', email: '' }));
  });

  it('lists newest first without a query', () => {
    expect(findStudents('').map((student) => student.studentId)).toEqual(['P-300', 'M-200', 'C-100']);
  });

  it('matches a department substring case-insensitively', () => {
    expect(findStudents('MATHEM').map((student) => student.studentId)).toEqual(['M-200']);
  });

  it('matches across name, student ID and email', () => {
    expect(findStudents('lise').map((student) => student.studentId)).toEqual(['P-300']);
    expect(findStudents('c-1').map((student) => student.studentId)).toEqual(['C-100']);
    expect(findStudents('example.org').map((student) => student.studentId)).toEqual(['M-200']);
  });

  it('treats LIKE wildcards literally', () => {
    expect(findStudents('%')).toEqual([]);
    expect(findStudents('_')).toEqual([]);
  });
});

describe('removeStudent', () => {
  it('deletes by id and ignores missing ids', () => {
    const created = addStudent(input());
    removeStudent(created.id);
    expect(getStudent(created.id)).toBeUndefined();
    expect(() => removeStudent(created.id)).not.toThrow();
  });
});
