import { describe, it, expect } from 'vitest';
import { readStudentForm, studentInputFromRecord, validateStudent } from '../src/validation/studentValidator';

const PHONE_MESSAGE = "Phone should contain digits, spaces, '+' or '-' only.";

describe('readStudentForm', () => {
  it('trims every field and maps student_id', () => {
    expect(
      readStudentForm({
        name: '  Jane Doe ',
        student_id: ' S100',
        department: 'CS  ',
        email: ' jane@example.com ',
        phone: ' +1 555 0100 ',
      })
    ).toEqual({
      name: 'Jane Doe',
      studentId: 'S100',
      department: 'CS',
      email: 'jane@example.com',
      phone: '+1 555 0100',
    });
  });

  it('reads missing and non-string fields as empty', () => {
    expect(readStudentForm({ name: ['a', 'b'] })).toEqual({
      name: '',
      studentId: '',
      department: '',
      email: '',
      phone: '',
    });
    expect(readStudentForm(undefined).name).toBe('');
  });
});

describe('validateStudent', () => {
  it('accepts a complete record', () => {
    const input = readStudentForm({ name: 'Jane Doe', student_id: 'S100', department: 'CS', email: 'jane@example.com' });
    expect(validateStudent(input)).toEqual({ ok: true, data: input });
  });

  it('accepts a record without optional fields', () => {
    const result = validateStudent(readStudentForm({ name: 'Jane', student_id: 'S1', department: 'Math' }));
    expect(result.ok).toBe(true);
  });

  it('reports required fields in order', () => {
    const result = validateStudent(readStudentForm({ name: '   ' }));
    expect(result).toEqual({
      ok: false,
      errors: ['Name is required.', 'Student ID is required.', 'Department is required.'],
      data: { name: '', studentId: '', department: '', email: '', phone: '' },
    });
  });

  it('rejects malformed email addresses', () => {
    for (const email of ['jane', 'jane@example', 'jane doe@example.com', '@example.com']) {
      const result = validateStudent(readStudentForm({ name: 'J', student_id: 'S', department: 'D', email }));
      expect(result.ok ? [] : result.errors).toEqual(['Invalid email format.']);
    }
  });

  it('checks phone length and characters', () => {
    const check = (phone: string) => validateStudent(readStudentForm({ name: 'J', student_id: 'S', department: 'D', phone }));
    expect(check('+1 555-0100').ok).toBe(true);
    expect(check('1234567').ok).toBe(true);
    expect(check('123456').ok).toBe(false);
    expect(check('1'.repeat(21)).ok).toBe(false);
    const letters = check('555-CALL-NOW');
    expect(letters.ok ? [] : letters.errors).toEqual([PHONE_MESSAGE]);
  });

  it('lists every problem at once', () => {
    const result = validateStudent(readStudentForm({ student_id: 'S1', department: 'D', email: 'bad', phone: 'x' }));
    expect(result.ok ? [] : result.errors).toEqual(['Name is required.', 'Invalid email format.', PHONE_MESSAGE]);
  });
});

describe('studentInputFromRecord', () => {
  it('turns stored nulls into empty form values', () => {
    expect(
      studentInputFromRecord({
        id: 4,
        studentId: 'S4',
        name: 'Ada',
        department: 'Math',
        email: null,
        phone: null,
        createdAt: '2024-01-01T00:00:00.000Z',
      })
    ).toEqual({ name: 'Ada', studentId: 'S4', department: 'Math', email: '', phone: '' });
  });
});
