import { z } from 'zod';
import { StudentRecord } from '../db/types';
import { formField } from '../utils/form';

const EMAIL_PATTERN = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;
const PHONE_PATTERN = /^[0-9+\-\s]{7,20}$/;

/** Trimmed form values, as echoed back into the student form. */
export interface StudentInput {
  name: string;
  studentId: string;
  department: string;
  email: string;
  phone: string;
}

export type StudentValidation =
  | { ok: true; data: StudentInput }
  | { ok: false; errors: string[]; data: StudentInput };

const requiredText = (message: string) => z.string().min(1, message);

const optionalMatching = (pattern: RegExp, message: string) =>
  z.string().refine((value) => value === '' || pattern.test(value), message);

// Key order fixes the order of reported messages.
const studentSchema = z.object({
  name: requiredText('Name is required.'),
  studentId: requiredText('Student ID is required.'),
  department: requiredText('Department is required.'),
  email: optionalMatching(EMAIL_PATTERN, 'Invalid email format.'),
  phone: optionalMatching(PHONE_PATTERN, "Phone should contain digits, spaces, '+' or '-' only."),
});

export const emptyStudentInput = (): StudentInput => ({
  name: '',
  studentId: '',
  department: '',
  email: '',
  phone: '',
});

export const readStudentForm = (body: unknown): StudentInput => ({
  name: formField(body, 'name').trim(),
  studentId: formField(body, 'student_id').trim(),
  department: formField(body, 'department').trim(),
  email: formField(body, 'email').trim(),
  phone: formField(body, 'phone').trim(),
});

export const studentInputFromRecord = (student: StudentRecord): StudentInput => ({
  name: student.name,
  studentId: student.studentId,
  department: student.department,
  email: student.email ?? '',
  phone: student.phone ?? '',
});

export const validateStudent = (input: StudentInput): StudentValidation => {
  const result = studentSchema.safeParse(input);
  if (result.success) {
    return { ok: true, data: input };
  }
  return { ok: false, errors: result.error.issues.map((issue) => issue.message), data: input };
};
