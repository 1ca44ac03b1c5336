import db from '../db/client';
import { StudentRecord } from '../db/types';

interface StudentRow {
  id: number;
  student_id: string;
  name: string;
  department: string;
  email: string | null;
  phone: string | null;
  created_at: string;
}

export interface StudentFields {
  studentId: string;
  name: string;
  department: string;
  email: string | null;
  phone: string | null;
}

const toStudent = (row: StudentRow): StudentRecord => ({
  id: row.id,
  studentId: row.student_id,
  name: row.name,
  department: row.department,
  email: row.email,
  phone: row.phone,
  createdAt: row.created_at,
});

const insertStmt = db.prepare<[string, string, string, string | null, string | null, string]>(
  'INSERT INTO students (student_id, name, department, email, phone, created_at) VALUES (?, ?, ?, ?, ?, ?)'
);
const selectAllStmt = db.prepare<[], StudentRow>('SELECT * FROM students ORDER BY created_at DESC, id DESC');
const searchStmt = db.prepare<[string, string, string, string], StudentRow>(`SELECT * FROM students
   WHERE name LIKE ? ESCAPE '\\'
      OR student_id LIKE ? ESCAPE '\\'
      OR department LIKE ? ESCAPE '\\'
      OR email LIKE ? ESCAPE '\\'
   ORDER BY created_at DESC, id DESC`);
const selectSingleStmt = db.prepare<[number], StudentRow>('SELECT * FROM students WHERE id = ?');
const selectOtherByStudentIdStmt = db.prepare<[string, number], { id: number }>(
  'SELECT id FROM students WHERE student_id = ? AND id != ?'
);
const selectOtherByEmailStmt = db.prepare<[string, number], { id: number }>(
  'SELECT id FROM students WHERE email = ? AND id != ?'
);
const updateStmt = db.prepare<[string, string, string, string | null, string | null, number]>(`UPDATE students
   SET student_id = ?, name = ?, department = ?, email = ?, phone = ?
   WHERE id = ?`);
const deleteStmt = db.prepare<[number]>('DELETE FROM students WHERE id = ?');

const escapeLike = (value: string) => value.replace(/[\\%_]/g, (match) => `\\${match}`);

export const listStudents = (): StudentRecord[] => selectAllStmt.all().map(toStudent);

export const searchStudents = (query: string): StudentRecord[] => {
  const pattern = `%${escapeLike(query)}%`;
  return searchStmt.all(pattern, pattern, pattern, pattern).map(toStudent);
};

export const getStudentById = (id: number): StudentRecord | undefined => {
  const row = selectSingleStmt.get(id);
  return row ? toStudent(row) : undefined;
};

export const createStudent = (fields: StudentFields): StudentRecord => {
  const result = insertStmt.run(
    fields.studentId,
    fields.name,
    fields.department,
    fields.email,
    fields.phone,
    new Date().toISOString()
  );
  const row = selectSingleStmt.get(Number(result.lastInsertRowid));
  if (!row) {
    throw new Error('Failed to insert student');
  }
  return toStudent(row);
};

export const studentIdTakenByOther = (studentId: string, excludeId: number) =>
  selectOtherByStudentIdStmt.get(studentId, excludeId) !== undefined;

export const emailTakenByOther = (email: string, excludeId: number) =>
  selectOtherByEmailStmt.get(email, excludeId) !== undefined;

export const updateStudent = (id: number, fields: StudentFields): StudentRecord | undefined => {
  updateStmt.run(fields.studentId, fields.name, fields.department, fields.email, fields.phone, id);
  return getStudentById(id);
};

export const deleteStudent = (id: number) => {
  deleteStmt.run(id);
};
