import { Router, type Request } from 'express';
import { requireLogin } from '../middleware/authMiddleware';
import { requireCsrf } from '../middleware/csrfMiddleware';
import { requestContext } from '../middleware/sessionMiddleware';
import {
  addStudent,
  findStudents,
  getStudent,
  removeStudent,
  reviseStudent,
  StudentConflictError,
} from '../services/studentService';
import { parseRecordId, queryText } from '../utils/form';
import { notFound } from '../utils/httpError';
import { renderPage } from '../utils/render';
import {
  emptyStudentInput,
  readStudentForm,
  studentInputFromRecord,
  validateStudent,
} from '../validation/studentValidator';

const router = Router();

router.use(requireLogin);

const loadStudent = (req: Request) => {
  const id = parseRecordId(req.params.id);
  const student = id === undefined ? undefined : getStudent(id);
  if (!student) {
    throw notFound('Student not found.');
  }
  return student;
};

router.get('/', (req, res) => {
  const q = queryText(req.query.q);
  renderPage(req, res, 'students/index', { students: findStudents(q), q });
});

router.get('/new', (req, res) => {
  renderPage(req, res, 'students/new', { data: emptyStudentInput() });
});

router.post('/new', requireCsrf, (req, res) => {
  const context = requestContext(req);
  const validation = validateStudent(readStudentForm(req.body));
  if (!validation.ok) {
    validation.errors.forEach((message) => context.flash(message, 'danger'));
    renderPage(req, res, 'students/new', { data: validation.data });
    return;
  }
  try {
    const student = addStudent(validation.data);
    console.log(`[students] created #${student.id} (${student.studentId}) by ${context.user?.username}`);
  } catch (error) {
    if (error instanceof StudentConflictError) {
      context.flash(error.message, 'danger');
      renderPage(req, res, 'students/new', { data: validation.data });
      return;
    }
    throw error;
  }
  context.flash('Student added.', 'success');
  res.redirect('/students');
});

router.get('/:id', (req, res) => {
  renderPage(req, res, 'students/view', { student: loadStudent(req) });
});

router.get('/:id/edit', (req, res) => {
  const student = loadStudent(req);
  renderPage(req, res, 'students/edit', { student, data: studentInputFromRecord(student) });
});

router.post('/:id/edit', requireCsrf, (req, res) => {
  const context = requestContext(req);
  const student = loadStudent(req);
  const validation = validateStudent(readStudentForm(req.body));
  if (!validation.ok) {
    validation.errors.forEach((message) => context.flash(message, 'danger'));
    renderPage(req, res, 'students/edit', { student, data: validation.data });
    return;
  }
  try {
    const updated = reviseStudent(student.id, validation.data);
    if (!updated) {
      throw notFound('Student not found.');
    }
    console.log(`[students] updated #${updated.id} by ${context.user?.username}`);
  } catch (error) {
    if (error instanceof StudentConflictError) {
      context.flash(error.message, 'danger');
      renderPage(req, res, 'students/edit', { student, data: validation.data });
      return;
    }
    throw error;
  }
  context.flash('Student updated.', 'success');
  res.redirect(`/students/${student.id}`);
});

router.post('/:id/delete', requireCsrf, (req, res) => {
  const context = requestContext(req);
  const id = parseRecordId(req.params.id);
  if (id === undefined) {
    throw notFound('Student not found.');
  }
  removeStudent(id);
  console.log(`[students] deleted #${id} by ${context.user?.username}`);
  context.flash('Student deleted.', 'info');
  res.redirect('/students');
});

export default router;
