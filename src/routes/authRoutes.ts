import { Router } from 'express';
import { requireRole } from '../middleware/authMiddleware';
import { requireCsrf } from '../middleware/csrfMiddleware';
import { requestContext } from '../middleware/sessionMiddleware';
import { DuplicateUsernameError, InvalidCredentialsError, login, register } from '../services/authService';
import { asyncHandler } from '../utils/asyncHandler';
import { formField, safeRedirectTarget } from '../utils/form';
import { renderPage } from '../utils/render';
import { readRegistrationForm, validateRegistration } from '../validation/accountValidator';

const router = Router();

router.get('/login', (req, res) => {
  renderPage(req, res, 'auth/login', { next: safeRedirectTarget(req.query.next) ?? '', username: '' });
});

router.post(
  '/login',
  requireCsrf,
  asyncHandler(async (req, res) => {
    const context = requestContext(req);
    const username = formField(req.body, 'username').trim();
    const password = formField(req.body, 'password');
    const next = safeRedirectTarget(formField(req.body, 'next')) ?? safeRedirectTarget(req.query.next);

    try {
      const user = await login(username, password);
      context.signIn(user);
      context.flash('Welcome back!', 'success');
      res.redirect(next ?? '/students');
      return;
    } catch (error) {
      if (error instanceof InvalidCredentialsError) {
        console.warn(`[auth] failed login for "${username}"`);
        context.flash(error.message, 'danger');
        renderPage(req, res, 'auth/login', { next: next ?? '', username });
        return;
      }
      throw error;
    }
  })
);

router.get('/logout', (req, res) => {
  const context = requestContext(req);
  context.signOut();
  context.flash('You have been logged out.', 'info');
  res.redirect('/login');
});

router.get('/register', requireRole('admin'), (req, res) => {
  renderPage(req, res, 'auth/register', { data: { username: '', role: 'staff' } });
});

router.post(
  '/register',
  requireRole('admin'),
  requireCsrf,
  asyncHandler(async (req, res) => {
    const context = requestContext(req);
    const input = readRegistrationForm(req.body);
    const validation = validateRegistration(input);
    if (!validation.ok) {
      validation.errors.forEach((message) => context.flash(message, 'danger'));
      renderPage(req, res, 'auth/register', { data: input });
      return;
    }

    const { username, password, role } = validation.data;
    try {
      await register(username, password, role);
    } catch (error) {
      if (error instanceof DuplicateUsernameError) {
        context.flash(error.message, 'danger');
        renderPage(req, res, 'auth/register', { data: input });
        return;
      }
      throw error;
    }
    console.log(`[auth] user "${username}" (${role}) created by ${context.user?.username ?? 'unknown'}`);
    context.flash(`User '${username}' created.`, 'success');
    res.redirect('/students');
  })
);

export default router;
