import type { RequestHandler } from 'express';
import { formField } from '../utils/form';
import { badRequest } from '../utils/httpError';
import { requestContext } from './sessionMiddleware';

const CSRF_FIELD = 'csrf_token';

export const requireCsrf: RequestHandler = (req, _res, next) => {
  if (!requestContext(req).verifyCsrfToken(formField(req.body, CSRF_FIELD))) {
    console.warn(`[csrf] rejected ${req.method} ${req.originalUrl}`);
    next(badRequest('The form has expired or is invalid. Reload the page and try again.'));
    return;
  }
  next();
};
