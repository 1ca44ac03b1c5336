import type { Request, RequestHandler } from 'express';
import { UserRole } from '../db/types';
import { forbidden } from '../utils/httpError';
import { requestContext } from './sessionMiddleware';

const loginPath = (next?: string) => (next ? `/login?${new URLSearchParams({ next }).toString()}` : '/login');

// Only a GET can be replayed after login; other methods fall back to the default landing page.
const redirectToLogin = (req: Request) => loginPath(req.method === 'GET' ? req.originalUrl : undefined);

export const requireLogin: RequestHandler = (req, res, next) => {
  if (!requestContext(req).user) {
    res.redirect(redirectToLogin(req));
    return;
  }
  next();
};

export const requireRole =
  (role: UserRole): RequestHandler =>
  (req, res, next) => {
    const context = requestContext(req);
    if (!context.user) {
      res.redirect(redirectToLogin(req));
      return;
    }
    if (!context.hasRole(role)) {
      next(forbidden());
      return;
    }
    next();
  };
