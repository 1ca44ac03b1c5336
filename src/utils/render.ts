import type { Request, Response } from 'express';
import { requestContext } from '../middleware/sessionMiddleware';

/** Merges `locals` with the session-derived values every layout needs. */
export const pageLocals = (req: Request, locals: Record<string, unknown> = {}) => {
  const context = requestContext(req);
  return {
    ...locals,
    currentUser: context.user ?? null,
    isAdmin: context.hasRole('admin'),
    csrfToken: () => context.csrfToken(),
    flashes: context.takeFlashes(),
  };
};

export const renderPage = (
  req: Request,
  res: Response,
  view: string,
  locals: Record<string, unknown> = {},
  status = 200
) => {
  res.status(status).render(view, pageLocals(req, locals));
};
