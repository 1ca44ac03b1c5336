import type { Request, RequestHandler, Response } from 'express';
import { config } from '../config/env';
import { RequestContext, SessionCookieJar } from '../services/requestContext';
import { resumeSession, sessionDurationMs } from '../services/sessionService';

const SESSION_COOKIE = 'sid';

const cookieOptions = {
  httpOnly: true,
  sameSite: 'lax' as const,
  secure: config.cookieSecure,
  signed: true,
  path: '/',
};

const cookieJarFor = (res: Response): SessionCookieJar => ({
  issue: (session) => {
    res.cookie(SESSION_COOKIE, session.token, { ...cookieOptions, maxAge: sessionDurationMs });
  },
  clear: () => {
    res.clearCookie(SESSION_COOKIE, cookieOptions);
  },
});

export const attachRequestContext: RequestHandler = (req, res, next) => {
  const token: unknown = req.signedCookies?.[SESSION_COOKIE];
  const resumed = typeof token === 'string' && token ? resumeSession(token) : undefined;
  req.context = new RequestContext(cookieJarFor(res), resumed);
  next();
};

export const requestContext = (req: Request): RequestContext => {
  if (!req.context) {
    throw new Error('Request context is not attached; is attachRequestContext mounted?');
  }
  return req.context;
};
