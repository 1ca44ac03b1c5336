/// <reference path="./types/express.d.ts" />

import cookieParser from 'cookie-parser';
import express, { type ErrorRequestHandler } from 'express';
import { config } from './config/env';
import { attachRequestContext } from './middleware/sessionMiddleware';
import authRouter from './routes/authRoutes';
import setupRouter from './routes/setupRoutes';
import studentRouter from './routes/studentRoutes';
import { HttpError, notFound } from './utils/httpError';
import { pageLocals } from './utils/render';

const app = express();

app.set('views', config.viewsDir);
app.set('view engine', 'ejs');

app.use(express.urlencoded({ extended: false, limit: config.formBodyLimit }));
app.use(cookieParser(config.sessionSecret));
app.use(attachRequestContext);

app.get('/health', (_req, res) => {
  res.json({ status: 'ok' });
});

app.get('/', (req, res) => {
  res.redirect(req.context?.user ? '/students' : '/login');
});

app.use(authRouter);
app.use(setupRouter);
app.use('/students', studentRouter);

app.use((_req, _res, next) => {
  next(notFound());
});

const statusOf = (err: unknown) => {
  if (err instanceof HttpError) return err.status;
  // body-parser and friends attach an HTTP status to their errors.
  if (err instanceof Error && 'status' in err && typeof err.status === 'number') return err.status;
  return 500;
};

const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }
  const status = statusOf(err);
  if (status >= 500) {
    console.error(err);
  }
  const message = status >= 500 || !(err instanceof Error) ? 'Internal server error' : err.message;
  const sendPlain = () => {
    res.status(status).type('text/plain').send(message);
  };
  if (!req.context) {
    sendPlain();
    return;
  }

  let locals: ReturnType<typeof pageLocals>;
  try {
    locals = pageLocals(req, { status, message });
  } catch (localsError) {
    console.error('Failed to load session for error page', localsError);
    sendPlain();
    return;
  }
  res.status(status).render('error', locals, (renderError: Error | null, html: string) => {
    if (renderError) {
      console.error('Failed to render error page', renderError);
      sendPlain();
      return;
    }
    res.send(html);
  });
};

app.use(errorHandler);

export default app;
