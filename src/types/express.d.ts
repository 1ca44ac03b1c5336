import { RequestContext } from '../services/requestContext';

declare global {
  namespace Express {
    interface Request {
      context?: RequestContext;
    }
  }
}

export {};
