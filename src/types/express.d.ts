import type { AuthenticatedCaller } from '../lib/auth';

declare global {
  namespace Express {
    interface Request {
      caller?: AuthenticatedCaller;
    }
  }
}

export {};
