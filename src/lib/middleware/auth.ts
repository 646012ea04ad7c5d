import type { NextFunction, Request, Response } from 'express';

import { toAuthenticatedCaller, verifyAccessToken } from '../auth';

const extractTokenFromQuery = (value: unknown): string | null => {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }

  if (Array.isArray(value)) {
    for (const entry of value) {
      if (typeof entry === 'string') {
        const trimmed = entry.trim();
        if (trimmed.length > 0) {
          return trimmed;
        }
      }
    }
  }

  return null;
};

// EventSource cannot set headers, so the event stream passes the token in the query.
export const extractToken = (req: Request): string | null => {
  const header = req.headers.authorization;
  if (typeof header === 'string') {
    const trimmed = header.trim();
    if (trimmed.toLowerCase().startsWith('bearer ')) {
      const token = trimmed.slice(7).trim();
      if (token.length > 0) {
        return token;
      }
    }

    if (trimmed.length > 0) {
      return trimmed;
    }
  }

  return extractTokenFromQuery(req.query.accessToken) ?? extractTokenFromQuery(req.query.token);
};

export const requireAuth = (req: Request, res: Response, next: NextFunction) => {
  const token = extractToken(req);
  if (!token) {
    res.status(401).json({ message: 'Authentication token missing.' });
    return;
  }

  try {
    req.caller = toAuthenticatedCaller(verifyAccessToken(token));
  } catch {
    res.status(401).json({ message: 'Token invalid or expired.' });
    return;
  }

  next();
};

export const requireAdmin = (req: Request, res: Response, next: NextFunction) => {
  if (!req.caller || req.caller.role !== 'ADMIN') {
    res.status(403).json({ message: 'Administrator privileges required.' });
    return;
  }

  next();
};
