import jwt, { type Secret, type SignOptions } from 'jsonwebtoken';
import { z } from 'zod';

import { appConfig } from '../config';

export type CallerRole = 'ADMIN' | 'USER';

export interface AuthTokenPayload {
  sub: string;
  role: CallerRole;
  displayName?: string;
}

export interface AuthenticatedCaller {
  id: string;
  role: CallerRole;
  displayName: string | null;
  privileged: boolean;
}

const tokenPayloadSchema = z.object({
  sub: z.string().trim().min(1),
  role: z.enum(['ADMIN', 'USER']),
  displayName: z.string().optional(),
});

export const createAccessToken = (payload: AuthTokenPayload, secret: Secret = appConfig.auth.jwtSecret) => {
  const options = { expiresIn: appConfig.auth.tokenExpiresIn } as SignOptions;
  return jwt.sign(payload, secret, options);
};

export const verifyAccessToken = (token: string, secret: Secret = appConfig.auth.jwtSecret): AuthTokenPayload => {
  const decoded = jwt.verify(token, secret);
  const parsed = tokenPayloadSchema.safeParse(typeof decoded === 'string' ? JSON.parse(decoded) : decoded);

  if (!parsed.success) {
    throw new Error('Invalid token payload');
  }

  return parsed.data;
};

export const isPrivilegedCaller = (
  payload: Pick<AuthTokenPayload, 'sub' | 'role'>,
  privilegedCallerIds: readonly string[] = appConfig.generation.privilegedCallerIds,
) => payload.role === 'ADMIN' || privilegedCallerIds.includes(payload.sub);

export const toAuthenticatedCaller = (
  payload: AuthTokenPayload,
  privilegedCallerIds?: readonly string[],
): AuthenticatedCaller => ({
  id: payload.sub,
  role: payload.role,
  displayName: payload.displayName ?? null,
  privileged: isPrivilegedCaller(payload, privilegedCallerIds),
});
