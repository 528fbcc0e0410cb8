/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Parameter and result types for the Auth service.
 *
 * RULES:
 * - Never include raw passwords or hashes in result types.
 */

import type { RequestMeta } from '../../shared/http/request-meta';
import type { IssuedCredentials } from './credentials/credential.types';

export type LoginParams = RequestMeta & {
  email: string;
  password: string;
};

export type LoginResult = {
  user: { id: number; nickname: string };
  credentials: IssuedCredentials;
};

export type LogoutParams = RequestMeta & {
  userId: number | null;
  refreshToken: string | null;
  sessionId: string | null;
};

export type RefreshParams = RequestMeta & {
  refreshToken: string | null;
};

export type ResetPasswordParams = RequestMeta & {
  email: string;
};

export type FindEmailParams = RequestMeta & {
  nickname: string;
};
