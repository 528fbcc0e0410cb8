/**
 * backend/src/modules/users/user.presenter.ts
 *
 * Own-profile response shape (includes the email). The public shape is toPublicProfile().
 */

import type { User } from './user.types';

export type OwnProfileResponse = {
  id: number;
  email: string;
  nickname: string;
  profileImageUrl: string | null;
  createdAt: Date;
  updatedAt: Date;
};

export function toOwnProfileResponse(user: User): OwnProfileResponse {
  return {
    id: user.id,
    email: user.email,
    nickname: user.nickname,
    profileImageUrl: user.profileImageUrl,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
}
