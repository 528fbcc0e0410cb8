import type { TestClient } from './test-client';
import { readJson } from './test-client';

export const TEST_PASSWORD = 'Passw0rd!';

export type TokenLoginBody = {
  user: { id: number; nickname: string };
  credentialKind: 'access_token';
  tokenType: 'Bearer';
  accessToken: string;
  expiresAt: string;
  refreshExpiresAt: string;
};

export type SessionLoginBody = {
  user: { id: number; nickname: string };
  credentialKind: 'session';
  expiresAt: string;
};

export type OwnProfileBody = {
  user: {
    id: number;
    email: string;
    nickname: string;
    profileImageUrl: string | null;
    createdAt: string;
    updatedAt: string;
  };
};

export async function registerUser(
  client: TestClient,
  input: { email: string; nickname: string; password?: string },
): Promise<OwnProfileBody['user']> {
  const res = await client.request({
    method: 'POST',
    url: '/v1/users',
    payload: { email: input.email, nickname: input.nickname, password: input.password ?? TEST_PASSWORD },
  });
  if (res.statusCode !== 201) {
    throw new Error(`register failed: ${res.statusCode} ${res.body}`);
  }
  return readJson<OwnProfileBody>(res).user;
}

export async function loginWithToken(
  client: TestClient,
  input: { email: string; password?: string },
): Promise<TokenLoginBody> {
  const res = await client.request({
    method: 'POST',
    url: '/v1/auth/session',
    payload: { email: input.email, password: input.password ?? TEST_PASSWORD },
  });
  if (res.statusCode !== 200) {
    throw new Error(`login failed: ${res.statusCode} ${res.body}`);
  }
  return readJson<TokenLoginBody>(res);
}

/** Register + log in (token mode). */
export async function signUpAndLogin(
  client: TestClient,
  input: { email: string; nickname: string; password?: string },
) {
  const user = await registerUser(client, input);
  const login = await loginWithToken(client, input);
  return { user, accessToken: login.accessToken, login };
}
