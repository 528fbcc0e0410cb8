/**
 * backend/src/modules/auth/auth.constants.ts
 *
 * WHY:
 * - Cookie names and paths shared by the auth controller, the users/accounts controllers
 *   and the tests.
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 */

export const REFRESH_COOKIE_NAME = 'refresh_token';

/** The refresh secret is only ever sent to the auth endpoints that consume it. */
export const REFRESH_COOKIE_PATH = '/v1/auth';

export const ACCESS_TOKEN_TYPE = 'Bearer';
