/**
 * backend/src/modules/auth/index.ts
 *
 * Public surface of the auth module: what users/accounts need to issue or revoke
 * credentials inside their own units, and to hand them to the client.
 */

export type { CredentialIssuer } from './credentials/credential-issuer';
export type { TokenIssuer } from './credentials/token-issuer';
export type { IssuedCredentials } from './credentials/credential.types';
export { CredentialRepo } from './dal/credential.repo';
export {
  clearCredentialCookies,
  writeCredentials,
  type CredentialCookieSettings,
} from './helpers/write-credentials';
