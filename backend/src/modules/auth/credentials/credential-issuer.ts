/**
 * src/modules/auth/credentials/credential-issuer.ts
 *
 * Minting side of the credential modes. Login, password change and registration-free
 * flows call `issue(trx, userId)` inside their own unit and never branch on the mode.
 */

import type { TxExecutor } from '../../../shared/db/db';
import type { SessionStore } from '../../../shared/session/session.store';
import type { TokenIssuer } from './token-issuer';
import type { CredentialKind, IssuedCredentials } from './credential.types';

export interface CredentialIssuer {
  readonly kind: CredentialKind;
  issue(trx: TxExecutor, userId: number): Promise<IssuedCredentials>;
}

export class TokenCredentialIssuer implements CredentialIssuer {
  readonly kind = 'access_token' as const;

  constructor(private readonly tokenIssuer: TokenIssuer) {}

  async issue(trx: TxExecutor, userId: number): Promise<IssuedCredentials> {
    const pair = await this.tokenIssuer.issue(trx, userId);
    return { kind: 'access_token', ...pair };
  }
}

export class SessionCredentialIssuer implements CredentialIssuer {
  readonly kind = 'session' as const;

  constructor(private readonly sessionStore: SessionStore) {}

  async issue(trx: TxExecutor, userId: number): Promise<IssuedCredentials> {
    const session = await this.sessionStore.create(trx, userId);
    return { kind: 'session', sessionId: session.sessionId, expiresAt: session.expiresAt };
  }
}
