/**
 * src/modules/auth/credentials/credential-validator.ts
 *
 * WHY:
 * - One interface, two credential modes. The auth-context hook and everything after it
 *   depend on CredentialValidator only; di.ts picks the variant from CREDENTIAL_MODE.
 *
 * VARIANTS:
 * - StatelessAccessValidator: `Authorization: Bearer <jwt>`, signature + expiry, no DB.
 * - SessionLookupValidator: `sid` cookie, hash lookup in user_sessions. An expired row is
 *   deleted on sight; the read is retried once on a storage failure.
 */

import type { Logger } from '../../../shared/logger/logger';
import { type TransactionCoordinator, withReadRetry } from '../../../shared/db/transaction';
import type { SessionStore } from '../../../shared/session/session.store';
import type { TokenIssuer } from './token-issuer';
import type { CredentialKind, CredentialValidation } from './credential.types';

export type { CredentialKind, CredentialValidation } from './credential.types';

export interface CredentialValidator {
  readonly kind: CredentialKind;
  validate(credential: string): Promise<CredentialValidation>;
}

export class StatelessAccessValidator implements CredentialValidator {
  readonly kind = 'access_token' as const;

  constructor(private readonly tokenIssuer: TokenIssuer) {}

  async validate(credential: string): Promise<CredentialValidation> {
    if (!credential) return { ok: false, reason: 'MISSING' };
    return this.tokenIssuer.validateAccess(credential);
  }
}

export class SessionLookupValidator implements CredentialValidator {
  readonly kind = 'session' as const;
  private readonly now: () => Date;

  constructor(
    private readonly deps: {
      sessionStore: SessionStore;
      coordinator: TransactionCoordinator;
      logger: Logger;
      now?: () => Date;
    },
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  async validate(credential: string): Promise<CredentialValidation> {
    if (!credential) return { ok: false, reason: 'MISSING' };

    const { sessionStore, coordinator, logger } = this.deps;

    const session = await withReadRetry(() => sessionStore.find(credential), {
      label: 'auth.session.lookup',
      logger,
    });
    if (!session) return { ok: false, reason: 'NOT_FOUND' };

    if (session.expiresAt.getTime() <= this.now().getTime()) {
      await coordinator.runAtomic((trx) => sessionStore.destroy(trx, credential), {
        label: 'auth.session.expire',
      });
      return { ok: false, reason: 'EXPIRED' };
    }

    return { ok: true, userId: session.userId };
  }
}
