/**
 * src/shared/messaging/queue.ts
 *
 * WHY:
 * - Decouples "this user needs an email" from how mail is delivered.
 * - Flows enqueue messages; the transport is chosen in di.ts only.
 *
 * RULES:
 * - Depends on nothing else in this codebase.
 * - Message types are a discriminated union on `type`.
 * - Messages must be JSON-serializable.
 * - A temporary password may travel here: it is the mail body. It is never stored or logged.
 * - Never put password hashes, refresh secrets or session ids in messages.
 */

export type TemporaryPasswordEmailMessage = {
  type: 'users.temporary-password-email';
  userId: number;
  email: string;
  nickname: string;
  /** Plain text. The stored hash is only replaced once this message is accepted. */
  temporaryPassword: string;
};

export type QueueMessage = TemporaryPasswordEmailMessage;

export interface Queue {
  /** Resolves once the transport has accepted the message; rejects otherwise. */
  enqueue(message: QueueMessage): Promise<void>;
}
