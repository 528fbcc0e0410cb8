/**
 * src/modules/auth/policies/email-mask.policy.ts
 *
 * Email lookup by nickname answers with a masked address: enough for the owner to recognise
 * it, not enough to mail it. An unknown nickname gets a fixed placeholder of the same shape.
 */

export const UNKNOWN_NICKNAME_MASK = 'a***@***.***';

export function maskEmail(email: string): string {
  const at = email.indexOf('@');
  const local = at === -1 ? email : email.slice(0, at);
  const domain = at === -1 ? '' : email.slice(at + 1);

  return local ? `${local.charAt(0)}***@${domain}` : `***@${domain}`;
}
