import { createHash } from 'node:crypto';

/** SHA-256 hex of the normalized organizational identifier; null passes through. */
export function personHash(orgId: string | null): string | null {
  if (!orgId) {
    return null;
  }
  return createHash('sha256').update(orgId, 'utf8').digest('hex');
}
