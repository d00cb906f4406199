/**
 * Deterministic ID generation.
 *
 * Local ids are derived from upstream ids so that re-applying a page
 * addresses the same rows instead of creating new ones.
 */

import { createHash } from 'crypto';

function digest(prefix: string, ...parts: string[]): string {
  const hash = createHash('sha256');
  for (const part of parts) {
    hash.update(part);
    hash.update('\u0000');
  }
  return `${prefix}_${hash.digest('hex').slice(0, 24)}`;
}

export function computeTransactionId(itemId: string, upstreamId: string): string {
  return digest('txn', itemId, upstreamId);
}

export function computePostingId(txnId: string, leg: number): string {
  return digest('pst', txnId, String(leg));
}

export function computeTagId(txnId: string, value: string): string {
  return digest('tag', txnId, value);
}

export function isValidTransactionId(id: string): boolean {
  return /^txn_[0-9a-f]{24}$/.test(id);
}
