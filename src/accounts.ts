/**
 * Account identities are base58 public keys.
 */

import { Keypair, PublicKey } from '@solana/web3.js';

/** Holder of renounced ownership; nobody can sign for it. */
export const NULL_ACCOUNT = PublicKey.default.toBase58();

export function isAccount(value: string): boolean {
  try {
    return new PublicKey(value).toBase58() === value;
  } catch {
    return false;
  }
}

export function generateAccount(): string {
  return Keypair.generate().publicKey.toBase58();
}
