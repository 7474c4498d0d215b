/**
 * Address Utilities
 */

import { PublicKey } from '@solana/web3.js';

export type Address = PublicKey | string;

/**
 * Accept a base58 string or a PublicKey
 */
export function translateAddress(address: Address): PublicKey {
  return address instanceof PublicKey ? address : new PublicKey(address);
}

/**
 * Derive a program address from UTF-8 string or raw byte seeds
 */
export function findProgramAddress(
  seeds: Array<string | Uint8Array>,
  programId: Address
): [PublicKey, number] {
  return PublicKey.findProgramAddressSync(
    seeds.map((s) => (typeof s === 'string' ? Buffer.from(s, 'utf8') : Buffer.from(s))),
    translateAddress(programId)
  );
}
