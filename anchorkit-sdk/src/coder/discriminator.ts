import { createHash } from 'crypto';

import { snakeCase } from '../utils/case';

export const DISCRIMINATOR_SIZE = 8;

/**
 * First 8 bytes of sha256("<namespace>:<name>")
 */
export function sighash(namespace: string, name: string): Buffer {
  return createHash('sha256')
    .update(`${namespace}:${name}`)
    .digest()
    .subarray(0, DISCRIMINATOR_SIZE);
}

/**
 * Instruction names hash in snake case: initializePool -> global:initialize_pool
 */
export function instructionDiscriminator(name: string): Buffer {
  return sighash('global', snakeCase(name));
}

export function accountDiscriminator(name: string): Buffer {
  return sighash('account', name);
}

export function eventDiscriminator(name: string): Buffer {
  return sighash('event', name);
}
