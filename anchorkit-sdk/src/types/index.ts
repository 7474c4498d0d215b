/**
 * anchorkit SDK Types
 * Shapes shared by the program namespaces
 */

import type {
  AccountMeta,
  ConfirmOptions,
  PublicKey,
  Signer,
  TransactionInstruction,
} from '@solana/web3.js';

import type { Event } from '../coder/events';
import type { Address } from '../utils/pubkey';

// ============================================================================
// Instruction Context
// ============================================================================

/**
 * Accounts for an instruction keyed by IDL account name. Nested account
 * groups nest the same way. Optional accounts may be null.
 */
export interface Accounts {
  [name: string]: Address | Accounts | null;
}

/**
 * Trailing argument of every instruction, transaction, rpc and simulate call
 */
export interface Context {
  accounts?: Accounts;
  /** Appended after the IDL accounts */
  remainingAccounts?: AccountMeta[];
  /** Signers besides the provider wallet */
  signers?: Signer[];
  preInstructions?: TransactionInstruction[];
  postInstructions?: TransactionInstruction[];
  options?: ConfirmOptions;
}

export const CONTEXT_KEYS: ReadonlySet<string> = new Set([
  'accounts',
  'remainingAccounts',
  'signers',
  'preInstructions',
  'postInstructions',
  'options',
]);

// ============================================================================
// Results
// ============================================================================

export interface SimulateResponse {
  events: Event[];
  /** Raw simulation logs */
  raw: string[];
}

/**
 * Deserialized account owned by a program
 */
export interface ProgramAccount<T = Record<string, unknown>> {
  publicKey: PublicKey;
  account: T;
}
