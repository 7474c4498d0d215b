import { AccountMeta, PublicKey, TransactionInstruction } from '@solana/web3.js';

import { IdlInstruction } from '../../idl';
import { Accounts } from '../../types';
import { accountsArray, argsRecord, splitArgsAndCtx } from '../common';

export type InstructionEncodeFn = (name: string, args: Record<string, unknown>) => Buffer;

/**
 * Builds the TransactionInstruction of one IDL instruction:
 * `program.instruction.deposit(amount, { accounts: {...} })`
 */
export interface InstructionFn {
  (...args: unknown[]): TransactionInstruction;
  /** Account metas for the given accounts, in IDL order */
  accounts(accounts: Accounts): AccountMeta[];
}

export function buildInstructionFn(
  idlIx: IdlInstruction,
  encode: InstructionEncodeFn,
  programId: PublicKey
): InstructionFn {
  const ix = (...args: unknown[]): TransactionInstruction => {
    const [ixArgs, ctx] = splitArgsAndCtx(idlIx, args);
    const keys = accountsArray(ctx.accounts, idlIx.accounts, programId);
    return new TransactionInstruction({
      keys: [...keys, ...(ctx.remainingAccounts ?? [])],
      programId,
      data: encode(idlIx.name, argsRecord(idlIx, ixArgs)),
    });
  };

  return Object.assign(ix, {
    accounts: (accounts: Accounts): AccountMeta[] =>
      accountsArray(accounts, idlIx.accounts, programId),
  });
}
