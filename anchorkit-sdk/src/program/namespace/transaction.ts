import { Transaction } from '@solana/web3.js';

import { IdlInstruction } from '../../idl';
import { splitArgsAndCtx } from '../common';
import { InstructionFn } from './instruction';

/**
 * Wraps the instruction with the context's pre and post instructions
 */
export type TransactionFn = (...args: unknown[]) => Transaction;

export function buildTransactionFn(idlIx: IdlInstruction, ixFn: InstructionFn): TransactionFn {
  return (...args: unknown[]): Transaction => {
    const [, ctx] = splitArgsAndCtx(idlIx, args);
    const tx = new Transaction();
    for (const pre of ctx.preInstructions ?? []) tx.add(pre);
    tx.add(ixFn(...args));
    for (const post of ctx.postInstructions ?? []) tx.add(post);
    return tx;
  };
}
