import { AnchorProvider } from '@coral-xyz/anchor';
import { TransactionSignature } from '@solana/web3.js';

import { translateError } from '../../error';
import { IdlInstruction } from '../../idl';
import { createLogger } from '../../logger';
import { splitArgsAndCtx } from '../common';
import { TransactionFn } from './transaction';

const log = createLogger('rpc');

/**
 * Signs, sends and confirms the transaction, resolving to its signature
 */
export type RpcFn = (...args: unknown[]) => Promise<TransactionSignature>;

export function buildRpcFn(
  idlIx: IdlInstruction,
  txFn: TransactionFn,
  idlErrors: ReadonlyMap<number, string>,
  provider: AnchorProvider
): RpcFn {
  return async (...args: unknown[]): Promise<TransactionSignature> => {
    const tx = txFn(...args);
    const [, ctx] = splitArgsAndCtx(idlIx, args);
    try {
      return await provider.sendAndConfirm(tx, ctx.signers, ctx.options);
    } catch (err) {
      log.debug({ instruction: idlIx.name, err }, 'Transaction failed');
      throw translateError(err, idlErrors);
    }
  };
}
