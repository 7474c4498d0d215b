import { AnchorProvider } from '@coral-xyz/anchor';

import { translateError } from '../../error';
import { IdlInstruction } from '../../idl';
import { SimulateResponse } from '../../types';
import { splitArgsAndCtx } from '../common';
import { EventParser } from '../event';
import { TransactionFn } from './transaction';

/**
 * Simulates the transaction and decodes the events it would emit
 */
export type SimulateFn = (...args: unknown[]) => Promise<SimulateResponse>;

export function buildSimulateFn(
  idlIx: IdlInstruction,
  txFn: TransactionFn,
  idlErrors: ReadonlyMap<number, string>,
  provider: AnchorProvider,
  parser: EventParser
): SimulateFn {
  return async (...args: unknown[]): Promise<SimulateResponse> => {
    const tx = txFn(...args);
    const [, ctx] = splitArgsAndCtx(idlIx, args);

    let logs: string[];
    try {
      const response = await provider.simulate(tx, ctx.signers, ctx.options?.commitment);
      logs = response.logs ?? [];
    } catch (err) {
      throw translateError(err, idlErrors);
    }

    return { events: parser.parseLogs(logs), raw: logs };
  };
}
