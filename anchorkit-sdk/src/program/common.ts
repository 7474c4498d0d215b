import { AccountMeta, PublicKey } from '@solana/web3.js';

import { isRecord } from '../coder/idl';
import { ArgsError } from '../error';
import { IdlAccountItem, IdlInstruction, isIdlAccounts } from '../idl';
import { Accounts, CONTEXT_KEYS, Context } from '../types';
import { translateAddress } from '../utils/pubkey';

function isContext(value: unknown): value is Context {
  if (!isRecord(value) || value instanceof PublicKey) return false;
  return Object.keys(value).every((key) => CONTEXT_KEYS.has(key));
}

/**
 * Split call arguments into the positional instruction arguments and the
 * optional trailing context
 */
export function splitArgsAndCtx(
  idlIx: IdlInstruction,
  args: unknown[]
): [unknown[], Context] {
  const expected = idlIx.args.length;

  if (args.length === expected) {
    return [args, {}];
  }
  if (args.length === expected + 1) {
    const ctx = args[expected];
    if (!isContext(ctx)) {
      throw new ArgsError(
        `Invalid context for ${idlIx.name}: expected an object with keys ${[...CONTEXT_KEYS].join(', ')}`
      );
    }
    return [args.slice(0, expected), ctx];
  }

  throw new ArgsError(
    `${idlIx.name} takes ${expected} argument${expected === 1 ? '' : 's'} and an optional context, got ${args.length}`
  );
}

/**
 * Name the positional arguments after the IDL's arg list
 */
export function argsRecord(idlIx: IdlInstruction, args: unknown[]): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  idlIx.args.forEach((arg, i) => {
    record[arg.name] = args[i];
  });
  return record;
}

/**
 * Flatten the (possibly nested) accounts into metas in IDL order. Optional
 * accounts left out or set to null are replaced by the program id.
 */
export function accountsArray(
  accounts: Accounts | undefined,
  items: IdlAccountItem[],
  programId: PublicKey,
  path = ''
): AccountMeta[] {
  const metas: AccountMeta[] = [];

  for (const item of items) {
    const value = accounts ? accounts[item.name] : undefined;
    const name = `${path}${item.name}`;

    if (isIdlAccounts(item)) {
      if (typeof value !== 'object' || value === null || value instanceof PublicKey) {
        throw new ArgsError(`Invalid arguments: ${name} not provided`);
      }
      metas.push(...accountsArray(value, item.accounts, programId, `${name}.`));
      continue;
    }

    if (value === undefined || value === null) {
      if (!item.isOptional) {
        throw new ArgsError(`Invalid arguments: ${name} not provided`);
      }
      metas.push({ pubkey: programId, isWritable: false, isSigner: false });
      continue;
    }

    if (typeof value === 'object' && !(value instanceof PublicKey)) {
      throw new ArgsError(`Invalid arguments: ${name} must be an address`);
    }

    let pubkey: PublicKey;
    try {
      pubkey = translateAddress(value);
    } catch {
      throw new ArgsError(`Invalid arguments: ${name} is not a valid public key`);
    }
    metas.push({ pubkey, isWritable: item.isMut, isSigner: item.isSigner });
  }

  return metas;
}
