/**
 * Program
 * Client for an Anchor program built from its IDL at run time
 */

import { AnchorProvider } from '@coral-xyz/anchor';
import { PublicKey } from '@solana/web3.js';

import { Coder } from '../coder';
import { DISCRIMINATOR_SIZE } from '../coder/discriminator';
import { providerFromEnv } from '../config';
import { IdlNotFoundError } from '../error';
import { Idl, decodeIdlAccount, idlAddress, idlErrors, inflateIdl } from '../idl';
import { createLogger } from '../logger';
import { Address, translateAddress } from '../utils/pubkey';
import { EventParser } from './event';
import { AccountClient, buildAccounts } from './namespace/account';
import { InstructionFn, buildInstructionFn } from './namespace/instruction';
import { RpcFn, buildRpcFn } from './namespace/rpc';
import { SimulateFn, buildSimulateFn } from './namespace/simulate';
import { TransactionFn, buildTransactionFn } from './namespace/transaction';
import { TypeClient, buildTypes } from './namespace/types';

const log = createLogger('program');

export interface Namespaces {
  rpc: Record<string, RpcFn>;
  instruction: Record<string, InstructionFn>;
  transaction: Record<string, TransactionFn>;
  simulate: Record<string, SimulateFn>;
  account: Record<string, AccountClient>;
  type: Record<string, TypeClient>;
}

/**
 * Generate every namespace of a program, keyed by IDL name
 */
export function buildNamespaces(
  idl: Idl,
  coder: Coder,
  programId: PublicKey,
  provider: AnchorProvider
): Namespaces {
  const errors = idlErrors(idl);
  const parser = new EventParser(programId, coder);
  const encode = coder.instruction.encode.bind(coder.instruction);

  const namespaces: Namespaces = {
    rpc: {},
    instruction: {},
    transaction: {},
    simulate: {},
    account: buildAccounts(idl, coder, programId, provider),
    type: buildTypes(idl, coder),
  };

  for (const idlIx of idl.instructions) {
    const ixFn = buildInstructionFn(idlIx, encode, programId);
    const txFn = buildTransactionFn(idlIx, ixFn);

    namespaces.instruction[idlIx.name] = ixFn;
    namespaces.transaction[idlIx.name] = txFn;
    namespaces.rpc[idlIx.name] = buildRpcFn(idlIx, txFn, errors, provider);
    namespaces.simulate[idlIx.name] = buildSimulateFn(idlIx, txFn, errors, provider, parser);
  }

  return namespaces;
}

/**
 * The IDL deserialized client of an Anchor program.
 *
 * Besides its fields the object carries namespaces that map one-to-one onto
 * the program's instructions (`rpc`, `instruction`, `transaction`,
 * `simulate`), accounts (`account`) and user defined types (`type`).
 *
 * ```ts
 * const program = new Program(idl, programId, provider);
 * await program.rpc.increment(new BN(1), { accounts: { counter, authority } });
 * const counter = await program.account.Counter.fetch(counter);
 * ```
 */
export class Program {
  readonly idl: Idl;
  readonly programId: PublicKey;
  readonly provider: AnchorProvider;
  readonly coder: Coder;

  readonly rpc: Record<string, RpcFn>;
  readonly instruction: Record<string, InstructionFn>;
  readonly transaction: Record<string, TransactionFn>;
  readonly simulate: Record<string, SimulateFn>;
  readonly account: Record<string, AccountClient>;
  readonly type: Record<string, TypeClient>;

  /**
   * @param provider - Defaults to the provider configured by the environment
   */
  constructor(idl: Idl, programId: Address, provider?: AnchorProvider) {
    this.idl = idl;
    this.programId = translateAddress(programId);
    this.provider = provider ?? providerFromEnv();
    this.coder = new Coder(idl);

    const namespaces = buildNamespaces(idl, this.coder, this.programId, this.provider);
    this.rpc = namespaces.rpc;
    this.instruction = namespaces.instruction;
    this.transaction = namespaces.transaction;
    this.simulate = namespaces.simulate;
    this.account = namespaces.account;
    this.type = namespaces.type;
  }

  /**
   * Fetch the IDL a program stored on chain with `anchor idl init`
   */
  static async fetchIdl(address: Address, provider?: AnchorProvider): Promise<Idl> {
    const programId = translateAddress(address);
    const actualProvider = provider ?? providerFromEnv();
    const idlAddr = await idlAddress(programId);

    const info = await actualProvider.connection.getAccountInfo(idlAddr);
    if (info === null) {
      throw new IdlNotFoundError(`IDL not found for program: ${programId.toBase58()}`);
    }

    const idlAccount = decodeIdlAccount(info.data.subarray(DISCRIMINATOR_SIZE));
    const idl = inflateIdl(idlAccount.data);
    log.debug({ programId: programId.toBase58(), name: idl.name }, 'Fetched IDL');
    return idl;
  }

  /**
   * Build a client by fetching the program's IDL from the network
   */
  static async at(address: Address, provider?: AnchorProvider): Promise<Program> {
    const programId = translateAddress(address);
    const actualProvider = provider ?? providerFromEnv();
    const idl = await Program.fetchIdl(programId, actualProvider);
    return new Program(idl, programId, actualProvider);
  }
}

export { EventParser } from './event';
export { AccountClient } from './namespace/account';
export type { AllAccountsFilter } from './namespace/account';
export type { InstructionFn } from './namespace/instruction';
export type { RpcFn } from './namespace/rpc';
export type { SimulateFn } from './namespace/simulate';
export type { TransactionFn } from './namespace/transaction';
export type { TypeClient } from './namespace/types';
