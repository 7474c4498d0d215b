import { AnchorProvider } from '@coral-xyz/anchor';
import {
  AccountInfo,
  Commitment,
  GetProgramAccountsFilter,
  PublicKey,
  Signer,
  SystemProgram,
  TransactionInstruction,
} from '@solana/web3.js';

import { Coder, MemcmpFilter } from '../../coder';
import { DISCRIMINATOR_SIZE } from '../../coder/discriminator';
import { AccountDoesNotExistError, AccountInvalidDiscriminator } from '../../error';
import { Idl, IdlTypeDef } from '../../idl';
import { ProgramAccount } from '../../types';
import { Address, translateAddress } from '../../utils/pubkey';

export interface AllAccountsFilter {
  /** Bytes that must follow the discriminator */
  buffer?: Uint8Array;
  memcmp?: MemcmpFilter[];
  dataSize?: number;
}

/**
 * Generate the `.account` namespace: one client per IDL account type
 */
export function buildAccounts(
  idl: Idl,
  coder: Coder,
  programId: PublicKey,
  provider: AnchorProvider
): Record<string, AccountClient> {
  const clients: Record<string, AccountClient> = {};
  for (const idlAccount of idl.accounts ?? []) {
    clients[idlAccount.name] = new AccountClient(idlAccount, coder, programId, provider);
  }
  return clients;
}

/**
 * Fetches, lists and creates accounts of one type
 */
export class AccountClient {
  private readonly _size: number;

  constructor(
    private readonly idlAccount: IdlTypeDef,
    private readonly _coder: Coder,
    private readonly _programId: PublicKey,
    private readonly _provider: AnchorProvider
  ) {
    this._size = _coder.accounts.size(idlAccount.name);
  }

  /**
   * Number of bytes in this account: discriminator plus fields
   */
  get size(): number {
    return this._size;
  }

  get programId(): PublicKey {
    return this._programId;
  }

  get provider(): AnchorProvider {
    return this._provider;
  }

  get coder(): Coder {
    return this._coder;
  }

  private decodeChecked(address: Address, info: AccountInfo<Buffer>): Record<string, unknown> {
    const expected = this._coder.accounts.discriminator(this.idlAccount.name);
    if (!expected.equals(info.data.subarray(0, DISCRIMINATOR_SIZE))) {
      throw new AccountInvalidDiscriminator(
        `Account ${address.toString()} has an invalid discriminator`
      );
    }
    return this._coder.accounts.decodeUnchecked(this.idlAccount.name, info.data);
  }

  /**
   * Deserialized account, or null when there is no account at the address
   */
  async fetchNullable(
    address: Address,
    commitment?: Commitment
  ): Promise<Record<string, unknown> | null> {
    const info = await this._provider.connection.getAccountInfo(
      translateAddress(address),
      commitment
    );
    if (info === null) return null;
    return this.decodeChecked(address, info);
  }

  async fetch(address: Address, commitment?: Commitment): Promise<Record<string, unknown>> {
    const account = await this.fetchNullable(address, commitment);
    if (account === null) {
      throw new AccountDoesNotExistError(`Account ${address.toString()} does not exist`);
    }
    return account;
  }

  /**
   * One RPC round trip for many addresses. Missing accounts come back as null.
   */
  async fetchMultiple(
    addresses: Address[],
    commitment?: Commitment
  ): Promise<Array<Record<string, unknown> | null>> {
    const infos = await this._provider.connection.getMultipleAccountsInfo(
      addresses.map(translateAddress),
      commitment
    );
    return infos.map((info, i) => (info === null ? null : this.decodeChecked(addresses[i], info)));
  }

  /**
   * Every account of this type owned by the program
   */
  async all(filter: AllAccountsFilter = {}): Promise<ProgramAccount[]> {
    const filters: GetProgramAccountsFilter[] = [
      { memcmp: this._coder.accounts.memcmp(this.idlAccount.name, filter.buffer) },
      ...(filter.memcmp ?? []).map((memcmp) => ({ memcmp })),
    ];
    if (filter.dataSize !== undefined) {
      filters.push({ dataSize: filter.dataSize });
    }

    const accounts = await this._provider.connection.getProgramAccounts(this._programId, {
      commitment: this._provider.connection.commitment,
      filters,
    });

    return accounts.map(({ pubkey, account }) => ({
      publicKey: pubkey,
      account: this._coder.accounts.decode(this.idlAccount.name, account.data),
    }));
  }

  /**
   * System program instruction allocating a rent exempt account of this type,
   * owned by the program and paid for by the provider wallet
   */
  async createInstruction(signer: Signer, sizeOverride = 0): Promise<TransactionInstruction> {
    const space = sizeOverride ? sizeOverride : this._size;
    const lamports = await this._provider.connection.getMinimumBalanceForRentExemption(space);
    return SystemProgram.createAccount({
      fromPubkey: this._provider.wallet.publicKey,
      newAccountPubkey: signer.publicKey,
      space,
      lamports,
      programId: this._programId,
    });
  }
}
