import bs58 from 'bs58';

import { AccountInvalidDiscriminator, CoderError } from '../error';
import { Idl, IdlTypeDef } from '../idl';
import { AnyLayout, asRecord, checkTypeDef, errorMessage, typeDefLayout, typeDefSize } from './idl';
import { DISCRIMINATOR_SIZE, accountDiscriminator } from './discriminator';

/**
 * Largest account data the runtime lets a program allocate in one go
 */
export const ACCOUNT_BUFFER_SIZE = 10240;

export interface DecodedAccount {
  name: string;
  data: Record<string, unknown>;
}

export interface MemcmpFilter {
  offset: number;
  bytes: string;
}

interface AccountLayout {
  def: IdlTypeDef;
  discriminator: Buffer;
  layout: AnyLayout;
  size: number;
}

/**
 * Encodes and decodes program owned accounts: 8 byte discriminator followed
 * by the borsh encoded struct
 */
export class AccountsCoder {
  private readonly byName = new Map<string, AccountLayout>();
  private readonly types: IdlTypeDef[];

  constructor(idl: Idl) {
    const types = [...(idl.accounts ?? []), ...(idl.types ?? [])];
    this.types = types;
    for (const def of idl.accounts ?? []) {
      this.byName.set(def.name, {
        def,
        discriminator: accountDiscriminator(def.name),
        layout: typeDefLayout(def, types),
        size: DISCRIMINATOR_SIZE + typeDefSize(def, types),
      });
    }
  }

  private entry(name: string): AccountLayout {
    const entry = this.byName.get(name);
    if (!entry) {
      throw new CoderError(`Unknown account: ${name}`);
    }
    return entry;
  }

  encode(name: string, value: Record<string, unknown>): Buffer {
    const entry = this.entry(name);
    checkTypeDef(entry.def, value, this.types, name);

    const buffer = Buffer.alloc(ACCOUNT_BUFFER_SIZE);
    let len: number;
    try {
      len = entry.layout.encode(value, buffer);
    } catch (e) {
      throw new CoderError(
        `Failed to encode account ${name}: ${errorMessage(e)}`,
        e instanceof Error ? e : undefined
      );
    }
    return Buffer.concat([entry.discriminator, buffer.subarray(0, len)]);
  }

  /**
   * Decode after checking the discriminator
   */
  decode(name: string, data: Buffer): Record<string, unknown> {
    const expected = this.entry(name).discriminator;
    if (!expected.equals(data.subarray(0, DISCRIMINATOR_SIZE))) {
      throw new AccountInvalidDiscriminator(`Invalid account discriminator for ${name}`);
    }
    return this.decodeUnchecked(name, data);
  }

  /**
   * Decode without checking the discriminator
   */
  decodeUnchecked(name: string, data: Buffer): Record<string, unknown> {
    const entry = this.entry(name);
    let decoded: unknown;
    try {
      decoded = entry.layout.decode(data.subarray(DISCRIMINATOR_SIZE));
    } catch (e) {
      throw new CoderError(
        `Failed to decode account ${name}: ${errorMessage(e)}`,
        e instanceof Error ? e : undefined
      );
    }
    return asRecord(decoded, `account ${name}`);
  }

  /**
   * Find the account type by discriminator and decode. Null when no account
   * type matches.
   */
  decodeAny(data: Buffer): DecodedAccount | null {
    const prefix = data.subarray(0, DISCRIMINATOR_SIZE);
    for (const [name, entry] of this.byName) {
      if (entry.discriminator.equals(prefix)) {
        return { name, data: this.decodeUnchecked(name, data) };
      }
    }
    return null;
  }

  /**
   * getProgramAccounts filter matching accounts of this type, optionally
   * followed by more bytes of the account data
   */
  memcmp(name: string, appendix?: Uint8Array): MemcmpFilter {
    const discriminator = this.entry(name).discriminator;
    const bytes = appendix ? Buffer.concat([discriminator, appendix]) : discriminator;
    return { offset: 0, bytes: bs58.encode(bytes) };
  }

  discriminator(name: string): Buffer {
    return this.entry(name).discriminator;
  }

  /**
   * Discriminator plus the serialized size of the fields
   */
  size(name: string): number {
    return this.entry(name).size;
  }

  typeDef(name: string): IdlTypeDef {
    return this.entry(name).def;
  }
}
