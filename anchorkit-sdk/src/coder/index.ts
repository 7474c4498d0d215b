/**
 * Borsh coder for an Anchor program's instructions, accounts, events and
 * user defined types
 */

import { Idl } from '../idl';
import { AccountsCoder } from './accounts';
import { EventCoder } from './events';
import { InstructionCoder } from './instruction';
import { TypesCoder } from './types';

export class Coder {
  readonly instruction: InstructionCoder;
  readonly accounts: AccountsCoder;
  readonly events: EventCoder;
  readonly types: TypesCoder;

  constructor(readonly idl: Idl) {
    this.instruction = new InstructionCoder(idl);
    this.accounts = new AccountsCoder(idl);
    this.events = new EventCoder(idl);
    this.types = new TypesCoder(idl);
  }
}

export { InstructionCoder, AccountsCoder, EventCoder, TypesCoder };
export type { DecodedInstruction } from './instruction';
export type { DecodedAccount, MemcmpFilter } from './accounts';
export type { Event } from './events';
export { ACCOUNT_BUFFER_SIZE } from './accounts';
export {
  DISCRIMINATOR_SIZE,
  sighash,
  instructionDiscriminator,
  accountDiscriminator,
  eventDiscriminator,
} from './discriminator';
export { fieldLayout, typeDefLayout, typeSize, typeDefSize } from './idl';
export type { AnyLayout } from './idl';
