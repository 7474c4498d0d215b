import { PACKET_DATA_SIZE } from '@solana/web3.js';

import { CoderError } from '../error';
import { Idl, IdlField, IdlTypeDef } from '../idl';
import { AnyLayout, asRecord, checkFields, errorMessage, structLayout } from './idl';
import { DISCRIMINATOR_SIZE, instructionDiscriminator } from './discriminator';

export interface DecodedInstruction {
  name: string;
  data: Record<string, unknown>;
}

interface InstructionLayout {
  name: string;
  args: IdlField[];
  discriminator: Buffer;
  layout: AnyLayout;
}

/**
 * Encodes and decodes instruction data: 8 byte discriminator followed by the
 * borsh encoded arguments
 */
export class InstructionCoder {
  private readonly byName = new Map<string, InstructionLayout>();
  private readonly byDiscriminator = new Map<string, InstructionLayout>();
  private readonly types: IdlTypeDef[];

  constructor(idl: Idl) {
    const types = [...(idl.accounts ?? []), ...(idl.types ?? [])];
    this.types = types;
    for (const ix of idl.instructions) {
      const entry: InstructionLayout = {
        name: ix.name,
        args: ix.args,
        discriminator: instructionDiscriminator(ix.name),
        layout: structLayout(ix.args, types, ix.name),
      };
      this.byName.set(ix.name, entry);
      this.byDiscriminator.set(entry.discriminator.toString('hex'), entry);
    }
  }

  encode(name: string, args: Record<string, unknown>): Buffer {
    const entry = this.byName.get(name);
    if (!entry) {
      throw new CoderError(`Unknown instruction: ${name}`);
    }

    checkFields(entry.args, args, this.types, name);

    const buffer = Buffer.alloc(PACKET_DATA_SIZE);
    let len: number;
    try {
      len = entry.layout.encode(args, buffer);
    } catch (e) {
      throw new CoderError(
        `Failed to encode arguments of ${name}: ${errorMessage(e)}`,
        e instanceof Error ? e : undefined
      );
    }
    return Buffer.concat([entry.discriminator, buffer.subarray(0, len)]);
  }

  /**
   * Returns null when the discriminator matches no instruction
   */
  decode(data: Buffer): DecodedInstruction | null {
    if (data.length < DISCRIMINATOR_SIZE) return null;
    const entry = this.byDiscriminator.get(
      data.subarray(0, DISCRIMINATOR_SIZE).toString('hex')
    );
    if (!entry) return null;

    let decoded: unknown;
    try {
      decoded = entry.layout.decode(data.subarray(DISCRIMINATOR_SIZE));
    } catch (e) {
      throw new CoderError(
        `Failed to decode arguments of ${entry.name}: ${errorMessage(e)}`,
        e instanceof Error ? e : undefined
      );
    }
    return { name: entry.name, data: asRecord(decoded, `instruction ${entry.name}`) };
  }
}
