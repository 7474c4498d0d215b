import { CoderError } from '../error';
import { Idl, IdlTypeDef } from '../idl';
import { ACCOUNT_BUFFER_SIZE } from './accounts';
import { AnyLayout, checkTypeDef, errorMessage, typeDefLayout } from './idl';

/**
 * Encodes and decodes the user defined types of an IDL
 */
export class TypesCoder {
  private readonly layouts = new Map<string, { def: IdlTypeDef; layout: AnyLayout }>();
  private readonly types: IdlTypeDef[];

  constructor(idl: Idl) {
    const types = [...(idl.accounts ?? []), ...(idl.types ?? [])];
    this.types = types;
    for (const def of idl.types ?? []) {
      this.layouts.set(def.name, { def, layout: typeDefLayout(def, types) });
    }
  }

  private entry(name: string): { def: IdlTypeDef; layout: AnyLayout } {
    const entry = this.layouts.get(name);
    if (!entry) {
      throw new CoderError(`Unknown type: ${name}`);
    }
    return entry;
  }

  encode(name: string, value: unknown): Buffer {
    const entry = this.entry(name);
    checkTypeDef(entry.def, value, this.types, name);

    const buffer = Buffer.alloc(ACCOUNT_BUFFER_SIZE);
    try {
      const len = entry.layout.encode(value, buffer);
      return buffer.subarray(0, len);
    } catch (e) {
      if (e instanceof CoderError) throw e;
      throw new CoderError(
        `Failed to encode type ${name}: ${errorMessage(e)}`,
        e instanceof Error ? e : undefined
      );
    }
  }

  decode(name: string, data: Buffer): unknown {
    try {
      return this.entry(name).layout.decode(data);
    } catch (e) {
      if (e instanceof CoderError) throw e;
      throw new CoderError(
        `Failed to decode type ${name}: ${errorMessage(e)}`,
        e instanceof Error ? e : undefined
      );
    }
  }

  typeDef(name: string): IdlTypeDef {
    return this.entry(name).def;
  }
}
