import { Coder } from '../../coder';
import { Idl, IdlTypeDef } from '../../idl';

/**
 * A user defined type of the program with its codec
 */
export interface TypeClient {
  name: string;
  typeDef: IdlTypeDef;
  encode(value: unknown): Buffer;
  decode(data: Buffer): unknown;
}

export function buildTypes(idl: Idl, coder: Coder): Record<string, TypeClient> {
  const types: Record<string, TypeClient> = {};
  for (const def of idl.types ?? []) {
    types[def.name] = {
      name: def.name,
      typeDef: def,
      encode: (value) => coder.types.encode(def.name, value),
      decode: (data) => coder.types.decode(def.name, data),
    };
  }
  return types;
}
