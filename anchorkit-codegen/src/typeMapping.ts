/**
 * IDL type -> generated TypeScript type and borsh layout expression
 */

import { IdlError } from '@anchorkit/sdk';
import type { IdlPrimitive, IdlType, IdlTypeDef } from '@anchorkit/sdk';

/**
 * Which imports a generated file needs for the types it mentions
 */
export interface TypeUsage {
  bn: boolean;
  publicKey: boolean;
  defined: boolean;
}

export function emptyUsage(): TypeUsage {
  return { bn: false, publicKey: false, defined: false };
}

function primitiveTsType(type: IdlPrimitive, usage: TypeUsage): string {
  switch (type) {
    case 'u8':
    case 'i8':
    case 'u16':
    case 'i16':
    case 'u32':
    case 'i32':
    case 'f32':
    case 'f64':
      return 'number';
    case 'u64':
    case 'i64':
    case 'u128':
    case 'i128':
      usage.bn = true;
      return 'BN';
    case 'bool':
      return 'boolean';
    case 'string':
      return 'string';
    case 'bytes':
      return 'Buffer';
    case 'publicKey':
      usage.publicKey = true;
      return 'PublicKey';
  }
}

function primitiveLayout(type: IdlPrimitive): string {
  switch (type) {
    case 'bytes':
      return 'vecU8';
    case 'string':
      return 'str';
    default:
      return type;
  }
}

function checkDefined(name: string, types: IdlTypeDef[]): void {
  if (!types.some((t) => t.name === name)) {
    throw new IdlError(`Type not found: ${name}`);
  }
}

/**
 * TypeScript type of a field. Records in `usage` the imports it relies on.
 */
export function tsType(type: IdlType, types: IdlTypeDef[], usage: TypeUsage): string {
  if (typeof type === 'string') {
    return primitiveTsType(type, usage);
  }
  if ('vec' in type) {
    return `Array<${tsType(type.vec, types, usage)}>`;
  }
  if ('array' in type) {
    return `Array<${tsType(type.array[0], types, usage)}>`;
  }
  if ('option' in type) {
    return `${tsType(type.option, types, usage)} | null`;
  }
  if ('coption' in type) {
    throw new IdlError('coption is not supported');
  }
  checkDefined(type.defined, types);
  usage.defined = true;
  return `types.${type.defined}.${type.defined}Fields`;
}

/**
 * Single quoted TypeScript string literal
 */
export function quote(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'").replace(/\n/g, '\\n')}'`;
}

/**
 * Source of the `@coral-xyz/borsh` layout for a type, named `property` when
 * it is a struct field
 */
export function layoutExpr(type: IdlType, types: IdlTypeDef[], property?: string): string {
  const name = property === undefined ? '' : quote(property);
  const withName = (args: string): string => (name ? (args ? `${args}, ${name}` : name) : args);

  if (typeof type === 'string') {
    return `borsh.${primitiveLayout(type)}(${withName('')})`;
  }
  if ('vec' in type) {
    return `borsh.vec(${withName(layoutExpr(type.vec, types))})`;
  }
  if ('array' in type) {
    const [inner, len] = type.array;
    return `borsh.array(${withName(`${layoutExpr(inner, types)}, ${len}`)})`;
  }
  if ('option' in type) {
    return `borsh.option(${withName(layoutExpr(type.option, types))})`;
  }
  if ('coption' in type) {
    throw new IdlError('coption is not supported');
  }
  checkDefined(type.defined, types);
  return `types.${type.defined}.layout(${name})`;
}
