/**
 * IDL -> borsh layout mapping
 */

import * as borsh from '@coral-xyz/borsh';

import { CoderError, IdlError } from '../error';
import { IdlField, IdlPrimitive, IdlType, IdlTypeDef, isNamedFields } from '../idl';

export type AnyLayout = borsh.Layout<unknown>;

interface LayoutField {
  name?: string;
  type: IdlType;
}

function lookupType(name: string, types: IdlTypeDef[]): IdlTypeDef {
  const def = types.find((t) => t.name === name);
  if (!def) {
    throw new IdlError(`Type not found: ${name}`);
  }
  return def;
}

function primitiveLayout(type: IdlPrimitive, name?: string): AnyLayout {
  switch (type) {
    case 'bool':
      return borsh.bool(name);
    case 'u8':
      return borsh.u8(name);
    case 'i8':
      return borsh.i8(name);
    case 'u16':
      return borsh.u16(name);
    case 'i16':
      return borsh.i16(name);
    case 'u32':
      return borsh.u32(name);
    case 'i32':
      return borsh.i32(name);
    case 'f32':
      return borsh.f32(name);
    case 'u64':
      return borsh.u64(name);
    case 'i64':
      return borsh.i64(name);
    case 'f64':
      return borsh.f64(name);
    case 'u128':
      return borsh.u128(name);
    case 'i128':
      return borsh.i128(name);
    case 'bytes':
      return borsh.vecU8(name);
    case 'string':
      return borsh.str(name);
    case 'publicKey':
      return borsh.publicKey(name);
  }
}

/**
 * Build the layout of a single field. Defined types are resolved against the
 * IDL's `types` (and `accounts`, which may also be referenced).
 */
export function fieldLayout(field: LayoutField, types: IdlTypeDef[]): AnyLayout {
  const name = field.name;
  const type = field.type;

  if (typeof type === 'string') {
    return primitiveLayout(type, name);
  }

  if ('vec' in type) {
    return borsh.vec(fieldLayout({ type: type.vec }, types), name);
  }
  if ('option' in type) {
    return borsh.option(fieldLayout({ type: type.option }, types), name);
  }
  if ('coption' in type) {
    throw new IdlError(`coption is not supported (field ${name ?? '<unnamed>'})`);
  }
  if ('array' in type) {
    const [inner, len] = type.array;
    return borsh.array(fieldLayout({ type: inner }, types), len, name);
  }
  return typeDefLayout(lookupType(type.defined, types), types, name);
}

/**
 * Struct -> borsh struct; enum -> u8 variant index followed by the variant's
 * fields. Tuple variant fields are named by position ("0", "1", ...).
 */
export function typeDefLayout(def: IdlTypeDef, types: IdlTypeDef[], name?: string): AnyLayout {
  if (def.type.kind === 'struct') {
    return borsh.struct(
      def.type.fields.map((f) => fieldLayout(f, types)),
      name
    );
  }

  const variants = def.type.variants.map((variant) => {
    const fields = variant.fields ?? [];
    const layouts = isNamedFields(fields)
      ? fields.map((f) => fieldLayout(f, types))
      : fields.map((t, i) => fieldLayout({ name: String(i), type: t }, types));
    return borsh.struct(layouts, variant.name);
  });
  // rustEnum takes its second argument as the union's default layout
  const layout: AnyLayout = borsh.rustEnum(variants);
  return name === undefined ? layout : layout.replicate(name);
}

export function structLayout(fields: IdlField[], types: IdlTypeDef[], name?: string): AnyLayout {
  return borsh.struct(
    fields.map((f) => fieldLayout(f, types)),
    name
  );
}

// =============================================================================
// Value Checks
// =============================================================================

// The layouts encode a missing field as zeros, or not at all inside a
// variable length type, so values are checked against the IDL first.

function checkValue(type: IdlType, value: unknown, types: IdlTypeDef[], path: string): void {
  if (typeof type === 'object' && 'option' in type) {
    if (value === null || value === undefined) return;
    checkValue(type.option, value, types, path);
    return;
  }
  if (value === null || value === undefined) {
    throw new CoderError(`Missing value for ${path}`);
  }
  if (typeof type === 'string' || 'coption' in type) return;

  if ('vec' in type || 'array' in type) {
    const inner = 'vec' in type ? type.vec : type.array[0];
    if (value instanceof Uint8Array) return;
    if (!Array.isArray(value)) {
      throw new CoderError(`Expected an array for ${path}`);
    }
    value.forEach((item, i) => checkValue(inner, item, types, `${path}[${i}]`));
    return;
  }
  checkTypeDef(lookupType(type.defined, types), value, types, path);
}

/**
 * Throws CoderError naming the first field of `value` that has no value
 */
export function checkFields(
  fields: IdlField[],
  value: unknown,
  types: IdlTypeDef[],
  path: string
): void {
  if (!isRecord(value)) {
    throw new CoderError(`Expected an object for ${path}`);
  }
  for (const field of fields) {
    checkValue(field.type, value[field.name], types, `${path}.${field.name}`);
  }
}

export function checkTypeDef(def: IdlTypeDef, value: unknown, types: IdlTypeDef[], path: string): void {
  if (def.type.kind === 'struct') {
    checkFields(def.type.fields, value, types, path);
    return;
  }
  if (!isRecord(value)) {
    throw new CoderError(`Expected an object for ${path}`);
  }
  const variant = def.type.variants.find((v) => v.name in value);
  if (!variant) {
    throw new CoderError(`No variant of ${def.name} given for ${path}`);
  }
  const fields = variant.fields ?? [];
  const named: IdlField[] = isNamedFields(fields)
    ? fields
    : fields.map((type, i) => ({ name: String(i), type }));
  if (named.length > 0) {
    checkFields(named, value[variant.name], types, `${path}.${variant.name}`);
  }
}

// =============================================================================
// Sizes
// =============================================================================

function primitiveSize(type: IdlPrimitive): number {
  switch (type) {
    case 'bool':
    case 'u8':
    case 'i8':
      return 1;
    case 'u16':
    case 'i16':
      return 2;
    case 'u32':
    case 'i32':
    case 'f32':
      return 4;
    case 'u64':
    case 'i64':
    case 'f64':
      return 8;
    case 'u128':
    case 'i128':
      return 16;
    case 'bytes':
    case 'string':
      return 4;
    case 'publicKey':
      return 32;
  }
}

/**
 * Serialized size of a type. Variable length types (vec, string, bytes)
 * count only their 4 byte length prefix; options count the Some case.
 */
export function typeSize(type: IdlType, types: IdlTypeDef[]): number {
  if (typeof type === 'string') return primitiveSize(type);
  if ('vec' in type) return 4;
  if ('option' in type) return 1 + typeSize(type.option, types);
  if ('coption' in type) {
    throw new IdlError('coption is not supported');
  }
  if ('array' in type) {
    const [inner, len] = type.array;
    return typeSize(inner, types) * len;
  }
  return typeDefSize(lookupType(type.defined, types), types);
}

export function typeDefSize(def: IdlTypeDef, types: IdlTypeDef[]): number {
  if (def.type.kind === 'struct') {
    return def.type.fields.reduce((sum, f) => sum + typeSize(f.type, types), 0);
  }
  const variantSizes = def.type.variants.map((variant) => {
    const fields = variant.fields ?? [];
    return isNamedFields(fields)
      ? fields.reduce((sum, f) => sum + typeSize(f.type, types), 0)
      : fields.reduce((sum, t) => sum + typeSize(t, types), 0);
  });
  return 1 + Math.max(0, ...variantSizes);
}

// =============================================================================
// Decoded Values
// =============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Struct layouts decode to plain objects
 */
export function asRecord(value: unknown, what: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new CoderError(`Decoded ${what} is not a struct`);
  }
  return value;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
