/**
 * Anchor IDL
 * Types, validation and on-chain storage of the JSON interface description
 * Anchor emits for a program (pre-0.30 layout)
 */

import { PublicKey } from '@solana/web3.js';
import * as borsh from '@coral-xyz/borsh';
import { inflateSync } from 'zlib';
import { z } from 'zod';

import { IdlError } from '../error';

// =============================================================================
// Types
// =============================================================================

export const PRIMITIVE_TYPES = [
  'bool',
  'u8',
  'i8',
  'u16',
  'i16',
  'u32',
  'i32',
  'f32',
  'u64',
  'i64',
  'f64',
  'u128',
  'i128',
  'bytes',
  'string',
  'publicKey',
] as const;

export type IdlPrimitive = (typeof PRIMITIVE_TYPES)[number];

export type IdlType =
  | IdlPrimitive
  | { vec: IdlType }
  | { option: IdlType }
  | { coption: IdlType }
  | { defined: string }
  | { array: [IdlType, number] };

export interface IdlField {
  name: string;
  docs?: string[];
  type: IdlType;
}

export interface IdlAccount {
  name: string;
  isMut: boolean;
  isSigner: boolean;
  isOptional?: boolean;
  docs?: string[];
}

/**
 * Nested group of accounts (an Anchor `Accounts` struct used as a field)
 */
export interface IdlAccounts {
  name: string;
  docs?: string[];
  accounts: IdlAccountItem[];
}

export type IdlAccountItem = IdlAccount | IdlAccounts;

export interface IdlInstruction {
  name: string;
  docs?: string[];
  accounts: IdlAccountItem[];
  args: IdlField[];
  returns?: IdlType;
}

export interface IdlEnumVariant {
  name: string;
  fields?: IdlField[] | IdlType[];
}

export type IdlTypeDefTy =
  | { kind: 'struct'; fields: IdlField[] }
  | { kind: 'enum'; variants: IdlEnumVariant[] };

export interface IdlTypeDef {
  name: string;
  docs?: string[];
  type: IdlTypeDefTy;
}

export interface IdlEventField {
  name: string;
  type: IdlType;
  index: boolean;
}

export interface IdlEvent {
  name: string;
  fields: IdlEventField[];
}

export interface IdlErrorCode {
  code: number;
  name: string;
  msg?: string;
}

export interface IdlConstant {
  name: string;
  type: IdlType;
  value: string;
}

export interface IdlMetadata {
  address?: string;
}

export interface Idl {
  version: string;
  name: string;
  docs?: string[];
  instructions: IdlInstruction[];
  accounts?: IdlTypeDef[];
  types?: IdlTypeDef[];
  events?: IdlEvent[];
  errors?: IdlErrorCode[];
  constants?: IdlConstant[];
  metadata?: IdlMetadata;
}

// =============================================================================
// Schema
// =============================================================================

const docsSchema = z.array(z.string()).optional();

export const idlTypeSchema: z.ZodType<IdlType> = z.lazy(() =>
  z.union([
    z.enum(PRIMITIVE_TYPES),
    z.object({ vec: idlTypeSchema }),
    z.object({ option: idlTypeSchema }),
    z.object({ coption: idlTypeSchema }),
    z.object({ defined: z.string().min(1) }),
    z.object({ array: z.tuple([idlTypeSchema, z.number().int().nonnegative()]) }),
  ])
);

const fieldSchema: z.ZodType<IdlField> = z.object({
  name: z.string().min(1),
  docs: docsSchema,
  type: idlTypeSchema,
});

const accountItemSchema: z.ZodType<IdlAccountItem> = z.lazy(() =>
  z.union([
    z.object({
      name: z.string().min(1),
      docs: docsSchema,
      accounts: z.array(accountItemSchema),
    }),
    z.object({
      name: z.string().min(1),
      isMut: z.boolean(),
      isSigner: z.boolean(),
      isOptional: z.boolean().optional(),
      docs: docsSchema,
    }),
  ])
);

const typeDefSchema: z.ZodType<IdlTypeDef> = z.object({
  name: z.string().min(1),
  docs: docsSchema,
  type: z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('struct'), fields: z.array(fieldSchema) }),
    z.object({
      kind: z.literal('enum'),
      variants: z.array(
        z.object({
          name: z.string().min(1),
          fields: z.union([z.array(fieldSchema), z.array(idlTypeSchema)]).optional(),
        })
      ),
    }),
  ]),
});

export const idlSchema: z.ZodType<Idl> = z.object({
  version: z.string(),
  name: z.string().min(1),
  docs: docsSchema,
  instructions: z.array(
    z.object({
      name: z.string().min(1),
      docs: docsSchema,
      accounts: z.array(accountItemSchema),
      args: z.array(fieldSchema),
      returns: idlTypeSchema.optional(),
    })
  ),
  accounts: z.array(typeDefSchema).optional(),
  types: z.array(typeDefSchema).optional(),
  events: z.array(
    z.object({
      name: z.string().min(1),
      fields: z.array(
        z.object({ name: z.string().min(1), type: idlTypeSchema, index: z.boolean() })
      ),
    })
  ).optional(),
  errors: z.array(
    z.object({ code: z.number().int(), name: z.string().min(1), msg: z.string().optional() })
  ).optional(),
  constants: z.array(
    z.object({ name: z.string().min(1), type: idlTypeSchema, value: z.string() })
  ).optional(),
  metadata: z.object({ address: z.string().optional() }).passthrough().optional(),
});

/**
 * Validate a parsed JSON document as an Anchor IDL
 */
export function parseIdl(json: unknown): Idl {
  const result = idlSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new IdlError(`IDL validation failed:\n${issues.join('\n')}`);
  }
  return result.data;
}

// =============================================================================
// Helpers
// =============================================================================

export function isIdlAccounts(item: IdlAccountItem): item is IdlAccounts {
  return 'accounts' in item;
}

/**
 * Tuple variants list bare types; named variants list fields
 */
export function isNamedFields(fields: IdlField[] | IdlType[]): fields is IdlField[] {
  const items: Array<IdlField | IdlType> = fields;
  return items.every((f) => typeof f === 'object' && 'name' in f && 'type' in f);
}

/**
 * Map of error code to message, falling back to the error name
 */
export function idlErrors(idl: Idl): Map<number, string> {
  const errors = new Map<number, string>();
  for (const e of idl.errors ?? []) {
    errors.set(e.code, e.msg ? e.msg : e.name);
  }
  return errors;
}

// =============================================================================
// On-chain IDL Account
// =============================================================================

export const IDL_SEED = 'anchor:idl';

export interface IdlProgramAccount {
  authority: PublicKey;
  data: Buffer;
}

const IDL_ACCOUNT_LAYOUT: borsh.Layout<IdlProgramAccount> = borsh.struct([
  borsh.publicKey('authority'),
  borsh.vecU8('data'),
]);

/**
 * Address of the account `anchor idl init` writes the IDL to.
 * Seeds: createWithSeed(findProgramAddress([], programId), "anchor:idl")
 */
export async function idlAddress(programId: PublicKey): Promise<PublicKey> {
  const [base] = PublicKey.findProgramAddressSync([], programId);
  return PublicKey.createWithSeed(base, IDL_SEED, programId);
}

/**
 * Decode IDL account data with the 8 byte discriminator already removed
 */
export function decodeIdlAccount(data: Buffer): IdlProgramAccount {
  return IDL_ACCOUNT_LAYOUT.decode(data);
}

export function encodeIdlAccount(account: IdlProgramAccount): Buffer {
  const buffer = Buffer.alloc(32 + 4 + account.data.length);
  const len = IDL_ACCOUNT_LAYOUT.encode(account, buffer);
  return buffer.subarray(0, len);
}

/**
 * Inflate the zlib-compressed IDL stored on chain and validate it
 */
export function inflateIdl(compressed: Uint8Array): Idl {
  let json: unknown;
  try {
    json = JSON.parse(inflateSync(compressed).toString('utf8'));
  } catch (e) {
    throw new IdlError('Failed to inflate on-chain IDL', e instanceof Error ? e : undefined);
  }
  return parseIdl(json);
}
