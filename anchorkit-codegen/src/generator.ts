/**
 * Static Client Generator
 *
 * Turns an IDL into the source files of a typed client. Every file is a
 * template rendered against a context built here; the only decisions made
 * are the type mappings in ./typeMapping.
 */

import { PublicKey } from '@solana/web3.js';
import { mkdirSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import {
  IdlError,
  accountDiscriminator,
  camelCase,
  instructionDiscriminator,
  isIdlAccounts,
  isNamedFields,
  pascalCase,
} from '@anchorkit/sdk';
import type {
  Idl,
  IdlAccountItem,
  IdlEnumVariant,
  IdlField,
  IdlInstruction,
  IdlTypeDef,
} from '@anchorkit/sdk';

import { createLogger, logFileWritten } from './logger';
import { render } from './templates';
import { TypeUsage, emptyUsage, layoutExpr, tsType } from './typeMapping';

const log = createLogger('generator');

export interface GenerateOptions {
  /** Overrides `metadata.address` */
  programId?: PublicKey | string;
}

/**
 * Relative path -> file contents
 */
export type GeneratedFiles = Map<string, string>;

interface FieldContext {
  name: string;
  docs?: string[];
  tsType: string;
  layout: string;
}

// =============================================================================
// Contexts
// =============================================================================

function fieldContexts(fields: IdlField[], types: IdlTypeDef[], usage: TypeUsage): FieldContext[] {
  return fields.map((f) => ({
    name: f.name,
    docs: f.docs,
    tsType: tsType(f.type, types, usage),
    layout: layoutExpr(f.type, types, f.name),
  }));
}

function byteList(bytes: Buffer): string {
  return Array.from(bytes).join(', ');
}

function variantContext(variant: IdlEnumVariant, types: IdlTypeDef[], usage: TypeUsage) {
  const fields = variant.fields ?? [];
  const named: IdlField[] = isNamedFields(fields)
    ? fields
    : fields.map((type, i) => ({ name: String(i), type }));

  if (named.length === 0) {
    return { name: variant.name, shape: 'Record<string, never>', layouts: '' };
  }

  const members = fieldContexts(named, types, usage);
  return {
    name: variant.name,
    shape: `{ ${members.map((m) => `${m.name}: ${m.tsType}`).join('; ')} }`,
    layouts: members.map((m) => m.layout).join(', '),
  };
}

function accountLines(items: IdlAccountItem[], indent: string): string[] {
  const lines: string[] = [];
  for (const item of items) {
    if (isIdlAccounts(item)) {
      lines.push(`${indent}${item.name}: {`);
      lines.push(...accountLines(item.accounts, `${indent}  `));
      lines.push(`${indent}};`);
    } else {
      lines.push(`${indent}${item.name}: PublicKey${item.isOptional ? ' | null' : ''};`);
    }
  }
  return lines;
}

/**
 * Account metas in IDL order. Absent optional accounts become the program id.
 */
function keyLines(items: IdlAccountItem[], path: string): string[] {
  const lines: string[] = [];
  for (const item of items) {
    const ref = `${path}.${item.name}`;
    if (isIdlAccounts(item)) {
      lines.push(...keyLines(item.accounts, ref));
      continue;
    }
    const meta = `{ pubkey: ${ref}, isSigner: ${item.isSigner}, isWritable: ${item.isMut} }`;
    lines.push(
      item.isOptional
        ? `${ref} ? ${meta} : { pubkey: programId, isSigner: false, isWritable: false }`
        : meta
    );
  }
  return lines;
}

function instructionContext(ix: IdlInstruction, types: IdlTypeDef[]) {
  const usage = emptyUsage();
  const args = fieldContexts(ix.args, types, usage);
  return {
    camel: camelCase(ix.name),
    pascal: pascalCase(ix.name),
    docs: ix.docs,
    usage,
    args,
    hasArgs: args.length > 0,
    encodeArg: args.length > 0 ? 'args' : '{}',
    accountLines: accountLines(ix.accounts, '  '),
    keyLines: keyLines(ix.accounts, 'accounts'),
    discriminator: byteList(instructionDiscriminator(ix.name)),
  };
}

function resolveProgramId(idl: Idl, override?: PublicKey | string): string {
  const address = override ?? idl.metadata?.address;
  if (address === undefined) {
    throw new IdlError(
      `No program id for ${idl.name}: pass one or set metadata.address in the IDL`
    );
  }
  try {
    return new PublicKey(address).toBase58();
  } catch {
    throw new IdlError(`Invalid program id for ${idl.name}: ${address.toString()}`);
  }
}

// =============================================================================
// Generation
// =============================================================================

/**
 * Render the client of a program
 */
export function generateClient(idl: Idl, options: GenerateOptions = {}): GeneratedFiles {
  const files: GeneratedFiles = new Map();
  const types = idl.types ?? [];

  files.set(
    'programId.ts',
    render('programId', {
      programName: idl.name,
      programId: resolveProgramId(idl, options.programId),
    })
  );

  // Defined types
  for (const def of types) {
    const usage = emptyUsage();
    if (def.type.kind === 'struct') {
      const fields = fieldContexts(def.type.fields, types, usage);
      files.set(`types/${def.name}.ts`, render('struct', { name: def.name, docs: def.docs, fields, usage }));
    } else {
      const variants = def.type.variants.map((v) => variantContext(v, types, usage));
      files.set(`types/${def.name}.ts`, render('enum', { name: def.name, docs: def.docs, variants, usage }));
    }
  }
  if (types.length > 0) {
    files.set('types/index.ts', render('typesIndex', { names: types.map((t) => t.name) }));
  }

  // Accounts
  const accounts = idl.accounts ?? [];
  for (const def of accounts) {
    if (def.type.kind !== 'struct') {
      throw new IdlError(`Account ${def.name} must be a struct`);
    }
    const usage = emptyUsage();
    const fields = fieldContexts(def.type.fields, types, usage);
    files.set(
      `accounts/${def.name}.ts`,
      render('account', {
        name: def.name,
        docs: def.docs,
        fields,
        usage,
        discriminator: byteList(accountDiscriminator(def.name)),
      })
    );
  }
  if (accounts.length > 0) {
    files.set('accounts/index.ts', render('accountsIndex', { names: accounts.map((a) => a.name) }));
  }

  // Instructions
  const instructions = idl.instructions.map((ix) => instructionContext(ix, types));
  for (const ix of instructions) {
    files.set(`instructions/${ix.camel}.ts`, render('instruction', ix));
  }
  files.set('instructions/index.ts', render('instructionsIndex', { instructions }));

  // Errors
  const errors = (idl.errors ?? []).map((e) => {
    const msg = e.msg ?? e.name;
    return { name: e.name, code: e.code, msg, message: `${e.code}: ${msg}` };
  });
  files.set(
    'errors/index.ts',
    render('errors', {
      errors,
      union: errors.length > 0 ? errors.map((e) => e.name).join(' | ') : 'never',
    })
  );

  files.set(
    'index.ts',
    render('index', { hasTypes: types.length > 0, hasAccounts: accounts.length > 0 })
  );

  log.debug({ program: idl.name, files: files.size }, 'Client rendered');
  return files;
}

/**
 * Write generated files under `outDir`, creating directories as needed
 */
export function writeClient(files: GeneratedFiles, outDir: string): void {
  for (const [path, contents] of files) {
    const target = join(outDir, path);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, contents);
    logFileWritten(target, Buffer.byteLength(contents));
  }
}
