/**
 * Workspace
 * Programs of an Anchor workspace, built from the IDLs `anchor build` writes
 */

import { AnchorProvider } from '@coral-xyz/anchor';
import { readdirSync, readFileSync } from 'fs';
import { join } from 'path';

import { IdlError } from './error';
import { parseIdl } from './idl';
import { createLogger } from './logger';
import { Program } from './program';
import { pascalCase } from './utils/case';

const log = createLogger('workspace');

export const IDL_DIR = join('target', 'idl');

/**
 * Load every IDL in `<dir>/target/idl` and key the programs by PascalCase
 * name. IDLs without `metadata.address` have no deployment to talk to and
 * are skipped.
 */
export function createWorkspace(
  dir: string,
  provider?: AnchorProvider
): Record<string, Program> {
  const idlDir = join(dir, IDL_DIR);
  const programs: Record<string, Program> = {};

  const files = readdirSync(idlDir)
    .filter((f) => f.endsWith('.json'))
    .sort();

  for (const file of files) {
    const path = join(idlDir, file);
    let json: unknown;
    try {
      json = JSON.parse(readFileSync(path, 'utf8'));
    } catch (e) {
      throw new IdlError(`Cannot read IDL file ${path}`, e instanceof Error ? e : undefined);
    }

    const idl = parseIdl(json);
    const address = idl.metadata?.address;
    if (!address) {
      log.warn({ file }, 'IDL has no metadata.address, skipping');
      continue;
    }

    programs[pascalCase(idl.name)] = new Program(idl, address, provider);
  }

  log.debug({ dir: idlDir, programs: Object.keys(programs) }, 'Workspace loaded');
  return programs;
}
