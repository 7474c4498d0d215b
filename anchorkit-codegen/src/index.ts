#!/usr/bin/env tsx
/**
 * anchorkit-codegen
 *
 * Usage: anchorkit-codegen [idl-path] [out-dir]
 *
 * Without an IDL path the IDL stored on chain is fetched from SOLANA_RPC_URL
 * for ANCHORKIT_PROGRAM_ID.
 */

import { AnchorProvider, Wallet } from '@coral-xyz/anchor';
import { Connection, Keypair } from '@solana/web3.js';
import { readFileSync } from 'fs';
import { IdlError, Program, parseIdl } from '@anchorkit/sdk';
import type { Idl } from '@anchorkit/sdk';

import { CodegenConfig, loadCodegenConfig } from './config';
import { generateClient, writeClient } from './generator';
import { logger } from './logger';

export { generateClient, writeClient } from './generator';
export type { GenerateOptions, GeneratedFiles } from './generator';
export { loadCodegenConfig, parseCodegenConfig } from './config';
export type { CodegenConfig } from './config';

/**
 * Read the IDL from disk, or from chain when no path is configured
 */
export async function resolveIdl(config: CodegenConfig): Promise<Idl> {
  if (config.idlPath) {
    let json: unknown;
    try {
      json = JSON.parse(readFileSync(config.idlPath, 'utf8'));
    } catch (e) {
      throw new IdlError(`Cannot read IDL file ${config.idlPath}`, e instanceof Error ? e : undefined);
    }
    return parseIdl(json);
  }

  if (!config.programId || !config.rpcUrl) {
    throw new IdlError('No IDL path and no program id and RPC URL to fetch it with');
  }

  // Reading an account needs no signer
  const connection = new Connection(config.rpcUrl, 'confirmed');
  const provider = new AnchorProvider(connection, new Wallet(Keypair.generate()), {
    commitment: 'confirmed',
  });
  logger.info({ programId: config.programId.toBase58() }, 'Fetching on-chain IDL');
  return Program.fetchIdl(config.programId, provider);
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const config = loadCodegenConfig(argv);
  logger.level = config.logLevel;
  const idl = await resolveIdl(config);
  const files = generateClient(idl, { programId: config.programId });
  writeClient(files, config.outDir);

  logger.info(
    { program: idl.name, outDir: config.outDir, files: files.size },
    'Client generated'
  );
}

if (require.main === module) {
  main().catch((error) => {
    logger.fatal({ err: error }, 'Code generation failed');
    process.exit(1);
  });
}
