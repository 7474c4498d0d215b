/**
 * Configuration Loader
 *
 * Environment variables validated with Zod, with the positional command line
 * arguments `<idl-path> <out-dir>` taking precedence. The result is frozen.
 */

import { PublicKey } from '@solana/web3.js';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '@anchorkit/sdk';

import { LOG_LEVELS, LogLevel } from './logger';

// =============================================================================
// Environment Schema
// =============================================================================

const envSchema = z.object({
  ANCHORKIT_IDL_PATH: z.string().min(1).optional().describe('IDL JSON file to generate from'),
  ANCHORKIT_OUT_DIR: z.string().min(1).default('./generated'),
  ANCHORKIT_PROGRAM_ID: z.string().min(32).max(44).optional().describe('Overrides metadata.address'),
  SOLANA_RPC_URL: z.string().url().optional().describe('Cluster to fetch the on-chain IDL from'),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

export interface CodegenConfig {
  /** Unset when the IDL is fetched from chain */
  idlPath?: string;
  outDir: string;
  programId?: PublicKey;
  rpcUrl?: string;
  logLevel: LogLevel;
}

// =============================================================================
// Configuration Loading
// =============================================================================

/**
 * Validate configuration from an environment and the CLI arguments
 */
export function parseCodegenConfig(env: NodeJS.ProcessEnv, argv: string[]): CodegenConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  const parsed = result.data;
  const [argIdlPath, argOutDir, ...rest] = argv;
  if (rest.length > 0) {
    throw new ConfigError('Usage: anchorkit-codegen [idl-path] [out-dir]');
  }

  let programId: PublicKey | undefined;
  if (parsed.ANCHORKIT_PROGRAM_ID) {
    try {
      programId = new PublicKey(parsed.ANCHORKIT_PROGRAM_ID);
    } catch {
      throw new ConfigError('Invalid ANCHORKIT_PROGRAM_ID: not a valid Solana public key');
    }
  }

  const idlPath = argIdlPath ?? parsed.ANCHORKIT_IDL_PATH;
  if (!idlPath && !(programId && parsed.SOLANA_RPC_URL)) {
    throw new ConfigError(
      'No IDL source: pass an IDL path, or set ANCHORKIT_PROGRAM_ID and SOLANA_RPC_URL'
    );
  }

  return Object.freeze({
    idlPath,
    outDir: argOutDir ?? parsed.ANCHORKIT_OUT_DIR,
    programId,
    rpcUrl: parsed.SOLANA_RPC_URL,
    logLevel: parsed.LOG_LEVEL ?? (parsed.NODE_ENV === 'test' ? 'silent' : 'info'),
  });
}

/**
 * Load configuration from `.env`, the process environment and argv
 */
export function loadCodegenConfig(argv: string[] = process.argv.slice(2)): CodegenConfig {
  dotenvConfig();
  return parseCodegenConfig(process.env, argv);
}
