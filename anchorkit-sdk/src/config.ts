/**
 * Provider Configuration
 *
 * Environment driven setup of the connection and wallet, validated with Zod.
 * The keypair file is read once and its contents never leave this module
 * except as the Wallet handed to the provider.
 */

import { AnchorProvider, Wallet } from '@coral-xyz/anchor';
import { Commitment, Connection, Keypair } from '@solana/web3.js';
import { config as dotenvConfig } from 'dotenv';
import { readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';

import { ConfigError } from './error';
import { createLogger, redactUrl } from './logger';

const log = createLogger('config');

// =============================================================================
// Environment Schema
// =============================================================================

const booleanString = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

const envSchema = z.object({
  ANCHOR_PROVIDER_URL: z.string().url().default('http://127.0.0.1:8899').describe('Cluster RPC endpoint'),
  ANCHOR_WALLET: z.string().min(1).optional().describe('Path to a Solana CLI keypair file'),
  ANCHOR_COMMITMENT: z.enum(['processed', 'confirmed', 'finalized']).default('confirmed'),
  ANCHOR_SKIP_PREFLIGHT: booleanString,
});

export interface ProviderConfig {
  url: string;
  walletPath: string;
  commitment: Commitment;
  skipPreflight: boolean;
}

export const DEFAULT_WALLET_PATH = join(homedir(), '.config', 'solana', 'id.json');

function expandHome(path: string): string {
  return path === '~' || path.startsWith('~/') ? join(homedir(), path.slice(1)) : path;
}

// =============================================================================
// Configuration Loading
// =============================================================================

/**
 * Validate a set of environment variables
 */
export function parseProviderConfig(env: NodeJS.ProcessEnv): ProviderConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  const parsed = result.data;
  return Object.freeze({
    url: parsed.ANCHOR_PROVIDER_URL,
    walletPath: parsed.ANCHOR_WALLET ? expandHome(parsed.ANCHOR_WALLET) : DEFAULT_WALLET_PATH,
    commitment: parsed.ANCHOR_COMMITMENT,
    skipPreflight: parsed.ANCHOR_SKIP_PREFLIGHT,
  });
}

let cachedConfig: ProviderConfig | null = null;

/**
 * Load the provider configuration from `.env` and the process environment.
 * Validated once; later calls return the same frozen object.
 */
export function loadProviderConfig(): ProviderConfig {
  if (cachedConfig) {
    return cachedConfig;
  }
  dotenvConfig();
  cachedConfig = parseProviderConfig(process.env);
  return cachedConfig;
}

// =============================================================================
// Wallet
// =============================================================================

const secretKeySchema = z.array(z.number().int().min(0).max(255)).length(64);

/**
 * Read a keypair file in the Solana CLI format (JSON array of 64 bytes).
 * Errors name the file, never its contents.
 */
export function readKeypairFile(path: string): Keypair {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(path, 'utf8'));
  } catch (e) {
    throw new ConfigError(`Cannot read keypair file ${path}`, e instanceof Error ? e : undefined);
  }

  const result = secretKeySchema.safeParse(json);
  if (!result.success) {
    throw new ConfigError(`Invalid keypair file ${path}: expected a JSON array of 64 bytes`);
  }

  try {
    return Keypair.fromSecretKey(Uint8Array.from(result.data));
  } catch {
    throw new ConfigError(`Invalid keypair file ${path}: not a valid ed25519 keypair`);
  }
}

// =============================================================================
// Provider
// =============================================================================

export function createProvider(config: ProviderConfig): AnchorProvider {
  const keypair = readKeypairFile(config.walletPath);
  const connection = new Connection(config.url, config.commitment);

  log.debug(
    { rpcUrl: redactUrl(config.url), wallet: keypair.publicKey.toBase58() },
    'Provider configured'
  );

  return new AnchorProvider(connection, new Wallet(keypair), {
    commitment: config.commitment,
    preflightCommitment: config.commitment,
    skipPreflight: config.skipPreflight,
  });
}

/**
 * Provider for the cluster and wallet named by the environment
 */
export function providerFromEnv(): AnchorProvider {
  return createProvider(loadProviderConfig());
}
