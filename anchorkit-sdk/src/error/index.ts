/**
 * Errors
 * Every error the SDK throws extends AnchorkitError
 */

import langErrors from './lang-errors.json';

// =============================================================================
// Error Classes
// =============================================================================

export type AnchorkitErrorCode =
  | 'IDL_INVALID'
  | 'IDL_NOT_FOUND'
  | 'INVALID_ARGUMENTS'
  | 'ACCOUNT_NOT_FOUND'
  | 'ACCOUNT_INVALID_DISCRIMINATOR'
  | 'CODER_ERROR'
  | 'PROGRAM_ERROR'
  | 'CONFIG_INVALID';

export class AnchorkitError extends Error {
  constructor(
    public code: AnchorkitErrorCode,
    message: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'AnchorkitError';
  }
}

/**
 * IDL failed validation or uses a type the coder cannot lay out
 */
export class IdlError extends AnchorkitError {
  constructor(message: string, cause?: Error) {
    super('IDL_INVALID', message, cause);
    this.name = 'IdlError';
  }
}

/**
 * Requested IDL account does not exist
 */
export class IdlNotFoundError extends AnchorkitError {
  constructor(message: string) {
    super('IDL_NOT_FOUND', message);
    this.name = 'IdlNotFoundError';
  }
}

export class ArgsError extends AnchorkitError {
  constructor(message: string) {
    super('INVALID_ARGUMENTS', message);
    this.name = 'ArgsError';
  }
}

export class AccountDoesNotExistError extends AnchorkitError {
  constructor(message: string) {
    super('ACCOUNT_NOT_FOUND', message);
    this.name = 'AccountDoesNotExistError';
  }
}

/**
 * Account data does not start with the discriminator the IDL expects
 */
export class AccountInvalidDiscriminator extends AnchorkitError {
  constructor(message: string) {
    super('ACCOUNT_INVALID_DISCRIMINATOR', message);
    this.name = 'AccountInvalidDiscriminator';
  }
}

export class CoderError extends AnchorkitError {
  constructor(message: string, cause?: Error) {
    super('CODER_ERROR', message, cause);
    this.name = 'CoderError';
  }
}

export class ConfigError extends AnchorkitError {
  constructor(message: string, cause?: Error) {
    super('CONFIG_INVALID', message, cause);
    this.name = 'ConfigError';
  }
}

/**
 * A transaction failed with a known program error code
 */
export class ProgramError extends AnchorkitError {
  constructor(
    public errorCode: number,
    public msg: string,
    public logs?: string[]
  ) {
    super('PROGRAM_ERROR', `${errorCode}: ${msg}`);
    this.name = 'ProgramError';
  }
}

// =============================================================================
// Error Translation
// =============================================================================

const LANG_ERRORS: ReadonlyMap<number, string> = new Map(
  langErrors.map((e) => [e.code, e.msg])
);

const ANCHOR_ERROR_LOG = /AnchorError.*Error Number: (\d+)\. Error Message: (.*?)\.?$/;
const CUSTOM_ERROR = /custom program error: (0x[0-9a-fA-F]+)/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

/**
 * Pull transaction logs out of whatever the provider threw.
 * SendTransactionError carries `logs`, a failed simulation carries
 * `simulationResponse.logs`.
 */
export function extractLogs(err: unknown): string[] {
  if (!isRecord(err)) return [];
  const direct = err['logs'];
  if (isStringArray(direct)) return direct;
  const sim = err['simulationResponse'];
  if (isRecord(sim) && isStringArray(sim['logs'])) return sim['logs'];
  return [];
}

/**
 * Find the custom error code of a failed transaction, with the message the
 * program logged for it when there is one
 */
export function parseErrorCode(
  message: string,
  logs: string[]
): { code: number; logged?: string } | null {
  for (const line of logs) {
    const m = ANCHOR_ERROR_LOG.exec(line);
    if (m) return { code: Number(m[1]), logged: m[2] };
  }
  for (const text of [message, ...logs]) {
    const m = CUSTOM_ERROR.exec(text);
    if (m) return { code: parseInt(m[1], 16) };
  }
  return null;
}

/**
 * Look up a framework error message by code
 */
export function langErrorMessage(code: number): string | undefined {
  return LANG_ERRORS.get(code);
}

/**
 * Convert a provider failure into a ProgramError when its code is known.
 * Returns the original error otherwise.
 */
export function translateError(
  err: unknown,
  idlErrors: ReadonlyMap<number, string>
): unknown {
  if (err instanceof ProgramError) return err;

  const message = err instanceof Error ? err.message : String(err);
  const logs = extractLogs(err);
  const parsed = parseErrorCode(message, logs);
  if (!parsed) return err;

  const msg = idlErrors.get(parsed.code) ?? LANG_ERRORS.get(parsed.code);
  if (msg === undefined) return err;

  return new ProgramError(parsed.code, msg, logs.length > 0 ? logs : undefined);
}
