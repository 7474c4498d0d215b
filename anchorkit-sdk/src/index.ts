/**
 * anchorkit SDK
 * Dynamic TypeScript client for Anchor programs on Solana
 *
 * @packageDocumentation
 */

// Re-export types
export * from './types';

// IDL
export {
  PRIMITIVE_TYPES,
  IDL_SEED,
  parseIdl,
  idlSchema,
  idlTypeSchema,
  isIdlAccounts,
  isNamedFields,
  idlErrors,
  idlAddress,
  decodeIdlAccount,
  encodeIdlAccount,
  inflateIdl,
} from './idl';
export type {
  Idl,
  IdlPrimitive,
  IdlType,
  IdlField,
  IdlAccount,
  IdlAccounts,
  IdlAccountItem,
  IdlInstruction,
  IdlEnumVariant,
  IdlTypeDefTy,
  IdlTypeDef,
  IdlEvent,
  IdlEventField,
  IdlErrorCode,
  IdlConstant,
  IdlMetadata,
  IdlProgramAccount,
} from './idl';

// Coder
export * from './coder';

// Program
export { Program, buildNamespaces, EventParser, AccountClient } from './program';
export type {
  Namespaces,
  AllAccountsFilter,
  InstructionFn,
  RpcFn,
  SimulateFn,
  TransactionFn,
  TypeClient,
} from './program';
export { createWorkspace } from './workspace';

// Errors
export {
  AnchorkitError,
  IdlError,
  IdlNotFoundError,
  ArgsError,
  AccountDoesNotExistError,
  AccountInvalidDiscriminator,
  CoderError,
  ConfigError,
  ProgramError,
  translateError,
  parseErrorCode,
  langErrorMessage,
} from './error';
export type { AnchorkitErrorCode } from './error';

// Configuration
export {
  loadProviderConfig,
  parseProviderConfig,
  readKeypairFile,
  createProvider,
  providerFromEnv,
} from './config';
export type { ProviderConfig } from './config';

// Utils
export { translateAddress, findProgramAddress } from './utils/pubkey';
export type { Address } from './utils/pubkey';
export { snakeCase, camelCase, pascalCase } from './utils/case';
export { logger, createLogger } from './logger';
