import { Keypair, TransactionInstruction } from "@solana/web3.js";
import BN from "bn.js";
import { assert } from "chai";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

import { Coder, IdlError } from "../anchorkit-sdk/src";
import { generateClient, resolveIdl, writeClient } from "../anchorkit-codegen/src";
import { emptyUsage, layoutExpr, quote, tsType } from "../anchorkit-codegen/src/typeMapping";
import { PROGRAM_ID, asBN, asPublicKey, loadFixtureIdl } from "./helpers/provider";

function member(target: unknown, key: string): unknown {
  if ((typeof target !== "object" && typeof target !== "function") || target === null) {
    throw new Error(`Cannot read ${key} of ${String(target)}`);
  }
  const value: unknown = Reflect.get(target, key);
  return value;
}

function call(target: unknown, key: string, ...args: unknown[]): unknown {
  const fn = member(target, key);
  if (typeof fn !== "function") throw new Error(`${key} is not a function`);
  const result: unknown = fn.apply(target, args);
  return result;
}

/**
 * Load a generated module through the TypeScript loader the tests run under
 */
function load(path: string): unknown {
  const loaded: unknown = require(path);
  return loaded;
}

describe("Client generator", () => {
  const idl = loadFixtureIdl();
  const types = idl.types ?? [];

  describe("type mapping", () => {
    it("maps primitives", () => {
      const usage = emptyUsage();
      assert.equal(tsType("u32", types, usage), "number");
      assert.equal(tsType("f64", types, usage), "number");
      assert.equal(tsType("bool", types, usage), "boolean");
      assert.equal(tsType("bytes", types, usage), "Buffer");
      assert.deepEqual(usage, { bn: false, publicKey: false, defined: false });

      assert.equal(tsType("i128", types, usage), "BN");
      assert.equal(tsType("publicKey", types, usage), "PublicKey");
      assert.deepEqual(usage, { bn: true, publicKey: true, defined: false });
    });

    it("maps containers and defined types", () => {
      const usage = emptyUsage();
      assert.equal(tsType({ vec: { option: "u64" } }, types, usage), "Array<BN | null>");
      assert.equal(tsType({ array: ["u8", 32] }, types, usage), "Array<number>");
      assert.equal(tsType({ defined: "Config" }, types, usage), "types.Config.ConfigFields");
      assert.isTrue(usage.defined);
    });

    it("writes layout expressions", () => {
      assert.equal(layoutExpr("string", types, "label"), "borsh.str('label')");
      assert.equal(layoutExpr("bytes", types), "borsh.vecU8()");
      assert.equal(layoutExpr({ option: "u32" }, types, "limit"), "borsh.option(borsh.u32(), 'limit')");
      assert.equal(layoutExpr({ array: ["u16", 2] }, types, "weights"), "borsh.array(borsh.u16(), 2, 'weights')");
      assert.equal(layoutExpr({ vec: "publicKey" }, types, "keys"), "borsh.vec(borsh.publicKey(), 'keys')");
      assert.equal(layoutExpr({ defined: "Mode" }, types, "mode"), "types.Mode.layout('mode')");
    });

    it("rejects unknown defined types and coption", () => {
      assert.throws(() => tsType({ defined: "Missing" }, types, emptyUsage()), IdlError, "Type not found: Missing");
      assert.throws(() => layoutExpr({ coption: "u8" }, types), IdlError, "coption is not supported");
    });

    it("quotes strings for single quoted literals", () => {
      assert.equal(quote("it's"), "'it\\'s'");
    });
  });

  describe("generateClient", () => {
    const files = generateClient(idl);

    it("lays out one file per item", () => {
      assert.deepEqual(
        [...files.keys()],
        [
          "programId.ts",
          "types/Config.ts",
          "types/Mode.ts",
          "types/index.ts",
          "accounts/Counter.ts",
          "accounts/index.ts",
          "instructions/initialize.ts",
          "instructions/increment.ts",
          "instructions/setConfig.ts",
          "instructions/index.ts",
          "errors/index.ts",
          "index.ts",
        ]
      );
    });

    it("writes the program id", () => {
      assert.equal(
        files.get("programId.ts"),
        [
          "import { PublicKey } from '@solana/web3.js';",
          "",
          "// Program ID of counter",
          `export const PROGRAM_ID = new PublicKey('${PROGRAM_ID.toBase58()}');`,
          "",
        ].join("\n")
      );
    });

    it("prefers the program id passed in", () => {
      const override = Keypair.generate().publicKey;
      const generated = generateClient(idl, { programId: override });
      assert.include(generated.get("programId.ts"), `new PublicKey('${override.toBase58()}')`);
    });

    it("needs a program id", () => {
      assert.throws(
        () => generateClient({ ...idl, metadata: undefined }),
        IdlError,
        "No program id for counter: pass one or set metadata.address in the IDL"
      );
    });

    it("renders an enum as a union and a rust enum layout", () => {
      assert.equal(
        files.get("types/Mode.ts"),
        [
          "import * as borsh from '@coral-xyz/borsh';",
          "import BN from 'bn.js';",
          "",
          "export type ModeFields =",
          "  | { Off: Record<string, never> }",
          "  | { Fixed: { 0: BN } }",
          "  | { Range: { min: number; max: number } };",
          "",
          "export function layout(property?: string) {",
          "  const rustEnum = borsh.rustEnum([",
          "    borsh.struct([], 'Off'),",
          "    borsh.struct([borsh.u64('0')], 'Fixed'),",
          "    borsh.struct([borsh.u16('min'), borsh.u16('max')], 'Range'),",
          "  ]);",
          "  return property === undefined ? rustEnum : rustEnum.replicate(property);",
          "}",
          "",
        ].join("\n")
      );
    });

    it("renders a struct with its field types", () => {
      const source = files.get("types/Config.ts") ?? "";
      assert.include(
        source,
        [
          "export interface ConfigFields {",
          "  label: string;",
          "  limit: number | null;",
          "  tags: Array<number>;",
          "  weights: Array<number>;",
          "}",
        ].join("\n")
      );
      assert.include(source, "      borsh.option(borsh.u32(), 'limit'),\n");
      assert.notInclude(source, "import BN");
    });

    it("re-exports types as namespaces", () => {
      assert.equal(
        files.get("types/index.ts"),
        "export * as Config from './Config';\nexport * as Mode from './Mode';\n"
      );
    });

    it("renders an instruction builder", () => {
      assert.equal(
        files.get("instructions/increment.ts"),
        [
          "import * as borsh from '@coral-xyz/borsh';",
          "import BN from 'bn.js';",
          "import { AccountMeta, PACKET_DATA_SIZE, PublicKey, TransactionInstruction } from '@solana/web3.js';",
          "import { PROGRAM_ID } from '../programId';",
          "",
          "export interface IncrementArgs {",
          "  amount: BN;",
          "}",
          "",
          "export interface IncrementAccounts {",
          "  counter: PublicKey;",
          "  authority: PublicKey;",
          "}",
          "",
          "export const layout = borsh.struct([",
          "  borsh.u64('amount'),",
          "]);",
          "",
          "/**",
          " * Add to the counter",
          " */",
          "export function increment(",
          "  args: IncrementArgs,",
          "  accounts: IncrementAccounts,",
          "  programId: PublicKey = PROGRAM_ID",
          "): TransactionInstruction {",
          "  const keys: AccountMeta[] = [",
          "    { pubkey: accounts.counter, isSigner: false, isWritable: true },",
          "    { pubkey: accounts.authority, isSigner: true, isWritable: false },",
          "  ];",
          "  const identifier = Buffer.from([11, 18, 104, 9, 104, 174, 59, 33]);",
          "  const buffer = Buffer.alloc(PACKET_DATA_SIZE);",
          "  const len = layout.encode(args, buffer);",
          "  const data = Buffer.concat([identifier, buffer.subarray(0, len)]);",
          "  return new TransactionInstruction({ keys, programId, data });",
          "}",
          "",
        ].join("\n")
      );
    });

    it("nests account groups and defaults optional accounts to the program id", () => {
      const source = files.get("instructions/setConfig.ts") ?? "";
      assert.include(source, "import * as types from '../types';\n");
      assert.include(
        source,
        [
          "export interface SetConfigAccounts {",
          "  admin: {",
          "    counter: PublicKey;",
          "    authority: PublicKey;",
          "  };",
          "  auditor: PublicKey | null;",
          "}",
        ].join("\n")
      );
      assert.include(source, "  mode: types.Mode.ModeFields;\n");
      assert.include(source, "    { pubkey: accounts.admin.counter, isSigner: false, isWritable: true },\n");
      assert.include(
        source,
        "    accounts.auditor ? { pubkey: accounts.auditor, isSigner: false, isWritable: false } : { pubkey: programId, isSigner: false, isWritable: false },\n"
      );
    });

    it("leaves out the args of instructions without any", () => {
      const source = files.get("instructions/initialize.ts") ?? "";
      assert.notInclude(source, "InitializeArgs");
      assert.include(source, "export function initialize(\n  accounts: InitializeAccounts,\n");
      assert.include(source, "  const len = layout.encode({}, buffer);\n");
      assert.equal(
        files.get("instructions/index.ts"),
        [
          "export { initialize } from './initialize';",
          "export type { InitializeAccounts } from './initialize';",
          "export { increment } from './increment';",
          "export type { IncrementArgs, IncrementAccounts } from './increment';",
          "export { setConfig } from './setConfig';",
          "export type { SetConfigArgs, SetConfigAccounts } from './setConfig';",
          "",
        ].join("\n")
      );
    });

    it("renders account classes with discriminator and fetch", () => {
      const source = files.get("accounts/Counter.ts") ?? "";
      assert.include(source, "export class Counter {\n  readonly authority: PublicKey;\n  readonly count: BN;\n");
      assert.include(source, "  static readonly discriminator = Buffer.from([255, 176, 4, 245, 188, 253, 124, 25]);\n");
      assert.include(source, "    types.Mode.layout('mode'),\n");
      assert.include(source, "  ): Promise<Counter | null> {\n");
    });

    it("renders one error class per code", () => {
      const source = files.get("errors/index.ts") ?? "";
      assert.include(source, "export type CustomError = Overflow | Unauthorized;\n");
      assert.include(
        source,
        [
          "export class Overflow extends Error {",
          "  static readonly code = 6000;",
          "  readonly code = 6000;",
          "  readonly msg = 'Counter overflowed';",
          "",
          "  constructor(readonly logs?: string[]) {",
          "    super('6000: Counter overflowed');",
          "    this.name = 'Overflow';",
          "  }",
          "}",
        ].join("\n")
      );
      assert.include(source, "  readonly msg = 'Unauthorized';\n");
      assert.include(source, "    case 6001:\n      return new Unauthorized(logs);\n");
    });

    it("types errors as never when the IDL declares none", () => {
      const source = generateClient({ ...idl, errors: undefined }).get("errors/index.ts") ?? "";
      assert.include(source, "export type CustomError = never;\n");
    });

    it("re-exports everything from the index", () => {
      assert.equal(
        files.get("index.ts"),
        [
          "export { PROGRAM_ID } from './programId';",
          "export * as types from './types';",
          "export * as accounts from './accounts';",
          "export * as instructions from './instructions';",
          "export * as errors from './errors';",
          "",
        ].join("\n")
      );
    });
  });

  describe("writeClient", () => {
    let dir: string;

    before(() => {
      dir = mkdtempSync(join(tmpdir(), "anchorkit-codegen-"));
    });

    after(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("writes every file under the output directory", () => {
      const files = generateClient(idl);
      writeClient(files, join(dir, "client"));

      for (const [path, contents] of files) {
        assert.equal(readFileSync(join(dir, "client", path), "utf8"), contents);
      }
      assert.isTrue(existsSync(join(dir, "client", "instructions", "setConfig.ts")));
    });

    it("reads the IDL from the configured path", async () => {
      const loaded = await resolveIdl({
        idlPath: join(__dirname, "fixtures", "counter.json"),
        outDir: dir,
        logLevel: "silent",
      });
      assert.deepEqual(loaded, idl);
    });

    it("reports an unreadable IDL file", async () => {
      const path = join(dir, "missing.json");
      try {
        await resolveIdl({ idlPath: path, outDir: dir, logLevel: "silent" });
        assert.fail("Should have thrown");
      } catch (err) {
        assert.instanceOf(err, IdlError);
        if (err instanceof IdlError) assert.equal(err.message, `Cannot read IDL file ${path}`);
      }
    });
  });

  describe("command line entry", () => {
    it("is the package bin and runs through tsx", () => {
      const root = join(__dirname, "..", "anchorkit-codegen");
      const pkg: unknown = JSON.parse(readFileSync(join(root, "package.json"), "utf8"));
      const entry = member(member(pkg, "bin"), "anchorkit-codegen");
      assert.equal(entry, "src/index.ts");
      assert.equal(readFileSync(join(root, "src", "index.ts"), "utf8").split("\n")[0], "#!/usr/bin/env tsx");
    });
  });

  describe("generated client at run time", () => {
    const coder = new Coder(idl);
    let dir: string;

    // Inside the repository so the generated imports resolve from node_modules
    before(() => {
      dir = mkdtempSync(join(__dirname, ".generated-"));
      writeClient(generateClient(idl), dir);
    });

    after(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("encodes instruction data the way the dynamic coder does", () => {
      const args = {
        mode: { Range: { min: 1, max: 2 } },
        config: { label: "ab", limit: 5, tags: [1, 2], weights: [3, 4] },
      };
      const counter = Keypair.generate().publicKey;
      const authority = Keypair.generate().publicKey;

      const ix = call(load(join(dir, "instructions", "setConfig.ts")), "setConfig", args, {
        admin: { counter, authority },
        auditor: null,
      });

      assert.instanceOf(ix, TransactionInstruction);
      if (!(ix instanceof TransactionInstruction)) return;
      assert.isTrue(ix.programId.equals(PROGRAM_ID));
      assert.deepEqual([...ix.data], [...coder.instruction.encode("setConfig", args)]);
      assert.deepEqual(
        ix.keys.map((k) => [k.pubkey.toBase58(), k.isSigner, k.isWritable]),
        [
          [counter.toBase58(), false, true],
          [authority.toBase58(), true, false],
          [PROGRAM_ID.toBase58(), false, false],
        ]
      );
    });

    it("decodes accounts the dynamic coder encodes", () => {
      const authority = Keypair.generate().publicKey;
      const data = coder.accounts.encode("Counter", {
        authority,
        count: new BN(7),
        mode: { Fixed: { "0": new BN(3) } },
        bump: 254,
      });

      const Counter = member(load(join(dir, "accounts", "Counter.ts")), "Counter");
      const decoded = call(Counter, "decode", data);

      assert.isTrue(asPublicKey(member(decoded, "authority")).equals(authority));
      assert.equal(asBN(member(decoded, "count")).toNumber(), 7);
      assert.equal(asBN(member(member(member(decoded, "mode"), "Fixed"), "0")).toNumber(), 3);
      assert.equal(member(decoded, "bump"), 254);
    });

    it("refuses data of another account type", () => {
      const Counter = member(load(join(dir, "accounts", "Counter.ts")), "Counter");
      assert.throws(() => call(Counter, "decode", Buffer.alloc(58)), "Invalid account discriminator");
    });

    it("maps error codes to the generated classes", () => {
      const err = call(load(join(dir, "errors", "index.ts")), "fromCode", 6000);
      assert.instanceOf(err, Error);
      if (err instanceof Error) assert.equal(err.message, "6000: Counter overflowed");
      assert.isNull(call(load(join(dir, "errors", "index.ts")), "fromCode", 1));
    });
  });
});
