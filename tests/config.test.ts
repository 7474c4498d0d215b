import { Keypair } from "@solana/web3.js";
import { assert } from "chai";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { homedir, tmpdir } from "os";
import { join } from "path";

import {
  ConfigError,
  createProvider,
  loadProviderConfig,
  parseProviderConfig,
  readKeypairFile,
} from "../anchorkit-sdk/src";
import { parseCodegenConfig } from "../anchorkit-codegen/src/config";
import { initialLevel } from "../anchorkit-codegen/src/logger";

describe("Configuration", () => {
  let dir: string;

  before(() => {
    dir = mkdtempSync(join(tmpdir(), "anchorkit-config-"));
  });

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeKeypair(name: string, contents: unknown): string {
    const path = join(dir, name);
    writeFileSync(path, JSON.stringify(contents));
    return path;
  }

  describe("parseProviderConfig", () => {
    it("fills in the local validator defaults", () => {
      assert.deepEqual(parseProviderConfig({}), {
        url: "http://127.0.0.1:8899",
        walletPath: join(homedir(), ".config", "solana", "id.json"),
        commitment: "confirmed",
        skipPreflight: false,
      });
    });

    it("reads every variable", () => {
      const config = parseProviderConfig({
        ANCHOR_PROVIDER_URL: "https://api.devnet.solana.com",
        ANCHOR_WALLET: "~/keys/id.json",
        ANCHOR_COMMITMENT: "finalized",
        ANCHOR_SKIP_PREFLIGHT: "true",
      });
      assert.deepEqual(config, {
        url: "https://api.devnet.solana.com",
        walletPath: join(homedir(), "keys", "id.json"),
        commitment: "finalized",
        skipPreflight: true,
      });
      assert.isTrue(Object.isFrozen(config));
    });

    it("names the invalid variable", () => {
      try {
        parseProviderConfig({ ANCHOR_COMMITMENT: "fast" });
        assert.fail("Should have thrown");
      } catch (err) {
        assert.instanceOf(err, ConfigError);
        if (!(err instanceof ConfigError)) return;
        assert.equal(err.code, "CONFIG_INVALID");
        assert.include(err.message, "Configuration validation failed:\nANCHOR_COMMITMENT: ");
      }
    });

    it("rejects values other than true and false for flags", () => {
      assert.throws(() => parseProviderConfig({ ANCHOR_SKIP_PREFLIGHT: "yes" }), ConfigError, "ANCHOR_SKIP_PREFLIGHT");
    });
  });

  describe("loadProviderConfig", () => {
    it("validates once and caches the frozen result", () => {
      const first = loadProviderConfig();
      assert.strictEqual(loadProviderConfig(), first);
      assert.isTrue(Object.isFrozen(first));
    });
  });

  describe("readKeypairFile", () => {
    it("reads a Solana CLI keypair", () => {
      const keypair = Keypair.generate();
      const path = writeKeypair("id.json", Array.from(keypair.secretKey));
      assert.isTrue(readKeypairFile(path).publicKey.equals(keypair.publicKey));
    });

    it("rejects files that are not 64 bytes", () => {
      const path = writeKeypair("short.json", [1, 2, 3]);
      assert.throws(
        () => readKeypairFile(path),
        ConfigError,
        `Invalid keypair file ${path}: expected a JSON array of 64 bytes`
      );
    });

    it("reports missing files by path", () => {
      const path = join(dir, "missing.json");
      assert.throws(() => readKeypairFile(path), ConfigError, `Cannot read keypair file ${path}`);
    });
  });

  describe("createProvider", () => {
    it("connects the wallet to the configured cluster", () => {
      const keypair = Keypair.generate();
      const walletPath = writeKeypair("wallet.json", Array.from(keypair.secretKey));

      const provider = createProvider({
        url: "http://127.0.0.1:8899",
        walletPath,
        commitment: "processed",
        skipPreflight: true,
      });

      assert.isTrue(provider.wallet.publicKey.equals(keypair.publicKey));
      assert.equal(provider.connection.rpcEndpoint, "http://127.0.0.1:8899");
      assert.deepEqual(provider.opts, {
        commitment: "processed",
        preflightCommitment: "processed",
        skipPreflight: true,
      });
    });
  });

  describe("parseCodegenConfig", () => {
    const programId = Keypair.generate().publicKey;

    it("takes the IDL path and output directory from argv", () => {
      assert.deepEqual(parseCodegenConfig({ ANCHORKIT_IDL_PATH: "env.json" }, ["idl.json", "out"]), {
        idlPath: "idl.json",
        outDir: "out",
        programId: undefined,
        rpcUrl: undefined,
        logLevel: "info",
      });
    });

    it("validates LOG_LEVEL and defaults it to silent under test", () => {
      assert.equal(parseCodegenConfig({ ANCHORKIT_IDL_PATH: "a.json", LOG_LEVEL: "debug" }, []).logLevel, "debug");
      assert.equal(parseCodegenConfig({ ANCHORKIT_IDL_PATH: "a.json", NODE_ENV: "test" }, []).logLevel, "silent");
      assert.throws(
        () => parseCodegenConfig({ ANCHORKIT_IDL_PATH: "a.json", LOG_LEVEL: "verbose" }, []),
        ConfigError,
        "Configuration validation failed:\nLOG_LEVEL: Invalid enum value"
      );
    });

    it("starts the logger at a known level whatever LOG_LEVEL holds", () => {
      assert.equal(initialLevel({ LOG_LEVEL: "warn" }), "warn");
      assert.equal(initialLevel({ LOG_LEVEL: "verbose" }), "info");
      assert.equal(initialLevel({ LOG_LEVEL: "verbose", NODE_ENV: "test" }), "silent");
    });

    it("falls back to the environment", () => {
      const config = parseCodegenConfig({ ANCHORKIT_IDL_PATH: "env.json" }, []);
      assert.equal(config.idlPath, "env.json");
      assert.equal(config.outDir, "./generated");
    });

    it("accepts a program id and RPC URL instead of an IDL file", () => {
      const config = parseCodegenConfig(
        { ANCHORKIT_PROGRAM_ID: programId.toBase58(), SOLANA_RPC_URL: "http://127.0.0.1:8899" },
        []
      );
      assert.isUndefined(config.idlPath);
      assert.isTrue(config.programId?.equals(programId));
      assert.equal(config.rpcUrl, "http://127.0.0.1:8899");
    });

    it("needs some source for the IDL", () => {
      assert.throws(
        () => parseCodegenConfig({ ANCHORKIT_PROGRAM_ID: programId.toBase58() }, []),
        ConfigError,
        "No IDL source: pass an IDL path, or set ANCHORKIT_PROGRAM_ID and SOLANA_RPC_URL"
      );
    });

    it("rejects extra arguments", () => {
      assert.throws(
        () => parseCodegenConfig({}, ["a.json", "out", "extra"]),
        ConfigError,
        "Usage: anchorkit-codegen [idl-path] [out-dir]"
      );
    });
  });
});
