import { assert } from "chai";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

import { IdlError, createWorkspace } from "../anchorkit-sdk/src";
import { FakeProvider, PROGRAM_ID } from "./helpers/provider";

describe("Workspace", () => {
  let dir: string;
  const provider = new FakeProvider();

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "anchorkit-workspace-"));
    mkdirSync(join(dir, "target", "idl"), { recursive: true });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeIdl(file: string, contents: string): void {
    writeFileSync(join(dir, "target", "idl", file), contents);
  }

  it("keys deployed programs by PascalCase name", () => {
    writeIdl("counter.json", readFileSync(join(__dirname, "fixtures", "counter.json"), "utf8"));
    writeIdl(
      "local_only.json",
      JSON.stringify({ version: "0.1.0", name: "local_only", instructions: [] })
    );
    writeIdl("notes.txt", "not an idl");

    const workspace = createWorkspace(dir, provider);
    assert.deepEqual(Object.keys(workspace), ["Counter"]);

    const counter = workspace["Counter"];
    assert.isTrue(counter.programId.equals(PROGRAM_ID));
    assert.strictEqual(counter.provider, provider);
    assert.deepEqual(Object.keys(counter.rpc), ["initialize", "increment", "setConfig"]);
  });

  it("throws IdlError for a file that is not JSON", () => {
    writeIdl("broken.json", "{");
    const path = join(dir, "target", "idl", "broken.json");
    assert.throws(() => createWorkspace(dir, provider), IdlError, `Cannot read IDL file ${path}`);
  });
});
