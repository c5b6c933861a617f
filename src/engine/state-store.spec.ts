import { existsSync, readFileSync, writeFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { Testing } from "../testing/index.js";
import {
  FileStateStore,
  MemoryStateStore,
  type StackState,
  stateFromJson,
  statePath,
  stateToJson,
} from "./state-store.js";

const state: StackState = {
  version: 1,
  projectName: "demo",
  stackName: "dev",
  outputs: { endpoint: "https://example.test", port: 8443n },
  resources: [
    {
      urn: "urn:dynastack::dev::demo::test:Thing::a",
      type: "test:Thing",
      name: "a",
      id: "a-1",
      provider: "special",
      inputs: { enabled: false, ratio: 0.5, seed: new Uint8Array([1, 2, 3]), note: null },
      outputs: { nested: { list: [1n, "two"] } },
      dependencies: ["urn:dynastack::dev::demo::test:Thing::root"],
    },
  ],
};

describe("state JSON", () => {
  test("survives serialization", () => {
    const json = stateToJson(state)._unsafeUnwrap();
    expect(stateFromJson(json)._unsafeUnwrap()).toEqual(state);
  });

  test("writes int64 as strings and bytes as base64", () => {
    const parsed: unknown = JSON.parse(stateToJson(state)._unsafeUnwrap());
    expect(parsed).toMatchObject({
      outputs: { port: { intValue: "8443" } },
      resources: [{ inputs: { seed: { bytesValue: "AQID" } } }],
    });
  });

  test("rejects malformed JSON", () => {
    const result = stateFromJson("{not json");
    expect(result._unsafeUnwrapErr().message).toMatch(/^failed to parse state: /);
  });
});

describe("FileStateStore", () => {
  test("keeps state under .dynastack in the working directory", async () => {
    const workDir = Testing.workRoot();
    const key = { projectName: "demo", stackName: "dev", workDir };
    const store = new FileStateStore();

    expect((await store.load(key))._unsafeUnwrap()).toBeUndefined();
    (await store.save(key, state))._unsafeUnwrap();

    const path = join(workDir, ".dynastack", "dev.json");
    expect(statePath(key)).toBe(path);
    expect(existsSync(path)).toBe(true);
    expect(readFileSync(path, "utf-8").endsWith("}\n")).toBe(true);
    expect((await store.load(key))._unsafeUnwrap()).toEqual(state);
  });

  test("reports corrupt state with its path", async () => {
    const workDir = Testing.workRoot();
    mkdirSync(join(workDir, ".dynastack"));
    writeFileSync(join(workDir, ".dynastack", "dev.json"), "{");

    const result = await new FileStateStore().load({ projectName: "demo", stackName: "dev", workDir });

    expect(result._unsafeUnwrapErr()).toMatchObject({
      kind: "state",
      path: join(workDir, ".dynastack", "dev.json"),
    });
  });
});

describe("MemoryStateStore", () => {
  test("keeps stacks apart", async () => {
    const store = new MemoryStateStore();
    await store.save({ projectName: "demo", stackName: "dev", workDir: "" }, state);

    expect((await store.load({ projectName: "demo", stackName: "prod", workDir: "" }))._unsafeUnwrap()).toBeUndefined();
    expect((await store.load({ projectName: "demo", stackName: "dev", workDir: "" }))._unsafeUnwrap()).toBe(state);
  });
});
