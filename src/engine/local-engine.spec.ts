import { describe, expect, test } from "vitest";
import { createDeploymentProgram } from "../core/program.js";
import type { WorkspaceOptions } from "../core/provisioning.js";
import type { ResourceDescription } from "../core/types.js";
import type { DynamicMap } from "../core/value.js";
import { Testing } from "../testing/index.js";
import type { LocalEngine } from "./local-engine.js";
import { MemoryStateStore, type StackState } from "./state-store.js";

const workspace: WorkspaceOptions = {
  projectName: "demo",
  stackName: "dev",
  workDir: "/unused",
  config: {},
};

const thing = (name: string, properties: DynamicMap = {}, dependsOn: readonly string[] = []) =>
  Testing.resource("test:Thing", name, properties, dependsOn);

const programOf = (
  resources: readonly ResourceDescription[],
  exports: Readonly<Record<string, string>> = {},
) => createDeploymentProgram(resources, { emit: () => undefined, exports });

const stackFor = async (
  engine: LocalEngine,
  resources: readonly ResourceDescription[],
  exports?: Readonly<Record<string, string>>,
) => (await engine.upsertStack(workspace, programOf(resources, exports)))._unsafeUnwrap();

const up = async (
  engine: LocalEngine,
  resources: readonly ResourceDescription[],
  exports?: Readonly<Record<string, string>>,
) => (await stackFor(engine, resources, exports)).up();

const stateOf = async (store: MemoryStateStore): Promise<StackState | undefined> =>
  (await store.load(workspace))._unsafeUnwrap();

describe("LocalEngine", () => {
  test("creates resources and records them in state", async () => {
    const store = new MemoryStateStore();
    const engine = Testing.engine({ store });

    const result = (await up(engine, [thing("a", { size: 1n })]))._unsafeUnwrap();

    expect(result.stdout).toBe("+ create test:Thing a\n");
    expect(result.summary).toEqual({
      message: "update succeeded (create: 1)",
      result: "succeeded",
      resourceChanges: { create: 1 },
    });
    expect((await stateOf(store))?.resources).toEqual([
      {
        urn: "urn:dynastack::dev::demo::test:Thing::a",
        type: "test:Thing",
        name: "a",
        id: "a-id",
        inputs: { size: 1n },
        outputs: { size: 1n },
        dependencies: [],
      },
    ]);
  });

  test("leaves unchanged resources alone", async () => {
    const engine = Testing.engine();
    await up(engine, [thing("a", { size: 1n })]);

    const result = (await up(engine, [thing("a", { size: 1n })]))._unsafeUnwrap();

    expect(result.stdout).toBe("= same test:Thing a\n");
    expect(result.summary.message).toBe("update succeeded (same: 1)");
  });

  test("updates changed resources and keeps their id", async () => {
    const store = new MemoryStateStore();
    const engine = Testing.engine({ store });
    await up(engine, [thing("a", { size: 1n })]);

    const result = (await up(engine, [thing("a", { size: 2n })]))._unsafeUnwrap();

    expect(result.stdout).toBe("~ update test:Thing a\n");
    const [a] = (await stateOf(store))?.resources ?? [];
    expect(a?.id).toBe("a-id");
    expect(a?.outputs).toEqual({ size: 2n });
  });

  test("deletes resources that are no longer declared", async () => {
    const store = new MemoryStateStore();
    const engine = Testing.engine({ store });
    await up(engine, [thing("a"), thing("b")]);

    const result = (await up(engine, [thing("a")]))._unsafeUnwrap();

    expect(result.stdout).toBe("= same test:Thing a\n- delete test:Thing b\n");
    expect(result.summary.message).toBe("update succeeded (delete: 1, same: 1)");
    expect((await stateOf(store))?.resources.map((r) => r.name)).toEqual(["a"]);
  });

  test("previews changes without touching state", async () => {
    const store = new MemoryStateStore();
    const engine = Testing.engine({ store });
    await up(engine, [thing("a", { v: 1n }), thing("b")]);
    const before = await stateOf(store);

    const stack = await stackFor(engine, [thing("a", { v: 2n }), thing("c")]);
    const preview = (await stack.preview())._unsafeUnwrap();

    expect(preview.stdout).toBe(
      "~ update test:Thing a\n+ create test:Thing c\n- delete test:Thing b\n",
    );
    expect(preview.changeSummary).toEqual({ update: 1, create: 1, delete: 1 });
    expect(await stateOf(store)).toEqual(before);
  });

  test("records implicit and explicit dependencies", async () => {
    const store = new MemoryStateStore();
    const engine = Testing.engine({ store });

    await up(engine, [thing("A"), thing("B", { bucket: "${A.id}" }), thing("C", {}, ["A"])]);

    const resources = (await stateOf(store))?.resources ?? [];
    const urnA = "urn:dynastack::dev::demo::test:Thing::A";
    expect(resources.find((r) => r.name === "B")?.dependencies).toEqual([urnA]);
    expect(resources.find((r) => r.name === "B")?.inputs).toEqual({ bucket: "A-id" });
    expect(resources.find((r) => r.name === "C")?.dependencies).toEqual([urnA]);
  });

  test("stores exports as stack outputs", async () => {
    const engine = Testing.engine();
    const stack = await stackFor(engine, [thing("A", { arn: "arn:a" })], { arn: "${A.arn}" });
    await stack.up();

    expect((await stack.outputs())._unsafeUnwrap()).toEqual({ arn: "arn:a" });
  });

  test("uses the explicitly named provider", async () => {
    const engine = Testing.engine({ providers: { special: Testing.failingProvider(["x"]) } });

    const result = await up(engine, [{ ...thing("x"), provider: "special" }]);

    expect(result._unsafeUnwrapErr()).toEqual({
      message: "failed to create test:Thing x: provider failure",
      resource: "urn:dynastack::dev::demo::test:Thing::x",
    });
  });

  test("refresh drops resources their provider reports as gone", async () => {
    const store = new MemoryStateStore();
    const engine = Testing.engine({ store, providers: { test: Testing.readingProvider(["a"]) } });
    const stack = await stackFor(engine, [thing("a"), thing("b")]);
    await stack.up();

    const result = (await stack.refresh())._unsafeUnwrap();

    expect(result.stdout).toBe("- delete test:Thing a\n> read test:Thing b\n");
    expect(result.summary.message).toBe("refresh succeeded (delete: 1, read: 1)");
    expect((await stateOf(store))?.resources.map((r) => r.name)).toEqual(["b"]);
  });

  test("destroy deletes newest first and clears outputs", async () => {
    const store = new MemoryStateStore();
    const engine = Testing.engine({ store });
    await up(engine, [thing("a"), thing("b")], { id: "${a.id}" });

    const stack = (await engine.selectStack(workspace))._unsafeUnwrap();
    const result = (await stack.destroy())._unsafeUnwrap();

    expect(result.stdout).toBe("- delete test:Thing b\n- delete test:Thing a\n");
    expect(await stateOf(store)).toMatchObject({ resources: [], outputs: {} });
  });

  test("selecting a stack without state fails", async () => {
    const result = await Testing.engine().selectStack(workspace);
    expect(result._unsafeUnwrapErr()).toEqual({ message: "stack 'dev' not found" });
  });

  test("a selected stack cannot run up", async () => {
    const engine = Testing.engine();
    await up(engine, []);
    const stack = (await engine.selectStack(workspace))._unsafeUnwrap();
    expect((await stack.up()).isErr()).toBe(true);
  });
});
