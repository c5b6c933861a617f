import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { Testing } from "../testing/index.js";
import { parseConfig, readConfig, toRequest } from "./config.js";

describe("parseConfig", () => {
  test("fills defaults", () => {
    expect(parseConfig({ project: "demo", stack: "dev" })._unsafeUnwrap()).toEqual({
      project: "demo",
      stack: "dev",
      config: {},
      resources: [],
      exports: {},
    });
  });

  test("reports the first invalid field by path", () => {
    const result = parseConfig({ project: "demo", stack: "dev", resources: [{ type: "t", name: "" }] });
    expect(result._unsafeUnwrapErr().field).toBe("resources.0.name");
  });
});

describe("readConfig", () => {
  test("missing file", async () => {
    const path = join(Testing.workRoot(), "dynastack.json");
    expect((await readConfig(path))._unsafeUnwrapErr()).toEqual({
      field: "path",
      message: `Config file not found: ${path}`,
    });
  });

  test("invalid JSON", async () => {
    const path = join(Testing.workRoot(), "dynastack.json");
    writeFileSync(path, "{");
    const error = (await readConfig(path))._unsafeUnwrapErr();
    expect(error.field).toBe("root");
    expect(error.message.startsWith(`Invalid JSON in ${path}: `)).toBe(true);
  });
});

describe("toRequest", () => {
  const config = parseConfig({
    project: "demo",
    stack: "dev",
    resources: [
      {
        type: "test:Thing",
        name: "a",
        properties: { size: 3, ratio: 0.5, tags: ["x"], nested: { on: true } },
        provider: "special",
      },
    ],
    exports: { id: "${a.id}" },
  })._unsafeUnwrap();

  test("converts whole numbers to integers", () => {
    expect(toRequest(config).resources).toEqual([
      {
        type: "test:Thing",
        name: "a",
        properties: { size: 3n, ratio: 0.5, tags: ["x"], nested: { on: true } },
        dependsOn: [],
        provider: "special",
      },
    ]);
  });

  test("stack name overrides the file's stack", () => {
    expect(toRequest(config).stackName).toBe("dev");
    expect(toRequest(config, "prod").stackName).toBe("prod");
  });
});
