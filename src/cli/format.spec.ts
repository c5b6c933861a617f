import { describe, expect, test } from "vitest";
import type { StackResult } from "../client/client.js";
import {
  changeCounts,
  formatOutputs,
  formatOutputsJson,
  formatOutputValue,
  stackMap,
  stackOutputs,
  stackText,
} from "./format.js";

const result: StackResult = {
  outputs: {
    "stack.stdout": "+ create test:Thing a\n",
    "stack.summary": { create: 2n, same: 1n },
    "bucket.arn": "arn:ignored",
  },
};

describe("stack items", () => {
  test("text and map items", () => {
    expect(stackText(result, "stdout")).toBe("+ create test:Thing a\n");
    expect(stackText(result, "stderr")).toBe("");
    expect(stackMap(result, "summary")).toEqual({ create: 2n, same: 1n });
    expect(stackMap(result, "stdout")).toEqual({});
  });

  test("only stack-owned items are stack outputs", () => {
    expect(Object.keys(stackOutputs(result))).toEqual(["stdout", "summary"]);
  });

  test("change counts become numbers", () => {
    expect(changeCounts({ create: 2n, same: 1, note: "x" })).toEqual({ create: 2, same: 1 });
  });
});

describe("output formatting", () => {
  test("strings print bare and other values as JSON", () => {
    expect(formatOutputValue("plain")).toBe("plain");
    expect(formatOutputValue({ port: 8080n, tags: ["a"] })).toBe('{"port":8080,"tags":["a"]}');
  });

  test("outputs sort by name", () => {
    expect(formatOutputs({ zone: "b", endpoint: "https://example.test", count: 2n })).toEqual([
      "count = 2",
      "endpoint = https://example.test",
      "zone = b",
    ]);
  });

  test("JSON output is indented", () => {
    expect(formatOutputsJson({ count: 2n })).toBe('{\n  "count": 2\n}');
  });
});
