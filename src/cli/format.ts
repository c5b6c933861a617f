import type { StackResult } from "../client/client.js";
import { STACK_OUTPUT_OWNER } from "../core/types.js";
import { type DynamicMap, type DynamicValue, isDynamicMap, toPlain } from "../core/value.js";

const stackItem = (result: StackResult, name: string): DynamicValue | undefined =>
  result.outputs[`${STACK_OUTPUT_OWNER}.${name}`];

/** The text of a string item such as `stdout`, or "" when absent. */
export const stackText = (result: StackResult, name: string): string => {
  const value = stackItem(result, name);
  return typeof value === "string" ? value : "";
};

export const stackMap = (result: StackResult, name: string): DynamicMap => {
  const value = stackItem(result, name);
  return value !== undefined && isDynamicMap(value) ? value : {};
};

/** Every stack-level item, keyed by output name. */
export const stackOutputs = (result: StackResult): DynamicMap => {
  const prefix = `${STACK_OUTPUT_OWNER}.`;
  const outputs: Record<string, DynamicValue> = {};
  for (const [key, value] of Object.entries(result.outputs)) {
    if (key.startsWith(prefix)) {
      outputs[key.slice(prefix.length)] = value;
    }
  }
  return outputs;
};

export const changeCounts = (summary: DynamicMap): Record<string, number> => {
  const counts: Record<string, number> = {};
  for (const [op, count] of Object.entries(summary)) {
    if (typeof count === "bigint" || typeof count === "number") {
      counts[op] = Number(count);
    }
  }
  return counts;
};

export const formatOutputValue = (value: DynamicValue): string =>
  typeof value === "string" ? value : JSON.stringify(toPlain(value));

export const formatOutputs = (outputs: DynamicMap): readonly string[] =>
  Object.entries(outputs)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, value]) => `${name} = ${formatOutputValue(value)}`);

export const formatOutputsJson = (outputs: DynamicMap): string =>
  JSON.stringify(toPlain(outputs), null, 2);

/** Writes captured engine output, which already ends in a newline. */
export const printCaptured = (result: StackResult): void => {
  const stdout = stackText(result, "stdout");
  const stderr = stackText(result, "stderr");
  if (stdout !== "") {
    process.stdout.write(stdout);
  }
  if (stderr !== "") {
    process.stderr.write(stderr);
  }
};
