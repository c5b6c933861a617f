import type { Result } from "neverthrow";
import { describeChanges } from "../core/events.js";
import { changeCounts, printCaptured, stackMap } from "./format.js";
import { type CliError, runStackOperation, type StackCommandOptions } from "./run.js";

export type PreviewOptions = StackCommandOptions;

export async function preview(options: PreviewOptions = {}): Promise<Result<void, CliError>> {
  const result = await runStackOperation("preview", options);
  return result.map((stack) => {
    printCaptured(stack);
    console.log(`Preview: ${describeChanges(changeCounts(stackMap(stack, "summary")))}`);
  });
}
