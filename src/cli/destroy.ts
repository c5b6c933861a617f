import type { Result } from "neverthrow";
import { printCaptured, stackMap } from "./format.js";
import { type CliError, runStackOperation, type StackCommandOptions } from "./run.js";

export type DestroyOptions = StackCommandOptions;

export async function destroy(options: DestroyOptions = {}): Promise<Result<void, CliError>> {
  const result = await runStackOperation("destroy", options);
  return result.map((stack) => {
    printCaptured(stack);
    const message = stackMap(stack, "summary")["message"];
    if (typeof message === "string") {
      console.log(message);
    }
  });
}
