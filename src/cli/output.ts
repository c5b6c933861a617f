import type { Result } from "neverthrow";
import { formatOutputs, formatOutputsJson, stackOutputs } from "./format.js";
import { type CliError, runStackOperation, type StackCommandOptions } from "./run.js";

export type OutputOptions = StackCommandOptions & {
  readonly json?: boolean;
};

export async function output(options: OutputOptions = {}): Promise<Result<void, CliError>> {
  const result = await runStackOperation("output", options);
  return result.map((stack) => {
    const outputs = stackOutputs(stack);
    if (options.json === true) {
      console.log(formatOutputsJson(outputs));
      return;
    }
    for (const line of formatOutputs(outputs)) {
      console.log(line);
    }
  });
}
