import type { Result } from "neverthrow";
import { formatOutputs, printCaptured, stackMap } from "./format.js";
import { type CliError, runStackOperation, type StackCommandOptions } from "./run.js";

export type DeployOptions = StackCommandOptions;

export async function deploy(options: DeployOptions = {}): Promise<Result<void, CliError>> {
  const result = await runStackOperation("deploy", options);
  return result.map((stack) => {
    printCaptured(stack);

    const outputs = formatOutputs(stackMap(stack, "outputs"));
    if (outputs.length > 0) {
      console.log("\nOutputs:");
      for (const line of outputs) {
        console.log(`  ${line}`);
      }
    }

    const message = stackMap(stack, "summary")["message"];
    if (typeof message === "string") {
      console.log(`\n${message}`);
    }
  });
}
