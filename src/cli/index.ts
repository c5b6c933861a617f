import { cli } from "cleye";
import type { Result } from "neverthrow";
import { deployCommand } from "./commands/deploy.js";
import { destroyCommand } from "./commands/destroy.js";
import { outputCommand } from "./commands/output.js";
import { previewCommand } from "./commands/preview.js";
import { deploy } from "./deploy.js";
import { destroy } from "./destroy.js";
import { output } from "./output.js";
import { preview } from "./preview.js";
import { type CliError, formatCliError } from "./run.js";

const VERSION = "0.1.0";

const report = (result: Result<void, CliError>): number => {
  if (result.isErr()) {
    console.error(`Error: ${formatCliError(result.error)}`);
    return 1;
  }
  return 0;
};

/** Runs the CLI on `process.argv`-shaped arguments and returns the exit code. */
export const run = async (argv: readonly string[]): Promise<number> => {
  const parsed = cli(
    {
      name: "dynastack",
      version: VERSION,
      commands: [previewCommand, deployCommand, destroyCommand, outputCommand],
    },
    undefined,
    argv.slice(2),
  );

  switch (parsed.command) {
    case "preview":
      return report(await preview({ config: parsed.flags.config, stack: parsed._.stack }));
    case "deploy":
      return report(await deploy({ config: parsed.flags.config, stack: parsed._.stack }));
    case "destroy":
      return report(await destroy({ config: parsed.flags.config, stack: parsed._.stack }));
    case "output":
      return report(
        await output({
          config: parsed.flags.config,
          stack: parsed._.stack,
          json: parsed.flags.json,
        }),
      );
    default:
      parsed.showHelp();
      return 0;
  }
};
