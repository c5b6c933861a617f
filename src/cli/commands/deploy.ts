import { command } from "cleye";

export const deployCommand = command({
  name: "deploy",
  help: {
    description: "Create or update the resources of a stack",
  },
  parameters: ["[stack]"],
  flags: {
    config: {
      type: String,
      description: "Stack file (default: dynastack.json)",
    },
  },
});
