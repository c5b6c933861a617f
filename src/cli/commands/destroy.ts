import { command } from "cleye";

export const destroyCommand = command({
  name: "destroy",
  help: {
    description: "Delete every resource of a stack",
  },
  parameters: ["[stack]"],
  flags: {
    config: {
      type: String,
      description: "Stack file (default: dynastack.json)",
    },
  },
});
