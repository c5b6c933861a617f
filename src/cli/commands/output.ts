import { command } from "cleye";

export const outputCommand = command({
  name: "output",
  help: {
    description: "Print the exported outputs of a stack",
  },
  parameters: ["[stack]"],
  flags: {
    config: {
      type: String,
      description: "Stack file (default: dynastack.json)",
    },
    json: {
      type: Boolean,
      description: "Output in JSON format",
    },
  },
});
