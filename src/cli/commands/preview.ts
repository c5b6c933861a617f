import { command } from "cleye";

export const previewCommand = command({
  name: "preview",
  help: {
    description: "Show the changes a deploy would make, without making them",
  },
  parameters: ["[stack]"],
  flags: {
    config: {
      type: String,
      description: "Stack file (default: dynastack.json)",
    },
  },
});
