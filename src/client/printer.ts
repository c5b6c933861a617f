import { describeChanges, type EngineEvent, type ResourceMetadata } from "../core/events.js";
import { parseUrn } from "../core/urn.js";

export type PrintLevel = "info" | "warn" | "error";

export type PrintedLine = {
  readonly level: PrintLevel;
  readonly text: string;
};

const describeResource = (metadata: ResourceMetadata): string => {
  const parsed = parseUrn(metadata.urn);
  return parsed !== undefined ? `${metadata.type} ${parsed.resourceName}` : metadata.urn;
};

/** Renders one engine event as a line of CLI output. */
export const formatEvent = (event: EngineEvent): PrintedLine => {
  switch (event.kind) {
    case "prelude": {
      const keys = Object.keys(event.config);
      return {
        level: "info",
        text: keys.length > 0 ? `Starting (config: ${keys.join(", ")})` : "Starting",
      };
    }
    case "diagnostic":
      return {
        level:
          event.severity === "error" ? "error" : event.severity === "warning" ? "warn" : "info",
        text: `[${event.severity}] ${event.message}`,
      };
    case "resourcePre":
      return {
        level: "info",
        text: `${event.planning ? "Planning" : "Applying"} ${event.metadata.op} ${describeResource(event.metadata)}`,
      };
    case "resourceOutputs":
      return {
        level: "info",
        text: `${event.planning ? "Planned" : "Done"} ${event.metadata.op} ${describeResource(event.metadata)}`,
      };
    case "resourceFailed":
      return {
        level: "error",
        text: `Failed ${event.metadata.op} ${describeResource(event.metadata)}: ${event.error}`,
      };
    case "summary":
      return {
        level: "info",
        text: `Finished in ${event.durationSeconds}s (${describeChanges(event.resourceChanges)})`,
      };
  }
};
