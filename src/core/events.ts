export type ResourceOperation = "create" | "update" | "delete" | "same" | "read";

const CHANGE_ORDER: readonly ResourceOperation[] = ["create", "update", "delete", "same", "read"];

/** Renders change counts as `create: 2, same: 1`, in a fixed operation order. */
export const describeChanges = (changes: Readonly<Record<string, number>>): string => {
  const parts = CHANGE_ORDER.flatMap((op) => {
    const count = changes[op];
    return count !== undefined && count > 0 ? [`${op}: ${count}`] : [];
  });
  return parts.length > 0 ? parts.join(", ") : "no changes";
};

export type DiagnosticSeverity = "debug" | "info" | "warning" | "error";

export type ResourceMetadata = {
  readonly op: ResourceOperation;
  readonly urn: string;
  readonly type: string;
  readonly isNew: boolean;
};

export type EngineEvent =
  | PreludeEvent
  | DiagnosticEvent
  | ResourcePreEvent
  | ResourceOutputsEvent
  | ResourceFailedEvent
  | SummaryEvent;

export type PreludeEvent = {
  readonly kind: "prelude";
  readonly config: Readonly<Record<string, string>>;
};

export type DiagnosticEvent = {
  readonly kind: "diagnostic";
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly urn?: string;
};

export type ResourcePreEvent = {
  readonly kind: "resourcePre";
  readonly metadata: ResourceMetadata;
  readonly planning: boolean;
};

export type ResourceOutputsEvent = {
  readonly kind: "resourceOutputs";
  readonly metadata: ResourceMetadata;
  readonly planning: boolean;
};

export type ResourceFailedEvent = {
  readonly kind: "resourceFailed";
  readonly metadata: ResourceMetadata;
  readonly status: number;
  readonly steps: number;
  readonly error: string;
};

export type SummaryEvent = {
  readonly kind: "summary";
  readonly mayChange: boolean;
  readonly durationSeconds: number;
  readonly resourceChanges: Readonly<Record<string, number>>;
};

/** An event as delivered to an observer, numbered in emission order. */
export type SequencedEvent = {
  readonly sequence: number;
  readonly event: EngineEvent;
};

export type EventSink = (event: EngineEvent) => void;

export const diagnostic = (
  severity: DiagnosticSeverity,
  message: string,
  urn?: string,
): DiagnosticEvent => ({
  kind: "diagnostic",
  severity,
  message,
  ...(urn !== undefined ? { urn } : {}),
});
