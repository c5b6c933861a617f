export { ok, err, Result } from "neverthrow";

export type { DynamicValue, DynamicMap, WireValue } from "./core/value.js";
export { toNative, toWire, fromPlain, toPlain, dynamicEquals, isDynamicMap } from "./core/value.js";

export { AsyncValue, isAsyncValue, type Settled } from "./core/async-value.js";

export type {
  ResolvedValue,
  ResolvedProperties,
  UnresolvedReference,
  Resolution,
} from "./core/references.js";
export {
  OutputRegistry,
  resolveReferences,
  resolveValue,
  lookupReference,
  getNestedValue,
  toInput,
} from "./core/references.js";

export type { EngineError, ValidationError, ValidationErrorCode } from "./core/errors.js";
export { formatEngineError } from "./core/errors.js";

export type {
  EngineEvent,
  SequencedEvent,
  ResourceMetadata,
  ResourceOperation,
  DiagnosticSeverity,
  EventSink,
} from "./core/events.js";
export { diagnostic, describeChanges } from "./core/events.js";

export type {
  ResourceDescription,
  DeploymentRequest,
  DeploymentResponse,
  OutputItem,
} from "./core/types.js";
export { STACK_OUTPUT_OWNER } from "./core/types.js";

export type {
  ProvisioningEngine,
  ProvisioningError,
  StackWorkspace,
  WorkspaceOptions,
  ProgramContext,
  DeploymentProgram,
  RegisteredResource,
  ResourceHandle,
  ResourceInputs,
  ResourceOptions,
  OperationResult,
  OperationSummary,
  PreviewResult,
} from "./core/provisioning.js";

export { createDeploymentProgram, type ProgramOptions } from "./core/program.js";
export { validateRequest } from "./core/validate.js";
export { createUrn, parseUrn } from "./core/urn.js";

export { frame, unframe, LENGTH_PREFIX_BYTES } from "./wire/framing.js";
export {
  encodeRequest,
  decodeRequest,
  encodeResponse,
  decodeResponse,
  encodeEvent,
  decodeEvent,
} from "./wire/codec.js";

export { BufferArena, type BoundaryBuffer, type BufferHandle } from "./boundary/buffers.js";
export { EventStream, type EventObserver, type Subscription } from "./boundary/event-stream.js";
export { createBoundary, type Boundary, type BoundaryOptions } from "./boundary/operations.js";

export { LocalEngine, type LocalEngineOptions } from "./engine/local-engine.js";
export {
  echoProvider,
  type ResourceProvider,
  type ProviderRegistry,
  type ProviderError,
} from "./engine/providers.js";
export {
  FileStateStore,
  MemoryStateStore,
  type StateStore,
  type StackState,
  type StateResource,
} from "./engine/state-store.js";

export {
  DeploymentClient,
  formatClientError,
  type ClientError,
  type ClientOptions,
  type StackResult,
} from "./client/client.js";
export { formatEvent } from "./client/printer.js";
