import { err, ok, type Result, ResultAsync } from "neverthrow";
import type { BoundaryBuffer } from "../boundary/buffers.js";
import type { Subscription } from "../boundary/event-stream.js";
import type { Boundary } from "../boundary/operations.js";
import { type EngineError, errorMessage, formatEngineError } from "../core/errors.js";
import type { SequencedEvent } from "../core/events.js";
import type { DeploymentRequest, DeploymentResponse } from "../core/types.js";
import type { DynamicValue } from "../core/value.js";
import { decodeEvent, decodeResponse, encodeRequest } from "../wire/codec.js";
import { frame, unframe } from "../wire/framing.js";

export type ClientError =
  | { readonly kind: "encode"; readonly message: string }
  | { readonly kind: "decode"; readonly message: string }
  | { readonly kind: "operation"; readonly message: string };

export type StackResult = {
  /** Keyed `resourceName.outputName`, e.g. `stack.stdout`. */
  readonly outputs: Readonly<Record<string, DynamicValue>>;
};

export type ClientOptions = {
  readonly onEvent?: (event: SequencedEvent) => void;
};

export const formatClientError = (error: ClientError): string => {
  switch (error.kind) {
    case "encode":
      return `failed to encode request: ${error.message}`;
    case "decode":
      return `failed to decode response: ${error.message}`;
    case "operation":
      return error.message;
  }
};

const messageOf = (error: EngineError): string =>
  error.kind === "decode" || error.kind === "encode" ? error.message : formatEngineError(error);

/** Copies a boundary buffer; the original is only valid until it is released. */
const copyOut = (buffer: BoundaryBuffer): Uint8Array => Uint8Array.from(buffer.bytes);

const toStackResult = (response: DeploymentResponse): Result<StackResult, ClientError> => {
  if (!response.success) {
    return err({ kind: "operation", message: response.error ?? "operation failed" });
  }
  const outputs: Record<string, DynamicValue> = {};
  for (const item of response.outputs) {
    outputs[`${item.resourceName}.${item.outputName}`] = item.value;
  }
  return ok({ outputs });
};

/**
 * Drives a {@link Boundary} with typed requests. Frames, buffer handles and
 * observer registration stay inside the client.
 */
export class DeploymentClient {
  private readonly boundary: Boundary;
  private readonly onEvent: ((event: SequencedEvent) => void) | undefined;

  constructor(boundary: Boundary, options: ClientOptions = {}) {
    this.boundary = boundary;
    this.onEvent = options.onEvent;
  }

  preview(request: DeploymentRequest): Promise<Result<StackResult, ClientError>> {
    return this.call((framed) => this.boundary.preview(framed), request);
  }

  deploy(request: DeploymentRequest): Promise<Result<StackResult, ClientError>> {
    return this.call((framed) => this.boundary.deploy(framed), request);
  }

  destroy(request: DeploymentRequest): Promise<Result<StackResult, ClientError>> {
    return this.call((framed) => this.boundary.destroy(framed), request);
  }

  getOutputs(request: DeploymentRequest): Promise<Result<StackResult, ClientError>> {
    return this.call((framed) => this.boundary.getOutputs(framed), request);
  }

  private observe(): Subscription | undefined {
    const onEvent = this.onEvent;
    if (onEvent === undefined) {
      return undefined;
    }
    return this.boundary.registerObserver((buffer) => {
      const decoded = unframe(copyOut(buffer)).andThen(decodeEvent);
      if (decoded.isErr()) {
        console.warn(`Skipping undecodable event: ${messageOf(decoded.error)}`);
        return;
      }
      onEvent(decoded.value);
    });
  }

  private async call(
    operation: (framed: Uint8Array) => Promise<BoundaryBuffer>,
    request: DeploymentRequest,
  ): Promise<Result<StackResult, ClientError>> {
    const encoded = encodeRequest(request);
    if (encoded.isErr()) {
      return err({ kind: "encode", message: messageOf(encoded.error) });
    }

    const subscription = this.observe();
    const received = await ResultAsync.fromPromise(
      operation(frame(encoded.value)),
      (e): ClientError => ({ kind: "operation", message: errorMessage(e) }),
    );
    subscription?.unsubscribe();
    if (received.isErr()) {
      return err(received.error);
    }

    const bytes = copyOut(received.value);
    this.boundary.releaseBuffer(received.value.handle);

    return unframe(bytes)
      .andThen(decodeResponse)
      .mapErr((e): ClientError => ({ kind: "decode", message: messageOf(e) }))
      .andThen(toStackResult);
  }
}
