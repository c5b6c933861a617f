import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { err, ok, type Result, ResultAsync } from "neverthrow";
import { type EngineError, errorMessage, formatEngineError } from "../core/errors.js";
import { diagnostic } from "../core/events.js";
import { createDeploymentProgram } from "../core/program.js";
import type {
  ProvisioningEngine,
  ProvisioningError,
  StackWorkspace,
  WorkspaceOptions,
} from "../core/provisioning.js";
import {
  type DeploymentRequest,
  type DeploymentResponse,
  failedResponse,
  okResponse,
  type OutputItem,
  stackOutput,
} from "../core/types.js";
import { validateRequest } from "../core/validate.js";
import type { DynamicValue } from "../core/value.js";
import { decodeRequest, encodeResponse } from "../wire/codec.js";
import { frame, unframe } from "../wire/framing.js";
import { type BoundaryBuffer, BufferArena, type BufferHandle } from "./buffers.js";
import { type EventObserver, EventStream, type Subscription } from "./event-stream.js";

/**
 * The operations a foreign caller invokes. Every operation takes a framed
 * request and yields exactly one framed response buffer, which the caller
 * hands back through {@link Boundary.releaseBuffer}.
 */
export type Boundary = {
  preview(request: Uint8Array): Promise<BoundaryBuffer>;
  deploy(request: Uint8Array): Promise<BoundaryBuffer>;
  destroy(request: Uint8Array): Promise<BoundaryBuffer>;
  getOutputs(request: Uint8Array): Promise<BoundaryBuffer>;
  registerObserver(observer: EventObserver | null): Subscription | undefined;
  releaseBuffer(handle: BufferHandle): boolean;
};

export type BoundaryOptions = {
  readonly engine: ProvisioningEngine;
  /** Directory under which each project gets its working directory. Defaults to the cwd. */
  readonly workRoot?: string;
};

const fromProvisioning =
  (kind: "workspace" | "engine") =>
  (error: ProvisioningError): EngineError => ({ kind, message: error.message });

/** Failures of one resource's registration keep the resource; the rest are engine errors. */
export const fromRunFailure = (error: ProvisioningError): EngineError =>
  error.resource !== undefined
    ? { kind: "registration", resource: error.resource, message: error.message }
    : { kind: "engine", message: error.message };

const fromRejection = (e: unknown): EngineError => ({ kind: "engine", message: errorMessage(e) });

export function createBoundary(options: BoundaryOptions): Boundary {
  const { engine } = options;
  const workRoot = options.workRoot ?? process.cwd();
  const arena = new BufferArena();
  const events = new EventStream(arena);
  const emit = events.emit.bind(events);

  const parseRequest = (framed: Uint8Array): Result<DeploymentRequest, EngineError> =>
    unframe(framed).andThen(decodeRequest).andThen(validateRequest);

  const ensureWorkingDirectory = async (
    request: DeploymentRequest,
  ): Promise<Result<WorkspaceOptions, EngineError>> => {
    const workDir = join(workRoot, request.projectName);
    try {
      await mkdir(workDir, { recursive: true });
    } catch (e) {
      return err({
        kind: "workspace",
        message: `failed to ensure working directory: ${errorMessage(e)}`,
        path: workDir,
      });
    }
    return ok({
      projectName: request.projectName,
      stackName: request.stackName,
      workDir,
      config: request.config,
    });
  };

  const refreshStack = async (stack: StackWorkspace): Promise<void> => {
    emit(diagnostic("info", "Refreshing stack to detect drift..."));
    const refreshed = await stack.refresh();
    if (refreshed.isErr()) {
      emit(diagnostic("warning", `Refresh warning: ${refreshed.error.message}`));
    } else {
      emit(diagnostic("info", `Refresh completed: ${refreshed.value.summary.message}`));
    }
  };

  const openProgramStack = async (
    request: DeploymentRequest,
  ): Promise<Result<StackWorkspace, EngineError>> => {
    const workspace = await ensureWorkingDirectory(request);
    if (workspace.isErr()) {
      return err(workspace.error);
    }

    const program = createDeploymentProgram(request.resources, {
      emit,
      exports: request.exports,
    });
    const stack = await engine.upsertStack(workspace.value, program);
    if (stack.isErr()) {
      return err(fromProvisioning("workspace")(stack.error));
    }

    emit({ kind: "prelude", config: request.config });
    await refreshStack(stack.value);
    return ok(stack.value);
  };

  const openExistingStack = async (
    request: DeploymentRequest,
  ): Promise<Result<StackWorkspace, EngineError>> => {
    const workspace = await ensureWorkingDirectory(request);
    if (workspace.isErr()) {
      return err(workspace.error);
    }
    const stack = await engine.selectStack(workspace.value);
    return stack.mapErr(fromProvisioning("workspace"));
  };

  const runPreview = async (
    request: DeploymentRequest,
  ): Promise<Result<readonly OutputItem[], EngineError>> => {
    const stack = await openProgramStack(request);
    if (stack.isErr()) {
      return err(stack.error);
    }
    const preview = await stack.value.preview();
    return preview.mapErr(fromRunFailure).map((result) => [
      stackOutput("stdout", result.stdout),
      stackOutput("stderr", result.stderr),
      stackOutput("summary", changeCounts(result.changeSummary)),
    ]);
  };

  const runDeploy = async (
    request: DeploymentRequest,
  ): Promise<Result<readonly OutputItem[], EngineError>> => {
    const stack = await openProgramStack(request);
    if (stack.isErr()) {
      return err(stack.error);
    }

    const started = Date.now();
    const up = await stack.value.up();
    if (up.isErr()) {
      return err(fromRunFailure(up.error));
    }
    emit({
      kind: "summary",
      mayChange: false,
      durationSeconds: Math.round((Date.now() - started) / 1000),
      resourceChanges: up.value.summary.resourceChanges,
    });

    const outputs = await stack.value.outputs();
    return outputs.mapErr(fromProvisioning("engine")).map((stackOutputs) => [
      stackOutput("stdout", up.value.stdout),
      stackOutput("stderr", up.value.stderr),
      stackOutput("outputs", stackOutputs),
      stackOutput("summary", {
        message: up.value.summary.message,
        result: up.value.summary.result,
      }),
    ]);
  };

  const runDestroy = async (
    request: DeploymentRequest,
  ): Promise<Result<readonly OutputItem[], EngineError>> => {
    const stack = await openExistingStack(request);
    if (stack.isErr()) {
      return err(stack.error);
    }
    const destroyed = await stack.value.destroy();
    return destroyed.mapErr(fromProvisioning("engine")).map((result) => [
      stackOutput("stdout", result.stdout),
      stackOutput("stderr", result.stderr),
      stackOutput("summary", { message: result.summary.message, result: result.summary.result }),
    ]);
  };

  const runGetOutputs = async (
    request: DeploymentRequest,
  ): Promise<Result<readonly OutputItem[], EngineError>> => {
    const stack = await openExistingStack(request);
    if (stack.isErr()) {
      return err(stack.error);
    }
    const outputs = await stack.value.outputs();
    return outputs
      .mapErr(fromProvisioning("engine"))
      .map((values) => Object.entries(values).map(([name, value]) => stackOutput(name, value)));
  };

  const respond = (response: DeploymentResponse): BoundaryBuffer => {
    const encoded = encodeResponse(response).orElse((error) =>
      encodeResponse(failedResponse(formatEngineError(error))),
    );
    if (encoded.isErr()) {
      console.error(`Failed to encode response: ${formatEngineError(encoded.error)}`);
      return arena.allocate(frame(new Uint8Array(0)));
    }
    return arena.allocate(frame(encoded.value));
  };

  const operation =
    (
      run: (request: DeploymentRequest) => Promise<Result<readonly OutputItem[], EngineError>>,
    ) =>
    async (framed: Uint8Array): Promise<BoundaryBuffer> => {
      const request = parseRequest(framed);
      if (request.isErr()) {
        return respond(failedResponse(formatEngineError(request.error)));
      }

      const result = await ResultAsync.fromPromise(run(request.value), fromRejection).andThen(
        (inner) => inner,
      );
      return respond(
        result.match(okResponse, (error) => failedResponse(formatEngineError(error))),
      );
    };

  return {
    preview: operation(runPreview),
    deploy: operation(runDeploy),
    destroy: operation(runDestroy),
    getOutputs: operation(runGetOutputs),
    registerObserver: (observer) => {
      if (observer === null) {
        events.unregister();
        return undefined;
      }
      return events.register(observer);
    },
    releaseBuffer: (handle) => arena.release(handle),
  };
}

const changeCounts = (changes: Readonly<Record<string, number>>): DynamicValue => {
  const counts: Record<string, DynamicValue> = {};
  for (const [op, count] of Object.entries(changes)) {
    counts[op] = BigInt(count);
  }
  return counts;
};
