import { afterEach, describe, expect, test, vi } from "vitest";
import type { BoundaryBuffer } from "../boundary/buffers.js";
import type { EventObserver } from "../boundary/event-stream.js";
import type { Boundary } from "../boundary/operations.js";
import type { SequencedEvent } from "../core/events.js";
import { Testing } from "../testing/index.js";
import { encodeResponse } from "../wire/codec.js";
import { frame } from "../wire/framing.js";
import { DeploymentClient, formatClientError } from "./client.js";

const request = Testing.request({
  resources: [Testing.resource("test:Thing", "A")],
  exports: { id: "${A.id}" },
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("DeploymentClient", () => {
  test("deploy flattens response items by owner and name", async () => {
    const client = new DeploymentClient(Testing.boundary());

    const result = (await client.deploy(request))._unsafeUnwrap();

    expect(result.outputs["stack.stdout"]).toBe("+ create test:Thing A\n");
    expect(result.outputs["stack.outputs"]).toEqual({ id: "A-id" });
    expect(result.outputs["stack.summary"]).toEqual({
      message: "update succeeded (create: 1)",
      result: "succeeded",
    });
  });

  test("delivers decoded events in emission order", async () => {
    const boundary = Testing.boundary();
    const events: SequencedEvent[] = [];
    const client = new DeploymentClient(boundary, { onEvent: (event) => events.push(event) });

    await client.deploy(request);

    expect(events.map((e) => e.sequence)).toEqual(events.map((_, i) => i + 1));
    expect(events[0]?.event).toEqual({ kind: "prelude", config: {} });
    expect(events.at(-1)?.event.kind).toBe("summary");
  });

  test("failed operations carry the response error", async () => {
    const client = new DeploymentClient(Testing.boundary());

    const result = await client.destroy(request);

    expect(result._unsafeUnwrapErr()).toEqual({
      kind: "operation",
      message: "stack 'dev' not found",
    });
  });

  test("validation failures come back as operation errors", async () => {
    const client = new DeploymentClient(Testing.boundary());

    const result = await client.preview(Testing.request({ stackName: "" }));

    expect(formatClientError(result._unsafeUnwrapErr())).toBe(
      "stackName: Request requires 'stackName' to be a non-empty string",
    );
  });

  test("skips events it cannot decode and releases the response", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const released: number[] = [];
    let observer: EventObserver | null = null;
    const response: BoundaryBuffer = {
      handle: 7,
      bytes: frame(encodeResponse({ success: true, outputs: [] })._unsafeUnwrap()),
    };
    const boundary: Boundary = {
      preview: async () => {
        observer?.({ handle: 1, bytes: frame(Uint8Array.of(0xff)) });
        return response;
      },
      deploy: async () => response,
      destroy: async () => response,
      getOutputs: async () => response,
      registerObserver: (next) => {
        observer = next;
        return next === null ? undefined : { isActive: () => true, unsubscribe: () => undefined };
      },
      releaseBuffer: (handle) => {
        released.push(handle);
        return true;
      },
    };
    const onEvent = vi.fn();

    const result = await new DeploymentClient(boundary, { onEvent }).preview(request);

    expect(result._unsafeUnwrap()).toEqual({ outputs: {} });
    expect(onEvent).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toMatch(/^Skipping undecodable event: /);
    expect(released).toEqual([7]);
  });

  test("a rejected boundary call becomes an operation error", async () => {
    const boundary = Testing.boundary();
    const client = new DeploymentClient({
      ...boundary,
      getOutputs: async () => {
        throw new Error("boundary closed");
      },
    });

    const result = await client.getOutputs(request);

    expect(result._unsafeUnwrapErr()).toEqual({ kind: "operation", message: "boundary closed" });
  });
});

describe("formatClientError", () => {
  test.each([
    [{ kind: "encode", message: "bad value" }, "failed to encode request: bad value"],
    [{ kind: "decode", message: "truncated" }, "failed to decode response: truncated"],
    [{ kind: "operation", message: "stack 'dev' not found" }, "stack 'dev' not found"],
  ] as const)("%o", (error, expected) => {
    expect(formatClientError(error)).toBe(expected);
  });
});
