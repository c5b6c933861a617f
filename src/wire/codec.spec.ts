import { describe, expect, test } from "vitest";
import type { SequencedEvent } from "../core/events.js";
import type { DeploymentRequest } from "../core/types.js";
import {
  decodeEvent,
  decodeRequest,
  decodeResponse,
  encodeEvent,
  encodeRequest,
  encodeResponse,
  wireValueFromObject,
  wireValueToObject,
} from "./codec.js";

const request: DeploymentRequest = {
  projectName: "demo",
  stackName: "dev",
  config: { region: "eu-west-1" },
  exports: { bucketId: "${bucket.id}" },
  resources: [
    {
      type: "aws:s3:Bucket",
      name: "bucket",
      properties: {
        acl: "private",
        versions: 3n,
        ratio: 0.5,
        public: false,
        tags: { team: "infra" },
        zones: ["a", "b"],
        seed: new Uint8Array([1, 2]),
        nothing: null,
      },
      dependsOn: [],
    },
    {
      type: "aws:s3:BucketPolicy",
      name: "policy",
      properties: { bucket: "${bucket.id}" },
      dependsOn: ["bucket"],
      provider: "aws-east",
    },
  ],
};

describe("wire values", () => {
  test("int64 travels as a decimal string", () => {
    expect(wireValueToObject({ kind: "int", value: -(2n ** 63n) })).toEqual({
      intValue: "-9223372036854775808",
    });
    expect(wireValueFromObject({ kind: "intValue", intValue: "-9223372036854775808" })).toEqual({
      kind: "int",
      value: -(2n ** 63n),
    });
  });

  test("an unrecognised tag decodes to unset", () => {
    expect(wireValueFromObject({ kind: "futureValue" })).toEqual({ kind: "unset" });
    expect(wireValueFromObject({})).toEqual({ kind: "unset" });
  });
});

describe("requests", () => {
  test("survive encoding", () => {
    const encoded = encodeRequest(request)._unsafeUnwrap();
    expect(decodeRequest(encoded)._unsafeUnwrap()).toEqual(request);
  });

  test("garbage bytes fail to decode", () => {
    const result = decodeRequest(new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff]));
    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().kind).toBe("decode");
  });

  test("an empty payload decodes to an empty request", () => {
    expect(decodeRequest(new Uint8Array(0))._unsafeUnwrap()).toEqual({
      projectName: "",
      stackName: "",
      config: {},
      exports: {},
      resources: [],
    });
  });
});

describe("responses", () => {
  test("carry outputs and errors", () => {
    const encoded = encodeResponse({
      success: true,
      outputs: [{ resourceName: "stack", outputName: "summary", value: { created: 2n } }],
    })._unsafeUnwrap();
    expect(decodeResponse(encoded)._unsafeUnwrap()).toEqual({
      success: true,
      outputs: [{ resourceName: "stack", outputName: "summary", value: { created: 2n } }],
    });

    const failed = encodeResponse({ success: false, error: "boom", outputs: [] })._unsafeUnwrap();
    expect(decodeResponse(failed)._unsafeUnwrap()).toEqual({
      success: false,
      error: "boom",
      outputs: [],
    });
  });
});

describe("events", () => {
  const events: readonly SequencedEvent[] = [
    { sequence: 1, event: { kind: "prelude", config: { region: "eu-west-1" } } },
    { sequence: 2, event: { kind: "diagnostic", severity: "info", message: "Refreshing" } },
    {
      sequence: 3,
      event: {
        kind: "diagnostic",
        severity: "warning",
        message: "careful",
        urn: "urn:dynastack::dev::demo::t::n",
      },
    },
    {
      sequence: 4,
      event: {
        kind: "resourcePre",
        metadata: { op: "create", urn: "urn:dynastack::dev::demo::t::n", type: "t", isNew: true },
        planning: false,
      },
    },
    {
      sequence: 5,
      event: {
        kind: "resourceFailed",
        metadata: { op: "create", urn: "urn:dynastack::dev::demo::t::n", type: "t", isNew: true },
        status: 1,
        steps: 0,
        error: "boom",
      },
    },
    {
      sequence: 6,
      event: { kind: "summary", mayChange: false, durationSeconds: 3, resourceChanges: { create: 1 } },
    },
  ];

  test.each(events.map((e) => [e.event.kind, e] as const))("%s survives encoding", (_, event) => {
    const encoded = encodeEvent(event)._unsafeUnwrap();
    expect(decodeEvent(encoded)._unsafeUnwrap()).toEqual(event);
  });

  test("an event without a payload is rejected", () => {
    expect(decodeEvent(new Uint8Array([8, 1]))._unsafeUnwrapErr()).toEqual({
      kind: "decode",
      message: "unrecognized event: (none)",
    });
  });
});
