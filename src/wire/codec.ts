import { err, ok, Result } from "neverthrow";
import type { Type } from "protobufjs";
import { z } from "zod";
import { type EngineError, errorMessage } from "../core/errors.js";
import type { EngineEvent, ResourceMetadata, SequencedEvent } from "../core/events.js";
import type { DeploymentRequest, DeploymentResponse, ResourceDescription } from "../core/types.js";
import { type DynamicMap, toNative, toWire, type WireValue } from "../core/value.js";
import { type MessageTypes, messageTypes, PLAIN_OBJECT } from "./schema.js";

export type ValueObject = {
  kind?: string | undefined;
  stringValue?: string | undefined;
  intValue?: string | undefined;
  doubleValue?: number | undefined;
  boolValue?: boolean | undefined;
  listValue?: { values: ValueObject[] } | null | undefined;
  mapValue?: { fields: Record<string, ValueObject> } | null | undefined;
  bytesValue?: number[] | undefined;
};

export const ValueObjectSchema: z.ZodType<ValueObject> = z.lazy(() =>
  z.object({
    kind: z.string().optional(),
    stringValue: z.string().optional(),
    intValue: z.string().optional(),
    doubleValue: z.union([z.number(), z.nan()]).optional(),
    boolValue: z.boolean().optional(),
    listValue: z.object({ values: z.array(ValueObjectSchema) }).nullable().optional(),
    mapValue: z.object({ fields: z.record(z.string(), ValueObjectSchema) }).nullable().optional(),
    bytesValue: z.array(z.number()).optional(),
  }),
);

const INTEGER = /^-?\d+$/;

export function wireValueFromObject(object: ValueObject): WireValue {
  switch (object.kind) {
    case "stringValue":
      return { kind: "string", value: object.stringValue ?? "" };
    case "intValue": {
      const digits = object.intValue ?? "0";
      return { kind: "int", value: INTEGER.test(digits) ? BigInt(digits) : 0n };
    }
    case "doubleValue":
      return { kind: "double", value: object.doubleValue ?? 0 };
    case "boolValue":
      return { kind: "bool", value: object.boolValue ?? false };
    case "listValue":
      return { kind: "list", values: (object.listValue?.values ?? []).map(wireValueFromObject) };
    case "mapValue":
      return { kind: "map", fields: wireFieldsFromObject(object.mapValue?.fields ?? {}) };
    case "bytesValue":
      return { kind: "bytes", value: Uint8Array.from(object.bytesValue ?? []) };
    default:
      return { kind: "unset" };
  }
}

const wireFieldsFromObject = (
  fields: Readonly<Record<string, ValueObject>>,
): Record<string, WireValue> => {
  const result: Record<string, WireValue> = {};
  for (const [key, field] of Object.entries(fields)) {
    result[key] = wireValueFromObject(field);
  }
  return result;
};

export function wireValueToObject(value: WireValue): Record<string, unknown> {
  switch (value.kind) {
    case "string":
      return { stringValue: value.value };
    case "int":
      return { intValue: value.value.toString() };
    case "double":
      return { doubleValue: value.value };
    case "bool":
      return { boolValue: value.value };
    case "list":
      return { listValue: { values: value.values.map(wireValueToObject) } };
    case "map":
      return { mapValue: { fields: wireFieldsToObject(value.fields) } };
    case "bytes":
      return { bytesValue: value.value };
    case "unset":
      return {};
  }
}

const wireFieldsToObject = (
  fields: Readonly<Record<string, WireValue>>,
): Record<string, Record<string, unknown>> => {
  const result: Record<string, Record<string, unknown>> = {};
  for (const [key, field] of Object.entries(fields)) {
    result[key] = wireValueToObject(field);
  }
  return result;
};

export const nativeMapFromObject = (fields: Readonly<Record<string, ValueObject>>): DynamicMap => {
  const result: Record<string, ReturnType<typeof toNative>> = {};
  for (const [key, field] of Object.entries(fields)) {
    result[key] = toNative(wireValueFromObject(field));
  }
  return result;
};

export const nativeMapToObject = (map: DynamicMap): Record<string, Record<string, unknown>> => {
  const result: Record<string, Record<string, unknown>> = {};
  for (const [key, field] of Object.entries(map)) {
    result[key] = wireValueToObject(toWire(field));
  }
  return result;
};

/** Picks a message type from the loaded schema. */
type MessageSelector = (types: MessageTypes) => Type;

export function decodeMessage(
  select: MessageSelector,
  payload: Uint8Array,
): Result<unknown, EngineError> {
  return Result.fromThrowable(
    (): unknown => {
      const type = select(messageTypes());
      return type.toObject(type.decode(payload), PLAIN_OBJECT);
    },
    (e): EngineError => ({ kind: "decode", message: errorMessage(e) }),
  )();
}

export function encodeMessage(
  select: MessageSelector,
  object: Record<string, unknown>,
): Result<Uint8Array, EngineError> {
  return Result.fromThrowable(
    (): Uint8Array => {
      const type = select(messageTypes());
      const message = type.fromObject(object);
      const problem = type.verify(message);
      if (problem !== null) {
        throw new Error(problem);
      }
      return type.encode(message).finish();
    },
    (e): EngineError => ({ kind: "encode", message: errorMessage(e) }),
  )();
}

const parseWith = <T>(schema: z.ZodType<T>, object: unknown): Result<T, EngineError> => {
  const result = schema.safeParse(object);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue !== undefined && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return err({ kind: "decode", message: `${where}${issue?.message ?? "invalid message"}` });
  }
  return ok(result.data);
};

// Requests

const ResourceObjectSchema = z.object({
  type: z.string(),
  name: z.string(),
  properties: z.record(z.string(), ValueObjectSchema),
  dependsOn: z.array(z.string()),
  provider: z.string(),
});

const RequestObjectSchema = z.object({
  projectName: z.string(),
  stackName: z.string(),
  resources: z.array(ResourceObjectSchema),
  config: z.record(z.string(), z.string()),
  exports: z.record(z.string(), z.string()),
});

export function decodeRequest(payload: Uint8Array): Result<DeploymentRequest, EngineError> {
  return decodeMessage((types) => types.request, payload)
    .andThen((object) => parseWith(RequestObjectSchema, object))
    .map(
      (object): DeploymentRequest => ({
        projectName: object.projectName,
        stackName: object.stackName,
        config: object.config,
        exports: object.exports,
        resources: object.resources.map(
          (r): ResourceDescription => ({
            type: r.type,
            name: r.name,
            properties: nativeMapFromObject(r.properties),
            dependsOn: r.dependsOn,
            ...(r.provider !== "" ? { provider: r.provider } : {}),
          }),
        ),
      }),
    );
}

export function encodeRequest(request: DeploymentRequest): Result<Uint8Array, EngineError> {
  return encodeMessage((types) => types.request, {
    projectName: request.projectName,
    stackName: request.stackName,
    config: request.config,
    exports: request.exports,
    resources: request.resources.map((r) => ({
      type: r.type,
      name: r.name,
      properties: nativeMapToObject(r.properties),
      dependsOn: r.dependsOn,
      provider: r.provider ?? "",
    })),
  });
}

// Responses

const ResponseObjectSchema = z.object({
  success: z.boolean(),
  error: z.string(),
  outputs: z.array(
    z.object({
      resourceName: z.string(),
      outputName: z.string(),
      value: ValueObjectSchema.nullable().optional(),
    }),
  ),
});

export function encodeResponse(response: DeploymentResponse): Result<Uint8Array, EngineError> {
  return encodeMessage((types) => types.response, {
    success: response.success,
    error: response.error ?? "",
    outputs: response.outputs.map((item) => ({
      resourceName: item.resourceName,
      outputName: item.outputName,
      value: wireValueToObject(toWire(item.value)),
    })),
  });
}

export function decodeResponse(payload: Uint8Array): Result<DeploymentResponse, EngineError> {
  return decodeMessage((types) => types.response, payload)
    .andThen((object) => parseWith(ResponseObjectSchema, object))
    .map(
      (object): DeploymentResponse => ({
        success: object.success,
        ...(object.error !== "" ? { error: object.error } : {}),
        outputs: object.outputs.map((item) => ({
          resourceName: item.resourceName,
          outputName: item.outputName,
          value: toNative(wireValueFromObject(item.value ?? {})),
        })),
      }),
    );
}

// Events

const MetadataObjectSchema = z.object({
  op: z.enum(["create", "update", "delete", "same", "read"]),
  urn: z.string(),
  type: z.string(),
  isNew: z.boolean(),
});

const EventObjectSchema = z.object({
  sequence: z.number(),
  event: z.string().optional(),
  prelude: z.object({ config: z.record(z.string(), z.string()) }).nullish(),
  diagnostic: z
    .object({
      severity: z.enum(["debug", "info", "warning", "error"]),
      message: z.string(),
      urn: z.string(),
    })
    .nullish(),
  resourcePre: z.object({ metadata: MetadataObjectSchema.nullable(), planning: z.boolean() }).nullish(),
  resourceOutputs: z
    .object({ metadata: MetadataObjectSchema.nullable(), planning: z.boolean() })
    .nullish(),
  resourceFailed: z
    .object({
      metadata: MetadataObjectSchema.nullable(),
      status: z.number(),
      steps: z.number(),
      error: z.string(),
    })
    .nullish(),
  summary: z
    .object({
      mayChange: z.boolean(),
      durationSeconds: z.number(),
      resourceChanges: z.record(z.string(), z.number()),
    })
    .nullish(),
});

type EventObject = z.infer<typeof EventObjectSchema>;

const requireMetadata = (
  metadata: ResourceMetadata | null,
  event: string,
): Result<ResourceMetadata, EngineError> =>
  metadata !== null ? ok(metadata) : err({ kind: "decode", message: `${event} event has no metadata` });

const eventFromObject = (object: EventObject): Result<EngineEvent, EngineError> => {
  const { prelude, diagnostic, resourcePre, resourceOutputs, resourceFailed, summary } = object;
  switch (object.event) {
    case "prelude":
      return ok({ kind: "prelude", config: prelude?.config ?? {} });
    case "diagnostic":
      if (diagnostic == null) break;
      return ok({
        kind: "diagnostic",
        severity: diagnostic.severity,
        message: diagnostic.message,
        ...(diagnostic.urn !== "" ? { urn: diagnostic.urn } : {}),
      });
    case "resourcePre":
      if (resourcePre == null) break;
      return requireMetadata(resourcePre.metadata, "resourcePre").map(
        (metadata): EngineEvent => ({ kind: "resourcePre", metadata, planning: resourcePre.planning }),
      );
    case "resourceOutputs":
      if (resourceOutputs == null) break;
      return requireMetadata(resourceOutputs.metadata, "resourceOutputs").map(
        (metadata): EngineEvent => ({
          kind: "resourceOutputs",
          metadata,
          planning: resourceOutputs.planning,
        }),
      );
    case "resourceFailed":
      if (resourceFailed == null) break;
      return requireMetadata(resourceFailed.metadata, "resourceFailed").map(
        (metadata): EngineEvent => ({
          kind: "resourceFailed",
          metadata,
          status: resourceFailed.status,
          steps: resourceFailed.steps,
          error: resourceFailed.error,
        }),
      );
    case "summary":
      if (summary == null) break;
      return ok({
        kind: "summary",
        mayChange: summary.mayChange,
        durationSeconds: summary.durationSeconds,
        resourceChanges: summary.resourceChanges,
      });
    default:
      break;
  }
  return err({ kind: "decode", message: `unrecognized event: ${object.event ?? "(none)"}` });
};

const eventToObject = (event: EngineEvent): Record<string, unknown> => {
  switch (event.kind) {
    case "prelude":
      return { prelude: { config: event.config } };
    case "diagnostic":
      return {
        diagnostic: { severity: event.severity, message: event.message, urn: event.urn ?? "" },
      };
    case "resourcePre":
      return { resourcePre: { metadata: event.metadata, planning: event.planning } };
    case "resourceOutputs":
      return { resourceOutputs: { metadata: event.metadata, planning: event.planning } };
    case "resourceFailed":
      return {
        resourceFailed: {
          metadata: event.metadata,
          status: event.status,
          steps: event.steps,
          error: event.error,
        },
      };
    case "summary":
      return {
        summary: {
          mayChange: event.mayChange,
          durationSeconds: event.durationSeconds,
          resourceChanges: event.resourceChanges,
        },
      };
  }
};

export function encodeEvent(event: SequencedEvent): Result<Uint8Array, EngineError> {
  return encodeMessage((types) => types.event, {
    sequence: event.sequence,
    ...eventToObject(event.event),
  });
}

export function decodeEvent(payload: Uint8Array): Result<SequencedEvent, EngineError> {
  return decodeMessage((types) => types.event, payload)
    .andThen((object) => parseWith(EventObjectSchema, object))
    .andThen((object) =>
      eventFromObject(object).map((event): SequencedEvent => ({ sequence: object.sequence, event })),
    );
}
