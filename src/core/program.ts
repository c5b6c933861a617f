import { err, ok } from "neverthrow";
import { AsyncValue } from "./async-value.js";
import { diagnostic, type EventSink, type ResourceMetadata } from "./events.js";
import type {
  DeploymentProgram,
  ProgramContext,
  RegisteredResource,
  ResourceHandle,
  ResourceInputs,
} from "./provisioning.js";
import {
  OutputRegistry,
  type ResolvedProperties,
  resolveReferences,
  resolveValue,
  toInput,
  type UnresolvedReference,
} from "./references.js";
import type { ResourceDescription } from "./types.js";
import { createUrn } from "./urn.js";
import { type DynamicMap, type DynamicValue, isDynamicMap } from "./value.js";

export type ProgramOptions = {
  readonly emit: EventSink;
  readonly exports?: Readonly<Record<string, string>>;
};

const toInputs = (properties: ResolvedProperties): ResourceInputs => {
  const inputs: Record<string, AsyncValue<DynamicValue>> = {};
  for (const [key, value] of Object.entries(properties)) {
    inputs[key] = toInput(value);
  }
  return inputs;
};

const asMap = (value: DynamicValue | undefined): DynamicMap =>
  value !== undefined && isDynamicMap(value) ? value : {};

/**
 * The whole-resource output bag: resolved inputs, overlaid with what the
 * provisioning engine reported, plus the identity under `id`.
 */
const buildOutputBag = (
  properties: ResolvedProperties,
  registered: RegisteredResource,
): AsyncValue<DynamicValue> =>
  AsyncValue.all<DynamicValue>([toInput(properties), registered.outputs, registered.id])
    .withDependencies([registered.handle.urn])
    .map((values): DynamicValue => {
      const [inputs, outputs, id] = values;
      return { ...asMap(inputs), ...asMap(outputs), id: id ?? null };
    });

const describeUnresolved = (resourceName: string, ref: UnresolvedReference): string =>
  ref.reason === "interpolated"
    ? `Reference ${ref.token} in resource ${resourceName} is part of a larger string and was left as literal text`
    : `Reference ${ref.token} in resource ${resourceName} does not match any resource registered before it`;

/**
 * Builds the program that registers `resources` in submission order. Nothing
 * runs until the provisioning engine invokes the returned function.
 */
export function createDeploymentProgram(
  resources: readonly ResourceDescription[],
  options: ProgramOptions,
): DeploymentProgram {
  const { emit } = options;

  return async (ctx: ProgramContext) => {
    const handles = new Map<string, ResourceHandle>();
    const registry = new OutputRegistry();

    for (const resource of resources) {
      const metadata: ResourceMetadata = {
        op: "create",
        urn: createUrn(ctx.stackName, ctx.projectName, resource.type, resource.name),
        type: resource.type,
        isNew: true,
      };
      emit({ kind: "resourcePre", metadata, planning: ctx.dryRun });

      const resolution = resolveReferences(resource.properties, registry);
      for (const ref of resolution.unresolved) {
        emit(diagnostic("warning", describeUnresolved(resource.name, ref), metadata.urn));
      }

      const dependsOn: ResourceHandle[] = [];
      for (const depName of resource.dependsOn) {
        const dep = handles.get(depName);
        if (dep !== undefined) {
          dependsOn.push(dep);
        } else {
          const message = `Dependency ${depName} not found for resource ${resource.name}`;
          console.warn(`Warning: ${message}`);
          emit(diagnostic("warning", message, metadata.urn));
        }
      }

      const registered = await ctx.registerResource(
        resource.type,
        resource.name,
        toInputs(resolution.value),
        {
          dependsOn,
          ...(resource.provider !== undefined ? { provider: resource.provider } : {}),
        },
      );

      if (registered.isErr()) {
        emit({
          kind: "resourceFailed",
          metadata,
          status: 1,
          steps: 0,
          error: registered.error.message,
        });
        return err(registered.error);
      }

      emit({ kind: "resourceOutputs", metadata, planning: ctx.dryRun });

      handles.set(resource.name, registered.value.handle);
      registry.record(
        resource.name,
        registered.value.id,
        buildOutputBag(resolution.value, registered.value),
      );
    }

    for (const [name, expression] of Object.entries(options.exports ?? {})) {
      const resolution = resolveValue(expression, registry);
      for (const ref of resolution.unresolved) {
        emit(diagnostic("warning", describeUnresolved(`export ${name}`, ref)));
      }
      ctx.exportOutput(name, toInput(resolution.value));
    }

    return ok(undefined);
  };
}
