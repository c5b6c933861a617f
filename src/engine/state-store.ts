import { existsSync } from "node:fs";
import * as fs from "node:fs/promises";
import { join } from "node:path";
import { err, ok, Result } from "neverthrow";
import { z } from "zod";
import { errorMessage } from "../core/errors.js";
import type { DynamicMap } from "../core/value.js";
import { nativeMapFromObject, nativeMapToObject, ValueObjectSchema } from "../wire/codec.js";
import { JSON_OBJECT, messageTypes, PLAIN_OBJECT } from "../wire/schema.js";

export const STATE_VERSION = 1;
export const STATE_DIR = ".dynastack";

export type StateResource = {
  readonly urn: string;
  readonly type: string;
  readonly name: string;
  readonly id: string;
  readonly provider?: string;
  readonly inputs: DynamicMap;
  readonly outputs: DynamicMap;
  readonly dependencies: readonly string[];
};

export type StackState = {
  readonly version: number;
  readonly projectName: string;
  readonly stackName: string;
  readonly resources: readonly StateResource[];
  readonly outputs: DynamicMap;
};

export type StateKey = {
  readonly projectName: string;
  readonly stackName: string;
  readonly workDir: string;
};

export type StateError = {
  readonly kind: "state";
  readonly message: string;
  readonly path?: string;
};

export type StateStore = {
  load(key: StateKey): Promise<Result<StackState | undefined, StateError>>;
  save(key: StateKey, state: StackState): Promise<Result<void, StateError>>;
};

export const emptyState = (key: StateKey): StackState => ({
  version: STATE_VERSION,
  projectName: key.projectName,
  stackName: key.stackName,
  resources: [],
  outputs: {},
});

const StateResourceObjectSchema = z.object({
  urn: z.string(),
  type: z.string(),
  name: z.string(),
  id: z.string(),
  provider: z.string(),
  inputs: z.record(z.string(), ValueObjectSchema),
  outputs: z.record(z.string(), ValueObjectSchema),
  dependencies: z.array(z.string()),
});

const StackStateObjectSchema = z.object({
  version: z.number(),
  projectName: z.string(),
  stackName: z.string(),
  resources: z.array(StateResourceObjectSchema),
  outputs: z.record(z.string(), ValueObjectSchema),
});

const stateError = (message: string, path?: string): StateError => ({
  kind: "state",
  message,
  ...(path !== undefined ? { path } : {}),
});

/** Serializes state as the JSON form of a `StackState` message. */
export function stateToJson(state: StackState): Result<string, StateError> {
  return Result.fromThrowable(
    (): string => {
      const type = messageTypes().stackState;
      const message = type.fromObject({
        version: state.version,
        projectName: state.projectName,
        stackName: state.stackName,
        outputs: nativeMapToObject(state.outputs),
        resources: state.resources.map((r) => ({
          urn: r.urn,
          type: r.type,
          name: r.name,
          id: r.id,
          provider: r.provider ?? "",
          inputs: nativeMapToObject(r.inputs),
          outputs: nativeMapToObject(r.outputs),
          dependencies: r.dependencies,
        })),
      });
      return `${JSON.stringify(type.toObject(message, JSON_OBJECT), null, 2)}\n`;
    },
    (e) => stateError(`failed to serialize state: ${errorMessage(e)}`),
  )();
}

export function stateFromJson(text: string): Result<StackState, StateError> {
  return Result.fromThrowable(
    (): unknown => {
      const type = messageTypes().stackState;
      return type.toObject(type.fromObject(JSON.parse(text)), PLAIN_OBJECT);
    },
    (e) => stateError(`failed to parse state: ${errorMessage(e)}`),
  )().andThen((object) => {
    const parsed = StackStateObjectSchema.safeParse(object);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return err(stateError(`invalid state at ${issue?.path.join(".") || "root"}: ${issue?.message ?? "unknown"}`));
    }
    const data = parsed.data;
    return ok({
      version: data.version,
      projectName: data.projectName,
      stackName: data.stackName,
      outputs: nativeMapFromObject(data.outputs),
      resources: data.resources.map(
        (r): StateResource => ({
          urn: r.urn,
          type: r.type,
          name: r.name,
          id: r.id,
          ...(r.provider !== "" ? { provider: r.provider } : {}),
          inputs: nativeMapFromObject(r.inputs),
          outputs: nativeMapFromObject(r.outputs),
          dependencies: r.dependencies,
        }),
      ),
    });
  });
}

export const statePath = (key: StateKey): string =>
  join(key.workDir, STATE_DIR, `${key.stackName}.json`);

/** Keeps each stack in `<workDir>/.dynastack/<stack>.json`. */
export class FileStateStore implements StateStore {
  async load(key: StateKey): Promise<Result<StackState | undefined, StateError>> {
    const path = statePath(key);
    if (!existsSync(path)) {
      return ok(undefined);
    }

    let text: string;
    try {
      text = await fs.readFile(path, "utf-8");
    } catch (e) {
      return err(stateError(`failed to read state: ${errorMessage(e)}`, path));
    }
    return stateFromJson(text).mapErr((e) => ({ ...e, path }));
  }

  async save(key: StateKey, state: StackState): Promise<Result<void, StateError>> {
    const path = statePath(key);
    const json = stateToJson(state);
    if (json.isErr()) {
      return err({ ...json.error, path });
    }

    try {
      await fs.mkdir(join(key.workDir, STATE_DIR), { recursive: true });
      await fs.writeFile(path, json.value);
    } catch (e) {
      return err(stateError(`failed to write state: ${errorMessage(e)}`, path));
    }
    return ok(undefined);
  }
}

export class MemoryStateStore implements StateStore {
  private readonly states = new Map<string, StackState>();

  private static keyOf(key: StateKey): string {
    return `${key.projectName}/${key.stackName}`;
  }

  async load(key: StateKey): Promise<Result<StackState | undefined, StateError>> {
    return ok(this.states.get(MemoryStateStore.keyOf(key)));
  }

  async save(key: StateKey, state: StackState): Promise<Result<void, StateError>> {
    this.states.set(MemoryStateStore.keyOf(key), state);
    return ok(undefined);
  }
}
