import { AsyncValue, isAsyncValue } from "./async-value.js";
import { type DynamicMap, type DynamicValue, isDynamicMap, isPlainRecord } from "./value.js";

/**
 * A property value after reference resolution: plain dynamic data in which any
 * leaf may have become a live {@link AsyncValue}.
 */
export type ResolvedValue =
  | DynamicValue
  | AsyncValue<DynamicValue>
  | readonly ResolvedValue[]
  | { readonly [key: string]: ResolvedValue };

export type ResolvedProperties = { readonly [key: string]: ResolvedValue };

export type UnresolvedReference = {
  readonly token: string;
  readonly reason: "not-found" | "interpolated";
};

export type Resolution<T> = {
  readonly value: T;
  readonly unresolved: readonly UnresolvedReference[];
};

const REFERENCE_PATTERN = /\$\{([^.{}]+)\.([^{}]+)\}/g;

const isResolvedRecord = (value: ResolvedValue): value is ResolvedProperties =>
  !isAsyncValue(value) && isPlainRecord(value);

/**
 * Values recorded for resources registered so far in one deployment: the id
 * and the whole-resource output bag of each, keyed by resource name.
 */
export class OutputRegistry {
  private readonly ids = new Map<string, AsyncValue<DynamicValue>>();
  private readonly bags = new Map<string, AsyncValue<DynamicValue>>();

  record(resourceName: string, id: AsyncValue<DynamicValue>, bag: AsyncValue<DynamicValue>): void {
    if (this.bags.has(resourceName)) {
      throw new Error(`Outputs of resource "${resourceName}" are already recorded`);
    }
    this.ids.set(resourceName, id);
    this.bags.set(resourceName, bag);
  }

  id(resourceName: string): AsyncValue<DynamicValue> | undefined {
    return this.ids.get(resourceName);
  }

  bag(resourceName: string): AsyncValue<DynamicValue> | undefined {
    return this.bags.get(resourceName);
  }
}

export function getNestedValue(value: DynamicValue, path: readonly string[]): DynamicValue {
  let current: DynamicValue = value;
  for (const segment of path) {
    if (!isDynamicMap(current)) {
      return null;
    }
    const next = current[segment];
    if (next === undefined) {
      return null;
    }
    current = next;
  }
  return current;
}

export function lookupReference(
  resourceName: string,
  path: string,
  outputs: OutputRegistry,
): AsyncValue<DynamicValue> | undefined {
  const [first, ...rest] = path.split(".");
  if (first === "id") {
    const id = outputs.id(resourceName);
    if (id !== undefined) {
      return rest.length > 0 ? id.map((v) => getNestedValue(v, rest)) : id;
    }
  }

  const bag = outputs.bag(resourceName);
  if (bag !== undefined) {
    return bag.map((v) => getNestedValue(v, path.split(".")));
  }

  return undefined;
}

function resolveString(value: string, outputs: OutputRegistry): Resolution<ResolvedValue> {
  const matches = [...value.matchAll(REFERENCE_PATTERN)];
  if (matches.length === 0) {
    return { value, unresolved: [] };
  }

  const only = matches[0];
  if (matches.length === 1 && only !== undefined && only[0] === value) {
    const [token, resourceName = "", path = ""] = only;
    const resolved = lookupReference(resourceName, path, outputs);
    if (resolved !== undefined) {
      return { value: resolved, unresolved: [] };
    }
    return { value, unresolved: [{ token, reason: "not-found" }] };
  }

  // Partial interpolation is not supported: the whole string stays literal.
  return {
    value,
    unresolved: matches.map((m): UnresolvedReference => ({ token: m[0], reason: "interpolated" })),
  };
}

export function resolveValue(value: DynamicValue, outputs: OutputRegistry): Resolution<ResolvedValue> {
  if (typeof value === "string") {
    return resolveString(value, outputs);
  }

  if (Array.isArray(value)) {
    const items: readonly DynamicValue[] = value;
    const results = items.map((item) => resolveValue(item, outputs));
    return {
      value: results.map((r) => r.value),
      unresolved: results.flatMap((r) => r.unresolved),
    };
  }

  if (isDynamicMap(value)) {
    return resolveReferences(value, outputs);
  }

  return { value, unresolved: [] };
}

/**
 * Replaces `${resource.path}` tokens in a property bag with the live values of
 * resources registered earlier. Tokens that cannot be resolved stay as literal
 * strings and are reported in `unresolved`.
 */
export function resolveReferences(
  properties: DynamicMap,
  outputs: OutputRegistry,
): Resolution<ResolvedProperties> {
  const resolved: Record<string, ResolvedValue> = {};
  const unresolved: UnresolvedReference[] = [];
  for (const [key, value] of Object.entries(properties)) {
    const result = resolveValue(value, outputs);
    resolved[key] = result.value;
    unresolved.push(...result.unresolved);
  }
  return { value: resolved, unresolved };
}

/**
 * Collapses a resolved value into a single engine input. Async values pass
 * through; plain values are wrapped; lists and maps holding async values are
 * combined so that their dependencies stay visible.
 */
export function toInput(value: ResolvedValue): AsyncValue<DynamicValue> {
  if (isAsyncValue(value)) {
    return value;
  }

  if (Array.isArray(value)) {
    const items: readonly ResolvedValue[] = value;
    return AsyncValue.all(items.map(toInput)).map((values): DynamicValue => values);
  }

  if (isResolvedRecord(value)) {
    const entries = Object.entries(value);
    const keys = entries.map(([key]) => key);
    const combined = AsyncValue.all(entries.map(([, field]) => toInput(field)));
    return combined.map((values): DynamicValue => {
      const result: Record<string, DynamicValue> = {};
      keys.forEach((key, i) => {
        result[key] = values[i] ?? null;
      });
      return result;
    });
  }

  return AsyncValue.of<DynamicValue>(value);
}
