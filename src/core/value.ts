export type DynamicValue =
  | null
  | string
  | bigint
  | number
  | boolean
  | Uint8Array
  | readonly DynamicValue[]
  | DynamicMap;

export type DynamicMap = { readonly [key: string]: DynamicValue };

export type WireValue =
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "int"; readonly value: bigint }
  | { readonly kind: "double"; readonly value: number }
  | { readonly kind: "bool"; readonly value: boolean }
  | { readonly kind: "list"; readonly values: readonly WireValue[] }
  | { readonly kind: "map"; readonly fields: Readonly<Record<string, WireValue>> }
  | { readonly kind: "bytes"; readonly value: Uint8Array }
  | { readonly kind: "unset" };

const UNSET: WireValue = { kind: "unset" };

export const isPlainRecord = (value: unknown): value is Readonly<Record<string, unknown>> => {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

export const isDynamicMap = (value: DynamicValue | undefined): value is DynamicMap =>
  isPlainRecord(value);

/**
 * Converts a wire value into its native form. Tags this codec does not know
 * decode to `null`.
 */
export function toNative(value: WireValue): DynamicValue {
  switch (value.kind) {
    case "string":
    case "double":
    case "bool":
    case "bytes":
      return value.value;
    case "int":
      return BigInt.asIntN(64, value.value);
    case "list":
      return value.values.map(toNative);
    case "map": {
      const result: Record<string, DynamicValue> = {};
      for (const [key, field] of Object.entries(value.fields)) {
        result[key] = toNative(field);
      }
      return result;
    }
    case "unset":
      return null;
    default:
      return unrecognized(value);
  }
}

function unrecognized(_value: never): DynamicValue {
  return null;
}

/**
 * Converts a native value into its wire form. Values outside
 * {@link DynamicValue} are sent as their string representation.
 */
export function toWire(value: unknown): WireValue {
  if (value === null || value === undefined) {
    return UNSET;
  }
  switch (typeof value) {
    case "string":
      return { kind: "string", value };
    case "bigint":
      return { kind: "int", value: BigInt.asIntN(64, value) };
    case "number":
      return { kind: "double", value };
    case "boolean":
      return { kind: "bool", value };
    default:
      break;
  }
  if (value instanceof Uint8Array) {
    return { kind: "bytes", value };
  }
  if (Array.isArray(value)) {
    return { kind: "list", values: value.map(toWire) };
  }
  if (isPlainRecord(value)) {
    const fields: Record<string, WireValue> = {};
    for (const [key, field] of Object.entries(value)) {
      fields[key] = toWire(field);
    }
    return { kind: "map", fields };
  }
  return { kind: "string", value: String(value) };
}

/**
 * Converts JSON-like input into a dynamic value. Safe integers become int64.
 */
export function fromPlain(value: unknown): DynamicValue {
  if (typeof value === "number" && Number.isSafeInteger(value)) {
    return BigInt(value);
  }
  if (Array.isArray(value)) {
    return value.map(fromPlain);
  }
  if (isPlainRecord(value)) {
    const result: Record<string, DynamicValue> = {};
    for (const [key, field] of Object.entries(value)) {
      result[key] = fromPlain(field);
    }
    return result;
  }
  return toNative(toWire(value));
}

export function toPlain(value: DynamicValue): unknown {
  if (typeof value === "bigint") {
    const asNumber = Number(value);
    return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString("base64");
  }
  if (Array.isArray(value)) {
    return value.map(toPlain);
  }
  if (isDynamicMap(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, field] of Object.entries(value)) {
      result[key] = toPlain(field);
    }
    return result;
  }
  return value;
}

export function dynamicEquals(a: DynamicValue, b: DynamicValue): boolean {
  if (a instanceof Uint8Array || b instanceof Uint8Array) {
    return (
      a instanceof Uint8Array &&
      b instanceof Uint8Array &&
      a.length === b.length &&
      a.every((byte, i) => byte === b[i])
    );
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) {
      return false;
    }
    return a.every((item: DynamicValue, i) => {
      const other: DynamicValue | undefined = b[i];
      return other !== undefined && dynamicEquals(item, other);
    });
  }
  if (isDynamicMap(a) || isDynamicMap(b)) {
    if (!isDynamicMap(a) || !isDynamicMap(b)) {
      return false;
    }
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) {
      return false;
    }
    return keys.every((key) => {
      const left = a[key];
      const right = b[key];
      return left !== undefined && right !== undefined && dynamicEquals(left, right);
    });
  }
  return Object.is(a, b);
}
