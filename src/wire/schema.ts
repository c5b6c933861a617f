import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import protobuf from "protobufjs";
import type { IConversionOptions, Type } from "protobufjs";

const SCHEMA_FILE = join("proto", "dynastack.proto");
const PACKAGE = "dynastack";

export type MessageTypes = {
  readonly request: Type;
  readonly response: Type;
  readonly event: Type;
  readonly stackState: Type;
};

/**
 * Options for turning decoded messages into plain objects: int64 as decimal
 * strings, bytes as number arrays, every scalar present, and the name of the
 * set member on each oneof.
 */
export const PLAIN_OBJECT: IConversionOptions = {
  longs: String,
  bytes: Array,
  defaults: true,
  arrays: true,
  objects: true,
  oneofs: true,
};

/** Options for the JSON form of a message: bytes as base64. */
export const JSON_OBJECT: IConversionOptions = {
  longs: String,
  bytes: String,
  defaults: false,
  arrays: true,
  objects: true,
};

const locateSchema = (): string => {
  const start = dirname(fileURLToPath(import.meta.url));
  let dir = start;
  for (;;) {
    const candidate = join(dir, SCHEMA_FILE);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      throw new Error(`${SCHEMA_FILE} not found in ${start} or any parent directory`);
    }
    dir = parent;
  }
};

let loaded: MessageTypes | undefined;

export function messageTypes(): MessageTypes {
  if (loaded === undefined) {
    const root = protobuf.loadSync(locateSchema());
    loaded = {
      request: root.lookupType(`${PACKAGE}.Request`),
      response: root.lookupType(`${PACKAGE}.Response`),
      event: root.lookupType(`${PACKAGE}.Event`),
      stackState: root.lookupType(`${PACKAGE}.StackState`),
    };
  }
  return loaded;
}
