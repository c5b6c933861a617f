import { err, ok, type Result } from "neverthrow";

export const LENGTH_PREFIX_BYTES = 4;

export type FrameError = {
  readonly kind: "decode";
  readonly message: string;
};

/**
 * Wraps a payload in the boundary envelope: a little-endian uint32 length
 * followed by the payload bytes. Payloads may contain zero bytes.
 */
export function frame(payload: Uint8Array): Uint8Array {
  const framed = new Uint8Array(LENGTH_PREFIX_BYTES + payload.length);
  new DataView(framed.buffer).setUint32(0, payload.length, true);
  framed.set(payload, LENGTH_PREFIX_BYTES);
  return framed;
}

/**
 * Reads the payload out of a framed buffer. Bytes past the declared length are
 * ignored.
 */
export function unframe(framed: Uint8Array): Result<Uint8Array, FrameError> {
  if (framed.length < LENGTH_PREFIX_BYTES) {
    return err({
      kind: "decode",
      message: `frame is ${framed.length} bytes, shorter than the ${LENGTH_PREFIX_BYTES}-byte length prefix`,
    });
  }

  const view = new DataView(framed.buffer, framed.byteOffset, framed.byteLength);
  const length = view.getUint32(0, true);
  const available = framed.length - LENGTH_PREFIX_BYTES;
  if (length > available) {
    return err({
      kind: "decode",
      message: `frame declares ${length} payload bytes but only ${available} are present`,
    });
  }

  return ok(framed.subarray(LENGTH_PREFIX_BYTES, LENGTH_PREFIX_BYTES + length));
}
