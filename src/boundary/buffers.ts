export type BufferHandle = number;

/** A buffer owned by the boundary until its handle is released. */
export type BoundaryBuffer = {
  readonly handle: BufferHandle;
  readonly bytes: Uint8Array;
};

/**
 * Holds the response and event buffers handed across the boundary. Each
 * allocation copies its input, so the caller's bytes are never retained.
 */
export class BufferArena {
  private readonly buffers = new Map<BufferHandle, Uint8Array>();
  private nextHandle: BufferHandle = 1;

  allocate(bytes: Uint8Array): BoundaryBuffer {
    const handle = this.nextHandle++;
    const owned = Uint8Array.from(bytes);
    this.buffers.set(handle, owned);
    return { handle, bytes: owned };
  }

  /**
   * Zero-fills and forgets the buffer. Returns false for a handle that is
   * unknown or already released.
   */
  release(handle: BufferHandle): boolean {
    const bytes = this.buffers.get(handle);
    if (bytes === undefined) {
      return false;
    }
    bytes.fill(0);
    this.buffers.delete(handle);
    return true;
  }

  get size(): number {
    return this.buffers.size;
  }
}
