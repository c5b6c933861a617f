import { formatEngineError } from "../core/errors.js";
import type { EngineEvent } from "../core/events.js";
import { encodeEvent } from "../wire/codec.js";
import { frame } from "../wire/framing.js";
import type { BoundaryBuffer, BufferArena } from "./buffers.js";

/**
 * Receives each event as a framed buffer. The buffer is reclaimed as soon as
 * the observer returns, so anything kept must be copied first.
 */
export type EventObserver = (buffer: BoundaryBuffer) => void;

export type Subscription = {
  isActive(): boolean;
  unsubscribe(): void;
};

type Slot = {
  readonly observer: EventObserver;
  readonly subscription: Subscription;
};

export class EventStream {
  private slot: Slot | undefined;
  private sequence = 0;

  constructor(private readonly arena: BufferArena) {}

  register(observer: EventObserver): Subscription {
    const subscription: Subscription = {
      isActive: () => this.slot?.subscription === subscription,
      unsubscribe: () => {
        // A stale handle must not clear an observer registered after it.
        if (this.slot?.subscription === subscription) {
          this.slot = undefined;
        }
      },
    };
    this.slot = { observer, subscription };
    return subscription;
  }

  unregister(): void {
    this.slot = undefined;
  }

  get hasObserver(): boolean {
    return this.slot !== undefined;
  }

  emit(event: EngineEvent): void {
    const slot = this.slot;
    if (slot === undefined) {
      return;
    }

    const sequence = this.sequence + 1;
    const encoded = encodeEvent({ sequence, event });
    if (encoded.isErr()) {
      console.error(`Dropped ${event.kind} event: ${formatEngineError(encoded.error)}`);
      return;
    }
    this.sequence = sequence;

    const buffer = this.arena.allocate(frame(encoded.value));
    try {
      slot.observer(buffer);
    } catch (e) {
      console.error(`Event observer failed on ${event.kind} event:`, e);
    } finally {
      this.arena.release(buffer.handle);
    }
  }
}
