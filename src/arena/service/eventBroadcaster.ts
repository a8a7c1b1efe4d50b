import type { Logger } from "../../config/logger";
import type { ArenaEvent, SessionId } from "../domain/types";
import { BroadcastOverflowError } from "../domain/errors";

export interface Subscription extends AsyncIterable<ArenaEvent> {
  readonly id: number;
  readonly session_id: SessionId;
  /** Settles once the stream has ended, been unsubscribed or been dropped. */
  readonly closed: Promise<void>;
}

export type SubscribeOptions = {
  /** Events already recorded for the session, delivered before live ones. */
  backlog?: readonly ArenaEvent[];
  /** Session already over: the stream ends after the backlog. */
  closed?: boolean;
};

class Subscriber implements Subscription {
  private readonly backlog: ArenaEvent[];
  private readonly queue: ArenaEvent[] = [];
  private ended = false;
  private failure: Error | null = null;
  private wake: (() => void) | null = null;
  private settle: () => void = () => {};
  readonly closed: Promise<void>;

  constructor(
    readonly id: number,
    readonly session_id: SessionId,
    backlog: readonly ArenaEvent[],
    private readonly capacity: number,
    private readonly detach: (sub: Subscriber) => void
  ) {
    this.backlog = [...backlog];
    this.closed = new Promise<void>((resolve) => {
      this.settle = resolve;
    });
  }

  get open(): boolean {
    return !this.ended && !this.failure;
  }

  /** Returns false when the live queue was full and the subscriber got dropped. */
  push(event: ArenaEvent): boolean {
    if (!this.open) return true;
    if (this.queue.length >= this.capacity) {
      this.fail(new BroadcastOverflowError(this.session_id, this.capacity));
      return false;
    }
    this.queue.push(event);
    this.notify();
    return true;
  }

  end(): void {
    this.ended = true;
    this.notify();
    this.settle();
  }

  fail(err: Error): void {
    this.failure = err;
    this.notify();
    this.settle();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<ArenaEvent> {
    try {
      while (this.backlog.length > 0) {
        const next = this.backlog.shift();
        if (next) yield next;
      }
      for (;;) {
        const next = this.queue.shift();
        if (next) {
          yield next;
          continue;
        }
        if (this.failure) throw this.failure;
        if (this.ended) return;
        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
      }
    } finally {
      this.ended = true;
      this.detach(this);
      this.settle();
    }
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

/**
 * Per-session fan-out. publish() never waits: each subscriber has its own
 * bounded queue and a subscriber that falls behind is disconnected.
 */
export class EventBroadcaster {
  private readonly sessions = new Map<SessionId, Set<Subscriber>>();
  private nextId = 1;

  constructor(private readonly opts: { queueSize: number; logger: Logger }) {}

  subscribe(sessionId: SessionId, options: SubscribeOptions = {}): Subscription {
    const sub = new Subscriber(
      this.nextId++,
      sessionId,
      options.backlog ?? [],
      this.opts.queueSize,
      (s) => this.remove(s)
    );

    if (options.closed) {
      sub.end();
      return sub;
    }

    let set = this.sessions.get(sessionId);
    if (!set) {
      set = new Set();
      this.sessions.set(sessionId, set);
    }
    set.add(sub);
    this.opts.logger.debug(
      { session_id: sessionId, subscriber: sub.id, subscribers: set.size },
      "subscriber attached"
    );
    return sub;
  }

  unsubscribe(subscription: Subscription): void {
    const set = this.sessions.get(subscription.session_id);
    if (!set) return;
    for (const sub of set) {
      if (sub.id === subscription.id) {
        sub.end();
        this.remove(sub);
        return;
      }
    }
  }

  /** Returns the number of subscribers the event was queued for. */
  publish(sessionId: SessionId, event: ArenaEvent): number {
    const set = this.sessions.get(sessionId);
    if (!set) return 0;

    let delivered = 0;
    for (const sub of [...set]) {
      if (sub.push(event)) {
        delivered += 1;
        continue;
      }
      this.remove(sub);
      this.opts.logger.warn(
        { session_id: sessionId, subscriber: sub.id, capacity: this.opts.queueSize },
        "subscriber queue overflow, disconnected"
      );
    }
    return delivered;
  }

  closeSession(sessionId: SessionId): void {
    const set = this.sessions.get(sessionId);
    if (!set) return;
    this.sessions.delete(sessionId);
    for (const sub of set) sub.end();
  }

  subscriberCount(sessionId?: SessionId): number {
    if (sessionId != null) return this.sessions.get(sessionId)?.size ?? 0;
    let total = 0;
    for (const set of this.sessions.values()) total += set.size;
    return total;
  }

  disconnectAll(): void {
    for (const sessionId of [...this.sessions.keys()]) this.closeSession(sessionId);
  }

  private remove(sub: Subscriber): void {
    const set = this.sessions.get(sub.session_id);
    if (!set) return;
    set.delete(sub);
    if (set.size === 0) this.sessions.delete(sub.session_id);
  }
}
