import { Logger } from '../types/common.js';
import { CoalescableEvent, isCoalescable, StreamEvent, StreamEventInput } from '../types/events.js';

export interface SubscribeOptions {
  // Soft capacity; beyond it deltas are coalesced. The buffer only grows past it for events that can't be merged
  bufferSize?: number;
}

function coalesceKey(event: CoalescableEvent): string {
  return event.type === 'AssistantDelta'
    ? `delta:${event.turnId}`
    : `terminal:${event.callId}:${event.stream}`;
}

function sameStream(a: StreamEvent, b: StreamEvent): boolean {
  return isCoalescable(a) && isCoalescable(b) && coalesceKey(a) === coalesceKey(b);
}

// Earlier text is folded into the later event, which keeps its own (later) sequence number
function merge(earlier: CoalescableEvent, later: CoalescableEvent): CoalescableEvent {
  return { ...later, text: earlier.text + later.text };
}

/**
 * One pane's feed. Events are buffered per subscription so a slow reader never holds up
 * publication to the others.
 */
export class Subscription implements AsyncIterable<StreamEvent> {
  private buffer: StreamEvent[] = [];
  private waiters: Array<(result: IteratorResult<StreamEvent>) => void> = [];
  private closed = false;
  private _coalesced = 0;

  constructor(
    readonly name: string,
    private readonly capacity: number,
    private readonly onClose: (subscription: Subscription) => void,
  ) {}

  // Number of delta events merged into a successor because this subscriber fell behind
  get coalesced(): number {
    return this._coalesced;
  }

  get pending(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  deliver(event: StreamEvent): void {
    if (this.closed) {
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: event, done: false });
      return;
    }
    if (this.buffer.length >= this.capacity && this.makeRoom(event)) {
      return;
    }
    this.buffer.push(event);
  }

  next(): Promise<IteratorResult<StreamEvent>> {
    const event = this.buffer.shift();
    if (event) {
      return Promise.resolve({ value: event, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise(resolve => this.waiters.push(resolve));
  }

  // Takes everything currently buffered without waiting
  drain(): StreamEvent[] {
    const events = this.buffer;
    this.buffer = [];
    return events;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
    this.onClose(this);
  }

  [Symbol.asyncIterator](): AsyncIterator<StreamEvent> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }

  /**
   * Called with a full buffer. Merges the oldest adjacent pair of deltas from the same stream, or
   * folds the incoming event into the newest buffered one. Returns true if the incoming event was
   * absorbed. When nothing is coalescable the caller lets the buffer grow.
   */
  private makeRoom(incoming: StreamEvent): boolean {
    for (let i = 0; i + 1 < this.buffer.length; i++) {
      const earlier = this.buffer[i];
      const later = this.buffer[i + 1];
      if (isCoalescable(earlier) && isCoalescable(later) && sameStream(earlier, later)) {
        this.buffer.splice(i, 2, merge(earlier, later));
        this._coalesced++;
        return false;
      }
    }
    const last = this.buffer[this.buffer.length - 1];
    if (last && isCoalescable(last) && isCoalescable(incoming) && sameStream(last, incoming)) {
      this.buffer[this.buffer.length - 1] = merge(last, incoming);
      this._coalesced++;
      return true;
    }
    return false;
  }
}

/**
 * Ordered fan-out of agent events to the panes (chat, editor, terminal).
 *
 * publish() stamps each event with a global sequence number and hands it to every current
 * subscriber synchronously; it never waits on a subscriber.
 */
export class StreamBroker {
  private seq = 0;
  private subscriptions = new Set<Subscription>();

  constructor(private logger: Logger, private defaultBufferSize = 256) {}

  get subscriberCount(): number {
    return this.subscriptions.size;
  }

  publish(input: StreamEventInput): StreamEvent {
    const event: StreamEvent = { ...input, seq: ++this.seq };
    if (event.type !== 'AssistantDelta' && event.type !== 'TerminalOutput') {
      this.logger.debug(`[StreamBroker] publish ${event.type} #${event.seq}`);
    }
    for (const subscription of this.subscriptions) {
      subscription.deliver(event);
    }
    return event;
  }

  subscribe(name: string, options: SubscribeOptions = {}): Subscription {
    const subscription = new Subscription(
      name,
      options.bufferSize ?? this.defaultBufferSize,
      closed => this.subscriptions.delete(closed),
    );
    this.subscriptions.add(subscription);
    this.logger.debug(`[StreamBroker] ${name} subscribed`);
    return subscription;
  }

  unsubscribe(subscription: Subscription): void {
    subscription.close();
  }

  close(): void {
    for (const subscription of [...this.subscriptions]) {
      subscription.close();
    }
  }
}
