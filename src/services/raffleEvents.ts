import { RaffleEvent, RaffleEventType } from "../types/raffle";

type EventOf<T extends RaffleEventType> = Extract<RaffleEvent, { type: T }>;
type Listener = (event: RaffleEvent) => void;

export const DEFAULT_EVENT_HISTORY = 1000;

/**
 * Notification log for Entered / DrawRequested / WinnerPicked, keeping the
 * most recent `maxEntries` events.
 * Listeners run synchronously after the event is appended; a throwing
 * listener is logged and does not affect the operation that emitted.
 */
export class RaffleEventLog {
  private readonly entries: RaffleEvent[] = [];
  private readonly listeners = new Map<RaffleEventType | "*", Set<Listener>>();

  constructor(private readonly maxEntries: number = DEFAULT_EVENT_HISTORY) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new Error(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
  }

  emit(event: RaffleEvent): void {
    this.entries.push(Object.freeze({ ...event }));
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }

    for (const key of [event.type, "*"] as const) {
      for (const listener of this.listeners.get(key) ?? []) {
        try {
          listener(event);
        } catch (err) {
          console.error(`❌ [EVENTS] ${event.type} listener failed:`, err);
        }
      }
    }
  }

  on<T extends RaffleEventType>(
    type: T,
    listener: (event: EventOf<T>) => void
  ): () => void {
    const wrapped: Listener = (event) => {
      if (isEventOf(event, type)) listener(event);
    };
    return this.subscribe(type, wrapped);
  }

  onAny(listener: (event: RaffleEvent) => void): () => void {
    return this.subscribe("*", listener);
  }

  list(type?: RaffleEventType): RaffleEvent[] {
    return type ? this.entries.filter((e) => e.type === type) : [...this.entries];
  }

  /**
   * Up to `limit` events in emission order, ending `offset` events before
   * the newest one.
   */
  recent(type: RaffleEventType | undefined, limit: number, offset: number = 0): RaffleEvent[] {
    const matching = this.list(type);
    const end = Math.max(0, matching.length - offset);
    return matching.slice(Math.max(0, end - limit), end);
  }

  get size(): number {
    return this.entries.length;
  }

  private subscribe(key: RaffleEventType | "*", listener: Listener): () => void {
    let set = this.listeners.get(key);
    if (!set) {
      set = new Set();
      this.listeners.set(key, set);
    }
    set.add(listener);
    return () => {
      set?.delete(listener);
    };
  }
}

function isEventOf<T extends RaffleEventType>(
  event: RaffleEvent,
  type: T
): event is EventOf<T> {
  return event.type === type;
}
