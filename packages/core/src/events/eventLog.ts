import { DEFAULT_EVENT_CAPACITY, type PetEvent } from './types';

export class EventLog {
  readonly capacity: number;
  private readonly slots: Array<PetEvent | undefined>;
  // Index of the oldest retained event.
  private head = 0;
  private count = 0;

  constructor(capacity: number = DEFAULT_EVENT_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`EventLog capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.slots = new Array<PetEvent | undefined>(capacity).fill(undefined);
  }

  /** Rebuilds a log from stored events, keeping only the newest `capacity` of them. */
  static from(events: ReadonlyArray<PetEvent>, capacity: number = DEFAULT_EVENT_CAPACITY): EventLog {
    const log = new EventLog(capacity);
    for (const event of events.slice(-capacity)) {
      log.append(event);
    }
    return log;
  }

  get size(): number {
    return this.count;
  }

  append(event: PetEvent): void {
    const tail = (this.head + this.count) % this.capacity;
    this.slots[tail] = { ts: event.ts, kind: event.kind, meta: { ...event.meta } };
    if (this.count < this.capacity) {
      this.count += 1;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  recent(n: number): PetEvent[] {
    const take = Math.max(0, Math.min(Math.floor(n), this.count));
    const result: PetEvent[] = [];
    for (let offset = this.count - take; offset < this.count; offset += 1) {
      const event = this.slots[(this.head + offset) % this.capacity];
      if (event) {
        result.push({ ts: event.ts, kind: event.kind, meta: { ...event.meta } });
      }
    }
    return result;
  }

  toArray(): PetEvent[] {
    return this.recent(this.count);
  }
}
