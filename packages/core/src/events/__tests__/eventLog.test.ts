import { describe, expect, it } from 'vitest';
import { EventLog } from '../eventLog';
import type { PetEvent } from '../types';

const event = (ts: number): PetEvent => ({ ts, kind: 'SYSTEM', meta: { n: ts } });

describe('EventLog', () => {
  it('keeps only the newest events once full', () => {
    const log = new EventLog(3);
    for (let ts = 1; ts <= 5; ts += 1) {
      log.append(event(ts));
    }

    expect(log.size).toBe(3);
    expect(log.toArray().map((entry) => entry.ts)).toEqual([3, 4, 5]);
    expect(log.recent(2).map((entry) => entry.ts)).toEqual([4, 5]);
    expect(log.recent(0)).toEqual([]);
    expect(log.recent(10)).toHaveLength(3);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new EventLog(0)).toThrow(RangeError);
    expect(() => new EventLog(2.5)).toThrow(RangeError);
  });

  it('stores copies of appended events', () => {
    const log = new EventLog(2);
    const original = event(1);
    log.append(original);
    original.meta.n = 99;

    const [stored] = log.toArray();
    stored.meta.n = 42;

    expect(log.toArray()[0].meta).toEqual({ n: 1 });
  });

  it('rebuilds from stored events keeping the newest', () => {
    const log = EventLog.from([event(1), event(2), event(3)], 2);

    expect(log.toArray().map((entry) => entry.ts)).toEqual([2, 3]);
  });
});
