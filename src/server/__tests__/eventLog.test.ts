import { describe, it, expect } from 'vitest';
import { EventLog } from '../eventLog.js';

describe('EventLog', () => {
  it('should number events in publish order', () => {
    const log = new EventLog();

    log.publish({ type: 'addresses_configured', caller: 'admin-1' });
    log.publish({ type: 'report_generated', generated_at: 5n });

    expect(log.getRecent().map((entry) => entry.sequence)).toEqual([1, 2]);
    expect(log.getRecent()[1]?.event).toEqual({ type: 'report_generated', generated_at: 5n });
  });

  it('should drop the oldest events beyond its capacity', () => {
    const log = new EventLog(2);

    log.publish({ type: 'report_generated', generated_at: 1n });
    log.publish({ type: 'report_generated', generated_at: 2n });
    log.publish({ type: 'report_generated', generated_at: 3n });

    expect(log.size()).toBe(2);
    expect(log.getRecent().map((entry) => entry.sequence)).toEqual([2, 3]);
  });

  it('should return the newest events for a count', () => {
    const log = new EventLog();
    for (let i = 1n; i <= 4n; i++) {
      log.publish({ type: 'report_generated', generated_at: i });
    }

    expect(log.getRecent(2).map((entry) => entry.sequence)).toEqual([3, 4]);
    expect(log.getRecent(0)).toEqual([]);
  });

  it('should keep numbering after clear', () => {
    const log = new EventLog();
    log.publish({ type: 'report_generated', generated_at: 1n });
    log.clear();

    const next = log.publish({ type: 'report_generated', generated_at: 2n });

    expect(log.size()).toBe(1);
    expect(next.sequence).toBe(2);
  });
});
