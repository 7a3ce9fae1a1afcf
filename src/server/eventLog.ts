/**
 * Bounded log of reporting events. Events reach it only when the transaction
 * that raised them commits.
 */

import type { ReportEvent } from '../tools/reporting/types.js';

export interface RecordedEvent {
  sequence: number;
  recorded_at: Date;
  event: ReportEvent;
}

export class EventLog {
  private entries: RecordedEvent[] = [];
  private nextSequence = 1;

  constructor(private readonly maxEntries: number = 500) {}

  publish(event: ReportEvent): RecordedEvent {
    const recorded: RecordedEvent = {
      sequence: this.nextSequence++,
      recorded_at: new Date(),
      event,
    };

    this.entries.push(recorded);
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }

    return recorded;
  }

  /**
   * Most recent events, oldest first
   */
  getRecent(count: number = 50): RecordedEvent[] {
    return count <= 0 ? [] : this.entries.slice(-count);
  }

  size(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries = [];
  }
}
