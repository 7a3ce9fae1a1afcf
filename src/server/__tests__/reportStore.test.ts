import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ReportStore, type StateTransaction } from '../reportStore.js';
import { EventLog } from '../eventLog.js';
import { OWNER, TEST_ADDRESSES, buildReport } from '../../__tests__/testUtils.js';

describe('ReportStore', () => {
  describe('transactions', () => {
    it('should commit state and events when the work resolves', async () => {
      const eventLog = new EventLog();
      const store = new ReportStore({ eventLog });

      await store.transaction(async (tx) => {
        tx.setAdmin('admin-1');
        tx.putReport(OWNER, 7n, buildReport());
        tx.emit({ type: 'report_stored', owner: OWNER, period_key: 7n });
      });

      expect(store.getStats()).toEqual({ reportCount: 1, hasAdmin: true, hasAddresses: false });
      expect(eventLog.getRecent().map((entry) => entry.event.type)).toEqual(['report_stored']);
    });

    it('should leave nothing behind when the work throws', async () => {
      const store = new ReportStore();

      await expect(
        store.transaction(async (tx) => {
          tx.setAdmin('admin-1');
          tx.setAddresses(TEST_ADDRESSES);
          tx.emit({ type: 'addresses_configured', caller: 'admin-1' });
          throw new Error('collaborator down');
        }),
      ).rejects.toThrow('collaborator down');

      expect(store.getStats()).toEqual({ reportCount: 0, hasAdmin: false, hasAddresses: false });
      expect(store.getEventLog().size()).toBe(0);
    });

    it('should keep stored reports isolated from caller mutation', async () => {
      const store = new ReportStore();
      const report = buildReport();
      await store.transaction(async (tx) => tx.putReport(OWNER, 1n, report));

      report.health_score.score = 0;
      const loaded = await store.transaction(async (tx) => tx.getReport(OWNER, 1n));

      expect(loaded?.health_score.score).toBe(60);
    });

    it('should key reports by owner and period', async () => {
      const store = new ReportStore();
      await store.transaction(async (tx) => {
        tx.putReport(OWNER, 1n, buildReport(1n));
        tx.putReport('owner-b', 1n, buildReport(2n));
      });

      const [mine, theirs, missing] = await store.transaction(async (tx) => [
        tx.getReport(OWNER, 1n),
        tx.getReport('owner-b', 1n),
        tx.getReport(OWNER, 2n),
      ]);

      expect(mine?.generated_at).toBe(1n);
      expect(theirs?.generated_at).toBe(2n);
      expect(missing).toBeUndefined();
    });

    it('should run transactions one at a time', async () => {
      const store = new ReportStore();
      const order: string[] = [];
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });

      const first = store.transaction(async () => {
        order.push('first:start');
        await gate;
        order.push('first:end');
      });
      const second = store.transaction(async () => {
        order.push('second');
      });

      await Promise.resolve();
      release();
      await Promise.all([first, second]);

      expect(order).toEqual(['first:start', 'first:end', 'second']);
    });

    it('should keep serving after a failed transaction', async () => {
      const store = new ReportStore();
      const failed = store.transaction(async () => {
        throw new Error('boom');
      });
      const next = store.transaction(async (tx) => {
        tx.setAdmin('admin-1');
        return 'ok';
      });

      await expect(failed).rejects.toThrow('boom');
      await expect(next).resolves.toBe('ok');
    });

    it('should refuse use of a handle after its transaction ends', async () => {
      const store = new ReportStore();
      let leaked: StateTransaction | undefined;

      await store.transaction(async (tx) => {
        leaked = tx;
      });

      expect(() => leaked?.getAdmin()).toThrow('Transaction is no longer active');
    });
  });

  describe('snapshots', () => {
    let dir: string;
    let file: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'reporting-store-'));
      file = path.join(dir, 'state', 'reporting.json');
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should start empty when the file does not exist', () => {
      const store = new ReportStore({ snapshotFile: file });

      expect(store.getStats()).toEqual({ reportCount: 0, hasAdmin: false, hasAddresses: false });
      expect(fs.existsSync(file)).toBe(false);
    });

    it('should persist committed state and load it again', async () => {
      const store = new ReportStore({ snapshotFile: file });
      await store.transaction(async (tx) => {
        tx.setAdmin('admin-1');
        tx.setAddresses(TEST_ADDRESSES);
        tx.putReport(OWNER, 202401n, buildReport(99n));
      });

      const reloaded = new ReportStore({ snapshotFile: file });
      const state = await reloaded.transaction(async (tx) => ({
        admin: tx.getAdmin(),
        addresses: tx.getAddresses(),
        report: tx.getReport(OWNER, 202401n),
      }));

      expect(state).toEqual({
        admin: 'admin-1',
        addresses: TEST_ADDRESSES,
        report: buildReport(99n),
      });
    });

    it('should write amounts as decimal strings', async () => {
      const store = new ReportStore({ snapshotFile: file });
      await store.transaction(async (tx) => tx.putReport(OWNER, 5n, buildReport(42n)));

      const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));

      expect(raw).toMatchObject({
        version: 1,
        admin: null,
        addresses: null,
        reports: [{ owner: OWNER, period_key: '5', report: { generated_at: '42' } }],
      });
    });

    it('should not write for read-only transactions', async () => {
      const store = new ReportStore({ snapshotFile: file });
      await store.transaction(async (tx) => tx.getAdmin());

      expect(fs.existsSync(file)).toBe(false);
    });

    it('should reject an invalid state file', () => {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, JSON.stringify({ version: 2 }), 'utf8');

      expect(() => new ReportStore({ snapshotFile: file })).toThrow(
        `Reporting state file ${file} is invalid`,
      );
    });
  });
});
