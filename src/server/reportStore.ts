/**
 * ReportStore
 *
 * Holds the reporting state: the admin identity, the collaborator address
 * record and stored reports keyed by (owner, period key).
 *
 * Every operation runs inside `transaction()`. Transactions are serialized, work
 * against a draft copy of the state, and either commit the draft plus their
 * events as a whole or leave nothing behind. When a snapshot file is configured
 * the draft is written to disk before the in-memory commit, so a failed write
 * also aborts the transaction.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { financialHealthReportSchema, u64Schema } from '../tools/reporting/schemas.js';
import type {
  CollaboratorAddresses,
  FinancialHealthReport,
  ReportEvent,
} from '../tools/reporting/types.js';
import { EventLog } from './eventLog.js';

export interface StoredReportEntry {
  owner: string;
  period_key: bigint;
  report: FinancialHealthReport;
}

export interface StateTransaction {
  getAdmin(): string | undefined;
  setAdmin(admin: string): void;
  getAddresses(): CollaboratorAddresses | undefined;
  setAddresses(addresses: CollaboratorAddresses): void;
  getReport(owner: string, periodKey: bigint): FinancialHealthReport | undefined;
  putReport(owner: string, periodKey: bigint, report: FinancialHealthReport): void;
  emit(event: ReportEvent): void;
}

export interface ReportStoreOptions {
  eventLog?: EventLog;
  snapshotFile?: string;
}

interface ReportingState {
  admin: string | undefined;
  addresses: CollaboratorAddresses | undefined;
  reports: Map<string, StoredReportEntry>;
}

const SNAPSHOT_VERSION = 1;

const snapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  admin: z.string().min(1).nullable(),
  addresses: z
    .object({
      remittance_split: z.string().min(1),
      savings_goals: z.string().min(1),
      bill_payments: z.string().min(1),
      insurance: z.string().min(1),
      family_wallet: z.string().min(1),
    })
    .nullable(),
  reports: z.array(
    z.object({
      owner: z.string().min(1),
      period_key: u64Schema,
      report: financialHealthReportSchema,
    }),
  ),
});

const reportKey = (owner: string, periodKey: bigint): string =>
  JSON.stringify([owner, periodKey.toString()]);

export class ReportStore {
  private state: ReportingState;
  private queue: Promise<unknown> = Promise.resolve();
  private readonly eventLog: EventLog;
  private readonly snapshotFile: string | undefined;

  constructor(options: ReportStoreOptions = {}) {
    this.eventLog = options.eventLog ?? new EventLog();
    this.snapshotFile = options.snapshotFile;
    this.state = this.snapshotFile
      ? ReportStore.loadSnapshot(this.snapshotFile)
      : { admin: undefined, addresses: undefined, reports: new Map() };
  }

  getEventLog(): EventLog {
    return this.eventLog;
  }

  /**
   * Runs `work` against a private draft of the state. The draft and any
   * emitted events are committed only if `work` resolves.
   */
  transaction<T>(work: (tx: StateTransaction) => Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.execute(work));
    // The caller observes failures through `run`; the queue only needs ordering.
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  getStats(): { reportCount: number; hasAdmin: boolean; hasAddresses: boolean } {
    return {
      reportCount: this.state.reports.size,
      hasAdmin: this.state.admin !== undefined,
      hasAddresses: this.state.addresses !== undefined,
    };
  }

  private async execute<T>(work: (tx: StateTransaction) => Promise<T>): Promise<T> {
    const draft: ReportingState = {
      admin: this.state.admin,
      addresses: this.state.addresses,
      reports: new Map(this.state.reports),
    };
    const pendingEvents: ReportEvent[] = [];
    let dirty = false;
    let open = true;

    const ensureOpen = (): void => {
      if (!open) {
        throw new Error('Transaction is no longer active');
      }
    };

    const tx: StateTransaction = {
      getAdmin: () => {
        ensureOpen();
        return draft.admin;
      },
      setAdmin: (admin) => {
        ensureOpen();
        draft.admin = admin;
        dirty = true;
      },
      getAddresses: () => {
        ensureOpen();
        return draft.addresses ? { ...draft.addresses } : undefined;
      },
      setAddresses: (addresses) => {
        ensureOpen();
        draft.addresses = { ...addresses };
        dirty = true;
      },
      getReport: (owner, periodKey) => {
        ensureOpen();
        const entry = draft.reports.get(reportKey(owner, periodKey));
        return entry ? structuredClone(entry.report) : undefined;
      },
      putReport: (owner, periodKey, report) => {
        ensureOpen();
        draft.reports.set(reportKey(owner, periodKey), {
          owner,
          period_key: periodKey,
          report: structuredClone(report),
        });
        dirty = true;
      },
      emit: (event) => {
        ensureOpen();
        pendingEvents.push(event);
      },
    };

    try {
      const result = await work(tx);
      if (dirty && this.snapshotFile) {
        this.writeSnapshot(this.snapshotFile, draft);
      }
      this.state = draft;
      for (const event of pendingEvents) {
        this.eventLog.publish(event);
      }
      return result;
    } finally {
      open = false;
    }
  }

  private static loadSnapshot(file: string): ReportingState {
    if (!fs.existsSync(file)) {
      return { admin: undefined, addresses: undefined, reports: new Map() };
    }

    const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
    const parsed = snapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Reporting state file ${file} is invalid: ${parsed.error.message}`);
    }

    const reports = new Map<string, StoredReportEntry>();
    for (const entry of parsed.data.reports) {
      reports.set(reportKey(entry.owner, entry.period_key), entry);
    }

    return {
      admin: parsed.data.admin ?? undefined,
      addresses: parsed.data.addresses ?? undefined,
      reports,
    };
  }

  private writeSnapshot(file: string, state: ReportingState): void {
    const snapshot = {
      version: SNAPSHOT_VERSION,
      admin: state.admin ?? null,
      addresses: state.addresses ?? null,
      reports: Array.from(state.reports.values()),
    };
    const text = JSON.stringify(
      snapshot,
      (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value),
      2,
    );

    fs.mkdirSync(path.dirname(file), { recursive: true });
    const tmp = `${file}.tmp`;
    fs.writeFileSync(tmp, text, 'utf8');
    fs.renameSync(tmp, file);
  }
}
