/**
 * Custody composition root
 *
 * Builds the stores, the rail transport and the services over them, and
 * ties the stores to a snapshot store. Usable on its own as a library or
 * behind the HTTP app.
 */

import { config } from './config';
import { RailMode } from './config/environments';
import { createServiceLogger } from './observability/logger';
import { CustodyPersistence } from './storage/persistence';
import { MemorySnapshotStore, MongoSnapshotStore, SnapshotStore } from './storage/snapshotStore';
import { Account, Amount } from './types/custody';
import { BalanceLedger } from './services/balance/balance.ledger';
import { EarningsRegistry } from './services/earnings/earnings.registry';
import { QueryService } from './services/query/query.service';
import { LedgerGateway } from './services/rail/rail.gateway';
import { HttpRailClient } from './services/rail/rail.http';
import { SimulatedRail } from './services/rail/rail.simulation';
import { RailClient } from './services/rail/rail.types';
import { EntityLockTable } from './services/transfer/entity.lock';
import { TransferJournal } from './services/transfer/transfer.journal';
import { TransferCoordinator } from './services/transfer/transfer.service';

const log = createServiceLogger('custody');

export interface CustodyOptions {
  /** Defaults to the configured rail: simulated in test/development */
  rail?: RailClient;
  /** Defaults to MongoDB, or memory when PERSISTENCE=memory and in tests */
  snapshotStore?: SnapshotStore;
  fee?: Amount;
  timeoutMs?: number;
  custodyAccount?: Account;
  maxValueBytes?: number;
}

export interface Custody {
  ledger: BalanceLedger;
  earnings: EarningsRegistry;
  journal: TransferJournal;
  locks: EntityLockTable;
  gateway: LedgerGateway;
  coordinator: TransferCoordinator;
  queries: QueryService;
  persistence: CustodyPersistence;
  railMode: RailMode;
  /** Set when the rail is the in-process simulation */
  simulatedRail: SimulatedRail | null;
  /** Restore the last snapshot. Call once, before serving requests. */
  start(): Promise<void>;
  /** Wait for pending snapshot writes */
  stop(): Promise<void>;
}

const defaultRail = (fee: Amount, timeoutMs: number): RailClient =>
  config.rail.mode === 'simulated'
    ? new SimulatedRail(fee)
    : new HttpRailClient({ url: config.rail.url, timeoutMs });

const defaultSnapshotStore = (): SnapshotStore =>
  config.persistence === 'memory'
    ? new MemorySnapshotStore()
    : new MongoSnapshotStore(config.storage.snapshotKey);

export const createCustody = (options: CustodyOptions = {}): Custody => {
  const fee = options.fee ?? config.rail.transferFee;
  const timeoutMs = options.timeoutMs ?? config.rail.timeoutMs;
  const storeOptions = { maxValueBytes: options.maxValueBytes ?? config.storage.maxValueBytes };

  const rail = options.rail ?? defaultRail(fee, timeoutMs);
  const simulatedRail = rail instanceof SimulatedRail ? rail : null;

  const ledger = new BalanceLedger(storeOptions);
  const earnings = new EarningsRegistry(storeOptions);
  const journal = new TransferJournal(storeOptions);
  const locks = new EntityLockTable();
  const gateway = new LedgerGateway(rail, { timeoutMs });

  const persistence = new CustodyPersistence(options.snapshotStore ?? defaultSnapshotStore());
  persistence.register(ledger.campaigns);
  persistence.register(ledger.providers);
  persistence.register(earnings.store);
  persistence.register(journal.store);

  const coordinator = new TransferCoordinator({
    ledger,
    earnings,
    journal,
    locks,
    gateway,
    custodyAccount: options.custodyAccount ?? config.rail.custodyAccount,
    fee,
  });
  const queries = new QueryService(ledger, earnings, journal);

  return {
    ledger,
    earnings,
    journal,
    locks,
    gateway,
    coordinator,
    queries,
    persistence,
    railMode: simulatedRail ? 'simulated' : 'http',
    simulatedRail,

    async start(): Promise<void> {
      await persistence.restore();

      const interrupted = journal.markInterrupted('interrupted by restart; verify against the rail');
      if (!interrupted.ok) {
        throw new Error('Failed to flag transfers interrupted by the restart', { cause: interrupted.error });
      }
      for (const record of interrupted.value) {
        log.warn(
          { transferId: record.transferId, memo: record.memo, entity: `${record.entityType}:${record.entityId}` },
          'Transfer was in flight at shutdown, marked STUCK'
        );
      }
      log.info(
        {
          campaigns: ledger.campaigns.size,
          providers: ledger.providers.size,
          unreconciled: journal.countUnreconciled(),
          rail: simulatedRail ? 'simulated' : 'http',
        },
        'Custody ready'
      );
    },

    async stop(): Promise<void> {
      await persistence.flush();
    },
  };
};
