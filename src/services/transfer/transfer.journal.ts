/**
 * Transfer Journal
 *
 * Durable record of every external transfer and the state it reached.
 * Entries left STUCK are the unreconciled transfers an operator must settle
 * against the rail's history.
 */

import { v4 as uuidv4 } from 'uuid';

import {
  KeyValueStore,
  KeyValueStoreOptions,
  Codec,
  EncodedValue,
  readString,
  readAmount,
  readOptionalString,
} from '../../storage/keyValueStore';
import { unreconciledTransfers } from '../../observability/metrics';
import { Amount, EntityType, Principal } from '../../types/custody';
import { Result, ok } from '../../types/result';
import { TransferStatus, isTransferStatus, validateTransition } from './transfer.state';

export enum TransferKind {
  FUND_CAMPAIGN = 'FUND_CAMPAIGN',
  WITHDRAW_CAMPAIGN = 'WITHDRAW_CAMPAIGN',
  WITHDRAW_PROVIDER = 'WITHDRAW_PROVIDER',
}

export interface TransferRecord {
  transferId: string;
  kind: TransferKind;
  entityType: EntityType;
  entityId: string;
  owner: Principal;
  amount: Amount;
  fee: Amount;
  memo: string;
  /** nanoseconds, as sent to the rail */
  createdAtTime: bigint;
  status: TransferStatus;
  blockIndex?: bigint;
  reason?: string;
  createdAt: number;
  updatedAt: number;
}

export interface NewTransfer {
  kind: TransferKind;
  entityType: EntityType;
  entityId: string;
  owner: Principal;
  amount: Amount;
  fee: Amount;
  memo: string;
  createdAtTime: bigint;
}

const MAX_REASON_LENGTH = 200;

const IN_FLIGHT = new Set([
  TransferStatus.LOCKED,
  TransferStatus.MUTATION_APPLIED,
  TransferStatus.AWAITING_RAIL,
]);

const isTransferKind = (value: string): value is TransferKind =>
  Object.values<string>(TransferKind).includes(value);

const readNumber = (raw: EncodedValue, field: string): number => {
  const value = raw[field];
  if (typeof value !== 'number') {
    throw new Error(`Malformed stored value: "${field}" must be a number`);
  }
  return value;
};

const transferCodec: Codec<TransferRecord> = {
  encode: (record) => ({
    transferId: record.transferId,
    kind: record.kind,
    entityType: record.entityType,
    entityId: record.entityId,
    owner: record.owner,
    amount: record.amount.toString(),
    fee: record.fee.toString(),
    memo: record.memo,
    createdAtTime: record.createdAtTime.toString(),
    status: record.status,
    blockIndex: record.blockIndex === undefined ? null : record.blockIndex.toString(),
    reason: record.reason ?? null,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
  }),
  decode: (raw) => {
    const kind = readString(raw, 'kind');
    const status = readString(raw, 'status');
    const entityType = readString(raw, 'entityType');
    if (!isTransferKind(kind) || !isTransferStatus(status)) {
      throw new Error(`Malformed stored transfer: kind ${kind}, status ${status}`);
    }
    if (entityType !== 'campaign' && entityType !== 'provider') {
      throw new Error(`Malformed stored transfer: entity type ${entityType}`);
    }
    const blockIndex = readOptionalString(raw, 'blockIndex');

    return {
      transferId: readString(raw, 'transferId'),
      kind,
      entityType,
      entityId: readString(raw, 'entityId'),
      owner: readString(raw, 'owner'),
      amount: readAmount(raw, 'amount'),
      fee: readAmount(raw, 'fee'),
      memo: readString(raw, 'memo'),
      createdAtTime: readAmount(raw, 'createdAtTime'),
      status,
      blockIndex: blockIndex === undefined ? undefined : BigInt(blockIndex),
      reason: readOptionalString(raw, 'reason'),
      createdAt: readNumber(raw, 'createdAt'),
      updatedAt: readNumber(raw, 'updatedAt'),
    };
  },
};

export class TransferJournal {
  readonly store: KeyValueStore<TransferRecord>;

  constructor(options: KeyValueStoreOptions = {}) {
    this.store = new KeyValueStore('transfers', transferCodec, options);
  }

  get(transferId: string): TransferRecord | undefined {
    return this.store.get(transferId);
  }

  /**
   * Open an entry for a transfer whose entity lock has just been taken
   */
  open(transfer: NewTransfer): Result<TransferRecord> {
    const now = Date.now();
    const record: TransferRecord = {
      ...transfer,
      transferId: uuidv4(),
      status: TransferStatus.IDLE,
      createdAt: now,
      updatedAt: now,
    };
    return this.transition(record, TransferStatus.LOCKED);
  }

  /**
   * Move an entry to its next state. Throws InvalidTransitionError on an
   * illegal move.
   */
  transition(
    record: TransferRecord,
    status: TransferStatus,
    details: { blockIndex?: bigint; reason?: string } = {}
  ): Result<TransferRecord> {
    validateTransition(record.status, status, record.transferId);

    const updated: TransferRecord = {
      ...record,
      ...details,
      reason: details.reason?.slice(0, MAX_REASON_LENGTH) ?? record.reason,
      status,
      updatedAt: Date.now(),
    };
    const written = this.store.set(updated.transferId, updated);
    if (!written.ok) {
      return written;
    }

    if (status === TransferStatus.STUCK) {
      this.refreshMetrics();
    }
    return ok(updated);
  }

  /**
   * Flag the entries a previous process left in flight. Whether their rail
   * call went out is unknown, so they join the unreconciled transfers.
   */
  markInterrupted(reason: string): Result<TransferRecord[]> {
    const interrupted: TransferRecord[] = [];
    for (const record of this.store.values()) {
      if (!IN_FLIGHT.has(record.status)) continue;

      const moved = this.transition(record, TransferStatus.STUCK, { reason });
      if (!moved.ok) return moved;
      interrupted.push(moved.value);
    }
    this.refreshMetrics();
    return ok(interrupted);
  }

  /**
   * STUCK transfers of one owner, oldest first
   */
  listUnreconciled(owner: Principal): TransferRecord[] {
    return this.stuck()
      .filter((record) => record.owner === owner)
      .sort((a, b) => a.createdAt - b.createdAt);
  }

  countUnreconciled(): number {
    return this.stuck().length;
  }

  refreshMetrics(): void {
    unreconciledTransfers.set(this.countUnreconciled());
  }

  private stuck(): TransferRecord[] {
    return this.store.values().filter((record) => record.status === TransferStatus.STUCK);
  }
}
