/**
 * Simulated Rail
 *
 * In-process ledger used in test and development. Keeps account balances,
 * nets the fee out of every transfer, numbers blocks, deduplicates by
 * creation time, and can be told to fail in the ways a real rail fails.
 */

import { config } from '../../config';
import { createServiceLogger } from '../../observability/logger';
import { Account, Amount, RailRejection, TransferRequest } from '../../types/custody';
import { RailClient, RailReply, RailTransportError, accountKey, memoText } from './rail.types';

const log = createServiceLogger('rail-simulation');

/** Requests older than this are refused as TooOld */
const TRANSACTION_WINDOW_NS = 24n * 60n * 60n * 1_000_000_000n;
/** Clock skew tolerated before a request counts as created in the future */
const PERMITTED_DRIFT_NS = 60n * 1_000_000_000n;

export type FailureType = 'REJECT' | 'TRANSPORT' | 'TIMEOUT';

export type RejectionCode = RailRejection['code'];

export const REJECTION_CODES: readonly RejectionCode[] = [
  'InsufficientFunds',
  'BadFee',
  'TooOld',
  'CreatedInFuture',
  'Duplicate',
  'TemporarilyUnavailable',
  'GenericError',
];

export interface FailureSimulationConfig {
  enabled: boolean;
  failureRate: number; // 0-1, share of transfers that should fail
  failMemos: Set<string>; // Transfers whose memo is listed always fail
  failureType: FailureType;
  rejectionCode: RejectionCode;
  /** TRANSPORT and TIMEOUT only: move the value before failing the call */
  applyBeforeFailure: boolean;
}

export interface SimulatedBlock {
  index: bigint;
  from: string;
  to: string;
  amount: Amount;
  fee: Amount;
  memo: string;
  createdAtTime?: bigint;
}

export class SimulatedTransportError extends RailTransportError {
  constructor(memo: string) {
    super(`simulated transport failure for "${memo}"`);
    this.name = 'SimulatedTransportError';
  }
}

const defaultConfig = (): FailureSimulationConfig => ({
  enabled: false,
  failureRate: 0,
  failMemos: new Set(),
  failureType: 'TRANSPORT',
  rejectionCode: 'TemporarilyUnavailable',
  applyBeforeFailure: false,
});

const nowNanos = (): bigint => BigInt(Date.now()) * 1_000_000n;

export class SimulatedRail implements RailClient {
  private config: FailureSimulationConfig = defaultConfig();
  private readonly balances = new Map<string, Amount>();
  private readonly blocks: SimulatedBlock[] = [];
  private readonly seen = new Map<string, bigint>();

  constructor(private readonly fee: Amount) {}

  /**
   * Check if simulation should be allowed based on environment
   */
  static isAllowed(): boolean {
    return config.isTest || config.isDevelopment;
  }

  // ===========================================================================
  // LEDGER
  // ===========================================================================

  async submitTransfer(request: TransferRequest): Promise<RailReply> {
    // Replies always arrive on a later turn, like a network call
    await new Promise<void>((resolve) => setImmediate(resolve));

    const memo = memoText(request.memo);
    if (!this.shouldFail(memo)) {
      return this.apply(request);
    }

    switch (this.config.failureType) {
      case 'REJECT':
        log.info({ memo, code: this.config.rejectionCode }, 'Simulating rejection');
        return { Err: this.buildRejection(request) };
      case 'TRANSPORT':
        if (this.config.applyBeforeFailure) {
          this.apply(request);
        }
        log.info({ memo, applied: this.config.applyBeforeFailure }, 'Simulating transport failure');
        throw new SimulatedTransportError(memo);
      case 'TIMEOUT':
        if (this.config.applyBeforeFailure) {
          this.apply(request);
        }
        log.info({ memo, applied: this.config.applyBeforeFailure }, 'Simulating a hung call');
        return new Promise<RailReply>(() => undefined);
    }
  }

  /**
   * Credit an account out of thin air, e.g. a funder's wallet
   */
  mint(account: Account, amount: Amount): void {
    const key = accountKey(account);
    this.balances.set(key, this.balanceOf(account) + amount);
    log.info({ account: key, amount: amount.toString() }, 'Minted simulated funds');
  }

  balanceOf(account: Account): Amount {
    return this.balances.get(accountKey(account)) ?? 0n;
  }

  getBlocks(): SimulatedBlock[] {
    return [...this.blocks];
  }

  private apply(request: TransferRequest): RailReply {
    const memo = memoText(request.memo);
    const from = accountKey(request.source);
    const to = accountKey(request.destination);

    if (request.fee !== this.fee) {
      return { Err: { code: 'BadFee', expectedFee: this.fee } };
    }

    const createdAt = request.createdAtTime;
    let dedupKey: string | undefined;
    if (createdAt !== undefined) {
      const now = nowNanos();
      if (createdAt + TRANSACTION_WINDOW_NS < now) {
        return { Err: { code: 'TooOld' } };
      }
      if (createdAt > now + PERMITTED_DRIFT_NS) {
        return { Err: { code: 'CreatedInFuture', ledgerTime: now } };
      }
      dedupKey = [from, to, request.amount, request.fee, memo, createdAt].join('|');
      const duplicateOf = this.seen.get(dedupKey);
      if (duplicateOf !== undefined) {
        return { Err: { code: 'Duplicate', duplicateOf } };
      }
    }

    if (request.amount <= request.fee) {
      return { Err: { code: 'GenericError', errorCode: 1n, message: 'amount does not cover the fee' } };
    }

    const balance = this.balances.get(from) ?? 0n;
    if (balance < request.amount) {
      return { Err: { code: 'InsufficientFunds', balance } };
    }

    this.balances.set(from, balance - request.amount);
    this.balances.set(to, (this.balances.get(to) ?? 0n) + request.amount - request.fee);

    const index = BigInt(this.blocks.length);
    this.blocks.push({ index, from, to, amount: request.amount, fee: request.fee, memo, createdAtTime: createdAt });
    if (dedupKey !== undefined) {
      this.seen.set(dedupKey, index);
    }

    return { Ok: index };
  }

  private buildRejection(request: TransferRequest): RailRejection {
    switch (this.config.rejectionCode) {
      case 'InsufficientFunds':
        return { code: 'InsufficientFunds', balance: this.balanceOf(request.source) };
      case 'BadFee':
        return { code: 'BadFee', expectedFee: this.fee };
      case 'TooOld':
        return { code: 'TooOld' };
      case 'CreatedInFuture':
        return { code: 'CreatedInFuture', ledgerTime: nowNanos() };
      case 'Duplicate':
        return { code: 'Duplicate', duplicateOf: BigInt(Math.max(this.blocks.length - 1, 0)) };
      case 'TemporarilyUnavailable':
        return { code: 'TemporarilyUnavailable' };
      case 'GenericError':
        return { code: 'GenericError', errorCode: 500n, message: 'simulated rail error' };
    }
  }

  // ===========================================================================
  // FAILURE SIMULATION
  // ===========================================================================

  /**
   * Enable failure simulation. Omitted fields keep their current values.
   */
  enable(options: Partial<Omit<FailureSimulationConfig, 'enabled'>> = {}): void {
    if (!SimulatedRail.isAllowed()) {
      log.warn('Simulation not allowed in this environment');
      return;
    }

    this.config = {
      enabled: true,
      failureRate: options.failureRate ?? this.config.failureRate,
      failMemos: options.failMemos ?? this.config.failMemos,
      failureType: options.failureType ?? this.config.failureType,
      rejectionCode: options.rejectionCode ?? this.config.rejectionCode,
      applyBeforeFailure: options.applyBeforeFailure ?? this.config.applyBeforeFailure,
    };

    log.info(this.getConfig(), 'Failure simulation enabled');
  }

  /**
   * Disable failure simulation and clear the memo list
   */
  disable(): void {
    this.config.enabled = false;
    this.config.failMemos.clear();
    log.info('Failure simulation disabled');
  }

  addFailingMemos(memos: string[]): void {
    if (!SimulatedRail.isAllowed()) {return;}

    memos.forEach((memo) => this.config.failMemos.add(memo));
  }

  getConfig(): Omit<FailureSimulationConfig, 'failMemos'> & { failMemos: string[] } {
    return {
      ...this.config,
      failMemos: Array.from(this.config.failMemos),
    };
  }

  shouldFail(memo: string): boolean {
    if (!this.config.enabled) {
      return false;
    }

    if (this.config.failMemos.has(memo)) {
      return true;
    }

    return this.config.failureRate > 0 && Math.random() < this.config.failureRate;
  }

  /**
   * Reset failure simulation to defaults. Balances and blocks are kept.
   */
  reset(): void {
    this.config = defaultConfig();
    log.info('Failure simulation reset to defaults');
  }
}
