/**
 * Transfer Coordinator
 *
 * Orchestrates transfers that cross the rail (funding and withdrawals) and
 * internal payments from a campaign to a provider.
 *
 * External transfers hold the entity lock from LOCKED until a terminal
 * state. Outgoing value is debited before the rail call and only given back
 * on an explicit rejection; incoming value is credited only after the rail
 * confirms. An unknown outcome leaves the balance as it stands and flags
 * the transfer STUCK for reconciliation. Nothing is ever retried.
 */

import { createServiceLogger, addLogContext } from '../../observability';
import { transfersTotal } from '../../observability/metrics';
import {
  Account,
  Amount,
  Campaign,
  EntityRef,
  Principal,
  Provider,
  ProviderEarnings,
  describeRejection,
} from '../../types/custody';
import { CustodyError, Result, ok, err, notFound, insufficientFunds } from '../../types/result';
import { BalanceLedger } from '../balance/balance.ledger';
import { EarningsRegistry } from '../earnings/earnings.registry';
import { requireOwner } from '../custody/ownership.guard';
import { LedgerGateway } from '../rail/rail.gateway';
import { EntityLockTable, lockKey } from './entity.lock';
import { TransferJournal, TransferKind, TransferRecord } from './transfer.journal';
import { TransferStatus } from './transfer.state';

const log = createServiceLogger('transfer-coordinator');

export interface TransferCoordinatorDeps {
  ledger: BalanceLedger;
  earnings: EarningsRegistry;
  journal: TransferJournal;
  locks: EntityLockTable;
  gateway: LedgerGateway;
  /** Custody's own account on the rail */
  custodyAccount: Account;
  /** Fixed rail fee, netted out of every external transfer */
  fee: Amount;
}

export interface ExternalTransferResult {
  transferId: string;
  blockIndex: bigint;
}

export interface FundResult extends ExternalTransferResult {
  /** What actually reached custody: amount minus the rail fee */
  credited: Amount;
}

export interface PaymentResult {
  campaign: Campaign;
  provider: Provider;
  earnings: ProviderEarnings;
}

/**
 * Local effect of an outgoing transfer, applied before the rail call
 */
interface Debit {
  apply(): Result<unknown>;
  revert(): Result<unknown>;
}

interface ExternalTransfer {
  kind: TransferKind;
  entity: EntityRef;
  owner: Principal;
  amount: Amount;
  memo: string;
  source: Account;
  destination: Account;
  debit?: Debit;
  /** Local effect applied once the rail confirms */
  onConfirmed?: (record: TransferRecord) => Result<unknown>;
}

const entityRef = (type: EntityRef['type'], id: string): EntityRef => ({ type, id });

export class TransferCoordinator {
  private lastCreatedAtTime = 0n;

  constructor(private readonly deps: TransferCoordinatorDeps) {}

  /**
   * Nanosecond creation time for a rail request. The rail deduplicates on
   * it, so two identical transfers in the same millisecond still get
   * distinct values.
   */
  nextCreatedAtTime(): bigint {
    const now = BigInt(Date.now()) * 1_000_000n;
    this.lastCreatedAtTime = now > this.lastCreatedAtTime ? now : this.lastCreatedAtTime + 1n;
    return this.lastCreatedAtTime;
  }

  // ===========================================================================
  // EXTERNAL TRANSFERS
  // ===========================================================================

  /**
   * Move value from the caller's wallet into the campaign's budget. The
   * campaign is credited with what custody received, amount minus the fee.
   */
  async fundCampaign(campaignId: string, amount: Amount, caller: Principal): Promise<Result<FundResult>> {
    const { ledger, custodyAccount, fee } = this.deps;

    const valid = this.checkExternalAmount(amount);
    if (!valid.ok) return valid;

    const campaign = ledger.getCampaign(campaignId);
    if (!campaign) return err(notFound('campaign', campaignId));

    const owned = requireOwner(campaign.owner, caller, 'fund your own campaigns');
    if (!owned.ok) return owned;

    const credited = amount - fee;
    const result = await this.runExternal({
      kind: TransferKind.FUND_CAMPAIGN,
      entity: entityRef('campaign', campaignId),
      owner: caller,
      amount,
      memo: `Fund campaign: ${campaignId}`,
      source: { owner: caller },
      destination: custodyAccount,
      onConfirmed: () => ledger.creditCampaign(campaignId, credited),
    });

    return result.ok ? ok({ ...result.value, credited }) : result;
  }

  /**
   * Move value from a campaign's budget back to its owner's wallet
   */
  async withdrawCampaignFunds(
    campaignId: string,
    amount: Amount,
    caller: Principal
  ): Promise<Result<ExternalTransferResult>> {
    const { ledger, custodyAccount } = this.deps;

    const valid = this.checkExternalAmount(amount);
    if (!valid.ok) return valid;

    const campaign = ledger.getCampaign(campaignId);
    if (!campaign) return err(notFound('campaign', campaignId));

    const owned = requireOwner(campaign.owner, caller, 'withdraw from your own campaigns');
    if (!owned.ok) return owned;

    // Checked against the current budget, which already excludes in-flight debits
    if (campaign.budget < amount) return err(insufficientFunds(campaign.budget, amount));

    return this.runExternal({
      kind: TransferKind.WITHDRAW_CAMPAIGN,
      entity: entityRef('campaign', campaignId),
      owner: caller,
      amount,
      memo: `Campaign withdrawal: ${campaignId}`,
      source: custodyAccount,
      destination: { owner: caller },
      debit: {
        apply: () => ledger.debitCampaign(campaignId, amount),
        revert: () => ledger.creditCampaign(campaignId, amount),
      },
    });
  }

  /**
   * Move a provider's earnings to its owner's wallet. A committed withdrawal
   * stamps lastWithdrawal on every earnings record of the provider.
   */
  async withdrawProviderEarnings(
    providerId: string,
    amount: Amount,
    caller: Principal
  ): Promise<Result<ExternalTransferResult>> {
    const { ledger, earnings, custodyAccount } = this.deps;

    const valid = this.checkExternalAmount(amount);
    if (!valid.ok) return valid;

    const provider = ledger.getProvider(providerId);
    if (!provider) return err(notFound('provider', providerId));

    const owned = requireOwner(provider.owner, caller, 'withdraw from your own provider account');
    if (!owned.ok) return owned;

    if (provider.totalEarnings < amount) return err(insufficientFunds(provider.totalEarnings, amount));

    return this.runExternal({
      kind: TransferKind.WITHDRAW_PROVIDER,
      entity: entityRef('provider', providerId),
      owner: caller,
      amount,
      memo: `Provider withdrawal: ${providerId}`,
      source: custodyAccount,
      destination: { owner: caller },
      debit: {
        apply: () => ledger.debitProvider(providerId, amount),
        revert: () => ledger.creditProvider(providerId, amount),
      },
      onConfirmed: (record) => {
        const stamped = earnings.stampWithdrawal(providerId, Date.now());
        if (!stamped.ok) {
          // The value has left custody; a missing timestamp does not undo that
          log.error(
            { transferId: record.transferId, providerId, error: stamped.error },
            'Failed to stamp lastWithdrawal on provider earnings'
          );
        }
        return ok(undefined);
      },
    });
  }

  // ===========================================================================
  // INTERNAL TRANSFER
  // ===========================================================================

  /**
   * Pay a provider out of a campaign's budget. The campaign debit, the
   * provider credit and the earnings update apply together or not at all.
   */
  payProvider(
    campaignId: string,
    providerId: string,
    amount: Amount,
    caller: Principal
  ): Result<PaymentResult> {
    const { ledger, locks } = this.deps;

    if (amount <= 0n) {
      return err({ kind: 'InvalidAmount', message: 'Amount must be greater than zero' });
    }

    const campaign = ledger.getCampaign(campaignId);
    if (!campaign) return err(notFound('campaign', campaignId));

    const provider = ledger.getProvider(providerId);
    if (!provider) return err(notFound('provider', providerId));

    const owned = requireOwner(campaign.owner, caller, 'pay from your own campaigns');
    if (!owned.ok) return owned;

    if (campaign.budget < amount) return err(insufficientFunds(campaign.budget, amount));

    // Held only for the synchronous run below, so a pending external
    // transfer on either side refuses the payment
    const campaignRef = entityRef('campaign', campaignId);
    const providerRef = entityRef('provider', providerId);
    if (!locks.tryAcquire(campaignRef)) {
      return err({ kind: 'EntityBusy', entity: 'campaign', id: campaignId });
    }
    if (!locks.tryAcquire(providerRef)) {
      locks.release(campaignRef);
      return err({ kind: 'EntityBusy', entity: 'provider', id: providerId });
    }

    try {
      return this.applyPayment(campaignId, providerId, amount);
    } finally {
      locks.release(providerRef);
      locks.release(campaignRef);
    }
  }

  private applyPayment(campaignId: string, providerId: string, amount: Amount): Result<PaymentResult> {
    const { ledger, earnings } = this.deps;
    const undo: Array<{ step: string; run: () => Result<unknown> }> = [];

    const fail = (error: CustodyError): Result<PaymentResult> => {
      for (const applied of undo.reverse()) {
        const reverted = applied.run();
        if (!reverted.ok) {
          log.error(
            { campaignId, providerId, step: applied.step, error: reverted.error },
            'Failed to undo payment step'
          );
        }
      }
      log.warn({ campaignId, providerId, amount: amount.toString(), error }, 'Provider payment rolled back');
      return err(error);
    };

    const debited = ledger.debitCampaign(campaignId, amount);
    if (!debited.ok) return fail(debited.error);
    undo.push({ step: 'campaign debit', run: () => ledger.creditCampaign(campaignId, amount) });

    const credited = ledger.creditProvider(providerId, amount);
    if (!credited.ok) return fail(credited.error);
    undo.push({ step: 'provider credit', run: () => ledger.debitProvider(providerId, amount) });

    const recorded = earnings.record(providerId, campaignId, amount);
    if (!recorded.ok) return fail(recorded.error);

    log.info({ campaignId, providerId, amount: amount.toString() }, 'Provider paid');

    return ok({ campaign: debited.value, provider: credited.value, earnings: recorded.value });
  }

  // ===========================================================================
  // PROTOCOL
  // ===========================================================================

  private checkExternalAmount(amount: Amount): Result<void> {
    if (amount <= this.deps.fee) {
      return err({
        kind: 'InvalidAmount',
        message: `Amount must be greater than the rail fee of ${this.deps.fee}`,
      });
    }
    return ok(undefined);
  }

  /**
   * Run an external transfer from LOCKED to a terminal state. Pre-checks
   * are done by the caller; the lock is released whatever happens.
   */
  private async runExternal(transfer: ExternalTransfer): Promise<Result<ExternalTransferResult>> {
    const { locks, journal, gateway, fee } = this.deps;
    const { entity } = transfer;

    if (!locks.tryAcquire(entity)) {
      log.info({ entity }, 'Entity busy, transfer refused');
      return err({ kind: 'EntityBusy', entity: entity.type, id: entity.id });
    }

    try {
      const opened = journal.open({
        kind: transfer.kind,
        entityType: entity.type,
        entityId: entity.id,
        owner: transfer.owner,
        amount: transfer.amount,
        fee,
        memo: transfer.memo,
        createdAtTime: this.nextCreatedAtTime(),
      });
      if (!opened.ok) return opened;

      let record = opened.value;
      addLogContext({ transferId: record.transferId, entity: lockKey(transfer.entity) });

      if (transfer.debit) {
        const debited = transfer.debit.apply();
        if (!debited.ok) {
          this.settle(record, TransferStatus.ROLLED_BACK, { reason: 'local debit failed' });
          return debited;
        }
        record = this.advance(record, TransferStatus.MUTATION_APPLIED);
      }

      record = this.advance(record, TransferStatus.AWAITING_RAIL);

      const outcome = await gateway.transfer({
        source: transfer.source,
        destination: transfer.destination,
        amount: transfer.amount,
        fee,
        memo: Buffer.from(transfer.memo, 'utf8'),
        createdAtTime: record.createdAtTime,
      });

      switch (outcome.status) {
        case 'Confirmed': {
          const applied = transfer.onConfirmed ? transfer.onConfirmed(record) : ok(undefined);
          if (!applied.ok) {
            // Value moved on the rail but the local credit did not land
            this.settle(record, TransferStatus.STUCK, {
              blockIndex: outcome.blockIndex,
              reason: `confirmed at block ${outcome.blockIndex} but not credited locally`,
            });
            return applied;
          }
          this.settle(record, TransferStatus.COMMITTED, { blockIndex: outcome.blockIndex });
          return ok({ transferId: record.transferId, blockIndex: outcome.blockIndex });
        }

        case 'Rejected': {
          const reason = describeRejection(outcome.reason);
          if (transfer.debit) {
            const reverted = transfer.debit.revert();
            if (!reverted.ok) {
              this.settle(record, TransferStatus.STUCK, {
                reason: `rejected (${reason}) but the debit could not be reverted`,
              });
              return reverted;
            }
          }
          this.settle(record, TransferStatus.ROLLED_BACK, { reason });
          return err({ kind: 'TransferRejected', reason: outcome.reason, transferId: record.transferId });
        }

        case 'Indeterminate':
          this.settle(record, TransferStatus.STUCK, { reason: outcome.reason });
          return err({
            kind: 'TransferIndeterminate',
            reason: outcome.reason,
            transferId: record.transferId,
            memo: transfer.memo,
          });
      }
    } finally {
      locks.release(entity);
    }
  }

  /**
   * Move the journal entry on. A journal write that fails is logged; the
   * balances stay authoritative and the transfer carries on.
   */
  private advance(
    record: TransferRecord,
    status: TransferStatus,
    details: { blockIndex?: bigint; reason?: string } = {}
  ): TransferRecord {
    const moved = this.deps.journal.transition(record, status, details);
    if (moved.ok) {
      return moved.value;
    }
    log.error(
      { transferId: record.transferId, status, error: moved.error },
      'Failed to record transfer state'
    );
    return { ...record, ...details, status };
  }

  private settle(
    record: TransferRecord,
    status: TransferStatus,
    details: { blockIndex?: bigint; reason?: string } = {}
  ): void {
    const settled = this.advance(record, status, details);
    transfersTotal.inc({ kind: settled.kind, status });

    const summary = {
      transferId: settled.transferId,
      kind: settled.kind,
      entityId: settled.entityId,
      amount: settled.amount.toString(),
      blockIndex: settled.blockIndex?.toString(),
      reason: settled.reason,
    };

    if (status === TransferStatus.COMMITTED) {
      log.info(summary, 'Transfer committed');
    } else if (status === TransferStatus.STUCK) {
      log.error(summary, 'Transfer stuck, manual reconciliation required');
    } else {
      log.warn(summary, 'Transfer rolled back');
    }
  }
}
