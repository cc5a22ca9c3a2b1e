/**
 * Query Service
 *
 * Owner-gated reads over balances, earnings and the transfer journal. Reads
 * never wait on entity locks: during an external transfer they see the
 * balance before or after its local effect, never a half-applied payment.
 */

import { Amount, Principal, ProviderEarnings } from '../../types/custody';
import { Result, ok, err, notFound } from '../../types/result';
import { BalanceLedger } from '../balance/balance.ledger';
import { EarningsRegistry } from '../earnings/earnings.registry';
import { requireOwner } from '../custody/ownership.guard';
import { TransferJournal, TransferRecord } from '../transfer/transfer.journal';

export class QueryService {
  constructor(
    private readonly ledger: BalanceLedger,
    private readonly earnings: EarningsRegistry,
    private readonly journal: TransferJournal
  ) {}

  getProviderEarnings(providerId: string, caller: Principal): Result<Amount> {
    const provider = this.ledger.getProvider(providerId);
    if (!provider) return err(notFound('provider', providerId));

    const owned = requireOwner(provider.owner, caller, 'view your own provider earnings');
    if (!owned.ok) return owned;

    return ok(provider.totalEarnings);
  }

  /**
   * One record per campaign that has paid the provider, ordered by campaign id
   */
  getProviderEarningsBreakdown(providerId: string, caller: Principal): Result<ProviderEarnings[]> {
    const provider = this.ledger.getProvider(providerId);
    if (!provider) return err(notFound('provider', providerId));

    const owned = requireOwner(provider.owner, caller, 'view your own provider earnings');
    if (!owned.ok) return owned;

    return ok(this.earnings.listForProvider(providerId));
  }

  getCampaignBalance(campaignId: string, caller: Principal): Result<Amount> {
    const campaign = this.ledger.getCampaign(campaignId);
    if (!campaign) return err(notFound('campaign', campaignId));

    const owned = requireOwner(campaign.owner, caller, 'view your own campaign balance');
    if (!owned.ok) return owned;

    return ok(campaign.budget);
  }

  /**
   * The caller's transfers whose outcome is unknown, oldest first
   */
  listUnreconciledTransfers(caller: Principal): TransferRecord[] {
    return this.journal.listUnreconciled(caller);
  }
}
