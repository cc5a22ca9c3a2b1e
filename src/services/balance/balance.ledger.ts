/**
 * Balance Ledger
 *
 * Sole owner of campaign budgets and provider earnings. Every primitive is
 * a single synchronous write that either applies fully or leaves the record
 * as it was; balances never go below zero.
 */

import { KeyValueStore, KeyValueStoreOptions, Codec, readString, readAmount } from '../../storage/keyValueStore';
import { Amount, Campaign, Principal, Provider } from '../../types/custody';
import { CustodyError, Result, ok, err, notFound, insufficientFunds } from '../../types/result';

const campaignCodec: Codec<Campaign> = {
  encode: (campaign) => ({
    id: campaign.id,
    owner: campaign.owner,
    budget: campaign.budget.toString(),
  }),
  decode: (raw) => ({
    id: readString(raw, 'id'),
    owner: readString(raw, 'owner'),
    budget: readAmount(raw, 'budget'),
  }),
};

const providerCodec: Codec<Provider> = {
  encode: (provider) => ({
    id: provider.id,
    owner: provider.owner,
    totalEarnings: provider.totalEarnings.toString(),
  }),
  decode: (raw) => ({
    id: readString(raw, 'id'),
    owner: readString(raw, 'owner'),
    totalEarnings: readAmount(raw, 'totalEarnings'),
  }),
};

export class BalanceLedger {
  readonly campaigns: KeyValueStore<Campaign>;
  readonly providers: KeyValueStore<Provider>;

  constructor(options: KeyValueStoreOptions = {}) {
    this.campaigns = new KeyValueStore('campaigns', campaignCodec, options);
    this.providers = new KeyValueStore('providers', providerCodec, options);
  }

  getCampaign(id: string): Campaign | undefined {
    return this.campaigns.get(id);
  }

  getProvider(id: string): Provider | undefined {
    return this.providers.get(id);
  }

  /**
   * Attach a campaign with an empty budget. Registering an existing id again
   * returns the stored record; it never resets the budget.
   */
  registerCampaign(id: string, owner: Principal): Result<Campaign> {
    const existing = this.campaigns.get(id);
    if (existing) {
      return existing.owner === owner
        ? ok(existing)
        : err({ kind: 'Authorization', message: `Campaign ${id} is registered to another owner` });
    }

    const campaign: Campaign = { id, owner, budget: 0n };
    const written = this.campaigns.set(id, campaign);
    return written.ok ? ok(campaign) : written;
  }

  registerProvider(id: string, owner: Principal): Result<Provider> {
    const existing = this.providers.get(id);
    if (existing) {
      return existing.owner === owner
        ? ok(existing)
        : err({ kind: 'Authorization', message: `Provider ${id} is registered to another owner` });
    }

    const provider: Provider = { id, owner, totalEarnings: 0n };
    const written = this.providers.set(id, provider);
    return written.ok ? ok(provider) : written;
  }

  // ===========================================================================
  // PRIMITIVES
  // ===========================================================================

  debitCampaign(id: string, amount: Amount): Result<Campaign> {
    const campaign = this.campaigns.get(id);
    if (!campaign) {
      return err(notFound('campaign', id));
    }
    if (campaign.budget < amount) {
      return err(insufficientFunds(campaign.budget, amount));
    }
    return this.writeCampaign({ ...campaign, budget: campaign.budget - amount });
  }

  creditCampaign(id: string, amount: Amount): Result<Campaign> {
    const campaign = this.campaigns.get(id);
    if (!campaign) {
      return err(notFound('campaign', id));
    }
    return this.writeCampaign({ ...campaign, budget: campaign.budget + amount });
  }

  debitProvider(id: string, amount: Amount): Result<Provider> {
    const provider = this.providers.get(id);
    if (!provider) {
      return err(notFound('provider', id));
    }
    if (provider.totalEarnings < amount) {
      return err(insufficientFunds(provider.totalEarnings, amount));
    }
    return this.writeProvider({ ...provider, totalEarnings: provider.totalEarnings - amount });
  }

  creditProvider(id: string, amount: Amount): Result<Provider> {
    const provider = this.providers.get(id);
    if (!provider) {
      return err(notFound('provider', id));
    }
    return this.writeProvider({ ...provider, totalEarnings: provider.totalEarnings + amount });
  }

  private writeCampaign(campaign: Campaign): Result<Campaign, CustodyError> {
    const written = this.campaigns.set(campaign.id, campaign);
    return written.ok ? ok(campaign) : written;
  }

  private writeProvider(provider: Provider): Result<Provider, CustodyError> {
    const written = this.providers.set(provider.id, provider);
    return written.ok ? ok(provider) : written;
  }
}
