/**
 * Earnings Registry
 *
 * One accumulating record per (provider, campaign) pair, keyed
 * "<providerId>:<campaignId>". Records are created on the first payment of
 * a pair and never deleted.
 */

import {
  KeyValueStore,
  KeyValueStoreOptions,
  Codec,
  readString,
  readAmount,
  readOptionalNumber,
} from '../../storage/keyValueStore';
import { Amount, ProviderEarnings } from '../../types/custody';
import { Result, ok } from '../../types/result';

const earningsCodec: Codec<ProviderEarnings> = {
  encode: (earnings) => ({
    providerId: earnings.providerId,
    campaignId: earnings.campaignId,
    totalEarned: earnings.totalEarned.toString(),
    lastWithdrawal: earnings.lastWithdrawal ?? null,
  }),
  decode: (raw) => ({
    providerId: readString(raw, 'providerId'),
    campaignId: readString(raw, 'campaignId'),
    totalEarned: readAmount(raw, 'totalEarned'),
    lastWithdrawal: readOptionalNumber(raw, 'lastWithdrawal'),
  }),
};

export const earningsKey = (providerId: string, campaignId: string): string =>
  `${providerId}:${campaignId}`;

export class EarningsRegistry {
  readonly store: KeyValueStore<ProviderEarnings>;

  constructor(options: KeyValueStoreOptions = {}) {
    this.store = new KeyValueStore('earnings', earningsCodec, options);
  }

  get(providerId: string, campaignId: string): ProviderEarnings | undefined {
    return this.store.get(earningsKey(providerId, campaignId));
  }

  /**
   * Add a payment to the pair's running total, creating the record on the
   * first payment
   */
  record(providerId: string, campaignId: string, amount: Amount): Result<ProviderEarnings> {
    const existing = this.get(providerId, campaignId);
    const updated: ProviderEarnings = existing
      ? { ...existing, totalEarned: existing.totalEarned + amount }
      : { providerId, campaignId, totalEarned: amount };

    const written = this.store.set(earningsKey(providerId, campaignId), updated);
    return written.ok ? ok(updated) : written;
  }

  /**
   * Every record of a provider, ordered by campaign id
   */
  listForProvider(providerId: string): ProviderEarnings[] {
    return this.store
      .valuesWithPrefix(`${providerId}:`)
      .filter((earnings) => earnings.providerId === providerId);
  }

  /**
   * Stamp the time of a committed withdrawal on all of a provider's records
   */
  stampWithdrawal(providerId: string, at: number): Result<number> {
    const records = this.listForProvider(providerId);
    for (const earnings of records) {
      const written = this.store.set(earningsKey(providerId, earnings.campaignId), {
        ...earnings,
        lastWithdrawal: at,
      });
      if (!written.ok) {
        return written;
      }
    }
    return ok(records.length);
  }
}
