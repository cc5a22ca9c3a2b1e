import { ApiError } from '../middlewares/errorHandler';
import { Amount, ProviderEarnings } from '../types/custody';

const DIGITS = /^\d+$/;

/**
 * Parse an amount received over the wire: a string of decimal digits or a
 * non-negative safe integer. Anything else yields null.
 */
export const parseAmount = (input: unknown): Amount | null => {
  if (typeof input === 'string' && DIGITS.test(input)) {
    return BigInt(input);
  }
  if (typeof input === 'number' && Number.isSafeInteger(input) && input >= 0) {
    return BigInt(input);
  }
  return null;
};

export const isAmountInput = (input: unknown): boolean => parseAmount(input) !== null;

/**
 * parseAmount for request fields that passed validation; throws a
 * validation error if the value is still not an amount
 */
export const requireAmount = (input: unknown, field = 'amount'): Amount => {
  const amount = parseAmount(input);
  if (amount === null) {
    throw ApiError.validationError('Validation failed', {
      [field]: [`${field} must be a non-negative integer in the smallest unit`],
    });
  }
  return amount;
};

export interface SerializedEarnings {
  providerId: string;
  campaignId: string;
  totalEarned: string;
  lastWithdrawal: string | null;
}

export const serializeEarnings = (earnings: ProviderEarnings): SerializedEarnings => ({
  providerId: earnings.providerId,
  campaignId: earnings.campaignId,
  totalEarned: earnings.totalEarned.toString(),
  lastWithdrawal:
    earnings.lastWithdrawal === undefined ? null : new Date(earnings.lastWithdrawal).toISOString(),
});
