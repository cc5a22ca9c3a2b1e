/**
 * Custody domain types
 *
 * All amounts are bigint counts of the rail's smallest indivisible unit.
 */

export type Amount = bigint;

/**
 * Caller identity as verified by the auth layer (the token's `sub` claim)
 */
export type Principal = string;

/**
 * External account on the rail. `subaccount` is a 32-byte hex string.
 */
export interface Account {
  owner: Principal;
  subaccount?: string;
}

export interface Campaign {
  id: string;
  owner: Principal;
  budget: Amount;
}

export interface Provider {
  id: string;
  owner: Principal;
  totalEarnings: Amount;
}

export interface ProviderEarnings {
  providerId: string;
  campaignId: string;
  totalEarned: Amount;
  /** epoch milliseconds of the last committed provider withdrawal */
  lastWithdrawal?: number;
}

export type EntityType = 'campaign' | 'provider';

export interface EntityRef {
  type: EntityType;
  id: string;
}

// =============================================================================
// RAIL CONTRACT
// =============================================================================

export interface TransferRequest {
  source: Account;
  destination: Account;
  amount: Amount;
  fee: Amount;
  memo?: Buffer;
  /** nanoseconds since epoch, used by the rail for deduplication */
  createdAtTime?: bigint;
}

/**
 * Explicit refusals the rail can return. The rail did not move any value.
 */
export type RailRejection =
  | { code: 'InsufficientFunds'; balance: Amount }
  | { code: 'BadFee'; expectedFee: Amount }
  | { code: 'TooOld' }
  | { code: 'CreatedInFuture'; ledgerTime: bigint }
  | { code: 'Duplicate'; duplicateOf: bigint }
  | { code: 'TemporarilyUnavailable' }
  | { code: 'GenericError'; errorCode: bigint; message: string };

export type TransferOutcome =
  | { status: 'Confirmed'; blockIndex: bigint }
  | { status: 'Rejected'; reason: RailRejection }
  | { status: 'Indeterminate'; reason: string };

/**
 * Human readable form of a rail rejection
 */
export const describeRejection = (reason: RailRejection): string => {
  switch (reason.code) {
    case 'InsufficientFunds':
      return `insufficient funds on the rail (balance ${reason.balance})`;
    case 'BadFee':
      return `bad fee (expected ${reason.expectedFee})`;
    case 'TooOld':
      return 'transfer request too old';
    case 'CreatedInFuture':
      return `transfer request created in the future (ledger time ${reason.ledgerTime})`;
    case 'Duplicate':
      return `duplicate of block ${reason.duplicateOf}`;
    case 'TemporarilyUnavailable':
      return 'rail temporarily unavailable';
    case 'GenericError':
      return `rail error ${reason.errorCode}: ${reason.message}`;
  }
};

/**
 * JSON-safe form of a rail rejection (bigint fields become strings)
 */
export const serializeRejection = (reason: RailRejection): Record<string, string> => {
  const serialized: Record<string, string> = {};
  for (const [key, value] of Object.entries(reason)) {
    serialized[key] = String(value);
  }
  return serialized;
};
