import { Amount, EntityType, RailRejection } from './custody';

/**
 * Tagged success/error union returned by every fallible custody operation
 */
export type Result<T, E = CustodyError> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/**
 * Closed set of custody failures.
 *
 * Authorization, NotFound, InvalidAmount, InsufficientFunds and EntityBusy are
 * raised before any lock or rail call. TransferRejected means the local
 * mutation was reverted; TransferIndeterminate means it was not.
 */
export type CustodyError =
  | { kind: 'Authorization'; message: string }
  | { kind: 'NotFound'; entity: EntityType; id: string }
  | { kind: 'InvalidAmount'; message: string }
  | { kind: 'InsufficientFunds'; available: Amount; requested: Amount }
  | { kind: 'EntityBusy'; entity: EntityType; id: string }
  | { kind: 'TransferRejected'; reason: RailRejection; transferId: string }
  | { kind: 'TransferIndeterminate'; reason: string; transferId: string; memo: string }
  | { kind: 'Storage'; message: string };

export type CustodyErrorKind = CustodyError['kind'];

export type StorageFailure = Extract<CustodyError, { kind: 'Storage' }>;

export const notFound = (entity: EntityType, id: string): CustodyError => ({
  kind: 'NotFound',
  entity,
  id,
});

export const insufficientFunds = (available: Amount, requested: Amount): CustodyError => ({
  kind: 'InsufficientFunds',
  available,
  requested,
});
