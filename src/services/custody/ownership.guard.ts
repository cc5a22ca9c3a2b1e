import { Principal } from '../../types/custody';
import { CustodyError, Result, ok, err } from '../../types/result';

/**
 * Succeeds only when the caller owns the record. Pure; runs before any
 * lock, mutation or rail call.
 */
export const requireOwner = (
  recordOwner: Principal,
  caller: Principal,
  action = 'access your own records'
): Result<void, CustodyError> => {
  if (recordOwner !== caller) {
    return err({ kind: 'Authorization', message: `Unauthorized: You can only ${action}` });
  }
  return ok(undefined);
};
