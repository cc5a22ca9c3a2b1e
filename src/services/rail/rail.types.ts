import { Account, RailRejection, TransferRequest } from '../../types/custody';

/**
 * Reply of the rail's transfer operation, exactly as the rail states it
 */
export type RailReply = { Ok: bigint } | { Err: RailRejection };

/**
 * Transport to an external ledger. Resolves with the rail's own reply;
 * rejects when the call itself failed and the rail's state is unknown.
 */
export interface RailClient {
  submitTransfer(request: TransferRequest): Promise<RailReply>;
}

/**
 * The call left this process but no usable reply came back
 */
export class RailTransportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RailTransportError';
  }
}

export class RailTimeoutError extends RailTransportError {
  constructor(timeoutMs: number) {
    super(`rail call timed out after ${timeoutMs}ms`);
    this.name = 'RailTimeoutError';
  }
}

export const accountKey = (account: Account): string =>
  account.subaccount ? `${account.owner}.${account.subaccount}` : account.owner;

export const memoText = (memo: Buffer | undefined): string => (memo ? memo.toString('utf8') : '');
