/**
 * HTTP Rail Client
 *
 * Talks to a ledger that exposes its transfer operation as JSON over HTTP.
 * Amounts and indexes travel as decimal strings, memos as base64.
 *
 *   POST {url}/transfers
 *   200 {"Ok": "1234"}
 *   200 {"Err": {"InsufficientFunds": {"balance": "10"}}}
 */

import axios from 'axios';
import { z } from 'zod';
import { Account, TransferRequest } from '../../types/custody';
import { RailClient, RailReply, RailTransportError } from './rail.types';

export interface HttpRailClientOptions {
  url: string;
  /** Transport level timeout; the gateway applies its own as well */
  timeoutMs: number;
}

interface WireAccount {
  owner: string;
  subaccount: string | null;
}

export interface WireTransferRequest {
  from: WireAccount;
  to: WireAccount;
  amount: string;
  fee: string;
  memo: string | null;
  created_at_time: string | null;
}

const toWireAccount = (account: Account): WireAccount => ({
  owner: account.owner,
  subaccount: account.subaccount ?? null,
});

export const toWireRequest = (request: TransferRequest): WireTransferRequest => ({
  from: toWireAccount(request.source),
  to: toWireAccount(request.destination),
  amount: request.amount.toString(),
  fee: request.fee.toString(),
  memo: request.memo ? request.memo.toString('base64') : null,
  created_at_time: request.createdAtTime === undefined ? null : request.createdAtTime.toString(),
});

// =============================================================================
// REPLY PARSING
// =============================================================================

const nat = z.union([
  z
    .string()
    .regex(/^\d+$/)
    .transform((value) => BigInt(value)),
  z
    .number()
    .int()
    .nonnegative()
    .refine((value) => Number.isSafeInteger(value))
    .transform((value) => BigInt(value)),
]);

// Variants without fields arrive as null or {}
const unit = z.union([z.null(), z.object({})]);

const RailRejectionSchema = z.union([
  z
    .object({ InsufficientFunds: z.object({ balance: nat }) })
    .strict()
    .transform(({ InsufficientFunds }) => ({
      code: 'InsufficientFunds' as const,
      balance: InsufficientFunds.balance,
    })),
  z
    .object({ BadFee: z.object({ expected_fee: nat }) })
    .strict()
    .transform(({ BadFee }) => ({ code: 'BadFee' as const, expectedFee: BadFee.expected_fee })),
  z
    .object({ TooOld: unit })
    .strict()
    .transform(() => ({ code: 'TooOld' as const })),
  z
    .object({ CreatedInFuture: z.object({ ledger_time: nat }) })
    .strict()
    .transform(({ CreatedInFuture }) => ({
      code: 'CreatedInFuture' as const,
      ledgerTime: CreatedInFuture.ledger_time,
    })),
  z
    .object({ Duplicate: z.object({ duplicate_of: nat }) })
    .strict()
    .transform(({ Duplicate }) => ({ code: 'Duplicate' as const, duplicateOf: Duplicate.duplicate_of })),
  z
    .object({ TemporarilyUnavailable: unit })
    .strict()
    .transform(() => ({ code: 'TemporarilyUnavailable' as const })),
  z
    .object({ GenericError: z.object({ error_code: nat, message: z.string() }) })
    .strict()
    .transform(({ GenericError }) => ({
      code: 'GenericError' as const,
      errorCode: GenericError.error_code,
      message: GenericError.message,
    })),
]);

const RailReplySchema = z.union([
  z.object({ Ok: nat }).transform(({ Ok }): RailReply => ({ Ok })),
  z.object({ Err: RailRejectionSchema }).transform(({ Err }): RailReply => ({ Err })),
]);

/**
 * Interpret a reply body. Anything that is not a well-formed Ok or Err
 * yields null; the caller must not read it as a rejection.
 */
export const parseRailReply = (body: unknown): RailReply | null => {
  const parsed = RailReplySchema.safeParse(body);
  return parsed.success ? parsed.data : null;
};

export class HttpRailClient implements RailClient {
  constructor(private readonly options: HttpRailClientOptions) {}

  async submitTransfer(request: TransferRequest): Promise<RailReply> {
    let status: number;
    let data: unknown;

    try {
      const response = await axios.post<unknown>(`${this.options.url}/transfers`, toWireRequest(request), {
        headers: { 'Content-Type': 'application/json' },
        timeout: this.options.timeoutMs,
        // Rejections may come back on any status; the body decides
        validateStatus: () => true,
      });
      status = response.status;
      data = response.data;
    } catch (error) {
      const message = axios.isAxiosError(error)
        ? error.message
        : error instanceof Error
          ? error.message
          : 'Unknown error';
      throw new RailTransportError(`rail call failed: ${message}`);
    }

    const reply = parseRailReply(data);
    if (!reply) {
      throw new RailTransportError(`unrecognised rail reply (HTTP ${status})`);
    }
    return reply;
  }
}
