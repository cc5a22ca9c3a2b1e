/**
 * Ledger Gateway
 *
 * Typed adapter over the rail's transfer operation. Every call ends in
 * exactly one of Confirmed, Rejected or Indeterminate; the gateway never
 * throws and never turns an unknown outcome into a rejection.
 */

import { TransferOutcome, TransferRequest, describeRejection } from '../../types/custody';
import { createServiceLogger } from '../../observability/logger';
import { railCallsTotal, railCallDuration } from '../../observability/metrics';
import { RailClient, RailTimeoutError, accountKey, memoText } from './rail.types';

const log = createServiceLogger('rail-gateway');

export interface LedgerGatewayOptions {
  timeoutMs: number;
}

const describeFailure = (error: unknown): string =>
  error instanceof Error ? error.message : `rail call failed: ${String(error)}`;

export class LedgerGateway {
  constructor(
    private readonly client: RailClient,
    private readonly options: LedgerGatewayOptions
  ) {}

  async transfer(request: TransferRequest): Promise<TransferOutcome> {
    const start = process.hrtime.bigint();
    const memo = memoText(request.memo);

    log.info(
      {
        from: accountKey(request.source),
        to: accountKey(request.destination),
        amount: request.amount.toString(),
        fee: request.fee.toString(),
        memo,
      },
      'Dispatching rail transfer'
    );

    // A client that throws instead of rejecting still ends as Indeterminate
    const submission = Promise.resolve().then(() => this.client.submitTransfer(request));
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => reject(new RailTimeoutError(this.options.timeoutMs)), this.options.timeoutMs);
    });

    let outcome: TransferOutcome;
    try {
      const reply = await Promise.race([submission, timeout]);
      outcome =
        'Ok' in reply
          ? { status: 'Confirmed', blockIndex: reply.Ok }
          : { status: 'Rejected', reason: reply.Err };
    } catch (error) {
      outcome = { status: 'Indeterminate', reason: describeFailure(error) };
      if (error instanceof RailTimeoutError) {
        // The call is not cancellable; report how it eventually ended
        submission.then(
          (late) => log.warn({ memo, late }, 'Rail replied after the gateway timed out'),
          (lateError: unknown) =>
            log.warn({ memo, err: lateError }, 'Rail call failed after the gateway timed out')
        );
      }
    } finally {
      clearTimeout(timer);
    }

    const labels = { outcome: outcome.status.toLowerCase() };
    railCallsTotal.inc(labels);
    railCallDuration.observe(labels, Number(process.hrtime.bigint() - start) / 1e9);

    switch (outcome.status) {
      case 'Confirmed':
        log.info({ memo, blockIndex: outcome.blockIndex.toString() }, 'Rail transfer confirmed');
        break;
      case 'Rejected':
        log.warn({ memo, reason: describeRejection(outcome.reason) }, 'Rail transfer rejected');
        break;
      case 'Indeterminate':
        log.error({ memo, reason: outcome.reason }, 'Rail transfer outcome unknown');
        break;
    }

    return outcome;
  }
}
