import { SimulatedRail, SimulatedTransportError } from '../../../src/services/rail/rail.simulation';
import { TransferRequest } from '../../../src/types/custody';

const FEE = 10_000n;
const HOUR_NS = 60n * 60n * 1_000_000_000n;
const nowNanos = (): bigint => BigInt(Date.now()) * 1_000_000n;

const funding = (overrides: Partial<TransferRequest> = {}): TransferRequest => ({
  source: { owner: 'alice' },
  destination: { owner: 'custody' },
  amount: 50_000n,
  fee: FEE,
  memo: Buffer.from('Fund campaign: c1', 'utf8'),
  createdAtTime: nowNanos(),
  ...overrides,
});

describe('SimulatedRail', () => {
  let rail: SimulatedRail;

  beforeEach(() => {
    rail = new SimulatedRail(FEE);
    rail.mint({ owner: 'alice' }, 100_000n);
  });

  describe('ledger', () => {
    it('should move the amount and net the fee out of what arrives', async () => {
      await expect(rail.submitTransfer(funding())).resolves.toEqual({ Ok: 0n });

      expect(rail.balanceOf({ owner: 'alice' })).toBe(50_000n);
      expect(rail.balanceOf({ owner: 'custody' })).toBe(40_000n);
      expect(rail.getBlocks()).toHaveLength(1);
    });

    it('should number blocks in order', async () => {
      await rail.submitTransfer(funding());
      await expect(rail.submitTransfer(funding({ createdAtTime: nowNanos() + 1n }))).resolves.toEqual({
        Ok: 1n,
      });
    });

    it('should reject a repeat of the same request as a duplicate', async () => {
      const request = funding();
      await rail.submitTransfer(request);

      await expect(rail.submitTransfer(request)).resolves.toEqual({
        Err: { code: 'Duplicate', duplicateOf: 0n },
      });
      expect(rail.balanceOf({ owner: 'alice' })).toBe(50_000n);
    });

    it('should reject a wrong fee', async () => {
      await expect(rail.submitTransfer(funding({ fee: 5n }))).resolves.toEqual({
        Err: { code: 'BadFee', expectedFee: FEE },
      });
    });

    it('should reject requests outside the deduplication window', async () => {
      await expect(
        rail.submitTransfer(funding({ createdAtTime: nowNanos() - 25n * HOUR_NS }))
      ).resolves.toEqual({ Err: { code: 'TooOld' } });

      await expect(
        rail.submitTransfer(funding({ createdAtTime: nowNanos() + HOUR_NS }))
      ).resolves.toMatchObject({ Err: { code: 'CreatedInFuture' } });
    });

    it('should reject an amount that does not cover the fee', async () => {
      await expect(rail.submitTransfer(funding({ amount: FEE }))).resolves.toEqual({
        Err: { code: 'GenericError', errorCode: 1n, message: 'amount does not cover the fee' },
      });
    });

    it('should reject a transfer the source cannot cover', async () => {
      await expect(
        rail.submitTransfer(funding({ source: { owner: 'bob' } }))
      ).resolves.toEqual({ Err: { code: 'InsufficientFunds', balance: 0n } });
    });

    it('should keep subaccounts apart from their owner', () => {
      rail.mint({ owner: 'custody', subaccount: '01'.repeat(32) }, 7n);

      expect(rail.balanceOf({ owner: 'custody' })).toBe(0n);
      expect(rail.balanceOf({ owner: 'custody', subaccount: '01'.repeat(32) })).toBe(7n);
    });
  });

  describe('failure simulation', () => {
    it('should be allowed in the test environment', () => {
      expect(SimulatedRail.isAllowed()).toBe(true);
    });

    it('should return the configured rejection for a failing memo', async () => {
      rail.enable({
        failMemos: new Set(['Fund campaign: c1']),
        failureType: 'REJECT',
        rejectionCode: 'TemporarilyUnavailable',
      });

      await expect(rail.submitTransfer(funding())).resolves.toEqual({
        Err: { code: 'TemporarilyUnavailable' },
      });
      expect(rail.balanceOf({ owner: 'alice' })).toBe(100_000n);
    });

    it('should leave other memos alone', async () => {
      rail.enable({ failMemos: new Set(['Fund campaign: c2']), failureType: 'REJECT' });

      await expect(rail.submitTransfer(funding())).resolves.toEqual({ Ok: 0n });
    });

    it('should throw a transport error without moving value by default', async () => {
      rail.enable({ failMemos: new Set(['Fund campaign: c1']) });

      await expect(rail.submitTransfer(funding())).rejects.toThrow(
        new SimulatedTransportError('Fund campaign: c1')
      );
      expect(rail.balanceOf({ owner: 'custody' })).toBe(0n);
    });

    it('should move value before failing when asked to', async () => {
      rail.enable({ failMemos: new Set(['Fund campaign: c1']), applyBeforeFailure: true });

      await expect(rail.submitTransfer(funding())).rejects.toThrow(
        'simulated transport failure for "Fund campaign: c1"'
      );
      expect(rail.balanceOf({ owner: 'custody' })).toBe(40_000n);
    });

    it('should fail every transfer at a failure rate of 1', async () => {
      rail.enable({ failureRate: 1, failureType: 'REJECT', rejectionCode: 'TooOld' });

      await expect(rail.submitTransfer(funding())).resolves.toEqual({ Err: { code: 'TooOld' } });
    });

    it('should keep omitted settings when enabled again', () => {
      rail.enable({ failureType: 'REJECT', rejectionCode: 'BadFee' });
      rail.enable({ failureRate: 0.5 });

      expect(rail.getConfig()).toEqual({
        enabled: true,
        failureRate: 0.5,
        failMemos: [],
        failureType: 'REJECT',
        rejectionCode: 'BadFee',
        applyBeforeFailure: false,
      });
    });

    it('should clear failing memos when disabled', () => {
      rail.enable();
      rail.addFailingMemos(['a', 'b']);
      expect(rail.getConfig().failMemos).toEqual(['a', 'b']);

      rail.disable();

      expect(rail.getConfig()).toMatchObject({ enabled: false, failMemos: [] });
      expect(rail.shouldFail('a')).toBe(false);
    });

    it('should restore defaults on reset but keep balances', () => {
      rail.enable({ failureType: 'TIMEOUT', failureRate: 1 });

      rail.reset();

      expect(rail.getConfig()).toEqual({
        enabled: false,
        failureRate: 0,
        failMemos: [],
        failureType: 'TRANSPORT',
        rejectionCode: 'TemporarilyUnavailable',
        applyBeforeFailure: false,
      });
      expect(rail.balanceOf({ owner: 'alice' })).toBe(100_000n);
    });
  });
});
