import { BalanceLedger } from '../../../src/services/balance/balance.ledger';

describe('BalanceLedger', () => {
  let ledger: BalanceLedger;

  beforeEach(() => {
    ledger = new BalanceLedger();
    ledger.registerCampaign('c1', 'alice');
    ledger.registerProvider('p1', 'paula');
  });

  describe('registration', () => {
    it('should register a campaign with an empty budget', () => {
      expect(ledger.getCampaign('c1')).toEqual({ id: 'c1', owner: 'alice', budget: 0n });
    });

    it('should return the stored record when the owner registers again', () => {
      ledger.creditCampaign('c1', 500n);

      const again = ledger.registerCampaign('c1', 'alice');

      expect(again).toEqual({ ok: true, value: { id: 'c1', owner: 'alice', budget: 500n } });
    });

    it('should refuse to re-register a campaign to another owner', () => {
      expect(ledger.registerCampaign('c1', 'mallory')).toEqual({
        ok: false,
        error: { kind: 'Authorization', message: 'Campaign c1 is registered to another owner' },
      });
      expect(ledger.getCampaign('c1')?.owner).toBe('alice');
    });

    it('should refuse to re-register a provider to another owner', () => {
      expect(ledger.registerProvider('p1', 'mallory')).toEqual({
        ok: false,
        error: { kind: 'Authorization', message: 'Provider p1 is registered to another owner' },
      });
    });
  });

  describe('campaign primitives', () => {
    it('should credit and debit the budget', () => {
      ledger.creditCampaign('c1', 1_000n);

      const debited = ledger.debitCampaign('c1', 400n);

      expect(debited).toEqual({ ok: true, value: { id: 'c1', owner: 'alice', budget: 600n } });
      expect(ledger.getCampaign('c1')?.budget).toBe(600n);
    });

    it('should allow a debit of the whole budget', () => {
      ledger.creditCampaign('c1', 300n);

      expect(ledger.debitCampaign('c1', 300n).ok).toBe(true);
      expect(ledger.getCampaign('c1')?.budget).toBe(0n);
    });

    it('should refuse a debit larger than the budget and leave it unchanged', () => {
      ledger.creditCampaign('c1', 300n);

      expect(ledger.debitCampaign('c1', 301n)).toEqual({
        ok: false,
        error: { kind: 'InsufficientFunds', available: 300n, requested: 301n },
      });
      expect(ledger.getCampaign('c1')?.budget).toBe(300n);
    });

    it('should report an unknown campaign', () => {
      expect(ledger.creditCampaign('nope', 1n)).toEqual({
        ok: false,
        error: { kind: 'NotFound', entity: 'campaign', id: 'nope' },
      });
    });
  });

  describe('provider primitives', () => {
    it('should credit and debit total earnings', () => {
      ledger.creditProvider('p1', 900n);

      expect(ledger.debitProvider('p1', 100n)).toEqual({
        ok: true,
        value: { id: 'p1', owner: 'paula', totalEarnings: 800n },
      });
    });

    it('should refuse a debit larger than the earnings', () => {
      expect(ledger.debitProvider('p1', 1n)).toEqual({
        ok: false,
        error: { kind: 'InsufficientFunds', available: 0n, requested: 1n },
      });
    });

    it('should report an unknown provider', () => {
      expect(ledger.debitProvider('nope', 1n)).toEqual({
        ok: false,
        error: { kind: 'NotFound', entity: 'provider', id: 'nope' },
      });
    });
  });

  describe('storage bound', () => {
    it('should return a Storage error and keep the record when the write is refused', () => {
      const bounded = new BalanceLedger({ maxValueBytes: 60 });
      bounded.registerCampaign('c1', 'alice');

      const result = bounded.creditCampaign('c1', 10n ** 40n);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('Storage');
      }
      expect(bounded.getCampaign('c1')?.budget).toBe(0n);
    });
  });
});
