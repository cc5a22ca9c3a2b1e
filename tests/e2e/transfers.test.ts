import { authenticatedRequest, getTestApp, seedCampaign, TestApp } from '../helpers';

describe('Transfer Endpoints', () => {
  let t: TestApp;

  beforeEach(() => {
    t = getTestApp();
    seedCampaign(t, 'c1', 'alice', 300_000n);
  });

  describe('GET /transfers/unreconciled', () => {
    it('should be empty when nothing is stuck', async () => {
      const response = await authenticatedRequest(t.app, 'alice').get('/transfers/unreconciled');

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({ transfers: [] });
    });

    it('should list the caller\'s transfers whose outcome is unknown', async () => {
      t.rail.enable({ failMemos: new Set(['Campaign withdrawal: c1']), failureType: 'TIMEOUT' });
      const client = authenticatedRequest(t.app, 'alice');

      const withdrawal = await client.post('/campaigns/c1/withdraw').send({ amount: 100000 });
      expect(withdrawal.status).toBe(502);

      const response = await client.get('/transfers/unreconciled');

      expect(response.status).toBe(200);
      expect(response.body.data.transfers).toEqual([
        expect.objectContaining({
          transferId: withdrawal.body.error.details.transferId,
          kind: 'WITHDRAW_CAMPAIGN',
          entityType: 'campaign',
          entityId: 'c1',
          amount: '100000',
          fee: '10000',
          memo: 'Campaign withdrawal: c1',
          status: 'STUCK',
          blockIndex: null,
          reason: 'rail call timed out after 200ms',
        }),
      ]);
    });

    it('should not show other callers\' transfers', async () => {
      t.rail.enable({ failMemos: new Set(['Campaign withdrawal: c1']), failureType: 'TRANSPORT' });
      await authenticatedRequest(t.app, 'alice').post('/campaigns/c1/withdraw').send({ amount: 100000 });

      const response = await authenticatedRequest(t.app, 'mallory').get('/transfers/unreconciled');

      expect(response.body.data.transfers).toEqual([]);
    });
  });
});
