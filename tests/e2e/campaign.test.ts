import request from 'supertest';
import { authenticatedRequest, getTestApp, seedCampaign, seedProvider, TestApp } from '../helpers';
import { ErrorCode } from '../../src/types/errors';

describe('Campaign Endpoints', () => {
  let t: TestApp;

  beforeEach(() => {
    t = getTestApp();
    seedCampaign(t, 'c1', 'alice');
    t.rail.mint({ owner: 'alice' }, 1_000_000n);
  });

  describe('POST /campaigns/:id/fund', () => {
    it('should fund the campaign net of the rail fee', async () => {
      const response = await authenticatedRequest(t.app, 'alice').post('/campaigns/c1/fund').send({ amount: '100000' });

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
      expect(response.body.data).toEqual({
        transferId: expect.any(String),
        blockIndex: '0',
        credited: '90000',
      });
      expect(t.custody.ledger.getCampaign('c1')?.budget).toBe(90_000n);
    });

    it('should accept the amount as a JSON number', async () => {
      const response = await authenticatedRequest(t.app, 'alice').post('/campaigns/c1/fund').send({ amount: 20000 });

      expect(response.status).toBe(200);
      expect(response.body.data.credited).toBe('10000');
    });

    it('should reject a malformed amount', async () => {
      const response = await authenticatedRequest(t.app, 'alice').post('/campaigns/c1/fund').send({ amount: '1.5' });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(ErrorCode.VALIDATION_ERROR);
      expect(response.body.error.details).toHaveProperty('amount');
    });

    it('should reject an amount that does not exceed the fee', async () => {
      const response = await authenticatedRequest(t.app, 'alice').post('/campaigns/c1/fund').send({ amount: 10000 });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(ErrorCode.INVALID_AMOUNT);
      expect(response.body.error.message).toBe('Amount must be greater than the rail fee of 10000');
    });

    it('should return 404 for an unknown campaign', async () => {
      const response = await authenticatedRequest(t.app, 'alice').post('/campaigns/c9/fund').send({ amount: 50000 });

      expect(response.status).toBe(404);
      expect(response.body.error.code).toBe(ErrorCode.CAMPAIGN_NOT_FOUND);
      expect(response.body.error.message).toBe('Campaign not found: c9');
    });

    it('should return 403 to a caller who does not own the campaign', async () => {
      const response = await authenticatedRequest(t.app, 'mallory').post('/campaigns/c1/fund').send({ amount: 50000 });

      expect(response.status).toBe(403);
      expect(response.body.error.code).toBe(ErrorCode.NOT_RECORD_OWNER);
    });

    it('should report a rail rejection with its reason', async () => {
      const response = await authenticatedRequest(t.app, 'alice').post('/campaigns/c1/fund').send({ amount: '5000000' });

      expect(response.status).toBe(422);
      expect(response.body.error.code).toBe(ErrorCode.TRANSFER_REJECTED);
      expect(response.body.error.details.reason).toEqual({ code: 'InsufficientFunds', balance: '1000000' });
    });

    it('should require authentication', async () => {
      const response = await request(t.app).post('/campaigns/c1/fund').send({ amount: 50000 });

      expect(response.status).toBe(401);
      expect(response.body.error.message).toBe('No authorization header provided');
    });
  });

  describe('POST /campaigns/:id/withdraw', () => {
    beforeEach(() => {
      seedCampaign(t, 'c2', 'alice', 300_000n);
    });

    it('should pay the budget out to the owner', async () => {
      const response = await authenticatedRequest(t.app, 'alice').post('/campaigns/c2/withdraw').send({ amount: 100000 });

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({ transferId: expect.any(String), blockIndex: '0' });
      expect(t.rail.balanceOf({ owner: 'alice' })).toBe(1_090_000n);
    });

    it('should report insufficient funds with both amounts', async () => {
      const response = await authenticatedRequest(t.app, 'alice').post('/campaigns/c2/withdraw').send({ amount: 300001 });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(ErrorCode.INSUFFICIENT_BALANCE);
      expect(response.body.error.details).toEqual({ available: '300000', requested: '300001' });
    });

    it('should report an unknown outcome with the transfer to reconcile', async () => {
      t.rail.enable({ failMemos: new Set(['Campaign withdrawal: c2']), failureType: 'TRANSPORT' });

      const response = await authenticatedRequest(t.app, 'alice').post('/campaigns/c2/withdraw').send({ amount: 100000 });

      expect(response.status).toBe(502);
      expect(response.body.error.code).toBe(ErrorCode.TRANSFER_INDETERMINATE);
      expect(response.body.error.details).toEqual({
        transferId: expect.any(String),
        memo: 'Campaign withdrawal: c2',
      });
      expect(t.custody.ledger.getCampaign('c2')?.budget).toBe(200_000n);
    });
  });

  describe('POST /campaigns/:id/payments', () => {
    beforeEach(() => {
      seedCampaign(t, 'c2', 'alice', 300_000n);
      seedProvider(t, 'p1', 'paula');
    });

    it('should pay the provider from the budget', async () => {
      const response = await authenticatedRequest(t.app, 'alice')
        .post('/campaigns/c2/payments')
        .send({ providerId: 'p1', amount: '120000' });

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({
        campaignBudget: '180000',
        providerEarnings: '120000',
        earnings: { providerId: 'p1', campaignId: 'c2', totalEarned: '120000', lastWithdrawal: null },
      });
    });

    it('should require a provider id', async () => {
      const response = await authenticatedRequest(t.app, 'alice').post('/campaigns/c2/payments').send({ amount: 5 });

      expect(response.status).toBe(400);
      expect(response.body.error.details).toHaveProperty('providerId');
    });

    it('should return 404 for an unknown provider', async () => {
      const response = await authenticatedRequest(t.app, 'alice')
        .post('/campaigns/c2/payments')
        .send({ providerId: 'p9', amount: 5 });

      expect(response.status).toBe(404);
      expect(response.body.error.code).toBe(ErrorCode.PROVIDER_NOT_FOUND);
    });

    it('should return 409 while the campaign has a transfer in flight', async () => {
      t.custody.locks.tryAcquire({ type: 'campaign', id: 'c2' });

      const response = await authenticatedRequest(t.app, 'alice')
        .post('/campaigns/c2/payments')
        .send({ providerId: 'p1', amount: 5 });

      expect(response.status).toBe(409);
      expect(response.body.error.code).toBe(ErrorCode.ENTITY_BUSY);
      expect(response.body.error.message).toBe('campaign c2 has a transfer in flight, retry later');
      expect(t.custody.ledger.getCampaign('c2')?.budget).toBe(300_000n);
    });
  });

  describe('GET /campaigns/:id/balance', () => {
    it('should return the budget as a string', async () => {
      seedCampaign(t, 'c2', 'alice', 300_000n);

      const response = await authenticatedRequest(t.app, 'alice').get('/campaigns/c2/balance');

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({ campaignId: 'c2', balance: '300000' });
    });

    it('should hide the budget from other callers', async () => {
      const response = await authenticatedRequest(t.app, 'paula').get('/campaigns/c1/balance');

      expect(response.status).toBe(403);
    });
  });
});
