/**
 * Unit tests for the request validation chains
 */

import { ValidationChain, validationResult } from 'express-validator';
import {
  fundCampaignValidation,
  payProviderValidation,
  campaignBalanceValidation,
} from '../../../src/services/campaign/campaign.validation';
import { withdrawProviderValidation } from '../../../src/services/provider/provider.validation';
import {
  failMemosValidation,
  mintValidation,
  simulationConfigValidation,
} from '../../../src/services/rail/rail.validation';

// Helper to run validation and get the failing fields
const runValidation = async (
  validations: ValidationChain[],
  input: { body?: Record<string, unknown>; params?: Record<string, string> }
): Promise<string[]> => {
  const req = { body: input.body ?? {}, params: input.params ?? {}, query: {} };

  for (const validation of validations) {
    await validation.run(req);
  }

  const fields = validationResult(req)
    .array()
    .map((error) => (error.type === 'field' ? error.path : error.type));
  return [...new Set(fields)];
};

describe('Campaign validation', () => {
  describe('fundCampaignValidation', () => {
    it('should accept an amount as a number', async () => {
      expect(await runValidation(fundCampaignValidation, { params: { id: 'c1' }, body: { amount: 50000 } })).toEqual([]);
    });

    it('should accept an amount as a string of digits beyond the safe integer range', async () => {
      expect(
        await runValidation(fundCampaignValidation, {
          params: { id: 'c1' },
          body: { amount: '123456789012345678901234567890' },
        })
      ).toEqual([]);
    });

    it('should reject a missing amount', async () => {
      expect(await runValidation(fundCampaignValidation, { params: { id: 'c1' }, body: {} })).toEqual(['amount']);
    });

    it.each([[-1], [1.5], ['12a'], ['-5'], [true], [null], [9007199254740993]])(
      'should reject the amount %p',
      async (amount) => {
        expect(await runValidation(fundCampaignValidation, { params: { id: 'c1' }, body: { amount } })).toEqual([
          'amount',
        ]);
      }
    );

    it('should reject a campaign id longer than 128 characters', async () => {
      expect(
        await runValidation(fundCampaignValidation, { params: { id: 'c'.repeat(129) }, body: { amount: 1 } })
      ).toEqual(['id']);
    });
  });

  describe('payProviderValidation', () => {
    it('should require a provider id', async () => {
      expect(await runValidation(payProviderValidation, { params: { id: 'c1' }, body: { amount: 10 } })).toEqual([
        'providerId',
      ]);
    });

    it('should accept a complete payment', async () => {
      expect(
        await runValidation(payProviderValidation, { params: { id: 'c1' }, body: { providerId: 'p1', amount: '10' } })
      ).toEqual([]);
    });
  });

  describe('campaignBalanceValidation', () => {
    it('should reject a blank campaign id', async () => {
      expect(await runValidation(campaignBalanceValidation, { params: { id: '   ' } })).toEqual(['id']);
    });
  });
});

describe('Provider validation', () => {
  it('should require an amount for withdrawals', async () => {
    expect(await runValidation(withdrawProviderValidation, { params: { id: 'p1' }, body: {} })).toEqual(['amount']);
  });
});

describe('Rail simulation validation', () => {
  it('should require enabled to be a boolean', async () => {
    expect(await runValidation(simulationConfigValidation, { body: { enabled: 'yes' } })).toEqual(['enabled']);
  });

  it('should reject an unknown failure type and rejection code', async () => {
    expect(
      await runValidation(simulationConfigValidation, {
        body: { enabled: true, failureType: 'EXPLODE', rejectionCode: 'Nope' },
      })
    ).toEqual(['failureType', 'rejectionCode']);
  });

  it('should reject a failure rate above 1', async () => {
    expect(await runValidation(simulationConfigValidation, { body: { enabled: true, failureRate: 1.5 } })).toEqual([
      'failureRate',
    ]);
  });

  it('should require at least one memo', async () => {
    expect(await runValidation(failMemosValidation, { body: { memos: [] } })).toEqual(['memos']);
  });

  it('should require a 32 byte hex subaccount when one is given', async () => {
    expect(
      await runValidation(mintValidation, { body: { owner: 'alice', subaccount: 'abc', amount: 5 } })
    ).toEqual(['subaccount']);
    expect(
      await runValidation(mintValidation, { body: { owner: 'alice', subaccount: 'ab'.repeat(32), amount: 5 } })
    ).toEqual([]);
  });
});
