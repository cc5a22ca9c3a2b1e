import { body, param } from 'express-validator';

import { isAmountInput } from '../../utils/amount';

const campaignId = param('id')
  .isString()
  .trim()
  .isLength({ min: 1, max: 128 })
  .withMessage('Campaign ID must be 1 to 128 characters');

const amount = body('amount')
  .exists({ values: 'null' })
  .withMessage('Amount is required')
  .bail()
  .custom(isAmountInput)
  .withMessage('Amount must be a non-negative integer in the smallest unit, as a number or a string of digits');

export const fundCampaignValidation = [campaignId, amount];

export const withdrawCampaignValidation = [campaignId, amount];

export const payProviderValidation = [
  campaignId,
  body('providerId')
    .notEmpty()
    .withMessage('Provider ID is required')
    .isString()
    .withMessage('Provider ID must be a string')
    .isLength({ max: 128 })
    .withMessage('Provider ID cannot exceed 128 characters'),
  amount,
];

export const campaignBalanceValidation = [campaignId];
