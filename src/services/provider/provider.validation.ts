import { body, param } from 'express-validator';

import { isAmountInput } from '../../utils/amount';

const providerId = param('id')
  .isString()
  .trim()
  .isLength({ min: 1, max: 128 })
  .withMessage('Provider ID must be 1 to 128 characters');

export const withdrawProviderValidation = [
  providerId,
  body('amount')
    .exists({ values: 'null' })
    .withMessage('Amount is required')
    .bail()
    .custom(isAmountInput)
    .withMessage('Amount must be a non-negative integer in the smallest unit, as a number or a string of digits'),
];

export const providerEarningsValidation = [providerId];
