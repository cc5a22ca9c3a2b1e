/**
 * Rail Simulation API Validation Rules
 */

import { body } from 'express-validator';
import { isAmountInput } from '../../utils/amount';
import { REJECTION_CODES } from './rail.simulation';

/**
 * Validation rules for simulation configuration
 */
export const simulationConfigValidation = [
  body('enabled')
    .isBoolean()
    .withMessage('enabled must be a boolean'),

  body('failureRate')
    .optional()
    .isFloat({ min: 0, max: 1 })
    .withMessage('failureRate must be between 0 and 1'),

  body('failMemos')
    .optional()
    .isArray()
    .withMessage('failMemos must be an array'),

  body('failMemos.*')
    .optional()
    .isString()
    .notEmpty()
    .withMessage('Each memo must be a non-empty string'),

  body('failureType')
    .optional()
    .isIn(['REJECT', 'TRANSPORT', 'TIMEOUT'])
    .withMessage('failureType must be REJECT, TRANSPORT or TIMEOUT'),

  body('rejectionCode')
    .optional()
    .isIn([...REJECTION_CODES])
    .withMessage(`rejectionCode must be one of: ${REJECTION_CODES.join(', ')}`),

  body('applyBeforeFailure')
    .optional()
    .isBoolean()
    .withMessage('applyBeforeFailure must be a boolean'),
];

export const failMemosValidation = [
  body('memos')
    .isArray({ min: 1 })
    .withMessage('memos must be a non-empty array'),
  body('memos.*')
    .isString()
    .notEmpty()
    .withMessage('Each memo must be a non-empty string'),
];

export const mintValidation = [
  body('owner')
    .isString()
    .notEmpty()
    .withMessage('owner is required'),
  body('subaccount')
    .optional()
    .isHexadecimal()
    .isLength({ min: 64, max: 64 })
    .withMessage('subaccount must be 32 bytes of hex'),
  body('amount')
    .custom(isAmountInput)
    .withMessage('amount must be a non-negative integer in the smallest unit'),
];
