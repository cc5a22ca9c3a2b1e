/**
 * Unit tests for the Transfer State Machine
 *
 * Pure functions, no mocking required.
 */

import {
  TransferStatus,
  InvalidTransitionError,
  isTransferStatus,
  isValidTransition,
  validateTransition,
  isTerminalState,
  getAllowedTransitions,
} from '../../../src/services/transfer/transfer.state';

describe('Transfer State Machine', () => {
  describe('isValidTransition', () => {
    describe('from IDLE state', () => {
      it('should allow transition to LOCKED', () => {
        expect(isValidTransition(TransferStatus.IDLE, TransferStatus.LOCKED)).toBe(true);
      });

      it('should not allow skipping the lock', () => {
        expect(isValidTransition(TransferStatus.IDLE, TransferStatus.AWAITING_RAIL)).toBe(false);
        expect(isValidTransition(TransferStatus.IDLE, TransferStatus.COMMITTED)).toBe(false);
      });
    });

    describe('from LOCKED state', () => {
      it('should allow transition to MUTATION_APPLIED', () => {
        expect(isValidTransition(TransferStatus.LOCKED, TransferStatus.MUTATION_APPLIED)).toBe(true);
      });

      it('should allow funding to go straight to AWAITING_RAIL', () => {
        expect(isValidTransition(TransferStatus.LOCKED, TransferStatus.AWAITING_RAIL)).toBe(true);
      });

      it('should allow ROLLED_BACK when the local write fails', () => {
        expect(isValidTransition(TransferStatus.LOCKED, TransferStatus.ROLLED_BACK)).toBe(true);
      });

      it('should not allow COMMITTED before the rail call', () => {
        expect(isValidTransition(TransferStatus.LOCKED, TransferStatus.COMMITTED)).toBe(false);
      });

      it('should allow STUCK for an entry interrupted by a restart', () => {
        expect(isValidTransition(TransferStatus.LOCKED, TransferStatus.STUCK)).toBe(true);
      });
    });

    describe('from MUTATION_APPLIED state', () => {
      it('should only allow AWAITING_RAIL, or STUCK after a restart', () => {
        expect(getAllowedTransitions(TransferStatus.MUTATION_APPLIED)).toEqual([
          TransferStatus.AWAITING_RAIL,
          TransferStatus.STUCK,
        ]);
      });
    });

    describe('from AWAITING_RAIL state', () => {
      it('should allow every terminal state', () => {
        expect(isValidTransition(TransferStatus.AWAITING_RAIL, TransferStatus.COMMITTED)).toBe(true);
        expect(isValidTransition(TransferStatus.AWAITING_RAIL, TransferStatus.ROLLED_BACK)).toBe(true);
        expect(isValidTransition(TransferStatus.AWAITING_RAIL, TransferStatus.STUCK)).toBe(true);
      });

      it('should not allow going back to LOCKED', () => {
        expect(isValidTransition(TransferStatus.AWAITING_RAIL, TransferStatus.LOCKED)).toBe(false);
      });
    });

    describe('from terminal states', () => {
      it.each([TransferStatus.COMMITTED, TransferStatus.ROLLED_BACK, TransferStatus.STUCK])(
        'should not allow any transition from %s',
        (status) => {
          expect(getAllowedTransitions(status)).toEqual([]);
          expect(isValidTransition(status, TransferStatus.AWAITING_RAIL)).toBe(false);
        }
      );
    });
  });

  describe('validateTransition', () => {
    it('should not throw for a valid transition', () => {
      expect(() =>
        validateTransition(TransferStatus.LOCKED, TransferStatus.AWAITING_RAIL, 'tr-1')
      ).not.toThrow();
    });

    it('should throw InvalidTransitionError naming both states and the transfer', () => {
      expect(() => validateTransition(TransferStatus.STUCK, TransferStatus.COMMITTED, 'tr-1')).toThrow(
        new InvalidTransitionError(TransferStatus.STUCK, TransferStatus.COMMITTED, 'tr-1')
      );
      expect(() => validateTransition(TransferStatus.STUCK, TransferStatus.COMMITTED, 'tr-1')).toThrow(
        'Invalid state transition from STUCK to COMMITTED for transfer tr-1'
      );
    });
  });

  describe('isTerminalState', () => {
    it('should identify terminal states', () => {
      expect(isTerminalState(TransferStatus.COMMITTED)).toBe(true);
      expect(isTerminalState(TransferStatus.ROLLED_BACK)).toBe(true);
      expect(isTerminalState(TransferStatus.STUCK)).toBe(true);
    });

    it('should identify non-terminal states', () => {
      expect(isTerminalState(TransferStatus.IDLE)).toBe(false);
      expect(isTerminalState(TransferStatus.LOCKED)).toBe(false);
      expect(isTerminalState(TransferStatus.MUTATION_APPLIED)).toBe(false);
      expect(isTerminalState(TransferStatus.AWAITING_RAIL)).toBe(false);
    });
  });

  describe('isTransferStatus', () => {
    it('should accept known statuses and refuse anything else', () => {
      expect(isTransferStatus('STUCK')).toBe(true);
      expect(isTransferStatus('stuck')).toBe(false);
      expect(isTransferStatus('COMPLETED')).toBe(false);
    });
  });
});
