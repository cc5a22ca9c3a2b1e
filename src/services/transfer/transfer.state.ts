/**
 * Valid state transitions of an external transfer
 *
 * State Machine:
 * IDLE ──► LOCKED ──► MUTATION_APPLIED ──► AWAITING_RAIL ──► COMMITTED
 *           │ │                               ▲    │
 *           │ │         (funding: no          │    ├──────► ROLLED_BACK
 *           │ └──────── local mutation) ──────┘    │   (rail rejected)
 *           │                                      └──────► STUCK
 *           └──► ROLLED_BACK                          (outcome unknown)
 *          (local write failed before the rail call)
 *
 * LOCKED and MUTATION_APPLIED may also go to STUCK: a restart finds them
 * without knowing whether the rail call went out.
 */

export enum TransferStatus {
  IDLE = 'IDLE',
  LOCKED = 'LOCKED',
  MUTATION_APPLIED = 'MUTATION_APPLIED',
  AWAITING_RAIL = 'AWAITING_RAIL',
  COMMITTED = 'COMMITTED',
  ROLLED_BACK = 'ROLLED_BACK',
  STUCK = 'STUCK',
}

const validTransitions: Record<TransferStatus, TransferStatus[]> = {
  [TransferStatus.IDLE]: [TransferStatus.LOCKED],
  [TransferStatus.LOCKED]: [
    TransferStatus.MUTATION_APPLIED,
    TransferStatus.AWAITING_RAIL,
    TransferStatus.ROLLED_BACK,
    TransferStatus.STUCK,
  ],
  [TransferStatus.MUTATION_APPLIED]: [TransferStatus.AWAITING_RAIL, TransferStatus.STUCK],
  [TransferStatus.AWAITING_RAIL]: [
    TransferStatus.COMMITTED,
    TransferStatus.ROLLED_BACK,
    TransferStatus.STUCK,
  ],
  [TransferStatus.COMMITTED]: [], // Terminal state
  [TransferStatus.ROLLED_BACK]: [], // Terminal state
  [TransferStatus.STUCK]: [], // Terminal state, left to an operator
};

export class InvalidTransitionError extends Error {
  constructor(from: TransferStatus, to: TransferStatus, transferId: string) {
    super(`Invalid state transition from ${from} to ${to} for transfer ${transferId}`);
    this.name = 'InvalidTransitionError';
  }
}

export const isTransferStatus = (value: string): value is TransferStatus =>
  Object.values<string>(TransferStatus).includes(value);

/**
 * Check if a state transition is valid
 */
export function isValidTransition(currentStatus: TransferStatus, newStatus: TransferStatus): boolean {
  return validTransitions[currentStatus].includes(newStatus);
}

/**
 * Throws InvalidTransitionError if the transition is not allowed
 */
export function validateTransition(
  currentStatus: TransferStatus,
  newStatus: TransferStatus,
  transferId: string
): void {
  if (!isValidTransition(currentStatus, newStatus)) {
    throw new InvalidTransitionError(currentStatus, newStatus, transferId);
  }
}

export function isTerminalState(status: TransferStatus): boolean {
  return validTransitions[status].length === 0;
}

export function getAllowedTransitions(status: TransferStatus): TransferStatus[] {
  return validTransitions[status];
}
