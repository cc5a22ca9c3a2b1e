/**
 * Transfer Module
 *
 * Coordinates value moving across the rail and between campaigns and
 * providers.
 */

export { TransferCoordinator, TransferCoordinatorDeps, ExternalTransferResult, FundResult, PaymentResult } from './transfer.service';
export { TransferJournal, TransferKind, TransferRecord } from './transfer.journal';
export { EntityLockTable, lockKey } from './entity.lock';
export {
  TransferStatus,
  InvalidTransitionError,
  isValidTransition,
  validateTransition,
  isTerminalState,
  getAllowedTransitions,
} from './transfer.state';
export { TransferController } from './transfer.controller';
export { createTransferRoutes } from './transfer.routes';
