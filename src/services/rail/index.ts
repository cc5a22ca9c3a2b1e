/**
 * Rail Module
 *
 * Typed access to the external ledger that moves value in and out of
 * custody, plus the in-process rail used in test and development.
 */

// Gateway
export { LedgerGateway, LedgerGatewayOptions } from './rail.gateway';
export { RailClient, RailReply, RailTransportError, RailTimeoutError, accountKey, memoText } from './rail.types';

// Transports
export { HttpRailClient, HttpRailClientOptions, parseRailReply, toWireRequest } from './rail.http';
export {
  SimulatedRail,
  SimulatedTransportError,
  FailureType,
  FailureSimulationConfig,
  RejectionCode,
  REJECTION_CODES,
} from './rail.simulation';

// Controller
export { RailController } from './rail.controller';

// Routes
export { createRailRoutes } from './rail.routes';
