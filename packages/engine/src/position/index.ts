export { Position, positionPnl, type PositionSnapshot, type PositionEntry, type PositionStatus } from './position.js';
export { PositionLedger, type PositionLedgerEvents, type OpenPositionRequest } from './position-ledger.js';
export { PositionsBook } from './positions-book.js';
