/**
 * Accounting Module
 *
 * Exports for the PnL table and equity curve
 */

export { buildPnlTable, markPosition, equityCurve } from './pnl-engine.js';
