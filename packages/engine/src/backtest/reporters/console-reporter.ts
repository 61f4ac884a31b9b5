/**
 * Console Reporter for Backtest Results
 *
 * Pretty-prints backtest results to the console.
 */

import type { BacktestResult, BacktestStats, StatValue } from '../types.js';

const NA = 'n/a';

/**
 * Format a number with fixed decimals
 */
export function fmt(n: StatValue, decimals: number = 2): string {
  return n === null ? NA : n.toFixed(decimals);
}

/**
 * Format currency
 */
export function fmtCurrency(n: StatValue): string {
  return n === null ? NA : `$${fmt(n)}`;
}

/**
 * Format percentage
 */
export function fmtPct(n: StatValue): string {
  return n === null ? NA : `${fmt(n, 1)}%`;
}

/**
 * Format a duration in seconds as days/hours/minutes
 */
export function fmtDuration(seconds: StatValue): string {
  if (seconds === null) {
    return NA;
  }
  const days = Math.floor(seconds / 86_400);
  const hours = Math.floor((seconds % 86_400) / 3_600);
  const minutes = Math.floor((seconds % 3_600) / 60);
  return `${days}d ${hours}h ${minutes}m`;
}

function fmtDate(timestamp: StatValue): string {
  return timestamp === null ? NA : new Date(timestamp * 1000).toISOString().split('T')[0] ?? NA;
}

/**
 * Create a horizontal line
 */
function line(char: string = '─', length: number = 60): string {
  return char.repeat(length);
}

/**
 * Print backtest result summary to console
 */
export function printBacktestResult(result: BacktestResult): void {
  const { stats, config, dateRange } = result;

  console.log('\n' + line('═'));
  console.log(`  BACKTEST RESULT: ${config.symbol}`);
  console.log(line('═'));

  console.log('\n📊 CONFIGURATION');
  console.log(line());
  console.log(`  Symbol:       ${config.symbol}`);
  console.log(`  Period:       ${fmtDate(stats.start)} → ${fmtDate(stats.end)}`);
  console.log(`  Bars:         ${dateRange.barCount.toLocaleString()}`);
  console.log(
    `  Starting:     ${Number.isFinite(config.startingEquity) ? fmtCurrency(config.startingEquity) : 'unconstrained'}`
  );

  printStats(stats);

  console.log('\n⏱️  EXECUTION');
  console.log(line());
  console.log(`  Fills:        ${result.fills.length} (${result.droppedOrders} limit orders dropped)`);
  console.log(`  Completed:    ${result.executedAt.toISOString()}`);
  console.log(`  Duration:     ${result.executionTimeMs}ms`);

  console.log('\n' + line('═') + '\n');
}

/**
 * Print stats
 */
export function printStats(stats: BacktestStats): void {
  console.log('\n📈 PERFORMANCE');
  console.log(line());
  console.log(`  Final Equity: ${fmtCurrency(stats.finalEquity)} (peak ${fmtCurrency(stats.peakEquity)})`);
  console.log(`  Total P&L:    ${fmtCurrency(stats.totalPnl)} (${fmtPct(stats.totalPnlPct)})`);
  console.log(`  Realized:     ${fmtCurrency(stats.realizedPnl)} (${fmtPct(stats.realizedPnlPct)})`);
  console.log(`  Unrealized:   ${fmtCurrency(stats.unrealizedPnl)}`);
  console.log(`  Buy & Hold:   ${fmtCurrency(stats.buyAndHoldPnl)} (${fmtPct(stats.buyAndHoldPnlPct)})`);
  console.log(`  Exposure:     ${stats.exposureTime ?? NA} bars (${fmtPct(stats.exposureTimePct)})`);

  console.log('\n💰 TRADES');
  console.log(line());
  console.log(`  Closed:       ${stats.tradeCount ?? NA} (${stats.openPositionCount ?? NA} still open)`);
  console.log(`  Win Rate:     ${fmtPct(stats.winRate === null ? null : stats.winRate * 100)}`);
  console.log(`  Avg Win:      ${fmtCurrency(stats.avgWin)}`);
  console.log(`  Avg Loss:     ${fmtCurrency(stats.avgLoss)}`);
  console.log(`  Best/Worst:   ${fmtCurrency(stats.bestTrade)} / ${fmtCurrency(stats.worstTrade)}`);
  console.log(`  Profit Factor: ${fmt(stats.profitFactor)}`);
  console.log(`  Expectancy:   ${fmtCurrency(stats.expectancy)}`);
  console.log(`  Max Duration: ${fmtDuration(stats.maxPositionDuration)}`);
  console.log(`  Avg Duration: ${fmtDuration(stats.avgPositionDuration)}`);

  console.log('\n⚠️  RISK METRICS');
  console.log(line());
  console.log(`  Max Drawdown: ${fmtCurrency(stats.maxDrawdown)} (${fmtPct(stats.maxDrawdownPct)})`);
  console.log(`  Sharpe:       ${fmt(stats.sharpeRatio)}`);
  console.log(`  Max Consec W: ${stats.maxConsecutiveWins ?? NA}`);
  console.log(`  Max Consec L: ${stats.maxConsecutiveLosses ?? NA}`);
}

/**
 * Print a compact one-line summary
 */
export function printCompactSummary(result: BacktestResult): void {
  const { stats } = result;
  console.log(
    `${result.config.symbol} | ` +
      `${stats.tradeCount ?? 0} trades | ` +
      `${fmtPct(stats.winRate === null ? null : stats.winRate * 100)} WR | ` +
      `${fmtCurrency(stats.totalPnl)} P&L | ` +
      `DD ${fmtPct(stats.maxDrawdownPct)} | ` +
      `Sharpe ${fmt(stats.sharpeRatio)}`
  );
}
