/**
 * Position Ledger
 *
 * Ordered record of every position a run created, open and closed.
 * The backtester owns the only instance; everything outside it gets snapshots.
 */

import { EventEmitter } from 'events';
import { UnknownPositionError } from '../errors.js';
import { Position, type PositionSnapshot } from './position.js';

/**
 * Ledger Events
 */
export interface PositionLedgerEvents {
  'position:opened': (position: PositionSnapshot) => void;
  'position:closed': (position: PositionSnapshot, realizedPnl: number) => void;
}

export interface OpenPositionRequest {
  symbol: string;
  quantity: number;
  entryTime: number;
  entryPrice: number;
}

export class PositionLedger extends EventEmitter {
  private positions: Position[] = [];
  private openById = new Map<number, Position>();
  private nextId = 1;

  /**
   * Create a new open position with the next id
   */
  open(request: OpenPositionRequest): PositionSnapshot {
    const position = new Position({ id: this.nextId, ...request });
    this.nextId += 1;
    this.positions.push(position);
    this.openById.set(position.id, position);

    const snapshot = position.toSnapshot();
    this.emit('position:opened', snapshot);
    return snapshot;
  }

  /**
   * Close an open position at the given fill
   */
  close(id: number, exitTime: number, exitPrice: number): PositionSnapshot {
    const position = this.requireOpen(id);
    const realized = position.close(exitTime, exitPrice);
    this.openById.delete(id);

    const snapshot = position.toSnapshot();
    this.emit('position:closed', snapshot, realized);
    return snapshot;
  }

  /**
   * Throws UnknownPositionError unless `id` refers to an open position
   */
  requireOpen(id: number): Position {
    const position = this.openById.get(id);
    if (position) {
      return position;
    }
    const known = this.positions.some((p) => p.id === id);
    throw new UnknownPositionError(id, known ? 'closed' : 'unknown');
  }

  openPositions(): readonly Position[] {
    return Array.from(this.openById.values());
  }

  get size(): number {
    return this.positions.length;
  }

  get openCount(): number {
    return this.openById.size;
  }

  snapshots(): PositionSnapshot[] {
    return this.positions.map((p) => p.toSnapshot());
  }

  openSnapshots(): PositionSnapshot[] {
    return this.openPositions().map((p) => p.toSnapshot());
  }
}
