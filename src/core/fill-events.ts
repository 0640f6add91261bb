/**
 * Fill Event Bus
 *
 * Fill reports arrive from the websocket user channel and from REST polling,
 * often for the same fill. The bus drops reports already seen for an
 * (orderId, fillSequence) pair and reports that do not advance the order's
 * cumulative filled size, then hands the rest to one handler.
 *
 * A fill can arrive before the submit acknowledgement that tells the handler
 * which order it belongs to. The handler reports such events as unknown; the
 * bus keeps the latest one per exchange order id for replay and marks
 * nothing as seen.
 */

import type { FillSource } from "./audit-trail";
import type { Logger } from "../utils/logger.util";

/**
 * A cumulative fill report keyed by our order id or the exchange order id
 */
export interface FillEvent {
  /** Exchange order id as reported by the venue */
  exchangeOrderId: string;
  /** Venue trade id, or a synthetic sequence for polled snapshots */
  fillSequence: string;
  /** Cumulative shares filled on the order */
  cumulativeSize: number;
  /** Average fill price so far */
  price: number;
  source: FillSource;
  timestamp: number;
}

/**
 * Resolves true when the event's order is known and the fill was applied
 */
export type FillHandler = (event: FillEvent) => Promise<boolean>;

export type ReleaseListener = (exchangeOrderId: string) => void;

const MAX_TRACKED_SEQUENCES = 10_000;
const MAX_PARKED_EVENTS = 1_000;

export class FillEventBus {
  private handler: FillHandler | null = null;
  private readonly seen = new Set<string>();
  private readonly highWater = new Map<string, number>();
  private readonly parked = new Map<string, FillEvent>();
  private readonly releaseListeners: ReleaseListener[] = [];
  private duplicates = 0;

  constructor(private readonly logger: Logger) {}

  subscribe(handler: FillHandler): void {
    this.handler = handler;
  }

  onRelease(listener: ReleaseListener): void {
    this.releaseListeners.push(listener);
  }

  /**
   * Returns true when the event was new and delivered
   */
  async publish(event: FillEvent): Promise<boolean> {
    const key = `${event.exchangeOrderId}:${event.fillSequence}`;
    if (this.seen.has(key)) {
      this.duplicates++;
      return false;
    }

    const previous = this.highWater.get(event.exchangeOrderId) ?? 0;
    if (event.cumulativeSize <= previous) {
      this.duplicates++;
      this.remember(key);
      return false;
    }

    if (!this.handler) {
      this.logger.warn(`[FillEventBus] No handler for fill on ${event.exchangeOrderId}, dropping`);
      return false;
    }

    // Marked only after the handler succeeds so a failed apply can be redelivered
    if (!(await this.handler(event))) {
      this.park(event);
      return false;
    }
    this.remember(key);
    const parked = this.parked.get(event.exchangeOrderId);
    if (parked && parked.cumulativeSize <= event.cumulativeSize) this.parked.delete(event.exchangeOrderId);
    this.highWater.set(event.exchangeOrderId, Math.max(event.cumulativeSize, this.highWater.get(event.exchangeOrderId) ?? 0));
    return true;
  }

  /**
   * Forget an order once it is settled
   */
  release(exchangeOrderId: string): void {
    this.highWater.delete(exchangeOrderId);
    this.parked.delete(exchangeOrderId);
    for (const listener of this.releaseListeners) listener(exchangeOrderId);
  }

  /**
   * Redeliver the fill parked for an order whose exchange id is now known.
   * Returns true when it was applied.
   */
  async replay(exchangeOrderId: string): Promise<boolean> {
    const event = this.parked.get(exchangeOrderId);
    if (!event) return false;
    this.parked.delete(exchangeOrderId);
    return this.publish(event);
  }

  get parkedCount(): number {
    return this.parked.size;
  }

  get duplicateCount(): number {
    return this.duplicates;
  }

  private park(event: FillEvent): void {
    const current = this.parked.get(event.exchangeOrderId);
    if (current && current.cumulativeSize >= event.cumulativeSize) return;
    this.parked.delete(event.exchangeOrderId);
    this.parked.set(event.exchangeOrderId, event);
    if (this.parked.size > MAX_PARKED_EVENTS) {
      const oldest = this.parked.keys().next().value;
      if (oldest !== undefined) this.parked.delete(oldest);
    }
    this.logger.debug(`[FillEventBus] Parked fill for unknown order ${event.exchangeOrderId}`);
  }

  private remember(key: string): void {
    this.seen.add(key);
    if (this.seen.size > MAX_TRACKED_SEQUENCES) {
      const oldest = this.seen.values().next().value;
      if (oldest !== undefined) this.seen.delete(oldest);
    }
  }
}
