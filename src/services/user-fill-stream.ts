/**
 * UserFillStream - CLOB user channel over WebSocket
 *
 * Subscribes to the authenticated user channel and forwards fills to the
 * FillEventBus. Order events carry the cumulative `size_matched` and are
 * forwarded as-is; trade events carry a per-trade size and are accumulated
 * per taker order, deduplicated by trade id.
 *
 * Endpoint: wss://ws-subscriptions-clob.polymarket.com/ws/user
 * Auth is sent in the subscribe payload, never in headers.
 */

import WebSocket from "ws";
import type { FillEvent, FillEventBus } from "../core/fill-events";
import type { Clock } from "../models/common";
import { systemClock } from "../models/common";
import type { Logger } from "../utils/logger.util";

export type UserStreamState = "DISCONNECTED" | "CONNECTING" | "CONNECTED" | "RECONNECTING";

export interface UserStreamCredentials {
  apiKey: string;
  secret: string;
  passphrase: string;
}

export interface UserFillStreamOptions {
  url: string;
  credentials: UserStreamCredentials;
  reconnectBaseMs?: number;
  reconnectMaxMs?: number;
  pingIntervalMs?: number;
  clock?: Clock;
}

interface OrderMessage {
  type: "order";
  id: string;
  price: string;
  size_matched: string;
  status: string;
}

interface TradeMessage {
  type: "trade";
  id: string;
  taker_order_id: string;
  price: string;
  size: string;
}

export type UserMessage = OrderMessage | TradeMessage;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

function toUserMessage(value: unknown): UserMessage | null {
  if (!isRecord(value)) return null;
  const type = str(value, "event_type") ?? str(value, "type");
  const id = str(value, "id");
  const price = str(value, "price");
  if (!id || !price) return null;

  if (type === "order") {
    const sizeMatched = str(value, "size_matched");
    if (sizeMatched === undefined) return null;
    return { type, id, price, size_matched: sizeMatched, status: str(value, "status") ?? "" };
  }
  if (type === "trade") {
    const taker = str(value, "taker_order_id");
    const size = str(value, "size");
    if (!taker || size === undefined) return null;
    return { type, id, taker_order_id: taker, price, size };
  }
  return null;
}

/**
 * Parse one user-channel frame into the order and trade events it carries.
 * Frames may hold a single event or an array; other frames yield nothing.
 */
export function parseUserMessages(raw: string): UserMessage[] {
  if (raw === "PONG") return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return [];
  }
  const items = Array.isArray(parsed) ? parsed : [parsed];
  return items.map(toUserMessage).filter((m): m is UserMessage => m !== null);
}

const MAX_TRACKED_ORDERS = 5_000;

export class UserFillStream {
  private ws: WebSocket | null = null;
  private state: UserStreamState = "DISCONNECTED";
  private stopped = true;
  private reconnectAttempt = 0;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private pingTimer: NodeJS.Timeout | null = null;
  private readonly clock: Clock;
  /** Cumulative traded size and notional per taker order */
  private readonly tradeTotals = new Map<string, { size: number; notional: number; tradeIds: Set<string> }>();

  constructor(
    private readonly options: UserFillStreamOptions,
    private readonly bus: FillEventBus,
    private readonly logger: Logger,
  ) {
    this.clock = options.clock ?? systemClock;
    this.bus.onRelease((exchangeOrderId) => this.tradeTotals.delete(exchangeOrderId));
  }

  start(): void {
    this.stopped = false;
    this.connect();
  }

  stop(): void {
    this.stopped = true;
    this.clearTimers();
    if (this.ws) {
      this.ws.removeAllListeners();
      this.ws.close(1000, "Client disconnect");
      this.ws = null;
    }
    this.state = "DISCONNECTED";
    this.logger.info("[UserFillStream] Disconnected");
  }

  getState(): UserStreamState {
    return this.state;
  }

  /** Orders with trade totals still held */
  get trackedOrderCount(): number {
    return this.tradeTotals.size;
  }

  /**
   * Forward one frame's fills to the bus. Returns the number delivered.
   */
  async handleMessage(raw: string): Promise<number> {
    let delivered = 0;
    for (const message of parseUserMessages(raw)) {
      const event = this.toFillEvent(message);
      if (!event) continue;
      try {
        if (await this.bus.publish(event)) delivered++;
      } catch (err) {
        this.logger.error(
          `[UserFillStream] Fill for ${event.exchangeOrderId} not applied`,
          err instanceof Error ? err : undefined,
        );
      }
    }
    return delivered;
  }

  private toFillEvent(message: UserMessage): FillEvent | null {
    const timestamp = this.clock();
    const price = parseFloat(message.price);
    if (!Number.isFinite(price)) return null;

    if (message.type === "order") {
      const cumulativeSize = parseFloat(message.size_matched);
      if (!(cumulativeSize > 0)) return null;
      return {
        exchangeOrderId: message.id,
        fillSequence: `ws-order:${message.size_matched}`,
        cumulativeSize,
        price,
        source: "WEBSOCKET",
        timestamp,
      };
    }

    const size = parseFloat(message.size);
    if (!(size > 0)) return null;
    const totals = this.tradeTotals.get(message.taker_order_id) ?? { size: 0, notional: 0, tradeIds: new Set<string>() };
    if (!totals.tradeIds.has(message.id)) {
      totals.tradeIds.add(message.id);
      totals.size += size;
      totals.notional += size * price;
      this.tradeTotals.set(message.taker_order_id, totals);
      if (this.tradeTotals.size > MAX_TRACKED_ORDERS) {
        const oldest = this.tradeTotals.keys().next().value;
        if (oldest !== undefined) this.tradeTotals.delete(oldest);
      }
    }
    return {
      exchangeOrderId: message.taker_order_id,
      fillSequence: `ws-trade:${message.id}`,
      cumulativeSize: totals.size,
      price: totals.notional / totals.size,
      source: "WEBSOCKET",
      timestamp,
    };
  }

  private connect(): void {
    if (this.stopped) return;
    this.state = this.reconnectAttempt > 0 ? "RECONNECTING" : "CONNECTING";
    this.logger.info(`[UserFillStream] ${this.state} to ${this.options.url} (attempt ${this.reconnectAttempt + 1})`);

    const ws = new WebSocket(this.options.url);
    this.ws = ws;

    ws.on("open", () => {
      this.state = "CONNECTED";
      this.reconnectAttempt = 0;
      // Never log this payload: it carries credentials
      ws.send(
        JSON.stringify({
          type: "user",
          markets: [],
          auth: {
            apiKey: this.options.credentials.apiKey,
            secret: this.options.credentials.secret,
            passphrase: this.options.credentials.passphrase,
          },
        }),
      );
      this.startPing();
      this.logger.info("[UserFillStream] Subscribed to user channel");
    });

    ws.on("message", (data: WebSocket.RawData) => {
      void this.handleMessage(data.toString()).catch((err) =>
        this.logger.error("[UserFillStream] Message handling failed", err instanceof Error ? err : undefined),
      );
    });

    ws.on("close", (code: number, reason: Buffer) => {
      this.logger.warn(`[UserFillStream] Closed: code=${code} reason="${reason.toString() || "none"}"`);
      this.ws = null;
      this.clearTimers();
      if (!this.stopped && code !== 1000) this.scheduleReconnect();
      else this.state = "DISCONNECTED";
    });

    ws.on("error", (err: Error) => {
      this.logger.error(`[UserFillStream] WebSocket error: ${err.message}`);
    });
  }

  private startPing(): void {
    const interval = this.options.pingIntervalMs ?? 10_000;
    this.pingTimer = setInterval(() => {
      if (this.ws && this.state === "CONNECTED") this.ws.send("PING");
    }, interval);
  }

  /**
   * Exponential backoff with 30% jitter
   */
  private scheduleReconnect(): void {
    if (this.reconnectTimer) return;
    this.state = "RECONNECTING";
    this.reconnectAttempt++;
    const base = Math.min(
      (this.options.reconnectBaseMs ?? 1_000) * 2 ** (this.reconnectAttempt - 1),
      this.options.reconnectMaxMs ?? 30_000,
    );
    const delay = Math.round(base + Math.random() * base * 0.3);
    this.logger.info(`[UserFillStream] Reconnecting in ${delay}ms`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }

  private clearTimers(): void {
    if (this.pingTimer) clearInterval(this.pingTimer);
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
    this.pingTimer = null;
    this.reconnectTimer = null;
  }
}
