/**
 * Topic subscription multiplexer over one shared WebSocket.
 *
 * The socket opens on the first subscription, replays every tracked topic
 * after each (re)connect, and closes once the last listener has been gone
 * for the grace period.
 */

import WebSocket from "ws";
import type { z } from "zod";
import type { DexConfig } from "../shared/config";
import { WebSocketError } from "./error";
import {
  createSubscribeRequest,
  createUnsubscribeRequest,
  parseWsMessage,
  type WsDataMessage,
  type WsRequest,
} from "./types";

/** Subprotocol announced alongside the API key */
export const WS_SUBPROTOCOL = "decibel";

/**
 * Subscription client configuration.
 */
export interface WsSubscriptionOptions {
  /** Sent as the second subprotocol */
  apiKey?: string;
  /** Receives connection, protocol, validation and timeout errors */
  onError?: (error: WebSocketError) => void;
  /** Per-listener time limit (default: 10000) */
  listenerTimeoutMs?: number;
  /** Idle time before the socket closes (default: 500) */
  closeGracePeriodMs?: number;
  /** Reconnect backoff cap (default: 60000) */
  maxReconnectDelayMs?: number;
}

export type ConnectionState = "Closed" | "Connecting" | "Open" | "Reconnecting";

/** Handle returned by `subscribe` */
export interface WsSubscription {
  readonly topic: string;
  /** Remove this listener; later calls do nothing */
  unsubscribe(): void;
}

type Listener = (data: Record<string, unknown>) => void | Promise<void>;

// ready states of a `ws` socket
const CLOSED = 3;

/**
 * Delay before reconnect attempt `attempt` (0-based): 1.5^attempt seconds,
 * capped.
 */
export function reconnectDelayMs(attempt: number, maxDelayMs: number = 60_000): number {
  return Math.min(Math.pow(1.5, attempt) * 1000, maxDelayMs);
}

/**
 * Shared subscription socket for the trading WebSocket API.
 *
 * @example
 * ```typescript
 * const ws = new WsSubscriptionClient(TESTNET_CONFIG);
 * const sub = ws.subscribe("all_market_prices", allMarketPricesMessageSchema, (msg) => {
 *   console.log(msg.prices.length);
 * });
 * // later
 * sub.unsubscribe();
 * ```
 */
export class WsSubscriptionClient {
  private readonly url: string;
  private readonly options: Required<Omit<WsSubscriptionOptions, "apiKey" | "onError">>;
  private readonly apiKey?: string;
  private readonly onError?: (error: WebSocketError) => void;

  private ws: WebSocket | null = null;
  private state: ConnectionState = "Closed";
  private readonly subscriptions = new Map<string, Set<Listener>>();
  private reconnectAttempt = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private closeTimer: ReturnType<typeof setTimeout> | null = null;
  private dispatchQueue: Promise<void> = Promise.resolve();

  constructor(config: DexConfig, options: WsSubscriptionOptions = {}) {
    this.url = config.tradingWsUrl;
    this.apiKey = options.apiKey;
    this.onError = options.onError;
    this.options = {
      listenerTimeoutMs: options.listenerTimeoutMs ?? 10_000,
      closeGracePeriodMs: options.closeGracePeriodMs ?? 500,
      maxReconnectDelayMs: options.maxReconnectDelayMs ?? 60_000,
    };
  }

  // ============================================================================
  // PUBLIC API
  // ============================================================================

  /**
   * Listen to a topic. Each payload is validated with `schema` before
   * `onData` sees it.
   */
  subscribe<T>(
    topic: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    onData: (data: T) => void | Promise<void>
  ): WsSubscription {
    let listeners = this.subscriptions.get(topic);
    const isNewTopic = listeners === undefined;
    if (listeners === undefined) {
      listeners = new Set();
      this.subscriptions.set(topic, listeners);
    }

    const listener: Listener = (data) => {
      const result = schema.safeParse(data);
      if (!result.success) {
        const detail = result.error.issues
          .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
          .join("; ");
        throw WebSocketError.validation(topic, detail);
      }
      return onData(result.data);
    };
    listeners.add(listener);

    if (this.closeTimer !== null) {
      clearTimeout(this.closeTimer);
      this.closeTimer = null;
    }

    if (this.ws === null) {
      if (this.state === "Closed") this.open();
    } else if (isNewTopic) {
      this.send(createSubscribeRequest(topic));
    }

    let active = true;
    return {
      topic,
      unsubscribe: () => {
        if (!active) return;
        active = false;
        this.removeListener(topic, listener);
      },
    };
  }

  /**
   * Unsubscribe and resubscribe a topic to get a fresh snapshot.
   * Listeners stay registered.
   */
  reset(topic: string): void {
    if (!this.subscriptions.has(topic) || !this.isOpen()) return;
    this.send(createUnsubscribeRequest(topic));
    this.send(createSubscribeRequest(topic));
  }

  /**
   * Drop every subscription and close the socket. Safe to call repeatedly.
   */
  close(): void {
    this.subscriptions.clear();
    this.clearTimers();
    this.reconnectAttempt = 0;
    this.teardownSocket();
    this.state = "Closed";
  }

  /** `ws` ready state; CLOSED when there is no socket */
  readyState(): number {
    return this.ws?.readyState ?? CLOSED;
  }

  connectionState(): ConnectionState {
    return this.state;
  }

  topics(): string[] {
    return [...this.subscriptions.keys()];
  }

  listenerCount(topic: string): number {
    return this.subscriptions.get(topic)?.size ?? 0;
  }

  /** Resolves once every message received so far has been dispatched */
  async idle(): Promise<void> {
    await this.dispatchQueue;
  }

  // ============================================================================
  // CONNECTION
  // ============================================================================

  private open(): void {
    this.state = "Connecting";
    let socket: WebSocket;
    try {
      socket =
        this.apiKey !== undefined
          ? new WebSocket(this.url, [WS_SUBPROTOCOL, this.apiKey])
          : new WebSocket(this.url);
    } catch (e) {
      this.report(WebSocketError.connectionFailed(e instanceof Error ? e.message : String(e)));
      this.scheduleReconnect();
      return;
    }
    this.ws = socket;

    socket.on("open", () => {
      if (this.ws !== socket) return;
      this.state = "Open";
      this.reconnectAttempt = 0;
      for (const topic of this.subscriptions.keys()) {
        this.send(createSubscribeRequest(topic));
      }
    });

    socket.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      if (this.ws !== socket) return;
      this.dispatchQueue = this.dispatchQueue.then(() => this.handleMessage(data, isBinary));
    });

    socket.on("error", (err: Error) => {
      if (this.ws !== socket) return;
      this.report(WebSocketError.connectionFailed(err.message));
    });

    socket.on("close", () => {
      if (this.ws !== socket) return;
      this.ws = null;
      this.scheduleReconnect();
    });
  }

  private scheduleReconnect(): void {
    if (this.subscriptions.size === 0) {
      this.state = "Closed";
      return;
    }

    const delay = reconnectDelayMs(this.reconnectAttempt, this.options.maxReconnectDelayMs);
    this.reconnectAttempt++;
    this.state = "Reconnecting";
    console.debug(`Reconnecting in ${(delay / 1000).toFixed(1)} seconds (attempt ${this.reconnectAttempt})`);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.subscriptions.size === 0) {
        this.state = "Closed";
        return;
      }
      this.open();
    }, delay);
  }

  private teardownSocket(): void {
    const socket = this.ws;
    this.ws = null;
    if (socket !== null) {
      socket.removeAllListeners();
      // late errors from the closing socket have no listener left
      socket.on("error", () => undefined);
      socket.close();
    }
  }

  private clearTimers(): void {
    if (this.reconnectTimer !== null) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.closeTimer !== null) {
      clearTimeout(this.closeTimer);
      this.closeTimer = null;
    }
  }

  private isOpen(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  /** Control messages wait for the replay on open when the socket is not open */
  private send(message: WsRequest): void {
    if (this.ws === null || !this.isOpen()) return;
    this.ws.send(JSON.stringify(message));
  }

  private removeListener(topic: string, listener: Listener): void {
    const listeners = this.subscriptions.get(topic);
    if (listeners === undefined) return;

    listeners.delete(listener);
    if (listeners.size > 0) return;

    this.subscriptions.delete(topic);
    this.send(createUnsubscribeRequest(topic));

    if (this.subscriptions.size === 0) {
      if (this.reconnectTimer !== null) {
        clearTimeout(this.reconnectTimer);
        this.reconnectTimer = null;
        this.state = "Closed";
      }
      this.closeTimer = setTimeout(() => {
        this.closeTimer = null;
        if (this.subscriptions.size === 0) {
          this.teardownSocket();
          this.state = "Closed";
        }
      }, this.options.closeGracePeriodMs);
    }
  }

  // ============================================================================
  // DISPATCH
  // ============================================================================

  private async handleMessage(raw: WebSocket.RawData, isBinary: boolean): Promise<void> {
    if (isBinary) {
      this.report(WebSocketError.protocol("expected a text frame"));
      return;
    }

    let message: WsDataMessage | null;
    try {
      message = parseWsMessage(raw.toString());
    } catch (e) {
      this.report(e instanceof WebSocketError ? e : WebSocketError.messageParseError(String(e)));
      return;
    }
    if (message === null) return;

    const listeners = this.subscriptions.get(message.topic);
    if (listeners === undefined) return;

    for (const listener of [...listeners]) {
      await this.runListener(message.topic, listener, message.data);
    }
  }

  private async runListener(topic: string, listener: Listener, data: Record<string, unknown>): Promise<void> {
    const timeoutMs = this.options.listenerTimeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(WebSocketError.listenerTimeout(topic, timeoutMs)), timeoutMs);
    });

    try {
      await Promise.race([Promise.resolve().then(() => listener(data)), timeout]);
    } catch (e) {
      if (e instanceof WebSocketError) {
        this.report(e);
      } else {
        console.error(`Error in WebSocket listener for topic ${topic}:`, e);
      }
    } finally {
      clearTimeout(timer);
    }
  }

  private report(error: WebSocketError): void {
    console.error("WebSocket error:", error.message);
    if (this.onError === undefined) return;
    try {
      this.onError(error);
    } catch (e) {
      console.error("WebSocket onError handler threw:", e);
    }
  }
}
