/**
 * MQTT feed subscriber for now-playing metadata
 *
 * Subscribes to every topic under the configured prefix and feeds each delivery
 * through the field decoder into the playback store. Reconnects with exponential
 * backoff; while disconnected the store keeps serving the last known state.
 */

import { connect, type IClientOptions } from 'mqtt';
import type { FeedDiagnostics } from '@nowplaying-bridge/protocol';
import { createLogger, exponentialBackoff } from '@nowplaying-bridge/shared';
import type { DecodeResult, FieldDecoder } from './field-decoder.js';
import type { PlaybackStore } from './playback-store.js';

const log = createLogger('FeedSubscriber');

const DEFAULT_RECONNECT_INITIAL_MS = 1000;
const DEFAULT_RECONNECT_MAX_MS = 30000;

/**
 * The part of an MQTT.js client the subscriber uses.
 */
export interface FeedClient {
  on(event: 'connect', listener: () => void): unknown;
  on(event: 'message', listener: (topic: string, payload: Uint8Array) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  subscribe(topic: string, callback: (err: Error | null) => void): unknown;
  reconnect(): unknown;
  end(force?: boolean): unknown;
}

export type FeedClientFactory = (brokerUrl: string, options: IClientOptions) => FeedClient;

export interface FeedSubscriberOptions {
  host: string;
  port: number;
  username?: string;
  password?: string;
  topicPrefix: string;
  decode: FieldDecoder;
  store: PlaybackStore;
  /** Defaults to MQTT.js `connect` */
  createClient?: FeedClientFactory;
  reconnectInitialMs?: number;
  reconnectMaxMs?: number;
  clock?: () => number;
}

interface FeedCounters {
  messagesReceived: number;
  messagesApplied: number;
  messagesIgnored: number;
  decodeErrors: number;
}

export class FeedSubscriber {
  private client: FeedClient | null = null;
  private connected = false;
  private stopped = false;
  private reconnectAttempts = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private lastMessageAt: number | null = null;
  private counters: FeedCounters = {
    messagesReceived: 0,
    messagesApplied: 0,
    messagesIgnored: 0,
    decodeErrors: 0,
  };

  private readonly brokerUrl: string;
  private readonly topicFilter: string;
  private readonly createClient: FeedClientFactory;
  private readonly reconnectInitialMs: number;
  private readonly reconnectMaxMs: number;
  private readonly clock: () => number;

  constructor(private readonly options: FeedSubscriberOptions) {
    this.brokerUrl = `mqtt://${options.host}:${options.port}`;
    this.topicFilter = `${options.topicPrefix}/#`;
    this.createClient = options.createClient ?? connect;
    this.reconnectInitialMs = options.reconnectInitialMs ?? DEFAULT_RECONNECT_INITIAL_MS;
    this.reconnectMaxMs = options.reconnectMaxMs ?? DEFAULT_RECONNECT_MAX_MS;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Connect to the broker and start consuming deliveries.
   * Connection failures are retried in the background; this never throws.
   */
  start(): void {
    if (this.client) {
      log.warn('Already started');
      return;
    }

    this.stopped = false;
    const { username, password } = this.options;

    const clientOptions: IClientOptions = {
      // Reconnects are scheduled here with backoff instead of MQTT.js's fixed period
      reconnectPeriod: 0,
      ...(username && password ? { username, password } : {}),
    };

    log.info(`Connecting to ${this.brokerUrl}`);
    const client = this.createClient(this.brokerUrl, clientOptions);
    this.client = client;

    client.on('connect', () => this.handleConnect(client));
    client.on('message', (topic, payload) => this.handleMessage(topic, payload));
    client.on('close', () => this.handleClose());
    client.on('error', (err) => {
      log.error(`MQTT client error: ${err.message}`);
    });
  }

  /**
   * Stop consuming and disconnect. Pending reconnects are cancelled.
   */
  stop(): void {
    this.stopped = true;

    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }

    if (this.client) {
      this.client.end(true);
      this.client = null;
    }

    this.connected = false;
    log.info('Stopped');
  }

  /**
   * Get diagnostic info for debugging
   */
  getDiagnostics(): FeedDiagnostics {
    return {
      connected: this.connected,
      broker: this.brokerUrl,
      topicFilter: this.topicFilter,
      ...this.counters,
      reconnectAttempts: this.reconnectAttempts,
      lastMessageAt: this.lastMessageAt,
    };
  }

  private handleConnect(client: FeedClient): void {
    this.connected = true;
    this.reconnectAttempts = 0;
    log.info(`Connected to MQTT broker ${this.brokerUrl}`);

    client.subscribe(this.topicFilter, (err) => {
      if (err) {
        log.error(`Subscribe to ${this.topicFilter} failed: ${err.message}`);
        return;
      }
      log.info(`Subscribed to ${this.topicFilter}`);
    });
  }

  private handleClose(): void {
    if (this.connected) {
      log.warn(`Disconnected from MQTT broker ${this.brokerUrl}`);
    }
    this.connected = false;

    if (this.stopped || this.reconnectTimer) return;

    this.reconnectAttempts += 1;
    const delay = exponentialBackoff(
      this.reconnectAttempts,
      this.reconnectInitialMs,
      this.reconnectMaxMs,
    );
    log.info(`Reconnecting in ${delay}ms (attempt ${this.reconnectAttempts})`);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (!this.stopped && this.client) {
        this.client.reconnect();
      }
    }, delay);
  }

  /**
   * Decode one delivery and apply it. Nothing thrown here reaches the client.
   */
  private handleMessage(topic: string, payload: Uint8Array): void {
    this.counters.messagesReceived += 1;
    this.lastMessageAt = this.clock();

    try {
      const result = this.options.decode(topic, payload);
      this.logOutcome(topic, result);
      if (result.status === 'applied') {
        this.options.store.apply(result.instruction);
      }
    } catch (err) {
      log.error(`Error processing message on ${topic}:`, err);
    }
  }

  private logOutcome(topic: string, result: DecodeResult): void {
    switch (result.status) {
      case 'applied': {
        this.counters.messagesApplied += 1;
        const { instruction } = result;
        if (instruction.kind === 'artwork') {
          log.debug(
            instruction.bytes
              ? `Received artwork (${instruction.bytes.length} bytes)`
              : 'Artwork cleared',
          );
        } else {
          log.debug(`${result.suffix}:`, instruction);
        }
        break;
      }

      case 'ignored':
        this.counters.messagesIgnored += 1;
        log.debug(`Ignored ${topic} (${result.reason})`);
        break;

      case 'error':
        this.counters.decodeErrors += 1;
        log.warn(`Malformed payload on ${topic}: ${result.message}`);
        break;
    }
  }
}
