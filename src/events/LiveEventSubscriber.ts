import {
  connect,
  consumerOpts,
  DebugEvents,
  Events,
  StringCodec,
  type JetStreamSubscription,
  type JsMsg,
  type NatsConnection,
} from 'nats';
import { config } from '../config.js';
import { logger } from '../logger.js';
import { getErrorMessage } from '../utils/error-handlers.js';
import { SafeJSONError, safeJSONParse } from '../utils/safe-json.js';
import { sanitizeConnectionUrl } from '../utils/url-sanitizer.js';
import { describeLiveEventErrors, isLiveEvent } from './live-event-schema.js';
import type { LiveEvent } from './types.js';

export type LiveEventHandler = (event: LiveEvent) => Promise<unknown>;

export type LiveMessage = Pick<JsMsg, 'data' | 'subject' | 'redelivered' | 'ack' | 'nak'>;

export interface LiveEventSubscriberOptions {
  natsUrl?: string;
  subject?: string;
  maxReconnectAttempts?: number;
  reconnectWaitMs?: number;
}

/**
 * JetStream consumer for the live event feed. One message is in flight at a
 * time so events reach the handler in stream order. Payloads that fail
 * validation are acknowledged and dropped; handler failures are
 * negatively acknowledged for redelivery.
 */
export class LiveEventSubscriber {
  private nc?: NatsConnection;
  private subscription?: JetStreamSubscription;
  private consumeLoop?: Promise<void>;
  private readonly codec = StringCodec();
  private readonly natsUrl: string;
  private readonly subject: string;
  private readonly maxReconnectAttempts: number;
  private readonly reconnectWaitMs: number;

  constructor(options: LiveEventSubscriberOptions = {}) {
    this.natsUrl = options.natsUrl ?? config.liveEvents.natsUrl;
    this.subject = options.subject ?? config.liveEvents.subject;
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? config.liveEvents.maxReconnectAttempts;
    this.reconnectWaitMs = options.reconnectWaitMs ?? config.liveEvents.reconnectWaitMs;
  }

  async connect(): Promise<void> {
    try {
      const nc = await connect({
        servers: this.natsUrl,
        maxReconnectAttempts: this.maxReconnectAttempts,
        reconnectTimeWait: this.reconnectWaitMs,
        name: `review-queue-${config.instanceId}`,
      });
      this.nc = nc;
      logger.info('Connected to NATS server', { url: sanitizeConnectionUrl(this.natsUrl) });
      this.watchStatus(nc);
    } catch (error) {
      logger.error('Failed to connect to NATS', {
        error: getErrorMessage(error),
        url: sanitizeConnectionUrl(this.natsUrl),
      });
      throw error;
    }
  }

  async subscribe(handler: LiveEventHandler): Promise<void> {
    if (!this.nc) {
      throw new Error('NATS connection not established. Call connect() first.');
    }

    const deliverSubject = `_LIVE_DELIVER.${config.instanceId}.${Date.now()}`;
    const opts = consumerOpts()
      .deliverNew()
      .ackExplicit()
      .ackWait(30_000)
      .maxDeliver(3)
      .maxAckPending(1)
      .deliverTo(deliverSubject);

    const subscription = await this.nc.jetstream().subscribe(this.subject, opts);
    this.subscription = subscription;
    logger.info('Subscribed to live events', { subject: this.subject, maxDeliver: 3 });

    this.consumeLoop = this.consume(subscription, handler).catch((error: unknown) => {
      logger.error('Live event consumer stopped', { error: getErrorMessage(error) });
    });
  }

  /** Decodes, validates and dispatches one message, then acks or naks it. */
  async handleMessage(msg: LiveMessage, handler: LiveEventHandler): Promise<void> {
    let event: LiveEvent;
    try {
      event = safeJSONParse(this.codec.decode(msg.data), isLiveEvent);
    } catch (error) {
      logger.warn('Dropping invalid live event', {
        subject: msg.subject,
        error: getErrorMessage(error),
        validation:
          error instanceof SafeJSONError && error.reason === 'validation'
            ? describeLiveEventErrors()
            : undefined,
      });
      msg.ack();
      return;
    }

    try {
      await handler(event);
      msg.ack();
    } catch (error) {
      logger.error('Error processing live event', {
        type: event.type,
        redelivered: msg.redelivered,
        error: getErrorMessage(error),
      });
      msg.nak();
    }
  }

  async close(): Promise<void> {
    if (this.subscription) {
      this.subscription.unsubscribe();
      this.subscription = undefined;
    }
    if (this.consumeLoop) {
      await this.consumeLoop;
      this.consumeLoop = undefined;
    }
    if (this.nc) {
      await this.nc.close();
      this.nc = undefined;
      logger.info('Closed NATS connection');
    }
  }

  isConnected(): boolean {
    return this.nc !== undefined && !this.nc.isClosed();
  }

  private async consume(subscription: JetStreamSubscription, handler: LiveEventHandler): Promise<void> {
    for await (const msg of subscription) {
      await this.handleMessage(msg, handler);
    }
  }

  private watchStatus(nc: NatsConnection): void {
    void (async (): Promise<void> => {
      for await (const status of nc.status()) {
        switch (status.type) {
          case Events.Disconnect:
            logger.warn('Disconnected from NATS server');
            break;
          case Events.Reconnect:
            logger.info('Reconnected to NATS server', { server: status.data });
            break;
          case DebugEvents.Reconnecting:
            logger.warn('Attempting to reconnect to NATS', { attempt: status.data });
            break;
          case Events.Error:
            logger.error('NATS connection error', { error: status.data });
            break;
          default:
            break;
        }
      }
    })().catch((error: unknown) => {
      logger.error('NATS status monitor stopped', { error: getErrorMessage(error) });
    });
  }
}
