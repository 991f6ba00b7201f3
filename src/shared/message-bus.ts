// Message Bus Service - Redis Pub/Sub for copier events
// Publishing is a no-op until connect() succeeds, so the copier runs without Redis

import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import logger from './logger';

export enum Channel {
  RUN_START = 'copier:run:start',
  RUN_COMPLETE = 'copier:run:complete',
  RUN_ABORTED = 'copier:run:aborted',

  TARGET_FAILED = 'copier:target:failed',

  ORDER_COPIED = 'copier:order:copied',
  ORDER_REJECTED = 'copier:order:rejected',

  ORPHAN_FLAGGED = 'copier:orphan:flagged',
  ORPHAN_CLEARED = 'copier:orphan:cleared',
}

export interface Message<T = unknown> {
  type: string;
  timestamp: Date;
  source: string;
  data: T;
  id: string;
  correlationId?: string;
}

class MessageBus {
  private publisher: Redis | null = null;
  public isConnected: boolean = false;
  private serviceId: string;

  private host: string;
  private port: number;
  private password?: string;
  private db: number;

  constructor() {
    this.serviceId = `${process.env.SERVICE_NAME || 'order-copier'}-${process.pid}`;

    this.host = process.env.REDIS_HOST || '127.0.0.1';
    this.port = Number.parseInt(process.env.REDIS_PORT || '6379', 10);
    this.password = process.env.REDIS_PASSWORD;
    this.db = Number.parseInt(process.env.REDIS_DB || '0', 10);
  }

  /**
   * Open the publisher connection
   */
  async connect(): Promise<void> {
    if (this.isConnected) {
      logger.warn('[MessageBus] Already connected');
      return;
    }

    try {
      this.publisher = new Redis({
        host: this.host,
        port: this.port,
        password: this.password,
        db: this.db,
        lazyConnect: true,
        maxRetriesPerRequest: 3,
        retryStrategy: (times: number) => {
          const delay = Math.min(times * 50, 2000);
          logger.warn(`[MessageBus] Publisher reconnect attempt ${times}, delay ${delay}ms`);
          return delay;
        },
      });

      this.publisher.on('error', (error) => {
        logger.error('[MessageBus] Publisher error:', error);
      });

      await this.publisher.connect();
      await this.publisher.ping();

      this.isConnected = true;
      logger.info(`[MessageBus] Connected to redis://${this.host}:${this.port}/${this.db}`);
    } catch (error) {
      logger.error('[MessageBus] Failed to connect:', error);
      await this.disconnect();
      throw error;
    }
  }

  /**
   * Publish a message to a channel. Resolves false when not connected.
   */
  async publish<T>(channel: Channel, data: T, correlationId?: string): Promise<boolean> {
    if (!this.publisher || !this.isConnected) {
      logger.debug(`[MessageBus] Not connected, dropping ${channel}`);
      return false;
    }

    try {
      const message: Message<T> = {
        type: channel,
        timestamp: new Date(),
        source: this.serviceId,
        data,
        id: uuidv4(),
        correlationId,
      };

      await this.publisher.publish(channel, JSON.stringify(message));
      return true;
    } catch (error) {
      logger.error(`[MessageBus] Failed to publish to ${channel}:`, error);
      return false;
    }
  }

  async disconnect(): Promise<void> {
    const publisher = this.publisher;
    this.publisher = null;
    this.isConnected = false;

    if (publisher) {
      await publisher.quit().catch(() => publisher.disconnect());
      logger.info('[MessageBus] Disconnected');
    }
  }

  getStatus(): { connected: boolean; host: string; port: number } {
    return {
      connected: this.isConnected,
      host: this.host,
      port: this.port,
    };
  }
}

const messageBus = new MessageBus();
export default messageBus;
