import { randomUUID } from 'node:crypto';

import amqp from 'amqplib';
import type { ConfirmChannel } from 'amqplib';

import { logger } from '../logger';

import type { EventEnvelope, EventHandler, IEventBus } from './IEventBus';
import { InMemoryEventBus } from './InMemoryEventBus';

type AmqpConnection = Awaited<ReturnType<typeof amqp.connect>>;

interface RabbitMqEventBusOptions {
  url: string;
  exchange: string;
}

/**
 * Publishes domain events to a durable topic exchange. Subscriptions are
 * served in process; consumers of the exchange live in other services.
 */
export class RabbitMqEventBus implements IEventBus {
  private connection: AmqpConnection | null = null;
  private channel: ConfirmChannel | null = null;
  private connecting: Promise<ConfirmChannel> | null = null;
  private readonly local = new InMemoryEventBus();

  constructor(private readonly options: RabbitMqEventBusOptions) {}

  async publish<T>(event: EventEnvelope<T>): Promise<void> {
    const envelope: EventEnvelope<T> = {
      metadata: { messageId: randomUUID() },
      occurredAt: event.occurredAt ?? new Date(),
      ...event
    };

    const channel = await this.ensureChannel();

    await new Promise<void>((resolve, reject) => {
      channel.publish(
        this.options.exchange,
        envelope.type,
        Buffer.from(JSON.stringify(envelope)),
        {
          contentType: 'application/json',
          persistent: true,
          messageId: envelope.metadata?.messageId,
          type: envelope.type
        },
        (err: unknown) => {
          if (err) {
            reject(err);
          } else {
            resolve();
          }
        }
      );
    });

    await this.local.publish(envelope);
  }

  subscribe(type: string, handler: EventHandler): () => void {
    return this.local.subscribe(type, handler);
  }

  async close(): Promise<void> {
    const connection = this.connection;
    this.reset();
    if (connection) {
      await connection.close();
    }
  }

  private async ensureChannel(): Promise<ConfirmChannel> {
    if (this.channel) {
      return this.channel;
    }

    if (!this.connecting) {
      this.connecting = this.connect().finally(() => {
        this.connecting = null;
      });
    }

    return this.connecting;
  }

  private async connect(): Promise<ConfirmChannel> {
    try {
      const connection = await amqp.connect(this.options.url);
      const channel = await connection.createConfirmChannel();
      await channel.assertExchange(this.options.exchange, 'topic', { durable: true });

      connection.on('error', (error: unknown) => {
        logger.error({ error }, 'RabbitMQ connection error');
        this.reset();
      });

      connection.on('close', () => {
        logger.warn('RabbitMQ connection closed');
        this.reset();
      });

      this.connection = connection;
      this.channel = channel;
      return channel;
    } catch (error) {
      logger.error({ error }, 'Failed to establish RabbitMQ connection');
      this.reset();
      throw error;
    }
  }

  private reset(): void {
    this.channel?.removeAllListeners();
    this.connection?.removeAllListeners();
    this.channel = null;
    this.connection = null;
  }
}
