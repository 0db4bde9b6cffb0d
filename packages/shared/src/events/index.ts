import { config, type AppConfig } from '../config';
import { logger } from '../logger';

import type { IEventBus } from './IEventBus';
import { InMemoryEventBus } from './InMemoryEventBus';
import { RabbitMqEventBus } from './RabbitMqEventBus';

let cachedBus: IEventBus | null = null;

export function buildEventBusForConfig(appConfig: AppConfig): IEventBus {
  if (appConfig.EVENT_BUS_DRIVER === 'rabbitmq') {
    if (!appConfig.EVENT_BUS_URL) {
      logger.warn('EVENT_BUS_URL not provided; falling back to in-memory event bus');
      return new InMemoryEventBus();
    }

    return new RabbitMqEventBus({
      url: appConfig.EVENT_BUS_URL,
      exchange: appConfig.EVENT_BUS_EXCHANGE
    });
  }

  return new InMemoryEventBus();
}

export function getEventBus(): IEventBus {
  if (!cachedBus) {
    cachedBus = buildEventBusForConfig(config);
  }

  return cachedBus;
}

/**
 * Publishes after the surrounding work has committed. Delivery problems are
 * logged and never reach the caller.
 */
export async function publishSafely<T>(bus: IEventBus, type: string, payload: T): Promise<void> {
  try {
    await bus.publish({ type, payload });
  } catch (error) {
    logger.warn({ error, eventType: type }, 'Failed to publish domain event');
  }
}

export * from './IEventBus';
export { InMemoryEventBus } from './InMemoryEventBus';
export { RabbitMqEventBus } from './RabbitMqEventBus';
export * from './contracts';
