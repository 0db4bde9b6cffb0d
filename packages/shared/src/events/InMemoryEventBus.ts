import { randomUUID } from 'node:crypto';

import { logger } from '../logger';

import type { EventEnvelope, EventHandler, IEventBus } from './IEventBus';

export class InMemoryEventBus implements IEventBus {
  private readonly handlers = new Map<string, Set<EventHandler>>();

  async publish<T>(event: EventEnvelope<T>): Promise<void> {
    const handlers = this.handlers.get(event.type);
    if (!handlers || handlers.size === 0) {
      logger.debug({ eventType: event.type }, 'No handlers registered for event');
      return;
    }

    const envelope: EventEnvelope<T> = {
      metadata: { messageId: randomUUID() },
      occurredAt: event.occurredAt ?? new Date(),
      ...event
    };

    await Promise.all(Array.from(handlers.values()).map(async (handler) => handler(envelope)));
  }

  subscribe(type: string, handler: EventHandler): () => void {
    const handlers = this.handlers.get(type) ?? new Set<EventHandler>();
    handlers.add(handler);
    this.handlers.set(type, handlers);

    return () => {
      const registered = this.handlers.get(type);
      if (!registered) return;
      registered.delete(handler);
      if (registered.size === 0) {
        this.handlers.delete(type);
      }
    };
  }
}
