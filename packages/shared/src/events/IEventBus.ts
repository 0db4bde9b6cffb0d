export interface EventEnvelope<T = unknown> {
  type: string;
  payload: T;
  occurredAt?: Date;
  metadata?: Record<string, unknown> & { messageId?: string };
}

export type EventHandler = (event: EventEnvelope) => Promise<void> | void;

export interface IEventBus {
  publish<T>(event: EventEnvelope<T>): Promise<void>;
  subscribe(type: string, handler: EventHandler): () => void;
}
