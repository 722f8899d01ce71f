// Pipeline events
// Used to observe a run without coupling the scheduler to its consumers

import { createLogger, errorMessage } from '../utils/logger.js';

const log = createLogger('EventBus');

export type DomainEventType =
  | 'PipelineStarted'
  | 'StageStarted'
  | 'StageRetrying'
  | 'StageCompleted'
  | 'StageSkipped'
  | 'PipelineAborted'
  | 'PipelineCompleted'
  | 'ReportAggregated';

export const DOMAIN_EVENT_TYPES: readonly DomainEventType[] = [
  'PipelineStarted', 'StageStarted', 'StageRetrying', 'StageCompleted',
  'StageSkipped', 'PipelineAborted', 'PipelineCompleted', 'ReportAggregated',
];

export interface DomainEvent<T = unknown> {
  eventId: string;
  type: DomainEventType;
  timestamp: Date;
  runId: string;
  payload: T;
}

export type EventHandler = (event: DomainEvent) => void;

export interface EventBus {
  emit(event: DomainEvent): void;
  on(type: DomainEventType, handler: EventHandler): void;
  off(type: DomainEventType, handler: EventHandler): void;
}

// Simple in-process event bus implementation
export class SimpleEventBus implements EventBus {
  private handlers = new Map<DomainEventType, Set<EventHandler>>();

  emit(event: DomainEvent): void {
    const typeHandlers = this.handlers.get(event.type);
    if (typeHandlers) {
      for (const handler of typeHandlers) {
        try {
          handler(event);
        } catch (err) {
          log.warn('Event handler failed', { type: event.type, error: errorMessage(err) });
        }
      }
    }
  }

  on(type: DomainEventType, handler: EventHandler): void {
    let typeHandlers = this.handlers.get(type);
    if (!typeHandlers) {
      typeHandlers = new Set();
      this.handlers.set(type, typeHandlers);
    }
    typeHandlers.add(handler);
  }

  off(type: DomainEventType, handler: EventHandler): void {
    this.handlers.get(type)?.delete(handler);
  }
}

/**
 * Emit on any EventBus; a throwing bus or handler is logged and never
 * reaches the pipeline.
 */
export function safeEmit(bus: EventBus | undefined, event: DomainEvent): void {
  if (!bus) return;
  try {
    bus.emit(event);
  } catch (err) {
    log.warn('Event delivery failed', { type: event.type, error: errorMessage(err) });
  }
}
