// Domain events emitted while a request moves through the agent pipeline

import { randomUUID } from 'node:crypto';

export type DomainEventType =
  // Orchestration
  | 'RequestStarted'
  | 'TimeboxExpired'
  | 'ReportAssembled'
  // Agents
  | 'PlanCreated'
  | 'RetrievalCompleted'
  | 'CandidateSynthesized'
  | 'CritiqueCompleted'
  | 'StructuredAttemptFailed'
  | 'SectionGenerated'
  // Collaborators
  | 'ModelFallback'
  | 'AdapterDisabled'
  | 'KnowledgeMerged';

export interface DomainEvent<T = unknown> {
  eventId: string;
  type: DomainEventType;
  timestamp: Date;
  sourceContext: string;
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
        handler(event);
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

export const ALL_EVENT_TYPES: readonly DomainEventType[] = [
  'RequestStarted', 'TimeboxExpired', 'ReportAssembled',
  'PlanCreated', 'RetrievalCompleted', 'CandidateSynthesized',
  'CritiqueCompleted', 'StructuredAttemptFailed', 'SectionGenerated',
  'ModelFallback', 'AdapterDisabled', 'KnowledgeMerged',
];

export function createEvent<T>(type: DomainEventType, sourceContext: string, payload: T): DomainEvent<T> {
  return {
    eventId: randomUUID(),
    type,
    timestamp: new Date(),
    sourceContext,
    payload,
  };
}
