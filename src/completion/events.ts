/**
 * Completion events: typed notifications emitted while attributes are merged
 * and parameters are completed.
 */

import { createLogger } from '../utils/logger.js';

const logger = createLogger('events');

// ---------------------------------------------------------------------------
// Event Types
// ---------------------------------------------------------------------------

export enum CompletionEventKind {
  COMPLETION_STARTED = 'completion_started',
  COMPLETION_FINISHED = 'completion_finished',
  ATTRIBUTES_MERGED = 'attributes_merged',
  CHILD_SKIPPED = 'child_skipped',
  PARAMETER_COMPLETED = 'parameter_completed',
  PARAMETER_UNRESOLVED = 'parameter_unresolved',
}

export interface CompletionEvent {
  kind: CompletionEventKind;
  timestamp: Date;
  data: Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// Event Emitter
// ---------------------------------------------------------------------------

export type CompletionListener = (event: CompletionEvent) => void;

export class CompletionEventEmitter {
  private listeners: CompletionListener[] = [];
  private eventLog: CompletionEvent[] = [];

  on(listener: CompletionListener): void {
    this.listeners.push(listener);
  }

  off(listener: CompletionListener): void {
    this.listeners = this.listeners.filter(l => l !== listener);
  }

  emit(event: CompletionEvent): void {
    this.eventLog.push(event);
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (e) {
        logger.warn({ err: e, kind: event.kind }, 'completion listener failed');
      }
    }
  }

  getEventLog(): CompletionEvent[] {
    return [...this.eventLog];
  }

  clear(): void {
    this.eventLog = [];
  }
}

// ---------------------------------------------------------------------------
// Event Factory Functions
// ---------------------------------------------------------------------------

function makeEvent(kind: CompletionEventKind, data: Record<string, unknown>): CompletionEvent {
  return { kind, timestamp: new Date(), data };
}

export function completionStarted(engine: string, process: string): CompletionEvent {
  return makeEvent(CompletionEventKind.COMPLETION_STARTED, { engine, process });
}

export function completionFinished(engine: string, assignedCount: number, failureCount: number): CompletionEvent {
  return makeEvent(CompletionEventKind.COMPLETION_FINISHED, {
    engine,
    assigned_count: assignedCount,
    failure_count: failureCount,
  });
}

export function attributesMerged(engine: string, child: string, added: string[]): CompletionEvent {
  return makeEvent(CompletionEventKind.ATTRIBUTES_MERGED, { engine, child, added });
}

export function childSkipped(engine: string, child: string, error: string): CompletionEvent {
  return makeEvent(CompletionEventKind.CHILD_SKIPPED, { engine, child, error });
}

export function parameterCompleted(engine: string, parameter: string, value: string): CompletionEvent {
  return makeEvent(CompletionEventKind.PARAMETER_COMPLETED, { engine, parameter, value });
}

export function parameterUnresolved(engine: string, parameter: string, error: string): CompletionEvent {
  return makeEvent(CompletionEventKind.PARAMETER_UNRESOLVED, { engine, parameter, error });
}
