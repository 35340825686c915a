/**
 * Event emitter for traversal lifecycle events.
 *
 * Listeners run synchronously inside the walk; a listener that throws
 * aborts it like a handler would.
 */

import { EventEmitter } from 'eventemitter3';
import type { ValueKind } from '../value/kinds.js';
import { BindingEventNames, WalkEventNames } from './event-names.js';

/**
 * Event payload types
 */
export interface WalkStartedPayload {
  walkId: number;
  rootKind: ValueKind;
  startedAt: Date;
}

export interface WalkCompletedPayload {
  walkId: number;
  /** Handler invocations, start and end calls counted separately */
  visits: number;
  durationMs: number;
  completedAt: Date;
}

export interface WalkFailedPayload {
  walkId: number;
  error: unknown;
  visits: number;
  failedAt: Date;
}

export interface BindingSkippedPayload {
  walkId: number;
  depth: number;
  index: number;
  name: string;
  kind: ValueKind;
  typeName: string;
}

/**
 * Event map for type-safe event handling
 */
export interface TraversalEventMap {
  'walk.started': [WalkStartedPayload];
  'walk.completed': [WalkCompletedPayload];
  'walk.failed': [WalkFailedPayload];
  'binding.skipped': [BindingSkippedPayload];
}

/**
 * Type-safe event emitter for traversal events
 */
export class TraversalEventEmitter extends EventEmitter<TraversalEventMap> {
  private walkCounter = 0;

  /**
   * Allocate an id for a new walk
   */
  nextWalkId(): number {
    this.walkCounter += 1;
    return this.walkCounter;
  }

  emitWalkStarted(walkId: number, rootKind: ValueKind): void {
    this.emit(WalkEventNames.WALK_STARTED, { walkId, rootKind, startedAt: new Date() });
  }

  emitWalkCompleted(walkId: number, visits: number, durationMs: number): void {
    this.emit(WalkEventNames.WALK_COMPLETED, {
      walkId,
      visits,
      durationMs,
      completedAt: new Date(),
    });
  }

  emitWalkFailed(walkId: number, error: unknown, visits: number): void {
    this.emit(WalkEventNames.WALK_FAILED, { walkId, error, visits, failedAt: new Date() });
  }

  emitBindingSkipped(payload: BindingSkippedPayload): void {
    this.emit(BindingEventNames.BINDING_SKIPPED, payload);
  }
}
