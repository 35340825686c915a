/**
 * Events module for traversers.
 *
 * Provides event names and the typed emitter.
 */

// Event emitter
export {
  type BindingSkippedPayload,
  TraversalEventEmitter,
  type TraversalEventMap,
  type WalkCompletedPayload,
  type WalkFailedPayload,
  type WalkStartedPayload,
} from './event-emitter.js';
// Event names
export {
  type BindingEventName,
  BindingEventNames,
  type EventName,
  EventNames,
  type WalkEventName,
  WalkEventNames,
} from './event-names.js';
