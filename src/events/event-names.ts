/**
 * Standard event names emitted by traversers.
 */

/**
 * Event names for the walk lifecycle
 */
export const WalkEventNames = {
  /** Emitted before the root value is dispatched */
  WALK_STARTED: 'walk.started',

  /** Emitted when the walk returns normally */
  WALK_COMPLETED: 'walk.completed',

  /** Emitted when a handler, the matcher or an invariant check aborts the walk */
  WALK_FAILED: 'walk.failed',
} as const;

/**
 * Event names for dispatch decisions
 */
export const BindingEventNames = {
  /** Emitted when a value without a binding is skipped under toleratesMissingBinding */
  BINDING_SKIPPED: 'binding.skipped',
} as const;

/**
 * All event names
 */
export const EventNames = {
  ...WalkEventNames,
  ...BindingEventNames,
} as const;

export type WalkEventName = (typeof WalkEventNames)[keyof typeof WalkEventNames];
export type BindingEventName = (typeof BindingEventNames)[keyof typeof BindingEventNames];
export type EventName = (typeof EventNames)[keyof typeof EventNames];
