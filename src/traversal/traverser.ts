/**
 * Traverser: depth-first, pre-order walk over a traversable value.
 *
 * Every visited value is dispatched through the registry's matcher.
 * Containers get a start call whose boolean result gates their children
 * and, when bracketing is configured, an end call after the last child.
 * Child order is fixed: sequence index order, mapping key then value per
 * entry, record members in resolver order, a pointer's single target.
 *
 * Handler errors abort the walk and propagate unchanged; side effects
 * already performed are not rolled back.
 *
 * @example
 * ```typescript
 * const Names = defineContextKey<string[]>('names');
 * const traverser = Traverser.create(
 *   new CapabilitySet()
 *     .forKind('string', (ctx, visit) => ctx.get(Names)?.push(visit.name))
 *     .forContainer('record', () => true)
 * );
 * const ctx = traverser.traverse(value, new TraversalContext().put(Names, []));
 * ```
 */

import type { TraversalEventEmitter } from '../events/event-emitter.js';
import type { ContainerVisit, Visit } from '../handler/types.js';
import { createLogger } from '../logging/index.js';
import { BindingRegistry } from '../registry/binding-registry.js';
import type { CapabilityEntry, CapabilitySet } from '../registry/capability-set.js';
import {
  AsyncHandlerError,
  ContainerEndError,
  HandlerReturnError,
  InvariantViolationError,
} from '../registry/errors.js';
import { Matcher, type Resolution } from '../registry/matcher.js';
import { ValueReflector } from '../value/reflect.js';
import { typeNameOf } from '../value/types.js';
import type { ContainerValue, TraversableValue } from '../value/values.js';
import type { TraversalConfigInput } from './config.js';
import { TraversalContext } from './context.js';
import { ROOT_POSITION, TraversalFrame } from './frame.js';
import type { Property } from './properties.js';

const log = createLogger('traverser');

export interface TraverserOptions {
  /** Receives walk lifecycle and skipped-binding events */
  events?: TraversalEventEmitter;
  /** Reflector used by traverseNative (default: a private instance) */
  reflector?: ValueReflector;
}

interface WalkState {
  readonly context: TraversalContext;
  readonly walkId: number;
  visits: number;
}

type ContainerResolution = Extract<Resolution, { outcome: 'container' }>;

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Fail the walk on a handler that returned a promise. The promise's own
 * rejection is observed here so it does not surface as unhandled.
 */
function rejectAsyncResult(bindingName: string, result: unknown): void {
  if (!isThenable(result)) {
    return;
  }
  Promise.resolve(result).catch((error: unknown) => {
    log.debug({ binding: bindingName, err: error }, 'async handler rejected after the walk failed');
  });
  throw new AsyncHandlerError(bindingName);
}

export class Traverser {
  readonly registry: BindingRegistry;
  readonly reflector: ValueReflector;

  private readonly matcher: Matcher;
  private readonly events: TraversalEventEmitter | null;

  constructor(registry: BindingRegistry, options: TraverserOptions = {}) {
    this.registry = registry;
    this.matcher = new Matcher(registry);
    this.events = options.events ?? null;
    this.reflector = options.reflector ?? new ValueReflector();
  }

  /**
   * Build a registry and a traverser over it in one step.
   */
  static create(
    capabilities: CapabilitySet | readonly CapabilityEntry[],
    config: TraversalConfigInput = {},
    options: TraverserOptions = {}
  ): Traverser {
    return new Traverser(BindingRegistry.build(capabilities, config), options);
  }

  /**
   * Walk a value.
   *
   * A null or undefined root is a no-op.
   *
   * @param root - Value to walk
   * @param context - Shared store passed to every handler (default: a fresh one)
   * @returns The context, for reading back what handlers accumulated
   * @throws BindingMissingError if a value has no binding and missing bindings are not tolerated
   * @throws Whatever a handler throws
   */
  traverse(
    root: TraversableValue | null | undefined,
    context: TraversalContext = new TraversalContext()
  ): TraversalContext {
    if (root === null || root === undefined) {
      return context;
    }

    const state: WalkState = {
      context,
      walkId: this.events?.nextWalkId() ?? 0,
      visits: 0,
    };
    const startedAt = Date.now();
    this.events?.emitWalkStarted(state.walkId, root.kind);

    try {
      this.visit(null, root, state);
    } catch (error) {
      this.events?.emitWalkFailed(state.walkId, error, state.visits);
      throw error;
    }

    this.events?.emitWalkCompleted(state.walkId, state.visits, Date.now() - startedAt);
    return context;
  }

  /**
   * Reflect a native JavaScript value and walk it.
   */
  traverseNative(
    input: unknown,
    context: TraversalContext = new TraversalContext()
  ): TraversalContext {
    if (input === null || input === undefined) {
      return context;
    }
    return this.traverse(this.reflector.reflect(input), context);
  }

  private visit(parent: TraversalFrame | null, value: TraversableValue, state: WalkState): void {
    const { index, name } = parent ? parent.childPosition() : ROOT_POSITION;
    const depth = parent ? parent.depth : 0;

    // Unbound pointers are unwrapped in place, not by recursion.
    let current = value;
    let resolution = this.matcher.resolve(current);
    while (resolution.outcome === 'dereference') {
      current = resolution.target;
      resolution = this.matcher.resolve(current);
    }

    switch (resolution.outcome) {
      case 'skip':
        if (resolution.reason === 'missing_binding') {
          log.trace({ depth, index, name, kind: current.kind }, 'no binding, value skipped');
          this.events?.emitBindingSkipped({
            walkId: state.walkId,
            depth,
            index,
            name,
            kind: current.kind,
            typeName: typeNameOf(current),
          });
        }
        return;

      case 'nil_pointer': {
        state.visits += 1;
        const result: unknown = resolution.handler(state.context, {
          depth,
          index,
          name,
          value: current,
        });
        rejectAsyncResult(resolution.name, result);
        return;
      }

      case 'value': {
        state.visits += 1;
        const result: unknown = resolution.handler(state.context, {
          depth,
          index,
          name,
          value: current,
        });
        rejectAsyncResult(resolution.descriptor.name, result);
        return;
      }

      case 'container':
        this.enter(parent, resolution, { depth, index, name }, state);
        return;
    }
  }

  private enter(
    parent: TraversalFrame | null,
    resolution: ContainerResolution,
    position: Omit<Visit, 'value'>,
    state: WalkState
  ): void {
    const frame = this.openFrame(parent, resolution);
    const visit: ContainerVisit = {
      ...position,
      value: frame.value,
      size: frame.size,
      phase: 'start',
    };

    state.visits += 1;
    const goIn: unknown = resolution.handler(state.context, visit);
    rejectAsyncResult(resolution.descriptor.name, goIn);
    if (typeof goIn !== 'boolean') {
      throw new HandlerReturnError(resolution.descriptor.name, typeof goIn);
    }
    if (!goIn) {
      return;
    }

    this.visitChildren(frame, state);

    if (this.registry.config.bracketContainers) {
      this.closeFrame(frame, { ...visit, phase: 'end' }, state);
    }
  }

  private openFrame(parent: TraversalFrame | null, resolution: ContainerResolution): TraversalFrame {
    const { size, members } = this.measure(resolution.value);
    return new TraversalFrame({
      value: resolution.value,
      depth: parent ? parent.childDepth : 1,
      size,
      members,
      descriptor: resolution.descriptor,
      handler: resolution.handler,
    });
  }

  private closeFrame(frame: TraversalFrame, visit: ContainerVisit, state: WalkState): void {
    state.visits += 1;
    let result: unknown;
    try {
      result = frame.handler(state.context, visit);
      rejectAsyncResult(frame.descriptor.name, result);
    } catch (error) {
      throw new ContainerEndError(frame.descriptor.name, error);
    }
    if (typeof result !== 'boolean') {
      throw new ContainerEndError(
        frame.descriptor.name,
        new HandlerReturnError(frame.descriptor.name, typeof result)
      );
    }
  }

  private measure(value: ContainerValue): { size: number; members: readonly Property[] | null } {
    switch (value.kind) {
      case 'sequence':
        return { size: value.items.length, members: null };
      case 'mapping':
        return { size: value.entries.size * 2, members: null };
      case 'pointer':
        return { size: value.target === null ? 0 : 1, members: null };
      case 'record': {
        const { count, members } = this.registry.propertiesOf(value);
        return { size: count, members };
      }
    }
  }

  private visitChildren(frame: TraversalFrame, state: WalkState): void {
    const value = frame.value;
    switch (value.kind) {
      case 'sequence':
        for (let i = 0; i < frame.size; i++) {
          const item = value.items[i];
          if (item === undefined) {
            throw new InvariantViolationError(`Sequence ${frame} has no element at ${i}`);
          }
          frame.offset = i;
          this.visit(frame, item, state);
        }
        return;

      case 'mapping': {
        const keys = [...value.entries.keys()];
        if (keys.length * 2 !== frame.size) {
          throw new InvariantViolationError(
            `Mapping ${frame} was measured at ${frame.size / 2} keys but has ${keys.length}`
          );
        }
        keys.forEach((key, i) => {
          frame.offset = i * 2;
          this.visit(frame, key, state);
          const entry = value.entries.get(key);
          if (entry === undefined) {
            throw new InvariantViolationError(`Mapping ${frame} lost the value of key ${i}`);
          }
          frame.offset = i * 2 + 1;
          this.visit(frame, entry, state);
        });
        return;
      }

      case 'record': {
        const members = frame.members ?? [];
        members.forEach((member, i) => {
          if (member.structuralIndex < 0) {
            return;
          }
          const field = value.fields[member.structuralIndex];
          if (field === undefined) {
            throw new InvariantViolationError(
              `Record ${frame} has no field at index ${member.structuralIndex}`
            );
          }
          frame.offset = i;
          this.visit(frame, field, state);
        });
        return;
      }

      case 'pointer':
        if (frame.size > 0 && value.target !== null) {
          frame.offset = 0;
          this.visit(frame, value.target, state);
        }
        return;
    }
  }
}
