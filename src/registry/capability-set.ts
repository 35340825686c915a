/**
 * Capability sets: the handlers a registry is built from.
 *
 * Capabilities are declared either explicitly, one rule per call, or
 * by handing over an adapter object whose method names follow the
 * binding taxonomy. Declaration order is the precedence order.
 *
 * @example Explicit registration
 * ```typescript
 * const capabilities = new CapabilitySet()
 *   .forType(UserId, (ctx, visit) => ids.push(visit.value))
 *   .forKind('string', (ctx, visit) => names.push(visit.name))
 *   .forContainer('record', () => true);
 * ```
 *
 * @example Adapter object
 * ```typescript
 * class Printer {
 *   forTypeUserId(ctx: TraversalContext, visit: Visit): void { ... }
 *   forContainerRecord(ctx: TraversalContext, visit: ContainerVisit): boolean { return true; }
 * }
 * const capabilities = CapabilitySet.fromAdapter(new Printer(), { types: { forTypeUserId: UserId } });
 * ```
 */

import type {
  ContainerHandler,
  ContainerVisit,
  ValueHandler,
  Visit,
} from '../handler/types.js';
import { createLogger } from '../logging/index.js';
import type { TraversalContext } from '../traversal/context.js';
import type { ContainerKind, ScalarKind } from '../value/kinds.js';
import type { ConcreteType, InterfaceType, TypeToken } from '../value/types.js';
import {
  type BindingRule,
  CONTAINER_PREFIX,
  classifyBindingName,
  IMPL_PREFIX,
  INT_FAMILY_NAME,
  KIND_PREFIX,
  NIL_POINTER_NAME,
  TYPE_PREFIX,
  UINT_FAMILY_NAME,
} from './binding-kind.js';
import { InvalidAdapterError } from './errors.js';

const log = createLogger('capability-set');

export type ContainerRule = Extract<BindingRule, { binding: 'container' }>;
export type ValueRule = Exclude<BindingRule, { binding: 'container' }>;

/**
 * Handlers as stored: return values are checked at call time.
 */
export type BoundValueHandler = (context: TraversalContext, visit: Visit) => unknown;
export type BoundContainerHandler = (context: TraversalContext, visit: ContainerVisit) => unknown;

/**
 * One declared capability, before validation.
 */
export type CapabilityEntry =
  | {
      readonly shape: 'value';
      readonly name: string;
      readonly rule: ValueRule;
      readonly handler: BoundValueHandler;
      /** Parameters the handler declares */
      readonly arity: number;
    }
  | {
      readonly shape: 'container';
      readonly name: string;
      readonly rule: ContainerRule;
      readonly handler: BoundContainerHandler;
      readonly arity: number;
    };

export interface AdapterOptions {
  /** Type tokens for forImpl and forType methods, keyed by method name */
  types?: Readonly<Record<string, TypeToken>>;
}

function pascal(kind: string): string {
  return kind
    .split('_')
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join('');
}

/**
 * Ordered collection of capability entries.
 */
export class CapabilitySet {
  private readonly entries: CapabilityEntry[] = [];
  private readonly skipped: string[] = [];

  /**
   * Build a capability set from an adapter's methods.
   *
   * Members are taken base class first, then derived classes, then own
   * properties; an override keeps the position of the member it overrides.
   * Names outside the taxonomy are ignored, as are forImpl/forType names
   * without a matching token in `options.types`.
   *
   * @throws InvalidAdapterError if the adapter is not an object
   */
  static fromAdapter(adapter: unknown, options: AdapterOptions = {}): CapabilitySet {
    if (adapter === null || (typeof adapter !== 'object' && typeof adapter !== 'function')) {
      throw new InvalidAdapterError(adapter === null ? 'null' : typeof adapter);
    }

    const set = new CapabilitySet();
    for (const name of memberNames(adapter)) {
      const method = lookupMethod(adapter, name);
      if (method === undefined) {
        continue;
      }
      const classification = classifyBindingName(name);
      if (classification === null) {
        continue;
      }

      const handler = (context: TraversalContext, visit: Visit): unknown =>
        Reflect.apply(method, adapter, [context, visit]);
      const arity = method.length;

      switch (classification.binding) {
        case 'interface':
        case 'type': {
          const token = options.types?.[name];
          const rule = tokenRule(classification.binding, token);
          if (rule === null) {
            log.debug({ binding: name }, 'type-bound method has no matching type token');
            set.skipped.push(name);
            continue;
          }
          set.entries.push({ shape: 'value', name, rule, handler, arity });
          break;
        }
        case 'container':
          set.entries.push({ shape: 'container', name, rule: classification, handler, arity });
          break;
        default:
          set.entries.push({ shape: 'value', name, rule: classification, handler, arity });
      }
    }
    return set;
  }

  forInterface(
    token: InterfaceType,
    handler: ValueHandler,
    name = `${IMPL_PREFIX}${token.name}`
  ): this {
    return this.add({
      shape: 'value',
      name,
      rule: { binding: 'interface', token },
      handler,
      arity: handler.length,
    });
  }

  forType(token: ConcreteType, handler: ValueHandler, name = `${TYPE_PREFIX}${token.name}`): this {
    return this.add({
      shape: 'value',
      name,
      rule: { binding: 'type', token },
      handler,
      arity: handler.length,
    });
  }

  forKind(kind: ScalarKind, handler: ValueHandler): this {
    return this.add({
      shape: 'value',
      name: `${KIND_PREFIX}${pascal(kind)}`,
      rule: { binding: 'kind', kind },
      handler,
      arity: handler.length,
    });
  }

  forContainer(kind: ContainerKind, handler: ContainerHandler): this {
    return this.add({
      shape: 'container',
      name: `${CONTAINER_PREFIX}${pascal(kind)}`,
      rule: { binding: 'container', kind },
      handler,
      arity: handler.length,
    });
  }

  forNilPointer(handler: ValueHandler): this {
    return this.add({
      shape: 'value',
      name: NIL_POINTER_NAME,
      rule: { binding: 'nil_pointer' },
      handler,
      arity: handler.length,
    });
  }

  forIntFamily(handler: ValueHandler): this {
    return this.add({
      shape: 'value',
      name: INT_FAMILY_NAME,
      rule: { binding: 'int_family' },
      handler,
      arity: handler.length,
    });
  }

  forUintFamily(handler: ValueHandler): this {
    return this.add({
      shape: 'value',
      name: UINT_FAMILY_NAME,
      rule: { binding: 'uint_family' },
      handler,
      arity: handler.length,
    });
  }

  /**
   * Entries in declaration order.
   */
  list(): readonly CapabilityEntry[] {
    return this.entries;
  }

  /**
   * Adapter members that looked like bindings but could not be bound.
   */
  skippedNames(): readonly string[] {
    return this.skipped;
  }

  get size(): number {
    return this.entries.length;
  }

  private add(entry: CapabilityEntry): this {
    this.entries.push(entry);
    return this;
  }
}

function tokenRule(
  binding: 'interface' | 'type',
  token: TypeToken | undefined
): ValueRule | null {
  if (token === undefined) {
    return null;
  }
  if (binding === 'interface') {
    return token.variant === 'interface' ? { binding, token } : null;
  }
  return token.variant === 'concrete' ? { binding, token } : null;
}

function memberNames(adapter: object): string[] {
  const chain: object[] = [];
  let proto: object | null = Object.getPrototypeOf(adapter);
  while (proto !== null && proto !== Object.prototype && proto !== Function.prototype) {
    chain.unshift(proto);
    proto = Object.getPrototypeOf(proto);
  }

  const names = new Set<string>();
  for (const level of chain) {
    for (const name of Object.getOwnPropertyNames(level)) {
      if (name !== 'constructor') {
        names.add(name);
      }
    }
  }
  for (const name of Object.keys(adapter)) {
    names.add(name);
  }
  return [...names];
}

// Most-derived data property holding a function; accessors are never invoked.
function lookupMethod(adapter: object, name: string): Function | undefined {
  let level: object | null = adapter;
  while (level !== null) {
    const descriptor = Object.getOwnPropertyDescriptor(level, name);
    if (descriptor) {
      const value: unknown = descriptor.value;
      return typeof value === 'function' ? value : undefined;
    }
    level = Object.getPrototypeOf(level);
  }
  return undefined;
}
