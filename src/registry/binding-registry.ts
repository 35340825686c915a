/**
 * Binding registry: the immutable rule table a traverser dispatches through.
 *
 * Built once from a capability set, then shared read-only by any number
 * of walks. Construction validates every capability, rejects ambiguous
 * bindings and orders the rule table by declaration index, which is the
 * precedence order the matcher scans in.
 *
 * @example
 * ```typescript
 * const registry = BindingRegistry.build(
 *   new CapabilitySet()
 *     .forKind('string', (ctx, visit) => out.push(visit.value))
 *     .forContainer('sequence', () => true),
 *   { bracketContainers: true }
 * );
 * console.log(registry.describe());
 * ```
 */

import { HANDLER_ARITY } from '../handler/types.js';
import { createLogger } from '../logging/index.js';
import {
  describeConfig,
  resolveTraversalConfig,
  type TraversalConfig,
  type TraversalConfigInput,
} from '../traversal/config.js';
import {
  DefaultPropertyResolver,
  type PropertyResolution,
  type PropertyResolver,
} from '../traversal/properties.js';
import type { Category } from '../value/kinds.js';
import type { TypeToken } from '../value/types.js';
import type { RecordValue } from '../value/values.js';
import { type BindingKind, categoryOf, describeRule } from './binding-kind.js';
import type {
  BoundContainerHandler,
  BoundValueHandler,
  CapabilityEntry,
  CapabilitySet,
} from './capability-set.js';
import { AmbiguousBindingError, NoUsableBindingError } from './errors.js';

const log = createLogger('binding-registry');

/**
 * One accepted capability in the rule table.
 *
 * Exactly one of boundType / boundCategory is set.
 */
export interface CapabilityDescriptor {
  /** Position in the capability set; the precedence order */
  readonly declarationIndex: number;
  readonly name: string;
  readonly binding: Exclude<BindingKind, 'nil_pointer'>;
  readonly boundType: TypeToken | null;
  readonly boundCategory: Category | null;
  readonly isContainer: boolean;
}

/**
 * Handler stored under a category, tagged with its shape.
 */
export type CategoryBinding =
  | { readonly shape: 'value'; readonly handler: BoundValueHandler }
  | { readonly shape: 'container'; readonly handler: BoundContainerHandler };

export interface NilPointerBinding {
  readonly name: string;
  readonly handler: BoundValueHandler;
}

export function describeDescriptor(descriptor: CapabilityDescriptor): string {
  const target =
    descriptor.boundType !== null
      ? `${descriptor.binding === 'interface' ? 'Impl' : 'Type'}:${descriptor.boundType.name}`
      : `Kind:${descriptor.boundCategory}`;
  const container = descriptor.isContainer ? ' Container' : '';
  return `Item{Idx:${descriptor.declarationIndex} Name:${descriptor.name} ${target}${container}}`;
}

/**
 * Immutable rule table plus lookup maps.
 */
export class BindingRegistry {
  readonly config: TraversalConfig;

  private readonly descriptors: readonly CapabilityDescriptor[];
  private readonly typeHandlers: ReadonlyMap<TypeToken, BoundValueHandler>;
  private readonly categoryHandlers: ReadonlyMap<Category, CategoryBinding>;
  private readonly nilPointer: NilPointerBinding | null;
  private readonly defaultResolver: DefaultPropertyResolver = new DefaultPropertyResolver();

  private constructor(
    descriptors: readonly CapabilityDescriptor[],
    typeHandlers: ReadonlyMap<TypeToken, BoundValueHandler>,
    categoryHandlers: ReadonlyMap<Category, CategoryBinding>,
    nilPointer: NilPointerBinding | null,
    config: TraversalConfig
  ) {
    this.descriptors = descriptors;
    this.typeHandlers = typeHandlers;
    this.categoryHandlers = categoryHandlers;
    this.nilPointer = nilPointer;
    this.config = config;
  }

  /**
   * Build a registry from capabilities.
   *
   * Capabilities whose handler is not a function or declares more
   * parameters than its shape allows are ignored with a warning.
   *
   * @param capabilities - Capability set, or its entries in declaration order
   * @param config - Traversal options; copied and frozen
   * @throws AmbiguousBindingError if two capabilities bind the same type, category or nil pointer
   * @throws NoUsableBindingError if no capability was accepted into the rule table
   */
  static build(
    capabilities: CapabilitySet | readonly CapabilityEntry[],
    config: TraversalConfigInput = {}
  ): BindingRegistry {
    const entries = 'list' in capabilities ? capabilities.list() : capabilities;

    const descriptors: CapabilityDescriptor[] = [];
    const typeHandlers = new Map<TypeToken, BoundValueHandler>();
    const categoryHandlers = new Map<Category, CategoryBinding>();
    const ignored: string[] = [];
    let nilPointer: NilPointerBinding | null = null;

    for (const [declarationIndex, entry] of entries.entries()) {
      if (typeof entry.handler !== 'function' || entry.arity > HANDLER_ARITY) {
        log.warn(
          { binding: entry.name, arity: entry.arity, expected: HANDLER_ARITY },
          'ignoring binding with non-conforming signature'
        );
        ignored.push(entry.name);
        continue;
      }

      if (entry.shape === 'container') {
        const category = entry.rule.kind;
        if (categoryHandlers.has(category)) {
          throw new AmbiguousBindingError(entry.name, describeRule(entry.rule));
        }
        categoryHandlers.set(category, { shape: 'container', handler: entry.handler });
        descriptors.push({
          declarationIndex,
          name: entry.name,
          binding: 'container',
          boundType: null,
          boundCategory: category,
          isContainer: true,
        });
        continue;
      }

      const rule = entry.rule;
      switch (rule.binding) {
        case 'nil_pointer':
          if (nilPointer !== null) {
            throw new AmbiguousBindingError(entry.name, describeRule(rule));
          }
          nilPointer = { name: entry.name, handler: entry.handler };
          continue;

        case 'interface':
        case 'type':
          if (typeHandlers.has(rule.token)) {
            throw new AmbiguousBindingError(entry.name, describeRule(rule));
          }
          typeHandlers.set(rule.token, entry.handler);
          descriptors.push({
            declarationIndex,
            name: entry.name,
            binding: rule.binding,
            boundType: rule.token,
            boundCategory: null,
            isContainer: false,
          });
          continue;

        case 'kind':
        case 'int_family':
        case 'uint_family': {
          const category = categoryOf(rule);
          if (category === null) {
            continue;
          }
          if (categoryHandlers.has(category)) {
            throw new AmbiguousBindingError(entry.name, describeRule(rule));
          }
          categoryHandlers.set(category, { shape: 'value', handler: entry.handler });
          descriptors.push({
            declarationIndex,
            name: entry.name,
            binding: rule.binding,
            boundType: null,
            boundCategory: category,
            isContainer: false,
          });
        }
      }
    }

    if (descriptors.length === 0) {
      throw new NoUsableBindingError(ignored);
    }

    descriptors.sort((a, b) => a.declarationIndex - b.declarationIndex);
    const resolved = resolveTraversalConfig(config);

    const registry = new BindingRegistry(
      Object.freeze(descriptors.map((descriptor) => Object.freeze(descriptor))),
      typeHandlers,
      categoryHandlers,
      nilPointer,
      resolved
    );
    log.debug(
      {
        descriptors: descriptors.length,
        types: typeHandlers.size,
        categories: categoryHandlers.size,
        nil_pointer: nilPointer !== null,
        ignored: ignored.length,
        config: describeConfig(resolved),
      },
      'binding registry built'
    );
    return registry;
  }

  /**
   * Rule table in precedence (declaration) order.
   */
  list(): readonly CapabilityDescriptor[] {
    return this.descriptors;
  }

  get size(): number {
    return this.descriptors.length;
  }

  handlerForType(token: TypeToken): BoundValueHandler | undefined {
    return this.typeHandlers.get(token);
  }

  bindingForCategory(category: Category): CategoryBinding | undefined {
    return this.categoryHandlers.get(category);
  }

  nilPointerBinding(): NilPointerBinding | null {
    return this.nilPointer;
  }

  /**
   * The resolver records are enumerated with.
   */
  get propertyResolver(): PropertyResolver {
    return this.config.propertyResolver ?? this.defaultResolver;
  }

  propertiesOf(record: RecordValue): PropertyResolution {
    return this.propertyResolver.resolve(record);
  }

  describe(): string {
    const nil = this.nilPointer ? ' NilPointer' : '';
    const items = this.descriptors.map(describeDescriptor).join(' ');
    return `Registry{Types:${this.typeHandlers.size} Kinds:${this.categoryHandlers.size}${nil} Items:[${items}]}`;
  }

  toString(): string {
    return this.describe();
  }
}
