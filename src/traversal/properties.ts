/**
 * Property resolvers: turn a record into its ordered list of visitable members.
 *
 * - `DefaultPropertyResolver`: visible fields in declaration order.
 * - `OrderedPropertyResolver`: honours per-field `order` and `skip`
 *   metadata, leaving gaps in the order sequence as placeholder slots.
 *
 * Custom resolvers must return members sorted by effective order (or
 * structural index when unset), ties broken by structural index.
 */

import { PropertyOrderError } from '../registry/errors.js';
import type { RecordType } from '../value/types.js';
import type { RecordValue } from '../value/values.js';

/**
 * One visitable slot of a record.
 */
export interface Property {
  /** Position in the record's field layout; -1 marks a placeholder without a backing field */
  readonly structuralIndex: number;
  readonly name: string;
  /** Position used for dispatch; -1 means "use structuralIndex" */
  readonly effectiveOrder: number;
}

export interface PropertyResolution {
  /** Number of dispatch slots; may exceed members.length when placeholders exist */
  readonly count: number;
  readonly members: readonly Property[];
}

export interface PropertyResolver {
  resolve(record: RecordValue): PropertyResolution;
}

/**
 * Index a member reports to handlers.
 */
export function dispatchIndex(property: Property): number {
  return property.effectiveOrder >= 0 ? property.effectiveOrder : property.structuralIndex;
}

export function describeProperty(property: Property): string {
  if (property.effectiveOrder >= 0) {
    return `{${property.structuralIndex}(${property.effectiveOrder}).${property.name}}`;
  }
  return `{${property.structuralIndex}.${property.name}}`;
}

/**
 * Resolution memoised per record type, scoped to the resolver instance.
 */
export abstract class CachingPropertyResolver implements PropertyResolver {
  private readonly cache: WeakMap<RecordType, PropertyResolution> = new WeakMap();

  resolve(record: RecordValue): PropertyResolution {
    let resolution = this.cache.get(record.type);
    if (!resolution) {
      resolution = Object.freeze(this.resolveType(record.type));
      this.cache.set(record.type, resolution);
    }
    return resolution;
  }

  protected abstract resolveType(type: RecordType): PropertyResolution;
}

/**
 * Visible fields in declaration order, no explicit ordering.
 */
export class DefaultPropertyResolver extends CachingPropertyResolver {
  protected resolveType(type: RecordType): PropertyResolution {
    const members: Property[] = [];
    type.fields.forEach((field, index) => {
      if (!field.hidden) {
        members.push({ structuralIndex: index, name: field.name, effectiveOrder: -1 });
      }
    });
    return { count: members.length, members };
  }
}

/**
 * Order-tag driven resolution.
 *
 * Members are sorted by (order if set, else structural index), ties by
 * structural index. Members without an order take their sorted position.
 * An explicit order lower than the member's sorted position, or one that
 * repeats an earlier member's, is rejected.
 *
 * @example
 * ```typescript
 * // fields: a(order 0), b, c(order 3), d(order 4), e(order 5)
 * // members: a(0) b(1) c(3) d(4) e(5), count 6 (slot 2 is a placeholder)
 * ```
 */
export class OrderedPropertyResolver extends CachingPropertyResolver {
  protected resolveType(type: RecordType): PropertyResolution {
    const candidates: Property[] = [];
    type.fields.forEach((field, index) => {
      if (field.hidden || field.skip) {
        return;
      }
      let order = -1;
      if (field.order !== undefined) {
        if (!Number.isInteger(field.order) || field.order < 0) {
          throw new PropertyOrderError(
            type.name,
            field.name,
            `order must be a non-negative integer, got ${field.order}`
          );
        }
        order = field.order;
      }
      candidates.push({ structuralIndex: index, name: field.name, effectiveOrder: order });
    });

    const sorted = [...candidates].sort((a, b) => {
      const byOrder = dispatchIndex(a) - dispatchIndex(b);
      return byOrder !== 0 ? byOrder : a.structuralIndex - b.structuralIndex;
    });

    let previous = -1;
    const members = sorted.map((candidate, position): Property => {
      let property = candidate;
      if (property.effectiveOrder < 0) {
        property = { ...property, effectiveOrder: position };
      } else if (property.effectiveOrder < position) {
        throw new PropertyOrderError(
          type.name,
          property.name,
          `order ${property.effectiveOrder} should be >= ${position}`
        );
      }
      if (property.effectiveOrder <= previous) {
        throw new PropertyOrderError(
          type.name,
          property.name,
          `order ${property.effectiveOrder} is already taken`
        );
      }
      previous = property.effectiveOrder;
      return property;
    });

    const last = members[members.length - 1];
    return { count: last ? last.effectiveOrder + 1 : 0, members };
  }
}
