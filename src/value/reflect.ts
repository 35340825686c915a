/**
 * Native value reflection.
 *
 * Converts plain JavaScript values into the traversable value model so
 * that callers can walk ordinary objects without building values by hand.
 *
 * @example
 * ```typescript
 * const reflector = new ValueReflector();
 * reflector.registerClass(Order, OrderType);
 * traverser.traverse(reflector.reflect(new Order(...)));
 * ```
 */

import { ReflectionError } from '../registry/errors.js';
import { defineRecord, type RecordType } from './types.js';
import {
  bool,
  float,
  int,
  nil,
  type RecordValue,
  scalar,
  seq,
  str,
  type TraversableValue,
} from './values.js';

type Constructor = abstract new (...args: never[]) => object;

export interface ReflectorOptions {
  /** Anonymous record shapes kept before the least recently used is dropped (default: 1024) */
  maxShapes?: number;
}

/**
 * Reflects native values. Anonymous record types are cached per key
 * shape inside each reflector instance, up to `maxShapes` entries.
 */
export class ValueReflector {
  private readonly classes: Map<unknown, RecordType> = new Map();
  private readonly shapes: Map<string, RecordType> = new Map();
  private readonly maxShapes: number;

  constructor(options: ReflectorOptions = {}) {
    this.maxShapes = Math.max(1, options.maxShapes ?? 1024);
  }

  /**
   * Number of cached anonymous record shapes.
   */
  get cachedShapes(): number {
    return this.shapes.size;
  }

  /**
   * Bind instances of a class to a record type. Field values are read by name.
   */
  registerClass(ctor: Constructor, type: RecordType): this {
    this.classes.set(ctor, type);
    return this;
  }

  /**
   * Get the record type registered for a class.
   */
  recordTypeFor(ctor: Constructor): RecordType | undefined {
    return this.classes.get(ctor);
  }

  /**
   * Convert a native value.
   *
   * @throws ReflectionError on symbols and cyclic object graphs
   */
  reflect(input: unknown): TraversableValue {
    return this.convert(input, new Set());
  }

  private convert(input: unknown, path: Set<object>): TraversableValue {
    switch (typeof input) {
      case 'undefined':
        return nil();
      case 'boolean':
        return bool(input);
      case 'string':
        return str(input);
      case 'number':
        return Number.isInteger(input) ? int(input) : float(input);
      case 'bigint':
        return int(input, 'int64');
      case 'function':
        return scalar('function', input);
      case 'symbol':
        throw new ReflectionError(`Cannot reflect symbol ${input.toString()}`);
    }
    if (typeof input === 'object' && input !== null) {
      return this.convertObject(input, path);
    }
    return nil();
  }

  private convertObject(input: object, path: Set<object>): TraversableValue {
    if (path.has(input)) {
      throw new ReflectionError('Cannot reflect a cyclic object graph');
    }
    path.add(input);
    try {
      if (Array.isArray(input)) {
        return seq(input.map((item: unknown) => this.convert(item, path)));
      }
      if (input instanceof Map) {
        const entries = new Map<TraversableValue, TraversableValue>();
        for (const [key, value] of input) {
          entries.set(this.convert(key, path), this.convert(value, path));
        }
        return { kind: 'mapping', entries };
      }
      return this.convertRecord(input, path);
    } finally {
      path.delete(input);
    }
  }

  private convertRecord(input: object, path: Set<object>): RecordValue {
    const source = new Map<string, unknown>(Object.entries(input));
    const type = this.classes.get(input.constructor) ?? this.shapeType([...source.keys()]);

    const fields = type.fields.map((field) => this.convert(source.get(field.name), path));
    return { kind: 'record', type, fields };
  }

  private shapeType(keys: string[]): RecordType {
    const signature = keys.join('\u0000');
    const cached = this.shapes.get(signature);
    if (cached) {
      this.shapes.delete(signature);
      this.shapes.set(signature, cached);
      return cached;
    }

    const type = defineRecord(
      'object',
      keys.map((name) => ({ name, hidden: name.startsWith('_') }))
    );
    if (this.shapes.size >= this.maxShapes) {
      const oldest = this.shapes.keys().next();
      if (!oldest.done) {
        this.shapes.delete(oldest.value);
      }
    }
    this.shapes.set(signature, type);
    return type;
  }
}
