/**
 * Shared key/value store threaded through every handler call of a walk.
 *
 * Keys are typed tokens rather than raw strings, so two libraries using
 * the same key name never collide and values keep their static type.
 *
 * @example
 * ```typescript
 * const Counter = defineContextKey<number>('counter');
 * const ctx = new TraversalContext().put(Counter, 0);
 * ctx.put(Counter, (ctx.get(Counter) ?? 0) + 1);
 * ```
 */

/**
 * Typed context key. Each key owns the slots holding its values, one per
 * context, so reads need no casts.
 */
export class ContextKey<T> {
  readonly name: string;
  private readonly slots: WeakMap<TraversalContext, T> = new WeakMap();

  constructor(name: string) {
    this.name = name;
  }

  /** @internal */
  read(context: TraversalContext): T | undefined {
    return this.slots.get(context);
  }

  /** @internal */
  has(context: TraversalContext): boolean {
    return this.slots.has(context);
  }

  /** @internal */
  write(context: TraversalContext, value: T): void {
    this.slots.set(context, value);
  }

  /** @internal */
  clear(context: TraversalContext): boolean {
    return this.slots.delete(context);
  }

  toString(): string {
    return `ContextKey(${this.name})`;
  }
}

export function defineContextKey<T>(name: string): ContextKey<T> {
  return new ContextKey<T>(name);
}

/**
 * Per-walk context. Not reset between walks; reuse is the caller's choice.
 */
export class TraversalContext {
  private readonly keys: Set<ContextKey<unknown>> = new Set();

  get<T>(key: ContextKey<T>): T | undefined {
    return key.read(this);
  }

  put<T>(key: ContextKey<T>, value: T): this {
    key.write(this, value);
    this.keys.add(key);
    return this;
  }

  has<T>(key: ContextKey<T>): boolean {
    return key.has(this);
  }

  delete<T>(key: ContextKey<T>): boolean {
    this.keys.delete(key);
    return key.clear(this);
  }

  /**
   * Number of keys currently holding a value.
   */
  get size(): number {
    return this.keys.size;
  }
}
