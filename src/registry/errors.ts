/**
 * Error types for binding registries and traversal.
 *
 * Two roots:
 * - `TraversalError`: reported failures a caller can react to
 *   (invalid capability sets, missing bindings, bad handler returns).
 * - `DefectError`: programming errors in a schema or an inconsistent
 *   registry. These are not meant to be caught and retried.
 */

/**
 * Base error class for reported traversal failures.
 */
export class TraversalError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TraversalError';
  }
}

/**
 * Base error class for registry construction failures.
 */
export class RegistryError extends TraversalError {
  constructor(message: string) {
    super(message);
    this.name = 'RegistryError';
  }
}

/**
 * Error thrown when the capability source is not an object.
 */
export class InvalidAdapterError extends RegistryError {
  constructor(received: string) {
    super(`Invalid adapter: expected an object, got ${received}`);
    this.name = 'InvalidAdapterError';
  }
}

/**
 * Error thrown when two capabilities bind the same type, category or nil pointer.
 */
export class AmbiguousBindingError extends RegistryError {
  readonly bindingName: string;
  readonly target: string;

  constructor(bindingName: string, target: string) {
    super(`Duplicated binding '${bindingName}' found for ${target}`);
    this.name = 'AmbiguousBindingError';
    this.bindingName = bindingName;
    this.target = target;
  }
}

/**
 * Error thrown when a capability set yields no usable binding.
 */
export class NoUsableBindingError extends RegistryError {
  readonly ignored: string[];

  constructor(ignored: string[]) {
    const detail = ignored.length > 0 ? ` (ignored: ${ignored.join(', ')})` : '';
    super(`No usable binding found${detail}`);
    this.name = 'NoUsableBindingError';
    this.ignored = ignored;
  }
}

/**
 * Error thrown when no binding matches a value and missing bindings are not tolerated.
 */
export class BindingMissingError extends TraversalError {
  readonly typeName: string;
  readonly kind: string;

  constructor(typeName: string, kind: string) {
    super(`Binding is missing for type:${typeName} kind:${kind}`);
    this.name = 'BindingMissingError';
    this.typeName = typeName;
    this.kind = kind;
  }
}

/**
 * Error thrown when a container handler returns something other than a boolean.
 */
export class HandlerReturnError extends TraversalError {
  readonly bindingName: string;
  readonly received: string;

  constructor(bindingName: string, received: string) {
    super(`Container binding '${bindingName}' must return a boolean, got ${received}`);
    this.name = 'HandlerReturnError';
    this.bindingName = bindingName;
    this.received = received;
  }
}

/**
 * Error thrown when a handler returns a promise. Walks are synchronous.
 */
export class AsyncHandlerError extends TraversalError {
  readonly bindingName: string;

  constructor(bindingName: string) {
    super(`Binding '${bindingName}' returned a promise; handlers must be synchronous`);
    this.name = 'AsyncHandlerError';
    this.bindingName = bindingName;
  }
}

/**
 * Error thrown when a container's end-handler fails.
 */
export class ContainerEndError extends TraversalError {
  readonly bindingName: string;

  constructor(bindingName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Container end call of '${bindingName}' failed: ${reason}`, { cause });
    this.name = 'ContainerEndError';
    this.bindingName = bindingName;
  }
}

/**
 * Error thrown when native input cannot be turned into a traversable value.
 */
export class ReflectionError extends TraversalError {
  constructor(message: string) {
    super(message);
    this.name = 'ReflectionError';
  }
}

/**
 * Base error class for defects: broken invariants that indicate a bug.
 */
export class DefectError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DefectError';
  }
}

/**
 * Error thrown when traversal state contradicts the registry or the value.
 */
export class InvariantViolationError extends DefectError {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

/**
 * Error thrown when a record schema declares an illegal member order.
 */
export class PropertyOrderError extends DefectError {
  readonly typeName: string;
  readonly fieldName: string;

  constructor(typeName: string, fieldName: string, detail: string) {
    super(`Illegal order for field ${fieldName} of type ${typeName}: ${detail}`);
    this.name = 'PropertyOrderError';
    this.typeName = typeName;
    this.fieldName = fieldName;
  }
}
