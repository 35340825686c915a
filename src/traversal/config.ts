/**
 * Traversal configuration.
 *
 * Resolved once when a registry is built and frozen for its lifetime.
 */

import type { PropertyResolver } from './properties.js';

export interface TraversalConfig {
  /** Skip values no binding matches instead of failing (default: false) */
  readonly toleratesMissingBinding: boolean;

  /** Record member resolver; null selects the default resolver (default: null) */
  readonly propertyResolver: PropertyResolver | null;

  /** Call container handlers again with phase 'end' after their children (default: false) */
  readonly bracketContainers: boolean;

  /** Unwrap unbound non-nil pointers instead of failing; unbound nil pointers are skipped (default: false) */
  readonly autoDereferencePointers: boolean;
}

export type TraversalConfigInput = Partial<TraversalConfig>;

export const DEFAULT_TRAVERSAL_CONFIG: TraversalConfig = Object.freeze({
  toleratesMissingBinding: false,
  propertyResolver: null,
  bracketContainers: false,
  autoDereferencePointers: false,
});

/**
 * Merge input over the defaults into a frozen copy.
 */
export function resolveTraversalConfig(input: TraversalConfigInput = {}): TraversalConfig {
  return Object.freeze({
    toleratesMissingBinding:
      input.toleratesMissingBinding ?? DEFAULT_TRAVERSAL_CONFIG.toleratesMissingBinding,
    propertyResolver: input.propertyResolver ?? DEFAULT_TRAVERSAL_CONFIG.propertyResolver,
    bracketContainers: input.bracketContainers ?? DEFAULT_TRAVERSAL_CONFIG.bracketContainers,
    autoDereferencePointers:
      input.autoDereferencePointers ?? DEFAULT_TRAVERSAL_CONFIG.autoDereferencePointers,
  });
}

export function describeConfig(config: TraversalConfig): string {
  const flags = [
    `toleratesMissingBinding:${config.toleratesMissingBinding}`,
    `bracketContainers:${config.bracketContainers}`,
    `autoDereferencePointers:${config.autoDereferencePointers}`,
  ];
  if (config.propertyResolver) {
    flags.push(`propertyResolver:${config.propertyResolver.constructor.name}`);
  }
  return `Config{${flags.join(' ')}}`;
}
