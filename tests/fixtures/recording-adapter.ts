/**
 * Adapter fixtures that record every handler call into the walk context.
 */

import type { ContainerVisit, Visit } from '../../src/handler/types.js';
import { defineContextKey, TraversalContext } from '../../src/traversal/context.js';
import { isContainer } from '../../src/value/values.js';

export const Trace = defineContextKey<string[]>('trace');

export function newTraceContext(): TraversalContext {
  return new TraversalContext().put(Trace, []);
}

export function traceOf(context: TraversalContext): string[] {
  return context.get(Trace) ?? [];
}

export function note(context: TraversalContext, line: string): void {
  context.get(Trace)?.push(line);
}

/**
 * `<label> <depth>:<index>:<name>=<scalar>` for values,
 * `<label> <phase> <depth>:<index>:<name> size:<size>` for containers.
 */
export function describeVisit(label: string, visit: Visit | ContainerVisit): string {
  const position = `${visit.depth}:${visit.index}:${visit.name}`;
  if ('phase' in visit) {
    return `${label} ${visit.phase} ${position} size:${visit.size}`;
  }
  const shown = isContainer(visit.value) ? visit.value.kind : String(visit.value.value);
  return `${label} ${position}=${shown}`;
}

export class RecordingAdapter {
  forKindString(context: TraversalContext, visit: Visit): void {
    note(context, describeVisit('string', visit));
  }

  forKindBool(context: TraversalContext, visit: Visit): void {
    note(context, describeVisit('bool', visit));
  }

  forIntFamily(context: TraversalContext, visit: Visit): void {
    note(context, describeVisit('int', visit));
  }

  forContainerStruct(context: TraversalContext, visit: ContainerVisit): boolean {
    note(context, describeVisit('record', visit));
    return true;
  }

  forContainerArray(context: TraversalContext, visit: ContainerVisit): boolean {
    note(context, describeVisit('sequence', visit));
    return true;
  }

  forContainerMap(context: TraversalContext, visit: ContainerVisit): boolean {
    note(context, describeVisit('mapping', visit));
    return true;
  }

  forContainerPtr(context: TraversalContext, visit: ContainerVisit): boolean {
    note(context, describeVisit('pointer', visit));
    return true;
  }

  /** Not a binding name; must be ignored */
  describe(): string {
    return 'recording adapter';
  }
}
