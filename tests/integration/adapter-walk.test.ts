/**
 * End-to-end walk through an adapter object: type, kind, family, nil
 * pointer and container bindings working together with ordered records
 * and bracketing.
 */

import { describe, expect, it } from 'vitest';
import { TraversalEventEmitter } from '../../src/events/event-emitter.js';
import type { ContainerVisit, Visit } from '../../src/handler/types.js';
import { BindingRegistry } from '../../src/registry/binding-registry.js';
import { CapabilitySet } from '../../src/registry/capability-set.js';
import { defineContextKey, TraversalContext } from '../../src/traversal/context.js';
import { OrderedPropertyResolver } from '../../src/traversal/properties.js';
import { Traverser } from '../../src/traversal/traverser.js';
import { defineRecord, defineType } from '../../src/value/types.js';
import {
  int,
  isContainer,
  nil,
  ptr,
  record,
  seq,
  str,
  type TraversableValue,
} from '../../src/value/values.js';

const Out = defineContextKey<string[]>('out');
const Email = defineType('Email');

class CompactFormatter {
  forTypeEmail(context: TraversalContext, visit: Visit): void {
    this.emit(context, visit, `<${this.text(visit)}>`);
  }

  forKindString(context: TraversalContext, visit: Visit): void {
    this.emit(context, visit, JSON.stringify(this.text(visit)));
  }

  forIntFamily(context: TraversalContext, visit: Visit): void {
    this.emit(context, visit, this.text(visit));
  }

  forNilPointer(context: TraversalContext, visit: Visit): void {
    this.emit(context, visit, 'null');
  }

  forContainerStruct(context: TraversalContext, visit: ContainerVisit): boolean {
    this.bracket(context, visit, '{', '}');
    return true;
  }

  forContainerArray(context: TraversalContext, visit: ContainerVisit): boolean {
    this.bracket(context, visit, '[', ']');
    return true;
  }

  private bracket(
    context: TraversalContext,
    visit: ContainerVisit,
    open: string,
    close: string
  ): void {
    if (visit.phase === 'start') {
      this.emit(context, visit, open);
    } else {
      context.get(Out)?.push(close);
    }
  }

  private text(visit: Visit): string {
    return isContainer(visit.value) ? '' : String(visit.value.value);
  }

  private emit(context: TraversalContext, visit: Visit, text: string): void {
    context.get(Out)?.push(visit.name ? `${visit.name}=${text}` : text);
  }
}

const User = defineRecord('User', [
  { name: 'manager', order: 3 },
  { name: 'id', order: 0 },
  { name: 'password', skip: true },
  { name: 'email', order: 1 },
  { name: 'roles', order: 2 },
]);

const user = record(User, {
  id: int(42, 'int64'),
  email: str('ann@example.test', Email),
  roles: seq([str('admin'), str('dev')]),
  manager: nil(),
  password: str('test-secret'),
});

function format(traverser: Traverser, value: TraversableValue): string {
  const context = traverser.traverse(value, new TraversalContext().put(Out, []));
  return (context.get(Out) ?? []).join(' ');
}

describe('adapter walk', () => {
  const registry = BindingRegistry.build(
    CapabilitySet.fromAdapter(new CompactFormatter(), { types: { forTypeEmail: Email } }),
    { bracketContainers: true, propertyResolver: new OrderedPropertyResolver() }
  );

  it('formats a record through every binding kind', () => {
    expect(format(new Traverser(registry), user)).toBe(
      '{ id=42 email=<ann@example.test> roles=[ "admin" "dev" ] manager=null }'
    );
  });

  it('describes the registry built from the adapter', () => {
    expect(registry.describe()).toBe(
      'Registry{Types:1 Kinds:4 NilPointer Items:[' +
        'Item{Idx:0 Name:forTypeEmail Type:Email} ' +
        'Item{Idx:1 Name:forKindString Kind:string} ' +
        'Item{Idx:2 Name:forIntFamily Kind:int_family} ' +
        'Item{Idx:4 Name:forContainerStruct Kind:record Container} ' +
        'Item{Idx:5 Name:forContainerArray Kind:sequence Container}]}'
    );
  });

  it('shares one registry between traversers and walks', () => {
    const first = new Traverser(registry);
    const second = new Traverser(registry, { events: new TraversalEventEmitter() });
    const other = record(User, {
      id: int(7),
      email: str('bo@example.test', Email),
      roles: seq([]),
      manager: nil(),
      password: str('test-secret'),
    });

    expect(format(first, user)).toBe(format(second, user));
    expect(format(second, other)).toBe('{ id=7 email=<bo@example.test> roles=[ ] manager=null }');
  });

  it('allows a handler to start a nested walk', () => {
    const inner = new Traverser(registry);
    const Nested = defineContextKey<string>('nested');
    const outer = Traverser.create(
      new CapabilitySet().forContainer('pointer', (context, visit) => {
        if (visit.value.kind === 'pointer' && visit.value.target !== null) {
          context.put(Nested, format(inner, visit.value.target));
        }
        return false;
      })
    );

    expect(outer.traverse(ptr(user)).get(Nested)).toBe(
      '{ id=42 email=<ann@example.test> roles=[ "admin" "dev" ] manager=null }'
    );
  });
});
