/**
 * Tests for the traverser: walk order, positions, bracketing, pointers,
 * missing bindings and handler failures.
 */

import { describe, expect, it } from 'vitest';
import type { ContainerVisit, Visit } from '../../../src/handler/types.js';
import { CapabilitySet } from '../../../src/registry/capability-set.js';
import {
  AsyncHandlerError,
  BindingMissingError,
  ContainerEndError,
  HandlerReturnError,
  InvariantViolationError,
} from '../../../src/registry/errors.js';
import type { TraversalConfigInput } from '../../../src/traversal/config.js';
import { defineContextKey, TraversalContext } from '../../../src/traversal/context.js';
import {
  OrderedPropertyResolver,
  type PropertyResolution,
  type PropertyResolver,
} from '../../../src/traversal/properties.js';
import { Traverser } from '../../../src/traversal/traverser.js';
import { defineRecord, defineType } from '../../../src/value/types.js';
import {
  bool,
  int,
  mapping,
  nil,
  ptr,
  record,
  seq,
  str,
  type TraversableValue,
} from '../../../src/value/values.js';
import {
  describeVisit,
  newTraceContext,
  note,
  RecordingAdapter,
  traceOf,
} from '../../fixtures/recording-adapter.js';

const Account = defineRecord('Account', [
  'id',
  'tags',
  { name: 'secret', hidden: true },
  'owner',
]);

const account = record(Account, {
  id: int(7),
  tags: seq([str('a'), str('b')]),
  secret: str('test-secret'),
  owner: ptr(str('ann')),
});

function recording(config: TraversalConfigInput = {}): Traverser {
  return Traverser.create(CapabilitySet.fromAdapter(new RecordingAdapter()), config);
}

function walk(traverser: Traverser, value: TraversableValue): string[] {
  return traceOf(traverser.traverse(value, newTraceContext()));
}

function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error('expected the walk to fail');
}

describe('Traverser', () => {
  describe('walk order and positions', () => {
    it('visits a record depth-first with member names and indices', () => {
      expect(walk(recording(), account)).toEqual([
        'record start 0:-1: size:3',
        'int 1:0:id=7',
        'sequence start 1:1:tags size:2',
        'string 2:0:=a',
        'string 2:1:=b',
        'pointer start 1:3:owner size:1',
        'string 2:0:=ann',
      ]);
    });

    it('reports a scalar root at depth 0, index -1', () => {
      expect(walk(recording(), str('solo'))).toEqual(['string 0:-1:=solo']);
    });

    it('visits mapping keys and values as alternating slots', () => {
      const value = mapping([
        [str('k1'), int(1)],
        [str('k2'), bool(true)],
      ]);
      expect(walk(recording(), value)).toEqual([
        'mapping start 0:-1: size:4',
        'string 1:0:=k1',
        'int 1:1:=1',
        'string 1:2:=k2',
        'bool 1:3:=true',
      ]);
    });

    it('gives nested containers their own depth', () => {
      const value = seq([seq([int(1)]), int(2)]);
      expect(walk(recording(), value)).toEqual([
        'sequence start 0:-1: size:2',
        'sequence start 1:0: size:1',
        'int 2:0:=1',
        'int 1:1:=2',
      ]);
    });

    it('walks records in resolver order, reporting effective orders', () => {
      const Row = defineRecord('Row', [
        { name: 'a', order: 0 },
        { name: 'e', order: 5 },
        { name: 'b', order: 1 },
        { name: 'c', order: 3 },
        { name: 'd', order: 4 },
      ]);
      const row = record(Row, { a: int(1), b: int(2), c: int(3), d: int(4), e: int(5) });
      expect(walk(recording({ propertyResolver: new OrderedPropertyResolver() }), row)).toEqual([
        'record start 0:-1: size:6',
        'int 1:0:a=1',
        'int 1:1:b=2',
        'int 1:3:c=3',
        'int 1:4:d=4',
        'int 1:5:e=5',
      ]);
    });

    it('skips placeholder members without a backing field', () => {
      const Pair = defineRecord('Pair', ['a', 'b']);
      class PaddedResolver implements PropertyResolver {
        resolve(): PropertyResolution {
          return {
            count: 3,
            members: [
              { structuralIndex: 0, name: 'a', effectiveOrder: 0 },
              { structuralIndex: -1, name: 'pad', effectiveOrder: 1 },
              { structuralIndex: 1, name: 'b', effectiveOrder: 2 },
            ],
          };
        }
      }
      const value = record(Pair, { a: int(1), b: int(2) });
      expect(walk(recording({ propertyResolver: new PaddedResolver() }), value)).toEqual([
        'record start 0:-1: size:3',
        'int 1:0:a=1',
        'int 1:2:b=2',
      ]);
    });

    it('rejects a resolver member pointing past the record fields', () => {
      const Single = defineRecord('Single', ['a']);
      const resolver: PropertyResolver = {
        resolve: () => ({
          count: 1,
          members: [{ structuralIndex: 4, name: 'ghost', effectiveOrder: 0 }],
        }),
      };
      const value = record(Single, { a: int(1) });
      expect(() => walk(recording({ propertyResolver: resolver }), value)).toThrow(
        InvariantViolationError
      );
    });

    it('dispatches by declaration order across binding kinds', () => {
      const Email = defineType('Email');
      const traverser = Traverser.create(
        new CapabilitySet()
          .forType(Email, (context, visit) => note(context, describeVisit('email', visit)))
          .forKind('string', (context, visit) => note(context, describeVisit('string', visit)))
          .forContainer('sequence', () => true)
      );
      expect(walk(traverser, seq([str('a@example.test', Email), str('plain')]))).toEqual([
        'email 1:0:=a@example.test',
        'string 1:1:=plain',
      ]);
    });
  });

  describe('container bracketing', () => {
    it('calls end handlers after all children', () => {
      expect(walk(recording({ bracketContainers: true }), account)).toEqual([
        'record start 0:-1: size:3',
        'int 1:0:id=7',
        'sequence start 1:1:tags size:2',
        'string 2:0:=a',
        'string 2:1:=b',
        'sequence end 1:1:tags size:2',
        'pointer start 1:3:owner size:1',
        'string 2:0:=ann',
        'pointer end 1:3:owner size:1',
        'record end 0:-1: size:3',
      ]);
    });

    it('skips children and the end call when start returns false', () => {
      const traverser = Traverser.create(
        new CapabilitySet()
          .forContainer('sequence', (context, visit) => {
            note(context, describeVisit('sequence', visit));
            return visit.depth === 0;
          })
          .forKind('string', (context, visit) => note(context, describeVisit('string', visit))),
        { bracketContainers: true }
      );
      expect(walk(traverser, seq([seq([str('hidden')]), str('shown')]))).toEqual([
        'sequence start 0:-1: size:2',
        'sequence start 1:0: size:1',
        'string 1:1:=shown',
        'sequence end 0:-1: size:2',
      ]);
    });

    it('rejects a start handler that does not return a boolean', () => {
      class Sloppy {
        forContainerArray(): unknown {
          return 'yes';
        }
      }
      const traverser = Traverser.create(CapabilitySet.fromAdapter(new Sloppy()));
      expect(() => traverser.traverse(seq([]))).toThrow(
        new HandlerReturnError('forContainerArray', 'string')
      );
    });

    it('wraps end handler failures', () => {
      const failure = new Error('boom');
      const traverser = Traverser.create(
        new CapabilitySet().forContainer('sequence', (_context, visit) => {
          if (visit.phase === 'end') {
            throw failure;
          }
          return true;
        }),
        { bracketContainers: true }
      );

      const error = captureError(() => traverser.traverse(seq([])));
      expect(error).toBeInstanceOf(ContainerEndError);
      expect(error).toHaveProperty(
        'message',
        "Container end call of 'forContainerSequence' failed: boom"
      );
      expect(error).toHaveProperty('cause', failure);
    });

    it('wraps a non-boolean end result', () => {
      class HalfDone {
        forContainerArray(_context: TraversalContext, visit: ContainerVisit): unknown {
          return visit.phase === 'start' ? true : undefined;
        }
      }
      const traverser = Traverser.create(CapabilitySet.fromAdapter(new HalfDone()), {
        bracketContainers: true,
      });
      expect(() => traverser.traverse(seq([]))).toThrow(
        "Container end call of 'forContainerArray' failed: Container binding 'forContainerArray' must return a boolean, got undefined"
      );
    });

    it('stops at the first value handler that returns a promise', async () => {
      let calls = 0;
      const traverser = Traverser.create(
        new CapabilitySet()
          .forContainer('sequence', () => true)
          .forKind('string', async () => {
            calls += 1;
            throw new Error('boom');
          })
      );

      expect(() => traverser.traverse(seq([str('a'), str('b')]))).toThrow(
        new AsyncHandlerError('forKindString')
      );
      expect(calls).toBe(1);
      // let the observed rejection settle inside the test
      await new Promise((resolve) => setImmediate(resolve));
    });

    it('rejects a start handler that returns a promise', () => {
      class Eager {
        async forContainerArray(): Promise<boolean> {
          return true;
        }
      }
      const traverser = Traverser.create(CapabilitySet.fromAdapter(new Eager()));
      expect(() => traverser.traverse(seq([]))).toThrow(
        new AsyncHandlerError('forContainerArray')
      );
    });

    it('wraps an end handler that returns a promise', async () => {
      class LateEnd {
        forContainerArray(_context: TraversalContext, visit: ContainerVisit): unknown {
          return visit.phase === 'start' ? true : Promise.reject(new Error('late'));
        }
      }
      const traverser = Traverser.create(CapabilitySet.fromAdapter(new LateEnd()), {
        bracketContainers: true,
      });

      const error = captureError(() => traverser.traverse(seq([])));
      expect(error).toBeInstanceOf(ContainerEndError);
      expect(error).toHaveProperty('cause', new AsyncHandlerError('forContainerArray'));
      await new Promise((resolve) => setImmediate(resolve));
    });
  });

  describe('pointers', () => {
    const strings = new CapabilitySet().forKind('string', (context, visit) =>
      note(context, describeVisit('string', visit))
    );

    it('hands nil pointers to the nil-pointer binding once', () => {
      const traverser = Traverser.create(
        CapabilitySet.fromAdapter(
          Object.assign(new RecordingAdapter(), {
            forNilPointer: (context: TraversalContext, visit: Visit): void =>
              note(context, `nil ${visit.depth}:${visit.index}`),
          })
        )
      );
      expect(walk(traverser, seq([nil(), ptr(str('x'))]))).toEqual([
        'sequence start 0:-1: size:2',
        'nil 1:0',
        'pointer start 1:1: size:1',
        'string 2:0:=x',
      ]);
    });

    it('opens a nil pointer as an empty container without a nil-pointer binding', () => {
      expect(walk(recording({ bracketContainers: true }), nil())).toEqual([
        'pointer start 0:-1: size:0',
        'pointer end 0:-1: size:0',
      ]);
    });

    it('unwraps unbound pointers in place', () => {
      const traverser = Traverser.create(strings, { autoDereferencePointers: true });
      expect(walk(traverser, ptr(ptr(str('deep'))))).toEqual(['string 0:-1:=deep']);
    });

    it('keeps the member position of an unwrapped record field', () => {
      const Holder = defineRecord('Holder', ['owner']);
      const traverser = Traverser.create(
        new CapabilitySet()
          .forContainer('record', () => true)
          .forKind('string', (context, visit) => note(context, describeVisit('string', visit))),
        { autoDereferencePointers: true }
      );
      expect(walk(traverser, record(Holder, { owner: ptr(str('ann')) }))).toEqual([
        'string 1:0:owner=ann',
      ]);
    });

    it('unwraps a long pointer chain without growing the stack', () => {
      let value: TraversableValue = str('end');
      for (let i = 0; i < 100_000; i++) {
        value = ptr(value);
      }
      const traverser = Traverser.create(strings, { autoDereferencePointers: true });
      expect(walk(traverser, value)).toEqual(['string 0:-1:=end']);
    });

    it('skips an unbound nil pointer under auto-dereference', () => {
      const traverser = Traverser.create(strings, { autoDereferencePointers: true });
      expect(walk(traverser, ptr(ptr(nil())))).toEqual([]);
    });

    it('fails on an unbound pointer without auto-dereference', () => {
      expect(() => walk(Traverser.create(strings), ptr(str('x')))).toThrow(
        'Binding is missing for type:pointer kind:pointer'
      );
    });
  });

  describe('missing bindings', () => {
    const capabilities = new CapabilitySet()
      .forContainer('sequence', (context, visit) => {
        note(context, describeVisit('sequence', visit));
        return true;
      })
      .forIntFamily((context, visit) => note(context, describeVisit('int', visit)));

    it('fail the walk by default', () => {
      const traverser = Traverser.create(capabilities);
      const context = newTraceContext();
      expect(() => traverser.traverse(seq([int(1), str('x'), int(2)]), context)).toThrow(
        new BindingMissingError('string', 'string')
      );
      expect(traceOf(context)).toEqual(['sequence start 0:-1: size:3', 'int 1:0:=1']);
    });

    it('are skipped when tolerated', () => {
      const traverser = Traverser.create(capabilities, { toleratesMissingBinding: true });
      expect(walk(traverser, seq([str('x'), int(1)]))).toEqual([
        'sequence start 0:-1: size:2',
        'int 1:1:=1',
      ]);
    });
  });

  describe('handler failures', () => {
    it('propagate unchanged and keep earlier side effects', () => {
      const failure = new Error('stop');
      const traverser = Traverser.create(
        new CapabilitySet()
          .forContainer('sequence', () => true)
          .forIntFamily((context, visit) => {
            if (visit.index === 1) {
              throw failure;
            }
            note(context, describeVisit('int', visit));
          })
      );
      const context = newTraceContext();
      expect(captureError(() => traverser.traverse(seq([int(1), int(2), int(3)]), context))).toBe(
        failure
      );
      expect(traceOf(context)).toEqual(['int 1:0:=1']);
    });

    it('detect a mapping resized by its start handler', () => {
      const traverser = Traverser.create(
        new CapabilitySet()
          .forContainer('mapping', (_context, visit) => {
            if (visit.value.kind === 'mapping') {
              visit.value.entries.set(str('extra'), int(0));
            }
            return true;
          })
          .forKind('string', () => {})
          .forIntFamily(() => {})
      );
      expect(() => traverser.traverse(mapping([[str('k'), int(1)]]))).toThrow(
        new InvariantViolationError(
          'Mapping {mapping size:2 offset:-1} was measured at 1 keys but has 2'
        )
      );
    });
  });

  describe('context', () => {
    const Total = defineContextKey<number>('total');
    const traverser = Traverser.create(
      new CapabilitySet()
        .forContainer('sequence', () => true)
        .forIntFamily((context, visit) => {
          const value = visit.value.kind === 'int' ? Number(visit.value.value) : 0;
          context.put(Total, (context.get(Total) ?? 0) + value);
        })
    );

    it('threads one context through every handler and returns it', () => {
      const context = new TraversalContext();
      expect(traverser.traverse(seq([int(1), int(2), int(3)]), context)).toBe(context);
      expect(context.get(Total)).toBe(6);
    });

    it('is not reset between walks', () => {
      const context = new TraversalContext().put(Total, 10);
      traverser.traverse(seq([int(1)]), context);
      traverser.traverse(seq([int(2)]), context);
      expect(context.get(Total)).toBe(13);
    });

    it('is created when omitted', () => {
      expect(traverser.traverse(int(4)).get(Total)).toBe(4);
    });

    it('is returned untouched for a missing root', () => {
      const context = new TraversalContext();
      expect(traverser.traverse(null, context)).toBe(context);
      expect(traverser.traverse(undefined, context)).toBe(context);
      expect(context.size).toBe(0);
    });
  });

  describe('traverseNative', () => {
    it('reflects plain objects before walking them', () => {
      const traverser = recording();
      expect(traceOf(traverser.traverseNative({ name: 'ann', age: 30 }, newTraceContext()))).toEqual([
        'record start 0:-1: size:2',
        'string 1:0:name=ann',
        'int 1:1:age=30',
      ]);
    });

    it('leaves _-prefixed keys out of the walk', () => {
      const traverser = recording();
      expect(
        traceOf(traverser.traverseNative({ id: 1, _token: 'test-secret' }, newTraceContext()))
      ).toEqual(['record start 0:-1: size:1', 'int 1:0:id=1']);
    });

    it('treats null input as a no-op', () => {
      expect(traceOf(recording().traverseNative(null, newTraceContext()))).toEqual([]);
    });
  });
});
