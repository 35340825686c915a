/**
 * Traversal frame: state of one container level during a walk.
 */

import type { BoundContainerHandler } from '../registry/capability-set.js';
import type { CapabilityDescriptor } from '../registry/binding-registry.js';
import { typeNameOf } from '../value/types.js';
import type { ContainerValue } from '../value/values.js';
import { describeProperty, dispatchIndex, type Property } from './properties.js';

/**
 * Index and name a child reports to its handler.
 */
export interface ChildPosition {
  readonly index: number;
  readonly name: string;
}

export const ROOT_POSITION: ChildPosition = Object.freeze({ index: -1, name: '' });

export interface FrameParams {
  value: ContainerValue;
  depth: number;
  size: number;
  members: readonly Property[] | null;
  descriptor: CapabilityDescriptor;
  handler: BoundContainerHandler;
}

/**
 * Owned by the call that created it; never shared between sibling branches.
 */
export class TraversalFrame {
  readonly value: ContainerValue;
  readonly depth: number;
  /** Dispatch slots: elements, 2 × keys, record slots, or 0/1 for pointers */
  readonly size: number;
  /** Record members in resolver order; null for other containers */
  readonly members: readonly Property[] | null;
  /** Matched container binding, kept for the end call */
  readonly descriptor: CapabilityDescriptor;
  readonly handler: BoundContainerHandler;

  /** Child currently being visited; -1 before the first */
  offset = -1;

  constructor(params: FrameParams) {
    this.value = params.value;
    this.depth = params.depth;
    this.size = params.size;
    this.members = params.members;
    this.descriptor = params.descriptor;
    this.handler = params.handler;
  }

  /**
   * Depth of a frame opened by a child of this one.
   */
  get childDepth(): number {
    return this.depth + 1;
  }

  /**
   * Position of the child at the current offset.
   *
   * Record members report their effective order when set, else their
   * structural index. Other containers report the offset.
   */
  childPosition(): ChildPosition {
    if (this.members !== null) {
      const member = this.members[this.offset];
      if (member !== undefined) {
        return { index: dispatchIndex(member), name: member.name };
      }
    }
    return { index: this.offset, name: '' };
  }

  toString(): string {
    const fields = this.members ? ` fields:[${this.members.map(describeProperty).join(' ')}]` : '';
    return `{${typeNameOf(this.value)} size:${this.size} offset:${this.offset}${fields}}`;
  }
}
