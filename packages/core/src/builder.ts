/**
 * GroveBuilder - fluent construction on top of begin/seal
 *
 *   g.builder()
 *     .open().push('red').push('yellow').push('blue').close('primary color')
 *     .open().push('left').push('right').close('direction')
 *     .build();
 */

import { ContractViolationError, type SubtreeMarker } from './internal';
import type { GroveBuf } from './grove-buf';

export class GroveBuilder<T> {
  private readonly markers: SubtreeMarker[] = [];

  constructor(private readonly target: GroveBuf<T>) {}

  /** Current nesting depth (opens not yet closed) */
  get depth(): number {
    return this.markers.length;
  }

  push(value: T): this {
    this.target.pushLeaf(value);
    return this;
  }

  open(): this {
    this.markers.push(this.target.beginSubtree());
    return this;
  }

  close(value: T): this {
    const marker = this.markers[this.markers.length - 1];
    if (marker === undefined) {
      throw new ContractViolationError('close() called with no open level');
    }
    this.target.sealSubtree(value, marker);
    this.markers.pop();
    return this;
  }

  build(): GroveBuf<T> {
    if (this.markers.length > 0) {
      throw new ContractViolationError(`build() called with ${this.markers.length} unclosed level(s)`);
    }
    return this.target;
  }
}
