/**
 * Append-only store behind Reference values. Slots live as long as the
 * interpreter that owns the heap; nothing is ever reclaimed.
 */

import { AkiValue } from './values';

export class Heap {
  private readonly objects: AkiValue[] = [];

  allocate(value: AkiValue): number {
    this.objects.push(value);
    return this.objects.length - 1;
  }

  get(address: number): AkiValue | undefined {
    return this.objects[address];
  }

  get size(): number {
    return this.objects.length;
  }
}
