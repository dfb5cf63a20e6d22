/**
 * controller/target_registry.ts
 *
 * Injection targets keyed by generation-stamped handles. A slot is reused
 * after removal, but with a new generation, so an old handle never resolves
 * to a newer target.
 */

import { InjectionTarget } from '../core/types';

export class TargetHandle {
  constructor(readonly slot: number, readonly generation: number) {}

  equals(other: TargetHandle): boolean {
    return this.slot === other.slot && this.generation === other.generation;
  }

  toString(): string {
    return `${this.slot}:${this.generation}`;
  }
}

interface Slot {
  generation: number;
  target: InjectionTarget | null;
  order: number;                           // registration sequence
}

export interface RegisteredTarget {
  handle: TargetHandle;
  target: InjectionTarget;
}

export class TargetRegistry {
  private slots: Slot[] = [];
  private free: number[] = [];
  private sequence = 0;

  add(target: InjectionTarget): TargetHandle {
    const index = this.free.pop();
    if (index === undefined) {
      this.slots.push({ generation: 0, target, order: this.sequence++ });
      return new TargetHandle(this.slots.length - 1, 0);
    }
    const slot = this.slots[index];
    slot.generation += 1;
    slot.target = target;
    slot.order = this.sequence++;
    return new TargetHandle(index, slot.generation);
  }

  /** Invalidates the handle. Returns false for a stale or unknown handle. */
  remove(handle: TargetHandle): boolean {
    const slot = this.live(handle);
    if (!slot) return false;
    slot.target = null;
    this.free.push(handle.slot);
    return true;
  }

  get(handle: TargetHandle): InjectionTarget | null {
    return this.live(handle)?.target ?? null;
  }

  /** Live targets in registration order. */
  entries(): RegisteredTarget[] {
    const live: Array<RegisteredTarget & { order: number }> = [];
    this.slots.forEach((slot, index) => {
      if (slot.target) {
        live.push({ handle: new TargetHandle(index, slot.generation), target: slot.target, order: slot.order });
      }
    });
    return live
      .sort((a, b) => a.order - b.order)
      .map(({ handle, target }) => ({ handle, target }));
  }

  first(): RegisteredTarget | null {
    return this.entries()[0] ?? null;
  }

  firstVisible(): RegisteredTarget | null {
    return this.entries().find(entry => entry.target.isVisible()) ?? null;
  }

  get size(): number {
    return this.slots.filter(slot => slot.target !== null).length;
  }

  private live(handle: TargetHandle): Slot | null {
    const slot = this.slots[handle.slot];
    if (!slot || slot.generation !== handle.generation || !slot.target) return null;
    return slot;
  }
}
