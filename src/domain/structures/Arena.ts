/**
 * Arena - slot store addressed by generational handles
 * Linked structures keep handles instead of object references; a handle whose
 * slot was released (and possibly reused) no longer resolves.
 */
export interface Handle {
  readonly slot: number;
  readonly generation: number;
}

type Slot<T> = {
  generation: number;
  value: T | undefined;
};

export class Arena<T> {
  private slots: Slot<T>[] = [];
  private freeSlots: number[] = [];
  private live = 0;

  allocate(value: T): Handle {
    const reused = this.freeSlots.pop();
    if (reused !== undefined) {
      const slot = this.slots[reused];
      slot.value = value;
      this.live++;
      return { slot: reused, generation: slot.generation };
    }

    this.slots.push({ generation: 0, value });
    this.live++;
    return { slot: this.slots.length - 1, generation: 0 };
  }

  get(handle: Handle): T | undefined {
    const slot = this.slots[handle.slot];
    if (!slot || slot.generation !== handle.generation) {
      return undefined;
    }
    return slot.value;
  }

  /**
   * Resolves a handle that the owning structure knows to be live
   */
  require(handle: Handle): T {
    const value = this.get(handle);
    if (value === undefined) {
      throw new Error(`Stale arena handle ${handle.slot}@${handle.generation}`);
    }
    return value;
  }

  release(handle: Handle): boolean {
    const slot = this.slots[handle.slot];
    if (!slot || slot.generation !== handle.generation || slot.value === undefined) {
      return false;
    }
    slot.value = undefined;
    slot.generation++;
    this.freeSlots.push(handle.slot);
    this.live--;
    return true;
  }

  get size(): number {
    return this.live;
  }

  clear(): void {
    for (let i = 0; i < this.slots.length; i++) {
      const slot = this.slots[i];
      if (slot.value !== undefined) {
        slot.value = undefined;
        slot.generation++;
        this.freeSlots.push(i);
      }
    }
    this.live = 0;
  }
}
