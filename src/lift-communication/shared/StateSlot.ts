/**
 * Single-value slot shared between the control loop and API callers.
 * Values are swapped whole; whoever reads gets the instance that was current at that moment.
 */
export class StateSlot<T> {
  private value: T | null = null;

  public read(): T | null {
    return this.value;
  }

  public replace(next: T): void {
    this.value = next;
  }

  /** Empties the slot only if it still holds `expected`, so a newer write is never lost. */
  public clearIf(expected: T): boolean {
    if (this.value !== expected) {
      return false;
    }
    this.value = null;
    return true;
  }

  public clear(): void {
    this.value = null;
  }
}

export const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
};
