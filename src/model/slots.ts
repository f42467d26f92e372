/**
 * Helpers for growable lists of optional slots. EDI positions are 1-based;
 * gaps between addressed positions are filled with null.
 */

/**
 * Read the slot at a 1-based position, undefined when out of range.
 */
export function getSlot<T>(slots: readonly (T | null)[], position: number): T | null | undefined {
  if (!Number.isInteger(position) || position < 1) {
    throw new RangeError(`Position must be a positive integer, got ${position}`);
  }
  return slots[position - 1];
}

/**
 * Write the slot at a 1-based position, padding with null up to it.
 */
export function setSlot<T>(slots: (T | null)[], position: number, value: T | null): void {
  if (!Number.isInteger(position) || position < 1) {
    throw new RangeError(`Position must be a positive integer, got ${position}`);
  }
  growSlots(slots, position);
  slots[position - 1] = value;
}

/**
 * Pad with null until the list holds at least `length` slots.
 */
export function growSlots<T>(slots: (T | null)[], length: number): void {
  while (slots.length < length) {
    slots.push(null);
  }
}
