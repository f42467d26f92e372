import { EDIElement } from './EDIElement.js';
import { getSlot, setSlot } from './slots.js';

/**
 * One EDI record: an identifier such as "ISA" or "ST" and its element slots.
 *
 * Accessors take EDI's 1-based positions; `elements[0]` is position 1.
 * A null slot is a field that was not sent.
 */
export class EDISegment {
  readonly elements: (EDIElement | null)[] = [];

  constructor(public id: string) {}

  /**
   * Build a segment from scalar field values; null or '' leave the slot absent.
   */
  static of(id: string, ...values: (string | null)[]): EDISegment {
    const segment = new EDISegment(id);
    for (const value of values) {
      segment.elements.push(value ? new EDIElement(value) : null);
    }
    return segment;
  }

  /**
   * Case-insensitive identifier check.
   */
  is(id: string): boolean {
    return this.id.toUpperCase() === id.toUpperCase();
  }

  getElement(position: number): EDIElement | null {
    return getSlot(this.elements, position) ?? null;
  }

  setElement(position: number, element: EDIElement | null): void {
    setSlot(this.elements, position, element);
  }

  /**
   * Value of the first repetition at a position (the first component of a
   * composite). Undefined when the slot is absent.
   */
  get(position: number): string | undefined {
    return getSlot(this.elements, position)?.value;
  }

  /**
   * Replace a position with a single scalar value, or clear it with null.
   */
  set(position: number, value: string | null): void {
    setSlot(this.elements, position, value === null ? null : new EDIElement(value));
  }
}
