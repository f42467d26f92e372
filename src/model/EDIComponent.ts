/**
 * One part of a composite element value, e.g. "HC" in "HC:99213".
 * An absent component is a null slot in its repetition, never an empty string.
 */
export class EDIComponent {
  constructor(public value: string = '') {}

  toString(): string {
    return this.value;
  }
}
