import { EDIRepetition } from './EDIRepetition.js';

/**
 * A field of a segment: one or more repetitions of a value.
 */
export class EDIElement {
  readonly repetitions: EDIRepetition[] = [];

  /**
   * With a value, the element starts with a single scalar repetition.
   */
  constructor(value?: string) {
    if (value !== undefined) {
      this.repetitions.push(new EDIRepetition(value));
    }
  }

  static fromRepetitions(repetitions: readonly EDIRepetition[]): EDIElement {
    const element = new EDIElement();
    element.repetitions.push(...repetitions);
    return element;
  }

  /**
   * Text of the first repetition ('' when there is none).
   */
  get value(): string {
    return this.repetitions[0]?.text ?? '';
  }
}
