import { EDIComponent } from './EDIComponent.js';
import { getSlot, setSlot } from './slots.js';

/**
 * One occurrence of an element value.
 *
 * Holds either a scalar `value` or a list of component slots, depending on
 * whether the source split it with a component separator. Components win
 * when both are set.
 */
export class EDIRepetition {
  value: string | null;
  readonly components: (EDIComponent | null)[] = [];

  constructor(value: string | null = null) {
    this.value = value;
  }

  /**
   * Composite repetition; null or empty strings become absent slots.
   */
  static fromComponents(values: readonly (string | null)[]): EDIRepetition {
    const repetition = new EDIRepetition();
    for (const value of values) {
      repetition.components.push(value ? new EDIComponent(value) : null);
    }
    return repetition;
  }

  hasComponents(): boolean {
    return this.components.length > 0;
  }

  /**
   * Component value at a 1-based position; undefined when the slot is absent.
   */
  getComponent(position: number): string | undefined {
    return getSlot(this.components, position)?.value;
  }

  setComponent(position: number, value: string | null): void {
    setSlot(this.components, position, value === null ? null : new EDIComponent(value));
  }

  /**
   * The scalar, or the first component of a composite.
   */
  get text(): string {
    if (this.hasComponents()) {
      return this.components[0]?.value ?? '';
    }
    return this.value ?? '';
  }
}
