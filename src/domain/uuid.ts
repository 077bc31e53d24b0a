/**
 * 128-bit event identifier in canonical (lowercase, hyphenated) form.
 *
 * Instances are created by the value coercion layer after the text has been
 * validated; the constructor only normalizes case.
 */
export class Uuid {
  readonly value: string;

  constructor(text: string) {
    this.value = text.toLowerCase();
  }

  equals(other: Uuid): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}
