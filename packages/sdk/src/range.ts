import type { EnumValue } from "./registry.js";

/**
 * An inclusive codepoint range tagged with a property value
 *
 * The property is a reference into the registry the range was parsed against.
 */
export class UnicodeRange {
  constructor(
    readonly start: number,
    readonly end: number,
    readonly property: EnumValue
  ) {}

  /**
   * Whether the two spans share at least one codepoint
   */
  isOverlapping(other: UnicodeRange): boolean {
    return this.start <= other.end && this.end >= other.start;
  }

  /**
   * Whether `other` starts right after this range and carries the same property
   */
  isAdjacent(other: UnicodeRange): boolean {
    return other.start === this.end + 1 && this.property === other.property;
  }

  /**
   * A range spanning from this start to the end of `other`
   */
  extend(other: UnicodeRange): UnicodeRange {
    return new UnicodeRange(this.start, other.end, this.property);
  }

  get isSingle(): boolean {
    return this.start === this.end;
  }

  toJSON(): { start: number; end: number; property: string } {
    return { start: this.start, end: this.end, property: this.property.name };
  }
}
