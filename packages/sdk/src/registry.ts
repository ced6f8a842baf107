/**
 * Enum registry: stable small-integer identifiers for property names
 *
 * Invariants:
 * - Names are unique
 * - Indices are exactly 0..N-1 in first-seen order and never change
 * - Values are never removed
 */

import { serializeIndex } from "./codec.js";

/**
 * A single property value of a family
 */
export class EnumValue {
  /** Raw source names that were normalized onto this value */
  readonly normalizedFrom = new Set<string>();

  constructor(
    readonly index: number,
    readonly name: string
  ) {}

  /**
   * One-character code used in the packed encoding
   */
  get serialized(): string {
    return serializeIndex(this.index);
  }

  /**
   * Member name used in the generated enum ("Extend_NumLet" → "ExtendNumLet")
   */
  get enumName(): string {
    return this.name.replaceAll("_", "");
  }
}

/**
 * Ordered, append-only collection of enum values
 */
export class EnumRegistry {
  #values: EnumValue[] = [];
  #byName = new Map<string, EnumValue>();

  /**
   * Register a name, or return the existing value for it
   * @param name - Canonical property name
   * @param normalizedFrom - Raw source name that was mapped onto `name`
   */
  add(name: string, normalizedFrom?: string): EnumValue {
    let value = this.#byName.get(name);
    if (!value) {
      value = new EnumValue(this.#values.length, name);
      this.#values.push(value);
      this.#byName.set(name, value);
    }

    if (normalizedFrom !== undefined) {
      value.normalizedFrom.add(normalizedFrom);
    }
    return value;
  }

  /**
   * Make sure `name` is registered; no-op when it already is
   */
  ensure(name: string): EnumValue {
    return this.#byName.get(name) ?? this.add(name);
  }

  get(name: string): EnumValue | undefined {
    return this.#byName.get(name);
  }

  has(name: string): boolean {
    return this.#byName.has(name);
  }

  at(index: number): EnumValue | undefined {
    return this.#values[index];
  }

  get values(): readonly EnumValue[] {
    return this.#values;
  }

  get size(): number {
    return this.#values.length;
  }
}
