import { ConfigurationError, ValidationError } from "./errors";
import type { SampleInput } from "./types";

/**
 * Fixed set of sieve openings every sample is aligned to.
 * Sizes run coarse → fine (strictly decreasing).
 */
export class SieveScale {
  private readonly values: readonly number[];

  private constructor(values: readonly number[]) {
    this.values = Object.freeze([...values]);
    Object.freeze(this);
  }

  static create(sizes: readonly number[]): SieveScale {
    if (sizes.length < 2) {
      throw new ConfigurationError(`Sieve scale needs at least 2 sizes, got ${sizes.length}`);
    }
    sizes.forEach((s, i) => {
      if (!Number.isFinite(s) || s <= 0) {
        throw new ConfigurationError(`Sieve size at index ${i} must be a positive number, got ${s}`);
      }
      if (i > 0 && s >= sizes[i - 1]) {
        throw new ConfigurationError(
          `Sieve sizes must be strictly decreasing: index ${i} (${s}) follows ${sizes[i - 1]}`
        );
      }
    });
    return new SieveScale(sizes);
  }

  get count(): number {
    return this.values.length;
  }

  get sizes(): readonly number[] {
    return this.values;
  }

  get max(): number {
    return this.values[0];
  }

  get min(): number {
    return this.values[this.values.length - 1];
  }

  sizeAt(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.values.length) {
      throw new RangeError(`Sieve index ${index} outside [0, ${this.values.length})`);
    }
    return this.values[index];
  }

  matches(length: number): boolean {
    return length === this.values.length;
  }

  assertMatches(sample: SampleInput): void {
    if (!this.matches(sample.readings.length)) {
      throw new ValidationError(
        `${sample.name}: expected ${this.values.length} values (one per sieve), got ${sample.readings.length}`
      );
    }
  }
}
