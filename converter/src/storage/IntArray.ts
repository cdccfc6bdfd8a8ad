import { IndexOutOfBoundsError, InvalidValueError } from "../utils/error.ts";
import { MAX_CELL_VALUE } from "./bit-utils.ts";

/// Fixed size array of unsigned integers, each at most `max_value`
export interface IntArray extends Iterable<[index: number, value: number]> {
  readonly size: number;
  readonly max_value: number;
  readonly bits_per_cell: number;
  /// Bytes of backing storage in use
  readonly byte_length: number;

  get(index: number): number;
  set(index: number, value: number): void;
  /// Fresh traversal in index order every call
  entries(): IterableIterator<[index: number, value: number]>;
  /// Raises `max_value`, reallocating when cells need more bits. Never narrows.
  widen(max_value: number): void;
}

export let check_dimensions = (size: number, max_value: number) => {
  if (!Number.isSafeInteger(size) || size < 0) {
    throw new InvalidValueError({ value: size, reason: "size must be a non-negative integer" });
  }
  check_max_value(max_value);
};

export let check_max_value = (max_value: number) => {
  if (!Number.isInteger(max_value) || max_value < 0 || max_value > MAX_CELL_VALUE) {
    // prettier-ignore
    throw new InvalidValueError({ value: max_value, reason: `max value must be an integer in [0, ${MAX_CELL_VALUE}]` });
  }
};

export let check_index = (index: number, size: number) => {
  if (!Number.isInteger(index) || index < 0 || index >= size) {
    throw new IndexOutOfBoundsError({ index, bounds: `size ${size}` });
  }
};

export let check_value = (value: number, max_value: number) => {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidValueError({ value, reason: "not a non-negative integer" });
  }
  if (value > max_value) {
    throw new InvalidValueError({ value, reason: `exceeds max value ${max_value}` });
  }
};

export let int_array_to_string = (array: IntArray) => {
  return `[${Array.from(array, ([, value]) => value).join(", ")}]`;
};
