import { bits_needed_to_store, create_bit_mask } from "./bit-utils.ts";
import {
  check_dimensions,
  check_index,
  check_max_value,
  check_value,
  int_array_to_string,
  type IntArray,
} from "./IntArray.ts";

let bytes_needed = (size: number, bits_per_cell: number) => {
  return Math.ceil((size * bits_per_cell) / 8);
};

/**
 * Integers packed back to back with no padding, so a cell may start in one
 * byte and end in the next. The low bits of a cell live in the earlier byte.
 * This is the layout chunks are serialized in.
 */
export class UnpaddedIntArray implements IntArray {
  #data: Uint8Array;
  #size: number;
  #max_value: number;
  #bits_per_cell: number;

  constructor(size: number, max_value: number, data?: Uint8Array) {
    check_dimensions(size, max_value);

    this.#size = size;
    this.#max_value = max_value;
    this.#bits_per_cell = bits_needed_to_store(max_value);

    let needed = bytes_needed(size, this.#bits_per_cell);
    if (data == null) {
      this.#data = new Uint8Array(needed);
    } else if (data.length < needed) {
      // prettier-ignore
      throw new RangeError(`Cannot store ${size} values of ${this.#bits_per_cell} bits in ${data.length} bytes`);
    } else {
      this.#data = data;
    }
  }

  static from(array: IntArray): UnpaddedIntArray {
    let unpadded = new UnpaddedIntArray(array.size, array.max_value);
    for (let [index, value] of array.entries()) {
      unpadded.set(index, value);
    }
    return unpadded;
  }

  get size() {
    return this.#size;
  }
  get max_value() {
    return this.#max_value;
  }
  get bits_per_cell() {
    return this.#bits_per_cell;
  }
  get byte_length() {
    return bytes_needed(this.#size, this.#bits_per_cell);
  }

  get(index: number): number {
    check_index(index, this.#size);

    let bit_index = index * this.#bits_per_cell;
    let byte_index = Math.floor(bit_index / 8);
    let bit_offset = bit_index % 8;

    let value = 0;
    let bits_read = 0;
    while (bits_read < this.#bits_per_cell) {
      let bits = Math.min(this.#bits_per_cell - bits_read, 8 - bit_offset);
      let part = (this.#data[byte_index] >>> bit_offset) & create_bit_mask(bits);
      value = value | (part << bits_read);

      bits_read = bits_read + bits;
      byte_index = byte_index + 1;
      bit_offset = 0;
    }
    return value >>> 0;
  }

  set(index: number, value: number): void {
    check_index(index, this.#size);
    check_value(value, this.#max_value);

    let bit_index = index * this.#bits_per_cell;
    let byte_index = Math.floor(bit_index / 8);
    let bit_offset = bit_index % 8;

    let bits_written = 0;
    while (bits_written < this.#bits_per_cell) {
      let bits = Math.min(this.#bits_per_cell - bits_written, 8 - bit_offset);
      let mask = create_bit_mask(bits);
      let part = (value >>> bits_written) & mask;

      // Clear the cell's bits in this byte, then insert
      this.#data[byte_index] =
        (this.#data[byte_index] & ~(mask << bit_offset)) | (part << bit_offset);

      bits_written = bits_written + bits;
      byte_index = byte_index + 1;
      bit_offset = 0;
    }
  }

  *entries(): IterableIterator<[number, number]> {
    for (let index = 0; index < this.#size; index++) {
      yield [index, this.get(index)];
    }
  }

  [Symbol.iterator]() {
    return this.entries();
  }

  widen(max_value: number): void {
    check_max_value(max_value);
    if (max_value <= this.#max_value) return;

    let bits_per_cell = bits_needed_to_store(max_value);
    if (bits_per_cell === this.#bits_per_cell) {
      this.#max_value = max_value;
      return;
    }

    let values = Array.from(this, ([, value]) => value);
    this.#max_value = max_value;
    this.#bits_per_cell = bits_per_cell;
    this.#data = new Uint8Array(bytes_needed(this.#size, bits_per_cell));
    values.forEach((value, index) => this.set(index, value));
  }

  /// Exactly `byte_length` bytes, copied
  to_bytes(): Uint8Array {
    return this.#data.slice(0, this.byte_length);
  }

  toString() {
    return int_array_to_string(this);
  }
}
