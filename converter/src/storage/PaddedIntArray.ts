import { bits_needed_to_store, create_bit_mask } from "./bit-utils.ts";
import {
  check_dimensions,
  check_index,
  check_max_value,
  check_value,
  int_array_to_string,
  type IntArray,
} from "./IntArray.ts";
import { UnpaddedIntArray } from "./UnpaddedIntArray.ts";

const BITS_PER_WORD = 64;

let words_needed = (size: number, bits_per_cell: number) => {
  let cells_per_word = Math.floor(BITS_PER_WORD / bits_per_cell);
  return Math.ceil(size / cells_per_word);
};

/// Little endian bytes of each long, which lines up the unpadded long layout
/// with the unpadded byte layout bit for bit.
let longs_to_bytes = (longs: Array<bigint>) => {
  let buffer = new ArrayBuffer(longs.length * 8);
  let view = new DataView(buffer);
  longs.forEach((long, index) => {
    view.setBigUint64(index * 8, BigInt.asUintN(64, long), true);
  });
  return new Uint8Array(buffer);
};

/**
 * Integers packed into 64-bit words where a cell never spans two words.
 * The `64 % (cells_per_word * bits_per_cell)` high bits of every word stay
 * unused. Matches the block state layout of world files since 1.16.
 *
 * Words are held as two 32-bit halves, low half first, so reads and writes
 * don't need bigint arithmetic.
 */
export class PaddedIntArray implements IntArray {
  #words: Uint32Array;
  #size: number;
  #max_value: number;
  #bits_per_cell: number;
  #cells_per_word: number;
  #cell_mask: number;

  constructor(size: number, max_value: number) {
    check_dimensions(size, max_value);

    this.#size = size;
    this.#max_value = max_value;
    this.#bits_per_cell = bits_needed_to_store(max_value);
    this.#cells_per_word = Math.floor(BITS_PER_WORD / this.#bits_per_cell);
    this.#cell_mask = create_bit_mask(this.#bits_per_cell);
    this.#words = new Uint32Array(words_needed(size, this.#bits_per_cell) * 2);
  }

  /**
   * Reads the `long[]` block data found in world files. Before 1.16 (data
   * version 2529) cells were allowed to span longs, pass `is_padded: false`
   * for those.
   */
  static from_longs(
    longs: Array<bigint>,
    { size, max_value, is_padded }: { size: number; max_value: number; is_padded: boolean }
  ): PaddedIntArray {
    let array = new PaddedIntArray(size, max_value);

    if (!is_padded) {
      let unpadded = new UnpaddedIntArray(size, max_value, longs_to_bytes(longs));
      for (let [index, value] of unpadded) {
        array.set(index, value);
      }
      return array;
    }

    let needed = words_needed(size, array.#bits_per_cell);
    if (longs.length < needed) {
      throw new RangeError(`Cannot store ${size} values in ${longs.length} words`);
    }
    for (let i = 0; i < needed; i++) {
      let long = BigInt.asUintN(64, longs[i]);
      array.#words[i * 2] = Number(long & 0xffffffffn);
      array.#words[i * 2 + 1] = Number(long >> 32n);
    }
    // Bits set in a word can still decode past max_value
    for (let [, value] of array) {
      check_value(value, max_value);
    }
    return array;
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
  get cells_per_word() {
    return this.#cells_per_word;
  }
  get byte_length() {
    return this.#words.length * 4;
  }

  #locate(index: number) {
    let word = Math.floor(index / this.#cells_per_word);
    let offset = (index - word * this.#cells_per_word) * this.#bits_per_cell;
    return { low: word * 2, offset };
  }

  get(index: number): number {
    check_index(index, this.#size);
    let { low, offset } = this.#locate(index);

    if (offset >= 32) {
      return ((this.#words[low + 1] >>> (offset - 32)) & this.#cell_mask) >>> 0;
    }
    let result = this.#words[low] >>> offset;
    if (offset + this.#bits_per_cell > 32) {
      // Crosses from the low half into the high half of the same word
      result = result | (this.#words[low + 1] << (32 - offset));
    }
    return (result & this.#cell_mask) >>> 0;
  }

  set(index: number, value: number): void {
    check_index(index, this.#size);
    check_value(value, this.#max_value);
    let { low, offset } = this.#locate(index);
    let mask = this.#cell_mask;

    if (offset >= 32) {
      let shift = offset - 32;
      this.#words[low + 1] =
        ((this.#words[low + 1] & ~(mask << shift)) | (value << shift)) >>> 0;
      return;
    }

    this.#words[low] = ((this.#words[low] & ~(mask << offset)) | (value << offset)) >>> 0;
    let end = offset + this.#bits_per_cell;
    if (end > 32) {
      let high_mask = create_bit_mask(end - 32);
      this.#words[low + 1] =
        ((this.#words[low + 1] & ~high_mask) | (value >>> (32 - offset))) >>> 0;
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
    this.#cells_per_word = Math.floor(BITS_PER_WORD / bits_per_cell);
    this.#cell_mask = create_bit_mask(bits_per_cell);
    this.#words = new Uint32Array(words_needed(this.#size, bits_per_cell) * 2);
    values.forEach((value, index) => this.set(index, value));
  }

  to_unpadded(): UnpaddedIntArray {
    return UnpaddedIntArray.from(this);
  }

  /// Signed, like the long arrays in world files
  to_longs(): Array<bigint> {
    let longs: Array<bigint> = [];
    for (let i = 0; i < this.#words.length; i += 2) {
      let long = (BigInt(this.#words[i + 1]) << 32n) | BigInt(this.#words[i]);
      longs.push(BigInt.asIntN(64, long));
    }
    return longs;
  }

  toString() {
    return int_array_to_string(this);
  }
}
