import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { range } from "lodash-es";
import { PaddedIntArray } from "./PaddedIntArray.ts";
import { UnpaddedIntArray } from "./UnpaddedIntArray.ts";
import { create_bit_mask } from "./bit-utils.ts";
import { IndexOutOfBoundsError, InvalidValueError } from "../utils/error.ts";

let values_of = (array: PaddedIntArray | UnpaddedIntArray) => {
  return Array.from(array, ([, value]) => value);
};

describe("PaddedIntArray", () => {
  it("should read back what was set", () => {
    let array = new PaddedIntArray(5, 3);
    [3, 0, 2, 1, 3].forEach((value, index) => array.set(index, value));
    assert.deepStrictEqual(values_of(array), [3, 0, 2, 1, 3]);
    assert.equal(array.toString(), "[3, 0, 2, 1, 3]");
  });

  it("should fit whole cells in a word, leaving the high bits unused", () => {
    let array = new PaddedIntArray(13, 31);
    assert.equal(array.bits_per_cell, 5);
    assert.equal(array.cells_per_word, 12);
    assert.equal(array.byte_length, 16);

    array.set(11, 31);
    array.set(12, 1);
    assert.deepStrictEqual(array.to_longs(), [31n << 55n, 1n]);
  });

  it("should handle cells on the border of the two halves of a word", () => {
    let array = new PaddedIntArray(13, 31);
    array.set(6, 31);
    assert.deepStrictEqual(array.to_longs(), [31n << 30n, 0n]);
    assert.equal(array.get(5), 0);
    assert.equal(array.get(6), 31);
    assert.equal(array.get(7), 0);

    array.set(6, 0b10101);
    assert.equal(array.get(6), 0b10101);
    assert.equal(array.get(7), 0);
  });

  it("should give signed longs", () => {
    let array = new PaddedIntArray(16, 15);
    array.set(15, 15);
    assert.deepStrictEqual(array.to_longs(), [-(1n << 60n)]);
  });

  it("should not leak between cells at any width", () => {
    for (let bits of range(1, 32)) {
      let max_value = create_bit_mask(bits);
      let array = new PaddedIntArray(40, max_value);
      let expected = range(40).map((index) => (index * 2654435761) % (max_value + 1));
      expected.forEach((value, index) => array.set(index, value));

      array.set(20, max_value);
      array.set(21, 0);
      expected[20] = max_value;
      expected[21] = 0;

      assert.deepStrictEqual(values_of(array), expected, `${bits} bits per cell`);
    }
  });

  it("should read padded longs back", () => {
    let array = new PaddedIntArray(40, 100);
    range(40).forEach((index) => array.set(index, (index * 7) % 101));

    let copy = PaddedIntArray.from_longs(array.to_longs(), { size: 40, max_value: 100, is_padded: true });
    assert.deepStrictEqual(values_of(copy), values_of(array));
  });

  it("should read unpadded longs, where cells span longs", () => {
    // Cell 12 starts at bit 60: 4 bits in the first long, 1 in the second
    let longs = [(6n << 60n) | 7n, 1n];
    let array = PaddedIntArray.from_longs(longs, { size: 13, max_value: 31, is_padded: false });
    assert.equal(array.get(0), 7);
    assert.equal(array.get(12), 22);
    assert.deepStrictEqual(values_of(array).slice(1, 12), range(11).map(() => 0));
  });

  it("should refuse too few longs", () => {
    assert.throws(() => PaddedIntArray.from_longs([0n], { size: 13, max_value: 31, is_padded: true }), {
      message: "Cannot store 13 values in 1 words",
    });
  });

  it("should refuse longs holding values above the maximum", () => {
    assert.throws(
      () => PaddedIntArray.from_longs([31n, 0n], { size: 13, max_value: 20, is_padded: true }),
      InvalidValueError
    );
  });

  it("should refuse bad indices and values", () => {
    let array = new PaddedIntArray(5, 3);
    assert.throws(() => array.get(5), IndexOutOfBoundsError);
    assert.throws(() => array.set(-1, 0), IndexOutOfBoundsError);
    assert.throws(() => array.set(0, 4), InvalidValueError);
  });

  it("should never take more bytes unpadded", () => {
    for (let bits of range(1, 32)) {
      let padded = new PaddedIntArray(4096, create_bit_mask(bits));
      let unpadded = padded.to_unpadded();
      assert.equal(unpadded.byte_length, Math.ceil((4096 * bits) / 8));
      assert.ok(unpadded.byte_length <= padded.byte_length, `${bits} bits per cell`);
    }
  });

  it("should keep values when converted to unpadded", () => {
    let array = new PaddedIntArray(13, 31);
    range(13).forEach((index) => array.set(index, 31 - index));
    let unpadded = array.to_unpadded();
    assert.equal(unpadded.max_value, 31);
    assert.deepStrictEqual(values_of(unpadded), values_of(array));
  });

  it("should keep values when widened", () => {
    let array = new PaddedIntArray(70, 1);
    range(70).forEach((index) => array.set(index, index % 2));
    array.widen(2);
    assert.equal(array.bits_per_cell, 2);
    assert.equal(array.cells_per_word, 32);
    assert.deepStrictEqual(values_of(array), range(70).map((index) => index % 2));
  });
});
