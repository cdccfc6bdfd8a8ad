/// Ids are stored as signed 32-bit ints, so this is the widest cell we support
export const MAX_CELL_VALUE = 0x7fffffff;

/// Minimum number of bits needed to represent `value`, never less than 1
export let bits_needed_to_store = (value: number): number => {
  return Math.max(1, 32 - Math.clz32(value));
};

/// Mask with the `width` least significant bits set
export let create_bit_mask = (width: number): number => {
  if (width >= 32) return 0xffffffff;
  return ((1 << width) >>> 0) - 1;
};
