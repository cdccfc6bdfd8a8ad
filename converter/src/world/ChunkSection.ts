import { range } from "lodash-es";
import { type NBTOfType, compound_get } from "@voxpack/nbt";
import { BlockPalette, DEFAULT_STATE_ID } from "../storage/BlockPalette.ts";
import { PaddedIntArray } from "../storage/PaddedIntArray.ts";
import { type UnpaddedIntArray } from "../storage/UnpaddedIntArray.ts";
import { PaletteUpgrader } from "../storage/PaletteUpgrader.ts";
import { bits_needed_to_store, create_bit_mask } from "../storage/bit-utils.ts";
import { IndexOutOfBoundsError } from "../utils/error.ts";
import { type BlockState, block_state_codec } from "./BlockState.ts";

export const SECTION_WIDTH = 16;
export const SECTION_HEIGHT = 16;
export const SECTION_DEPTH = 16;
export const CELLS_PER_SECTION = SECTION_WIDTH * SECTION_HEIGHT * SECTION_DEPTH;

/// From this data version (20w17a) block state longs are padded
export const PADDED_BLOCK_STATES_DATA_VERSION = 2529;
/// World files never use fewer bits per block than this
const MIN_WORLD_BITS_PER_BLOCK = 4;

let check_axis = (axis: string, value: number, limit: number) => {
  if (!Number.isInteger(value) || value < 0 || value >= limit) {
    throw new IndexOutOfBoundsError({ index: `${axis}=${value}`, bounds: `section ${axis} 0..${limit - 1}` });
  }
};

let cell_index = (x: number, y: number, z: number) => {
  check_axis("x", x, SECTION_WIDTH);
  check_axis("y", y, SECTION_HEIGHT);
  check_axis("z", z, SECTION_DEPTH);
  return (y << 8) | (z << 4) | x;
};

/**
 * A 16x16x16 slab of a chunk: a local palette and the palette id of every
 * block, in the word aligned layout world files use.
 */
export class ChunkSection {
  #palette: BlockPalette;
  #storage: PaddedIntArray;

  constructor(palette: BlockPalette, storage: PaddedIntArray) {
    if (storage.size !== CELLS_PER_SECTION) {
      throw new RangeError(`Section storage must hold ${CELLS_PER_SECTION} blocks, got ${storage.size}`);
    }
    for (let [index, id] of storage) {
      if (id >= palette.size) {
        throw new IndexOutOfBoundsError({ index: id, bounds: `palette of ${palette.size} at block ${index}` });
      }
    }
    this.#palette = palette;
    this.#storage = storage;
  }

  /// Every block is `default_state`
  static empty(default_state: BlockState): ChunkSection {
    return new ChunkSection(new BlockPalette(default_state), new PaddedIntArray(CELLS_PER_SECTION, 0));
  }

  /**
   * Section from a world file's palette and block state longs. The world
   * palette doesn't have to start with `default_state`, ids are remapped.
   */
  static from_block_states({
    default_state,
    palette: world_palette,
    block_states,
    data_version,
  }: {
    default_state: BlockState;
    palette: Array<BlockState>;
    block_states: Array<bigint>;
    data_version: number;
  }): ChunkSection {
    if (world_palette.length === 0) {
      throw new Error("Section palette is empty");
    }
    let palette = new BlockPalette(default_state);
    let upgrader = new PaletteUpgrader();
    world_palette.forEach((state, world_id) => {
      upgrader.register_change(world_id, palette.get_or_add_state_id(state));
    });
    upgrader.lock();

    let bits = Math.max(MIN_WORLD_BITS_PER_BLOCK, bits_needed_to_store(world_palette.length - 1));
    let storage = PaddedIntArray.from_longs(block_states, {
      size: CELLS_PER_SECTION,
      max_value: create_bit_mask(bits),
      is_padded: data_version >= PADDED_BLOCK_STATES_DATA_VERSION,
    });
    // Ids the world palette doesn't have fail here
    upgrader.upgrade(storage);

    return new ChunkSection(palette, storage);
  }

  /// `null` for sections without blocks, like the light-only ones
  static from_nbt(
    section: NBTOfType<"compound">,
    { default_state, data_version }: { default_state: BlockState; data_version: number }
  ): ChunkSection | null {
    let palette = compound_get(section, "Palette", "list");
    let block_states = compound_get(section, "BlockStates", "long_array");
    if (palette == null || block_states == null) {
      return null;
    }

    return ChunkSection.from_block_states({
      default_state,
      palette: palette.value.map((entry) => {
        if (entry.type !== "compound") {
          throw new Error(`Palette entries must be compounds, got ${entry.type}`);
        }
        return block_state_codec.decode(entry);
      }),
      block_states: block_states.value,
      data_version,
    });
  }

  get default_state(): BlockState {
    return this.#palette.default_state;
  }

  /// States in id order, a copy
  palette_states(): Array<BlockState> {
    return [...this.#palette.states()];
  }

  get bits_per_block(): number {
    return this.#storage.bits_per_cell;
  }

  /// Highest id the storage can hold without widening
  get max_id(): number {
    return this.#storage.max_value;
  }

  /**
   * Adds this section's states to `palette` and returns its blocks as ids
   * of that palette, in the unpadded layout. The section itself is untouched.
   */
  merge_into(palette: BlockPalette): UnpaddedIntArray {
    let storage = this.#storage.to_unpadded();
    return palette.add_all(this.#palette).upgrade(storage);
  }

  get_block_at(x: number, y: number, z: number): BlockState {
    return this.#palette.get_state(this.#storage.get(cell_index(x, y, z)));
  }

  /// Returns the state that was there before
  set_block_at(x: number, y: number, z: number, state: BlockState): BlockState {
    let index = cell_index(x, y, z);
    let previous = this.#palette.get_state(this.#storage.get(index));

    let id = this.#palette.get_or_add_state_id(state);
    this.#storage.widen(id);
    this.#storage.set(index, id);
    return previous;
  }

  /// True when every block is the default state
  get is_empty(): boolean {
    for (let [, id] of this.#storage) {
      if (id !== DEFAULT_STATE_ID) return false;
    }
    return true;
  }

  /**
   * Drops palette states no block refers to anymore, and shrinks the
   * storage to what the remaining ids need.
   */
  compact(): void {
    let used = new Set<number>();
    for (let [, id] of this.#storage) {
      used.add(id);
    }

    // Highest first, so the ids still to check don't move
    for (let id of range(this.#palette.size - 1, DEFAULT_STATE_ID, -1)) {
      if (!used.has(id)) {
        this.#palette.remove_state(id).upgrade(this.#storage);
      }
    }

    let storage = new PaddedIntArray(CELLS_PER_SECTION, this.#palette.size - 1);
    for (let [index, id] of this.#storage) {
      storage.set(index, id);
    }
    this.#storage = storage;
  }
}
