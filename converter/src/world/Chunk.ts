import { range } from "lodash-es";
import { compound_get, type NBTOfType } from "@voxpack/nbt";
import { error, IndexOutOfBoundsError } from "../utils/error.ts";
import { type BlockState } from "./BlockState.ts";
import { ChunkSection, SECTION_DEPTH, SECTION_HEIGHT, SECTION_WIDTH } from "./ChunkSection.ts";

export const SECTIONS_PER_CHUNK = 16;
export const CHUNK_WIDTH = SECTION_WIDTH;
export const CHUNK_DEPTH = SECTION_DEPTH;
export const CHUNK_HEIGHT = SECTION_HEIGHT * SECTIONS_PER_CHUNK;

export type ChunkLocation = { x: number; z: number };

export type SectionSlot = { type: "absent" } | { type: "present"; section: ChunkSection };

export type ChunkOptions = {
  location: ChunkLocation;
  data_version: number;
  default_state: BlockState;
};

/**
 * A 16 wide, 256 high and 16 deep column of blocks, split into 16 sections
 * stacked from the bottom up. Sections come into existence on the first
 * write to them and are kept from then on, even when emptied again.
 */
export class Chunk {
  readonly location: ChunkLocation;
  readonly data_version: number;
  readonly default_state: BlockState;

  #slots: Array<SectionSlot> = range(SECTIONS_PER_CHUNK).map((): SectionSlot => ({ type: "absent" }));

  constructor({ location, data_version, default_state }: ChunkOptions) {
    if (!Number.isInteger(data_version) || data_version < 0) {
      throw new RangeError(`Invalid data version: ${data_version}`);
    }
    this.location = location;
    this.data_version = data_version;
    this.default_state = default_state;
  }

  get width() {
    return CHUNK_WIDTH;
  }
  get height() {
    return CHUNK_HEIGHT;
  }
  get depth() {
    return CHUNK_DEPTH;
  }

  section_slot(index: number): SectionSlot {
    if (!Number.isInteger(index) || index < 0 || index >= SECTIONS_PER_CHUNK) {
      throw new IndexOutOfBoundsError({ index, bounds: `${SECTIONS_PER_CHUNK} sections` });
    }
    return this.#slots[index];
  }

  inspect_section(index: number): "absent" | "empty" | "filled" {
    let slot = this.section_slot(index);
    if (slot.type === "absent") return "absent";
    return slot.section.is_empty ? "empty" : "filled";
  }

  /// Puts a whole section in place, when loading chunks
  set_section(index: number, section: ChunkSection) {
    this.section_slot(index);
    if (!section.default_state.equals(this.default_state)) {
      // prettier-ignore
      throw new Error(`Section default state ${section.default_state} doesn't match chunk default ${this.default_state}`);
    }
    this.#slots[index] = { type: "present", section };
  }

  #check_bounds(x: number, y: number, z: number) {
    let in_bounds =
      Number.isInteger(x) && x >= 0 && x < CHUNK_WIDTH &&
      Number.isInteger(y) && y >= 0 && y < CHUNK_HEIGHT &&
      Number.isInteger(z) && z >= 0 && z < CHUNK_DEPTH;
    if (!in_bounds) {
      // prettier-ignore
      throw new IndexOutOfBoundsError({ index: `(${x}, ${y}, ${z})`, bounds: `chunk ${CHUNK_WIDTH}x${CHUNK_HEIGHT}x${CHUNK_DEPTH}` });
    }
  }

  get_block_at(x: number, y: number, z: number): BlockState {
    this.#check_bounds(x, y, z);
    let slot = this.#slots[y >> 4];
    if (slot.type === "absent") {
      return this.default_state;
    }
    return slot.section.get_block_at(x, y & 15, z);
  }

  /// Returns the state that was there before
  set_block_at(x: number, y: number, z: number, state: BlockState): BlockState {
    this.#check_bounds(x, y, z);
    let index = y >> 4;
    let slot = this.#slots[index];
    if (slot.type === "absent") {
      slot = { type: "present", section: ChunkSection.empty(this.default_state) };
      this.#slots[index] = slot;
    }
    return slot.section.set_block_at(x, y & 15, z, state);
  }

  get is_empty(): boolean {
    return this.#slots.every((slot) => slot.type === "absent" || slot.section.is_empty);
  }

  /// Present sections with at least one non-default block, bottom up
  non_empty_sections(): Array<{ index: number; section: ChunkSection }> {
    return this.#slots.flatMap((slot, index) =>
      slot.type === "present" && !slot.section.is_empty ? [{ index, section: slot.section }] : []
    );
  }
}

/**
 * Chunk from the compound a world file stores for it:
 * `{ DataVersion, Level: { xPos, zPos, Sections: [{ Y, Palette, BlockStates }] } }`.
 * Sections outside the 0..15 range (light only) are skipped.
 */
export let chunk_from_nbt = (
  root: NBTOfType<"compound">,
  { default_state }: { default_state: BlockState }
): Chunk => {
  let data_version = compound_get(root, "DataVersion", "int") ?? error("Chunk is missing DataVersion or Level");
  let level = compound_get(root, "Level", "compound") ?? error("Chunk is missing DataVersion or Level");
  let x = compound_get(level, "xPos", "int") ?? error("Chunk is missing its position");
  let z = compound_get(level, "zPos", "int") ?? error("Chunk is missing its position");

  let chunk = new Chunk({
    location: { x: x.value, z: z.value },
    data_version: data_version.value,
    default_state,
  });

  let sections = compound_get(level, "Sections", "list")?.value ?? [];
  for (let entry of sections) {
    if (entry.type !== "compound") {
      throw new Error(`Sections must be compounds, got ${entry.type}`);
    }
    let y = compound_get(entry, "Y", "byte");
    if (y == null || y.value < 0 || y.value >= SECTIONS_PER_CHUNK) {
      continue;
    }
    let section = ChunkSection.from_nbt(entry, { default_state, data_version: data_version.value });
    if (section != null) {
      chunk.set_section(y.value, section);
    }
  }
  return chunk;
};
