import { nbt } from "@voxpack/nbt";
import { bytes } from "@voxpack/binary-protocol/bytes";
import { varint_protocol } from "@voxpack/binary-protocol/varint";
import { DecodeError, encode_combined, native } from "@voxpack/binary-protocol/Protocol";
import { BlockPalette } from "../storage/BlockPalette.ts";
import { PaddedIntArray } from "../storage/PaddedIntArray.ts";
import { UnpaddedIntArray } from "../storage/UnpaddedIntArray.ts";
import { bits_needed_to_store } from "../storage/bit-utils.ts";
import { check_max_value } from "../storage/IntArray.ts";
import { debug, warn } from "../utils/log.ts";
import { BlockState, properties_from_nbt, properties_to_nbt } from "./BlockState.ts";
import { Chunk, SECTIONS_PER_CHUNK, type ChunkLocation } from "./Chunk.ts";
import { CELLS_PER_SECTION, ChunkSection } from "./ChunkSection.ts";
import { ResourceLocation } from "./ResourceLocation.ts";

/// One bit per section, lowest section in the lowest bit of the first byte
const SECTION_BITMAP_BYTES = Math.ceil(SECTIONS_PER_CHUNK / 8);
/// Header byte is `(name length << 1) | has properties`
const MAX_HEADER_NAME_LENGTH = 0xff >> 1;

let encode_section_bitmap = (indices: Array<number>) => {
  let bitmap = new Uint8Array(SECTION_BITMAP_BYTES);
  for (let index of indices) {
    bitmap[index >> 3] |= 1 << (index & 7);
  }
  return bitmap;
};

let decode_section_bitmap = (bitmap: Uint8Array) => {
  let indices: Array<number> = [];
  for (let index = 0; index < SECTIONS_PER_CHUNK; index++) {
    if (bitmap[index >> 3] & (1 << (index & 7))) {
      indices.push(index);
    }
  }
  return indices;
};

let encode_palette_entry = (state: BlockState): Uint8Array => {
  let name = new TextEncoder().encode(state.name.toString());
  if (name.length > MAX_HEADER_NAME_LENGTH) {
    // Wire compatible, so it truncates like the format always has
    warn("CHUNK", `Name of ${state.name} is ${name.length} bytes, header only fits ${MAX_HEADER_NAME_LENGTH}`);
  }
  let header = ((name.length << 1) | (state.has_properties ? 1 : 0)) & 0xff;

  return encode_combined([
    bytes.uint8.encode(header),
    name,
    state.properties == null
      ? new Uint8Array()
      : nbt.standalone.encode({ name: "", value: properties_to_nbt(state.properties) }),
  ]);
};

let decode_palette_entry = (buffer: Uint8Array): [BlockState, number] => {
  let [header, offset] = bytes.uint8.decode(buffer);
  let name_length = header >> 1;
  let [name_bytes, name_offset] = native.bytes(name_length).decode(buffer.subarray(offset));
  offset = offset + name_offset;
  let name = ResourceLocation.parse(new TextDecoder().decode(name_bytes));

  if ((header & 1) === 0) {
    return [new BlockState(name), offset];
  }
  let [properties, properties_length] = nbt.standalone.decode(buffer.subarray(offset));
  if (properties.value.type !== "compound") {
    throw new Error(`Properties of ${name} are ${properties.value.type}, expected compound`);
  }
  return [new BlockState(name, properties_from_nbt(properties.value)), offset + properties_length];
};

/**
 * Everything one serialization builds up: the chunk wide palette and the
 * section storage already rewritten to its ids. Lives for a single call.
 */
class ChunkMergeContext {
  palette: BlockPalette;
  storages: Array<UnpaddedIntArray> = [];

  constructor(default_state: BlockState) {
    this.palette = new BlockPalette(default_state);
  }

  /// Sections have to come in ascending order, each merge can assign new ids
  merge(section: ChunkSection) {
    this.storages.push(section.merge_into(this.palette));
  }
}

export let serialize_chunk = (chunk: Chunk): Uint8Array => {
  let sections = chunk.non_empty_sections();
  let header = [
    varint_protocol.encode(chunk.data_version),
    encode_section_bitmap(sections.map(({ index }) => index)),
  ];

  if (sections.length === 0) {
    debug("CHUNK", `${chunk.location.x},${chunk.location.z} is empty`);
    return encode_combined(header);
  }

  let context = new ChunkMergeContext(chunk.default_state);
  for (let { section } of sections) {
    context.merge(section);
  }

  let buffer = encode_combined([
    ...header,
    varint_protocol.encode(context.palette.size),
    ...context.palette.states().map((state) => encode_palette_entry(state)),
    ...context.storages.flatMap((storage) => [
      varint_protocol.encode(storage.max_value),
      storage.to_bytes(),
    ]),
  ]);

  // prettier-ignore
  debug("CHUNK", `${chunk.location.x},${chunk.location.z}: ${sections.length} sections, ${context.palette.size} states, ${buffer.length} bytes`);
  return buffer;
};

export type DecodeChunkOptions = {
  location: ChunkLocation;
  /// Only used for chunks without sections, otherwise the palette says
  default_state: BlockState;
};

let decode_chunk = (
  buffer: Uint8Array,
  { location, default_state }: DecodeChunkOptions
): [Chunk, number] => {
  let [data_version, offset] = varint_protocol.decode(buffer);
  let [bitmap, bitmap_length] = native.bytes(SECTION_BITMAP_BYTES).decode(buffer.subarray(offset));
  offset = offset + bitmap_length;

  let indices = decode_section_bitmap(bitmap);
  if (indices.length === 0) {
    return [new Chunk({ location, data_version, default_state }), offset];
  }

  let [palette_size, palette_size_length] = varint_protocol.decode(buffer.subarray(offset));
  offset = offset + palette_size_length;
  if (palette_size === 0) {
    throw new Error("Palette can't be empty when sections are present");
  }
  let states: Array<BlockState> = [];
  for (let i = 0; i < palette_size; i++) {
    let [state, length] = decode_palette_entry(buffer.subarray(offset));
    states.push(state);
    offset = offset + length;
  }

  let palette = new BlockPalette(states[0]);
  for (let state of states.slice(1)) {
    if (palette.get_state_id(state) !== -1) {
      throw new Error(`Palette contains ${state} twice`);
    }
    palette.get_or_add_state_id(state);
  }

  let chunk = new Chunk({ location, data_version, default_state: palette.default_state });
  for (let index of indices) {
    let [max_value, max_value_length] = varint_protocol.decode(buffer.subarray(offset));
    offset = offset + max_value_length;
    check_max_value(max_value);

    let byte_length = Math.ceil((CELLS_PER_SECTION * bits_needed_to_store(max_value)) / 8);
    let [data, data_length] = native.bytes(byte_length).decode(buffer.subarray(offset));
    offset = offset + data_length;

    let unpadded = new UnpaddedIntArray(CELLS_PER_SECTION, max_value, data.slice());
    let storage = new PaddedIntArray(CELLS_PER_SECTION, max_value);
    for (let [cell, id] of unpadded) {
      storage.set(cell, id);
    }

    let section_palette = new BlockPalette(palette.default_state);
    section_palette.add_all(palette);
    chunk.set_section(index, new ChunkSection(section_palette, storage));
  }
  return [chunk, offset];
};

export let deserialize_chunk = (buffer: Uint8Array, options: DecodeChunkOptions): Chunk => {
  try {
    let [chunk, length] = decode_chunk(buffer, options);
    if (length !== buffer.length) {
      throw new Error(`${buffer.length - length} trailing bytes`);
    }
    return chunk;
  } catch (error) {
    if (error instanceof DecodeError) throw error;
    throw new DecodeError({ operator: "chunk", cause: error });
  }
};
