export { bits_needed_to_store, create_bit_mask, MAX_CELL_VALUE } from "./storage/bit-utils.ts";
export type { IntArray } from "./storage/IntArray.ts";
export { PaddedIntArray } from "./storage/PaddedIntArray.ts";
export { UnpaddedIntArray } from "./storage/UnpaddedIntArray.ts";
export { BlockPalette, DEFAULT_STATE_ID } from "./storage/BlockPalette.ts";
export { PaletteUpgrader } from "./storage/PaletteUpgrader.ts";
export { ResourceLocation } from "./world/ResourceLocation.ts";
export { BlockState, block_state_codec, type BlockProperties } from "./world/BlockState.ts";
export { ChunkSection, CELLS_PER_SECTION, PADDED_BLOCK_STATES_DATA_VERSION } from "./world/ChunkSection.ts";
export { Chunk, chunk_from_nbt, SECTIONS_PER_CHUNK, type ChunkLocation, type ChunkOptions, type SectionSlot } from "./world/Chunk.ts";
export { serialize_chunk, deserialize_chunk, type DecodeChunkOptions } from "./world/chunk-protocol.ts";
export { load_config, parse_config, chunk_options_from_config, type ConverterConfig } from "./config.ts";
export { IndexOutOfBoundsError, InvalidValueError, PaletteError } from "./utils/error.ts";
