import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { range } from "lodash-es";
import { type NBTOfType } from "@voxpack/nbt";
import { IndexOutOfBoundsError } from "../utils/error.ts";
import { BlockState, block_state_codec } from "./BlockState.ts";
import { Chunk, chunk_from_nbt } from "./Chunk.ts";
import { ChunkSection } from "./ChunkSection.ts";

let air = new BlockState("minecraft:air");
let stone = new BlockState("minecraft:stone");

let new_chunk = () => new Chunk({ location: { x: 0, z: 0 }, data_version: 2586, default_state: air });

describe("Chunk", () => {
  it("should be 16x256x16", () => {
    let chunk = new_chunk();
    assert.deepStrictEqual([chunk.width, chunk.height, chunk.depth], [16, 256, 16]);
  });

  it("should give the default state where nothing was set", () => {
    let chunk = new_chunk();
    assert.equal(chunk.get_block_at(3, 100, 3), air);
    assert.equal(chunk.inspect_section(6), "absent");
    assert.ok(chunk.is_empty);
  });

  it("should create the section on the first write", () => {
    let chunk = new_chunk();
    assert.equal(chunk.set_block_at(1, 37, 2, stone), air);
    assert.equal(chunk.get_block_at(1, 37, 2), stone);
    assert.equal(chunk.inspect_section(2), "filled");
    assert.deepStrictEqual(
      chunk.non_empty_sections().map(({ index }) => index),
      [2]
    );
    assert.ok(!chunk.is_empty);
  });

  it("should keep a section once it's there, even when emptied", () => {
    let chunk = new_chunk();
    chunk.set_block_at(1, 37, 2, stone);
    assert.equal(chunk.set_block_at(1, 37, 2, air), stone);
    assert.equal(chunk.inspect_section(2), "empty");
    assert.deepStrictEqual(chunk.non_empty_sections(), []);
    assert.ok(chunk.is_empty);
  });

  it("should refuse coordinates outside the chunk", () => {
    let chunk = new_chunk();
    for (let [x, y, z] of [
      [16, 0, 0],
      [0, 256, 0],
      [0, -1, 0],
      [0, 0, 1.5],
    ]) {
      assert.throws(() => chunk.get_block_at(x, y, z), IndexOutOfBoundsError);
      assert.throws(() => chunk.set_block_at(x, y, z, stone), IndexOutOfBoundsError);
    }
    assert.throws(() => chunk.section_slot(16), IndexOutOfBoundsError);
  });

  it("should refuse an invalid data version", () => {
    assert.throws(
      () => new Chunk({ location: { x: 0, z: 0 }, data_version: -1, default_state: air }),
      RangeError
    );
  });

  it("should refuse sections with another default state", () => {
    let chunk = new_chunk();
    assert.throws(() => chunk.set_section(0, ChunkSection.empty(stone)), {
      message: "Section default state minecraft:stone doesn't match chunk default minecraft:air",
    });
    chunk.set_section(0, ChunkSection.empty(new BlockState("air")));
    assert.equal(chunk.inspect_section(0), "empty");
  });

  it("should read a chunk from world nbt", () => {
    let root: NBTOfType<"compound"> = {
      type: "compound",
      value: [
        { name: "DataVersion", value: { type: "int", value: 2586 } },
        {
          name: "Level",
          value: {
            type: "compound",
            value: [
              { name: "xPos", value: { type: "int", value: 3 } },
              { name: "zPos", value: { type: "int", value: -2 } },
              {
                name: "Sections",
                value: {
                  type: "list",
                  value: [
                    { type: "compound", value: [{ name: "Y", value: { type: "byte", value: -1 } }] },
                    {
                      type: "compound",
                      value: [
                        { name: "Y", value: { type: "byte", value: 1 } },
                        {
                          name: "Palette",
                          value: { type: "list", value: [block_state_codec.encode(stone)] },
                        },
                        { name: "BlockStates", value: { type: "long_array", value: range(256).map(() => 0n) } },
                      ],
                    },
                  ],
                },
              },
            ],
          },
        },
      ],
    };

    let chunk = chunk_from_nbt(root, { default_state: air });
    assert.deepStrictEqual(chunk.location, { x: 3, z: -2 });
    assert.equal(chunk.data_version, 2586);
    assert.equal(chunk.inspect_section(0), "absent");
    assert.equal(chunk.inspect_section(1), "filled");
    assert.ok(chunk.get_block_at(5, 20, 5).equals(stone));
    assert.equal(chunk.get_block_at(5, 15, 5), air);
  });

  it("should refuse nbt without a level", () => {
    assert.throws(
      () =>
        chunk_from_nbt(
          { type: "compound", value: [{ name: "DataVersion", value: { type: "int", value: 2586 } }] },
          { default_state: air }
        ),
      { message: "Chunk is missing DataVersion or Level" }
    );
  });

  it("should refuse nbt without a position", () => {
    assert.throws(
      () =>
        chunk_from_nbt(
          {
            type: "compound",
            value: [
              { name: "DataVersion", value: { type: "int", value: 2586 } },
              { name: "Level", value: { type: "compound", value: [{ name: "xPos", value: { type: "int", value: 0 } }] } },
            ],
          },
          { default_state: air }
        ),
      { message: "Chunk is missing its position" }
    );
  });
});
