import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { BlockState, block_state_codec } from "./BlockState.ts";

describe("BlockState", () => {
  it("should be equal regardless of property order", () => {
    let a = new BlockState("minecraft:oak_stairs", { half: "bottom", facing: "north" });
    let b = new BlockState("oak_stairs", { facing: "north", half: "bottom" });
    assert.ok(a.equals(b));
    assert.equal(a.key, b.key);
    assert.ok(!a.equals(new BlockState("minecraft:oak_stairs", { half: "top", facing: "north" })));
    assert.ok(!a.equals(new BlockState("minecraft:oak_stairs")));
  });

  it("should treat empty properties as no properties", () => {
    let state = new BlockState("minecraft:stone", {});
    assert.equal(state.properties, null);
    assert.equal(state.has_properties, false);
    assert.ok(state.equals(new BlockState("minecraft:stone")));
  });

  it("should print properties sorted", () => {
    let state = new BlockState("minecraft:oak_stairs", { half: "bottom", facing: "north" });
    assert.equal(state.toString(), "minecraft:oak_stairs[facing=north,half=bottom]");
    assert.equal(new BlockState("stone").toString(), "minecraft:stone");
  });

  it("should encode to the compound world files use", () => {
    let state = new BlockState("minecraft:oak_log", { axis: "y" });
    assert.deepStrictEqual(block_state_codec.encode(state), {
      type: "compound",
      value: [
        { name: "Name", value: { type: "string", value: "minecraft:oak_log" } },
        {
          name: "Properties",
          value: { type: "compound", value: [{ name: "axis", value: { type: "string", value: "y" } }] },
        },
      ],
    });
    assert.ok(block_state_codec.decode(block_state_codec.encode(state)).equals(state));
  });

  it("should leave out properties for states without them", () => {
    assert.deepStrictEqual(block_state_codec.encode(new BlockState("minecraft:air")), {
      type: "compound",
      value: [{ name: "Name", value: { type: "string", value: "minecraft:air" } }],
    });
  });

  it("should refuse compounds without a name or with odd properties", () => {
    assert.throws(() => block_state_codec.decode({ type: "compound", value: [] }), {
      message: "Block state is missing a name",
    });
    assert.throws(
      () =>
        block_state_codec.decode({
          type: "compound",
          value: [
            { name: "Name", value: { type: "string", value: "minecraft:snow" } },
            {
              name: "Properties",
              value: { type: "compound", value: [{ name: "layers", value: { type: "int", value: 3 } }] },
            },
          ],
        }),
      { message: 'Block property "layers" is int, expected string' }
    );
  });
});
