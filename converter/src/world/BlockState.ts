import { sortBy } from "lodash-es";
import { compound_get, type NBTOfType } from "@voxpack/nbt";
import { error } from "../utils/error.ts";
import { ResourceLocation } from "./ResourceLocation.ts";

export type BlockProperties = { [property: string]: string };

/**
 * A block name with its (unordered) properties, like
 * `minecraft:oak_stairs[facing=north,half=bottom]`.
 * Two states are equal when name and properties are.
 */
export class BlockState {
  readonly name: ResourceLocation;
  /// Never an empty object, states without properties have null
  readonly properties: Readonly<BlockProperties> | null;
  /// Canonical identity, property order doesn't matter
  readonly key: string;

  constructor(name: ResourceLocation | string, properties: BlockProperties | null = null) {
    this.name = typeof name === "string" ? ResourceLocation.parse(name) : name;

    let entries = sortBy(Object.entries(properties ?? {}), ([property]) => property);
    for (let [property, value] of entries) {
      if (typeof value !== "string") {
        throw new Error(`Property "${property}" of ${this.name} is not a string`);
      }
    }
    this.properties = entries.length === 0 ? null : Object.freeze(Object.fromEntries(entries));
    this.key = JSON.stringify([this.name.toString(), entries]);
  }

  get has_properties() {
    return this.properties != null;
  }

  equals(other: BlockState) {
    return this.key === other.key;
  }

  toString() {
    if (this.properties == null) {
      return this.name.toString();
    }
    let properties = Object.entries(this.properties).map(([property, value]) => `${property}=${value}`);
    return `${this.name}[${properties.join(",")}]`;
  }
}

export let properties_to_nbt = (properties: Readonly<BlockProperties>): NBTOfType<"compound"> => {
  return {
    type: "compound",
    value: Object.entries(properties).map(([name, value]) => ({
      name,
      value: { type: "string", value },
    })),
  };
};

export let properties_from_nbt = (compound: NBTOfType<"compound">): BlockProperties => {
  let properties: BlockProperties = {};
  for (let entry of compound.value) {
    if (entry.value.type !== "string") {
      throw new Error(`Block property "${entry.name}" is ${entry.value.type}, expected string`);
    }
    properties[entry.name] = entry.value.value;
  }
  return properties;
};

/// Block states as world files store them: `{ Name, Properties? }`
export let block_state_codec = {
  encode: (state: BlockState): NBTOfType<"compound"> => {
    let entries: NBTOfType<"compound">["value"] = [
      { name: "Name", value: { type: "string", value: state.name.toString() } },
    ];
    if (state.properties != null) {
      entries.push({ name: "Properties", value: properties_to_nbt(state.properties) });
    }
    return { type: "compound", value: entries };
  },
  decode: (compound: NBTOfType<"compound">): BlockState => {
    let name = compound_get(compound, "Name", "string") ?? error("Block state is missing a name");
    let properties = compound_get(compound, "Properties", "compound");
    return new BlockState(
      ResourceLocation.parse(name.value),
      properties == null ? null : properties_from_nbt(properties)
    );
  },
};
