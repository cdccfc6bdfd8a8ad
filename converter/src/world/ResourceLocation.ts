import { error } from "../utils/error.ts";

/// Used when a name doesn't specify a namespace
export const DEFAULT_NAMESPACE = "minecraft";

let NAMESPACE_PATTERN = /^[a-z0-9._-]+$/;
let PATH_PATTERN = /^[a-z0-9._\/-]+$/;

/**
 * A `namespace:path` name, such as the `minecraft:stone` of a block.
 */
export class ResourceLocation {
  readonly namespace: string;
  readonly path: string;

  constructor(namespace: string, path: string) {
    if (!NAMESPACE_PATTERN.test(namespace)) {
      throw new Error(`Invalid namespace: "${namespace}"`);
    }
    if (!PATH_PATTERN.test(path)) {
      throw new Error(`Invalid path: "${path}"`);
    }
    this.namespace = namespace;
    this.path = path;
  }

  /// `stone` becomes `minecraft:stone`, more than one `:` returns null
  static from_string(value: string): ResourceLocation | null {
    let segments = value.split(":");
    if (segments.length === 1) {
      return new ResourceLocation(DEFAULT_NAMESPACE, value);
    } else if (segments.length === 2) {
      return new ResourceLocation(segments[0], segments[1]);
    } else {
      return null;
    }
  }

  static parse(value: string): ResourceLocation {
    return ResourceLocation.from_string(value) ?? error(`Invalid resource location: "${value}"`);
  }

  equals(other: ResourceLocation) {
    return this.namespace === other.namespace && this.path === other.path;
  }

  toString() {
    return `${this.namespace}:${this.path}`;
  }
}
