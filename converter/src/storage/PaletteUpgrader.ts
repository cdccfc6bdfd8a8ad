import { max } from "lodash-es";
import { InvalidValueError, PaletteError } from "../utils/error.ts";
import { type IntArray } from "./IntArray.ts";

/**
 * A batch of `old id -> new id` changes produced by a palette mutation,
 * to be applied to the arrays that store ids of that palette.
 *
 * Register the changes, `lock()`, then `upgrade()` each dependent array
 * exactly once. Applying twice would read the new ids as if they were old
 * ones, so that throws.
 */
export class PaletteUpgrader {
  /// Shared no-op, for mutations that didn't move any id
  static identity = new PaletteUpgrader().lock();

  #changes = new Map<number, number>();
  #locked = false;
  #unchanged_below: number;
  #upgraded = new WeakSet<IntArray>();

  /// Ids below `unchanged_below` keep their value without being registered
  constructor({ unchanged_below = 0 }: { unchanged_below?: number } = {}) {
    this.#unchanged_below = unchanged_below;
  }

  get locked() {
    return this.#locked;
  }

  get size() {
    return this.#changes.size;
  }

  changes(): Array<[old_id: number, new_id: number]> {
    return Array.from(this.#changes);
  }

  register_change(old_id: number, new_id: number): this {
    if (this.#locked) {
      throw new PaletteError("Cannot register changes on a locked upgrader");
    }
    for (let id of [old_id, new_id]) {
      if (!Number.isInteger(id) || id < 0) {
        throw new InvalidValueError({ value: id, reason: "palette ids are non-negative integers" });
      }
    }
    let existing = this.#changes.get(old_id);
    if (existing != null && existing !== new_id) {
      // prettier-ignore
      throw new PaletteError(`Id ${old_id} is already upgraded to ${existing}, not ${new_id}`);
    }
    this.#changes.set(old_id, new_id);
    return this;
  }

  lock(): this {
    this.#locked = true;
    return this;
  }

  new_id_for(old_id: number): number {
    let new_id = this.#changes.get(old_id);
    if (new_id != null) {
      return new_id;
    }
    if (old_id < this.#unchanged_below) {
      return old_id;
    }
    throw new PaletteError(`No new id registered for id ${old_id}`);
  }

  /**
   * Rewrites every cell of `array` from old to new ids, widening the array
   * first when the new ids need more bits. Nothing is written unless every
   * cell has a new id.
   */
  upgrade<T extends IntArray>(array: T): T {
    if (!this.#locked) {
      throw new PaletteError("Upgrader must be locked before it is applied");
    }
    if (this.#changes.size === 0) {
      return array;
    }
    if (this.#upgraded.has(array)) {
      throw new PaletteError("Upgrader was already applied to this array");
    }

    let new_values = Array.from(array, ([, value]) => this.new_id_for(value));

    let highest = max([...this.#changes.values(), ...new_values]) ?? 0;
    array.widen(highest);
    new_values.forEach((value, index) => array.set(index, value));

    this.#upgraded.add(array);
    return array;
  }

  toString() {
    let changes = this.changes().map(([from, to]) => `${from} -> ${to}`);
    return `PaletteUpgrader {${changes.join(", ")}}`;
  }
}
