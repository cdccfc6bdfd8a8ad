import { range } from "lodash-es";
import { type BlockState } from "../world/BlockState.ts";
import { IndexOutOfBoundsError, PaletteError } from "../utils/error.ts";
import { PaletteUpgrader } from "./PaletteUpgrader.ts";

export const DEFAULT_STATE_ID = 0;

/**
 * The distinct block states of a volume, each identified by its position.
 * Ids are always `0 .. size - 1` with no gaps, and id 0 is the default
 * state, which can't be removed.
 *
 * Used together with an `IntArray` of ids, this is how large volumes of
 * blocks are stored compactly.
 */
export class BlockPalette implements Iterable<BlockState> {
  #states: Array<BlockState>;
  #ids = new Map<string, number>();

  readonly default_state: BlockState;
  readonly default_state_id = DEFAULT_STATE_ID;

  constructor(default_state: BlockState) {
    this.default_state = default_state;
    this.#states = [default_state];
    this.#ids.set(default_state.key, DEFAULT_STATE_ID);
  }

  get size() {
    return this.#states.length;
  }

  get_state(id: number): BlockState {
    if (!Number.isInteger(id) || id < 0 || id >= this.#states.length) {
      throw new IndexOutOfBoundsError({ index: id, bounds: `palette of ${this.#states.length}` });
    }
    return this.#states[id];
  }

  /// -1 when the palette doesn't contain the state
  get_state_id(state: BlockState): number {
    return this.#ids.get(state.key) ?? -1;
  }

  get_or_add_state_id(state: BlockState): number {
    let id = this.#ids.get(state.key);
    if (id != null) {
      return id;
    }
    let new_id = this.#states.length;
    this.#states.push(state);
    this.#ids.set(state.key, new_id);
    return new_id;
  }

  /**
   * Removes a state, shifting every id above it down by one. Apply the
   * returned upgrader to the data that uses this palette.
   * Removing a state that isn't there changes nothing.
   */
  remove_state(id_or_state: number | BlockState): PaletteUpgrader {
    let id = typeof id_or_state === "number" ? id_or_state : this.get_state_id(id_or_state);

    if (id === DEFAULT_STATE_ID) {
      throw new PaletteError(`Cannot remove the default state from a palette: ${this.default_state}`);
    }
    if (!Number.isInteger(id) || id < 0 || id >= this.#states.length) {
      return PaletteUpgrader.identity;
    }

    let [removed] = this.#states.splice(id, 1);
    this.#ids.delete(removed.key);
    if (id === this.#states.length) {
      // Was the last id, nothing shifts
      return PaletteUpgrader.identity;
    }

    let upgrader = new PaletteUpgrader({ unchanged_below: id });
    for (let new_id of range(id, this.#states.length)) {
      this.#ids.set(this.#states[new_id].key, new_id);
      upgrader.register_change(new_id + 1, new_id);
    }
    return upgrader.lock();
  }

  /**
   * Adds every state of `other` that isn't in this palette yet. The upgrader
   * maps each of `other`'s ids to the id of the same state here.
   */
  add_all(other: BlockPalette): PaletteUpgrader {
    let upgrader = new PaletteUpgrader();
    other.#states.forEach((state, old_id) => {
      upgrader.register_change(old_id, this.get_or_add_state_id(state));
    });
    return upgrader.lock();
  }

  states(): ReadonlyArray<BlockState> {
    return this.#states;
  }

  [Symbol.iterator]() {
    return this.#states[Symbol.iterator]();
  }

  toString() {
    return `{${this.#states.map((state, id) => `${id}: ${state}`).join(", ")}}`;
  }
}
