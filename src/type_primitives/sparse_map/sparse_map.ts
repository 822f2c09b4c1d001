/***
 *
 * SparseMap — O(1) integer-keyed map with dense value storage
 *
 * Keys are non-negative integers (entity indices). Two parallel dense
 * arrays (keys and values) give linear iteration over live entries; a
 * sparse Int32Array maps key → dense slot for O(1) get/set/delete.
 * Deletion swaps the last entry into the hole, so iteration order is
 * insertion order only until the first delete.
 *
 ***/

import { DEFAULT_INITIAL_CAPACITY, GROWTH_FACTOR } from "utils/constants";

const ABSENT = -1;

export class SparseMap<V> {
  private _dense_keys: number[] = [];
  private _dense_vals: V[] = [];
  private _sparse: Int32Array;
  private _capacity: number;

  constructor(initial_capacity = DEFAULT_INITIAL_CAPACITY) {
    this._capacity = initial_capacity > 0 ? initial_capacity : 1;
    this._sparse = new Int32Array(this._capacity).fill(ABSENT);
  }

  get size(): number {
    return this._dense_keys.length;
  }

  has(key: number): boolean {
    return key >= 0 && key < this._capacity && this._sparse[key] !== ABSENT;
  }

  get(key: number): V | undefined {
    if (!this.has(key)) return undefined;
    return this._dense_vals[this._sparse[key]];
  }

  /** Insert or overwrite an entry. O(1) amortised. */
  set(key: number, value: V): void {
    if (this.has(key)) {
      this._dense_vals[this._sparse[key]] = value;
      return;
    }
    this._ensure(key);
    this._sparse[key] = this._dense_keys.length;
    this._dense_keys.push(key);
    this._dense_vals.push(value);
  }

  /**
   * Remove an entry via swap-and-pop and return its value,
   * or undefined if the key was absent.
   */
  take(key: number): V | undefined {
    if (!this.has(key)) return undefined;
    const row = this._sparse[key];
    const value = this._dense_vals[row];
    const last = this._dense_keys.length - 1;
    const last_key = this._dense_keys[last];
    this._dense_keys[row] = last_key;
    this._dense_vals[row] = this._dense_vals[last];
    this._sparse[last_key] = row;
    this._dense_keys.pop();
    this._dense_vals.pop();
    this._sparse[key] = ABSENT;
    return value;
  }

  delete(key: number): boolean {
    if (!this.has(key)) return false;
    this.take(key);
    return true;
  }

  clear(): void {
    for (let i = 0; i < this._dense_keys.length; i++) {
      this._sparse[this._dense_keys[i]] = ABSENT;
    }
    this._dense_keys.length = 0;
    this._dense_vals.length = 0;
  }

  for_each(fn: (key: number, value: V) => void): void {
    const keys = this._dense_keys;
    const vals = this._dense_vals;
    for (let i = 0; i < keys.length; i++) {
      fn(keys[i], vals[i]);
    }
  }

  *[Symbol.iterator](): IterableIterator<[number, V]> {
    const keys = this._dense_keys;
    const vals = this._dense_vals;
    for (let i = 0; i < keys.length; i++) {
      yield [keys[i], vals[i]];
    }
  }

  //=========================================================
  // Internal
  //=========================================================

  private _ensure(key: number): void {
    if (key < this._capacity) return;
    let cap = this._capacity;
    while (cap <= key) cap *= GROWTH_FACTOR;
    const next = new Int32Array(cap).fill(ABSENT);
    next.set(this._sparse);
    this._sparse = next;
    this._capacity = cap;
  }
}
