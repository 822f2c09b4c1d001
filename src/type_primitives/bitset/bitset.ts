/***
 * BitSet — number[]-backed bit set with auto-grow.
 *
 * Backs the entity liveness set: bit N is set while the entity with
 * index N is alive. has/set/clear are O(1); the set only ever grows.
 *
 * Bit layout within each 32-bit word:
 *   word_index = bit >>> 5       (divide by 32)
 *   bit_offset = bit & 31        (mod 32)
 *   test:  word & (1 << offset)
 *   set:   word |= (1 << offset)
 *   clear: word &= ~(1 << offset)
 *
 ***/

import { BITS_PER_WORD, BITS_PER_WORD_MASK, BITS_PER_WORD_SHIFT } from "utils/constants";

const INITIAL_WORD_COUNT = 4; // 128 indices before first grow

export class BitSet {
  private _words: number[];

  constructor(initial_bits?: number) {
    const words =
      initial_bits !== undefined && initial_bits > 0
        ? Math.ceil(initial_bits / BITS_PER_WORD)
        : INITIAL_WORD_COUNT;
    this._words = new Array(words).fill(0);
  }

  /** Number of bits addressable without growing. */
  get capacity(): number {
    return this._words.length * BITS_PER_WORD;
  }

  has(bit: number): boolean {
    const word_index = bit >>> BITS_PER_WORD_SHIFT;
    if (word_index >= this._words.length) return false;
    return (this._words[word_index] & (1 << (bit & BITS_PER_WORD_MASK))) !== 0;
  }

  set(bit: number): void {
    const word_index = bit >>> BITS_PER_WORD_SHIFT;
    if (word_index >= this._words.length) this.grow(word_index + 1);
    this._words[word_index] |= 1 << (bit & BITS_PER_WORD_MASK);
  }

  clear(bit: number): void {
    const word_index = bit >>> BITS_PER_WORD_SHIFT;
    if (word_index >= this._words.length) return;
    this._words[word_index] &= ~(1 << (bit & BITS_PER_WORD_MASK));
  }

  /** Unset every bit. Capacity is kept. */
  clear_all(): void {
    this._words.fill(0);
  }

  /** Number of set bits (popcount over all words). */
  count(): number {
    const words = this._words;
    let total = 0;
    for (let i = 0; i < words.length; i++) {
      let word = words[i];
      while (word !== 0) {
        word &= word - 1;
        total++;
      }
    }
    return total;
  }

  /** Iterate all set bits in ascending order via lowest-set-bit extraction. */
  for_each(fn: (bit: number) => void): void {
    const words = this._words;
    for (let i = 0; i < words.length; i++) {
      let word = words[i];
      if (word === 0) continue;
      const base = i * BITS_PER_WORD;
      while (word !== 0) {
        // Isolate lowest set bit: e.g. 0b1010 → 0b0010
        // (-word >>> 0) converts to unsigned to handle the sign bit correctly
        const t = word & (-word >>> 0);
        // clz32(0b0010) = 30 → bit = 31 - 30 = 1
        const bit_pos = 31 - Math.clz32(t);
        fn(base + bit_pos);
        word ^= t;
      }
    }
  }

  private grow(min_words: number): void {
    let cap = this._words.length > 0 ? this._words.length : 1;
    while (cap < min_words) cap *= 2;
    const next = new Array(cap).fill(0);
    for (let i = 0; i < this._words.length; i++) next[i] = this._words[i];
    this._words = next;
  }
}
