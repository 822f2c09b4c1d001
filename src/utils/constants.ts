// Bit-manipulation constants for iterating BitSet words (32-bit integers)
export const BITS_PER_WORD_SHIFT = 5; // log2(32)
export const BITS_PER_WORD_MASK = 31; // 32 - 1
export const BITS_PER_WORD = 32;

// Entity ID layout: generation * 2^32 + index, exact while below 2^53
export const INDEX_BITS = 32;
export const GENERATION_BITS = 21;
export const INITIAL_GENERATION = 0;

// Default pre-sizing for entity slots and table sparse arrays
// (user can override via WorldOptions.initial_capacity)
export const DEFAULT_INITIAL_CAPACITY = 64;
export const GROWTH_FACTOR = 2;

export const DEFAULT_WORLD_NAME = "world";
export const DEFAULT_LOG_LEVEL = "warn";
