export const NO_ENTRY = -1;

// HashMap sizing
export const DEFAULT_BUCKET_COUNT = 23;
export const LOAD_FACTOR_THRESHOLD = 0.4;
// Growth is size * RESIZE_MULTIPLE + RESIZE_INCREMENT. The increment keeps
// small maps from resizing again a few inserts later.
export const RESIZE_MULTIPLE = 3;
export const RESIZE_INCREMENT = 5;

// Entry arena starts at this many slots and doubles
export const INITIAL_ARENA_CAPACITY = 16;
export const ARENA_GROWTH_FACTOR = 2;

// Large enough that the expected atom population never triggers a resize
export const ATOM_REGISTRY_INITIAL_SIZE = 103;

// FNV-1a hash constants (string keys)
export const FNV_OFFSET_BASIS = 0x811c9dc5;
export const FNV_PRIME = 0x01000193;

// Hash multipliers for integer and boolean keys (golden-ratio derived)
export const HASH_GOLDEN_RATIO = 0x9e3779b9;
export const HASH_SECONDARY_PRIME = 0x517cc1b7;
