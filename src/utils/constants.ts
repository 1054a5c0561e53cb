// Sentinel for an empty sparse slot
export const ABSENT = -1;

// Sparse arrays and slot tables start here and double on demand
export const DEFAULT_INITIAL_CAPACITY = 64;
export const GROWTH_FACTOR = 2;

// Entity generation
export const INITIAL_GENERATION = 0;
