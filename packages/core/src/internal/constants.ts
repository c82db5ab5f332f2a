/**
 * Core constants for flatgrove buffers
 */

// Initial number of record slots reserved by an empty store
export const INITIAL_CAPACITY = 16;

// Capacity multiplier applied when the size column runs out of room
export const GROWTH_FACTOR = 2;

// Subtree sizes live in a Uint32Array
export const MAX_SUBTREE_SIZE = 0xffffffff;

// Tag carried by branch literals so they can never be mistaken for a value
export const BRANCH = Symbol('BRANCH');
