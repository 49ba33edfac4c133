/**
 * Core constants for urn data structures
 */

export const MAX_URN_SIZE = 0xffffffff; // 2^32 - 1

// Weights are plain numbers restricted to the safe integer range
export const MAX_WEIGHT = Number.MAX_SAFE_INTEGER;
