/**
 * Tree Store Types
 *
 * Data structures exchanged between the tree store API and its clients.
 * Keys are either all numbers or all strings within one tree.
 */

// Kind of key a hosted tree orders
export type TreeKeyType = 'number' | 'string';

export type TreeKey = number | string;

// Direction for key listings
export type KeyOrder = 'asc' | 'desc';

/**
 * Summary of a hosted tree
 */
export interface TreeSummary {
  // Unique identifier assigned at creation
  id: string;
  // Optional human readable label
  label: string | null;
  keyType: TreeKeyType;
  // Number of keys stored
  size: number;
  // Height of the tree (0 when empty)
  height: number;
  // Key at the root, null when empty
  rootKey: TreeKey | null;
  // Creation timestamp (Unix milliseconds)
  createdAt: number;
}

/**
 * One node of a tree's shape, as rendered by the structure endpoint
 */
export interface TreeNodeView {
  key: TreeKey;
  height: number;
  // Left height minus right height, always within [-1, 1]
  balance: number;
  left: TreeNodeView | null;
  right: TreeNodeView | null;
}

/**
 * Result of checking a tree's structural invariants
 */
/**
 * Result of looking a key up, with the key as the tree stores it
 */
export interface KeyLookup {
  key: TreeKey;
  present: boolean;
}

export interface TreeVerification {
  valid: boolean;
  violations: { kind: string; message: string }[];
}

/**
 * Node budget shared by every hosted tree
 */
export interface MemoryStats {
  capacity: number;
  inUse: number;
  peak: number;
  allocations: number;
  deallocations: number;
  failures: number;
}
