import type { MemoryBlock } from './allocator.js';

/**
 * AVL tree node
 * Children are owned by their parent; the parent link is a plain back reference
 * kept in sync with the child links so the tree can be walked without recursion
 */
export interface AvlNode<T> {
  data: T;                       // The element stored at this node
  height: number;                // 1 for a leaf, absent children count as 0
  left: AvlNode<T> | null;       // Left child (smaller elements)
  right: AvlNode<T> | null;      // Right child (larger elements)
  parent: AvlNode<T> | null;     // Parent node, null for the root
  block: MemoryBlock;            // Allocator block backing this node
}

/**
 * Read-only view of a node handed out to callers
 */
export interface AvlNodeView<T> {
  readonly data: T;
  readonly height: number;
  readonly left: AvlNodeView<T> | null;
  readonly right: AvlNodeView<T> | null;
  readonly parent: AvlNodeView<T> | null;
}

export function heightOf<T>(node: AvlNode<T> | null): number {
  return node ? node.height : 0;
}

/**
 * Recomputes a node's height from its children
 */
export function setHeight<T>(node: AvlNode<T> | null): void {
  if (!node) return;
  const lh = heightOf(node.left);
  const rh = heightOf(node.right);
  node.height = (lh > rh ? lh : rh) + 1;
}

/**
 * Left height minus right height, 0 for an absent node
 */
export function balanceFactor<T>(node: AvlNode<T> | null): number {
  if (!node) return 0;
  return heightOf(node.left) - heightOf(node.right);
}

/**
 * Right rotation around `node`
 *
 *        node            pivot
 *        /  \            /   \
 *     pivot  C   =>     A    node
 *     /  \                   /  \
 *    A    B                 B    C
 *
 * The pivot inherits node's parent link; the caller relinks the returned
 * subtree root into that parent's child slot (or the tree root).
 * @returns The new subtree root, or `node` itself when it has no left child
 */
export function rotateRight<T>(node: AvlNode<T>): AvlNode<T> {
  const pivot = node.left;
  if (!pivot) return node;

  // Move pivot's right subtree under node
  node.left = pivot.right;
  if (pivot.right) {
    pivot.right.parent = node;
  }

  pivot.right = node;
  pivot.parent = node.parent;
  node.parent = pivot;

  // Child first, then the new subtree root
  setHeight(node);
  setHeight(pivot);
  return pivot;
}

/**
 * Left rotation around `node`, mirror of rotateRight
 * @returns The new subtree root, or `node` itself when it has no right child
 */
export function rotateLeft<T>(node: AvlNode<T>): AvlNode<T> {
  const pivot = node.right;
  if (!pivot) return node;

  node.right = pivot.left;
  if (pivot.left) {
    pivot.left.parent = node;
  }

  pivot.left = node;
  pivot.parent = node.parent;
  node.parent = pivot;

  setHeight(node);
  setHeight(pivot);
  return pivot;
}

/**
 * Kind of rotation applied by rebalance, null when the node was already balanced
 */
export type RotationCase = 'LL' | 'RR' | 'LR' | 'RL';

export interface RebalanceResult<T> {
  root: AvlNode<T>;
  rotation: RotationCase | null;
}

/**
 * Restores the AVL condition at `node`, whose height must be current
 * Children are assumed balanced already, which holds for every node on the
 * walk from a modification point up to the root.
 * @returns The root of the subtree after rotation and the case applied
 */
export function rebalance<T>(node: AvlNode<T>): RebalanceResult<T> {
  const balance = balanceFactor(node);

  if (balance > 1) {
    const left = node.left;
    if (left && balanceFactor(left) < 0) {
      node.left = rotateLeft(left);
      return { root: rotateRight(node), rotation: 'LR' };
    }
    return { root: rotateRight(node), rotation: 'LL' };
  }

  if (balance < -1) {
    const right = node.right;
    if (right && balanceFactor(right) > 0) {
      node.right = rotateRight(right);
      return { root: rotateLeft(node), rotation: 'RL' };
    }
    return { root: rotateLeft(node), rotation: 'RR' };
  }

  return { root: node, rotation: null };
}
