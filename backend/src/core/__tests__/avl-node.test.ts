import { describe, it, expect } from 'vitest';
import {
  balanceFactor,
  heightOf,
  rebalance,
  rotateLeft,
  rotateRight,
  setHeight,
  type AvlNode
} from '../avl-node.js';

// Builds a node over already-built children, fixing their parent links and its height
function node(data: number, left: AvlNode<number> | null = null, right: AvlNode<number> | null = null): AvlNode<number> {
  const made: AvlNode<number> = { data, height: 1, left, right, parent: null, block: { size: 1 } };
  if (left) left.parent = made;
  if (right) right.parent = made;
  setHeight(made);
  return made;
}

describe('AVL node bookkeeping', () => {
  describe('Heights and balance', () => {
    it('should treat an absent node as height 0 and balance 0', () => {
      expect(heightOf(null)).toBe(0);
      expect(balanceFactor(null)).toBe(0);
      expect(() => setHeight(null)).not.toThrow();
    });

    it('should give a leaf height 1', () => {
      const leaf = node(1);
      expect(heightOf(leaf)).toBe(1);
      expect(balanceFactor(leaf)).toBe(0);
    });

    it('should recompute height from the taller child', () => {
      const root = node(10, node(5, node(2)), node(15));
      expect(root.height).toBe(3);
      expect(balanceFactor(root)).toBe(1);

      root.left = null;
      setHeight(root);
      expect(root.height).toBe(2);
      expect(balanceFactor(root)).toBe(-1);
    });
  });

  describe('Rotations', () => {
    it('should rotate right and move the pivot right subtree across', () => {
      const a = node(10);
      const b = node(25);
      const c = node(40);
      const pivot = node(20, a, b);
      const top = node(30, pivot, c);

      const result = rotateRight(top);

      expect(result).toBe(pivot);
      expect(pivot.parent).toBeNull();
      expect(pivot.left).toBe(a);
      expect(pivot.right).toBe(top);
      expect(top.parent).toBe(pivot);
      expect(top.left).toBe(b);
      expect(b.parent).toBe(top);
      expect(top.right).toBe(c);
      expect(top.height).toBe(2);
      expect(pivot.height).toBe(3);
    });

    it('should rotate left as the mirror image', () => {
      const a = node(10);
      const b = node(25);
      const c = node(40);
      const pivot = node(30, b, c);
      const top = node(20, a, pivot);

      const result = rotateLeft(top);

      expect(result).toBe(pivot);
      expect(pivot.left).toBe(top);
      expect(pivot.right).toBe(c);
      expect(top.right).toBe(b);
      expect(b.parent).toBe(top);
      expect(top.parent).toBe(pivot);
      expect(top.height).toBe(2);
      expect(pivot.height).toBe(3);
    });

    it('should hand the old parent link to the pivot without touching the parent', () => {
      const inner = node(20, node(10));
      const top = node(30, inner);
      const anchor = node(50, top, node(60));

      const result = rotateRight(top);

      expect(result).toBe(inner);
      expect(inner.parent).toBe(anchor);
      expect(anchor.left).toBe(top); // relinking is the caller's job
    });

    it('should leave a node without the needed child unchanged', () => {
      const lone = node(1, null, node(2));
      expect(rotateRight(lone)).toBe(lone);
      const other = node(2, node(1));
      expect(rotateLeft(other)).toBe(other);
    });
  });

  describe('Rebalance', () => {
    it('should apply a single right rotation for the left-left case', () => {
      const result = rebalance(node(30, node(20, node(10))));
      expect(result.rotation).toBe('LL');
      expect(result.root.data).toBe(20);
      expect(result.root.left?.data).toBe(10);
      expect(result.root.right?.data).toBe(30);
      expect(result.root.height).toBe(2);
    });

    it('should apply a single left rotation for the right-right case', () => {
      const result = rebalance(node(10, null, node(20, null, node(30))));
      expect(result.rotation).toBe('RR');
      expect(result.root.data).toBe(20);
      expect(result.root.left?.data).toBe(10);
      expect(result.root.right?.data).toBe(30);
    });

    it('should rotate the left child first for the left-right case', () => {
      const top = node(30, node(10, null, node(20)));
      const result = rebalance(top);
      expect(result.rotation).toBe('LR');
      expect(result.root.data).toBe(20);
      expect(result.root.left?.data).toBe(10);
      expect(result.root.right).toBe(top);
      expect(result.root.left?.parent).toBe(result.root);
      expect(top.parent).toBe(result.root);
      expect(top.height).toBe(1);
    });

    it('should rotate the right child first for the right-left case', () => {
      const top = node(10, null, node(30, node(20)));
      const result = rebalance(top);
      expect(result.rotation).toBe('RL');
      expect(result.root.data).toBe(20);
      expect(result.root.left).toBe(top);
      expect(result.root.right?.data).toBe(30);
      expect(result.root.height).toBe(2);
    });

    it('should use a single rotation when the heavy child is balanced', () => {
      // Only reachable after a deletion on the light side
      const result = rebalance(node(50, node(30, node(20), node(40)), null));
      expect(result.rotation).toBe('LL');
      expect(result.root.data).toBe(30);
      expect(result.root.right?.data).toBe(50);
      expect(result.root.right?.left?.data).toBe(40);
      expect(result.root.height).toBe(3);
    });

    it('should return a balanced node unchanged', () => {
      const balanced = node(20, node(10), null);
      const result = rebalance(balanced);
      expect(result.rotation).toBeNull();
      expect(result.root).toBe(balanced);
    });
  });
});
