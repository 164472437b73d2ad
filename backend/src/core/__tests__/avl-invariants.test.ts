import { describe, it, expect } from 'vitest';
import { collectViolations } from '../avl-invariants.js';
import { setHeight, type AvlNode } from '../avl-node.js';

const numeric = (a: number, b: number): number => a - b;

function node(data: number, left: AvlNode<number> | null = null, right: AvlNode<number> | null = null): AvlNode<number> {
  const made: AvlNode<number> = { data, height: 1, left, right, parent: null, block: { size: 1 } };
  if (left) left.parent = made;
  if (right) right.parent = made;
  setHeight(made);
  return made;
}

describe('collectViolations', () => {
  it('should accept an empty tree', () => {
    expect(collectViolations(null, numeric, 0)).toEqual([]);
  });

  it('should accept a sound tree', () => {
    const root = node(20, node(10, node(5)), node(30));
    expect(collectViolations(root, numeric, 4)).toEqual([]);
  });

  it('should report a size mismatch', () => {
    const root = node(20, node(10), node(30));
    expect(collectViolations(root, numeric, 4)).toEqual([
      { kind: 'size', message: 'size is 4 but 3 nodes are reachable' }
    ]);
  });

  it('should report an unbalanced node', () => {
    const root = node(30, node(20, node(10)));
    expect(collectViolations(root, numeric, 3)).toEqual([
      { kind: 'balance', message: 'node 30 has balance factor 2' }
    ]);
  });

  it('should report a stale height', () => {
    const root = node(20, node(10), node(30));
    root.height = 5;
    expect(collectViolations(root, numeric, 3)).toEqual([
      { kind: 'height', message: 'node 20 stores height 5, expected 2' }
    ]);
  });

  it('should report a broken parent link', () => {
    const left = node(10);
    const root = node(20, left, node(30));
    left.parent = null;
    expect(collectViolations(root, numeric, 3)).toEqual([
      { kind: 'parent', message: 'node 10 does not link back to parent 20' }
    ]);
  });

  it('should report elements out of order', () => {
    const root = node(20, node(25), node(30));
    expect(collectViolations(root, numeric, 3)).toEqual([
      { kind: 'order', message: '25 is not less than its in-order successor 20' }
    ]);
  });

  it('should report a root with a parent', () => {
    const root = node(20);
    const outer = node(40, root);
    expect(outer.left).toBe(root);
    expect(collectViolations(root, numeric, 1)).toEqual([
      { kind: 'parent', message: 'root 20 has a parent link' }
    ]);
  });
});
