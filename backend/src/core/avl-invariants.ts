import type { AvlNodeView } from './avl-node.js';

export type AvlViolationKind = 'order' | 'balance' | 'height' | 'parent' | 'size';

export interface AvlViolation {
  kind: AvlViolationKind;
  message: string;
}

interface Frame<T> {
  node: AvlNodeView<T>;
  parent: AvlNodeView<T> | null;
}

/**
 * Checks the structural invariants of an AVL tree rooted at `root`
 *
 * Nodes are visited with an explicit stack and heights are checked against
 * recomputed values bottom-up, so arbitrarily deep (even unbalanced) input is
 * handled without recursion.
 * @param root - Root of the tree, null when empty
 * @param compare - The tree's comparator
 * @param expectedSize - The size the tree reports
 * @returns Every violation found, empty when the tree is sound
 */
export function collectViolations<T>(
  root: AvlNodeView<T> | null,
  compare: (a: T, b: T) => number,
  expectedSize: number
): AvlViolation[] {
  const violations: AvlViolation[] = [];

  if (root && root.parent !== null) {
    violations.push({ kind: 'parent', message: `root ${String(root.data)} has a parent link` });
  }

  // Pre-order collection with parent checks
  const order: AvlNodeView<T>[] = [];
  const stack: Frame<T>[] = root ? [{ node: root, parent: null }] : [];
  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const { node, parent } = frame;
    order.push(node);

    if (parent && node.parent !== parent) {
      violations.push({
        kind: 'parent',
        message: `node ${String(node.data)} does not link back to parent ${String(parent.data)}`
      });
    }
    if (node.right) stack.push({ node: node.right, parent: node });
    if (node.left) stack.push({ node: node.left, parent: node });
  }

  if (order.length !== expectedSize) {
    violations.push({
      kind: 'size',
      message: `size is ${expectedSize} but ${order.length} nodes are reachable`
    });
  }

  // Reverse pre-order visits children before parents
  const computed = new Map<AvlNodeView<T>, number>();
  for (let i = order.length - 1; i >= 0; i--) {
    const node = order[i];
    if (!node) continue;
    const lh = node.left ? computed.get(node.left) ?? 0 : 0;
    const rh = node.right ? computed.get(node.right) ?? 0 : 0;
    const height = Math.max(lh, rh) + 1;
    computed.set(node, height);

    if (node.height !== height) {
      violations.push({
        kind: 'height',
        message: `node ${String(node.data)} stores height ${node.height}, expected ${height}`
      });
    }
    if (Math.abs(lh - rh) > 1) {
      violations.push({
        kind: 'balance',
        message: `node ${String(node.data)} has balance factor ${lh - rh}`
      });
    }
  }

  // In-order walk must be strictly increasing
  const inOrder: AvlNodeView<T>[] = [];
  const pending: AvlNodeView<T>[] = [];
  let current: AvlNodeView<T> | null = root;
  while (current || pending.length > 0) {
    while (current) {
      pending.push(current);
      current = current.left;
    }
    const next = pending.pop();
    if (!next) break;
    inOrder.push(next);
    current = next.right;
  }
  for (let i = 1; i < inOrder.length; i++) {
    const prev = inOrder[i - 1];
    const cur = inOrder[i];
    if (prev && cur && compare(prev.data, cur.data) >= 0) {
      violations.push({
        kind: 'order',
        message: `${String(prev.data)} is not less than its in-order successor ${String(cur.data)}`
      });
    }
  }

  return violations;
}
