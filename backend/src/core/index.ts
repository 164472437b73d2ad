export { AvlTree, noopDestroy } from './avl-tree.js';
export type {
  AvlTreeOptions,
  Comparator,
  ConstructResult,
  Destructor,
  ElementConstructor,
  ElementCopier
} from './avl-tree.js';
export { AvlTreeError, AvlTreeStatus, describeStatus } from './avl-errors.js';
export { BoundedAllocator, heapAllocator, NODE_SIZE } from './allocator.js';
export type { Allocator, AllocatorStats, MemoryBlock } from './allocator.js';
export { balanceFactor, heightOf, rebalance, rotateLeft, rotateRight, setHeight } from './avl-node.js';
export type { AvlNode, AvlNodeView, RebalanceResult, RotationCase } from './avl-node.js';
export { collectViolations } from './avl-invariants.js';
export type { AvlViolation, AvlViolationKind } from './avl-invariants.js';
