export type {
  TreeKeyType,
  TreeKey,
  KeyOrder,
  KeyLookup,
  TreeSummary,
  TreeNodeView,
  TreeVerification,
  MemoryStats
} from './types/tree.js';
