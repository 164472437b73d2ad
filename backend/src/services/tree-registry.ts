import type { FastifyBaseLogger } from 'fastify';
import { nanoid } from 'nanoid';
import type {
  KeyLookup,
  KeyOrder,
  MemoryStats,
  TreeKey,
  TreeKeyType,
  TreeNodeView,
  TreeSummary,
  TreeVerification
} from '@avl-arbor/shared';
import { BoundedAllocator } from '../core/allocator.js';
import { AvlTreeError, AvlTreeStatus, describeStatus } from '../core/avl-errors.js';
import type { AvlNodeView } from '../core/avl-node.js';
import { AvlTree } from '../core/avl-tree.js';

export type TreeRegistryErrorCode =
  | 'TREE_NOT_FOUND'
  | 'INVALID_KEY'
  | 'DUPLICATE_KEY'
  | 'ALLOCATION_FAILED'
  | 'TREE_INVALID';

/**
 * Error raised by registry operations, mapped to HTTP statuses by the routes
 */
export class TreeRegistryError extends Error {
  readonly code: TreeRegistryErrorCode;

  constructor(code: TreeRegistryErrorCode, message: string) {
    super(message);
    this.name = 'TreeRegistryError';
    this.code = code;
  }
}

interface HostedTree {
  id: string;
  label: string | null;
  keyType: TreeKeyType;
  tree: AvlTree<TreeKey>;
  createdAt: number;
}

export interface TreeRegistryOptions {
  nodeLimit: number;   // Node budget shared by every hosted tree
  strict?: boolean;    // Run hosted trees in strict mode
  logger?: FastifyBaseLogger;
}

/**
 * Orders keys of one tree; numbers before strings keeps the order total
 * should a mixed pair ever reach it
 */
export function compareTreeKeys(a: TreeKey, b: TreeKey): number {
  if (typeof a === 'number' && typeof b === 'number') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  return typeof a === 'number' ? -1 : 1;
}

// Plain decimal notation only: no hex, exponents or surrounding whitespace
const DECIMAL_KEY = /^-?\d+(\.\d+)?$/;

/**
 * Converts a raw key (request body or URL segment) to the tree's key type
 * @throws TreeRegistryError INVALID_KEY when it cannot be represented
 */
export function parseTreeKey(keyType: TreeKeyType, raw: unknown): TreeKey {
  if (keyType === 'number') {
    const value = typeof raw === 'number' ? raw : typeof raw === 'string' && DECIMAL_KEY.test(raw) ? Number(raw) : NaN;
    if (!Number.isFinite(value)) {
      throw new TreeRegistryError('INVALID_KEY', `Key ${String(raw)} is not a finite number`);
    }
    return value;
  }

  if (typeof raw !== 'string' && typeof raw !== 'number') {
    throw new TreeRegistryError('INVALID_KEY', 'Key must be a string');
  }
  return String(raw);
}

/**
 * Hosts named AVL trees that share one bounded node allocator
 *
 * Each tree orders keys of a single type. Tree operations report status codes;
 * the registry turns the failing ones into TreeRegistryError so callers get a
 * uniform error shape whether or not the trees run in strict mode.
 */
export class TreeRegistry {
  private readonly trees = new Map<string, HostedTree>();
  private readonly allocator: BoundedAllocator;
  private readonly strict: boolean;
  private readonly logger: FastifyBaseLogger | undefined;

  constructor(options: TreeRegistryOptions) {
    this.allocator = new BoundedAllocator(options.nodeLimit);
    this.strict = options.strict ?? false;
    this.logger = options.logger;
  }

  createTree(keyType: TreeKeyType, label?: string): TreeSummary {
    const hosted: HostedTree = {
      id: nanoid(),
      label: label ?? null,
      keyType,
      tree: this.newTree(),
      createdAt: Date.now()
    };
    this.trees.set(hosted.id, hosted);
    this.logger?.info(`Created ${keyType} tree ${hosted.id}`);
    return this.summarize(hosted);
  }

  listTrees(): TreeSummary[] {
    return Array.from(this.trees.values(), hosted => this.summarize(hosted));
  }

  getSummary(id: string): TreeSummary {
    return this.summarize(this.get(id));
  }

  /**
   * @throws TreeRegistryError DUPLICATE_KEY, ALLOCATION_FAILED, INVALID_KEY or TREE_NOT_FOUND
   */
  insertKey(id: string, raw: unknown): TreeSummary {
    const hosted = this.get(id);
    const key = parseTreeKey(hosted.keyType, raw);
    const status = this.run(() => hosted.tree.insert(key));

    if (status === AvlTreeStatus.ERR_DUPLICATE) {
      throw new TreeRegistryError('DUPLICATE_KEY', `Key ${key} already exists in tree ${id}`);
    }
    this.raise(status, id);
    this.logger?.debug(`Inserted ${key} into tree ${id}`);
    return this.summarize(hosted);
  }

  /**
   * Removes a key; removing a missing key succeeds
   * @returns Whether the key was present
   */
  removeKey(id: string, raw: unknown): boolean {
    const hosted = this.get(id);
    const key = parseTreeKey(hosted.keyType, raw);
    const present = hosted.tree.has(key);
    this.raise(this.run(() => hosted.tree.remove(key)), id);
    if (present) {
      this.logger?.debug(`Removed ${key} from tree ${id}`);
    }
    return present;
  }

  /**
   * @returns The parsed key and whether the tree holds it
   */
  lookupKey(id: string, raw: unknown): KeyLookup {
    const hosted = this.get(id);
    const key = parseTreeKey(hosted.keyType, raw);
    return { key, present: hosted.tree.has(key) };
  }

  listKeys(id: string, order: KeyOrder = 'asc'): TreeKey[] {
    const tree = this.get(id).tree;
    return Array.from(order === 'asc' ? tree.inOrderTraversal() : tree.reverseOrderTraversal());
  }

  getStructure(id: string): TreeNodeView | null {
    return toView(this.get(id).tree.root);
  }

  verifyTree(id: string): TreeVerification {
    const violations = this.get(id).tree.verify();
    return { valid: violations.length === 0, violations };
  }

  /**
   * @returns Number of keys released
   */
  clearTree(id: string): number {
    const released = this.get(id).tree.clear();
    this.logger?.info(`Cleared tree ${id} (${released} keys)`);
    return released;
  }

  /**
   * Copies a tree under a new id
   * @throws TreeRegistryError ALLOCATION_FAILED when the node budget cannot hold the copy
   */
  cloneTree(id: string): TreeSummary {
    const source = this.get(id);
    const copy = this.run(() => source.tree.clone());
    if (!(copy instanceof AvlTree)) {
      this.raise(source.tree.lastStatus, id);
      throw new TreeRegistryError('TREE_INVALID', `Tree ${id} could not be cloned`);
    }

    const hosted: HostedTree = {
      id: nanoid(),
      label: source.label,
      keyType: source.keyType,
      tree: copy,
      createdAt: Date.now()
    };
    this.trees.set(hosted.id, hosted);
    this.logger?.info(`Cloned tree ${id} into ${hosted.id}`);
    return this.summarize(hosted);
  }

  /**
   * Releases a tree's nodes and forgets it
   * @returns Number of keys released
   */
  dropTree(id: string): number {
    const hosted = this.get(id);
    const released = hosted.tree.deinit();
    this.trees.delete(id);
    this.logger?.info(`Dropped tree ${id} (${released} keys)`);
    return released;
  }

  getMemoryStats(): MemoryStats {
    return this.allocator.getStats();
  }

  /**
   * Releases every hosted tree
   */
  shutdown(): void {
    for (const id of Array.from(this.trees.keys())) {
      this.dropTree(id);
    }
  }

  private newTree(): AvlTree<TreeKey> {
    return new AvlTree<TreeKey>({
      compare: compareTreeKeys,
      allocator: this.allocator,
      strict: this.strict,
      logger: this.logger
    });
  }

  private get(id: string): HostedTree {
    const hosted = this.trees.get(id);
    if (!hosted) {
      throw new TreeRegistryError('TREE_NOT_FOUND', `Tree ${id} not found`);
    }
    return hosted;
  }

  /**
   * Runs a tree operation, folding strict-mode exceptions back into a status
   */
  private run<R>(operation: () => R): R | AvlTreeStatus {
    try {
      return operation();
    } catch (error) {
      if (error instanceof AvlTreeError) return error.status;
      throw error;
    }
  }

  /**
   * Turns a violation status into a TreeRegistryError
   */
  private raise(status: AvlTreeStatus, id: string): void {
    if (status === AvlTreeStatus.ERR_ALLOC) {
      throw new TreeRegistryError('ALLOCATION_FAILED', `Tree ${id}: ${describeStatus(AvlTreeStatus.ERR_ALLOC)}`);
    }
    if (status === AvlTreeStatus.ERR_NULL) {
      throw new TreeRegistryError('TREE_INVALID', `Tree ${id}: ${describeStatus(AvlTreeStatus.ERR_NULL)}`);
    }
  }

  private summarize(hosted: HostedTree): TreeSummary {
    const root = hosted.tree.root;
    return {
      id: hosted.id,
      label: hosted.label,
      keyType: hosted.keyType,
      size: hosted.tree.getSize(),
      height: hosted.tree.getHeight(),
      rootKey: root ? root.data : null,
      createdAt: hosted.createdAt
    };
  }
}

/**
 * Copies a tree's shape into plain objects for rendering
 */
function toView(node: AvlNodeView<TreeKey> | null): TreeNodeView | null {
  if (!node) return null;
  const left = toView(node.left);
  const right = toView(node.right);
  return {
    key: node.data,
    height: node.height,
    balance: (left ? left.height : 0) - (right ? right.height : 0),
    left,
    right
  };
}
