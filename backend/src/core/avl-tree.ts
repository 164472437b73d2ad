import type { FastifyBaseLogger } from 'fastify';
import { heapAllocator, NODE_SIZE, type Allocator, type MemoryBlock } from './allocator.js';
import { AvlTreeError, AvlTreeStatus } from './avl-errors.js';
import { collectViolations, type AvlViolation } from './avl-invariants.js';
import { rebalance, setHeight, type AvlNode, type AvlNodeView } from './avl-node.js';

/**
 * Orders two elements: negative if a < b, zero if equal, positive if a > b
 * Must define a strict total order for the tree's whole life
 */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * Releases whatever an element owns
 * Called exactly once per stored element, on removal and on teardown
 */
export type Destructor<T> = (value: T, allocator: Allocator) => void;

/**
 * Outcome of an emplace constructor
 */
export type ConstructResult<T> = { ok: true; value: T } | { ok: false };

/**
 * Builds an element in place for emplace, before its sort key is known
 */
export type ElementConstructor<T, A> = (args: A, allocator: Allocator) => ConstructResult<T>;

/**
 * Produces the element stored in a cloned tree
 */
export type ElementCopier<T> = (value: T, allocator: Allocator) => T;

export interface AvlTreeOptions<T> {
  compare: Comparator<T>;
  allocator?: Allocator;        // Defaults to heapAllocator
  destroy?: Destructor<T>;      // Defaults to a no-op
  strict?: boolean;             // Throw AvlTreeError on ERR_NULL / ERR_ALLOC instead of returning it
  logger?: FastifyBaseLogger;
}

/**
 * Destructor for elements that own nothing
 */
export const noopDestroy = (): void => {};

const identityCopy = <T>(value: T): T => value;

/**
 * Where a value belongs: the last node visited, the last comparison, and the equal node if any
 */
interface Slot<T> {
  parent: AvlNode<T> | null;
  cmp: number;
  match: AvlNode<T> | null;
}

/**
 * Self-balancing (AVL) binary search tree over unique elements
 *
 * Every node keeps |height(left) - height(right)| <= 1, so search, insert and
 * remove walk O(log n) nodes. Node blocks come from the configured allocator and
 * every failure leaves the tree exactly as it was before the call.
 *
 * Properties kept between public operations:
 * - In-order traversal is strictly increasing under the comparator
 * - Stored heights match the children and no node is out of balance
 * - Parent links mirror child links
 * - getSize() equals the number of reachable nodes
 */
export class AvlTree<T> {
  private rootNode: AvlNode<T> | null = null;
  private size = 0;
  private allocator: Allocator | null;
  private compareFn: Comparator<T> | null;
  private readonly destroyFn: Destructor<T>;
  private readonly strict: boolean;
  private readonly logger: FastifyBaseLogger | undefined;
  private status: AvlTreeStatus = AvlTreeStatus.OK;

  /**
   * Creates an empty tree; nothing is allocated until the first insertion
   */
  constructor(options: AvlTreeOptions<T>) {
    this.compareFn = options.compare;
    this.allocator = options.allocator ?? heapAllocator;
    this.destroyFn = options.destroy ?? noopDestroy;
    this.strict = options.strict ?? false;
    this.logger = options.logger;
  }

  /**
   * Inserts a unique element
   * Time complexity: O(log n)
   * @returns OK, ERR_DUPLICATE when an equal element exists (the value is left
   *          to the caller), ERR_ALLOC when no node could be allocated, or
   *          ERR_NULL once the tree has been deinitialized
   */
  insert(value: T): AvlTreeStatus {
    const allocator = this.allocator;
    const compare = this.compareFn;
    if (!allocator || !compare) {
      return this.fail(AvlTreeStatus.ERR_NULL, 'insert');
    }

    const slot = this.locate(value, compare);
    if (slot.match) {
      return this.record(AvlTreeStatus.ERR_DUPLICATE);
    }

    const block = allocator.allocate(NODE_SIZE);
    if (!block) {
      return this.fail(AvlTreeStatus.ERR_ALLOC, 'insert');
    }

    this.attach(value, block, slot.parent, slot.cmp);
    return this.record(AvlTreeStatus.OK);
  }

  /**
   * Removes the element equal to `value`; removing a missing element is a no-op
   * Time complexity: O(log n)
   * @returns OK, or ERR_NULL once the tree has been deinitialized
   */
  remove(value: T): AvlTreeStatus {
    const allocator = this.allocator;
    const compare = this.compareFn;
    if (!allocator || !compare) {
      return this.fail(AvlTreeStatus.ERR_NULL, 'remove');
    }

    const node = this.findNode(value, compare);
    if (!node) {
      return this.record(AvlTreeStatus.OK);
    }

    // With two children, trade values with the in-order successor and unlink
    // the successor instead; it never has a left child.
    let detached = node;
    if (node.left && node.right) {
      let successor = node.right;
      while (successor.left) {
        successor = successor.left;
      }
      const data = node.data;
      node.data = successor.data;
      successor.data = data;
      detached = successor;
    }

    const parent = detached.parent;
    this.replaceChild(parent, detached, detached.left ?? detached.right);
    this.release(detached, allocator);

    this.rebalanceFrom(parent);
    this.size--;
    return this.record(AvlTreeStatus.OK);
  }

  /**
   * Constructs an element inside a freshly allocated node and inserts it
   *
   * The node is allocated before `construct` runs because the element's sort
   * key only exists once it is built; the constructor therefore runs even when
   * the element turns out to be a duplicate. A duplicate is destroyed again, a
   * failed construction is not.
   * @returns The stored element, or null (see lastStatus for the reason)
   */
  emplace<A>(construct: ElementConstructor<T, A> | null | undefined, args: A): T | null {
    const allocator = this.allocator;
    const compare = this.compareFn;
    if (!allocator || !compare || !construct) {
      this.fail(AvlTreeStatus.ERR_NULL, 'emplace');
      return null;
    }

    const block = allocator.allocate(NODE_SIZE);
    if (!block) {
      this.fail(AvlTreeStatus.ERR_ALLOC, 'emplace');
      return null;
    }

    let built: ConstructResult<T>;
    try {
      built = construct(args, allocator);
    } catch (error) {
      allocator.deallocate(block);
      throw error;
    }
    if (!built.ok) {
      allocator.deallocate(block);
      this.record(AvlTreeStatus.ERR_CONSTRUCT);
      return null;
    }

    const value = built.value;
    let slot: Slot<T>;
    try {
      slot = this.locate(value, compare);
    } catch (error) {
      // Comparator threw; release the element built above
      this.destroyFn(value, allocator);
      allocator.deallocate(block);
      throw error;
    }
    if (slot.match) {
      this.destroyFn(value, allocator);
      allocator.deallocate(block);
      this.record(AvlTreeStatus.ERR_DUPLICATE);
      return null;
    }

    const node = this.attach(value, block, slot.parent, slot.cmp);
    this.record(AvlTreeStatus.OK);
    return node.data;
  }

  /**
   * Releases every node; the tree stays usable
   * @returns Number of nodes released
   */
  clear(): number {
    const released = this.teardown();
    this.rootNode = null;
    this.size = 0;
    return released;
  }

  /**
   * Releases every node and invalidates the tree
   * Further insert/remove/emplace/clone calls report ERR_NULL. Calling it again is a no-op.
   * @returns Number of nodes released
   */
  deinit(): number {
    const released = this.clear();
    this.allocator = null;
    this.compareFn = null;
    return released;
  }

  /**
   * Deep copy with the same shape, allocator, comparator and destructor
   *
   * Walks the source in pre-order with the same parent-link state machine as
   * teardown. The copy has identical heights, so no rebalancing happens.
   *
   * Both trees run the destructor on their own elements, so a tree with a
   * destructor needs a copier; sharing elements would destroy them twice.
   * @param copy - Produces each copied element; identity is only allowed when
   *               the tree has no destructor
   * @returns The copy, or null on ERR_ALLOC (partial copy released) or ERR_NULL
   *          (tree deinitialized, or a copier required but missing)
   */
  clone(copy?: ElementCopier<T>): AvlTree<T> | null {
    const allocator = this.allocator;
    const compare = this.compareFn;
    if (!allocator || !compare || (!copy && this.destroyFn !== noopDestroy)) {
      this.fail(AvlTreeStatus.ERR_NULL, 'clone');
      return null;
    }
    const copyValue = copy ?? identityCopy;

    const target = new AvlTree<T>({
      compare,
      allocator,
      destroy: this.destroyFn,
      strict: this.strict,
      logger: this.logger
    });

    let node = this.rootNode;
    let last: AvlNode<T> | null = null;
    let mirror: AvlNode<T> | null = null;
    let copied = 0;

    while (node) {
      const parent: AvlNode<T> | null = node.parent;

      if (last === parent) {
        const block = allocator.allocate(NODE_SIZE);
        if (!block) {
          target.size = copied;
          target.clear();
          this.fail(AvlTreeStatus.ERR_ALLOC, 'clone');
          return null;
        }

        let data: T;
        try {
          data = copyValue(node.data, allocator);
        } catch (error) {
          allocator.deallocate(block);
          target.size = copied;
          target.clear();
          throw error;
        }

        const made: AvlNode<T> = {
          data,
          height: node.height,
          left: null,
          right: null,
          parent: mirror,
          block
        };
        if (!mirror) {
          target.rootNode = made;
        } else if (parent && parent.left === node) {
          mirror.left = made;
        } else {
          mirror.right = made;
        }
        copied++;
        mirror = made;

        if (node.left) {
          last = node;
          node = node.left;
          continue;
        }
        if (node.right) {
          last = node;
          node = node.right;
          continue;
        }
        last = node;
        node = parent;
        mirror = mirror.parent;
      } else if (last === node.left && node.right) {
        last = node;
        node = node.right;
      } else {
        last = node;
        node = parent;
        mirror = mirror ? mirror.parent : null;
      }
    }

    target.size = copied;
    this.record(AvlTreeStatus.OK);
    return target;
  }

  /**
   * Finds the stored element equal to `value`
   * Time complexity: O(log n)
   * @returns The stored element, or null if not present
   */
  find(value: T): T | null {
    if (!this.compareFn) return null;
    const node = this.findNode(value, this.compareFn);
    return node ? node.data : null;
  }

  has(value: T): boolean {
    return this.compareFn !== null && this.findNode(value, this.compareFn) !== null;
  }

  findMin(): T | null {
    const node = this.rootNode ? leftmost(this.rootNode) : null;
    return node ? node.data : null;
  }

  findMax(): T | null {
    const node = this.rootNode ? rightmost(this.rootNode) : null;
    return node ? node.data : null;
  }

  getSize(): number {
    return this.size;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  /**
   * Height of the whole tree, 0 when empty
   */
  getHeight(): number {
    return this.rootNode ? this.rootNode.height : 0;
  }

  get root(): AvlNodeView<T> | null {
    return this.rootNode;
  }

  /**
   * False once deinit has run
   */
  isInitialized(): boolean {
    return this.allocator !== null && this.compareFn !== null;
  }

  /**
   * Status of the most recent insert, remove, emplace or clone
   */
  get lastStatus(): AvlTreeStatus {
    return this.status;
  }

  /**
   * Checks ordering, balance, stored heights, parent links and size
   * @returns Every violation found, empty when the tree is sound
   */
  verify(): AvlViolation[] {
    if (!this.compareFn) {
      return this.rootNode
        ? [{ kind: 'size', message: 'deinitialized tree still holds nodes' }]
        : [];
    }
    return collectViolations(this.rootNode, this.compareFn, this.size);
  }

  /**
   * Ascending walk over parent links, no recursion
   * The tree must not be modified while iterating
   */
  *inOrderTraversal(): IterableIterator<T> {
    let node = this.rootNode ? leftmost(this.rootNode) : null;
    while (node) {
      yield node.data;
      node = successorOf(node);
    }
  }

  /**
   * Descending walk over parent links, no recursion
   */
  *reverseOrderTraversal(): IterableIterator<T> {
    let node = this.rootNode ? rightmost(this.rootNode) : null;
    while (node) {
      yield node.data;
      node = predecessorOf(node);
    }
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.inOrderTraversal();
  }

  /**
   * Descends from the root to where `value` belongs
   * @returns The last node visited, the last comparison result, and the equal node if any
   */
  private locate(value: T, compare: Comparator<T>): Slot<T> {
    let current = this.rootNode;
    let parent: AvlNode<T> | null = null;
    let cmp = 0;

    while (current) {
      parent = current;
      cmp = compare(value, current.data);
      if (cmp < 0) {
        current = current.left;
      } else if (cmp > 0) {
        current = current.right;
      } else {
        return { parent, cmp, match: current };
      }
    }
    return { parent, cmp, match: null };
  }

  private findNode(value: T, compare: Comparator<T>): AvlNode<T> | null {
    let current = this.rootNode;
    while (current) {
      const cmp = compare(value, current.data);
      if (cmp < 0) {
        current = current.left;
      } else if (cmp > 0) {
        current = current.right;
      } else {
        return current;
      }
    }
    return null;
  }

  /**
   * Hangs a new node under `parent` on the side given by `cmp`, then rebalances
   */
  private attach(value: T, block: MemoryBlock, parent: AvlNode<T> | null, cmp: number): AvlNode<T> {
    const node: AvlNode<T> = {
      data: value,
      height: 1,
      left: null,
      right: null,
      parent,
      block
    };

    if (!parent) {
      this.rootNode = node;
    } else if (cmp < 0) {
      parent.left = node;
    } else {
      parent.right = node;
    }

    this.rebalanceFrom(node);
    this.size++;
    return node;
  }

  /**
   * Walks from `start` to the root, refreshing heights and rotating where needed
   * Height changes can travel all the way up, so the walk never stops early.
   */
  private rebalanceFrom(start: AvlNode<T> | null): void {
    let node = start;
    while (node) {
      const parent = node.parent;
      setHeight(node);

      const result = rebalance(node);
      if (result.root !== node) {
        this.replaceChild(parent, node, result.root);
        // Format arguments are only interpolated when trace is enabled
        this.logger?.trace('AVL %s rotation, new subtree root %s', result.rotation, result.root.data);
      }
      node = parent;
    }
  }

  /**
   * Points the slot that held `previous` (under `parent`, or the root) at `next`
   */
  private replaceChild(parent: AvlNode<T> | null, previous: AvlNode<T>, next: AvlNode<T> | null): void {
    if (!parent) {
      this.rootNode = next;
    } else if (parent.left === previous) {
      parent.left = next;
    } else {
      parent.right = next;
    }
    if (next) {
      next.parent = parent;
    }
  }

  /**
   * Destroys the node's element and returns its block
   */
  private release(node: AvlNode<T>, allocator: Allocator): void {
    this.destroyFn(node.data, allocator);
    allocator.deallocate(node.block);
    node.left = null;
    node.right = null;
    node.parent = null;
  }

  /**
   * Post-order release of every node without recursion or an auxiliary stack
   * The previously visited node tells whether we came down from the parent,
   * up from the left child, or up from the right child.
   */
  private teardown(): number {
    const allocator = this.allocator;
    let node = this.rootNode;
    if (!node || !allocator) return 0;

    let last: AvlNode<T> | null = null;
    let released = 0;

    while (node) {
      const parent: AvlNode<T> | null = node.parent;

      if (last === parent) {
        if (node.left) {
          last = node;
          node = node.left;
          continue;
        }
        if (node.right) {
          last = node;
          node = node.right;
          continue;
        }
      } else if (last === node.left && node.right) {
        last = node;
        node = node.right;
        continue;
      }

      this.release(node, allocator);
      released++;
      last = node;
      node = parent;
    }

    this.logger?.debug(`AVL teardown released ${released} nodes`);
    return released;
  }

  private record(status: AvlTreeStatus): AvlTreeStatus {
    this.status = status;
    return status;
  }

  /**
   * Reports a violation: thrown in strict mode, returned otherwise
   */
  private fail(status: AvlTreeStatus, operation: string): AvlTreeStatus {
    this.record(status);
    const error = new AvlTreeError(status, operation);
    this.logger?.warn(error.message);
    if (this.strict) {
      throw error;
    }
    return status;
  }
}

function leftmost<T>(node: AvlNode<T>): AvlNode<T> {
  while (node.left) {
    node = node.left;
  }
  return node;
}

function rightmost<T>(node: AvlNode<T>): AvlNode<T> {
  while (node.right) {
    node = node.right;
  }
  return node;
}

function successorOf<T>(node: AvlNode<T>): AvlNode<T> | null {
  if (node.right) return leftmost(node.right);
  let child = node;
  let parent = node.parent;
  while (parent && parent.right === child) {
    child = parent;
    parent = parent.parent;
  }
  return parent;
}

function predecessorOf<T>(node: AvlNode<T>): AvlNode<T> | null {
  if (node.left) return rightmost(node.left);
  let child = node;
  let parent = node.parent;
  while (parent && parent.left === child) {
    child = parent;
    parent = parent.parent;
  }
  return parent;
}
