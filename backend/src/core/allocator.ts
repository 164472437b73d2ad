/**
 * Allocator collaborator for tree nodes
 *
 * Node objects live on the JavaScript heap, so an allocator here hands out
 * accounting blocks rather than raw memory. Every node owns exactly one block
 * for its whole life, which lets a caller cap how many nodes a set of trees
 * may hold and observe allocation failures the same way a native allocator
 * would report them.
 */

/**
 * Allocation units taken by a single tree node
 */
export const NODE_SIZE = 1;

/**
 * A block handed out by an allocator
 * Blocks are opaque to the tree: it only stores them and hands them back
 */
export interface MemoryBlock {
  readonly size: number;
}

/**
 * Allocation interface consumed by the tree engine
 */
export interface Allocator {
  /**
   * Reserves `size` units
   * @returns The reserved block, or null when the allocator is exhausted
   */
  allocate(size: number): MemoryBlock | null;

  /**
   * Releases a block obtained from `allocate`
   */
  deallocate(block: MemoryBlock): void;
}

/**
 * Default allocator: never fails and keeps no books
 */
export const heapAllocator: Allocator = {
  allocate(size: number): MemoryBlock {
    return { size };
  },
  deallocate(): void {
    // Nothing to release, the garbage collector reclaims the node
  }
};

/**
 * Usage snapshot of a bounded allocator
 */
export interface AllocatorStats {
  capacity: number;       // Total units available
  inUse: number;          // Units currently handed out
  peak: number;           // Highest inUse ever observed
  allocations: number;    // Successful allocate calls
  deallocations: number;  // Successful deallocate calls
  failures: number;       // allocate calls refused for lack of capacity
}

/**
 * Allocator with a fixed unit budget shared by every tree that uses it
 *
 * Blocks are tracked so that releasing a foreign block, or releasing the same
 * block twice, is caught instead of silently corrupting the books.
 */
export class BoundedAllocator implements Allocator {
  private readonly capacity: number;
  private readonly live = new Set<MemoryBlock>();
  private inUse = 0;
  private peak = 0;
  private allocations = 0;
  private deallocations = 0;
  private failures = 0;

  /**
   * @param capacity - Number of units that may be in use at once
   */
  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Allocator capacity must be a non-negative integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  allocate(size: number): MemoryBlock | null {
    if (!Number.isInteger(size) || size <= 0) {
      throw new RangeError(`Allocation size must be a positive integer, got ${size}`);
    }
    if (this.inUse + size > this.capacity) {
      this.failures++;
      return null;
    }

    const block: MemoryBlock = { size };
    this.live.add(block);
    this.inUse += size;
    this.allocations++;
    if (this.inUse > this.peak) {
      this.peak = this.inUse;
    }
    return block;
  }

  deallocate(block: MemoryBlock): void {
    if (!this.live.delete(block)) {
      throw new Error('Block was not allocated by this allocator or was already released');
    }
    this.inUse -= block.size;
    this.deallocations++;
  }

  /**
   * Units still available for allocation
   */
  available(): number {
    return this.capacity - this.inUse;
  }

  getStats(): AllocatorStats {
    return {
      capacity: this.capacity,
      inUse: this.inUse,
      peak: this.peak,
      allocations: this.allocations,
      deallocations: this.deallocations,
      failures: this.failures
    };
  }
}
