/**
 * Result codes returned by AVL tree operations
 * Errors are reported as values; only strict mode turns violations into exceptions
 */
export enum AvlTreeStatus {
  OK = 0,
  ERR_NULL = -1,       // Tree deinitialized or a required argument missing
  ERR_DUPLICATE = -2,  // An equal element is already stored
  ERR_ALLOC = -3,      // The allocator refused a node block
  ERR_CONSTRUCT = -4   // An emplace constructor reported failure
}

const STATUS_MESSAGES: Record<AvlTreeStatus, string> = {
  [AvlTreeStatus.OK]: 'ok',
  [AvlTreeStatus.ERR_NULL]: 'tree is not initialized or a required argument is missing',
  [AvlTreeStatus.ERR_DUPLICATE]: 'an equal element is already in the tree',
  [AvlTreeStatus.ERR_ALLOC]: 'allocator could not provide a node',
  [AvlTreeStatus.ERR_CONSTRUCT]: 'element constructor failed'
};

export function describeStatus(status: AvlTreeStatus): string {
  return STATUS_MESSAGES[status];
}

/**
 * Thrown instead of returning ERR_NULL or ERR_ALLOC when a tree runs in strict mode
 */
export class AvlTreeError extends Error {
  readonly status: AvlTreeStatus;

  constructor(status: AvlTreeStatus, operation: string) {
    super(`${operation} failed: ${describeStatus(status)}`);
    this.name = 'AvlTreeError';
    this.status = status;
  }
}
