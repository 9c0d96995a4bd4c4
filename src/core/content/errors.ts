/**
 * Raised when a document tree breaks the parser contract (a cycle, or a node
 * whose parent does not list it as a child). This is the only error the
 * extraction pipeline lets escape: it points at the caller, not the content.
 */
export class TreeInvariantError extends Error {
  constructor(message: string) {
    super(`Document tree invariant violated: ${message}`);
    this.name = 'TreeInvariantError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
