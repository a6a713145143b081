/**
 * Per-node mutual exclusion across concurrent scenarios
 * @module @capbench/core/infrastructure/node-lock
 */

/**
 * Releases every node taken by one acquire() call. Idempotent.
 */
export type ReleaseLocks = () => void;

/**
 * FIFO lock per node. Multi-node acquisitions take nodes in sorted order
 * so two scenarios sharing nodes cannot deadlock.
 */
export class NodeLockManager {
  /** Promise each node's next holder waits on */
  private readonly tails = new Map<string, Promise<void>>();
  private readonly held = new Set<string>();

  /**
   * Wait until every node is free and take them all
   */
  async acquire(nodeIds: readonly string[]): Promise<ReleaseLocks> {
    const sorted = [...new Set(nodeIds)].sort();
    const releases: Array<() => void> = [];

    for (const nodeId of sorted) {
      releases.push(await this.acquireOne(nodeId));
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      for (const release of releases.reverse()) {
        release();
      }
    };
  }

  isLocked(nodeId: string): boolean {
    return this.held.has(nodeId);
  }

  lockedNodes(): string[] {
    return [...this.held].sort();
  }

  private async acquireOne(nodeId: string): Promise<() => void> {
    const previous = this.tails.get(nodeId) ?? Promise.resolve();
    let unlock: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(nodeId, tail);

    await previous;
    this.held.add(nodeId);

    return () => {
      this.held.delete(nodeId);
      if (this.tails.get(nodeId) === tail) {
        this.tails.delete(nodeId);
      }
      unlock();
    };
  }
}
