import { ConflictError } from "@indexloom/errors";

/**
 * In-process, non-blocking per-user lock: a second run for the same user is
 * rejected rather than queued.
 */
export class UserLock {
  private readonly held = new Set<string>();

  isHeld(userId: string): boolean {
    return this.held.has(userId);
  }

  acquire(userId: string): () => void {
    if (this.held.has(userId)) {
      throw new ConflictError(`An ingestion run is already in progress for user ${userId}`);
    }
    this.held.add(userId);
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.held.delete(userId);
    };
  }

  async withLock<T>(userId: string, fn: () => Promise<T>): Promise<T> {
    const release = this.acquire(userId);
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
