/**
 * Serializes async work per file handle inside one process. Tasks queued for
 * the same handle run one after another; different handles don't block each
 * other. A failed task does not stall the queue.
 */
export class HandleLock {
  private readonly queues = new Map<string, Promise<unknown>>();

  run<T>(handle: string, task: () => Promise<T>): Promise<T> {
    const prev = this.queues.get(handle) ?? Promise.resolve();
    const next = prev.then(
      () => task(),
      () => task(),
    );
    this.queues.set(handle, next);

    const release = (): void => {
      if (this.queues.get(handle) === next) {
        this.queues.delete(handle);
      }
    };
    // Rejections reach the caller through `next`.
    void next.then(release, release);
    return next;
  }

  /** Number of handles with queued or running work. */
  get pendingHandles(): number {
    return this.queues.size;
  }
}
