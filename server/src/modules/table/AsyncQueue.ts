// Serial task queue. Every table mutation goes through it, so commands from
// different sockets are applied one at a time against the latest state.

type QueueTask<T> = () => Promise<T>;

// Runs the task and returns the callback that settles the caller's promise
type QueueEntry = () => Promise<() => void>;

export class AsyncQueue {
  private queue: QueueEntry[] = [];
  private running = false;

  /**
   * Adds a task to the queue and resolves with its result once it has run.
   */
  enqueue<T>(task: QueueTask<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          const result = await task();
          return () => resolve(result);
        } catch (err) {
          return () => reject(err);
        }
      });
      if (!this.running) {
        void this.drain();
      }
    });
  }

  private async drain(): Promise<void> {
    this.running = true;
    let entry = this.queue.shift();
    while (entry) {
      const settle = await entry();
      entry = this.queue.shift();
      // bookkeeping is done before the caller resumes
      if (!entry) this.running = false;
      settle();
    }
  }

  /** Tasks waiting in the queue, including the one running. */
  get size(): number {
    return this.queue.length + (this.running ? 1 : 0);
  }
}
