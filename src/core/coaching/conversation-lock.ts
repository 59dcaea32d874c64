/**
 * Conversation Lock
 *
 * Serialises async work per conversation id. Operations on the same id run
 * strictly one after another in call order; operations on different ids run
 * concurrently.
 *
 * Each id keeps a promise chain. A task starts once the previous task for
 * that id has settled, whether it resolved or rejected, and the chain entry
 * is dropped when the last queued task finishes.
 *
 * @example
 * ```typescript
 * const lock = new ConversationLock();
 * await Promise.all([
 *   lock.run('conv_1', () => handle('first')),
 *   lock.run('conv_1', () => handle('second')), // waits for 'first'
 *   lock.run('conv_2', () => handle('other')),  // runs immediately
 * ]);
 * ```
 */
export class ConversationLock {
  /** Settles when the last task queued for the id has settled */
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Runs `task` once every earlier task for `key` has settled.
   * The task's result or rejection is passed through unchanged.
   */
  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    // The chain only tracks completion; the caller receives `result` itself
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  /**
   * True while a task for `key` is running or queued.
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
