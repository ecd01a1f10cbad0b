export interface IPriorityQueueConfig<T> {
  /** Weight of an item; lower weights pop first. */
  weigh: (item: T) => number;
  /** Maximum number of pending items; unbounded when omitted. */
  capacity?: number;
}

/**
 * Min-priority queue with a deterministic tie-break: among equal weights the
 * item pushed first pops first.
 */
export interface IPriorityQueue<T> {
  /** Number of pending items */
  readonly size: number;

  push(item: T): void;

  /**
   * Removes and returns the lowest-weight item
   * @returns The item, or undefined when the queue is empty
   */
  pop(): T | undefined;
}
