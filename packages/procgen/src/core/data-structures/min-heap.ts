/**
 * Binary min-heap of tile indices keyed by a numeric priority.
 *
 * Priorities live in a parallel array so pushes do not allocate an
 * object per entry. Stale entries are allowed; callers skip an entry
 * whose priority no longer matches their own record (lazy deletion).
 */
export class IndexMinHeap {
  private readonly keys: number[] = [];
  private readonly priorities: number[] = [];

  get size(): number {
    return this.keys.length;
  }

  get isEmpty(): boolean {
    return this.keys.length === 0;
  }

  push(key: number, priority: number): void {
    this.keys.push(key);
    this.priorities.push(priority);
    this.bubbleUp(this.keys.length - 1);
  }

  /**
   * Remove the lowest-priority entry. Returns undefined when empty.
   */
  pop(): { key: number; priority: number } | undefined {
    const last = this.keys.length - 1;
    if (last < 0) return undefined;

    const top = { key: this.keys[0], priority: this.priorities[0] };
    const tailKey = this.keys.pop();
    const tailPriority = this.priorities.pop();

    if (last > 0 && tailKey !== undefined && tailPriority !== undefined) {
      this.keys[0] = tailKey;
      this.priorities[0] = tailPriority;
      this.bubbleDown(0);
    }
    return top;
  }

  private bubbleUp(start: number): void {
    let index = start;
    const key = this.keys[index];
    const priority = this.priorities[index];

    while (index > 0) {
      const parent = (index - 1) >> 1;
      if (this.priorities[parent] <= priority) break;
      this.keys[index] = this.keys[parent];
      this.priorities[index] = this.priorities[parent];
      index = parent;
    }

    this.keys[index] = key;
    this.priorities[index] = priority;
  }

  private bubbleDown(start: number): void {
    let index = start;
    const key = this.keys[index];
    const priority = this.priorities[index];
    const length = this.keys.length;

    while (true) {
      const left = index * 2 + 1;
      if (left >= length) break;

      const right = left + 1;
      let best = left;
      if (right < length && this.priorities[right] < this.priorities[left]) {
        best = right;
      }
      if (priority <= this.priorities[best]) break;

      this.keys[index] = this.keys[best];
      this.priorities[index] = this.priorities[best];
      index = best;
    }

    this.keys[index] = key;
    this.priorities[index] = priority;
  }
}
