/**
 * FIFO queue with O(1) amortized enqueue and dequeue.
 *
 * Array-backed with periodic compaction of dequeued slots. Breadth-first
 * search keeps its frontier here.
 *
 * @example
 * ```typescript
 * const frontier = new FastQueue<Position>();
 * frontier.enqueue([0, 0]);
 * frontier.enqueue([0, 1]);
 * frontier.dequeue();  // [0, 0]
 * ```
 */
export class FastQueue<T> {
  private items: T[] = [];
  private head = 0;

  get length(): number {
    return this.items.length - this.head;
  }

  get isEmpty(): boolean {
    return this.length === 0;
  }

  enqueue(item: T): void {
    this.items.push(item);
  }

  /**
   * Remove and return the oldest item, or undefined when empty.
   *
   * Compacts the backing array once more than 1000 slots, and more than half
   * of it, have been consumed.
   */
  dequeue(): T | undefined {
    if (this.isEmpty) return undefined;

    const item = this.items[this.head];
    this.head++;

    if (this.head > 1000 && this.head > this.items.length / 2) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }

  static from<T>(items: Iterable<T>): FastQueue<T> {
    const queue = new FastQueue<T>();
    for (const item of items) {
      queue.enqueue(item);
    }
    return queue;
  }
}

/**
 * Convert a (row, col) coordinate to a unique numeric key.
 *
 * @example
 * ```typescript
 * const key = coordKey(10, 5, 100);  // Returns 1005
 * ```
 */
export function coordKey(row: number, col: number, cols: number): number {
  return row * cols + col;
}

/**
 * Coordinate set for grid searches, one bit per cell.
 *
 * @example
 * ```typescript
 * const visited = new CoordSet(100, 100);
 * visited.add(20, 10);
 * visited.has(20, 10);  // true
 * visited.has(5, 5);    // false
 * ```
 */
export class CoordSet {
  private readonly bits: Uint32Array;
  private readonly cols: number;
  private count = 0;

  constructor(rows: number, cols: number) {
    this.cols = cols;
    this.bits = new Uint32Array(Math.ceil((rows * cols) / 32));
  }

  /**
   * Number of coordinates in the set.
   */
  get size(): number {
    return this.count;
  }

  has(row: number, col: number): boolean {
    const key = row * this.cols + col;
    const value = this.bits[key >>> 5];
    return value !== undefined && (value & (1 << (key & 31))) !== 0;
  }

  add(row: number, col: number): void {
    const key = row * this.cols + col;
    const index = key >>> 5;
    const bit = 1 << (key & 31);
    const current = this.bits[index];
    if (current !== undefined && (current & bit) === 0) {
      this.bits[index] = current | bit;
      this.count++;
    }
  }
}
