/**
 * Keeps the `capacity` best items seen so far. Internally a binary heap with
 * the worst kept item at the root, so each offer is O(log capacity).
 *
 * `compare(a, b) < 0` means `a` ranks ahead of `b`.
 */
export class TopK<T> {
  private readonly heap: T[] = [];

  constructor(
    private readonly capacity: number,
    private readonly compare: (a: T, b: T) => number,
  ) {}

  get size(): number {
    return this.heap.length;
  }

  offer(item: T): void {
    if (this.capacity <= 0) return;
    if (this.heap.length < this.capacity) {
      this.heap.push(item);
      this.siftUp(this.heap.length - 1);
      return;
    }
    const worst = this.heap[0];
    if (worst === undefined || this.compare(item, worst) >= 0) return;
    this.heap[0] = item;
    this.siftDown(0);
  }

  /** Kept items, best first. */
  toSortedArray(): T[] {
    return [...this.heap].sort(this.compare);
  }

  // Heap order: parent ranks behind (or equal to) its children.
  private behind(i: number, j: number): boolean {
    const a = this.heap[i];
    const b = this.heap[j];
    if (a === undefined || b === undefined) return false;
    return this.compare(a, b) > 0;
  }

  private swap(i: number, j: number): void {
    const a = this.heap[i];
    const b = this.heap[j];
    if (a === undefined || b === undefined) return;
    this.heap[i] = b;
    this.heap[j] = a;
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.behind(i, parent)) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(index: number): void {
    let i = index;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let worst = i;
      if (left < this.heap.length && this.behind(left, worst)) worst = left;
      if (right < this.heap.length && this.behind(right, worst)) worst = right;
      if (worst === i) return;
      this.swap(i, worst);
      i = worst;
    }
  }
}
