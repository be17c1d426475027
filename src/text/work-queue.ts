/**
 * FIFO queue whose items can also be put back at the front. Re-inserted items
 * keep their given order, so splitting the head item into parts and pushing
 * the parts to the front preserves left-to-right order.
 */
export class WorkQueue<T> {
  private readonly items: T[];

  constructor(initial: Iterable<T> = []) {
    this.items = [...initial];
  }

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  push(...items: T[]): void {
    this.items.push(...items);
  }

  pushFront(...items: T[]): void {
    this.items.unshift(...items);
  }

  shift(): T | undefined {
    return this.items.shift();
  }

  peek(): T | undefined {
    return this.items[0];
  }

  toArray(): T[] {
    return [...this.items];
  }
}
