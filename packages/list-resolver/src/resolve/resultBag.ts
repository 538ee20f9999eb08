/**
 * Append-only collection shared by concurrent tasks. Read once with drain()
 * after every task has settled.
 */
export class ResultBag<T> {
  private readonly items: T[] = [];

  append(item: T): void {
    this.items.push(item);
  }

  get size(): number {
    return this.items.length;
  }

  drain(): T[] {
    return [...this.items];
  }
}
