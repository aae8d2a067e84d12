/** Forward cursor over a measure's children with one element of lookahead. */
export class SiblingCursor<T> {
  private index = 0;

  constructor(private readonly items: readonly T[]) {}

  /** Consume and return the next element. */
  next(): T | undefined {
    const item = this.items[this.index];
    if (item !== undefined) {
      this.index += 1;
    }
    return item;
  }

  /** The element `next()` would return, without consuming it. */
  peek(): T | undefined {
    return this.items[this.index];
  }

  hasNext(): boolean {
    return this.index < this.items.length;
  }
}
