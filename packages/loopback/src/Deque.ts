/**
 * Array-backed FIFO with O(1) amortised shift. Consumed slots are reclaimed
 * once they make up more than half of the backing array.
 */
export class Deque<T> {
  private items: T[] = [];
  private head = 0;

  get length() { return this.items.length - this.head; }

  push(item: T) { this.items.push(item); }

  /** Puts `item` back in front of everything queued. */
  unshift(item: T) {
    if (this.head > 0) this.items[--this.head] = item;
    else this.items.unshift(item);
  }

  shift(): T | undefined {
    if (this.head >= this.items.length) return undefined;
    const item = this.items[this.head++];
    if (this.head > 64 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return item;
  }

  clear() {
    this.items = [];
    this.head = 0;
  }
}
