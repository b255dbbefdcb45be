import { StackUnderflowError } from "./errors";

// LIFO value stack. Depth is bounded only by memory.
class Stack {
  private items: number[] = [];

  push(value: number): void {
    this.items.push(value);
  }

  pop(): number {
    const value = this.items.pop();
    if (value === undefined) {
      throw new StackUnderflowError();
    }
    return value;
  }

  peek(): number {
    if (this.items.length === 0) {
      throw new StackUnderflowError("Stack underflow: cannot peek at empty stack");
    }
    return this.items[this.items.length - 1];
  }

  size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  /** Returns up to `count` values from the top, bottom-to-top. */
  top(count: number): number[] {
    return count > 0 ? this.items.slice(-count) : [];
  }

  toArray(): number[] {
    return [...this.items];
  }

  clear(): void {
    this.items = [];
  }
}

export { Stack };
