/**
 * Generic buffer implementation for holding items until a flush.
 * Used by the pre-live message buffer.
 */

export interface Buffer<T> {
  /** Add single item to buffer */
  push(item: T): void;
  /** Check if buffer has reached its high-water mark */
  isFull(): boolean;
  /** Get current item count */
  size(): number;
  /** Look at the oldest item without removing it */
  peek(): T | undefined;
  /** Swap buffer contents with empty array (atomic for flushing) */
  swap(): T[];
}

/**
 * Resizable buffer implementation.
 * `maxSize` is a high-water mark: pushes past it still succeed, `isFull()` reports it.
 * Safe for single-threaded async use: every method completes without awaiting.
 */
export class ResizableBuffer<T> implements Buffer<T> {
  private items: T[] = [];

  constructor(private readonly maxSize: number) {
    if (maxSize <= 0) {
      throw new Error("Buffer maxSize must be positive");
    }
  }

  push(item: T): void {
    this.items.push(item);
  }

  isFull(): boolean {
    return this.items.length >= this.maxSize;
  }

  size(): number {
    return this.items.length;
  }

  peek(): T | undefined {
    return this.items[0];
  }

  swap(): T[] {
    const current = this.items;
    this.items = [];
    return current;
  }

  /** Get max size configuration */
  getMaxSize(): number {
    return this.maxSize;
  }
}
