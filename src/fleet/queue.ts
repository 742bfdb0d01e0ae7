export type EventQueue<T> = {
  push(item: T): void;
  next(): Promise<T>;
  // Removes and returns everything currently buffered
  drain(): T[];
  readonly size: number;
};

export function createEventQueue<T>(): EventQueue<T> {
  const items: T[] = [];
  const waiters: Array<(item: T) => void> = [];

  return {
    push(item) {
      const waiter = waiters.shift();
      if (waiter) {
        waiter(item);
      } else {
        items.push(item);
      }
    },
    next() {
      if (items.length > 0) {
        const item = items.shift();
        if (item !== undefined) return Promise.resolve(item);
      }
      return new Promise((resolve) => {
        waiters.push(resolve);
      });
    },
    drain: () => items.splice(0),
    get size() {
      return items.length;
    },
  };
}
