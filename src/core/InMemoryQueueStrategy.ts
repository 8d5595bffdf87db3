import { IQueueStrategy } from "../interfaces";

export class InMemoryQueueStrategy<T> implements IQueueStrategy<T> {
  private queue: T[] = [];

  enqueue(message: T): void {
    this.queue.push(message);
  }

  dequeue(): T | undefined {
    return this.queue.shift();
  }

  size(): number {
    return this.queue.length;
  }
}
