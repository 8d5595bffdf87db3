export interface IQueueStrategy<T> {
  enqueue(message: T): void;
  dequeue(): T | undefined;
  size(): number;
}
