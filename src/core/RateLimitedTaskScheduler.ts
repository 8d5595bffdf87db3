import { EventEmitter } from "events";
import { Loggable, LoggableError } from "../logging/Loggable";
import { IQueueStrategy } from "../interfaces";
import { InMemoryQueueStrategy } from "./InMemoryQueueStrategy";

export type TaskOutput<TOut> = {
  success: boolean;
  result?: TOut;
  error?: LoggableError;
};

export type Task<TIn, TOut> = (input: TIn) => Promise<TOut>;

export type DeferredTask<TIn, TOut> = {
  execute: Task<TIn, TOut>;
  input: TIn;
  settle?: (output: TaskOutput<TOut>) => void;
};

/**
 * Runs tasks with a concurrency cap and an optional per-window start rate.
 * Queued tasks start strictly in the order they were scheduled, so a limit of
 * one gives FIFO, one-at-a-time processing.
 */
export abstract class RateLimitedTaskScheduler<TIn, TOut> extends Loggable {
  protected runningTasks: number = 0;
  protected tasksInitiatedInWindow: number = 0;
  private windowStartTime: number = Date.now();
  protected emitter = new EventEmitter();
  private taskProcessedCount: number = 0;
  private windowCheckInterval: NodeJS.Timeout | null = null;
  private idleWaiters: Array<() => void> = [];

  constructor(
    protected concurrencyLimit: number = 10,
    protected tasksPerInterval: number = Number.POSITIVE_INFINITY,
    protected interval: number = 1000,
    protected queue: IQueueStrategy<
      DeferredTask<TIn, TOut>
    > = new InMemoryQueueStrategy<DeferredTask<TIn, TOut>>()
  ) {
    super();
    if (interval <= 0) throw new Error("Interval must be greater than 0");
    if (concurrencyLimit < 1) {
      throw new Error("Concurrency limit must be at least 1");
    }
  }

  scheduleTask(task: Task<TIn, TOut>, input: TIn): void {
    this.processOrEnqueueTask({ execute: task, input });
    this.restartTimerIfNeeded();
  }

  /**
   * Schedules a task and resolves once that task has finished, successfully
   * or not. Never rejects: failures come back as `{ success: false }`.
   */
  runTask(task: Task<TIn, TOut>, input: TIn): Promise<TaskOutput<TOut>> {
    return new Promise((resolve) => {
      this.processOrEnqueueTask({ execute: task, input, settle: resolve });
      this.restartTimerIfNeeded();
    });
  }

  onTaskComplete(callback: (result: TaskOutput<TOut>) => void): void {
    this.emitter.on("taskComplete", callback);
  }

  /**
   * Resolves when nothing is running or queued.
   */
  whenIdle(): Promise<void> {
    if (this.pendingTaskCount() === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  pendingTaskCount(): number {
    return this.runningTasks + this.queue.size();
  }

  processedTaskCount(): number {
    return this.taskProcessedCount;
  }

  private processOrEnqueueTask(deferredTask: DeferredTask<TIn, TOut>): void {
    // Queued work goes first, or a fresh task could overtake it.
    if (this.queue.size() === 0 && this.canInitiateTask()) {
      this.initiateTask(deferredTask);
    } else {
      this.queue.enqueue(deferredTask);
    }
  }

  private updateWindowState(): void {
    const now = Date.now();
    if (now - this.windowStartTime >= this.interval) {
      this.windowStartTime = now;
      this.tasksInitiatedInWindow = 0;
    }
  }

  private canInitiateTask(): boolean {
    this.updateWindowState();
    return (
      this.tasksInitiatedInWindow < this.tasksPerInterval &&
      this.runningTasks < this.concurrencyLimit
    );
  }

  private initiateTask(deferredTask: DeferredTask<TIn, TOut>): void {
    this.tasksInitiatedInWindow++;
    this.runningTasks++;
    this.processTask(deferredTask).catch((error) =>
      this.error("Task bookkeeping failed", error)
    );
  }

  protected async processTask(
    deferredTask: DeferredTask<TIn, TOut>
  ): Promise<void> {
    let result: TaskOutput<TOut>;
    try {
      const executionResult = await deferredTask.execute(deferredTask.input);
      result = {
        success: true,
        result: executionResult,
      };
      this.taskProcessedCount++;
    } catch (error) {
      result = {
        success: false,
        error:
          error instanceof LoggableError
            ? error
            : new LoggableError(
                error instanceof Error ? error.message : String(error),
                undefined,
                error instanceof Error ? error : undefined
              ),
      };
      this.error("Task execution failed", result.error);
    } finally {
      this.runningTasks--;
    }

    deferredTask.settle?.(result);
    this.emitter.emit("taskComplete", result);
    this.processNextTaskIfAvailable();
    this.stopTimerIfNoTasks();
    this.notifyIfIdle();
  }

  private processNextTaskIfAvailable(): void {
    while (this.queue.size() > 0 && this.canInitiateTask()) {
      const nextTask = this.queue.dequeue();
      if (nextTask) {
        this.initiateTask(nextTask);
      }
    }
  }

  private checkAndProcessTasks(): void {
    this.processNextTaskIfAvailable();
    this.stopTimerIfNoTasks();
  }

  // Only a rate-limited scheduler needs a timer to reopen its window.
  private restartTimerIfNeeded(): void {
    if (
      this.windowCheckInterval === null &&
      Number.isFinite(this.tasksPerInterval) &&
      this.queue.size() > 0
    ) {
      this.windowCheckInterval = setInterval(
        () => this.checkAndProcessTasks(),
        Math.min(this.interval, 1000)
      );
      this.windowCheckInterval.unref();
    }
  }

  private stopTimerIfNoTasks(): void {
    if (this.windowCheckInterval !== null && this.queue.size() === 0) {
      clearInterval(this.windowCheckInterval);
      this.windowCheckInterval = null;
    }
  }

  private notifyIfIdle(): void {
    if (this.pendingTaskCount() > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }

  public destroy(): void {
    if (this.windowCheckInterval !== null) {
      clearInterval(this.windowCheckInterval);
      this.windowCheckInterval = null;
    }
  }
}
