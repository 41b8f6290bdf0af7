export interface PeriodicTaskOptions {
  /** 任务名，用于日志 */
  name: string;
  intervalMs: number;
  task: () => void | Promise<void>;
}

/**
 * 可取消的周期任务
 *
 * 任务抛出或返回被拒绝的 Promise 时只记录日志，定时器继续运行。
 * 上一次异步执行尚未结束时跳过本次。
 */
export class PeriodicTask {
  private timer: NodeJS.Timeout | null = null;
  private inFlight = false;
  private failures = 0;

  constructor(private readonly options: PeriodicTaskOptions) {}

  start(): void {
    if (this.timer) {
      return;
    }

    console.log(`⏱️ [PeriodicTask] 启动 ${this.options.name}，间隔: ${this.options.intervalMs}ms`);
    this.failures = 0;
    this.timer = setInterval(() => {
      this.runOnce();
    }, this.options.intervalMs);
  }

  stop(): void {
    if (!this.timer) {
      return;
    }

    clearInterval(this.timer);
    this.timer = null;
    console.log(`⏹️ [PeriodicTask] 停止 ${this.options.name}`);
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  getFailureCount(): number {
    return this.failures;
  }

  private runOnce(): void {
    if (this.inFlight) {
      return;
    }

    let result: void | Promise<void>;
    try {
      result = this.options.task();
    } catch (error) {
      this.recordFailure(error);
      return;
    }

    // 只有异步任务才占用执行中标记
    if (result instanceof Promise) {
      this.inFlight = true;
      void result.then(
        () => {
          this.inFlight = false;
        },
        (error: unknown) => {
          this.inFlight = false;
          this.recordFailure(error);
        }
      );
    }
  }

  private recordFailure(error: unknown): void {
    this.failures++;
    console.error(`❌ [PeriodicTask] ${this.options.name} 执行失败:`, error);
  }
}
