/**
 * ErrorBoundary - 错误边界
 *
 * 包装可能失败的操作：
 * 1. 失败时调用清理函数
 * 2. 有降级值时记录日志并返回降级值
 * 3. 没有降级值时抛出（转换后的）错误
 */

export interface ErrorBoundaryOptions<F> {
  /**
   * 操作名称，用于日志
   */
  operationName: string;

  /**
   * 失败时的清理函数
   */
  cleanup?: () => void | Promise<void>;

  /**
   * 失败时返回的降级值；undefined 表示没有降级方案
   */
  fallback?: F;

  /**
   * 把捕获的错误转换为更具体的错误类型
   */
  errorTransform?: (error: unknown) => Error;

  /**
   * @default true
   */
  logError?: boolean;
}

export type SyncErrorBoundaryOptions<F> = Omit<ErrorBoundaryOptions<F>, 'cleanup'> & {
  cleanup?: () => void;
};

/**
 * 使用示例：
 *
 * ```typescript
 * const insights = ErrorBoundary.executeSync(
 *   { operationName: 'refreshInsights', fallback: previous },
 *   () => buildInsights(),
 * );
 *
 * await ErrorBoundary.execute(
 *   { operationName: 'loadConfig', errorTransform: e => PileupError.configLoadFailed(path, e) },
 *   () => fs.readFile(path, 'utf-8'),
 * );
 * ```
 */
export class ErrorBoundary {
  /**
   * 执行被保护的异步操作
   * @throws 操作失败且没有降级方案时
   */
  static async execute<T, F = T>(
    options: ErrorBoundaryOptions<F>,
    operation: () => Promise<T> | T
  ): Promise<T | F> {
    try {
      return await operation();
    } catch (error) {
      const transformedError = ErrorBoundary.report(options, error);

      if (options.cleanup) {
        try {
          await options.cleanup();
          ErrorBoundary.logCleanup(options);
        } catch (cleanupError) {
          console.error(`⚠️  [ErrorBoundary] ${options.operationName} 清理失败:`, cleanupError);
        }
      }

      return ErrorBoundary.settle(options, transformedError);
    }
  }

  /**
   * 同步版本的 execute
   * @throws 操作失败且没有降级方案时
   */
  static executeSync<T, F = T>(
    options: SyncErrorBoundaryOptions<F>,
    operation: () => T
  ): T | F {
    try {
      return operation();
    } catch (error) {
      const transformedError = ErrorBoundary.report(options, error);

      if (options.cleanup) {
        try {
          options.cleanup();
          ErrorBoundary.logCleanup(options);
        } catch (cleanupError) {
          console.error(`⚠️  [ErrorBoundary] ${options.operationName} 清理失败:`, cleanupError);
        }
      }

      return ErrorBoundary.settle(options, transformedError);
    }
  }

  private static report<F>(options: ErrorBoundaryOptions<F> | SyncErrorBoundaryOptions<F>, error: unknown): unknown {
    const transformedError = options.errorTransform ? options.errorTransform(error) : error;
    if (options.logError ?? true) {
      console.error(`❌ [ErrorBoundary] ${options.operationName} 失败:`, transformedError);
    }
    return transformedError;
  }

  private static logCleanup<F>(options: ErrorBoundaryOptions<F> | SyncErrorBoundaryOptions<F>): void {
    if (options.logError ?? true) {
      console.log(`🧹 [ErrorBoundary] ${options.operationName} 清理完成`);
    }
  }

  private static settle<F>(options: ErrorBoundaryOptions<F> | SyncErrorBoundaryOptions<F>, error: unknown): F {
    if (options.fallback !== undefined) {
      if (options.logError ?? true) {
        console.log(`🔄 [ErrorBoundary] ${options.operationName} 使用降级方案`);
      }
      return options.fallback;
    }
    throw error;
  }
}
