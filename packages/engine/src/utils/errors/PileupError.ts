/**
 * 统一的引擎错误类
 *
 * 携带错误代码、严重程度、用户可读的消息和处理建议，
 * 便于 UI 层直接展示。
 */

/**
 * 错误代码
 */
export enum PileupErrorCode {
  // 配置
  INVALID_CONFIG = 'INVALID_CONFIG',
  CONFIG_LOAD_FAILED = 'CONFIG_LOAD_FAILED',

  // 输入
  INVALID_DECODE = 'INVALID_DECODE',
  INVALID_SPOT = 'INVALID_SPOT',

  // 外部协作方
  SCORER_FAILED = 'SCORER_FAILED',

  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

/**
 * 错误严重程度
 */
export enum PileupErrorSeverity {
  /** 引擎无法工作 */
  CRITICAL = 'critical',
  /** 单次操作失败 */
  ERROR = 'error',
  /** 输入被丢弃，引擎继续运行 */
  WARNING = 'warning',
  INFO = 'info',
}

export interface PileupErrorOptions {
  code: PileupErrorCode;
  message: string;
  userMessage?: string;
  severity?: PileupErrorSeverity;
  suggestions?: string[];
  cause?: unknown;
  context?: Record<string, unknown>;
}

export class PileupError extends Error {
  readonly code: PileupErrorCode;
  readonly severity: PileupErrorSeverity;
  /** 用户可读的错误消息 */
  readonly userMessage: string;
  /** 处理建议 */
  readonly suggestions: string[];
  readonly cause?: unknown;
  readonly context?: Record<string, unknown>;
  readonly timestamp: number;

  constructor(options: PileupErrorOptions) {
    super(options.message);

    this.name = 'PileupError';
    this.code = options.code;
    this.severity = options.severity ?? PileupErrorSeverity.ERROR;
    this.userMessage = options.userMessage ?? options.message;
    this.suggestions = options.suggestions ?? [];
    this.cause = options.cause;
    this.context = options.context;
    this.timestamp = Date.now();

    Object.setPrototypeOf(this, PileupError.prototype);
  }

  /**
   * 把任意抛出值包装成 PileupError（已经是的原样返回）
   */
  static from(error: unknown, code: PileupErrorCode = PileupErrorCode.UNKNOWN_ERROR): PileupError {
    if (error instanceof PileupError) {
      return error;
    }

    if (error instanceof Error) {
      return new PileupError({
        code,
        message: error.message,
        cause: error,
      });
    }

    return new PileupError({
      code,
      message: String(error),
      cause: error,
    });
  }

  /**
   * 配置文件校验失败
   * @param issues zod 校验问题的字段路径与说明
   */
  static invalidConfig(issues: string[], filePath?: string): PileupError {
    return new PileupError({
      code: PileupErrorCode.INVALID_CONFIG,
      message: `Invalid engine config: ${issues.join('; ')}`,
      userMessage: '配置文件格式错误',
      severity: PileupErrorSeverity.CRITICAL,
      suggestions: [
        '检查配置文件中列出的字段',
        '删除配置文件以恢复默认配置',
      ],
      context: { issues, filePath },
    });
  }

  static configLoadFailed(filePath: string, cause?: unknown): PileupError {
    return new PileupError({
      code: PileupErrorCode.CONFIG_LOAD_FAILED,
      message: `Failed to load config from ${filePath}`,
      userMessage: '无法读取配置文件',
      severity: PileupErrorSeverity.CRITICAL,
      suggestions: [
        '检查文件权限',
        '确认文件内容是合法的 JSON',
      ],
      cause,
      context: { filePath },
    });
  }

  static invalidDecode(reason: string, raw?: unknown): PileupError {
    return new PileupError({
      code: PileupErrorCode.INVALID_DECODE,
      message: `Invalid decode: ${reason}`,
      userMessage: '解码记录格式无效，已丢弃',
      severity: PileupErrorSeverity.WARNING,
      context: { raw },
    });
  }

  static invalidSpot(reason: string, raw?: unknown): PileupError {
    return new PileupError({
      code: PileupErrorCode.INVALID_SPOT,
      message: `Invalid spot: ${reason}`,
      userMessage: '远端收听记录格式无效，已丢弃',
      severity: PileupErrorSeverity.WARNING,
      context: { raw },
    });
  }

  static scorerFailed(modelName: string, cause?: unknown): PileupError {
    return new PileupError({
      code: PileupErrorCode.SCORER_FAILED,
      message: `Prior scorer failed for model ${modelName}`,
      userMessage: '先验评分器调用失败，使用默认先验',
      severity: PileupErrorSeverity.WARNING,
      suggestions: ['检查评分器插件是否正确加载'],
      cause,
      context: { modelName },
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      userMessage: this.userMessage,
      severity: this.severity,
      suggestions: this.suggestions,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}
