/**
 * 时钟源接口 - 提供当前时间戳
 * 引擎内所有依赖"现在"的计算（衰减保持期、QSO速率、缓存过期）都通过它取时间
 */
export interface ClockSource {
  /**
   * 获取当前时间戳（毫秒）
   */
  now(): number;

  /**
   * 时钟源名称，用于调试
   */
  readonly name: string;
}
