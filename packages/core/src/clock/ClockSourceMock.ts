import type { ClockSource } from './ClockSource.js';

/**
 * 模拟时钟源 - 用于测试
 * 允许手动控制时间流逝
 */
export class ClockSourceMock implements ClockSource {
  public readonly name = 'mock';

  private currentTime: number;

  constructor(initialTime: number = 0) {
    this.currentTime = initialTime;
  }

  now(): number {
    return this.currentTime;
  }

  /**
   * 手动推进时间
   * @param deltaMs 推进的毫秒数
   */
  advance(deltaMs: number): void {
    this.currentTime += deltaMs;
  }

  /**
   * 设置绝对时间
   */
  setTime(timeMs: number): void {
    this.currentTime = timeMs;
  }
}
