import type { ClockSource } from './ClockSource.js';

/**
 * 系统时钟源实现
 */
export class ClockSourceSystem implements ClockSource {
  public readonly name = 'system';

  now(): number {
    return Date.now();
  }
}
