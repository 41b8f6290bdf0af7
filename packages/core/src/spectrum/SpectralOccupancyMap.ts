import { EventEmitter } from 'eventemitter3';
import type { Decode, InterferenceReport, SpectralSnapshot, SpectrumConfig } from '@pileup-intel/contracts';
import type { ClockSource } from '../clock/ClockSource.js';
import { ClockSourceSystem } from '../clock/ClockSourceSystem.js';

export interface SpectralOccupancyMapEvents {
  'recommendationChanged': (offset: number) => void;
}

/**
 * 最近一次计算的代价曲线（以窗口中心为横坐标）
 */
interface CostCurve {
  minCenter: number;
  costs: Float64Array;
}

/**
 * 本地信号强度映射：-24dB → 40，+20dB → 100
 */
export function snrToLocalIntensity(snr: number): number {
  const intensity = 40 + (snr + 24) * (60 / 44);
  return Math.max(40, Math.min(100, intensity));
}

/**
 * 远端干扰强度映射：-30dB → 20，+10dB → 100
 */
export function snrToRemoteIntensity(snr: number): number {
  const intensity = 20 + (snr + 30) * 2;
  return Math.max(20, Math.min(100, intensity));
}

/**
 * 远端报告的时效权重
 */
export function remoteAgeFactor(ageSec: number, fullWeightAgeSec: number, maxAgeSec: number): number {
  if (ageSec <= fullWeightAgeSec) return 1;
  if (ageSec >= maxAgeSec) return 0;
  return 1 - (ageSec - fullWeightAgeSec) / (maxAgeSec - fullWeightAgeSec);
}

/**
 * 频谱占用图 - 维护本地信号与远端干扰两条强度数组，并搜索最佳发射空档
 *
 * 每个单元对应 1Hz。本地强度只在摄入时抬升，由 decayTick 衰减；
 * 远端强度每批完全替换。
 */
export class SpectralOccupancyMap extends EventEmitter<SpectralOccupancyMapEvents> {
  private readonly config: SpectrumConfig;
  private readonly clock: ClockSource;
  private readonly local: Float64Array;
  private readonly remote: Float64Array;
  private history: SpectralSnapshot[] = [];
  private recommendedOffset: number;
  private protectedFrequency: number | null = null;
  private lastLocalIngestMs: number | null = null;
  private lastCurve: CostCurve | null = null;

  constructor(config: SpectrumConfig, clock: ClockSource = new ClockSourceSystem()) {
    super();
    this.config = config;
    this.clock = clock;
    this.local = new Float64Array(config.bandwidthHz);
    this.remote = new Float64Array(config.bandwidthHz);
    this.recommendedOffset = Math.floor(config.bandwidthHz / 2);
  }

  /**
   * 摄入本地解码：在频率附近把强度抬升到至少 SNR 对应的值
   */
  ingestLocalDecodes(decodes: ReadonlyArray<Pick<Decode, 'freq' | 'snr'>>): void {
    const { localHalfWidthHz } = this.config;
    let ingested = 0;

    for (const decode of decodes) {
      if (!this.isInWindow(decode.freq)) {
        continue;
      }
      this.raiseRange(this.local, decode.freq, localHalfWidthHz, snrToLocalIntensity(decode.snr));
      ingested++;
    }

    if (ingested > 0) {
      this.lastLocalIngestMs = this.clock.now();
      this.pushSnapshot();
    }
  }

  /**
   * 摄入远端干扰（整体替换），重叠的报告取最大值而不是相加
   */
  ingestRemoteInterference(reports: ReadonlyArray<InterferenceReport>): void {
    const { remoteHalfWidthHz, remoteFullWeightAgeSec, remoteMaxAgeSec } = this.config;
    this.remote.fill(0);

    for (const report of reports) {
      const offset = Math.round(report.offset);
      if (!this.isInWindow(offset)) {
        continue;
      }
      const weight = remoteAgeFactor(report.age, remoteFullWeightAgeSec, remoteMaxAgeSec);
      if (weight <= 0) {
        continue;
      }
      this.raiseRange(this.remote, offset, remoteHalfWidthHz, snrToRemoteIntensity(report.snr) * weight);
    }

    this.pushSnapshot();
  }

  /**
   * 衰减一次本地强度
   * 距最后一次本地摄入不足保持期时不衰减
   * @returns 是否实际执行了衰减
   */
  decayTick(): boolean {
    const { decayFactor, zeroThreshold, decayHoldMs } = this.config;

    if (this.lastLocalIngestMs !== null && this.clock.now() - this.lastLocalIngestMs < decayHoldMs) {
      return false;
    }

    for (let i = 0; i < this.local.length; i++) {
      const value = this.local[i] * decayFactor;
      this.local[i] = value < zeroThreshold ? 0 : value;
    }
    this.pushSnapshot();
    return true;
  }

  /**
   * 设置保护频率（当前目标的发射频率），null 表示不保护
   */
  setProtectedFrequency(frequency: number | null): void {
    this.protectedFrequency = frequency;
  }

  getProtectedFrequency(): number | null {
    return this.protectedFrequency;
  }

  /**
   * 搜索代价最低的发射位置
   * 代价 = 窗口内 (本地 + 权重×远端) 的均值 + 中心偏置 + 目标保护惩罚
   * @returns 对外可见的推荐偏移（带迟滞）
   */
  findBestGap(): number {
    const {
      bandwidthHz,
      gapWindowHz,
      remoteWeight,
      centerBiasPerHz,
      edgeGuardHz,
      hysteresisHz,
    } = this.config;

    const half = Math.floor(gapWindowHz / 2);
    const minCenter = Math.max(edgeGuardHz, half);
    const maxCenter = Math.min(bandwidthHz - edgeGuardHz, bandwidthHz - gapWindowHz + half);

    if (minCenter > maxCenter) {
      console.warn(`⚠️ [SpectralOccupancyMap] 搜索范围为空 (${minCenter} > ${maxCenter})，保留上次推荐 ${this.recommendedOffset}Hz`);
      return this.recommendedOffset;
    }

    // 前缀和实现滑动窗口求和
    const prefix = new Float64Array(bandwidthHz + 1);
    for (let i = 0; i < bandwidthHz; i++) {
      prefix[i + 1] = prefix[i] + this.local[i] + remoteWeight * this.remote[i];
    }

    const bandCenter = bandwidthHz / 2;
    const costs = new Float64Array(maxCenter - minCenter + 1);
    let bestCenter = minCenter;
    let bestCost = Number.POSITIVE_INFINITY;

    for (let center = minCenter; center <= maxCenter; center++) {
      const start = center - half;
      const mean = (prefix[start + gapWindowHz] - prefix[start]) / gapWindowHz;
      let cost = mean + centerBiasPerHz * Math.abs(center - bandCenter);
      if (this.isProtected(center)) {
        cost += this.config.protectPenalty;
      }
      costs[center - minCenter] = cost;

      if (cost < bestCost) {
        bestCost = cost;
        bestCenter = center;
      }
    }

    this.lastCurve = { minCenter, costs };

    const current = this.recommendedOffset;
    const currentIllegal = current < minCenter || current > maxCenter || this.isProtected(current);

    if (bestCenter !== current && (currentIllegal || Math.abs(bestCenter - current) > hysteresisHz)) {
      this.recommendedOffset = bestCenter;
      console.log(`📍 [SpectralOccupancyMap] 推荐发射频率 ${current}Hz → ${bestCenter}Hz (代价 ${bestCost.toFixed(2)})`);
      this.emit('recommendationChanged', bestCenter);
    }

    return this.recommendedOffset;
  }

  /**
   * 最近一次代价曲线上某个窗口中心的代价
   */
  costAt(centerHz: number): number | undefined {
    if (!this.lastCurve) {
      return undefined;
    }
    const index = centerHz - this.lastCurve.minCenter;
    if (!Number.isInteger(index) || index < 0 || index >= this.lastCurve.costs.length) {
      return undefined;
    }
    return this.lastCurve.costs[index];
  }

  getRecommendedOffset(): number {
    return this.recommendedOffset;
  }

  getLocalIntensity(): Float64Array {
    return this.local.slice();
  }

  getRemoteIntensity(): Float64Array {
    return this.remote.slice();
  }

  getHistory(): SpectralSnapshot[] {
    return [...this.history];
  }

  /**
   * 清空所有状态（例如换波段）
   */
  reset(): void {
    this.local.fill(0);
    this.remote.fill(0);
    this.history = [];
    this.lastLocalIngestMs = null;
    this.lastCurve = null;
    this.recommendedOffset = Math.floor(this.config.bandwidthHz / 2);
  }

  private isInWindow(frequency: number): boolean {
    return Number.isFinite(frequency) && frequency >= 0 && frequency < this.config.bandwidthHz;
  }

  private isProtected(center: number): boolean {
    return this.protectedFrequency !== null &&
      Math.abs(center - this.protectedFrequency) <= this.config.protectRadiusHz;
  }

  private raiseRange(target: Float64Array, center: number, halfWidth: number, intensity: number): void {
    const start = Math.max(0, center - halfWidth);
    const end = Math.min(target.length - 1, center + halfWidth);
    for (let i = start; i <= end; i++) {
      if (target[i] < intensity) {
        target[i] = intensity;
      }
    }
  }

  private pushSnapshot(): void {
    const intensity = new Array<number>(this.local.length);
    for (let i = 0; i < this.local.length; i++) {
      intensity[i] = Math.max(this.local[i], this.remote[i]);
    }
    this.history.push({ timestamp: this.clock.now(), intensity });
    if (this.history.length > this.config.historyDepth) {
      this.history.splice(0, this.history.length - this.config.historyDepth);
    }
  }
}
