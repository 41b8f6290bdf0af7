import { PickingStyle, type AnsweredCall, type PickingPattern, type PickingStyleValue } from '@pileup-intel/contracts';

export interface PatternAnalyzerOptions {
  /** 只看最近 N 条应答 */
  window?: number;
  /** 少于该数量不下结论 */
  minAnswers?: number;
}

const DEFAULT_WINDOW = 10;
const DEFAULT_MIN_ANSWERS = 5;

const STYLE_ADVICE: Record<PickingStyleValue, string> = {
  [PickingStyle.LOUDEST_FIRST]: 'Target picks loudest signals. Strong signal advantage.',
  [PickingStyle.METHODICAL_LOW_HIGH]: 'Target working low-to-high. Position at lower frequencies.',
  [PickingStyle.METHODICAL_HIGH_LOW]: 'Target working high-to-low. Position at higher frequencies.',
  [PickingStyle.RANDOM]: 'No clear pattern. Persistence matters.',
  [PickingStyle.UNKNOWN]: 'Not enough answers observed yet.',
};

/**
 * 平均秩（并列取平均）
 */
function averageRanks(values: readonly number[]): number[] {
  const order = values.map((value, index) => ({ value, index })).sort((a, b) => a.value - b.value);
  const ranks = new Array<number>(values.length);

  let i = 0;
  while (i < order.length) {
    let j = i;
    while (j + 1 < order.length && order[j + 1].value === order[i].value) {
      j++;
    }
    // 秩从 1 开始
    const rank = (i + j) / 2 + 1;
    for (let k = i; k <= j; k++) {
      ranks[order[k].index] = rank;
    }
    i = j + 1;
  }

  return ranks;
}

/**
 * Spearman 秩相关系数
 * 任一侧无方差时返回 0
 */
export function spearmanCorrelation(xs: readonly number[], ys: readonly number[]): number {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) {
    return 0;
  }

  const rx = averageRanks(xs.slice(0, n));
  const ry = averageRanks(ys.slice(0, n));
  const meanX = rx.reduce((sum, v) => sum + v, 0) / n;
  const meanY = ry.reduce((sum, v) => sum + v, 0) / n;

  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;
  for (let i = 0; i < n; i++) {
    const dx = rx[i] - meanX;
    const dy = ry[i] - meanY;
    covariance += dx * dy;
    varianceX += dx * dx;
    varianceY += dy * dy;
  }

  if (varianceX === 0 || varianceY === 0) {
    return 0;
  }
  return covariance / Math.sqrt(varianceX * varianceY);
}

/**
 * 目标挑选风格分析
 */
export class PatternAnalyzer {

  static adviceFor(style: PickingStyleValue): string {
    return STYLE_ADVICE[style];
  }

  /**
   * 分析最近的应答记录
   * @returns 样本不足时返回 null
   */
  static analyze(answers: readonly AnsweredCall[], options: PatternAnalyzerOptions = {}): PickingPattern | null {
    const window = options.window ?? DEFAULT_WINDOW;
    const minAnswers = options.minAnswers ?? DEFAULT_MIN_ANSWERS;

    const recent = answers.slice(-window);
    if (recent.length < minAnswers || recent.length === 0) {
      return null;
    }

    const loudestPickRatio = recent.filter(answer => answer.wasLoudest).length / recent.length;
    const frequencyCorrelation = recent.length >= 3
      ? spearmanCorrelation(recent.map((_, index) => index), recent.map(answer => answer.frequency))
      : 0;

    let style: PickingStyleValue;
    let confidence: number;

    if (loudestPickRatio >= 0.6) {
      style = PickingStyle.LOUDEST_FIRST;
      confidence = loudestPickRatio;
    } else if (frequencyCorrelation > 0.5) {
      style = PickingStyle.METHODICAL_LOW_HIGH;
      confidence = frequencyCorrelation;
    } else if (frequencyCorrelation < -0.5) {
      style = PickingStyle.METHODICAL_HIGH_LOW;
      confidence = Math.abs(frequencyCorrelation);
    } else {
      style = PickingStyle.RANDOM;
      confidence = 1 - loudestPickRatio;
    }

    return {
      style,
      confidence,
      sampleSize: recent.length,
      advice: STYLE_ADVICE[style],
      loudestPickRatio,
      frequencyCorrelation,
    };
  }
}
