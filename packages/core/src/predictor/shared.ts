import type {
  PathStatusValue,
  Prediction,
  PredictionFeatures,
  StrategyRecommendation,
} from '@pileup-intel/contracts';

/**
 * 成功率预测器的公共接口（贝叶斯 / 启发式）
 */
export interface PileupPredictor {
  predictSuccess(targetCall: string, features: PredictionFeatures, pathStatus: PathStatusValue): Prediction;
  getStrategy(targetCall: string, pathStatus: PathStatusValue, competitionText?: string): StrategyRecommendation;
}

export const MIN_PROBABILITY = 0.01;
export const MAX_PROBABILITY = 0.99;

export function clampProbability(p: number): number {
  return Math.max(MIN_PROBABILITY, Math.min(MAX_PROBABILITY, p));
}

/**
 * 0.514 → "51%"
 */
export function formatPercent(p: number): string {
  return `${Math.round(p * 100)}%`;
}

/**
 * 从目标侧竞争描述中取出括号里的电台数，如 "High (5)" → 5
 * 无法解析时返回 0
 */
export function parseCompetitionCount(text: string | undefined): number {
  if (!text || !text.includes('(')) {
    return 0;
  }
  const inner = text.split('(')[1].split(')')[0].trim();
  if (!/^[+-]?\d+$/.test(inner)) {
    return 0;
  }
  return parseInt(inner, 10);
}
