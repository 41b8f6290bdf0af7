import {
  PathStatus,
  PickingStyle,
  PriorScorerResultSchema,
  StrategyAction,
  type ConfidenceLevel,
  type PathStatusValue,
  type PileupInfo,
  type Prediction,
  type PredictionFeatures,
  type PredictorConfig,
  type PriorScorer,
  type StrategyActionValue,
  type StrategyRecommendation,
  type TargetBehavior,
  type YourStatus,
} from '@pileup-intel/contracts';
import type { SessionTracker } from '../session/SessionTracker.js';
import { PredictionCache } from './PredictionCache.js';
import {
  clampProbability,
  formatPercent,
  parseCompetitionCount,
  type PileupPredictor,
} from './shared.js';

/** 因子名（与 FactorWeights 的键一致）→ 乘数 */
export type LiveFactors = Record<string, number>;

/**
 * 先验概率 + 实时因子的对数几率融合
 * 因子 ≤ 0 或非有限值时忽略
 */
export function fuseLogOdds(
  prior: number,
  factors: Iterable<readonly [string, number]>,
  weights: Readonly<Record<string, number>> = {},
): number {
  const p = Math.max(0.001, Math.min(0.999, prior));
  let logOdds = Math.log(p / (1 - p));

  for (const [name, value] of factors) {
    if (!Number.isFinite(value) || value <= 0) {
      continue;
    }
    logOdds += (weights[name] ?? 1) * Math.log(value);
  }

  return clampProbability(1 / (1 + Math.exp(-logOdds)));
}

export interface BayesianPredictorOptions {
  tracker: SessionTracker;
  config: PredictorConfig;
  cache: PredictionCache<Prediction>;
  priorScorer?: PriorScorer | null;
}

interface PriorEstimate {
  probability: number;
  modelAvailable: boolean;
}

/**
 * 贝叶斯预测器
 *
 * 先验来自外部评分器（没有时用默认值），再用堆叠大小、信号排名、
 * 目标挑选风格、传播路径和坚持程度修正。
 */
export class BayesianPredictor implements PileupPredictor {
  private readonly tracker: SessionTracker;
  private readonly config: PredictorConfig;
  private readonly cache: PredictionCache<Prediction>;
  private priorScorer: PriorScorer | null;

  constructor(options: BayesianPredictorOptions) {
    this.tracker = options.tracker;
    this.config = options.config;
    this.cache = options.cache;
    this.priorScorer = options.priorScorer ?? null;
  }

  setPriorScorer(scorer: PriorScorer | null): void {
    this.priorScorer = scorer;
    this.cache.invalidate();
  }

  predictSuccess(targetCall: string, features: PredictionFeatures, pathStatus: PathStatusValue = PathStatus.UNKNOWN): Prediction {
    const call = targetCall.toUpperCase();
    const cacheKey = PredictionCache.makeKey(`success|${call}|${pathStatus}`, features);
    const cached = this.cache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const prior = this.estimatePrior(features);
    const pileup = this.tracker.getPileupInfo();
    const behavior = this.tracker.getTargetBehavior();
    const status = this.tracker.getYourStatus();

    const liveFactors = this.calculateLiveFactors(pileup, behavior, status, pathStatus);
    const probability = fuseLogOdds(prior.probability, Object.entries(liveFactors), this.config.factorWeights);

    const prediction: Prediction = {
      probability,
      modelContribution: prior.probability,
      liveFactors,
      explanation: this.explain(prior, liveFactors, probability, pathStatus),
      confidence: this.assessConfidence(prior.modelAvailable, pileup !== null, behavior?.qsoCount ?? 0),
    };

    this.cache.set(cacheKey, prediction);
    return prediction;
  }

  /**
   * 调用外部评分器；返回 null、格式不对或抛出异常都视为没有模型
   */
  private estimatePrior(features: PredictionFeatures): PriorEstimate {
    const fallback: PriorEstimate = { probability: this.config.defaultPrior, modelAvailable: false };
    const scorer = this.priorScorer;
    if (!scorer) {
      return fallback;
    }

    try {
      if (!scorer.hasModel(this.config.modelName)) {
        return fallback;
      }
      const raw = scorer.predict(this.config.modelName, features);
      const parsed = PriorScorerResultSchema.safeParse(raw);
      if (!parsed.success) {
        if (raw !== null) {
          console.warn(`⚠️ [BayesianPredictor] 评分器返回值无效，使用默认先验`);
        }
        return fallback;
      }
      const { prediction, confidence } = parsed.data;
      return {
        probability: prediction === 1 ? confidence : 1 - confidence,
        modelAvailable: true,
      };
    } catch (error) {
      console.warn(`⚠️ [BayesianPredictor] 评分器调用失败，使用默认先验:`, error);
      return fallback;
    }
  }

  private calculateLiveFactors(
    pileup: PileupInfo | null,
    behavior: TargetBehavior | null,
    status: YourStatus,
    pathStatus: PathStatusValue,
  ): LiveFactors {
    const factors: LiveFactors = {};

    if (pileup) {
      const size = pileup.size;
      if (size === 0) factors.pileup = 1.5;
      else if (size <= 3) factors.pileup = 1.2;
      else if (size <= 6) factors.pileup = 1.0;
      else if (size <= 10) factors.pileup = 0.7;
      else factors.pileup = 0.4;
    }

    if (status.rank.kind === 'known') {
      const rank = status.rank.rank;
      if (rank === 1) factors.snr_rank = 1.4;
      else if (rank <= 3) factors.snr_rank = 1.2;
      else if (rank <= Math.floor(status.total / 2)) factors.snr_rank = 1.0;
      else factors.snr_rank = 0.7;
    }

    const behaviorFactor = this.behaviorMatch(pileup, behavior, status);
    if (behaviorFactor !== null) {
      factors.behavior_match = behaviorFactor;
    }

    switch (pathStatus) {
      case PathStatus.CONNECTED:
        factors.path = 2.0;
        break;
      case PathStatus.PATH_OPEN:
        factors.path = 1.3;
        break;
      case PathStatus.NO_PATH:
        factors.path = 0.3;
        break;
      default:
        factors.path = 1.0;
    }

    const calls = status.callsMade;
    if (calls === 0) factors.persistence = 1.0;
    else if (calls <= 2) factors.persistence = 1.05;
    else if (calls <= 5) factors.persistence = 1.0;
    else factors.persistence = 0.95;

    return factors;
  }

  private behaviorMatch(pileup: PileupInfo | null, behavior: TargetBehavior | null, status: YourStatus): number | null {
    const pattern = behavior?.pattern;
    if (!pattern) {
      return null;
    }

    switch (pattern.style) {
      case PickingStyle.LOUDEST_FIRST: {
        // 排名未知或不在堆叠中时不参与
        if (status.rank.kind !== 'known') {
          return null;
        }
        if (status.rank.rank === 1) return 1.5;
        if (status.rank.rank <= 3) return 1.1;
        return 0.6;
      }
      case PickingStyle.METHODICAL_LOW_HIGH:
      case PickingStyle.METHODICAL_HIGH_LOW: {
        const range = pileup?.frequencyRange;
        if (!range || status.yourFrequency === undefined) {
          return null;
        }
        const span = range.high - range.low;
        const matches = pattern.style === PickingStyle.METHODICAL_LOW_HIGH
          ? status.yourFrequency <= range.low + span * 0.3
          : status.yourFrequency >= range.low + span * 0.7;
        return matches ? 1.3 : 0.8;
      }
      case PickingStyle.RANDOM:
        return status.callsMade >= 3 ? 1.1 : 1.0;
      default:
        return null;
    }
  }

  private assessConfidence(modelAvailable: boolean, liveDataAvailable: boolean, sampleSize: number): ConfidenceLevel {
    if (modelAvailable && liveDataAvailable && sampleSize >= 5) {
      return 'high';
    }
    if (modelAvailable || (liveDataAvailable && sampleSize >= 3)) {
      return 'medium';
    }
    return 'low';
  }

  private explain(prior: PriorEstimate, factors: LiveFactors, posterior: number, pathStatus: PathStatusValue): string {
    const parts: string[] = [
      `${prior.modelAvailable ? 'Model' : 'Base'}: ${formatPercent(prior.probability)}`,
    ];

    for (const [name, value] of Object.entries(factors)) {
      if (value < 0.7) {
        parts.push(`↓${name}`);
      } else if (value > 1.3) {
        parts.push(`↑${name}`);
      }
    }

    if (pathStatus === PathStatus.CONNECTED) {
      parts.push('★CONNECTED');
    } else if (pathStatus === PathStatus.NO_PATH) {
      parts.push('⚠no_path');
    }

    parts.push(`→ ${formatPercent(posterior)}`);
    return parts.join(' | ');
  }

  getStrategy(targetCall: string, pathStatus: PathStatusValue = PathStatus.UNKNOWN, competitionText = ''): StrategyRecommendation {
    const pileup = this.tracker.getPileupInfo();
    const behavior = this.tracker.getTargetBehavior();
    const status = this.tracker.getYourStatus();

    const reasons: string[] = [];
    let action: StrategyActionValue = StrategyAction.CALL_NOW;
    let recommendedFrequency: number | undefined;

    if (pathStatus === PathStatus.NO_PATH) {
      action = StrategyAction.TRY_LATER;
      reasons.push('No path or no TX');
    } else if (pathStatus === PathStatus.CONNECTED) {
      reasons.push('Target hears you!');
    } else if (pathStatus === PathStatus.PATH_OPEN) {
      reasons.push('Path is open');
    }

    const localSize = pileup?.size ?? 0;
    const targetCount = parseCompetitionCount(competitionText);
    const effectiveSize = Math.max(localSize, targetCount);

    if (action !== StrategyAction.TRY_LATER) {
      if (effectiveSize === 0) {
        reasons.push('No competition');
      } else if (effectiveSize > 10) {
        reasons.push(`Heavy pileup (${effectiveSize} stations)`);
        if (pathStatus !== PathStatus.CONNECTED) {
          action = StrategyAction.WAIT;
        }
      } else if (effectiveSize >= 4) {
        reasons.push(targetCount > localSize
          ? `Hidden pileup at target (${targetCount} stations)`
          : `Moderate competition (${effectiveSize} stations)`);
      } else {
        reasons.push(targetCount > localSize
          ? `Competition at target (${targetCount})`
          : `Light competition (${effectiveSize})`);
      }

      if (pileup) {
        if (status.rank.kind === 'unknown') {
          reasons.push("You're calling");
        } else if (status.rank.kind === 'known') {
          const rank = status.rank.rank;
          if (rank === 1) {
            reasons.push("You're the loudest signal");
          } else if (rank <= 3) {
            reasons.push(`You're #${rank} by signal strength`);
          } else {
            reasons.push(`You're #${rank}/${localSize} - consider waiting`);
          }
        }
      }
    }

    const pattern = behavior?.pattern;
    if (pattern && action !== StrategyAction.TRY_LATER) {
      if (pattern.style === PickingStyle.LOUDEST_FIRST) {
        reasons.push('Target picks loudest first');
        if (status.rank.kind === 'known' && status.rank.rank > 3) {
          reasons.push('Consider QSYing when conditions improve');
        }
      } else if (pattern.style === PickingStyle.METHODICAL_LOW_HIGH || pattern.style === PickingStyle.METHODICAL_HIGH_LOW) {
        reasons.push(`Target working ${pattern.style.replace(/_/g, ' ')}`);
        const range = pileup?.frequencyRange;
        if (range) {
          if (pattern.style === PickingStyle.METHODICAL_LOW_HIGH) {
            recommendedFrequency = range.low - 60;
            reasons.push('Position at lower frequency');
          } else {
            recommendedFrequency = range.high + 60;
            reasons.push('Position at higher frequency');
          }
        }
      } else if (pattern.style === PickingStyle.RANDOM) {
        reasons.push('No clear pattern - persistence helps');
      }
    }

    if (behavior && action !== StrategyAction.TRY_LATER && behavior.qsoRate > 0) {
      const rate = behavior.qsoRate.toFixed(1);
      if (behavior.qsoRate >= 2) {
        reasons.push(`Fast QSO rate (${rate}/min)`);
      } else if (behavior.qsoRate >= 1) {
        reasons.push(`Steady QSO rate (${rate}/min)`);
      } else {
        reasons.push(`Slow QSO rate (${rate}/min)`);
      }
    }

    const recommendation: StrategyRecommendation = {
      targetCall: targetCall.toUpperCase(),
      recommendedAction: action,
      reasons: reasons.slice(0, this.config.maxReasons),
    };
    if (recommendedFrequency !== undefined) {
      recommendation.recommendedFrequency = recommendedFrequency;
    }
    return recommendation;
  }

  /**
   * 失效缓存的预测
   * @param targetCall 只失效该目标；不提供时全部失效
   */
  invalidateCache(targetCall?: string): void {
    const removed = targetCall
      ? this.cache.invalidate(`|${targetCall.toUpperCase()}|`)
      : this.cache.invalidate();
    if (removed > 0) {
      console.debug(`🗑️ [BayesianPredictor] 已失效 ${removed} 条缓存预测`);
    }
  }
}
