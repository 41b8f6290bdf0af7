import {
  PathStatus,
  StrategyAction,
  type PathStatusValue,
  type Prediction,
  type PredictionFeatures,
  type PredictorConfig,
  type StrategyActionValue,
  type StrategyRecommendation,
} from '@pileup-intel/contracts';
import type { SessionTracker } from '../session/SessionTracker.js';
import {
  clampProbability,
  formatPercent,
  parseCompetitionCount,
  type PileupPredictor,
} from './shared.js';

const DEFAULT_TARGET_SNR = -15;

function readTargetSnr(features: PredictionFeatures): number {
  const raw = features.target_snr;
  if (raw === undefined) {
    return DEFAULT_TARGET_SNR;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? Math.trunc(value) : DEFAULT_TARGET_SNR;
}

function baseFromSnr(snr: number): number {
  if (snr >= 0) return 0.40;
  if (snr >= -5) return 0.35;
  if (snr >= -10) return 0.25;
  if (snr >= -15) return 0.15;
  return 0.05;
}

/**
 * 启发式预测器（没有外部评分器时使用）
 * 只看目标信噪比、堆叠大小和路径状态，置信度恒为 low
 */
export class HeuristicPredictor implements PileupPredictor {
  constructor(
    private readonly tracker: SessionTracker,
    private readonly config: PredictorConfig,
  ) {}

  predictSuccess(targetCall: string, features: PredictionFeatures, pathStatus: PathStatusValue = PathStatus.UNKNOWN): Prediction {
    const targetSnr = readTargetSnr(features);
    const base = baseFromSnr(targetSnr);
    const factors: Record<string, number> = {};

    const pileup = this.tracker.getPileupInfo();
    if (pileup) {
      if (pileup.size === 0) factors.pileup = 1.5;
      else if (pileup.size <= 5) factors.pileup = 1.0;
      else if (pileup.size <= 10) factors.pileup = 0.7;
      else factors.pileup = 0.4;
    }

    if (pathStatus === PathStatus.CONNECTED) {
      factors.path = 2.0;
    } else if (pathStatus === PathStatus.PATH_OPEN) {
      factors.path = 1.3;
    } else if (pathStatus === PathStatus.NO_PATH) {
      factors.path = 0.2;
    }

    let probability = base;
    for (const value of Object.values(factors)) {
      probability *= value;
    }
    probability = clampProbability(probability);

    let explanation = `Heuristic: SNR ${targetSnr} dB`;
    if (pathStatus !== PathStatus.UNKNOWN) {
      explanation += ` | Path: ${pathStatus}`;
    }
    explanation += ` → ${formatPercent(probability)}`;

    return {
      probability,
      modelContribution: base,
      liveFactors: factors,
      explanation,
      confidence: 'low',
    };
  }

  getStrategy(targetCall: string, pathStatus: PathStatusValue = PathStatus.UNKNOWN, competitionText = ''): StrategyRecommendation {
    const pileup = this.tracker.getPileupInfo();
    const status = this.tracker.getYourStatus();

    const reasons: string[] = [];
    let action: StrategyActionValue = StrategyAction.CALL_NOW;

    if (pathStatus === PathStatus.NO_PATH) {
      action = StrategyAction.TRY_LATER;
      reasons.push('No path to target');
    } else if (pathStatus === PathStatus.CONNECTED) {
      reasons.push('Target hears you!');
    } else if (pathStatus === PathStatus.PATH_OPEN) {
      reasons.push('Path is open');
    }

    const localSize = pileup?.size ?? 0;
    const targetCount = parseCompetitionCount(competitionText);
    const effectiveSize = Math.max(localSize, targetCount);
    const hidden = targetCount > localSize;

    if (action !== StrategyAction.TRY_LATER) {
      if (effectiveSize === 0) {
        reasons.push('No competition');
      } else if (effectiveSize <= 3) {
        reasons.push(hidden ? `Competition at target (${targetCount})` : `Light pileup (${effectiveSize} callers)`);
      } else if (effectiveSize <= 8) {
        reasons.push(hidden ? `Hidden pileup at target (${targetCount} stations)` : `Moderate pileup (${effectiveSize} callers)`);
      } else {
        // 路径已知时仍然建议呼叫
        if (pathStatus === PathStatus.UNKNOWN) {
          action = StrategyAction.WAIT;
        }
        reasons.push(hidden ? `Heavy hidden pileup (${targetCount} at target)` : `Heavy pileup (${effectiveSize} callers)`);
      }
    }

    if (status.inPileup) {
      if (status.rank.kind === 'unknown') {
        reasons.push("You're calling");
      } else if (status.rank.kind === 'known') {
        if (status.rank.rank === 1) {
          reasons.push("You're loudest - good position");
        } else if (status.rank.rank <= 3) {
          reasons.push(`Rank #${status.rank.rank} - decent position`);
        }
      }
    }

    return {
      targetCall: targetCall.toUpperCase(),
      recommendedAction: action,
      reasons: reasons.slice(0, this.config.maxReasons),
    };
  }
}
