import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  PathStatus,
  PredictorConfigSchema,
  StrategyAction,
  TrackerConfigSchema,
  type Decode,
  type Prediction,
  type PriorScorer,
} from '@pileup-intel/contracts';
import { ClockSourceMock } from '../../clock/ClockSourceMock.js';
import { SessionTracker } from '../../session/SessionTracker.js';
import { BayesianPredictor, fuseLogOdds } from '../BayesianPredictor.js';
import { PredictionCache } from '../PredictionCache.js';
import { parseCompetitionCount } from '../shared.js';

function decode(message: string, snr: number, freq: number, timestamp: number): Decode {
  return { timestamp, snr, dt: 0, freq, mode: 'FT8', message };
}

function createFixture(priorScorer?: PriorScorer) {
  const clock = new ClockSourceMock(0);
  const tracker = new SessionTracker({ myCallsign: 'K9ME', config: TrackerConfigSchema.parse({}), clock });
  const cache = new PredictionCache<Prediction>({ maxSize: 500, ttlMs: 30000, clock });
  const predictor = new BayesianPredictor({
    tracker,
    config: PredictorConfigSchema.parse({}),
    cache,
    priorScorer,
  });
  return { clock, tracker, cache, predictor };
}

function fixedScorer(prediction: 0 | 1, confidence: number): PriorScorer {
  return {
    hasModel: () => true,
    predict: () => ({ prediction, confidence }),
  };
}

/** 五轮：目标每次都应答最强的呼叫者 */
function playLoudestRounds(tracker: SessionTracker): void {
  for (let i = 1; i <= 5; i++) {
    const t = i * 30000;
    tracker.processDecode(decode(`DX1X K${i}AA FN42`, -5, 800, t));
    tracker.processDecode(decode(`DX1X N${i}BB FN31`, -12, 1200, t + 100));
    tracker.processDecode(decode(`K${i}AA DX1X -05`, -8, 1730, t + 15000));
  }
}

/** 五轮：目标从低到高应答较弱的呼叫者 */
function playLowToHighRounds(tracker: SessionTracker): void {
  for (let i = 1; i <= 5; i++) {
    const t = i * 30000;
    tracker.processDecode(decode(`DX1X K${i}AA FN42`, -5, 2500, t));
    tracker.processDecode(decode(`DX1X N${i}BB FN31`, -15, 500 + i * 100, t + 100));
    tracker.processDecode(decode(`N${i}BB DX1X -15`, -8, 1730, t + 15000));
  }
}

describe('fuseLogOdds', () => {
  it('与因子顺序无关', () => {
    const factors: Array<[string, number]> = [['pileup', 1.2], ['path', 0.3], ['persistence', 1.05]];
    const weights = { pileup: 1, path: 1.5, persistence: 0.8 };

    const forward = fuseLogOdds(0.2, factors, weights);
    const reversed = fuseLogOdds(0.2, [...factors].reverse(), weights);

    expect(forward).toBeCloseTo(reversed, 12);
  });

  it('结果钳制在 [0.01, 0.99]', () => {
    expect(fuseLogOdds(0.999, [['path', 100]])).toBe(0.99);
    expect(fuseLogOdds(0, [])).toBe(0.01);
  });

  it('没有因子时返回先验', () => {
    expect(fuseLogOdds(0.2, [])).toBeCloseTo(0.2, 12);
  });
});

describe('parseCompetitionCount', () => {
  it.each([
    ['High (5)', 5],
    ['PILEUP (8)', 8],
    ['Low', 0],
    ['Busy (x)', 0],
    ['', 0],
  ])('"%s" → %d', (text, expected) => {
    expect(parseCompetitionCount(text)).toBe(expected);
  });
});

describe('BayesianPredictor', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('predictSuccess', () => {
    it('默认先验 + 空堆叠 + 已连通', () => {
      const { tracker, predictor } = createFixture();
      tracker.setTarget('DX1X');

      const prediction = predictor.predictSuccess('DX1X', {}, PathStatus.CONNECTED);

      expect(prediction.probability).toBeGreaterThan(0.2);
      expect(prediction.probability).toBeLessThan(0.99);
      expect(prediction.probability).toBeCloseTo(0.5147, 4);
      expect(prediction.modelContribution).toBe(0.2);
      expect(prediction.liveFactors).toEqual({ pileup: 1.5, path: 2, persistence: 1 });
      expect(prediction.explanation).toBe('Base: 20% | ↑pileup | ↑path | ★CONNECTED | → 51%');
      expect(prediction.confidence).toBe('low');
    });

    it('没有会话时不计入堆叠因子', () => {
      const { predictor } = createFixture();

      const prediction = predictor.predictSuccess('DX1X', {}, PathStatus.NO_PATH);

      expect(prediction.liveFactors).toEqual({ path: 0.3, persistence: 1 });
      expect(prediction.explanation).toContain('⚠no_path');
      expect(prediction.probability).toBeLessThan(0.2);
    });

    it('评分器预测为正时使用其置信度作为先验', () => {
      const { predictor } = createFixture(fixedScorer(1, 0.7));

      const prediction = predictor.predictSuccess('DX1X', { target_snr: -8 }, PathStatus.UNKNOWN);

      expect(prediction.modelContribution).toBe(0.7);
      expect(prediction.probability).toBeCloseTo(0.7, 10);
      expect(prediction.explanation).toBe('Model: 70% | → 70%');
      expect(prediction.confidence).toBe('medium');
    });

    it('评分器预测为负时先验为 1 − 置信度', () => {
      const { predictor } = createFixture(fixedScorer(0, 0.7));
      expect(predictor.predictSuccess('DX1X', {}, PathStatus.UNKNOWN).modelContribution).toBeCloseTo(0.3, 10);
    });

    it('评分器抛出异常时视为没有模型', () => {
      const { predictor } = createFixture({
        hasModel: () => true,
        predict: () => {
          throw new Error('model crashed');
        },
      });

      const prediction = predictor.predictSuccess('DX1X', {}, PathStatus.UNKNOWN);

      expect(prediction.modelContribution).toBe(0.2);
      expect(prediction.explanation.startsWith('Base: 20%')).toBe(true);
      expect(prediction.confidence).toBe('low');
      expect(console.warn).toHaveBeenCalled();
    });

    it('评分器返回 null 时使用默认先验', () => {
      const { predictor } = createFixture({ hasModel: () => true, predict: () => null });
      expect(predictor.predictSuccess('DX1X', {}, PathStatus.UNKNOWN).modelContribution).toBe(0.2);
    });

    it('缓存命中、按目标失效和过期', () => {
      const { clock, predictor } = createFixture();

      const first = predictor.predictSuccess('DX1X', { target_snr: -10 }, PathStatus.UNKNOWN);
      expect(predictor.predictSuccess('dx1x', { target_snr: -10 }, PathStatus.UNKNOWN)).toBe(first);

      predictor.invalidateCache('DX2Y');
      expect(predictor.predictSuccess('DX1X', { target_snr: -10 }, PathStatus.UNKNOWN)).toBe(first);

      predictor.invalidateCache('DX1X');
      const second = predictor.predictSuccess('DX1X', { target_snr: -10 }, PathStatus.UNKNOWN);
      expect(second).not.toBe(first);

      clock.advance(30001);
      expect(predictor.predictSuccess('DX1X', { target_snr: -10 }, PathStatus.UNKNOWN)).not.toBe(second);
    });

    it('最强优先的目标 + 我方排名第一', () => {
      const { tracker, predictor } = createFixture(fixedScorer(1, 0.5));
      tracker.setTarget('DX1X');
      playLoudestRounds(tracker);
      tracker.processDecode(decode('DX1X K9ME FN42', -1, 900, 200000));
      tracker.processDecode(decode('DX1X W1CC EM10', -10, 1000, 200100));

      const prediction = predictor.predictSuccess('DX1X', {}, PathStatus.UNKNOWN);

      expect(prediction.liveFactors).toEqual({
        pileup: 1.2,
        snr_rank: 1.4,
        behavior_match: 1.5,
        path: 1,
        persistence: 1,
      });
      expect(prediction.confidence).toBe('high');
    });

    it('最强优先的目标 + 不在堆叠中时不做行为调整', () => {
      const { tracker, predictor } = createFixture();
      tracker.setTarget('DX1X');
      playLoudestRounds(tracker);

      const prediction = predictor.predictSuccess('DX1X', {}, PathStatus.UNKNOWN);

      expect(prediction.liveFactors).toEqual({ pileup: 1.5, path: 1, persistence: 1 });
      expect(prediction.liveFactors).not.toHaveProperty('behavior_match');
      expect(prediction.explanation).toBe(`Base: 20% | ↑pileup | → ${Math.round(prediction.probability * 100)}%`);
      expect(prediction.confidence).toBe('medium');
    });

    it('排名未知时既没有排名因子也没有风格因子', () => {
      const { tracker, predictor } = createFixture();
      tracker.setTarget('DX1X');
      playLoudestRounds(tracker);
      tracker.setTxStatus(true);

      const prediction = predictor.predictSuccess('DX1X', {}, PathStatus.UNKNOWN);

      expect(prediction.liveFactors).toEqual({ pileup: 1.5, path: 1, persistence: 1 });
    });

    it('从低到高挑选时按我方频率位置给出因子', () => {
      const { tracker, predictor } = createFixture();
      tracker.setTarget('DX1X');
      playLowToHighRounds(tracker);
      tracker.processDecode(decode('DX1X W1CC EM10', -10, 1000, 200000));
      tracker.processDecode(decode('DX1X W2DD EM10', -12, 2000, 200100));

      expect(predictor.predictSuccess('DX1X', {}, PathStatus.UNKNOWN).liveFactors.behavior_match).toBeUndefined();

      tracker.setTxFrequency(1100);
      predictor.invalidateCache();
      expect(predictor.predictSuccess('DX1X', {}, PathStatus.UNKNOWN).liveFactors.behavior_match).toBe(1.3);

      tracker.setTxFrequency(1800);
      predictor.invalidateCache();
      expect(predictor.predictSuccess('DX1X', {}, PathStatus.UNKNOWN).liveFactors.behavior_match).toBe(0.8);
    });

    it('坚持因子随呼叫次数变化', () => {
      const { tracker, predictor } = createFixture();
      tracker.setTarget('DX1X');
      tracker.recordOwnTransmission('DX1X K9ME FN42');

      expect(predictor.predictSuccess('DX1X', {}, PathStatus.UNKNOWN).liveFactors.persistence).toBe(1.05);
    });
  });

  describe('getStrategy', () => {
    it('没有路径时总是 try_later', () => {
      const { tracker, predictor } = createFixture();
      tracker.setTarget('DX1X');
      for (let i = 0; i < 12; i++) {
        tracker.processDecode(decode(`DX1X K${i}AB FN42`, -10 - i, 500 + i * 100, i * 10));
      }

      const strategy = predictor.getStrategy('DX1X', PathStatus.NO_PATH, 'PILEUP (20)');

      expect(strategy).toEqual({
        targetCall: 'DX1X',
        recommendedAction: StrategyAction.TRY_LATER,
        reasons: ['No path or no TX'],
      });
    });

    it('目标侧大堆叠且路径未确认时等待', () => {
      const { tracker, predictor } = createFixture();
      tracker.setTarget('DX1X');

      const strategy = predictor.getStrategy('DX1X', PathStatus.UNKNOWN, 'High (12)');

      expect(strategy.recommendedAction).toBe(StrategyAction.WAIT);
      expect(strategy.reasons).toEqual(['Heavy pileup (12 stations)']);
    });

    it('已连通时即使堆叠很大也立即呼叫', () => {
      const { tracker, predictor } = createFixture();
      tracker.setTarget('DX1X');

      const strategy = predictor.getStrategy('DX1X', PathStatus.CONNECTED, 'High (12)');

      expect(strategy.recommendedAction).toBe(StrategyAction.CALL_NOW);
      expect(strategy.reasons).toEqual(['Target hears you!', 'Heavy pileup (12 stations)']);
    });

    it('目标侧竞争多于本地时提示隐藏竞争', () => {
      const { tracker, predictor } = createFixture();
      tracker.setTarget('DX1X');

      expect(predictor.getStrategy('DX1X', PathStatus.UNKNOWN, 'Low (2)').reasons).toEqual(['Competition at target (2)']);
      expect(predictor.getStrategy('DX1X', PathStatus.UNKNOWN, 'High (5)').reasons).toEqual(['Hidden pileup at target (5 stations)']);
    });

    it('从低到高挑选时建议排在堆叠下方，理由最多三条', () => {
      const { tracker, predictor } = createFixture();
      tracker.setTarget('DX1X');
      playLowToHighRounds(tracker);
      tracker.processDecode(decode('DX1X W1CC EM10', -10, 1000, 200000));
      tracker.processDecode(decode('DX1X W2DD EM10', -12, 2000, 200100));

      const strategy = predictor.getStrategy('DX1X', PathStatus.UNKNOWN);

      expect(strategy.recommendedAction).toBe(StrategyAction.CALL_NOW);
      expect(strategy.recommendedFrequency).toBe(940);
      expect(strategy.reasons).toEqual([
        'Light competition (2)',
        'Target working methodical low high',
        'Position at lower frequency',
      ]);
    });

    it('我方信号排名靠后时提示等待', () => {
      const { tracker, predictor } = createFixture();
      tracker.setTarget('DX1X');
      tracker.processDecode(decode('DX1X K1AA FN42', -1, 900, 0));
      tracker.processDecode(decode('DX1X K2AA FN42', -2, 1000, 10));
      tracker.processDecode(decode('DX1X K3AA FN42', -3, 1100, 20));
      tracker.processDecode(decode('DX1X K9ME FN42', -9, 1200, 30));

      const strategy = predictor.getStrategy('DX1X', PathStatus.PATH_OPEN);

      expect(strategy.reasons).toEqual([
        'Path is open',
        'Moderate competition (4 stations)',
        "You're #4/4 - consider waiting",
      ]);
    });
  });
});
