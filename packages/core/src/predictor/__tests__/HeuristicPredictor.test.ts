import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PathStatus, PredictorConfigSchema, StrategyAction, TrackerConfigSchema, type Decode } from '@pileup-intel/contracts';
import { ClockSourceMock } from '../../clock/ClockSourceMock.js';
import { SessionTracker } from '../../session/SessionTracker.js';
import { HeuristicPredictor } from '../HeuristicPredictor.js';

function decode(message: string, snr: number, freq: number, timestamp: number): Decode {
  return { timestamp, snr, dt: 0, freq, mode: 'FT8', message };
}

function createFixture() {
  const tracker = new SessionTracker({
    myCallsign: 'K9ME',
    config: TrackerConfigSchema.parse({}),
    clock: new ClockSourceMock(0),
  });
  const predictor = new HeuristicPredictor(tracker, PredictorConfigSchema.parse({}));
  return { tracker, predictor };
}

describe('HeuristicPredictor', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('predictSuccess', () => {
    it('只有 SNR 时使用分档基准', () => {
      const { predictor } = createFixture();

      const prediction = predictor.predictSuccess('DX1X', { target_snr: 0 }, PathStatus.UNKNOWN);

      expect(prediction).toEqual({
        probability: 0.4,
        modelContribution: 0.4,
        liveFactors: {},
        explanation: 'Heuristic: SNR 0 dB → 40%',
        confidence: 'low',
      });
    });

    it.each([
      [5, 0.40],
      [-5, 0.35],
      [-10, 0.25],
      [-15, 0.15],
      [-16, 0.05],
    ])('SNR %d dB → 基准 %f', (snr, expected) => {
      const { predictor } = createFixture();
      expect(predictor.predictSuccess('DX1X', { target_snr: snr }, PathStatus.UNKNOWN).modelContribution).toBe(expected);
    });

    it('缺少或无效的 SNR 按 -15 dB 处理，字符串可以解析', () => {
      const { predictor } = createFixture();
      expect(predictor.predictSuccess('DX1X', {}, PathStatus.UNKNOWN).modelContribution).toBe(0.15);
      expect(predictor.predictSuccess('DX1X', { target_snr: 'weak' }, PathStatus.UNKNOWN).modelContribution).toBe(0.15);
      expect(predictor.predictSuccess('DX1X', { target_snr: '-7' }, PathStatus.UNKNOWN).modelContribution).toBe(0.25);
    });

    it('乘上堆叠和路径因子', () => {
      const { tracker, predictor } = createFixture();
      tracker.setTarget('DX1X');

      const prediction = predictor.predictSuccess('DX1X', { target_snr: -12 }, PathStatus.CONNECTED);

      expect(prediction.liveFactors).toEqual({ pileup: 1.5, path: 2 });
      expect(prediction.probability).toBeCloseTo(0.45, 10);
      expect(prediction.explanation).toBe('Heuristic: SNR -12 dB | Path: connected → 45%');
      expect(prediction.confidence).toBe('low');
    });

    it('结果被钳制', () => {
      const { tracker, predictor } = createFixture();
      tracker.setTarget('DX1X');

      expect(predictor.predictSuccess('DX1X', { target_snr: 10 }, PathStatus.CONNECTED).probability).toBe(0.99);
      expect(predictor.predictSuccess('DX1X', { target_snr: -20 }, PathStatus.NO_PATH).probability).toBeCloseTo(0.015, 10);
    });
  });

  describe('getStrategy', () => {
    it('没有路径时 try_later', () => {
      const { predictor } = createFixture();
      const strategy = predictor.getStrategy('dx1x', PathStatus.NO_PATH, 'PILEUP (30)');
      expect(strategy).toEqual({
        targetCall: 'DX1X',
        recommendedAction: StrategyAction.TRY_LATER,
        reasons: ['No path to target'],
      });
    });

    it('路径未知且目标侧堆叠很大时等待', () => {
      const { predictor } = createFixture();
      const strategy = predictor.getStrategy('DX1X', PathStatus.UNKNOWN, 'PILEUP (9)');
      expect(strategy.recommendedAction).toBe(StrategyAction.WAIT);
      expect(strategy.reasons).toEqual(['Heavy hidden pileup (9 at target)']);
    });

    it('路径已开通时即使堆叠很大也呼叫', () => {
      const { predictor } = createFixture();
      const strategy = predictor.getStrategy('DX1X', PathStatus.PATH_OPEN, 'PILEUP (9)');
      expect(strategy.recommendedAction).toBe(StrategyAction.CALL_NOW);
      expect(strategy.reasons).toEqual(['Path is open', 'Heavy hidden pileup (9 at target)']);
    });

    it('报告我方排名', () => {
      const { tracker, predictor } = createFixture();
      tracker.setTarget('DX1X');
      tracker.processDecode(decode('DX1X K1AA FN42', -8, 900, 0));
      tracker.processDecode(decode('DX1X K9ME FN42', -2, 1000, 10));

      const strategy = predictor.getStrategy('DX1X', PathStatus.UNKNOWN);

      expect(strategy.reasons).toEqual(['Light pileup (2 callers)', "You're loudest - good position"]);
    });

    it('正在发射时提示正在呼叫', () => {
      const { tracker, predictor } = createFixture();
      tracker.setTarget('DX1X');
      tracker.setTxStatus(true);

      expect(predictor.getStrategy('DX1X', PathStatus.CONNECTED).reasons).toEqual([
        'Target hears you!',
        'No competition',
        "You're calling",
      ]);
    });
  });
});
