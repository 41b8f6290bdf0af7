import { EventEmitter } from 'eventemitter3';
import {
  DecodeSchema,
  EngineConfigSchema,
  PathStatus,
  SpotSchema,
  type Decode,
  type EngineConfig,
  type EngineConfigInput,
  type EngineInsights,
  type InterferenceReport,
  type PathStatusValue,
  type PileupEngineEvents,
  type PileupInfo,
  type Prediction,
  type PredictionFeatures,
  type PriorScorer,
  type PriorScorerResult,
  type StrategyRecommendation,
  type TargetBehavior,
  type YourStatus,
} from '@pileup-intel/contracts';
import {
  BayesianPredictor,
  ClockSourceSystem,
  HeuristicPredictor,
  MultiTargetTracker,
  PileupMessageParser,
  PredictionCache,
  SessionTracker,
  SpectralOccupancyMap,
  type ClockSource,
  type PileupPredictor,
  type TargetSession,
} from '@pileup-intel/core';
import { PeriodicTask } from './scheduling/PeriodicTask.js';
import { ErrorBoundary } from './utils/ErrorBoundary.js';
import { PileupError } from './utils/errors/PileupError.js';

export interface PileupIntelligenceEngineOptions {
  myCallsign: string;
  config?: EngineConfigInput;
  clock?: ClockSource;
  priorScorer?: PriorScorer | null;
}

function describeIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string {
  return issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * 堆叠情报引擎
 *
 * 把解码流、远端收听记录和发射状态汇总到频谱占用图、会话跟踪器和预测器，
 * 对 UI 层只暴露查询方法和事件。
 */
export class PileupIntelligenceEngine extends EventEmitter<PileupEngineEvents> {
  private readonly config: EngineConfig;
  private readonly clock: ClockSource;

  private readonly spectralMap: SpectralOccupancyMap;
  private readonly tracker: SessionTracker;
  private readonly watchTracker: MultiTargetTracker;
  private readonly bayesian: BayesianPredictor;
  private readonly heuristic: HeuristicPredictor;

  private readonly decayTask: PeriodicTask;
  private readonly refreshTask: PeriodicTask;

  private hasPriorScorer = false;
  private pathStatus: PathStatusValue = PathStatus.UNKNOWN;
  private competitionText = '';
  private dialFrequency: number | null = null;
  /** 最近一次听到目标的 SNR */
  private targetSnr: number | null = null;
  private latestInsights: EngineInsights | null = null;

  constructor(options: PileupIntelligenceEngineOptions) {
    super();

    this.config = EngineConfigSchema.parse(options.config ?? {});
    this.clock = options.clock ?? new ClockSourceSystem();

    this.spectralMap = new SpectralOccupancyMap(this.config.spectrum, this.clock);
    this.tracker = new SessionTracker({
      myCallsign: options.myCallsign,
      config: this.config.tracker,
      clock: this.clock,
    });
    this.watchTracker = new MultiTargetTracker({
      myCallsign: options.myCallsign,
      config: this.config.tracker,
      clock: this.clock,
    });

    this.bayesian = new BayesianPredictor({
      tracker: this.tracker,
      config: this.config.predictor,
      cache: new PredictionCache<Prediction>({
        maxSize: this.config.predictor.cacheMaxSize,
        ttlMs: this.config.predictor.cacheTtlMs,
        clock: this.clock,
      }),
    });
    this.heuristic = new HeuristicPredictor(this.tracker, this.config.predictor);
    this.setPriorScorer(options.priorScorer ?? null);

    this.decayTask = new PeriodicTask({
      name: 'decay',
      intervalMs: this.config.scheduler.decayIntervalMs,
      task: () => {
        this.decayTick();
      },
    });
    this.refreshTask = new PeriodicTask({
      name: 'refresh',
      intervalMs: this.config.scheduler.refreshIntervalMs,
      task: () => {
        this.refreshInsights();
      },
    });

    this.setupListeners();
    console.log(`🚀 [PileupEngine] 引擎已创建，我方呼号: ${this.tracker.getMyCallsign()}`);
  }

  private setupListeners(): void {
    this.tracker.on('pileupUpdated', session => {
      this.emitPileup(session);
    });

    this.tracker.on('answerDetected', (answer, session) => {
      this.emit('answerDetected', session.callsign, answer);
      // 应答后堆叠清空
      this.emitPileup(session);
    });

    this.tracker.on('patternDetected', (pattern, session) => {
      console.log(`🧭 [PileupEngine] ${session.callsign} 挑选风格: ${pattern.style} (${(pattern.confidence * 100).toFixed(0)}%)`);
      this.emit('patternDetected', session.callsign, pattern);
    });

    this.tracker.on('targetCallingMe', (decode, session) => {
      this.emit('targetCallingMe', session.callsign, decode);
    });

    this.tracker.on('targetCq', session => {
      this.protectTargetFrequency(session);
    });

    this.spectralMap.on('recommendationChanged', offset => {
      this.emit('recommendationChanged', offset);
    });
  }

  private emitPileup(session: TargetSession): void {
    const info = this.tracker.getPileupInfo();
    if (info) {
      this.emit('pileupUpdated', session.callsign, info);
    }
  }

  private protectTargetFrequency(session: TargetSession): void {
    this.spectralMap.setProtectedFrequency(session.frequency > 0 ? session.frequency : null);
  }

  // ========== 输入 ==========

  ingestDecode(decode: unknown): void {
    this.ingestDecodes([decode]);
  }

  /**
   * 处理一批解码：校验、补全派生字段、送入会话跟踪器与频谱图
   */
  ingestDecodes(decodes: readonly unknown[]): void {
    const accepted: Decode[] = [];

    for (const raw of decodes) {
      const result = DecodeSchema.safeParse(raw);
      if (!result.success) {
        const error = PileupError.invalidDecode(describeIssues(result.error.issues), raw);
        console.warn(`⚠️ [PileupEngine] 丢弃无效解码: ${error.toString()}`);
        this.emit('decodeRejected', { reason: error.message, raw });
        continue;
      }

      const decode = this.enrichDecode(result.data);
      this.trackTargetSnr(decode);
      this.tracker.processDecode(decode);
      this.watchTracker.processDecode(decode);
      accepted.push(decode);
    }

    if (accepted.length > 0) {
      this.spectralMap.ingestLocalDecodes(accepted);
    }
  }

  private enrichDecode(decode: Decode): Decode {
    if (decode.callsign !== undefined) {
      return decode;
    }

    const parsed = PileupMessageParser.parse(decode.message);
    const enriched: Decode = { ...decode, isCq: decode.isCq ?? parsed.isCq, isReply: decode.isReply ?? parsed.isReply };
    if (parsed.caller) {
      enriched.callsign = parsed.caller;
    }
    if (decode.grid === undefined && parsed.grid) {
      enriched.grid = parsed.grid;
    }
    if (decode.replyingTo === undefined && parsed.callee) {
      enriched.replyingTo = parsed.callee;
    }
    return enriched;
  }

  private trackTargetSnr(decode: Decode): void {
    const session = this.tracker.getCurrentSession();
    if (session && decode.callsign?.toUpperCase() === session.callsign) {
      this.targetSnr = decode.snr;
    }
  }

  /**
   * 远端收听记录 → 干扰条目
   */
  ingestSpotBatch(spots: readonly unknown[]): void {
    const nowSec = this.clock.now() / 1000;
    const bandwidth = this.config.spectrum.bandwidthHz;
    const reports: InterferenceReport[] = [];

    for (const raw of spots) {
      const result = SpotSchema.safeParse(raw);
      if (!result.success) {
        const error = PileupError.invalidSpot(describeIssues(result.error.issues), raw);
        console.warn(`⚠️ [PileupEngine] 丢弃无效收听记录: ${error.toString()}`);
        continue;
      }

      const spot = result.data;
      const offset = this.dialFrequency !== null && spot.freq >= bandwidth
        ? spot.freq - this.dialFrequency
        : spot.freq;
      if (offset < 0 || offset >= bandwidth) {
        continue;
      }

      reports.push({
        offset,
        snr: spot.snr,
        age: Math.max(0, nowSec - spot.time),
      });
    }

    this.spectralMap.ingestRemoteInterference(reports);
  }

  /**
   * 电台拨号频率（Hz），用于把射频频率换算为音频偏移
   */
  setDialFrequency(frequency: number | null): void {
    this.dialFrequency = frequency;
  }

  // ========== 频谱 ==========

  decayTick(): boolean {
    return this.spectralMap.decayTick();
  }

  findBestGap(): number {
    return this.spectralMap.findBestGap();
  }

  getSpectralMap(): SpectralOccupancyMap {
    return this.spectralMap;
  }

  // ========== 目标与发射状态 ==========

  setTarget(callsign: string, grid?: string, frequency?: number): void {
    const previous = this.tracker.getCurrentSession();
    const session = this.tracker.setTarget(callsign, grid, frequency);

    if (previous !== session) {
      this.targetSnr = null;
      this.pathStatus = PathStatus.UNKNOWN;
      this.competitionText = '';
      this.latestInsights = null;
      if (previous) {
        this.bayesian.invalidateCache(previous.callsign);
      }
      this.bayesian.invalidateCache(session.callsign);
    }

    this.protectTargetFrequency(session);
  }

  clearTarget(): void {
    const previous = this.tracker.getCurrentSession();
    this.tracker.clearTarget();
    this.spectralMap.setProtectedFrequency(null);
    this.targetSnr = null;
    this.latestInsights = null;
    if (previous) {
      this.bayesian.invalidateCache(previous.callsign);
    }
  }

  setPathStatus(status: PathStatusValue): void {
    if (status === this.pathStatus) {
      return;
    }
    this.pathStatus = status;
    const session = this.tracker.getCurrentSession();
    if (session) {
      this.bayesian.invalidateCache(session.callsign);
    }
  }

  getPathStatus(): PathStatusValue {
    return this.pathStatus;
  }

  /**
   * 目标侧竞争标签，如 "High (5)"
   */
  setCompetitionText(text: string): void {
    this.competitionText = text;
  }

  setTxStatus(enabled: boolean, calling?: string | null): void {
    this.tracker.setTxStatus(enabled, calling);
    this.watchTracker.setTxStatus(enabled, calling);
  }

  setTxFrequency(frequency: number | null): void {
    this.tracker.setTxFrequency(frequency);
    this.watchTracker.setTxFrequency(frequency);
  }

  recordOwnTransmission(message: string): boolean {
    return this.tracker.recordOwnTransmission(message);
  }

  // ========== 多目标 ==========

  watchTarget(callsign: string, grid?: string): void {
    this.watchTracker.addTarget(callsign, grid);
  }

  unwatchTarget(callsign: string): boolean {
    return this.watchTracker.removeTarget(callsign);
  }

  getWatchedTargets(): string[] {
    return this.watchTracker.getTrackedTargets();
  }

  getBestTarget(): string | null {
    return this.watchTracker.getBestTarget();
  }

  // ========== 查询 ==========

  getPileupInfo(): PileupInfo | null {
    return this.tracker.getPileupInfo();
  }

  getTargetBehavior(): TargetBehavior | null {
    return this.tracker.getTargetBehavior();
  }

  getYourStatus(): YourStatus {
    return this.tracker.getYourStatus();
  }

  // ========== 预测 ==========

  /**
   * 设置外部先验评分器；null 表示回退到启发式预测
   */
  setPriorScorer(scorer: PriorScorer | null): void {
    this.hasPriorScorer = scorer !== null;
    this.bayesian.setPriorScorer(scorer ? this.guardScorer(scorer) : null);
  }

  /**
   * 评分器抛出的异常视为"没有模型"
   */
  private guardScorer(scorer: PriorScorer): PriorScorer {
    return {
      hasModel: modelName => ErrorBoundary.executeSync(
        {
          operationName: '先验评分器 hasModel',
          fallback: false,
          errorTransform: error => PileupError.scorerFailed(modelName, error),
        },
        () => scorer.hasModel(modelName)
      ),
      predict: (modelName, features) => ErrorBoundary.executeSync<PriorScorerResult | null, null>(
        {
          operationName: '先验评分器 predict',
          fallback: null,
          errorTransform: error => PileupError.scorerFailed(modelName, error),
        },
        () => scorer.predict(modelName, features)
      ),
    };
  }

  private get predictor(): PileupPredictor {
    return this.hasPriorScorer ? this.bayesian : this.heuristic;
  }

  predictSuccess(targetCall: string, features: PredictionFeatures = {}, pathStatus: PathStatusValue = this.pathStatus): Prediction {
    return this.predictor.predictSuccess(targetCall, features, pathStatus);
  }

  getStrategy(
    targetCall: string,
    pathStatus: PathStatusValue = this.pathStatus,
    competitionText: string = this.competitionText,
  ): StrategyRecommendation {
    return this.predictor.getStrategy(targetCall, pathStatus, competitionText);
  }

  /**
   * 刷新时传给预测器的特征
   */
  private buildFeatures(): PredictionFeatures {
    const features: PredictionFeatures = {};
    if (this.targetSnr !== null) {
      features.target_snr = this.targetSnr;
    }
    return features;
  }

  // ========== 定时刷新 ==========

  /**
   * 重新计算当前目标的预测与策略；不修改跟踪状态
   * 失败时保留上一次的结果
   */
  refreshInsights(): EngineInsights | null {
    const session = this.tracker.getCurrentSession();
    if (!session) {
      return null;
    }

    const insights = ErrorBoundary.executeSync<EngineInsights, EngineInsights | null>(
      {
        operationName: '刷新洞察',
        fallback: this.latestInsights,
      },
      () => {
        const prediction = this.predictSuccess(session.callsign, this.buildFeatures());
        const strategy: StrategyRecommendation = {
          ...this.getStrategy(session.callsign),
          successProbability: prediction.probability,
        };
        return {
          targetCall: session.callsign,
          pathStatus: this.pathStatus,
          prediction,
          strategy,
          pileup: this.tracker.getPileupInfo(),
          recommendedOffset: this.spectralMap.getRecommendedOffset(),
          timestamp: this.clock.now(),
        };
      }
    );

    if (insights && insights !== this.latestInsights) {
      this.latestInsights = insights;
      this.emit('insightsUpdated', insights);
    }
    return insights;
  }

  getLatestInsights(): EngineInsights | null {
    return this.latestInsights;
  }

  // ========== 生命周期 ==========

  start(): void {
    if (this.decayTask.isRunning() && this.refreshTask.isRunning()) {
      return;
    }
    console.log('▶️ [PileupEngine] 启动定时任务');
    this.decayTask.start();
    this.refreshTask.start();
  }

  stop(): void {
    if (!this.decayTask.isRunning() && !this.refreshTask.isRunning()) {
      return;
    }
    this.decayTask.stop();
    this.refreshTask.stop();
    console.log('⏹️ [PileupEngine] 定时任务已停止');
  }

  isRunning(): boolean {
    return this.decayTask.isRunning() && this.refreshTask.isRunning();
  }

  getConfig(): EngineConfig {
    return structuredClone(this.config);
  }
}
