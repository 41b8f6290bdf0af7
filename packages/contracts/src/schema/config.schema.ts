import { z } from 'zod';

// 频谱占用图 / 空档搜索配置
export const SpectrumConfigSchema = z.object({
  /** 可用音频窗口宽度（Hz），每个单元 1Hz */
  bandwidthHz: z.number().int().min(100).default(3000),
  /** 本地信号抬升半宽 */
  localHalfWidthHz: z.number().int().nonnegative().default(25),
  /** 远端干扰抬升半宽 */
  remoteHalfWidthHz: z.number().int().nonnegative().default(25),
  decayFactor: z.number().gt(0).lt(1).default(0.95),
  /** 低于此值直接归零 */
  zeroThreshold: z.number().nonnegative().default(0.5),
  /** 最后一次本地解码后多久才开始衰减（毫秒） */
  decayHoldMs: z.number().nonnegative().default(12000),
  /** 滑动窗口宽度（Hz） */
  gapWindowHz: z.number().int().min(1).default(50),
  /** 远端干扰相对本地信号的权重 */
  remoteWeight: z.number().nonnegative().default(2),
  /** 距离频带中心的线性惩罚系数 */
  centerBiasPerHz: z.number().nonnegative().default(0.01),
  /** 两侧保护带 */
  edgeGuardHz: z.number().int().nonnegative().default(200),
  /** 目标频率保护半径 */
  protectRadiusHz: z.number().int().nonnegative().default(150),
  protectPenalty: z.number().nonnegative().default(1e6),
  /** 推荐值变化小于等于该值时不更新 */
  hysteresisHz: z.number().nonnegative().default(20),
  historyDepth: z.number().int().min(1).default(60),
  remoteFullWeightAgeSec: z.number().nonnegative().default(60),
  remoteMaxAgeSec: z.number().positive().default(600),
});

// 会话跟踪配置
export const TrackerConfigSchema = z.object({
  /** 周期长度（秒），FT8 为 15 */
  cycleSeconds: z.number().positive().default(15),
  /** 呼叫者过期时间（秒） */
  staleSeconds: z.number().positive().default(300),
  /** "最强信号"判定容差（dB） */
  loudestToleranceDb: z.number().nonnegative().default(1),
  patternWindow: z.number().int().min(1).default(10),
  minAnswersForPattern: z.number().int().min(1).default(5),
});

export const FactorWeightsSchema = z.object({
  pileup: z.number().default(1.0),
  snr_rank: z.number().default(1.0),
  behavior_match: z.number().default(1.0),
  path: z.number().default(1.5),
  persistence: z.number().default(0.8),
});

// 预测配置
export const PredictorConfigSchema = z.object({
  defaultPrior: z.number().gt(0).lt(1).default(0.2),
  modelName: z.string().default('success_model'),
  cacheTtlMs: z.number().nonnegative().default(30000),
  cacheMaxSize: z.number().int().min(1).default(500),
  maxReasons: z.number().int().min(1).default(3),
  factorWeights: FactorWeightsSchema.default({}),
});

// 定时任务配置
export const SchedulerConfigSchema = z.object({
  decayIntervalMs: z.number().int().min(10).default(100),
  refreshIntervalMs: z.number().int().min(100).default(2000),
});

export const EngineConfigSchema = z.object({
  spectrum: SpectrumConfigSchema.default({}),
  tracker: TrackerConfigSchema.default({}),
  predictor: PredictorConfigSchema.default({}),
  scheduler: SchedulerConfigSchema.default({}),
});

export type SpectrumConfig = z.infer<typeof SpectrumConfigSchema>;
export type TrackerConfig = z.infer<typeof TrackerConfigSchema>;
export type FactorWeights = z.infer<typeof FactorWeightsSchema>;
export type PredictorConfig = z.infer<typeof PredictorConfigSchema>;
export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
