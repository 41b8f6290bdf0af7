import { z } from 'zod';

// 到目标的传播路径状态（由调用方根据交叉比对结果给出）
export const PathStatus = {
  CONNECTED: 'connected',
  PATH_OPEN: 'path_open',
  NO_PATH: 'no_path',
  UNKNOWN: 'unknown',
} as const;

export const PathStatusSchema = z.enum([
  PathStatus.CONNECTED,
  PathStatus.PATH_OPEN,
  PathStatus.NO_PATH,
  PathStatus.UNKNOWN,
]);

export const ConfidenceLevelSchema = z.enum(['low', 'medium', 'high']);

export const PredictionSchema = z.object({
  /** 成功概率，钳制在 [0.01, 0.99] */
  probability: z.number().min(0).max(1),
  /** 先验（模型或默认值） */
  modelContribution: z.number(),
  /** 实时因子 */
  liveFactors: z.record(z.string(), z.number()),
  explanation: z.string(),
  confidence: ConfidenceLevelSchema,
});

export const StrategyAction = {
  CALL_NOW: 'call_now',
  WAIT: 'wait',
  TRY_LATER: 'try_later',
} as const;

export const StrategyActionSchema = z.enum([
  StrategyAction.CALL_NOW,
  StrategyAction.WAIT,
  StrategyAction.TRY_LATER,
]);

export const StrategyRecommendationSchema = z.object({
  targetCall: z.string(),
  recommendedAction: StrategyActionSchema,
  /** 建议的音频频率（Hz） */
  recommendedFrequency: z.number().optional(),
  reasons: z.array(z.string()),
  /** 成功概率 [0, 1] */
  successProbability: z.number().min(0).max(1).optional(),
});

/**
 * 外部先验评分器的返回值
 */
export const PriorScorerResultSchema = z.object({
  prediction: z.union([z.literal(0), z.literal(1)]),
  confidence: z.number().min(0).max(1),
});

/**
 * 传给先验评分器的特征（键集合由插件定义）
 */
export const PredictionFeaturesSchema = z.record(z.string(), z.union([z.number(), z.string(), z.boolean()]));

export type PathStatusValue = z.infer<typeof PathStatusSchema>;
export type ConfidenceLevel = z.infer<typeof ConfidenceLevelSchema>;
export type Prediction = z.infer<typeof PredictionSchema>;
export type StrategyActionValue = z.infer<typeof StrategyActionSchema>;
export type StrategyRecommendation = z.infer<typeof StrategyRecommendationSchema>;
export type PriorScorerResult = z.infer<typeof PriorScorerResultSchema>;
export type PredictionFeatures = z.infer<typeof PredictionFeaturesSchema>;

/**
 * 先验评分器接口（黑盒）
 * 返回 null 表示没有可用模型
 */
export interface PriorScorer {
  hasModel(modelName: string): boolean;
  predict(modelName: string, features: PredictionFeatures): PriorScorerResult | null;
}
