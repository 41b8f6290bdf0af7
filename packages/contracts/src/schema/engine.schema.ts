import { z } from 'zod';
import type { Decode } from './decode.schema.js';
import { AnsweredCallSchema, PickingPatternSchema, PileupInfoSchema } from './session.schema.js';
import { PathStatusSchema, PredictionSchema, StrategyRecommendationSchema } from './prediction.schema.js';

/**
 * 定时刷新得到的当前目标洞察
 */
export const EngineInsightsSchema = z.object({
  targetCall: z.string(),
  pathStatus: PathStatusSchema,
  prediction: PredictionSchema,
  strategy: StrategyRecommendationSchema,
  pileup: PileupInfoSchema.nullable(),
  recommendedOffset: z.number(),
  timestamp: z.number(),
});

export type EngineInsights = z.infer<typeof EngineInsightsSchema>;

/**
 * 引擎对 UI 层发出的事件
 */
export interface PileupEngineEvents {
  // 堆叠与目标行为
  pileupUpdated: (target: string, info: z.infer<typeof PileupInfoSchema>) => void;
  answerDetected: (target: string, answer: z.infer<typeof AnsweredCallSchema>) => void;
  patternDetected: (target: string, pattern: z.infer<typeof PickingPatternSchema>) => void;
  /** 目标直接呼叫我方（高优先级） */
  targetCallingMe: (target: string, decode: Decode) => void;

  // 频谱
  recommendationChanged: (offset: number) => void;

  // 定时刷新
  insightsUpdated: (insights: EngineInsights) => void;

  // 输入被丢弃
  decodeRejected: (data: { reason: string; raw: unknown }) => void;
}
