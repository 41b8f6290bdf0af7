import { z } from 'zod';

/**
 * 正在呼叫目标的电台
 */
export const PileupMemberSchema = z.object({
  callsign: z.string(),
  /** 最近一次出现的音频频率（Hz） */
  frequency: z.number(),
  /** 本地收到的信噪比 */
  snr: z.number(),
  grid: z.string().optional(),
  firstSeen: z.number(),
  lastSeen: z.number(),
  callCount: z.number().int().default(1),
});

/**
 * 目标应答记录（只追加）
 */
export const AnsweredCallSchema = z.object({
  callsign: z.string(),
  frequency: z.number(),
  snr: z.number(),
  answeredAt: z.number(),
  cycleNumber: z.number().int(),
  callsBeforeAnswer: z.number().int(),
  /** 应答时的信号排名（1 = 最强） */
  snrRank: z.number().int(),
  pileupSize: z.number().int(),
  /** 应答时是否为（容差内）最强信号 */
  wasLoudest: z.boolean(),
});

// 目标挑选呼叫者的风格
export const PickingStyle = {
  UNKNOWN: 'unknown',
  LOUDEST_FIRST: 'loudest_first',
  METHODICAL_LOW_HIGH: 'methodical_low_high',
  METHODICAL_HIGH_LOW: 'methodical_high_low',
  RANDOM: 'random',
} as const;

export const PickingStyleSchema = z.enum([
  PickingStyle.UNKNOWN,
  PickingStyle.LOUDEST_FIRST,
  PickingStyle.METHODICAL_LOW_HIGH,
  PickingStyle.METHODICAL_HIGH_LOW,
  PickingStyle.RANDOM,
]);

export const PickingPatternSchema = z.object({
  style: PickingStyleSchema,
  confidence: z.number().min(0).max(1),
  sampleSize: z.number().int(),
  advice: z.string(),
  loudestPickRatio: z.number(),
  frequencyCorrelation: z.number(),
});

/**
 * 我方在堆叠中的排名
 * - known: 在呼叫者中看到了自己
 * - unknown: 正在发射，但听不到自己
 * - not_in_pileup: 没有在呼叫该目标
 */
export const YourRankSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('known'), rank: z.number().int().positive() }),
  z.object({ kind: z.literal('unknown') }),
  z.object({ kind: z.literal('not_in_pileup') }),
]);

export const FrequencyRangeSchema = z.object({
  low: z.number(),
  high: z.number(),
});

export const PileupInfoSchema = z.object({
  size: z.number().int(),
  /** 按信噪比降序 */
  callers: z.array(PileupMemberSchema),
  yourRank: YourRankSchema,
  loudest: PileupMemberSchema.optional(),
  frequencyRange: FrequencyRangeSchema.optional(),
});

export const TargetBehaviorSchema = z.object({
  callsign: z.string(),
  qsoCount: z.number().int(),
  /** 每分钟 QSO 数 */
  qsoRate: z.number(),
  cqCount: z.number().int(),
  answers: z.array(AnsweredCallSchema),
  pattern: PickingPatternSchema.optional(),
});

export const YourStatusSchema = z.object({
  inPileup: z.boolean(),
  rank: YourRankSchema,
  total: z.number().int(),
  callsMade: z.number().int(),
  yourFrequency: z.number().optional(),
});

export type PileupMember = z.infer<typeof PileupMemberSchema>;
export type AnsweredCall = z.infer<typeof AnsweredCallSchema>;
export type PickingStyleValue = z.infer<typeof PickingStyleSchema>;
export type PickingPattern = z.infer<typeof PickingPatternSchema>;
export type YourRank = z.infer<typeof YourRankSchema>;
export type FrequencyRange = z.infer<typeof FrequencyRangeSchema>;
export type PileupInfo = z.infer<typeof PileupInfoSchema>;
export type TargetBehavior = z.infer<typeof TargetBehaviorSchema>;
export type YourStatus = z.infer<typeof YourStatusSchema>;
