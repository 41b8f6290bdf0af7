import { z } from 'zod';

/**
 * 单条解码记录（由协议解码器产生）
 */
export const DecodeSchema = z.object({
  /** 时间戳（毫秒） */
  timestamp: z.number(),
  /** 信噪比（dB） */
  snr: z.number().int(),
  /** 时间偏移（秒） */
  dt: z.number(),
  /** 音频频率偏移（Hz） */
  freq: z.number().int(),
  /** 模式，如 FT8 / FT4 */
  mode: z.string().default('FT8'),
  /** 原始消息文本 */
  message: z.string(),
  /** 发射方呼号（由消息解析得出） */
  callsign: z.string().optional(),
  grid: z.string().optional(),
  isCq: z.boolean().optional(),
  isReply: z.boolean().optional(),
  /** 被呼叫方呼号 */
  replyingTo: z.string().optional(),
});

/**
 * 远端报告网络的收听记录
 */
export const SpotSchema = z.object({
  sender: z.string(),
  receiver: z.string(),
  /** 频率（Hz），可以是射频频率或音频偏移 */
  freq: z.number().int(),
  snr: z.number().int(),
  grid: z.string().default(''),
  /** 收听时间（UTC 秒） */
  time: z.number(),
});

/**
 * 远端干扰条目（由 Spot 换算得出）
 */
export const InterferenceReportSchema = z.object({
  /** 音频偏移（Hz） */
  offset: z.number(),
  snr: z.number(),
  /** 距今秒数 */
  age: z.number().nonnegative(),
});

export type Decode = z.infer<typeof DecodeSchema>;
export type DecodeInput = z.input<typeof DecodeSchema>;
export type Spot = z.infer<typeof SpotSchema>;
export type SpotInput = z.input<typeof SpotSchema>;
export type InterferenceReport = z.infer<typeof InterferenceReportSchema>;
