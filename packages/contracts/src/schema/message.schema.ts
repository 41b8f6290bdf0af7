import { z } from 'zod';

// 消息类型常量
export const PileupMessageType = {
  CQ: 'cq',             // CQ呼叫
  CALL: 'call',         // 只有两个呼号的呼叫
  GRID: 'grid',         // 带网格的呼叫
  REPORT: 'report',     // 信号报告
  ROGER_REPORT: 'r_report', // R+报告
  RRR: 'rrr',
  RR73: 'rr73',
  SEVENTY_THREE: '73',
  UNKNOWN: 'unknown',
} as const;

export const PileupMessageTypeSchema = z.enum([
  PileupMessageType.CQ,
  PileupMessageType.CALL,
  PileupMessageType.GRID,
  PileupMessageType.REPORT,
  PileupMessageType.ROGER_REPORT,
  PileupMessageType.RRR,
  PileupMessageType.RR73,
  PileupMessageType.SEVENTY_THREE,
  PileupMessageType.UNKNOWN,
]);

/**
 * 消息分类结果
 * 无法解析的消息返回空结果（type=unknown，无呼号，所有标志为false）
 */
export const ParsedMessageSchema = z.object({
  messageType: PileupMessageTypeSchema,
  /** 发送方 */
  caller: z.string().optional(),
  /** 被呼叫方 */
  callee: z.string().optional(),
  grid: z.string().optional(),
  report: z.number().optional(),
  isCq: z.boolean(),
  isReply: z.boolean(),
  /** RR73 / 73 */
  isFinal: z.boolean(),
});

export type PileupMessageTypeValue = z.infer<typeof PileupMessageTypeSchema>;
export type ParsedMessage = z.infer<typeof ParsedMessageSchema>;
