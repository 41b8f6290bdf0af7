import type { AnsweredCall, PileupMember } from '@pileup-intel/contracts';

export interface TargetSessionInit {
  callsign: string;
  grid?: string;
  frequency?: number;
  started: number;
}

/**
 * 单个目标电台的跟踪会话
 * 只由 SessionTracker 修改
 */
export class TargetSession {
  readonly callsign: string;
  grid?: string;
  /** 目标的发射音频频率（Hz），0 表示未知 */
  frequency: number;
  readonly started: number;
  lastActivity?: number;

  cqCount = 0;
  qsoCount = 0;
  cycleCount = 0;
  /** 我方呼叫该目标的次数 */
  callsMade = 0;

  readonly callers = new Map<string, PileupMember>();
  readonly answeredCalls: AnsweredCall[] = [];

  constructor(init: TargetSessionInit) {
    this.callsign = init.callsign;
    this.grid = init.grid;
    this.frequency = init.frequency ?? 0;
    this.started = init.started;
  }

  get pileupSize(): number {
    return this.callers.size;
  }

  /**
   * 每分钟 QSO 数
   */
  qsoRatePerMinute(now: number): number {
    if (this.qsoCount === 0) {
      return 0;
    }
    const elapsedMinutes = (now - this.started) / 60000;
    return this.qsoCount / Math.max(0.1, elapsedMinutes);
  }

  /**
   * 新增或更新一个呼叫者
   */
  upsertCaller(callsign: string, frequency: number, snr: number, seenAt: number, grid?: string): PileupMember {
    const existing = this.callers.get(callsign);
    if (existing) {
      existing.frequency = frequency;
      existing.snr = snr;
      existing.lastSeen = seenAt;
      existing.callCount += 1;
      if (grid) {
        existing.grid = grid;
      }
      return existing;
    }

    const member: PileupMember = {
      callsign,
      frequency,
      snr,
      grid,
      firstSeen: seenAt,
      lastSeen: seenAt,
      callCount: 1,
    };
    this.callers.set(callsign, member);
    return member;
  }

  /**
   * 按信噪比降序排列的呼叫者（同 SNR 保持加入顺序）
   */
  getCallersBySnr(): PileupMember[] {
    return [...this.callers.values()].sort((a, b) => b.snr - a.snr);
  }

  /**
   * 记录目标应答了某个呼叫者，并清空当前堆叠
   * @returns 新的应答记录；被应答方不在堆叠中时返回 null
   */
  recordAnswer(callsign: string, cycleNumber: number, answeredAt: number, loudestToleranceDb: number): AnsweredCall | null {
    const caller = this.callers.get(callsign);
    if (!caller) {
      return null;
    }

    const ranking = this.getCallersBySnr();
    const snrRank = ranking.findIndex(member => member.callsign === callsign) + 1;
    const maxSnr = ranking[0]?.snr ?? caller.snr;

    const answered: AnsweredCall = {
      callsign,
      frequency: caller.frequency,
      snr: caller.snr,
      answeredAt,
      cycleNumber,
      callsBeforeAnswer: caller.callCount,
      snrRank,
      pileupSize: this.callers.size,
      wasLoudest: caller.snr >= maxSnr - loudestToleranceDb,
    };

    this.answeredCalls.push(answered);
    this.qsoCount += 1;
    this.lastActivity = answeredAt;

    // 新一轮堆叠从下个周期开始
    this.callers.clear();

    return answered;
  }

  /**
   * 移除超过 maxAgeSeconds 未出现的呼叫者
   * @returns 被移除的呼号
   */
  pruneStaleCallers(now: number, maxAgeSeconds: number): string[] {
    const removed: string[] = [];
    for (const [callsign, member] of this.callers) {
      if ((now - member.lastSeen) / 1000 > maxAgeSeconds) {
        removed.push(callsign);
      }
    }
    for (const callsign of removed) {
      this.callers.delete(callsign);
    }
    return removed;
  }
}
