import { EventEmitter } from 'eventemitter3';
import {
  PileupMessageType,
  type AnsweredCall,
  type Decode,
  type ParsedMessage,
  type PickingPattern,
  type PileupInfo,
  type TargetBehavior,
  type TrackerConfig,
  type YourRank,
  type YourStatus,
} from '@pileup-intel/contracts';
import { PileupMessageParser } from '../parser/pileup-message-parser.js';
import { PatternAnalyzer } from '../pattern/PatternAnalyzer.js';
import type { ClockSource } from '../clock/ClockSource.js';
import { ClockSourceSystem } from '../clock/ClockSourceSystem.js';
import { TargetSession } from './TargetSession.js';

export interface SessionTrackerEvents {
  'pileupUpdated': (session: TargetSession) => void;
  'answerDetected': (answer: AnsweredCall, session: TargetSession) => void;
  'patternDetected': (pattern: PickingPattern, session: TargetSession) => void;
  /** 目标直接呼叫我方 */
  'targetCallingMe': (decode: Decode, session: TargetSession) => void;
  'targetCq': (session: TargetSession) => void;
}

export interface SessionTrackerOptions {
  myCallsign: string;
  config: TrackerConfig;
  clock?: ClockSource;
}

/**
 * 堆叠会话跟踪器
 *
 * 根据解码流维护当前目标的呼叫者、应答历史和挑选风格。
 * 没有当前会话时，所有解码都被静默忽略。
 */
export class SessionTracker extends EventEmitter<SessionTrackerEvents> {
  private readonly myCallsign: string;
  private readonly config: TrackerConfig;
  private readonly clock: ClockSource;

  private currentSession: TargetSession | null = null;
  private readonly sessions = new Map<string, TargetSession>();

  // 周期记录
  private currentCycle = 0;
  private lastCycleMark: number | null = null;

  // 我方发射状态
  private txEnabled = false;
  private txCalling: string | null = null;
  private txFrequency: number | null = null;

  constructor(options: SessionTrackerOptions) {
    super();
    this.myCallsign = options.myCallsign.toUpperCase();
    this.config = options.config;
    this.clock = options.clock ?? new ClockSourceSystem();
  }

  getMyCallsign(): string {
    return this.myCallsign;
  }

  /**
   * 设置当前目标，已有会话则复用
   */
  setTarget(callsign: string, grid?: string, frequency?: number): TargetSession {
    const call = callsign.toUpperCase();
    let session = this.sessions.get(call);

    if (!session) {
      session = new TargetSession({
        callsign: call,
        grid,
        frequency,
        started: this.clock.now(),
      });
      this.sessions.set(call, session);
    } else {
      if (grid && !session.grid) {
        session.grid = grid;
      }
      if (frequency) {
        session.frequency = frequency;
      }
    }

    this.currentSession = session;
    console.log(`🎯 [SessionTracker] 目标已设置: ${call}`);
    return session;
  }

  /**
   * 放弃当前目标（会话仍保留）
   */
  clearTarget(): void {
    if (this.currentSession) {
      console.log(`🎯 [SessionTracker] 目标已清除: ${this.currentSession.callsign}`);
    }
    this.currentSession = null;
  }

  clearAll(): void {
    this.currentSession = null;
    this.sessions.clear();
    this.currentCycle = 0;
    this.lastCycleMark = null;
  }

  removeSession(callsign: string): boolean {
    const call = callsign.toUpperCase();
    if (this.currentSession?.callsign === call) {
      this.currentSession = null;
    }
    return this.sessions.delete(call);
  }

  getCurrentSession(): TargetSession | null {
    return this.currentSession;
  }

  getSession(callsign: string): TargetSession | undefined {
    return this.sessions.get(callsign.toUpperCase());
  }

  getActiveSessions(): TargetSession[] {
    return [...this.sessions.values()];
  }

  getCurrentCycle(): number {
    return this.currentCycle;
  }

  // ========== 我方发射状态 ==========

  /**
   * @param calling 正在呼叫的对方呼号，不提供时视为呼叫当前目标
   */
  setTxStatus(enabled: boolean, calling?: string | null): void {
    this.txEnabled = enabled;
    if (calling !== undefined) {
      this.txCalling = calling ? calling.toUpperCase() : null;
    }
  }

  setTxFrequency(frequency: number | null): void {
    this.txFrequency = frequency;
  }

  getTxFrequency(): number | null {
    return this.txFrequency;
  }

  /**
   * 记录我方发出的一条消息
   * @returns 是否计入了当前目标的呼叫次数
   */
  recordOwnTransmission(message: string): boolean {
    const session = this.currentSession;
    if (!session) {
      return false;
    }

    const parsed = PileupMessageParser.parse(message);
    if (parsed.caller !== this.myCallsign || parsed.callee !== session.callsign) {
      return false;
    }

    session.callsMade += 1;
    return true;
  }

  // ========== 解码处理 ==========

  processDecode(decode: Decode): void {
    const parsed = PileupMessageParser.parse(decode.message);
    if (!parsed.caller) {
      return;
    }

    this.updateCycle(decode.timestamp);

    const session = this.currentSession;
    if (!session) {
      return;
    }

    if (parsed.isCq && parsed.caller === session.callsign) {
      this.handleTargetCq(session, decode, parsed);
      return;
    }

    if (parsed.callee === session.callsign) {
      this.handlePileupCall(session, decode, parsed.caller, parsed);
      return;
    }

    if (parsed.caller === session.callsign && parsed.callee) {
      if (parsed.callee === this.myCallsign) {
        console.log(`📢 [SessionTracker] 目标正在呼叫我方: ${decode.message}`);
        this.emit('targetCallingMe', decode, session);
      } else {
        this.handleTargetAnswer(session, decode, parsed.callee);
      }
    }
  }

  private handleTargetCq(session: TargetSession, decode: Decode, parsed: ParsedMessage): void {
    session.cqCount += 1;
    session.lastActivity = decode.timestamp;

    if (parsed.grid && !session.grid) {
      session.grid = parsed.grid;
    }
    if (decode.freq) {
      session.frequency = decode.freq;
    }

    console.debug(`📡 [SessionTracker] ${session.callsign} CQ #${session.cqCount} @ ${session.frequency}Hz`);
    this.emit('targetCq', session);
  }

  private handlePileupCall(session: TargetSession, decode: Decode, caller: string, parsed: ParsedMessage): void {
    // 网格只在携带网格的消息里出现
    const grid = parsed.messageType === PileupMessageType.GRID ? parsed.grid : undefined;
    session.upsertCaller(caller, decode.freq, decode.snr, decode.timestamp, grid);

    console.debug(`👥 [SessionTracker] ${caller} 呼叫 ${session.callsign} @ ${decode.freq}Hz (${decode.snr}dB)，堆叠 ${session.pileupSize}`);
    this.emit('pileupUpdated', session);
  }

  private handleTargetAnswer(session: TargetSession, decode: Decode, answeredCall: string): void {
    const answer = session.recordAnswer(
      answeredCall,
      this.currentCycle,
      decode.timestamp,
      this.config.loudestToleranceDb,
    );

    if (!answer) {
      // 同一通联的后续消息
      session.lastActivity = decode.timestamp;
      return;
    }

    console.log(`✅ [SessionTracker] ${session.callsign} 应答了 ${answeredCall} (排名 ${answer.snrRank}/${answer.pileupSize}${answer.wasLoudest ? '，最强' : ''})`);
    this.emit('answerDetected', answer, session);

    if (session.answeredCalls.length >= this.config.minAnswersForPattern) {
      const pattern = this.analyzePattern(session);
      if (pattern) {
        this.emit('patternDetected', pattern, session);
      }
    }
  }

  private updateCycle(timestamp: number): void {
    if (this.lastCycleMark === null) {
      this.lastCycleMark = timestamp;
      this.currentCycle = 0;
      return;
    }

    const elapsedSeconds = (timestamp - this.lastCycleMark) / 1000;
    if (elapsedSeconds < this.config.cycleSeconds) {
      return;
    }

    const cyclesPassed = Math.floor(elapsedSeconds / this.config.cycleSeconds);
    this.currentCycle += cyclesPassed;
    this.lastCycleMark = timestamp;

    if (this.currentSession) {
      this.currentSession.cycleCount += cyclesPassed;
      const removed = this.currentSession.pruneStaleCallers(timestamp, this.config.staleSeconds);
      if (removed.length > 0) {
        console.debug(`🧹 [SessionTracker] 移除过期呼叫者: ${removed.join(', ')}`);
      }
    }
  }

  private analyzePattern(session: TargetSession): PickingPattern | null {
    return PatternAnalyzer.analyze(session.answeredCalls, {
      window: this.config.patternWindow,
      minAnswers: this.config.minAnswersForPattern,
    });
  }

  // ========== 查询 ==========

  private computeRank(session: TargetSession, sortedCallsigns: readonly string[]): YourRank {
    const index = sortedCallsigns.indexOf(this.myCallsign);
    if (index >= 0) {
      return { kind: 'known', rank: index + 1 };
    }
    if (this.txEnabled && (this.txCalling === null || this.txCalling === session.callsign)) {
      // 听不到自己
      return { kind: 'unknown' };
    }
    return { kind: 'not_in_pileup' };
  }

  getPileupInfo(): PileupInfo | null {
    const session = this.currentSession;
    if (!session) {
      return null;
    }

    const callers = session.getCallersBySnr();
    const info: PileupInfo = {
      size: callers.length,
      callers,
      yourRank: this.computeRank(session, callers.map(caller => caller.callsign)),
    };

    if (callers.length > 0) {
      const frequencies = callers.map(caller => caller.frequency);
      info.loudest = callers[0];
      info.frequencyRange = {
        low: Math.min(...frequencies),
        high: Math.max(...frequencies),
      };
    }

    return info;
  }

  getTargetBehavior(): TargetBehavior | null {
    const session = this.currentSession;
    if (!session) {
      return null;
    }

    const behavior: TargetBehavior = {
      callsign: session.callsign,
      qsoCount: session.qsoCount,
      qsoRate: session.qsoRatePerMinute(this.clock.now()),
      cqCount: session.cqCount,
      answers: session.answeredCalls.slice(-this.config.patternWindow),
    };

    const pattern = this.analyzePattern(session);
    if (pattern) {
      behavior.pattern = pattern;
    }
    return behavior;
  }

  getYourStatus(): YourStatus {
    const session = this.currentSession;
    const status: YourStatus = {
      inPileup: false,
      rank: { kind: 'not_in_pileup' },
      total: 0,
      callsMade: 0,
    };

    if (session) {
      status.rank = this.computeRank(session, session.getCallersBySnr().map(caller => caller.callsign));
      status.inPileup = status.rank.kind !== 'not_in_pileup';
      status.total = session.pileupSize;
      status.callsMade = session.callsMade;
    }

    if (this.txFrequency !== null) {
      status.yourFrequency = this.txFrequency;
    }
    return status;
  }
}
