import { PileupMessageType, type ParsedMessage } from '@pileup-intel/contracts';

// 基础呼号正则表达式（更宽松的匹配）
const BASE_CALLSIGN_REGEX = /^[A-Z0-9]{1,6}$/;

// 完整呼号正则表达式（包括前缀和后缀）
const FULL_CALLSIGN_REGEX = /^[A-Z0-9]{1,8}(\/[A-Z0-9]{1,8})*$/;

// 网格：两位字母 + 两位数字，可选两位子网格字母
const GRID_REGEX = /^[A-Z]{2}[0-9]{2}([A-Z]{2})?$/;

// 信号报告
const REPORT_REGEX = /^[+-]\d{1,2}$/;

// R+报告
const ROGER_REPORT_REGEX = /^R[+-]\d{1,2}$/;

// CQ 后面的修饰标记（DX/NA/EU/POTA/TEST 等）
const CQ_FLAG_REGEX = /^[A-Z]{1,5}$/;

/**
 * 消息分类器
 * 纯函数：同样的输入总是得到同样的结果，不抛出异常
 */
export class PileupMessageParser {

  /**
   * 空结果，下游会直接忽略
   */
  static emptyResult(): ParsedMessage {
    return {
      messageType: PileupMessageType.UNKNOWN,
      isCq: false,
      isReply: false,
      isFinal: false,
    };
  }

  /**
   * 解析消息字符串
   * @param message 原始消息，如 "CQ DX1X JJ00" / "DX1X K1ABC FN42" / "K1ABC DX1X -10"
   */
  static parse(message: string): ParsedMessage {
    if (typeof message !== 'string') {
      return this.emptyResult();
    }

    const parts = message.trim().toUpperCase().split(/\s+/).filter(part => part.length > 0);
    if (parts.length < 2) {
      return this.emptyResult();
    }

    if (parts[0] === 'CQ') {
      return this.parseLeadingCQ(parts);
    }

    if (parts[1] === 'CQ') {
      return this.parseTrailingCQ(parts);
    }

    return this.parseDirected(parts);
  }

  /**
   * 格式: CQ [FLAG] CALLER [GRID]
   */
  private static parseLeadingCQ(parts: string[]): ParsedMessage {
    let callsignIndex = 1;

    // 跳过字母标记，直到遇到有效呼号
    while (
      callsignIndex < parts.length &&
      CQ_FLAG_REGEX.test(parts[callsignIndex]) &&
      !this.isValidCallsign(parts[callsignIndex])
    ) {
      callsignIndex += 1;
    }

    const callsign = parts[callsignIndex];
    if (!callsign || !this.isValidCallsign(callsign)) {
      return this.emptyResult();
    }

    return this.buildCQ(callsign, parts[callsignIndex + 1]);
  }

  /**
   * 格式: CALLER CQ [GRID]
   */
  private static parseTrailingCQ(parts: string[]): ParsedMessage {
    const callsign = parts[0];
    if (!this.isValidCallsign(callsign)) {
      return this.emptyResult();
    }
    return this.buildCQ(callsign, parts[2]);
  }

  private static buildCQ(callsign: string, gridToken: string | undefined): ParsedMessage {
    const result: ParsedMessage = {
      messageType: PileupMessageType.CQ,
      caller: this.cleanCallsign(callsign),
      isCq: true,
      isReply: false,
      isFinal: false,
    };
    if (gridToken && this.isValidGrid(gridToken)) {
      result.grid = gridToken;
    }
    return result;
  }

  /**
   * 格式: CALLEE CALLER [GRID | 报告 | R报告 | RRR | RR73 | 73]
   */
  private static parseDirected(parts: string[]): ParsedMessage {
    const [calleeToken, callerToken, payload] = parts;
    if (!this.isValidCallsign(calleeToken) || !this.isValidCallsign(callerToken)) {
      return this.emptyResult();
    }

    const result: ParsedMessage = {
      messageType: PileupMessageType.CALL,
      caller: this.cleanCallsign(callerToken),
      callee: this.cleanCallsign(calleeToken),
      isCq: false,
      isReply: true,
      isFinal: false,
    };

    if (payload === undefined) {
      return result;
    }

    // 结束消息优先于网格（RR73 在结构上也像一个网格）
    if (payload === 'RR73' || payload === '73') {
      result.messageType = payload === 'RR73' ? PileupMessageType.RR73 : PileupMessageType.SEVENTY_THREE;
      result.isFinal = true;
      return result;
    }

    if (payload === 'RRR') {
      result.messageType = PileupMessageType.RRR;
      return result;
    }

    if (ROGER_REPORT_REGEX.test(payload)) {
      result.messageType = PileupMessageType.ROGER_REPORT;
      result.report = parseInt(payload.slice(1), 10);
      return result;
    }

    if (REPORT_REGEX.test(payload)) {
      result.messageType = PileupMessageType.REPORT;
      result.report = parseInt(payload, 10);
      return result;
    }

    if (this.isValidGrid(payload)) {
      result.messageType = PileupMessageType.GRID;
      result.grid = payload;
      return result;
    }

    return result;
  }

  /**
   * 清理呼号，移除哈希呼号的尖括号
   */
  private static cleanCallsign(callsign: string): string {
    if (callsign.startsWith('<') && callsign.endsWith('>')) {
      return callsign.slice(1, -1);
    }
    return callsign;
  }

  /**
   * 验证呼号格式
   */
  static isValidCallsign(callsign: string): boolean {
    if (!callsign || callsign === 'CQ') return false;

    if (callsign.startsWith('<') && callsign.endsWith('>')) {
      const innerCallsign = callsign.slice(1, -1);
      // <...> 是协议中的占位符，不能当作真实呼号
      if (innerCallsign === '...') {
        return false;
      }
      return innerCallsign.length > 0 && FULL_CALLSIGN_REGEX.test(innerCallsign);
    }

    if (callsign.includes('/')) {
      return this.isValidCallsignWithSlash(callsign);
    }

    return this.isBasicValidCallsign(callsign);
  }

  /**
   * 支持 前缀/基础呼号 和 基础呼号/后缀 两种格式
   */
  private static isValidCallsignWithSlash(callsign: string): boolean {
    const parts = callsign.split('/');
    if (parts.length !== 2) return false;

    const [part1, part2] = parts;
    if (!part1 || !part2 || !BASE_CALLSIGN_REGEX.test(part1) || !BASE_CALLSIGN_REGEX.test(part2)) {
      return false;
    }

    // 前缀/基础呼号（如 OY/K4LT）
    if (part1.length <= 3 && /\d/.test(part2)) {
      return true;
    }

    // 基础呼号/后缀（如 JA1ABC/P、JA1ABC/MM）
    return /\d/.test(part1) && part2.length <= 3;
  }

  private static isBasicValidCallsign(callsign: string): boolean {
    if (callsign.length < 3 || callsign.length > 8) return false;

    // 必须包含至少一个数字
    if (!/\d/.test(callsign)) return false;

    if (!/^[A-Z0-9]+$/.test(callsign)) return false;

    // 数字不能在结尾（报告和 73 会落到这里）
    if (/\d$/.test(callsign)) return false;

    // 网格不是呼号
    if (this.isValidGrid(callsign)) return false;

    return true;
  }

  /**
   * 结构化识别网格，不查字典
   */
  static isValidGrid(token: string): boolean {
    return token !== 'RR73' && GRID_REGEX.test(token);
  }
}
