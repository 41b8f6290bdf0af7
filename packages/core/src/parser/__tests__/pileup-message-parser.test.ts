import { describe, it, expect } from 'vitest';
import { PileupMessageType } from '@pileup-intel/contracts';
import { PileupMessageParser } from '../pileup-message-parser.js';

describe('PileupMessageParser', () => {
  describe('CQ 消息', () => {
    it('解析 CQ CALLER GRID', () => {
      const result = PileupMessageParser.parse('CQ DX1X JJ00');
      expect(result).toEqual({
        messageType: PileupMessageType.CQ,
        caller: 'DX1X',
        grid: 'JJ00',
        isCq: true,
        isReply: false,
        isFinal: false,
      });
    });

    it('跳过 CQ 后的修饰标记并接受六位网格', () => {
      const result = PileupMessageParser.parse('CQ DX DX1X JJ00AA');
      expect(result.messageType).toBe(PileupMessageType.CQ);
      expect(result.caller).toBe('DX1X');
      expect(result.grid).toBe('JJ00AA');
    });

    it('解析 CALLER CQ GRID', () => {
      const result = PileupMessageParser.parse('DX1X CQ JJ00');
      expect(result.isCq).toBe(true);
      expect(result.caller).toBe('DX1X');
      expect(result.grid).toBe('JJ00');
    });

    it('小写输入会被转换为大写', () => {
      const result = PileupMessageParser.parse('cq dx1x jj00aa');
      expect(result.caller).toBe('DX1X');
      expect(result.grid).toBe('JJ00AA');
    });

    it('没有网格的 CQ', () => {
      const result = PileupMessageParser.parse('CQ K1ABC');
      expect(result.isCq).toBe(true);
      expect(result.caller).toBe('K1ABC');
      expect(result.grid).toBeUndefined();
    });
  });

  describe('定向消息', () => {
    it('呼叫方附带网格', () => {
      const result = PileupMessageParser.parse('DX1X K1ABC FN42');
      expect(result).toEqual({
        messageType: PileupMessageType.GRID,
        caller: 'K1ABC',
        callee: 'DX1X',
        grid: 'FN42',
        isCq: false,
        isReply: true,
        isFinal: false,
      });
    });

    it('信号报告', () => {
      const result = PileupMessageParser.parse('K1ABC DX1X -10');
      expect(result.messageType).toBe(PileupMessageType.REPORT);
      expect(result.caller).toBe('DX1X');
      expect(result.callee).toBe('K1ABC');
      expect(result.report).toBe(-10);
    });

    it('R+报告', () => {
      const result = PileupMessageParser.parse('DX1X K1ABC R-05');
      expect(result.messageType).toBe(PileupMessageType.ROGER_REPORT);
      expect(result.report).toBe(-5);
    });

    it('RRR 不是结束消息', () => {
      const result = PileupMessageParser.parse('K1ABC DX1X RRR');
      expect(result.messageType).toBe(PileupMessageType.RRR);
      expect(result.isFinal).toBe(false);
    });

    it('RR73 是结束消息而不是网格', () => {
      const result = PileupMessageParser.parse('K1ABC DX1X RR73');
      expect(result.messageType).toBe(PileupMessageType.RR73);
      expect(result.isFinal).toBe(true);
      expect(result.grid).toBeUndefined();
    });

    it('73 是结束消息', () => {
      const result = PileupMessageParser.parse('DX1X K1ABC 73');
      expect(result.messageType).toBe(PileupMessageType.SEVENTY_THREE);
      expect(result.isFinal).toBe(true);
    });

    it('只有两个呼号时为普通呼叫', () => {
      const result = PileupMessageParser.parse('DX1X K1ABC');
      expect(result.messageType).toBe(PileupMessageType.CALL);
      expect(result.isReply).toBe(true);
    });

    it('去掉哈希呼号的尖括号', () => {
      const result = PileupMessageParser.parse('<K1ABC/P> DX1X RR73');
      expect(result.callee).toBe('K1ABC/P');
      expect(result.caller).toBe('DX1X');
    });
  });

  describe('无法解析的输入', () => {
    it.each(['', '   ', 'CQ', 'HELLO', 'TNX 73 GL', 'CQ DX', '<...> DX1X'])('"%s" 返回空结果', (message) => {
      expect(PileupMessageParser.parse(message)).toEqual(PileupMessageParser.emptyResult());
    });
  });

  describe('呼号与网格校验', () => {
    it('网格是结构化识别的', () => {
      expect(PileupMessageParser.isValidGrid('FN42')).toBe(true);
      expect(PileupMessageParser.isValidGrid('JJ00AA')).toBe(true);
      expect(PileupMessageParser.isValidGrid('RR73')).toBe(false);
      expect(PileupMessageParser.isValidGrid('F42')).toBe(false);
    });

    it('网格和报告不是呼号', () => {
      expect(PileupMessageParser.isValidCallsign('FN42')).toBe(false);
      expect(PileupMessageParser.isValidCallsign('-10')).toBe(false);
      expect(PileupMessageParser.isValidCallsign('K1ABC')).toBe(true);
      expect(PileupMessageParser.isValidCallsign('OY/K4LT')).toBe(true);
    });
  });
});
