/**
 * PileupError 单元测试
 */

import { describe, it, expect } from 'vitest';
import { PileupError, PileupErrorCode, PileupErrorSeverity } from '../PileupError.js';

describe('PileupError', () => {
  describe('构造函数', () => {
    it('创建基本错误', () => {
      const error = new PileupError({
        code: PileupErrorCode.INVALID_DECODE,
        message: 'Test error',
      });

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(PileupError);
      expect(error.name).toBe('PileupError');
      expect(error.code).toBe(PileupErrorCode.INVALID_DECODE);
      expect(error.message).toBe('Test error');
      expect(error.userMessage).toBe('Test error');
      expect(error.severity).toBe(PileupErrorSeverity.ERROR);
      expect(error.suggestions).toEqual([]);
      expect(error.timestamp).toBeGreaterThan(0);
    });

    it('保留原始错误和上下文', () => {
      const cause = new Error('Original error');
      const error = new PileupError({
        code: PileupErrorCode.SCORER_FAILED,
        message: 'Scorer failed',
        cause,
        context: { modelName: 'm1' },
      });

      expect(error.cause).toBe(cause);
      expect(error.context).toEqual({ modelName: 'm1' });
    });
  });

  describe('from', () => {
    it('PileupError 原样返回', () => {
      const original = PileupError.invalidSpot('bad');
      expect(PileupError.from(original)).toBe(original);
    });

    it('包装普通 Error', () => {
      const cause = new Error('boom');
      const error = PileupError.from(cause, PileupErrorCode.CONFIG_LOAD_FAILED);

      expect(error.code).toBe(PileupErrorCode.CONFIG_LOAD_FAILED);
      expect(error.message).toBe('boom');
      expect(error.cause).toBe(cause);
    });

    it('包装非 Error 值', () => {
      const error = PileupError.from('plain string');

      expect(error.code).toBe(PileupErrorCode.UNKNOWN_ERROR);
      expect(error.message).toBe('plain string');
    });
  });

  describe('工厂方法', () => {
    it('invalidConfig 携带字段路径', () => {
      const error = PileupError.invalidConfig(['spectrum.decayFactor: too big', 'tracker.cycleSeconds: required'], '/tmp/a.json');

      expect(error.code).toBe(PileupErrorCode.INVALID_CONFIG);
      expect(error.severity).toBe(PileupErrorSeverity.CRITICAL);
      expect(error.message).toBe('Invalid engine config: spectrum.decayFactor: too big; tracker.cycleSeconds: required');
      expect(error.context).toEqual({
        issues: ['spectrum.decayFactor: too big', 'tracker.cycleSeconds: required'],
        filePath: '/tmp/a.json',
      });
      expect(error.suggestions.length).toBeGreaterThan(0);
    });

    it('configLoadFailed', () => {
      const cause = new Error('EACCES');
      const error = PileupError.configLoadFailed('/tmp/b.json', cause);

      expect(error.code).toBe(PileupErrorCode.CONFIG_LOAD_FAILED);
      expect(error.cause).toBe(cause);
      expect(error.message).toBe('Failed to load config from /tmp/b.json');
    });

    it('输入类错误是警告级别', () => {
      expect(PileupError.invalidDecode('snr: Expected number').severity).toBe(PileupErrorSeverity.WARNING);
      expect(PileupError.invalidSpot('freq: Required').severity).toBe(PileupErrorSeverity.WARNING);
      expect(PileupError.scorerFailed('success_model').severity).toBe(PileupErrorSeverity.WARNING);
    });
  });

  describe('序列化', () => {
    it('toString', () => {
      expect(PileupError.invalidDecode('message: Required').toString()).toBe('[INVALID_DECODE] Invalid decode: message: Required');
    });

    it('toJSON', () => {
      const json = PileupError.scorerFailed('success_model').toJSON();

      expect(json).toMatchObject({
        name: 'PileupError',
        code: PileupErrorCode.SCORER_FAILED,
        message: 'Prior scorer failed for model success_model',
        severity: PileupErrorSeverity.WARNING,
        context: { modelName: 'success_model' },
      });
    });
  });
});
