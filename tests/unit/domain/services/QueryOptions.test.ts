import { describe, expect, it } from 'vitest';
import { parseInterval, parsePeriod, resolveInterval, resolvePeriod } from '@/domain/services/QueryOptions';

describe('QueryOptions', () => {
  describe('parsePeriod', () => {
    it('前後の空白と大文字小文字を無視する', () => {
      expect(parsePeriod(' Daily ')).toEqual({ ok: true, value: 'daily' });
    });

    it('未知の周期は InvalidArgument', () => {
      const result = parsePeriod('yearly');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('period must be one of intraday, daily, weekly, monthly (got "yearly")');
      }
    });
  });

  describe('parseInterval', () => {
    it('既知の間隔を受け付ける', () => {
      expect(parseInterval('60MIN')).toEqual({ ok: true, value: '60min' });
    });

    it('未知の間隔は InvalidArgument', () => {
      const result = parseInterval('2min');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('invalid-argument');
      }
    });
  });

  describe('resolvePeriod', () => {
    it.each(['intraday', 'daily', 'weekly', 'monthly'])('%s はそのまま返す', (period) => {
      expect(resolvePeriod(period)).toEqual({ ok: true, value: period });
    });

    it.each([['hourly'], [' daily'], ['Daily'], [undefined], [7]])('%s は InvalidArgument', (period) => {
      const result = resolvePeriod(period);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('period must be one of intraday, daily, weekly, monthly');
      }
    });
  });

  describe('resolveInterval', () => {
    it('日中足以外では interval を捨てる', () => {
      expect(resolveInterval('daily', '5min')).toEqual({ ok: true, value: undefined });
      expect(resolveInterval('monthly', 'garbage')).toEqual({ ok: true, value: undefined });
    });

    it('日中足では interval をそのまま返す', () => {
      expect(resolveInterval('intraday', '15min')).toEqual({ ok: true, value: '15min' });
    });

    it.each([undefined, null])('日中足で interval が %s なら InvalidArgument', (interval) => {
      const result = resolveInterval('intraday', interval);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('interval is required for intraday data');
      }
    });

    it('日中足で未知の interval なら InvalidArgument', () => {
      const result = resolveInterval('intraday', '2min');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('interval must be one of 1min, 5min, 15min, 30min, 60min for intraday data');
      }
    });
  });
});
