import { beforeEach, describe, expect, it } from 'vitest';
import type { AssetClass, Period, Query } from '@/domain/models/MarketData';
import { AlphaVantageRequestBuilder } from '@/infra/adapters/alphavantage/AlphaVantageRequestBuilder';

/**
 * 単体テスト: AlphaVantageRequestBuilder
 *
 * 優先度1: Infrastructure層の純粋関数
 * - 資産クラス × 周期 × adjusted の function 名の対応表
 * - market / interval / adjusted パラメータの付与条件
 * - 不正な入力の拒否
 */
describe('AlphaVantageRequestBuilder', () => {
  let builder: AlphaVantageRequestBuilder;

  beforeEach(() => {
    builder = new AlphaVantageRequestBuilder();
  });

  const query = (overrides: Partial<Query>): Query => ({
    symbol: 'SPY',
    period: 'daily',
    adjusted: true,
    ...overrides,
  });

  describe('function 名の対応表', () => {
    it.each<[AssetClass, Period, boolean, string]>([
      ['crypto', 'intraday', true, 'CRYPTO_INTRADAY'],
      ['crypto', 'intraday', false, 'CRYPTO_INTRADAY'],
      ['crypto', 'daily', true, 'DIGITAL_CURRENCY_DAILY'],
      ['crypto', 'weekly', false, 'DIGITAL_CURRENCY_WEEKLY'],
      ['crypto', 'monthly', true, 'DIGITAL_CURRENCY_MONTHLY'],
      ['equity', 'intraday', true, 'TIME_SERIES_INTRADAY'],
      ['equity', 'intraday', false, 'TIME_SERIES_INTRADAY'],
      ['equity', 'daily', true, 'TIME_SERIES_DAILY_ADJUSTED'],
      ['equity', 'weekly', true, 'TIME_SERIES_WEEKLY_ADJUSTED'],
      ['equity', 'monthly', true, 'TIME_SERIES_MONTHLY_ADJUSTED'],
      ['equity', 'daily', false, 'TIME_SERIES_DAILY'],
      ['equity', 'weekly', false, 'TIME_SERIES_WEEKLY'],
      ['equity', 'monthly', false, 'TIME_SERIES_MONTHLY'],
    ])('%s / %s / adjusted=%s → %s', (assetClass, period, adjusted, expected) => {
      const result = builder.build(query({ period, adjusted, interval: '5min' }), assetClass);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.functionId).toBe(expected);
        expect(result.value.params.function).toBe(expected);
      }
    });
  });

  describe('パラメータ', () => {
    it('株式の日足: adjusted フラグを付け、market と interval は付けない', () => {
      const result = builder.build(query({ symbol: 'SPY', period: 'daily', adjusted: false }), 'equity');

      expect(result).toEqual({
        ok: true,
        value: {
          functionId: 'TIME_SERIES_DAILY',
          params: { function: 'TIME_SERIES_DAILY', symbol: 'SPY', outputsize: 'full', adjusted: 'false' },
        },
      });
    });

    it('株式の日中足: interval を付け、adjusted は付けない', () => {
      const result = builder.build(query({ symbol: 'GE', period: 'intraday', interval: '15min' }), 'equity');

      expect(result.ok && result.value.params).toEqual({
        function: 'TIME_SERIES_INTRADAY',
        symbol: 'GE',
        outputsize: 'full',
        interval: '15min',
      });
    });

    it('暗号資産の日足: market=USD を付け、adjusted は付けない', () => {
      const result = builder.build(query({ symbol: 'BTC', period: 'daily', adjusted: true }), 'crypto');

      expect(result.ok && result.value.params).toEqual({
        function: 'DIGITAL_CURRENCY_DAILY',
        symbol: 'BTC',
        outputsize: 'full',
        market: 'USD',
      });
    });

    it('暗号資産の日中足: market と interval を付ける', () => {
      const result = builder.build(query({ symbol: 'ETH', period: 'intraday', interval: '1min' }), 'crypto');

      expect(result.ok && result.value.params).toEqual({
        function: 'CRYPTO_INTRADAY',
        symbol: 'ETH',
        outputsize: 'full',
        market: 'USD',
        interval: '1min',
      });
    });

    it('日中足以外では interval を無視する', () => {
      const result = builder.build(query({ period: 'weekly', interval: '60min' }), 'equity');

      expect(result.ok && 'interval' in result.value.params).toBe(false);
    });
  });

  describe('不正な入力', () => {
    it.each<AssetClass>(['equity', 'crypto'])('%s の日中足で interval がなければ InvalidArgument', (assetClass) => {
      const result = builder.build(query({ period: 'intraday', interval: undefined }), assetClass);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('invalid-argument');
        expect(result.error.message).toBe('interval is required for intraday data');
      }
    });

    it.each<[string, unknown]>([
      ['未知の文字列', 'hourly'],
      ['大文字', 'DAILY'],
      ['数値', 1],
      ['null', null],
    ])('周期が%sなら InvalidArgument', (_label, raw) => {
      const period: Period = JSON.parse(JSON.stringify(raw));

      const result = builder.build(query({ period }), 'equity');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('invalid-argument');
        expect(result.error.message).toBe('period must be one of intraday, daily, weekly, monthly');
      }
    });

    it('空のシンボルは InvalidArgument', () => {
      const result = builder.build(query({ symbol: '  ' }), 'equity');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('invalid-argument');
      }
    });
  });
});
