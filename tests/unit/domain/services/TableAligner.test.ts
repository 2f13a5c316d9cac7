import { describe, expect, it } from 'vitest';
import type { PriceSeries } from '@/domain/models/MarketData';
import { alignSeries } from '@/domain/services/TableAligner';

const day = (n: number): Date => new Date(Date.UTC(2024, 0, n));

const series = (symbol: string, entries: Array<[number, number]>): PriceSeries => ({
  symbol,
  assetClass: 'equity',
  timeZone: null,
  points: entries.map(([n, value]) => ({ timestamp: day(n), value })),
});

describe('alignSeries', () => {
  it('全系列に共通するタイムスタンプだけを残す', () => {
    const a = series('A', [
      [1, 10],
      [2, 11],
      [3, 12],
    ]);
    const b = series('B', [
      [2, 20],
      [3, 21],
      [4, 22],
    ]);

    const table = alignSeries([a, b]);

    expect(table.symbols).toEqual(['A', 'B']);
    expect(table.rows).toEqual([
      { timestamp: day(2), values: [11, 20] },
      { timestamp: day(3), values: [12, 21] },
    ]);
    expect(table.series.get('A')).toBe(a);
    expect(table.series.get('B')).toBe(b);
  });

  it('列の順序は引数の順序に従う', () => {
    const a = series('A', [[1, 10]]);
    const b = series('B', [[1, 20]]);

    expect(alignSeries([b, a]).rows).toEqual([{ timestamp: day(1), values: [20, 10] }]);
  });

  it('行はタイムスタンプ昇順', () => {
    const a = series('A', [
      [3, 3],
      [1, 1],
      [2, 2],
    ]);

    expect(alignSeries([a]).rows.map((row) => row.timestamp)).toEqual([day(1), day(2), day(3)]);
  });

  it('共通部分がなければ空のテーブル', () => {
    const table = alignSeries([series('A', [[1, 1]]), series('B', [[2, 2]])]);

    expect(table.symbols).toEqual(['A', 'B']);
    expect(table.rows).toEqual([]);
  });

  it('系列がなければ列も行もない', () => {
    const table = alignSeries([]);

    expect(table.symbols).toEqual([]);
    expect(table.rows).toEqual([]);
    expect(table.series.size).toBe(0);
  });
});
